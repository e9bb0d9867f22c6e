/**
 * Request Tracking Middleware
 *
 * Logs one line per completed request with method, path, final status,
 * negotiated media type (when one was selected) and duration.
 * Should be applied first so the duration covers the whole chain.
 */

import type { Context, Next } from 'hono';
import { logger } from '@src/lib/logger.js';

export async function requestTrackerMiddleware(context: Context, next: Next) {
    const start = process.hrtime.bigint();

    await next();

    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;

    logger.info('Request completed', {
        method: context.req.method,
        path: context.req.path,
        status: context.res.status,
        mediaType: context.get('negotiatedFormat')?.mediaType ?? null,
        durationMs: Math.round(durationMs * 1000) / 1000,
    });
}
