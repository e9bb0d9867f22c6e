/**
 * Response Negotiator Middleware
 *
 * Wraps a route in the two halves of a negotiated exchange:
 *
 * 1. Before the route: pick the response format from the Accept header.
 *    Nothing acceptable -> 406 and the route never runs.
 * 2. After the route: if the response carries an erased payload (the route
 *    returned negotiated(value)), encode it in the format picked in step 1.
 *    Any other response passes through untouched.
 *
 * Mount it outside bodyParserMiddleware so an unacceptable Accept header is
 * rejected before the body is read.
 */

import type { MiddlewareHandler } from 'hono';
import { logger, describeError } from '@src/lib/logger.js';
import { type MediaTypeRegistry } from '@src/lib/negotiation/media-type-registry.js';
import { type NegotiatedFormat, negotiateAccept } from '@src/lib/negotiation/format-selector.js';
import { finalizeResponse } from '@src/lib/negotiation/reencoder.js';
import { NegotiationFailedError } from '@src/lib/negotiation/errors.js';
import { renderError } from '@src/lib/negotiation/responses.js';

declare module 'hono' {
    interface ContextVariableMap {
        negotiatedFormat: NegotiatedFormat;
        mediaTypes: MediaTypeRegistry;
    }
}

export function responseNegotiatorMiddleware(registry: MediaTypeRegistry): MiddlewareHandler {
    return async (context, next) => {
        const accept = context.req.header('accept');
        const format = negotiateAccept(accept, registry);

        if (!format) {
            logger.warn('No acceptable response format', {
                outcome: 'negotiation-failed',
                path: context.req.path,
                accept: accept ?? null,
            });
            return renderError(new NegotiationFailedError(accept));
        }

        context.set('negotiatedFormat', format);
        context.set('mediaTypes', registry);

        await next();

        const result = finalizeResponse(context.res, format);

        switch (result.outcome) {
            case 'pass-through':
                return;

            case 'encode-failed':
                logger.error('Failed to encode negotiated response', {
                    outcome: result.outcome,
                    path: context.req.path,
                    mediaType: result.error.mediaType,
                    ...describeError(result.error.cause),
                });
                break;

            case 'success':
                logger.debug('Encoded negotiated response', {
                    outcome: result.outcome,
                    path: context.req.path,
                    mediaType: format.mediaType,
                    status: result.response.status,
                });
                break;
        }

        // Replaces the placeholder outright; its headers were already copied by
        // finalizeResponse. Headers set later with c.header() land on the new response.
        context.res = undefined;
        context.res = result.response;
    };
}
