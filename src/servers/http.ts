/**
 * HTTP Server
 *
 * Hono app wired with the negotiation middleware, served on Node through
 * @hono/node-server.
 */

import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';

import { HttpErrors, isHttpError } from '@src/lib/errors/http-error.js';
import { logger, describeError } from '@src/lib/logger.js';
import { type MediaTypeRegistry, renderError } from '@src/lib/negotiation/index.js';

// Middleware
import * as middleware from '@src/lib/middleware/index.js';

// Public endpoints
import RootGet from '@src/routes/root/GET.js';
import HealthGet from '@src/routes/health/GET.js';
import FormatsGet from '@src/routes/formats/GET.js';
import MessagesPost, { parseMessageRequest } from '@src/routes/messages/POST.js';

/**
 * Create and configure the Hono HTTP app
 */
export function createHttpApp(registry: MediaTypeRegistry): Hono {
    const app = new Hono();

    // Request tracking (first, so it times the whole exchange)
    app.use('*', middleware.requestTrackerMiddleware);

    // Health check answers in its own format; it is not negotiated
    app.get('/health', HealthGet);

    // Negotiated routes: Accept is resolved before the body is read
    const negotiator = middleware.responseNegotiatorMiddleware(registry);
    app.use('/', negotiator);
    app.use('/formats', negotiator);
    app.use('/messages', negotiator);

    app.get('/', RootGet);
    app.get('/formats', FormatsGet);
    app.post('/messages', middleware.bodyParserMiddleware(registry, parseMessageRequest), MessagesPost);

    // Error handling
    app.onError((err, c) => {
        if (isHttpError(err)) {
            return renderError(err);
        }

        logger.error('Unhandled request error', {
            method: c.req.method,
            path: c.req.path,
            ...describeError(err),
        });
        return renderError(HttpErrors.internal());
    });

    // 404 handler
    app.notFound((c) => {
        return c.json(
            {
                success: false,
                error: 'Not found',
                error_code: 'NOT_FOUND',
            },
            404
        );
    });

    return app;
}

export interface HttpServerHandle {
    app: Hono;
    server: ServerType;
    stop: () => Promise<void>;
}

/**
 * Start the HTTP server
 */
export function startHttpServer(registry: MediaTypeRegistry, port: number, host: string): HttpServerHandle {
    const app = createHttpApp(registry);

    const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
        logger.info('HTTP server running', { port: info.port, url: `http://${host}:${info.port}` });
    });

    return {
        app,
        server,
        stop: () =>
            new Promise<void>((resolve, reject) => {
                server.close((error) => {
                    if (error) {
                        reject(error);
                        return;
                    }
                    logger.info('HTTP server stopped');
                    resolve();
                });
            }),
    };
}
