/**
 * Request Body Parser Middleware
 *
 * Decodes the request body in the format its Content-Type declares and hands
 * the typed result to the route as context.get('parsedBody'), and the format it
 * was decoded from as context.get('requestFormat').
 *
 * - No Content-Type: the registry default format
 * - Unregistered Content-Type: 406, body never read
 * - Undecodable body or parser rejection: 400
 *
 * The route handler is not called on any of these failures.
 */

import type { MiddlewareHandler } from 'hono';
import { isHttpError } from '@src/lib/errors/http-error.js';
import { logger, describeError } from '@src/lib/logger.js';
import { type MediaTypeRegistry, type RegisteredFormat } from '@src/lib/negotiation/media-type-registry.js';
import { type BodyParser, decodeInbound } from '@src/lib/negotiation/inbound-decoder.js';
import { renderError } from '@src/lib/negotiation/responses.js';

export type ParsedBodyEnv<T> = {
    Variables: {
        parsedBody: T;
        requestFormat: RegisteredFormat;
    };
};

/**
 * Create a body parser bound to a registry and a value parser
 *
 * @example
 * app.post('/messages', bodyParserMiddleware(registry, parseMessage), MessagesPost);
 */
export function bodyParserMiddleware<T>(
    registry: MediaTypeRegistry,
    parse: BodyParser<T>
): MiddlewareHandler<ParsedBodyEnv<T>> {
    return async (context, next) => {
        const contentType = context.req.header('content-type');

        try {
            const decoded = await decodeInbound(contentType, () => context.req.arrayBuffer(), registry, parse);
            context.set('parsedBody', decoded.value);
            context.set('requestFormat', decoded.format);
        } catch (error) {
            if (!isHttpError(error)) {
                throw error;
            }

            logger.warn('Request body rejected', {
                outcome: 'decode-failed',
                path: context.req.path,
                errorCode: error.errorCode,
                ...error.details,
                ...(error.cause !== undefined && describeError(error.cause)),
            });

            return renderError(error);
        }

        await next();
    };
}
