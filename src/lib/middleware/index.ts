/**
 * Middleware Barrel Export
 *
 * - Request tracking (logging)
 * - Response negotiation (Accept -> format, deferred encoding)
 * - Request body decoding (Content-Type -> typed value)
 */

export { requestTrackerMiddleware } from './request-tracker.js';
export { responseNegotiatorMiddleware } from './response-negotiator.js';
export { bodyParserMiddleware, type ParsedBodyEnv } from './body-parser.js';
