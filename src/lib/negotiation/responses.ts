/**
 * Fixed diagnostic responses
 *
 * Diagnostics are not written in any negotiated format, so they go out as
 * raw bytes without a Content-Type header.
 */

import { toBytes } from '@parley/common';
import { type HttpError } from '@src/lib/errors/http-error.js';

/**
 * Response with a fixed text body and no Content-Type
 */
export function diagnosticResponse(message: string, status: number, init: ResponseInit = {}): Response {
    const headers = new Headers(init.headers);
    headers.delete('content-type');
    headers.delete('content-length');
    return new Response(toBytes(message), { ...init, status, headers });
}

/**
 * Render an HttpError (any negotiation error included) as its diagnostic response
 */
export function renderError(error: HttpError): Response {
    return diagnosticResponse(error.message, error.statusCode);
}
