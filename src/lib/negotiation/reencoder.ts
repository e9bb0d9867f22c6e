/**
 * Response Re-encoder
 *
 * Post-handler half of a negotiated exchange. Given the handler's response and
 * the format chosen before the handler ran, either pass the response through
 * (no erased payload attached) or replace its body with the payload encoded in
 * that format.
 */

import { PLACEHOLDER_STATUS, takePayload } from './erased-payload.js';
import { EncodeFailureError } from './errors.js';
import { type NegotiatedFormat } from './format-selector.js';
import { renderError } from './responses.js';

export type FinalizeResult =
    | { outcome: 'pass-through'; response: Response }
    | { outcome: 'success'; response: Response }
    | { outcome: 'encode-failed'; response: Response; error: EncodeFailureError };

/**
 * Build the encoded response from the placeholder
 *
 * Only the placeholder status is rewritten (to 200); a status the handler chose
 * is kept. The old Content-Length described the placeholder text, so it goes.
 */
function encodedResponse(placeholder: Response, format: NegotiatedFormat, body: Uint8Array): Response {
    const status = placeholder.status === PLACEHOLDER_STATUS ? 200 : placeholder.status;

    const headers = new Headers(placeholder.headers);
    headers.delete('content-length');
    headers.set('content-type', format.mediaType);

    // Response bodies take ArrayBuffer-backed views only; codecs may hand back pooled buffers
    return new Response(new Uint8Array(body), { status, headers });
}

export function finalizeResponse(response: Response, format: NegotiatedFormat): FinalizeResult {
    const payload = takePayload(response);
    if (!payload) {
        return { outcome: 'pass-through', response };
    }

    let body: Uint8Array;
    try {
        body = payload.serializeInto(format.formatter);
    } catch (cause) {
        const error = new EncodeFailureError(format.mediaType, cause);
        return { outcome: 'encode-failed', response: renderError(error), error };
    }

    return { outcome: 'success', response: encodedResponse(response, format, body) };
}
