/**
 * Negotiation error taxonomy
 *
 * Every failure terminates the exchange; none is retried here. The message of
 * each error is the fixed diagnostic sent to the caller, so it never contains
 * codec output. Detail for the logs lives in `details` and `cause`.
 */

import { HttpError } from '@src/lib/errors/http-error.js';

export const NOT_ACCEPTABLE_MESSAGE = 'Invalid content type on request';
export const MALFORMED_BODY_MESSAGE = 'Malformed request body';
export const BODY_UNAVAILABLE_MESSAGE = 'Failed to read request body';
export const ENCODE_FAILURE_MESSAGE = 'Failed to serialize response';
export const MISCONFIGURED_MESSAGE = 'Misconfigured service layer';

/**
 * No registered format satisfies the Accept header
 */
export class NegotiationFailedError extends HttpError {
    constructor(public readonly accept: string | undefined) {
        super(406, NOT_ACCEPTABLE_MESSAGE, 'NOT_ACCEPTABLE', { accept: accept ?? null });
    }
}

/**
 * The declared Content-Type is not registered; raised before the body is read
 */
export class UnsupportedDeclaredTypeError extends HttpError {
    constructor(public readonly contentType: string) {
        super(406, NOT_ACCEPTABLE_MESSAGE, 'UNSUPPORTED_DECLARED_TYPE', { contentType });
    }
}

/**
 * Body bytes do not decode in the declared format, or fail the handler's parser
 */
export class MalformedBodyError extends HttpError {
    constructor(
        public readonly mediaType: string,
        public readonly byteLength: number,
        cause: unknown
    ) {
        super(400, MALFORMED_BODY_MESSAGE, 'MALFORMED_BODY', { mediaType, byteLength }, { cause });
    }
}

/**
 * The transport could not deliver the body
 */
export class BodyTransportError extends HttpError {
    constructor(cause: unknown) {
        super(400, BODY_UNAVAILABLE_MESSAGE, 'BODY_UNAVAILABLE', undefined, { cause });
    }
}

/**
 * A negotiated payload could not be serialized in the selected format
 */
export class EncodeFailureError extends HttpError {
    constructor(
        public readonly mediaType: string,
        cause: unknown
    ) {
        super(500, ENCODE_FAILURE_MESSAGE, 'ENCODE_FAILURE', { mediaType }, { cause });
    }
}
