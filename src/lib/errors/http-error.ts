/**
 * HttpError - Structured HTTP error handling for API responses
 *
 * Separates business logic errors from HTTP transport concerns.
 * Business logic throws semantic errors, middleware handles HTTP details.
 */

export class HttpError extends Error {
    public readonly name: string = 'HttpError';

    constructor(
        public readonly statusCode: number,
        message: string,
        public readonly errorCode?: string,
        public readonly details?: Record<string, unknown>,
        options?: ErrorOptions
    ) {
        super(message, options);

        // Maintain proper prototype chain for instanceof checks (subclasses included)
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Factory methods for common HTTP error scenarios
 */
export class HttpErrors {
    static internal(message = 'Internal server error', errorCode = 'INTERNAL_ERROR') {
        return new HttpError(500, message, errorCode);
    }
}

/**
 * Type guard for HttpError instances
 */
export function isHttpError(error: unknown): error is HttpError {
    return error instanceof HttpError;
}
