/**
 * Inbound Decoder
 *
 * Resolves the declared Content-Type against the registry and decodes the
 * request body with the matching formatter. Content-Type is a declaration, not
 * a preference list: exact token match only, no wildcard, no quality.
 */

import { isHttpError } from '@src/lib/errors/http-error.js';
import { type MediaTypeRegistry, type RegisteredFormat } from './media-type-registry.js';
import { BodyTransportError, MalformedBodyError, UnsupportedDeclaredTypeError } from './errors.js';

/**
 * Validates and narrows a decoded value; throws when it does not fit
 */
export type BodyParser<T> = (value: unknown) => T;

export interface DecodedBody<T> {
    value: T;
    format: RegisteredFormat;
    byteLength: number;
}

/** Accepts any decoded value as-is */
export const passthrough: BodyParser<unknown> = (value) => value;

/**
 * Resolve a Content-Type header to a registered format
 *
 * Parameters (`; charset=utf-8`) are dropped; a missing or blank header means
 * the registry default. Returns null for an unregistered token.
 */
export function resolveDeclaredType(
    contentType: string | null | undefined,
    registry: MediaTypeRegistry
): RegisteredFormat | null {
    const token = (contentType ?? '').split(';')[0].trim();
    if (!token) {
        return registry.defaultFormat;
    }
    return registry.resolve(token);
}

async function readBytes(readBody: () => Promise<ArrayBuffer | Uint8Array>): Promise<Uint8Array> {
    try {
        const body = await readBody();
        return body instanceof Uint8Array ? body : new Uint8Array(body);
    } catch (error) {
        // Errors that already carry an HTTP status (size limits and the like) go out unchanged
        if (isHttpError(error)) {
            throw error;
        }
        throw new BodyTransportError(error);
    }
}

/**
 * Decode a request body
 *
 * The body is only read once the declared type is known to be supported.
 */
export async function decodeInbound<T>(
    contentType: string | null | undefined,
    readBody: () => Promise<ArrayBuffer | Uint8Array>,
    registry: MediaTypeRegistry,
    parse: BodyParser<T>
): Promise<DecodedBody<T>> {
    const format = resolveDeclaredType(contentType, registry);
    if (!format) {
        throw new UnsupportedDeclaredTypeError(contentType ?? '');
    }

    const bytes = await readBytes(readBody);

    let value: T;
    try {
        value = parse(format.formatter.decode(bytes));
    } catch (error) {
        throw new MalformedBodyError(format.mediaType, bytes.byteLength, error);
    }

    return { value, format, byteLength: bytes.byteLength };
}
