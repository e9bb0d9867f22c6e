/**
 * @parley/common - Shared interfaces and utilities for Parley packages
 *
 * This package provides the formatter contract that every wire format
 * implements, plus the byte helpers the text formats share.
 */

/**
 * Formatter interface for data serialization/deserialization
 *
 * All formatters work with Uint8Array to support both text and binary formats.
 * Both operations throw when the value or the bytes cannot be handled; callers
 * decide how a failure is surfaced.
 */
export interface Formatter {
    /**
     * Encode data to bytes
     * @param data - The data to encode (typically an object or array)
     */
    encode(data: unknown): Uint8Array;

    /**
     * Decode bytes to data
     * @param data - The bytes to decode
     */
    decode(data: Uint8Array): unknown;

    /**
     * Canonical media type for this format
     * Used as the Content-Type of encoded responses
     */
    readonly contentType: string;

    /**
     * Additional media type tokens that select this format
     * (legacy or vendor spellings, e.g. application/x-msgpack)
     */
    readonly aliases?: readonly string[];
}

/**
 * Raised by a formatter that cannot represent a value or parse its input
 * without the underlying library throwing on its own.
 */
export class FormatterError extends Error {
    public readonly name = 'FormatterError';

    constructor(
        public readonly contentType: string,
        message: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        Object.setPrototypeOf(this, FormatterError.prototype);
    }
}

/**
 * Text encoding utilities
 */
const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Convert a string to Uint8Array (UTF-8)
 */
export function toBytes(text: string): Uint8Array<ArrayBuffer> {
    return textEncoder.encode(text);
}

/**
 * Convert Uint8Array to string (UTF-8)
 * Throws on invalid UTF-8 sequences.
 */
export function fromBytes(data: Uint8Array): string {
    return textDecoder.decode(data);
}
