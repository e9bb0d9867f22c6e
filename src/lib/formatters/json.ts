/**
 * JSON Formatter
 *
 * Standard JSON encoding/decoding wrapper.
 */

import { type Formatter, FormatterError, toBytes, fromBytes } from '@parley/common';

export const JsonFormatter: Formatter = {
    encode(data: unknown): Uint8Array {
        const text = JSON.stringify(data);

        // undefined, functions and symbols have no JSON representation
        if (text === undefined) {
            throw new FormatterError(JsonFormatter.contentType, `Cannot encode ${typeof data} as JSON`);
        }

        return toBytes(text);
    },

    decode(data: Uint8Array): unknown {
        return JSON.parse(fromBytes(data));
    },

    contentType: 'application/json'
};
