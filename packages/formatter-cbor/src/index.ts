/**
 * @parley/formatter-cbor - CBOR Formatter
 *
 * CBOR (Concise Binary Object Representation) format encoding/decoding.
 * CBOR is a binary data format similar to JSON but more compact.
 * Standardized as RFC 8949.
 */

import { encode, decode } from 'cbor-x';
import { type Formatter } from '@parley/common';

export const CborFormatter: Formatter = {
    encode(data: unknown): Uint8Array {
        return encode(data);
    },

    decode(data: Uint8Array): unknown {
        return decode(data);
    },

    contentType: 'application/cbor'
};
