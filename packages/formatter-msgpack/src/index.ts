/**
 * @parley/formatter-msgpack - MessagePack Formatter
 *
 * MessagePack format encoding/decoding wrapper.
 * MessagePack is a binary serialization format that's more compact than JSON.
 *
 * Both the IANA-style and the legacy x- spellings select this format; responses
 * always carry application/msgpack.
 */

import { encode, decode } from '@msgpack/msgpack';
import { type Formatter } from '@parley/common';

export const MsgpackFormatter: Formatter = {
    encode(data: unknown): Uint8Array {
        return encode(data);
    },

    decode(data: Uint8Array): unknown {
        return decode(data);
    },

    contentType: 'application/msgpack',

    aliases: ['application/x-msgpack', 'application/vnd.msgpack']
};
