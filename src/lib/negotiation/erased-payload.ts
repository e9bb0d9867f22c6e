/**
 * Erased Payload
 *
 * A handler knows the type of the value it answers with; the stage that
 * serializes it does not, and it only learns the output format from the
 * request's Accept header. The value is therefore wrapped in an ErasedPayload:
 * an object whose only capability is "serialize yourself with this formatter".
 *
 * Handlers return `negotiated(value)`, a placeholder Response carrying the
 * payload out of band. The placeholder reads as a 415 "Misconfigured service
 * layer" if it ever reaches a client without passing the response negotiator,
 * e.g. because the middleware was not mounted on that route.
 */

import { type Formatter } from '@parley/common';
import { diagnosticResponse } from './responses.js';
import { MISCONFIGURED_MESSAGE } from './errors.js';

/** Status of the placeholder response; replaced by 200 once encoded */
export const PLACEHOLDER_STATUS = 415;

export interface ErasedPayload {
    readonly consumed: boolean;

    /**
     * Encode the wrapped value; may be called once
     */
    serializeInto(formatter: Formatter): Uint8Array;
}

class TypedPayload<T> implements ErasedPayload {
    private value: T | undefined;
    private used = false;

    constructor(value: T) {
        this.value = value;
    }

    get consumed(): boolean {
        return this.used;
    }

    serializeInto(formatter: Formatter): Uint8Array {
        if (this.used) {
            throw new Error('Negotiated payload was already serialized');
        }
        this.used = true;

        const value = this.value;
        this.value = undefined;
        return formatter.encode(value);
    }
}

/**
 * Hide a typed value behind the serialize capability
 */
export function erase<T>(value: T): ErasedPayload {
    return new TypedPayload(value);
}

// Out-of-band metadata, keyed by the body stream: Hono keeps the stream when
// it re-wraps a response to merge headers, the Response object it does not.
const payloads = new WeakMap<object, ErasedPayload>();

export function attachPayload(response: Response, payload: ErasedPayload): Response {
    if (!response.body) {
        throw new Error('Cannot attach a negotiated payload to a response without a body');
    }
    payloads.set(response.body, payload);
    return response;
}

/**
 * Look at the payload without taking it
 */
export function peekPayload(response: Response): ErasedPayload | null {
    return (response.body && payloads.get(response.body)) ?? null;
}

/**
 * Remove and return the payload attached to a response
 */
export function takePayload(response: Response): ErasedPayload | null {
    const payload = peekPayload(response);
    if (payload && response.body) {
        payloads.delete(response.body);
    }
    return payload;
}

/**
 * Answer with a value to be encoded in the negotiated format
 *
 * `init.status` defaults to the placeholder status, which the negotiator turns
 * into 200; any other status (e.g. 201) is kept. `init.headers` are kept too.
 *
 * Headers for a negotiated response go through `init.headers`. Like any raw
 * Response returned from a Hono route, the placeholder does not pick up headers
 * set with c.header() before the route returned; middleware that tags every
 * response sets its headers after `await next()`.
 *
 * @example
 * app.post('/messages', bodyParser(registry, parseMessage), (context) => {
 *     return negotiated({ id: 7 }, { status: 201 });
 * });
 */
export function negotiated<T>(value: T, init: ResponseInit = {}): Response {
    const placeholder = diagnosticResponse(MISCONFIGURED_MESSAGE, init.status ?? PLACEHOLDER_STATUS, init);
    return attachPayload(placeholder, erase(value));
}
