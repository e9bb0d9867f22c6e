/**
 * Erased Payload Unit Tests
 */

import { describe, test, expect } from 'vitest';
import { fromBytes } from '@parley/common';
import { JsonFormatter } from '@src/lib/formatters/index.js';
import {
    attachPayload,
    erase,
    negotiated,
    peekPayload,
    takePayload,
} from '@src/lib/negotiation/erased-payload.js';

describe('erase', () => {
    test('should serialize the wrapped value with the given formatter', () => {
        const payload = erase({ id: 7, tags: ['a'] });

        expect(payload.consumed).toBe(false);
        expect(fromBytes(payload.serializeInto(JsonFormatter))).toBe('{"id":7,"tags":["a"]}');
        expect(payload.consumed).toBe(true);
    });

    test('should refuse to serialize twice', () => {
        const payload = erase('once');
        payload.serializeInto(JsonFormatter);

        expect(() => payload.serializeInto(JsonFormatter)).toThrow('Negotiated payload was already serialized');
    });

    test('should count a failed serialization as consumed', () => {
        const payload = erase(undefined);

        expect(() => payload.serializeInto(JsonFormatter)).toThrow('Cannot encode undefined as JSON');
        expect(payload.consumed).toBe(true);
    });
});

describe('negotiated', () => {
    test('should build the misconfiguration placeholder', async () => {
        const response = negotiated({ ok: true });

        expect(response.status).toBe(415);
        expect(response.headers.get('content-type')).toBeNull();
        expect(await response.text()).toBe('Misconfigured service layer');
    });

    test('should keep a status chosen by the handler', () => {
        expect(negotiated({ ok: true }, { status: 201 }).status).toBe(201);
    });

    test('should keep handler headers but never a content type', () => {
        const response = negotiated(
            { ok: true },
            { headers: { 'x-request-id': 'req-1', 'content-type': 'text/html' } }
        );

        expect(response.headers.get('x-request-id')).toBe('req-1');
        expect(response.headers.get('content-type')).toBeNull();
    });

    test('should attach a payload readable from the response', () => {
        const response = negotiated([1, 2, 3]);
        const payload = peekPayload(response);

        expect(payload).not.toBeNull();
        expect(payload?.consumed).toBe(false);
    });
});

describe('payload attachment', () => {
    test('should find nothing on an ordinary response', () => {
        expect(peekPayload(new Response('plain'))).toBeNull();
        expect(peekPayload(new Response(null, { status: 204 }))).toBeNull();
    });

    test('should hand the payload out only once', () => {
        const response = negotiated({ ok: true });

        expect(takePayload(response)).not.toBeNull();
        expect(takePayload(response)).toBeNull();
        expect(peekPayload(response)).toBeNull();
    });

    test('should survive re-wrapping the body stream', () => {
        const original = negotiated({ ok: true });
        const rewrapped = new Response(original.body, original);

        expect(peekPayload(rewrapped)).toBe(peekPayload(original));
    });

    test('should refuse a response without a body', () => {
        expect(() => attachPayload(new Response(null), erase(1))).toThrow(
            'Cannot attach a negotiated payload to a response without a body'
        );
    });
});
