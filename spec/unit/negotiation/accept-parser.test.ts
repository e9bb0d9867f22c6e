/**
 * Accept Parser Unit Tests
 *
 * Quality parsing, ordering and the absent-header default.
 */

import { describe, test, expect } from 'vitest';
import { parseAccept, parseQuality } from '@src/lib/negotiation/accept-parser.js';

describe('parseAccept', () => {
    describe('Missing header', () => {
        test('should treat an absent header as a single wildcard at full weight', () => {
            expect(parseAccept(undefined)).toEqual([{ mediaType: '*/*', quality: 1 }]);
            expect(parseAccept(null)).toEqual([{ mediaType: '*/*', quality: 1 }]);
        });

        test('should treat a blank header like an absent one', () => {
            expect(parseAccept('')).toEqual([{ mediaType: '*/*', quality: 1 }]);
            expect(parseAccept('   ')).toEqual([{ mediaType: '*/*', quality: 1 }]);
        });
    });

    describe('Ordering', () => {
        test('should order candidates by descending quality', () => {
            expect(parseAccept('application/cbor;q=0.5, application/json')).toEqual([
                { mediaType: 'application/json', quality: 1 },
                { mediaType: 'application/cbor', quality: 0.5 },
            ]);
        });

        test('should keep header order between equal weights', () => {
            expect(parseAccept('application/cbor, application/json, application/yaml;q=0.9')).toEqual([
                { mediaType: 'application/cbor', quality: 1 },
                { mediaType: 'application/json', quality: 1 },
                { mediaType: 'application/yaml', quality: 0.9 },
            ]);
        });
    });

    describe('Tokens and parameters', () => {
        test('should ignore empty segments', () => {
            expect(parseAccept('application/json,, ,application/cbor')).toEqual([
                { mediaType: 'application/json', quality: 1 },
                { mediaType: 'application/cbor', quality: 1 },
            ]);
        });

        test('should skip an entry without a media type', () => {
            expect(parseAccept(';q=0.5, application/json')).toEqual([{ mediaType: 'application/json', quality: 1 }]);
        });

        test('should read q among other parameters', () => {
            expect(parseAccept('application/json; charset=utf-8; q=0.3')).toEqual([
                { mediaType: 'application/json', quality: 0.3 },
            ]);
        });

        test('should keep tokens as written', () => {
            expect(parseAccept('Application/JSON')).toEqual([{ mediaType: 'Application/JSON', quality: 1 }]);
        });

        test('should give a malformed weight zero', () => {
            expect(parseAccept('application/json;q=abc, application/cbor;q=0.1')).toEqual([
                { mediaType: 'application/cbor', quality: 0.1 },
                { mediaType: 'application/json', quality: 0 },
            ]);
        });
    });
});

describe('parseQuality', () => {
    test('should parse decimals within range', () => {
        expect(parseQuality('0.25')).toBe(0.25);
        expect(parseQuality('1')).toBe(1);
        expect(parseQuality('0')).toBe(0);
        expect(parseQuality('.5')).toBe(0.5);
        expect(parseQuality('1.')).toBe(1);
        expect(parseQuality(' 0.7 ')).toBe(0.7);
    });

    test('should return zero for out of range values', () => {
        expect(parseQuality('1.5')).toBe(0);
        expect(parseQuality('-1')).toBe(0);
    });

    test('should return zero for anything that is not a plain decimal', () => {
        expect(parseQuality('abc')).toBe(0);
        expect(parseQuality('')).toBe(0);
        expect(parseQuality('1e-1')).toBe(0);
        expect(parseQuality('0.5x')).toBe(0);
    });
});
