/**
 * Configuration Unit Tests
 */

import { describe, test, expect } from 'vitest';
import { loadConfig, validateNegotiationConfig } from '@src/lib/config.js';

describe('loadConfig', () => {
    test('should apply defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            negotiation: { formats: ['json', 'cbor'], defaultFormat: 'json' },
            port: 9001,
            host: '0.0.0.0',
        });
    });

    test('should normalize the format list', () => {
        const config = loadConfig({ PARLEY_FORMATS: ' CBOR, json ,cbor,', PARLEY_DEFAULT_FORMAT: ' Json ' });

        expect(config.negotiation).toEqual({ formats: ['cbor', 'json'], defaultFormat: 'json' });
    });

    test('should read the listener settings', () => {
        const config = loadConfig({ PORT: '8080', HOST: ' 127.0.0.1 ' });

        expect(config.port).toBe(8080);
        expect(config.host).toBe('127.0.0.1');
    });

    test('should fail on an invalid port', () => {
        expect(() => loadConfig({ PORT: 'eighty' })).toThrow(
            'Fatal: PORT must be an integer between 0 and 65535, got "eighty"'
        );
        expect(() => loadConfig({ PORT: '70000' })).toThrow('Fatal: PORT must be an integer');
    });

    test('should fail on an empty format list', () => {
        expect(() => loadConfig({ PARLEY_FORMATS: ' , ' })).toThrow('Fatal: at least one format must be registered');
    });

    test('should fail on unknown formats', () => {
        expect(() => loadConfig({ PARLEY_FORMATS: 'json,xml' })).toThrow(
            'Fatal: unknown format(s) xml; available: json, yaml, cbor, msgpack'
        );
    });

    test('should fail when the default is not registered', () => {
        expect(() => loadConfig({ PARLEY_FORMATS: 'json,cbor', PARLEY_DEFAULT_FORMAT: 'yaml' })).toThrow(
            'Fatal: default format "yaml" is not registered (registered: json, cbor)'
        );
    });
});

describe('validateNegotiationConfig', () => {
    test('should return a valid configuration unchanged', () => {
        const config = { formats: ['yaml'], defaultFormat: 'yaml' };
        expect(validateNegotiationConfig(config)).toBe(config);
    });
});
