/**
 * Service configuration
 *
 * Read once at startup from the environment (after .env loading):
 * - PARLEY_FORMATS         comma separated format names to register (default: json,cbor)
 * - PARLEY_DEFAULT_FORMAT  format used for missing Content-Type and for Accept: *\/* (default: json)
 * - PORT / HOST            HTTP listener (default: 9001 on 0.0.0.0)
 *
 * Invalid configuration is fatal; nothing here is re-read per request.
 */

import { hasFormatter, getAvailableFormats } from '@src/lib/formatters/index.js';

export interface NegotiationConfig {
    /** Registered format names, in preference order for listings */
    formats: string[];
    /** Must be one of formats */
    defaultFormat: string;
}

export interface ParleyConfig {
    negotiation: NegotiationConfig;
    port: number;
    host: string;
}

const DEFAULT_FORMATS = 'json,cbor';
const DEFAULT_FORMAT = 'json';
const DEFAULT_PORT = 9001;
const DEFAULT_HOST = '0.0.0.0';

function parseFormatList(raw: string): string[] {
    const names: string[] = [];
    for (const part of raw.split(',')) {
        const name = part.trim().toLowerCase();
        if (name && !names.includes(name)) {
            names.push(name);
        }
    }
    return names;
}

function parsePort(raw: string | undefined): number {
    if (raw === undefined || raw.trim() === '') {
        return DEFAULT_PORT;
    }
    const port = Number(raw);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw Error(`Fatal: PORT must be an integer between 0 and 65535, got "${raw}"`);
    }
    return port;
}

/**
 * Validate the negotiation part of the configuration
 */
export function validateNegotiationConfig(config: NegotiationConfig): NegotiationConfig {
    if (config.formats.length === 0) {
        throw Error('Fatal: at least one format must be registered');
    }

    const unknown = config.formats.filter(name => !hasFormatter(name));
    if (unknown.length > 0) {
        throw Error(
            `Fatal: unknown format(s) ${unknown.join(', ')}; available: ${getAvailableFormats().join(', ')}`
        );
    }

    if (!config.formats.includes(config.defaultFormat)) {
        throw Error(
            `Fatal: default format "${config.defaultFormat}" is not registered (registered: ${config.formats.join(', ')})`
        );
    }

    return config;
}

/**
 * Build the service configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ParleyConfig {
    const negotiation = validateNegotiationConfig({
        formats: parseFormatList(env.PARLEY_FORMATS ?? DEFAULT_FORMATS),
        defaultFormat: (env.PARLEY_DEFAULT_FORMAT ?? DEFAULT_FORMAT).trim().toLowerCase(),
    });

    return {
        negotiation,
        port: parsePort(env.PORT),
        host: env.HOST?.trim() || DEFAULT_HOST,
    };
}
