/**
 * Environment Variable Loader
 *
 * Small .env file parser used instead of the dotenv package.
 * Loads KEY=VALUE pairs into an environment map (process.env by default).
 *
 * - Comments (#) and empty lines are skipped
 * - An optional leading `export ` is ignored
 * - Single or double quoted values keep inline # characters
 * - Existing variables are kept unless override is set
 */

import { readFileSync, existsSync } from 'fs';
import { logger } from '@src/lib/logger.js';

export interface LoadEnvOptions {
    /** Path to .env file (default: '.env') */
    path?: string;
    /** Log every variable set or skipped (default: false) */
    debug?: boolean;
    /** Override existing env vars (default: false) */
    override?: boolean;
    /** Target environment (default: process.env) */
    env?: NodeJS.ProcessEnv;
}

export interface LoadEnvResult {
    path: string;
    found: boolean;
    loaded: number;
    skipped: number;
}

const SENSITIVE_KEY = /secret|password|token|key/i;

/**
 * Parse a single line from a .env file
 * Returns [key, value] or null if the line carries no assignment
 */
export function parseEnvLine(line: string): [string, string] | null {
    let trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
        return null;
    }

    if (trimmed.startsWith('export ')) {
        trimmed = trimmed.slice('export '.length).trimStart();
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex <= 0) {
        return null;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    const quote = value.charAt(0);
    if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
        value = value.slice(1, -1);
    } else {
        const hashIndex = value.indexOf('#');
        if (hashIndex !== -1) {
            value = value.slice(0, hashIndex).trim();
        }
    }

    return [key, value];
}

/**
 * Load environment variables from a .env file
 */
export function loadEnv(options: LoadEnvOptions = {}): LoadEnvResult {
    const {
        path = '.env',
        debug = false,
        override = false,
        env = process.env,
    } = options;

    const result: LoadEnvResult = { path, found: false, loaded: 0, skipped: 0 };

    if (!existsSync(path)) {
        if (debug) {
            logger.debug('Environment file not found', { path });
        }
        return result;
    }

    result.found = true;

    for (const line of readFileSync(path, 'utf-8').split(/\r?\n/)) {
        const parsed = parseEnvLine(line);
        if (!parsed) continue;

        const [key, value] = parsed;

        if (env[key] !== undefined && !override) {
            result.skipped++;
            if (debug) {
                logger.debug('Skipping environment variable (already set)', { key });
            }
            continue;
        }

        env[key] = value;
        result.loaded++;

        if (debug) {
            logger.debug('Set environment variable', { key, value: SENSITIVE_KEY.test(key) ? '***' : value });
        }
    }

    if (debug) {
        logger.debug('Loaded environment file', { ...result });
    }

    return result;
}
