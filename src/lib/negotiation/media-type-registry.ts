/**
 * Media Type Registry
 *
 * The set of media types a service speaks and the one it falls back to.
 * Built once at startup from configuration and never mutated afterwards, so it
 * is shared by every exchange without synchronization.
 *
 * Tokens are matched exactly (after trimming): no wildcards, no parameters,
 * no case folding. A format's canonical token is its formatter's contentType;
 * aliases resolve to the same format.
 */

import { type Formatter } from '@parley/common';
import { getFormatter } from '@src/lib/formatters/index.js';
import { validateNegotiationConfig, type NegotiationConfig } from '@src/lib/config.js';

/** Universal wildcard accepted in Accept headers, never registrable */
export const WILDCARD_MEDIA_TYPE = '*/*';

export interface NamedFormatter {
    name: string;
    formatter: Formatter;
}

export interface RegisteredFormat {
    readonly name: string;
    /** Canonical token, sent as Content-Type of encoded responses */
    readonly mediaType: string;
    /** Every token resolving to this format, canonical first */
    readonly tokens: readonly string[];
    readonly formatter: Formatter;
}

export interface MediaTypeRegistryOptions {
    formats: readonly NamedFormatter[];
    defaultFormat: string;
}

export class MediaTypeRegistry {
    readonly formats: readonly RegisteredFormat[];
    readonly defaultFormat: RegisteredFormat;

    private readonly byToken: ReadonlyMap<string, RegisteredFormat>;
    private readonly byName: ReadonlyMap<string, RegisteredFormat>;

    constructor(options: MediaTypeRegistryOptions) {
        if (options.formats.length === 0) {
            throw Error('Fatal: media type registry needs at least one format');
        }

        const byToken = new Map<string, RegisteredFormat>();
        const byName = new Map<string, RegisteredFormat>();

        for (const { name, formatter } of options.formats) {
            if (byName.has(name)) {
                throw Error(`Fatal: format "${name}" registered twice`);
            }

            const entry: RegisteredFormat = Object.freeze({
                name,
                mediaType: formatter.contentType.trim(),
                tokens: Object.freeze([formatter.contentType, ...(formatter.aliases ?? [])].map(t => t.trim())),
                formatter,
            });

            for (const token of entry.tokens) {
                if (!token || token === WILDCARD_MEDIA_TYPE) {
                    throw Error(`Fatal: format "${name}" declares an invalid media type "${token}"`);
                }
                const owner = byToken.get(token);
                if (owner) {
                    throw Error(`Fatal: media type "${token}" claimed by both "${owner.name}" and "${name}"`);
                }
                byToken.set(token, entry);
            }

            byName.set(name, entry);
        }

        const defaultFormat = byName.get(options.defaultFormat);
        if (!defaultFormat) {
            throw Error(`Fatal: default format "${options.defaultFormat}" is not registered`);
        }

        this.formats = Object.freeze(Array.from(byName.values()));
        this.defaultFormat = defaultFormat;
        this.byToken = byToken;
        this.byName = byName;

        Object.freeze(this);
    }

    /**
     * Exact lookup of a media type token
     */
    resolve(token: string): RegisteredFormat | null {
        return this.byToken.get(token.trim()) ?? null;
    }

    has(token: string): boolean {
        return this.resolve(token) !== null;
    }

    /**
     * Lookup by format name (json, cbor, ...)
     */
    get(name: string): RegisteredFormat | null {
        return this.byName.get(name) ?? null;
    }

    /**
     * All registered tokens, aliases included
     */
    tokens(): string[] {
        return Array.from(this.byToken.keys());
    }
}

/**
 * Build the registry from validated configuration and the formatter catalog
 */
export function createMediaTypeRegistry(config: NegotiationConfig): MediaTypeRegistry {
    validateNegotiationConfig(config);

    const formats = config.formats.map((name): NamedFormatter => {
        const formatter = getFormatter(name);
        if (!formatter) {
            throw Error(`Fatal: format "${name}" is not available`);
        }
        return { name, formatter };
    });

    return new MediaTypeRegistry({ formats, defaultFormat: config.defaultFormat });
}
