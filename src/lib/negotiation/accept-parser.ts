/**
 * Accept Header Parser
 *
 * Turns a raw Accept preference list into candidates ordered by quality.
 *
 *   "application/cbor;q=0.5, application/json"
 *     -> [{ application/json, 1 }, { application/cbor, 0.5 }]
 *
 * Only the media type token and its q parameter are read. Other parameters
 * are ignored, and tokens are not checked against any registry here.
 */

import { WILDCARD_MEDIA_TYPE } from './media-type-registry.js';

export interface AcceptCandidate {
    /** Token as written in the header, unresolved */
    readonly mediaType: string;
    /** Weight in [0, 1] */
    readonly quality: number;
}

const QUALITY_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parse a q parameter value
 * Anything that is not a plain decimal within [0, 1] counts as 0.
 */
export function parseQuality(raw: string): number {
    const value = raw.trim();
    if (!QUALITY_PATTERN.test(value)) {
        return 0;
    }
    const quality = Number.parseFloat(value);
    return quality >= 0 && quality <= 1 ? quality : 0;
}

function qualityOf(parameters: string): number {
    for (const parameter of parameters.split(';')) {
        const entry = parameter.trim();
        if (entry.startsWith('q=')) {
            return parseQuality(entry.slice(2));
        }
    }
    return 1;
}

/**
 * Parse an Accept header into candidates, highest quality first
 *
 * Equal weights keep their header order (Array.prototype.sort is stable).
 * A missing or blank header means "anything", i.e. a single wildcard at 1.0.
 */
export function parseAccept(header: string | null | undefined): AcceptCandidate[] {
    if (header === undefined || header === null || header.trim() === '') {
        return [{ mediaType: WILDCARD_MEDIA_TYPE, quality: 1 }];
    }

    const candidates: AcceptCandidate[] = [];

    for (const segment of header.split(',')) {
        const entry = segment.trim();
        if (!entry) continue;

        const separator = entry.indexOf(';');
        const mediaType = (separator === -1 ? entry : entry.slice(0, separator)).trim();
        if (!mediaType) continue;

        const parameters = separator === -1 ? '' : entry.slice(separator + 1);
        candidates.push({ mediaType, quality: qualityOf(parameters) });
    }

    return candidates.sort((a, b) => b.quality - a.quality);
}
