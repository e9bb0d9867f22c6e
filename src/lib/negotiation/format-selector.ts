/**
 * Format Selector
 *
 * Picks the response format for one exchange from parsed Accept candidates.
 * Returns null when nothing the caller accepts is registered; that is a
 * normal outcome (406), not an exception.
 */

import { type AcceptCandidate, parseAccept } from './accept-parser.js';
import { type MediaTypeRegistry, type RegisteredFormat, WILDCARD_MEDIA_TYPE } from './media-type-registry.js';

/** The format chosen for a single exchange */
export type NegotiatedFormat = RegisteredFormat;

/**
 * Resolve a single candidate token; the wildcard means the registry default
 */
export function resolveCandidate(mediaType: string, registry: MediaTypeRegistry): RegisteredFormat | null {
    if (mediaType === WILDCARD_MEDIA_TYPE) {
        return registry.defaultFormat;
    }
    return registry.resolve(mediaType);
}

/**
 * Choose the highest weighted resolvable candidate
 *
 * Strictly greater weight is required to replace the current pick, so the
 * first candidate seen wins a tie whatever order the input is in.
 */
export function selectFormat(
    candidates: Iterable<AcceptCandidate>,
    registry: MediaTypeRegistry
): NegotiatedFormat | null {
    let selected: NegotiatedFormat | null = null;
    let selectedQuality = -1;

    for (const candidate of candidates) {
        const format = resolveCandidate(candidate.mediaType, registry);
        if (format && candidate.quality > selectedQuality) {
            selected = format;
            selectedQuality = candidate.quality;
        }
    }

    return selected;
}

/**
 * Parse and select in one step (phase 1 of a negotiated exchange)
 */
export function negotiateAccept(
    header: string | null | undefined,
    registry: MediaTypeRegistry
): NegotiatedFormat | null {
    return selectFormat(parseAccept(header), registry);
}
