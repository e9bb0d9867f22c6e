/**
 * Test Helpers
 *
 * Registries and request shortcuts shared by the unit and API tests.
 */

import { toBytes } from '@parley/common';
import { createMediaTypeRegistry, type MediaTypeRegistry } from '@src/lib/negotiation/media-type-registry.js';

/**
 * Registry built the way the service builds it (default: json + cbor, json default)
 */
export function createTestRegistry(formats: string[] = ['json', 'cbor'], defaultFormat = 'json'): MediaTypeRegistry {
    return createMediaTypeRegistry({ formats, defaultFormat });
}

/**
 * Request body as raw bytes, so no Content-Type is implied by the body type
 */
export function jsonBytes(value: unknown): Uint8Array<ArrayBuffer> {
    return toBytes(JSON.stringify(value));
}

/**
 * Copy encoder output into a view a Request body accepts
 */
export function requestBody(bytes: Uint8Array): Uint8Array<ArrayBuffer> {
    return new Uint8Array(bytes);
}

/**
 * Read a whole response body as bytes
 */
export async function bodyBytes(response: Response): Promise<Uint8Array> {
    return new Uint8Array(await response.arrayBuffer());
}
