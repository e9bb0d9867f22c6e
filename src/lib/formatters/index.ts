/**
 * Formatter Catalog
 *
 * Every wire format this build can serve, keyed by format name.
 * Which of them a running service registers (and which one is the default)
 * is decided by configuration, see createMediaTypeRegistry().
 *
 * Core formatters:
 * - json, yaml
 *
 * Binary formatters (from @parley/formatter-* packages):
 * - cbor, msgpack
 *
 * Usage:
 *   import { getFormatter } from './formatters/index.js';
 *   const formatter = getFormatter('cbor');
 *   if (formatter) {
 *       const encoded = formatter.encode(data);
 *   }
 */

import { type Formatter } from '@parley/common';
import { CborFormatter } from '@parley/formatter-cbor';
import { MsgpackFormatter } from '@parley/formatter-msgpack';
import { JsonFormatter } from './json.js';
import { YamlFormatter } from './yaml.js';

export { type Formatter };
export { JsonFormatter, YamlFormatter, CborFormatter, MsgpackFormatter };

/**
 * Catalog: format name -> Formatter instance
 */
export const formatters: ReadonlyMap<string, Formatter> = new Map<string, Formatter>([
    ['json', JsonFormatter],
    ['yaml', YamlFormatter],
    ['cbor', CborFormatter],
    ['msgpack', MsgpackFormatter],
]);

/**
 * Get a formatter by name
 * Returns null if the format is not part of this build
 */
export function getFormatter(format: string): Formatter | null {
    return formatters.get(format) ?? null;
}

/**
 * Check if a format is available
 */
export function hasFormatter(format: string): boolean {
    return formatters.has(format);
}

/**
 * Get list of all available format names
 */
export function getAvailableFormats(): string[] {
    return Array.from(formatters.keys());
}
