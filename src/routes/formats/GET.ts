import type { Context } from 'hono';
import { negotiated } from '@src/lib/negotiation/index.js';

/**
 * GET /formats - Registered wire formats
 *
 * Lists every format with the tokens that select it; the default is flagged.
 */
export default function (context: Context) {
    const registry = context.get('mediaTypes');

    return negotiated({
        success: true,
        data: registry.formats.map(format => ({
            name: format.name,
            mediaType: format.mediaType,
            tokens: [...format.tokens],
            default: format === registry.defaultFormat,
        })),
    });
}
