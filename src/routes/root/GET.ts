import type { Context } from 'hono';
import { negotiated } from '@src/lib/negotiation/index.js';

/**
 * GET / - API root endpoint
 *
 * Describes the service in whichever registered format the caller accepts.
 */
export default function (context: Context) {
    const registry = context.get('mediaTypes');

    return negotiated({
        success: true,
        data: {
            name: 'Parley',
            description: 'Content negotiation for request/response pipelines',
            formats: registry.formats.map(format => format.mediaType),
            default: registry.defaultFormat.mediaType,
            selected: context.get('negotiatedFormat').mediaType,
            endpoints: {
                health: ['/health'],
                formats: ['/formats'],
                messages: ['/messages'],
            },
        },
    });
}
