import type { Context } from 'hono';

/**
 * GET /health - Health check endpoint
 *
 * Plain JSON regardless of Accept: this route does not return a negotiated
 * payload, so the response negotiator passes it through unchanged.
 */
export default function (context: Context) {
    return context.json({
        success: true,
        data: {
            status: 'healthy',
            timestamp: new Date().toISOString(),
            uptime: process.uptime()
        }
    });
}
