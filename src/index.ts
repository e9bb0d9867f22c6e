/**
 * Parley - Main Entry Point
 *
 * Orchestrates server startup:
 * - Environment loading and validation
 * - Media type registry construction
 * - HTTP server startup
 * - Graceful shutdown coordination
 */

// Import process environment as early as possible
import { loadEnv } from '@src/lib/env/load-env.js';

// Load environment-specific .env file
const envFile = process.env.NODE_ENV ? `.env.${process.env.NODE_ENV}` : '.env';
loadEnv({ path: envFile, debug: true });

import { logger, describeError } from '@src/lib/logger.js';
import { loadConfig } from '@src/lib/config.js';
import { createMediaTypeRegistry } from '@src/lib/negotiation/index.js';
import { startHttpServer } from '@src/servers/http.js';

// Invalid configuration throws here, before anything listens
const config = loadConfig();
const registry = createMediaTypeRegistry(config.negotiation);

logger.info('Media types registered', {
    formats: registry.formats.map(format => format.name),
    default: registry.defaultFormat.name,
    tokens: registry.tokens(),
});

// Check for --no-startup flag
if (process.argv.includes('--no-startup')) {
    logger.info('Startup test successful - configuration and registry are valid');
    process.exit(0);
}

const httpServer = startHttpServer(registry, config.port, config.host);

// Graceful shutdown
const gracefulShutdown = async () => {
    logger.info('Shutting down server gracefully');

    try {
        await httpServer.stop();
        process.exit(0);
    } catch (error) {
        logger.error('Shutdown failed', describeError(error));
        process.exit(1);
    }
};

process.on('SIGINT', () => void gracefulShutdown());
process.on('SIGTERM', () => void gracefulShutdown());
