import 'dotenv/config';
import { logger } from './utils/logger';
import { loadConfig } from './config';
import type { RelayConfig } from './config';
import { buildServer } from './server';

let config: RelayConfig;
try {
    config = loadConfig();
} catch (e) {
    logger.error('Failed to load config', { error: e instanceof Error ? e.message : String(e) });
    process.exit(1);
}

const fastify = await buildServer(config);

const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    try {
        await fastify.close();
        process.exit(0);
    } catch (e) {
        logger.error('Error during shutdown', { error: e instanceof Error ? e.message : String(e) });
        process.exit(1);
    }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

try {
    await fastify.listen({ port: config.port, host: config.host });
    logger.info(`Server starting on port ${config.port}`);
    logger.info(`Upstream API: ${config.upstreamUrl}`);
} catch (e) {
    logger.error('Failed to start server', { error: e instanceof Error ? e.message : String(e) });
    process.exit(1);
}
