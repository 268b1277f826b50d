import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { logger } from './utils/logger';
import type { RelayConfig } from './config';
import { RelayError } from './types/errors';
import { ProviderClient } from './services/provider-client';
import type { FetchLike } from './services/provider-client';
import { registerHealthRoute } from './routes/health';
import { registerInferenceRoutes } from './routes/inference';

export interface BuildServerOptions {
    /** Replaces the global fetch for upstream calls. */
    fetchImpl?: FetchLike;
}

function statusOf(error: unknown): number {
    if (error instanceof RelayError) return error.status;
    if (typeof error === 'object' && error !== null && 'statusCode' in error) {
        const { statusCode } = error;
        if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 600) {
            return statusCode;
        }
    }
    return 500;
}

/**
 * Builds the relay server without listening, so tests can drive it with inject.
 */
export async function buildServer(
    config: RelayConfig,
    options: BuildServerOptions = {}
): Promise<FastifyInstance> {
    const fastify = Fastify({
        bodyLimit: 50 * 1024 * 1024, // 50MB
    });

    fastify.setErrorHandler((error, request, reply) => {
        const status = statusOf(error);
        if (status >= 500) {
            logger.error(`Request failed: ${request.method} ${request.url}`, {
                status,
                error: error.message,
            });
        } else {
            logger.warn(`Request rejected: ${request.method} ${request.url}`, {
                status,
                error: error.message,
            });
        }
        return reply.code(status).send({ error: error.message });
    });

    fastify.setNotFoundHandler((request, reply) => {
        return reply.code(404).send({ error: `Route ${request.method} ${request.url} not found` });
    });

    fastify.addHook('onResponse', async (request, reply) => {
        logger.debug(`${request.method} ${request.url} ${reply.statusCode}`);
    });

    const client = new ProviderClient({
        baseUrl: config.upstreamUrl,
        timeoutMs: config.upstreamTimeoutMs,
        fetchImpl: options.fetchImpl,
    });

    await registerHealthRoute(fastify, config);
    await registerInferenceRoutes(fastify, { config, client });

    return fastify;
}
