import type { FastifyInstance } from 'fastify';
import type { RelayConfig } from '../config';

export const SERVICE_NAME = 'OpenAI to Anthropic Proxy';

export async function registerHealthRoute(fastify: FastifyInstance, config: RelayConfig) {
    /**
     * GET /health
     * Liveness check; also reports the loaded mapping tables.
     */
    fastify.get('/health', async () => ({
        status: 'ok',
        service: SERVICE_NAME,
        model_mapping: config.modelMapping,
        max_tokens_mapping: config.maxTokensMapping,
    }));
}
