import type { FastifyInstance } from 'fastify';
import type { RelayConfig } from '../../config';
import type { ProviderClient } from '../../services/provider-client';
import { registerBearerPassthrough } from '../../middleware/auth';
import { registerChatRoute } from './chat';

export interface InferenceDeps {
    config: RelayConfig;
    client: ProviderClient;
}

export async function registerInferenceRoutes(fastify: FastifyInstance, deps: InferenceDeps) {
    // Protected Routes
    await fastify.register(async (protectedRoutes) => {
        await registerBearerPassthrough(protectedRoutes);
        await registerChatRoute(protectedRoutes, deps);
    });
}
