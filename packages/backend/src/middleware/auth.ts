import type { FastifyInstance, FastifyRequest } from 'fastify';
import bearerAuth from '@fastify/bearer-auth';
import { logger } from '../utils/logger';
import type { RelayErrorBody } from '../types/errors';

declare module 'fastify' {
    interface FastifyRequest {
        /** Bearer credential forwarded upstream as `x-api-key`. */
        upstreamKey: string;
    }
}

/**
 * Guards every route of the given context with a bearer token.
 * The relay holds no keys of its own: any non-empty token is accepted and
 * stored on the request for pass-through.
 */
export async function registerBearerPassthrough(fastify: FastifyInstance): Promise<void> {
    fastify.decorateRequest('upstreamKey', '');

    await fastify.register(bearerAuth, {
        keys: new Set<string>(),
        auth: (key: string, req: FastifyRequest) => {
            if (!key) {
                logger.debug('Rejected empty bearer token');
                return false;
            }
            req.upstreamKey = key;
            return true;
        },
        errorResponse: (err: Error): RelayErrorBody => ({ error: err.message }),
    });
}
