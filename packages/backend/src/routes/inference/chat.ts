import { Readable } from 'node:stream';
import type { FastifyInstance } from 'fastify';
import { logger, maskSecret } from '../../utils/logger';
import { nextRequestId } from '../../utils/request-counter';
import { RelayError } from '../../types/errors';
import { chatCompletionRequestSchema } from '../../types/chat';
import { messagesResponseSchema } from '../../types/messages';
import { AnthropicTransformer } from '../../transformers/anthropic';
import type { InferenceDeps } from './index';

function describeIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
    return issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

export async function registerChatRoute(fastify: FastifyInstance, deps: InferenceDeps) {
    const { config, client } = deps;

    /**
     * POST /v1/chat/completions
     * OpenAI Compatible Endpoint.
     * Translates the request to the Messages API, forwards it with the caller's
     * credential and translates the answer (or its event stream) back.
     */
    fastify.post('/v1/chat/completions', async (request, reply) => {
        const requestLogger = logger.child({ reqId: nextRequestId() });
        requestLogger.info('Incoming chat completion request', {
            apiKey: maskSecret(request.upstreamKey),
        });

        const parsed = chatCompletionRequestSchema.safeParse(request.body);
        if (!parsed.success) {
            throw new RelayError(`Invalid request body: ${describeIssues(parsed.error.issues)}`, 400);
        }
        const body = parsed.data;

        requestLogger.info('Request summary', {
            model: body.model,
            messages: body.messages.length,
            tools: body.tools?.length ?? 0,
            stream: body.stream ?? false,
        });
        requestLogger.debug('Incoming OpenAI Request', body);

        if (Object.hasOwn(config.modelMapping, body.model)) {
            const mapped = config.modelMapping[body.model];
            if (mapped) {
                requestLogger.info(`Model mapping: ${body.model} -> ${mapped}`);
                body.model = mapped;
            }
        }

        const transformer = new AnthropicTransformer(
            {
                maxTokensMapping: config.maxTokensMapping,
                defaultMaxTokens: config.defaultMaxTokens,
            },
            requestLogger
        );
        const upstreamRequest = transformer.transformRequest(body);
        requestLogger.debug('Outgoing Anthropic Request', upstreamRequest);

        // Tear down the upstream call when the client goes away first
        const controller = new AbortController();
        reply.raw.on('close', () => {
            if (!reply.raw.writableFinished) {
                requestLogger.debug('Client disconnected, aborting upstream request');
                controller.abort();
            }
        });

        const upstream = await client.createMessage(upstreamRequest, {
            apiKey: request.upstreamKey,
            signal: controller.signal,
            requestLogger,
        });

        if (body.stream) {
            if (!upstream.body) {
                throw new RelayError('Upstream returned an empty stream', 502);
            }
            const clientStream = transformer.transformStream(upstream.body, body.model);

            // Standard SSE headers to prevent buffering and timeouts
            reply.header('Content-Type', 'text/event-stream');
            reply.header('Cache-Control', 'no-cache');
            reply.header('Connection', 'keep-alive');
            return reply.send(Readable.fromWeb(clientStream));
        }

        let raw: unknown;
        try {
            raw = await upstream.json();
        } catch (e) {
            requestLogger.error('Failed to decode upstream response', {
                error: e instanceof Error ? e.message : String(e),
            });
            throw new RelayError('Failed to decode upstream response', 502);
        }

        const decoded = messagesResponseSchema.safeParse(raw);
        if (!decoded.success) {
            requestLogger.error('Unexpected upstream response shape', {
                issues: describeIssues(decoded.error.issues),
            });
            throw new RelayError('Unexpected upstream response shape', 502);
        }

        const responseBody = transformer.transformResponse(decoded.data);
        requestLogger.debug('Outgoing OpenAI Response', responseBody);
        return reply.send(responseBody);
    });
}
