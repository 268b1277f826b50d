import type { Logger } from 'winston';
import type { Transformer } from '../../types/transformer';
import type { ChatCompletionRequest, ChatCompletionResponse } from '../../types/chat';
import type { MessagesRequest, MessagesResponse } from '../../types/messages';
import { buildAnthropicRequest } from './request-builder';
import type { BuildRequestOptions } from './request-builder';
import { transformAnthropicResponse } from './response-transformer';
import { transformAnthropicStream } from './stream-transformer';

/**
 * AnthropicTransformer
 *
 * Composition layer that delegates to specialized modules for each transformation:
 * - Request building: Chat completions → Messages
 * - Response transformation: Messages → Chat completion
 * - Stream transformation: Messages events → Chat completion chunks
 */
export class AnthropicTransformer implements Transformer {
  readonly name = 'anthropic';

  constructor(
    private readonly options: BuildRequestOptions = {},
    private readonly log?: Logger
  ) {}

  transformRequest(request: ChatCompletionRequest): MessagesRequest {
    return buildAnthropicRequest(request, this.options);
  }

  transformResponse(response: MessagesResponse): ChatCompletionResponse {
    return transformAnthropicResponse(response);
  }

  transformStream(stream: ReadableStream<Uint8Array>, model: string): ReadableStream<Uint8Array> {
    return transformAnthropicStream(stream, { model, log: this.log });
  }
}

export { buildAnthropicRequest } from './request-builder';
export { transformAnthropicResponse } from './response-transformer';
export { transformAnthropicStream, StreamReframer } from './stream-transformer';
