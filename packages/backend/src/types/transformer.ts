import type { ChatCompletionRequest, ChatCompletionResponse } from './chat';
import type { MessagesRequest, MessagesResponse } from './messages';

/**
 * Converts between the chat completions dialect spoken by clients and the
 * Messages dialect spoken by the upstream.
 */
export interface Transformer {
  readonly name: string;

  // Client request -> upstream request
  transformRequest(request: ChatCompletionRequest): MessagesRequest;

  // Upstream response -> client response
  transformResponse(response: MessagesResponse): ChatCompletionResponse;

  // Upstream SSE stream -> client SSE stream
  transformStream(stream: ReadableStream<Uint8Array>, model: string): ReadableStream<Uint8Array>;
}
