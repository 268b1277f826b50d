import { createParser } from 'eventsource-parser';
import type { EventSourceMessage, EventSourceParser } from 'eventsource-parser';
import { encode } from 'eventsource-encoder';
import type { Logger } from 'winston';
import { logger } from '../../utils/logger';
import type { ChatChunkDelta, ChatCompletionChunk, ChatUsage } from '../../types/chat';
import { messagesStreamEventSchema } from '../../types/messages';
import type { MessagesStreamEvent, MessagesUsage } from '../../types/messages';
import { mapStopReason, toChatUsage } from './usage-mapper';

export interface StreamTransformOptions {
  /** Model name reported on every chunk. */
  model: string;
  log?: Logger;
}

const USAGE_KEYS: Array<keyof MessagesUsage> = [
  'input_tokens',
  'output_tokens',
  'cache_creation_input_tokens',
  'cache_read_input_tokens',
];

export const DONE_FRAME = encode({ data: '[DONE]' });

/**
 * State machine turning Messages stream events into chat completion chunks,
 * one event at a time.
 */
export class StreamReframer {
  private messageId = '';
  private usage: MessagesUsage | undefined;
  private toolIndex = 0;
  private sawToolUse = false;

  constructor(private readonly model: string) {}

  next(event: MessagesStreamEvent): ChatCompletionChunk | null {
    switch (event.type) {
      case 'message_start':
        this.messageId = event.message.id;
        if (event.message.usage) {
          this.usage = event.message.usage;
        }
        return this.chunk({ role: 'assistant', content: '' });

      case 'content_block_start': {
        const block = event.content_block;
        if (block.type !== 'tool_use') return null;
        this.sawToolUse = true;
        return this.chunk({
          tool_calls: [
            {
              index: this.toolIndex,
              id: block.id ?? '',
              type: 'function',
              function: { name: block.name ?? '', arguments: '' },
            },
          ],
        });
      }

      case 'content_block_delta': {
        const delta = event.delta;
        if (delta.type === 'text_delta' && delta.text !== undefined) {
          return this.chunk({ content: delta.text });
        }
        if (delta.type === 'input_json_delta' && delta.partial_json !== undefined) {
          return this.chunk({
            tool_calls: [{ index: this.toolIndex, function: { arguments: delta.partial_json } }],
          });
        }
        return null;
      }

      case 'content_block_stop':
        this.toolIndex += 1;
        return null;

      case 'message_delta': {
        if (event.usage) {
          this.mergeUsage(event.usage);
        }
        const stopReason = event.delta.stop_reason;
        if (!stopReason) return null;
        const finishReason = this.sawToolUse ? 'tool_calls' : mapStopReason(stopReason);
        return this.chunk({}, finishReason, this.usage ? toChatUsage(this.usage) : undefined);
      }

      case 'message_stop':
      case 'ping':
      case 'error':
        return null;
    }
  }

  private mergeUsage(update: MessagesUsage): void {
    const merged: MessagesUsage = { ...this.usage };
    for (const key of USAGE_KEYS) {
      const value = update[key];
      if (value !== null && value !== undefined) {
        merged[key] = value;
      }
    }
    this.usage = merged;
  }

  private chunk(
    delta: ChatChunkDelta,
    finishReason: string | null = null,
    usage?: ChatUsage
  ): ChatCompletionChunk {
    const chunk: ChatCompletionChunk = {
      id: this.messageId,
      object: 'chat.completion.chunk',
      created: Math.floor(Date.now() / 1000),
      model: this.model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    };
    if (usage) {
      chunk.usage = usage;
    }
    return chunk;
  }
}

/**
 * Wraps the upstream body so that a failed read ends the stream instead of
 * erroring it. Reads happen only when downstream asks for data.
 */
function endOnReadError(stream: ReadableStream<Uint8Array>, log: Logger): ReadableStream<Uint8Array> {
  const reader = stream.getReader();
  let finished = false;

  return new ReadableStream<Uint8Array>(
    {
      async pull(controller) {
        let result: Awaited<ReturnType<typeof reader.read>>;
        try {
          result = await reader.read();
        } catch (e) {
          if (!finished) {
            finished = true;
            log.error('Upstream stream read failed', {
              error: e instanceof Error ? e.message : String(e),
            });
            controller.close();
          }
          return;
        }
        if (finished) return;
        if (result.done) {
          finished = true;
          controller.close();
        } else {
          controller.enqueue(result.value);
        }
      },

      cancel(reason) {
        finished = true;
        return reader.cancel(reason);
      },
    },
    { highWaterMark: 0 }
  );
}

/**
 * Transforms a Messages API stream (Server-Sent Events) into a chat completion
 * SSE stream terminated by `data: [DONE]`.
 *
 * Upstream is read only as fast as the returned stream is consumed.
 * Undecodable events are logged and skipped. A failed upstream read is logged
 * and still ends the stream with the terminator. Cancelling the returned stream
 * cancels the upstream body.
 */
export function transformAnthropicStream(
  stream: ReadableStream<Uint8Array>,
  options: StreamTransformOptions
): ReadableStream<Uint8Array> {
  const log = options.log ?? logger;
  const decoder = new TextDecoder();
  const encoder = new TextEncoder();
  const reframer = new StreamReframer(options.model);
  let parser: EventSourceParser | undefined;
  let eventCount = 0;

  const transformer = new TransformStream<Uint8Array, Uint8Array>({
    start(controller) {
      parser = createParser({
        onEvent: (message: EventSourceMessage) => {
          eventCount++;
          const data = message.data.trim();
          if (!data || data === '[DONE]') return;

          let raw: unknown;
          try {
            raw = JSON.parse(data);
          } catch (e) {
            log.warn('Failed to parse stream event', {
              error: e instanceof Error ? e.message : String(e),
              data,
            });
            return;
          }

          const parsed = messagesStreamEventSchema.safeParse(raw);
          if (!parsed.success) {
            log.debug('Skipping unrecognized stream event', { data });
            return;
          }
          if (parsed.data.type === 'error') {
            log.warn('Upstream reported a stream error', { error: parsed.data.error });
          }

          const chunk = reframer.next(parsed.data);
          if (chunk) {
            controller.enqueue(encoder.encode(encode({ data: JSON.stringify(chunk) })));
          }
        },
      });
    },

    transform(chunk) {
      parser?.feed(decoder.decode(chunk, { stream: true }));
    },

    flush(controller) {
      parser?.feed(decoder.decode());
      parser?.reset({ consume: true });
      log.debug(`Stream finished (total events: ${eventCount})`);
      controller.enqueue(encoder.encode(DONE_FRAME));
    },
  });

  return endOnReadError(stream, log).pipeThrough(transformer);
}
