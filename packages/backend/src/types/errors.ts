import { z } from 'zod';

export const RelayErrorSchema = z.object({
  error: z.string(),
});

export type RelayErrorBody = z.infer<typeof RelayErrorSchema>;

/**
 * Error carrying the HTTP status it should be answered with.
 * Serializes to the relay's `{ "error": message }` envelope.
 */
export class RelayError extends Error {
  constructor(
    message: string,
    public status: number
  ) {
    super(message);
    this.name = 'RelayError';
  }

  toJSON(): RelayErrorBody {
    return { error: this.message };
  }
}

/**
 * Raised for a non-2xx upstream answer; the raw upstream body becomes the message.
 */
export class UpstreamError extends RelayError {
  constructor(status: number, body: string) {
    super(body, status);
    this.name = 'UpstreamError';
  }
}
