/**
 * Inference failures, split by whether a retry can help.
 *
 * - transient: timeouts, connection resets, 408/429/5xx
 * - permanent: unknown model, other 4xx, malformed responses
 */

export class TransientTaggingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientTaggingError";
  }
}

export class PermanentTaggingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PermanentTaggingError";
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}
