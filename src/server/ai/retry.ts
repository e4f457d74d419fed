import { setTimeout as delay } from "node:timers/promises";

import { errorMessage, type Logger } from "~/lib/log/logger";
import { TransientTaggingError } from "~/server/ai/errors";

export type RetryPolicy = {
  maxRetries: number;
  baseDelayMs: number;
};

export type RetryDeps = {
  logger: Logger;
  sleep?: (ms: number) => Promise<unknown>;
};

// Wait before retry number `attempt` (0-based): base, 2*base, 4*base, ...
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * 2 ** attempt;
}

/**
 * Run `fn` up to `1 + maxRetries` times.
 *
 * Only `TransientTaggingError` is retried. Anything else, or running out of
 * attempts, is logged and resolves to `null`: a failed inference costs the
 * photo its new keywords, never the session.
 */
export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  policy: RetryPolicy,
  deps: RetryDeps,
): Promise<T | null> {
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));
  const attempts = 1 + Math.max(0, policy.maxRetries);

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const last = attempt === attempts - 1;

      if (!(err instanceof TransientTaggingError)) {
        deps.logger.warn(`${label} inference=failed kind=permanent err=${errorMessage(err)}`);
        return null;
      }

      if (last) {
        deps.logger.warn(
          `${label} inference=failed kind=transient attempts=${attempts} err=${err.message}`,
        );
        return null;
      }

      const wait = backoffDelay(policy, attempt);
      deps.logger.info(
        `${label} inference=retry attempt=${attempt + 1}/${attempts} wait_ms=${wait} err=${err.message}`,
      );
      await sleep(wait);
    }
  }

  return null;
}
