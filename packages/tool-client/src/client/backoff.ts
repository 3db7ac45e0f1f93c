import { z } from 'zod';
import { RequestCancelledError } from '../errors';

export const BackoffOptionsSchema = z.object({
  /** Total attempts, including the first. */
  maxAttempts: z.number().int().min(1).default(3),
  initialDelayMs: z.number().min(0).default(250),
  multiplier: z.number().min(1).default(2),
  maxDelayMs: z.number().min(0).default(10_000),
  /** Randomize each delay into [delay / 2, delay]. */
  jitter: z.boolean().default(true),
});

export type BackoffOptions = z.input<typeof BackoffOptionsSchema>;
export type ResolvedBackoffOptions = z.output<typeof BackoffOptionsSchema>;

/**
 * Exponential backoff policy: 250ms, 500ms, 1s, ... capped at `maxDelayMs`.
 * Attempts are 1-based; `delayFor(n)` is the pause before attempt n + 1.
 */
export class BackoffPolicy {
  readonly options: ResolvedBackoffOptions;

  constructor(
    options: BackoffOptions = {},
    private readonly random: () => number = Math.random
  ) {
    this.options = BackoffOptionsSchema.parse(options);
  }

  delayFor(attempt: number): number {
    const { initialDelayMs, multiplier, maxDelayMs, jitter } = this.options;
    const exponent = Math.max(0, attempt - 1);
    const base = Math.min(maxDelayMs, initialDelayMs * Math.pow(multiplier, exponent));
    if (!jitter) {
      return Math.round(base);
    }
    return Math.round(base / 2 + (this.random() * base) / 2);
  }

  canRetry(attempt: number): boolean {
    return attempt < this.options.maxAttempts;
  }

  /** Sleep for the delay that precedes attempt `attempt + 1`. */
  wait(attempt: number, signal?: AbortSignal): Promise<void> {
    return this.pause(this.delayFor(attempt), signal);
  }

  pause(delayMs: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new RequestCancelledError('Backoff wait was cancelled'));
    }
    if (delayMs <= 0) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new RequestCancelledError('Backoff wait was cancelled'));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, delayMs);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
