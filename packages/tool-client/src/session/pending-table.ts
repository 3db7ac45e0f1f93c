import { RequestCancelledError, TimeoutError } from '../errors';

export type Outcome = { ok: true; value: unknown } | { ok: false; error: Error };

export type AbandonReason = 'timeout' | 'cancelled';

export interface PendingRegistration {
  id: number;
  method: string;
  payload: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Called after the table gave up on an entry because of its deadline or signal. */
  onAbandon?: (id: number, reason: AbandonReason) => void;
}

interface PendingEntry {
  readonly id: number;
  readonly method: string;
  readonly payload: string;
  readonly deadline?: number;
  complete(outcome: Outcome): void;
}

/**
 * Correlation table for in-flight requests of one session.
 *
 * Ids are allocated monotonically starting at 1. Each entry is completed at
 * most once: whichever of response, deadline, abort or `failAll` comes first
 * wins and removes the entry; later outcomes for the same id are rejected.
 */
export class PendingRequestTable {
  private nextId = 1;
  private readonly entries = new Map<number, PendingEntry>();

  get size(): number {
    return this.entries.size;
  }

  allocate(): number {
    return this.nextId++;
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  /** Method and serialized payload of a live entry, for diagnostics. */
  describe(id: number): { method: string; payload: string; deadline?: number } | undefined {
    const entry = this.entries.get(id);
    return entry && { method: entry.method, payload: entry.payload, deadline: entry.deadline };
  }

  register(registration: PendingRegistration): Promise<unknown> {
    const { id, method, payload, timeoutMs, signal, onAbandon } = registration;
    if (this.entries.has(id)) {
      throw new Error(`Correlation id ${id} is already pending`);
    }

    return new Promise<unknown>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined = undefined;

      const onAbort = () => {
        if (this.settle(id, { ok: false, error: new RequestCancelledError(`Request "${method}" (id ${id}) was cancelled`) })) {
          onAbandon?.(id, 'cancelled');
        }
      };

      this.entries.set(id, {
        id,
        method,
        payload,
        deadline: timeoutMs !== undefined ? Date.now() + timeoutMs : undefined,
        complete: outcome => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
          if (outcome.ok) {
            resolve(outcome.value);
          } else {
            reject(outcome.error);
          }
        },
      });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const error = new TimeoutError(`Request "${method}" (id ${id}) timed out after ${timeoutMs}ms`, timeoutMs);
          if (this.settle(id, { ok: false, error })) {
            onAbandon?.(id, 'timeout');
          }
        }, timeoutMs);
      }

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  /** Complete an entry. Returns false when the id is unknown or already completed. */
  settle(id: number, outcome: Outcome): boolean {
    const entry = this.entries.get(id);
    if (!entry) {
      return false;
    }
    this.entries.delete(id);
    entry.complete(outcome);
    return true;
  }

  /** Complete every live entry with `error`; returns how many were failed. */
  failAll(error: Error): number {
    const entries = [...this.entries.values()];
    this.entries.clear();
    for (const entry of entries) {
      entry.complete({ ok: false, error });
    }
    return entries.length;
  }
}
