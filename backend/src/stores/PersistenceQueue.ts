import { errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { sleep, withTimeout } from '../utils/async.js';

export interface PersistenceOptions {
  /** Per-attempt timeout */
  timeoutMs: number;
  /** Total attempts per write, at least 1 */
  retries: number;
  /** Linear backoff step: attempt n waits n * backoffMs before the next try */
  backoffMs: number;
}

/**
 * Fire-and-forget durable writes. Callers never wait on, or see failures of,
 * a write; failures are retried, then logged and dropped.
 */
export class PersistenceQueue {
  private readonly log = createLogger(NAMESPACES.stores.persistence);
  private readonly pending = new Set<Promise<void>>();
  private failed = 0;

  constructor(private readonly options: PersistenceOptions) {}

  enqueue(label: string, write: () => Promise<void>): void {
    const task: Promise<void> = this.attempt(label, write).finally(() => {
      this.pending.delete(task);
    });
    this.pending.add(task);
  }

  /** Resolve once every write enqueued so far (and any enqueued meanwhile) has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Writes given up on since start */
  get failureCount(): number {
    return this.failed;
  }

  private async attempt(label: string, write: () => Promise<void>): Promise<void> {
    const attempts = Math.max(1, this.options.retries);
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await withTimeout(Promise.resolve().then(write), this.options.timeoutMs, label);
        if (attempt > 1) this.log('[PERSIST] %s succeeded on attempt %d', label, attempt);
        return;
      } catch (error) {
        this.log('[PERSIST] %s attempt %d/%d failed: %s', label, attempt, attempts, errorMessage(error));
        if (attempt < attempts) await sleep(this.options.backoffMs * attempt);
      }
    }
    this.failed++;
    this.log('[PERSIST] giving up on %s after %d attempts', label, attempts);
  }
}
