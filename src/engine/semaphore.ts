import { CancellationError } from "../errors.js";
import { compareRequests } from "../tasks.js";
import type { TaskRequest } from "../types.js";

type Waiter = {
  request: TaskRequest;
  seq: number;
  grant: (release: () => void) => void;
};

/**
 * Counting semaphore whose waiters are served by request priority, then
 * request creation time, then arrival.
 */
export class PrioritySemaphore {
  private permits: number;
  private queue: Waiter[] = [];
  private seq = 0;

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.permits = permits;
  }

  get available(): number {
    return this.permits;
  }

  get waiting(): number {
    return this.queue.length;
  }

  /** Resolves with a release function. Rejects with CancellationError if `signal` aborts first. */
  acquire(request: TaskRequest, signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) return Promise.reject(new CancellationError());

    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve(this.releaser());
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        request,
        seq: this.seq++,
        grant: (release) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(release);
        },
      };
      const onAbort = () => {
        this.queue = this.queue.filter((w) => w !== waiter);
        reject(new CancellationError());
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.enqueue(waiter);
    });
  }

  private enqueue(waiter: Waiter): void {
    const at = this.queue.findIndex(
      (w) => (compareRequests(waiter.request, w.request) || waiter.seq - w.seq) < 0,
    );
    if (at === -1) this.queue.push(waiter);
    else this.queue.splice(at, 0, waiter);
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) next.grant(this.releaser());
      else this.permits++;
    };
  }
}
