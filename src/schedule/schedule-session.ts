/**
 * Per-request HTTP scope: one AbortController for every call of a fetch and
 * a limiter for the optional detail lookups. `close()` aborts whatever is
 * still in flight.
 */
export class ScheduleSession {
  private readonly controller = new AbortController();
  private readonly queue: Array<() => void> = [];
  private active = 0;

  constructor(
    readonly baseUrl: string,
    private readonly concurrency: number,
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  async runWithLimit<T>(fn: () => Promise<T>): Promise<T> {
    if (this.active < Math.max(1, this.concurrency)) {
      this.active++;
    } else {
      await new Promise<void>((resolve) => this.queue.push(resolve));
    }

    try {
      return await fn();
    } finally {
      // the slot passes straight to the next waiter
      const next = this.queue.shift();
      if (next) next();
      else this.active--;
    }
  }

  close(): void {
    if (this.closed) return;
    this.controller.abort();
  }
}
