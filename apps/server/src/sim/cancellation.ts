// apps/server/src/sim/cancellation.ts
//
// Cancellation scope tree on top of AbortController.
//
// Contract:
// - cancelling a scope cancels every scope derived from it
// - cancelling a child leaves its parent untouched
// - cancel() is idempotent; only the first cause is kept
// - a root scope may carry a deadline, which cancels it with cause "deadline"

export type CancelCause = "stopped" | "superseded" | "deadline" | "shutdown";

type CancelListener = (cause: CancelCause) => void;

export class CancellationScope {
  private readonly controller = new AbortController();
  private readonly listeners: CancelListener[] = [];
  private timer: NodeJS.Timeout | null = null;
  private _cause: CancelCause | null = null;

  private constructor() {}

  static root(deadlineMs?: number): CancellationScope {
    const scope = new CancellationScope();
    if (deadlineMs !== undefined) {
      scope.timer = setTimeout(() => scope.cancel("deadline"), deadlineMs);
      // a pending deadline must not keep the process alive
      scope.timer.unref();
    }
    return scope;
  }

  child(): CancellationScope {
    const c = new CancellationScope();
    if (this._cause) c.cancel(this._cause);
    else this.onCancel((cause) => c.cancel(cause));
    return c;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this._cause !== null;
  }

  get cause(): CancelCause | null {
    return this._cause;
  }

  /** Returns false when the scope was already cancelled. */
  cancel(cause: CancelCause): boolean {
    if (this._cause) return false;
    this._cause = cause;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller.abort(cause);
    for (const l of this.listeners.splice(0)) l(cause);
    return true;
  }

  onCancel(listener: CancelListener): void {
    if (this._cause) listener(this._cause);
    else this.listeners.push(listener);
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const done = (): void => {
      clearTimeout(t);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const t = setTimeout(done, Math.max(0, ms));
    signal.addEventListener("abort", done, { once: true });
  });
}
