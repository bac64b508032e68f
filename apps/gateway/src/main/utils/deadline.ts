import { TransportError } from '@main/core/errors';

/**
 * Per-call deadline: an abort signal that fires when `timeoutMs` elapses or the
 * caller's own signal aborts, whichever comes first. Call `dispose()` when done.
 */
export class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private expired = false;

  constructor(
    readonly timeoutMs: number,
    private readonly parent?: AbortSignal
  ) {
    this.timer = setTimeout(() => {
      this.expired = true;
      this.controller.abort(new Error(`timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    if (parent?.aborted) {
      this.controller.abort(parent.reason);
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get timedOut(): boolean {
    return this.expired;
  }

  /**
   * Replace a failure caused by this deadline with one that says so.
   */
  explain(error: unknown): unknown {
    if (this.expired) {
      return new TransportError(`request timed out after ${this.timeoutMs}ms`, { cause: error });
    }
    if (this.parent?.aborted) {
      return new TransportError('request cancelled', { cause: error });
    }
    return error;
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }

  private readonly onParentAbort = (): void => {
    this.controller.abort(this.parent?.reason);
  };
}
