/**
 * Links a caller's AbortSignal with the client's own timeout into the single
 * signal handed to the transport. Whichever fires first aborts the request;
 * `reason` records which one it was so the client can report it.
 *
 * dispose() must run once the call settles: it clears the timer and detaches
 * the listener from the caller's signal.
 */
export class RequestDeadline {
  private readonly controller: AbortController;
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly parent: AbortSignal | undefined;
  private readonly onParentAbort: () => void;
  private timedOut = false;

  constructor(timeoutMs: number, parent?: AbortSignal) {
    this.controller = new AbortController();
    this.parent = parent;
    this.onParentAbort = () => this.controller.abort(parent?.reason);

    if (parent?.aborted) {
      this.controller.abort(parent.reason);
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }

    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Undefined while the request is still live. */
  get reason(): 'aborted' | 'timeout' | undefined {
    if (!this.controller.signal.aborted) return undefined;
    return this.timedOut ? 'timeout' : 'aborted';
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }
}
