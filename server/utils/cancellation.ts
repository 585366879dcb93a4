/**
 * Cooperative cancellation.
 *
 * Tasks check the token at their suspension points; nothing is killed from
 * outside. A source can be linked to a parent so one `cancel()` at the top
 * reaches every task started beneath it.
 */

export class CancellationToken {
  private cancelled = false;
  private reason: string | undefined;
  private readonly listeners = new Set<() => void>();

  get isCancellationRequested(): boolean {
    return this.cancelled;
  }

  get cancellationReason(): string | undefined {
    return this.reason;
  }

  /**
   * Register a callback fired once on cancellation. Returns an unsubscribe function.
   */
  onCancelled(listener: () => void): () => void {
    if (this.cancelled) {
      listener();
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** @internal */
  trigger(reason: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.reason = reason;
    for (const listener of [...this.listeners]) {
      listener();
    }
    this.listeners.clear();
  }
}

export class CancellationSource {
  readonly token = new CancellationToken();

  constructor(parent?: CancellationToken) {
    parent?.onCancelled(() => this.cancel(parent.cancellationReason ?? 'parent cancelled'));
  }

  cancel(reason: string = 'cancelled'): void {
    this.token.trigger(reason);
  }
}

/**
 * Suspend for `ms`, waking early when the token is cancelled.
 * Resolves `true` when the full delay elapsed, `false` on cancellation.
 */
export function sleep(ms: number, token?: CancellationToken): Promise<boolean> {
  if (token?.isCancellationRequested) {
    return Promise.resolve(false);
  }
  return new Promise((resolve) => {
    let unsubscribe: () => void = () => undefined;
    const timer = setTimeout(() => {
      unsubscribe();
      resolve(true);
    }, ms);
    if (token) {
      unsubscribe = token.onCancelled(() => {
        clearTimeout(timer);
        resolve(false);
      });
    }
  });
}
