/**
 * Wake sources
 *
 * The loop's only suspension point. A wake source resolves a wait when
 * its timeout elapses or when someone calls wake().
 */

/**
 * Longest delay setTimeout accepts
 */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Abstract source of wake-ups for an idle loop
 */
export interface WakeSource {
  /**
   * Wait for work
   *
   * @param timeoutMs - Milliseconds until the next timer is due, or null for no deadline
   */
  wait(timeoutMs: number | null): Promise<void>;

  /**
   * Resolve the pending wait, if any
   */
  wake(): void;
}

/**
 * setTimeout based wake source
 *
 * A wait without a deadline still holds a timer so the process stays
 * alive while the loop is blocked.
 *
 * @example
 * ```ts
 * const source = new TimeoutWakeSource();
 * const waiting = source.wait(500);
 * source.wake(); // resolves `waiting` early
 * await waiting;
 * ```
 */
export class TimeoutWakeSource implements WakeSource {
  private pending: { timer: NodeJS.Timeout; resolve: () => void } | null =
    null;
  private woken = false;

  constructor(private maxWaitMs: number = MAX_TIMEOUT_MS) {}

  wait(timeoutMs: number | null): Promise<void> {
    // A wake() that arrived while no one was waiting is not lost
    if (this.woken) {
      this.woken = false;
      return Promise.resolve();
    }

    this.release();

    const delay = Math.min(
      Math.max(0, Math.ceil(timeoutMs ?? this.maxWaitMs)),
      this.maxWaitMs,
    );

    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve();
      }, delay);
      this.pending = { timer, resolve };
    });
  }

  wake(): void {
    if (this.pending) {
      this.release();
    } else {
      this.woken = true;
    }
  }

  private release(): void {
    if (!this.pending) {
      return;
    }
    const { timer, resolve } = this.pending;
    clearTimeout(timer);
    this.pending = null;
    resolve();
  }
}
