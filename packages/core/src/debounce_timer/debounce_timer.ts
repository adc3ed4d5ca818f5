import { createLogger } from "../logger/logger";

export type DebounceCallback = () => void | Promise<void>;

/**
 * Single-shot, cancelable delayed callback.
 *
 * arm() always replaces the pending timer, so at most one callback is pending
 * per instance. cancel() after the timer fired is a no-op: the callback has
 * already run (or is running) and is never invoked a second time.
 */
export class DebounceTimer {
  private handle: NodeJS.Timeout | null = null;
  private generation = 0;
  private logger = createLogger("[DebounceTimer] ");

  /**
   * Cancels any pending timer, then schedules `callback` after `delayMs`.
   */
  arm(delayMs: number, callback: DebounceCallback): void {
    this.cancel();

    const armedGeneration = ++this.generation;
    this.handle = setTimeout(() => {
      // A timer cleared between expiry and dispatch must stay silent
      if (armedGeneration !== this.generation) return;
      this.handle = null;
      void this.fire(callback);
    }, Math.max(0, delayMs));
  }

  /**
   * @returns true when a pending timer was cancelled, false when nothing was pending
   */
  cancel(): boolean {
    if (!this.handle) return false;

    clearTimeout(this.handle);
    this.handle = null;
    this.generation++;
    return true;
  }

  isPending(): boolean {
    return this.handle !== null;
  }

  private async fire(callback: DebounceCallback): Promise<void> {
    try {
      await callback();
    } catch (error) {
      this.logger.error(
        `Debounced callback failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
