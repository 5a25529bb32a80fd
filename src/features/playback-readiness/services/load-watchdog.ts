import { MAX_TIMER_DELAY_MS } from '@/lib/config';
import { createLogger } from '@/lib/logger';

const logger = createLogger('LoadWatchdog');

/**
 * Single-shot deadline timer.
 *
 * `onTimeout` fires at most once per `start()`, and never after `cancel()`
 * or a later `start()` has returned. Timeouts beyond the timer limit are
 * capped to it.
 */
export class LoadWatchdog {
  private timeoutId: ReturnType<typeof setTimeout> | null = null;
  // Bumped on every start/cancel so a timer callback already queued by the
  // runtime can tell it has been superseded.
  private generation = 0;

  get armed(): boolean {
    return this.timeoutId !== null;
  }

  start(timeoutMs: number, onTimeout: () => void): void {
    this.cancel();

    const delay = Math.min(timeoutMs, MAX_TIMER_DELAY_MS);
    const generation = ++this.generation;
    this.timeoutId = setTimeout(() => {
      if (generation !== this.generation) return;
      this.timeoutId = null;
      this.generation++;
      logger.debug(`Deadline of ${timeoutMs}ms elapsed`);
      onTimeout();
    }, delay);
  }

  cancel(): void {
    this.generation++;
    if (this.timeoutId !== null) {
      clearTimeout(this.timeoutId);
      this.timeoutId = null;
    }
  }
}
