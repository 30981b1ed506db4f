/**
 * @file ChangeCoalescer.ts
 * @brief Trailing-edge debounce in front of `sendUpdate()`.
 *
 * Every `notify()` restarts the window. When the window expires the flush
 * callback runs once, and the diff it computes covers the union of every
 * edit made during the burst.
 *
 * @example
 * ```typescript
 * const coalescer = new ChangeCoalescer(() => session.sendUpdate(), 2000);
 * brush.onStroke(() => coalescer.notify());
 * ```
 */

export class ChangeCoalescer {
    private timer: ReturnType<typeof setTimeout> | null = null;
    private disposed = false;

    constructor(
        private readonly onFlush: () => void,
        private readonly intervalMs: number
    ) { }

    /** True while an edit is waiting for the window to expire. */
    get pending(): boolean {
        return this.timer !== null;
    }

    /** Records a local mutation and restarts the window. */
    notify(): void {
        if (this.disposed) return;
        if (this.timer) {
            clearTimeout(this.timer);
        }
        this.timer = setTimeout(() => {
            this.timer = null;
            this.onFlush();
        }, this.intervalMs);
    }

    /**
     * Runs the pending flush now instead of waiting for the window.
     * @returns false when nothing was pending
     */
    flush(): boolean {
        if (!this.timer) return false;
        clearTimeout(this.timer);
        this.timer = null;
        this.onFlush();
        return true;
    }

    /** Drops the pending flush, if any. */
    cancel(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    dispose(): void {
        this.cancel();
        this.disposed = true;
    }
}
