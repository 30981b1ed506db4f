import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ChangeCoalescer } from '../src/sync/ChangeCoalescer';

describe('ChangeCoalescer', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('flushes once after the window expires', () => {
        const onFlush = vi.fn();
        const coalescer = new ChangeCoalescer(onFlush, 200);

        coalescer.notify();
        expect(coalescer.pending).toBe(true);
        vi.advanceTimersByTime(199);
        expect(onFlush).not.toHaveBeenCalled();
        vi.advanceTimersByTime(1);
        expect(onFlush).toHaveBeenCalledTimes(1);
        expect(coalescer.pending).toBe(false);
    });

    it('coalesces a burst of 10 edits 50ms apart into one flush', () => {
        const onFlush = vi.fn();
        const coalescer = new ChangeCoalescer(onFlush, 200);

        for (let i = 0; i < 10; i++) {
            coalescer.notify();
            vi.advanceTimersByTime(50);
        }
        expect(onFlush).not.toHaveBeenCalled();

        vi.advanceTimersByTime(150);
        expect(onFlush).toHaveBeenCalledTimes(1);

        vi.advanceTimersByTime(1000);
        expect(onFlush).toHaveBeenCalledTimes(1);
    });

    it('reports not pending inside the flush callback', () => {
        let pendingDuringFlush: boolean | null = null;
        const coalescer: ChangeCoalescer = new ChangeCoalescer(() => {
            pendingDuringFlush = coalescer.pending;
        }, 10);

        coalescer.notify();
        vi.advanceTimersByTime(10);
        expect(pendingDuringFlush).toBe(false);
    });

    it('flushes early on demand', () => {
        const onFlush = vi.fn();
        const coalescer = new ChangeCoalescer(onFlush, 200);

        expect(coalescer.flush()).toBe(false);
        coalescer.notify();
        expect(coalescer.flush()).toBe(true);
        expect(onFlush).toHaveBeenCalledTimes(1);

        vi.advanceTimersByTime(500);
        expect(onFlush).toHaveBeenCalledTimes(1);
    });

    it('drops a pending flush on cancel', () => {
        const onFlush = vi.fn();
        const coalescer = new ChangeCoalescer(onFlush, 200);

        coalescer.notify();
        coalescer.cancel();
        vi.advanceTimersByTime(500);
        expect(onFlush).not.toHaveBeenCalled();
        expect(coalescer.pending).toBe(false);
    });

    it('ignores notifications after dispose', () => {
        const onFlush = vi.fn();
        const coalescer = new ChangeCoalescer(onFlush, 200);

        coalescer.dispose();
        coalescer.notify();
        vi.advanceTimersByTime(500);
        expect(onFlush).not.toHaveBeenCalled();
    });
});
