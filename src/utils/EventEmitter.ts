/**
 * A tiny, type-safe event emitter.
 *
 * Event names and argument tuples are checked at compile time, a throwing
 * listener does not prevent the remaining listeners from running, and every
 * subscription returns its own unsubscribe function.
 *
 * @example
 * ```typescript
 * interface VolumeEvents { changed: [count: number] }
 * const emitter = new EventEmitter<VolumeEvents>();
 * const unsub = emitter.on('changed', (count) => console.log(count));
 * emitter.emit('changed', 3);
 * unsub();
 * ```
 */
type Listener<A extends unknown[]> = (...args: A) => void;

export class EventEmitter<T extends { [K in keyof T]: unknown[] }> {
    private listeners: { [K in keyof T]?: Set<Listener<T[K]>> } = {};

    /**
     * Subscribe to an event.
     * @returns Unsubscribe function
     */
    on<K extends keyof T>(event: K, handler: Listener<T[K]>): () => void {
        let set = this.listeners[event];
        if (!set) {
            set = new Set();
            this.listeners[event] = set;
        }
        set.add(handler);
        return () => this.off(event, handler);
    }

    off<K extends keyof T>(event: K, handler: Listener<T[K]>): void {
        this.listeners[event]?.delete(handler);
    }

    emit<K extends keyof T>(event: K, ...args: T[K]): void {
        const handlers = this.listeners[event];
        if (!handlers) return;

        for (const handler of Array.from(handlers)) {
            try {
                handler(...args);
            } catch (err) {
                console.error(`[EventEmitter] Error in listener for ${String(event)}:`, err);
            }
        }
    }

    once<K extends keyof T>(event: K, handler: Listener<T[K]>): () => void {
        const wrapper = (...args: T[K]) => {
            this.off(event, wrapper);
            handler(...args);
        };
        return this.on(event, wrapper);
    }

    listenerCount<K extends keyof T>(event: K): number {
        return this.listeners[event]?.size ?? 0;
    }

    removeAllListeners(): void {
        this.listeners = {};
    }
}
