/**
 * Duplex, message-framed text channel between a participant and the room.
 * The engine only ever exchanges whole text frames; framing, ordering and
 * authentication belong to the implementation.
 */
export interface TransportEvents {
    message: [text: string];
    close: [code: number, reason: string];
    error: [error: Error];
}

export interface TransportConnectOptions {
    /** Reject with a TransportError if the channel is not open in time. */
    timeoutMs?: number;
}

export interface Transport {
    /** Resolves once the channel is open. */
    connect(url: string, options?: TransportConnectOptions): Promise<void>;

    /** @throws {TransportError} when the channel is not open or the write fails */
    send(text: string): void;

    /** Closes the channel. Does not emit `close` for an intentional close. */
    close(): void;

    isOpen(): boolean;

    on<K extends keyof TransportEvents>(
        event: K,
        handler: (...args: TransportEvents[K]) => void
    ): () => void;
}
