/**
 * In-process stand-in for a room server and its sockets.
 *
 * An `InMemoryRelay` plays the server: every frame a participant sends is
 * fanned out to the other attached transports, and `join` frames are answered
 * with the presence messages a real room would send. No network, no timers
 * unless `openDelayMs` asks for one.
 *
 * @example
 * ```typescript
 * const relay = new InMemoryRelay();
 * const alice = new SyncSession({ participantId: 'alice', transport: new InMemoryTransport(relay) });
 * await alice.connect('memory://room-1');
 * ```
 */

import { TransportError } from '../errors';
import { MsgType } from '../protocol';
import { EventEmitter } from '../utils/EventEmitter';
import type { Transport, TransportConnectOptions, TransportEvents } from './Transport';

export interface InMemoryRelayOptions {
    /** Also deliver each frame back to its sender, like a naive broadcast server. */
    reflect?: boolean;
    /** Answer `join` with `user_list` and announce `user_joined`/`user_left`. */
    announcePresence?: boolean;
    /** Delay before a connect resolves (ms). */
    openDelayMs?: number;
}

export interface RelayedFrame {
    from: InMemoryTransport;
    text: string;
}

export class InMemoryRelay {
    /** Every frame received from a participant, in order. */
    readonly frames: RelayedFrame[] = [];
    /** When set, connects are rejected as if the server were down. */
    refuseConnections = false;

    private readonly peers = new Map<InMemoryTransport, string | null>();
    private readonly options: Required<InMemoryRelayOptions>;

    constructor(options: InMemoryRelayOptions = {}) {
        this.options = {
            reflect: options.reflect ?? false,
            announcePresence: options.announcePresence ?? false,
            openDelayMs: options.openDelayMs ?? 0,
        };
    }

    get openDelayMs(): number {
        return this.options.openDelayMs;
    }

    get connectionCount(): number {
        return this.peers.size;
    }

    /** Frames of one message type, parsed. */
    framesOfType(type: string): Record<string, unknown>[] {
        return this.frames
            .map((frame) => parseFrame(frame.text))
            .filter((json): json is Record<string, unknown> => json !== null && json.type === type);
    }

    attach(transport: InMemoryTransport): void {
        this.peers.set(transport, null);
    }

    detach(transport: InMemoryTransport): void {
        const userId = this.peers.get(transport);
        if (!this.peers.delete(transport)) return;
        if (this.options.announcePresence && userId) {
            this.broadcast(JSON.stringify({
                type: MsgType.UserLeft,
                userId,
                timestamp: Date.now(),
                totalUsers: this.peers.size,
            }));
        }
    }

    route(from: InMemoryTransport, text: string): void {
        this.frames.push({ from, text });

        const json = parseFrame(text);
        if (this.options.announcePresence && json?.type === MsgType.Join && typeof json.userId === 'string') {
            this.peers.set(from, json.userId);
            const users = Array.from(this.peers.values()).filter((id): id is string => id !== null);
            from.deliver(JSON.stringify({ type: MsgType.UserList, users, timestamp: Date.now() }));
            this.broadcast(JSON.stringify({
                type: MsgType.UserJoined,
                userId: json.userId,
                timestamp: Date.now(),
                totalUsers: users.length,
            }), from);
            return;
        }
        if (json?.type === MsgType.Ping) {
            return;
        }

        this.broadcast(text, this.options.reflect ? undefined : from);
    }

    /** Server-originated frame to every attached transport except `except`. */
    broadcast(text: string, except?: InMemoryTransport): void {
        for (const peer of Array.from(this.peers.keys())) {
            if (peer !== except) {
                peer.deliver(text);
            }
        }
    }

    /** Simulates the server dropping every connection. */
    dropAll(code: number = 1006, reason: string = 'connection lost'): void {
        for (const peer of Array.from(this.peers.keys())) {
            peer.simulateDrop(code, reason);
        }
    }
}

export class InMemoryTransport extends EventEmitter<TransportEvents> implements Transport {
    /** Last URL passed to `connect()`. */
    lastUrl: string | null = null;
    private open = false;

    constructor(private readonly relay: InMemoryRelay) {
        super();
    }

    isOpen(): boolean {
        return this.open;
    }

    connect(url: string, options: TransportConnectOptions = {}): Promise<void> {
        this.lastUrl = url;
        if (this.relay.refuseConnections) {
            return Promise.reject(new TransportError(`Connection refused: ${url}`));
        }

        const delay = this.relay.openDelayMs;
        if (delay === 0) {
            this.markOpen();
            return Promise.resolve();
        }

        return new Promise((resolve, reject) => {
            const timeoutMs = options.timeoutMs;
            const timeout = timeoutMs !== undefined
                ? setTimeout(() => {
                    clearTimeout(opener);
                    reject(new TransportError(`Connection timed out after ${timeoutMs}ms`));
                }, timeoutMs)
                : null;
            const opener = setTimeout(() => {
                if (timeout) clearTimeout(timeout);
                this.markOpen();
                resolve();
            }, delay);
        });
    }

    send(text: string): void {
        if (!this.open) {
            throw new TransportError('Cannot send: transport is not open');
        }
        this.relay.route(this, text);
    }

    close(): void {
        if (!this.open) return;
        this.open = false;
        this.relay.detach(this);
    }

    /** Relay -> participant delivery. */
    deliver(text: string): void {
        if (this.open) {
            this.emit('message', text);
        }
    }

    /** Server-side close the participant did not ask for. */
    simulateDrop(code: number = 1006, reason: string = 'connection lost'): void {
        if (!this.open) return;
        this.open = false;
        this.relay.detach(this);
        this.emit('close', code, reason);
    }

    simulateError(error: Error): void {
        this.emit('error', error);
    }

    private markOpen(): void {
        this.open = true;
        this.relay.attach(this);
    }
}

function parseFrame(text: string): Record<string, unknown> | null {
    try {
        const json: unknown = JSON.parse(text);
        return typeof json === 'object' && json !== null && !Array.isArray(json)
            ? Object.fromEntries(Object.entries(json))
            : null;
    } catch {
        return null;
    }
}
