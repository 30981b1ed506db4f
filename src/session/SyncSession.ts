/**
 * @file SyncSession.ts
 * @brief Connection lifecycle and message dispatch for one participant.
 *
 * State transitions:
 *   disconnected --> connecting --> connected --> disconnected
 *
 * Everything that touches the volume happens on one logical sequence: local
 * edits come in through `notifyLocalEdit()`, remote payloads through the
 * transport's `message` event, and `applyingRemote` keeps the two from feeding
 * each other.
 *
 * @example
 * ```typescript
 * const session = new SyncSession({
 *     participantId: 'reader-2',
 *     volume: VolumeBuffer.create({ dimensions: [64, 256, 256] }),
 * });
 * await session.connect('wss://rooms.example.org/ws/sessions/7', { token });
 * brush.onStroke(() => session.notifyLocalEdit());
 * ```
 */

import { resolveConfig, type EngineConfig } from '../config';
import { DiffEngine, type FullResyncReason } from '../diff/DiffEngine';
import { ConfigurationError, ProtocolError, SegSyncError, TransportError, toError } from '../errors';
import {
    MsgType,
    decodeDelta,
    decodeFullSnapshot,
    encodeDelta,
    encodeFullSnapshot,
    encodeJoin,
    encodePing,
    serializeMessage,
    type OutgoingMessage,
} from '../protocol';
import { ChangeCoalescer } from '../sync/ChangeCoalescer';
import { Reconciler, type ReconcileState } from '../sync/Reconciler';
import type { Transport } from '../transport/Transport';
import { WebSocketTransport, redact } from '../transport/WebSocketTransport';
import type { ApplyReport, ConnectionStatus, SessionCredentials, SessionStats } from '../types';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger } from '../utils/Logger';
import { parseMessage, truncate, type InboundMessage } from '../validation';
import { VolumeBuffer } from '../volume/VolumeBuffer';

export interface SyncSessionOptions {
    /** Already-resolved identity of the local participant. */
    participantId: string;
    /** Defaults to a `WebSocketTransport`. */
    transport?: Transport;
    volume?: VolumeBuffer | null;
    config?: Partial<EngineConfig>;
    logger?: Logger;
}

export type PayloadType = MsgType.Delta | MsgType.FullSnapshot;

export interface SentInfo {
    type: PayloadType;
    /** Changed voxels for a delta, every voxel for a snapshot. */
    voxels: number;
    reason?: FullResyncReason | 'explicit' | 'peer-joined';
}

export interface RemoteAppliedInfo {
    type: PayloadType;
    from: string;
    report: ApplyReport;
}

export interface SyncSessionEvents {
    status: [status: ConnectionStatus];
    connected: [];
    /** `null` for an intentional disconnect. */
    disconnected: [error: TransportError | null];
    sent: [info: SentInfo];
    remoteApplied: [info: RemoteAppliedInfo];
    /** A full snapshot arrived while no volume was attached. */
    volumeAttached: [volume: VolumeBuffer];
    peers: [connectedUsers: number];
    serverError: [message: string];
    sessionEnded: [];
    messageDropped: [error: SegSyncError, raw: string];
}

export class SyncSession extends EventEmitter<SyncSessionEvents> {
    readonly participantId: string;
    readonly config: EngineConfig;

    private readonly transport: Transport;
    private readonly logger: Logger;
    private readonly diffEngine: DiffEngine;
    private readonly coalescer: ChangeCoalescer;
    private readonly reconciler: Reconciler;
    private readonly state: ReconcileState;

    private volume: VolumeBuffer | null;
    private status: ConnectionStatus = 'disconnected';
    private sentCount = 0;
    private receivedCount = 0;
    private connectedUsers = 0;
    private syncEnabled = true;
    private lastInboundAt: number | null = null;
    /** Local edits that could not be sent yet; replayed once connected. */
    private unsentLocalEdits = false;

    private endpoint: string | null = null;
    private credentials: SessionCredentials = {};
    private connectPromise: Promise<void> | null = null;
    private connectGeneration = 0;
    private intentionalClose = false;
    private keepaliveTimer: ReturnType<typeof setInterval> | null = null;
    private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
    private reconnectAttempts = 0;
    private unsubscribers: (() => void)[] = [];

    constructor(options: SyncSessionOptions) {
        super();
        // Validate config at the gates
        if (!options.participantId) {
            throw new ConfigurationError('participantId is required');
        }

        this.participantId = options.participantId;
        this.config = resolveConfig(options.config);
        this.logger = options.logger ?? new Logger('SegSync:Session', this.config.debug);
        this.volume = options.volume ?? null;
        this.transport = options.transport ?? new WebSocketTransport({ logger: this.logger.child('WebSocket') });

        this.diffEngine = new DiffEngine({
            fullResyncRatio: this.config.fullResyncRatio,
            logger: this.logger.child('Diff'),
        });
        this.coalescer = new ChangeCoalescer(() => this.sendUpdate(), this.config.debounceIntervalMs);

        const coalescer = this.coalescer;
        this.state = {
            previousSnapshot: null,
            applyingRemote: false,
            get pendingLocalMutation() {
                return coalescer.pending;
            },
        };
        this.reconciler = new Reconciler(this.state, this.logger.child('Reconciler'));

        this.wireTransport();
    }

    // ---------------------------------------------------------------------------
    // Public API
    // ---------------------------------------------------------------------------

    getStatus(): ConnectionStatus {
        return this.status;
    }

    getVolume(): VolumeBuffer | null {
        return this.volume;
    }

    /** The diffing baseline, or null until the first sync of this connection. */
    getBaseline(): VolumeBuffer | null {
        return this.state.previousSnapshot;
    }

    isApplyingRemote(): boolean {
        return this.state.applyingRemote;
    }

    isSyncEnabled(): boolean {
        return this.syncEnabled;
    }

    getStats(): SessionStats {
        return {
            status: this.status,
            sentCount: this.sentCount,
            receivedCount: this.receivedCount,
            connectedUsers: this.connectedUsers,
            hasBaseline: this.state.previousSnapshot !== null,
            pendingLocalMutation: this.coalescer.pending,
            lastInboundAt: this.lastInboundAt,
        };
    }

    /**
     * Opens the channel, sends `join` and starts the keepalive.
     *
     * @throws {TransportError} when the channel cannot be opened within
     * `connectTimeoutMs`, or when `disconnect()` aborts the attempt
     */
    async connect(endpoint: string, credentials: SessionCredentials = {}): Promise<void> {
        if (this.status === 'connected') return;
        if (this.status === 'connecting' && this.connectPromise) {
            return this.connectPromise;
        }

        this.endpoint = endpoint;
        this.credentials = credentials;
        this.intentionalClose = false;
        this.reconnectAttempts = 0;
        this.clearReconnectTimer();

        return this.openConnection();
    }

    /**
     * Closes the channel from any state. Pending local edits are flushed
     * first while still connected. Safe to call repeatedly.
     */
    disconnect(): void {
        this.intentionalClose = true;
        this.clearReconnectTimer();

        if (this.status === 'connected' && this.coalescer.pending) {
            this.coalescer.flush();
        }

        const wasActive = this.status !== 'disconnected';
        this.transport.close();
        this.unsentLocalEdits = false;
        this.teardown();
        if (wasActive) {
            this.logger.info('Disconnected');
            this.emit('disconnected', null);
        }
    }

    /** Disconnects and drops every listener, on the session and on the transport. */
    destroy(): void {
        this.disconnect();
        this.coalescer.dispose();
        this.unsubscribers.forEach((unsub) => unsub());
        this.unsubscribers = [];
        this.removeAllListeners();
    }

    /**
     * Attaches the volume to edit, or detaches with `null`. The baseline is
     * dropped either way, so the next send is a full snapshot.
     */
    setVolume(volume: VolumeBuffer | null): void {
        this.coalescer.cancel();
        this.volume = volume;
        this.state.previousSnapshot = null;
        this.unsentLocalEdits = false;
    }

    setSyncEnabled(enabled: boolean): void {
        this.syncEnabled = enabled;
        if (!enabled) {
            this.coalescer.cancel();
        }
    }

    /**
     * Entry point for the host's edit tools. Restarts the debounce window.
     * @returns false when the edit does not qualify (no volume, sync off, or
     * raised by a remote apply)
     */
    notifyLocalEdit(): boolean {
        if (!this.volume || !this.syncEnabled || this.state.applyingRemote) {
            return false;
        }
        this.coalescer.notify();
        return true;
    }

    /** Sends pending edits now instead of waiting for the window. */
    flush(): boolean {
        return this.coalescer.flush();
    }

    /**
     * Diffs the volume against the baseline and sends a delta or a full
     * snapshot. The baseline only advances after a successful send.
     */
    sendUpdate(): boolean {
        const volume = this.volume;
        if (!volume || !this.syncEnabled || this.state.applyingRemote) {
            return false;
        }
        if (this.status !== 'connected') {
            this.unsentLocalEdits = true;
            this.logger.debug('Not connected; local edits will be sent after connecting');
            return false;
        }

        const result = this.diffEngine.computeDelta(this.state.previousSnapshot, volume);
        switch (result.kind) {
            case 'none':
                this.logger.debug('No changes since baseline');
                return false;
            case 'delta':
                return this.transmit(encodeDelta(this.participantId, result.delta), volume, {
                    type: MsgType.Delta,
                    voxels: result.delta.values.length,
                });
            case 'full':
                return this.transmit(encodeFullSnapshot(this.participantId, volume), volume, {
                    type: MsgType.FullSnapshot,
                    voxels: volume.voxelCount,
                    reason: result.reason,
                });
        }
    }

    /** Sends the whole volume regardless of the baseline. */
    sendFullSnapshot(): boolean {
        return this.sendFullSnapshotFor('explicit');
    }

    // ---------------------------------------------------------------------------
    // Connection
    // ---------------------------------------------------------------------------

    private openConnection(): Promise<void> {
        const promise = this.doConnect().finally(() => {
            if (this.connectPromise === promise) {
                this.connectPromise = null;
            }
        });
        this.connectPromise = promise;
        return promise;
    }

    private async doConnect(): Promise<void> {
        const endpoint = this.endpoint;
        if (!endpoint) {
            throw new ConfigurationError('connect() needs an endpoint');
        }

        const generation = ++this.connectGeneration;
        const url = buildEndpointUrl(endpoint, this.credentials);
        this.setStatus('connecting');
        this.logger.conn(`Connecting to ${redact(url)}`);

        try {
            await this.transport.connect(url, { timeoutMs: this.config.connectTimeoutMs });
        } catch (e) {
            const error = e instanceof TransportError ? e : new TransportError('Failed to connect', toError(e));
            if (generation === this.connectGeneration) {
                this.setStatus('disconnected');
            }
            this.logger.warn(`Connect failed: ${error.message}`);
            throw error;
        }

        if (generation !== this.connectGeneration) {
            this.transport.close();
            throw new TransportError('Connection attempt aborted by disconnect()', undefined, false);
        }

        try {
            this.transport.send(serializeMessage(encodeJoin(this.participantId)));
        } catch (e) {
            this.transport.close();
            this.setStatus('disconnected');
            throw e instanceof TransportError ? e : new TransportError('Failed to send join', toError(e));
        }

        this.reconnectAttempts = 0;
        this.setStatus('connected');
        this.startKeepalive();
        this.logger.info(`Connected as ${this.participantId}`);
        this.emit('connected');

        if (this.unsentLocalEdits) {
            this.unsentLocalEdits = false;
            this.coalescer.notify();
        }
    }

    private wireTransport(): void {
        this.unsubscribers.push(
            this.transport.on('message', (text) => this.handleMessage(text)),
            this.transport.on('close', (code, reason) => this.handleTransportClose(code, reason)),
            this.transport.on('error', (error) => this.handleTransportError(error)),
        );
    }

    private handleTransportClose(code: number, reason: string): void {
        if (this.status !== 'connected') return;
        this.loseConnection(new TransportError(`Connection closed (${code}${reason ? `: ${reason}` : ''})`));
    }

    private handleTransportError(error: Error): void {
        this.logger.error(`Transport error: ${error.message}`);
        if (this.status !== 'connected') return;
        this.transport.close();
        this.loseConnection(new TransportError('Transport error', error));
    }

    private loseConnection(error: TransportError): void {
        if (this.coalescer.pending) {
            this.unsentLocalEdits = true;
        }
        this.teardown();
        this.logger.warn(`Connection lost: ${error.message}`);
        this.emit('disconnected', error);

        if (this.config.autoReconnect && !this.intentionalClose) {
            this.scheduleReconnect();
        }
    }

    /**
     * Stops timers and resets counters and the baseline. The next connection
     * re-bootstraps with a full snapshot.
     */
    private teardown(): void {
        this.connectGeneration++;
        this.stopKeepalive();
        this.coalescer.cancel();
        this.state.previousSnapshot = null;
        this.sentCount = 0;
        this.receivedCount = 0;
        this.connectedUsers = 0;
        this.lastInboundAt = null;
        this.setStatus('disconnected');
    }

    private scheduleReconnect(): void {
        if (this.reconnectAttempts >= this.config.maxReconnectAttempts) {
            this.logger.error(`Giving up after ${this.reconnectAttempts} reconnect attempts`);
            return;
        }

        this.reconnectAttempts++;
        const delay = Math.min(
            this.config.initialReconnectDelayMs * Math.pow(2, this.reconnectAttempts),
            this.config.maxReconnectDelayMs
        );
        this.logger.info(`Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts}/${this.config.maxReconnectAttempts})`);

        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            if (this.intentionalClose) return;
            this.openConnection().catch((e: unknown) => {
                this.logger.warn(`Reconnect attempt failed: ${toError(e).message}`);
                if (!this.intentionalClose && this.status === 'disconnected') {
                    this.scheduleReconnect();
                }
            });
        }, delay);
    }

    private clearReconnectTimer(): void {
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
    }

    private startKeepalive(): void {
        this.stopKeepalive();
        this.keepaliveTimer = setInterval(() => {
            this.sendFrame(encodePing());
        }, this.config.keepaliveIntervalMs);
    }

    private stopKeepalive(): void {
        if (this.keepaliveTimer) {
            clearInterval(this.keepaliveTimer);
            this.keepaliveTimer = null;
        }
    }

    private setStatus(status: ConnectionStatus): void {
        if (this.status === status) return;
        this.status = status;
        this.emit('status', status);
    }

    // ---------------------------------------------------------------------------
    // Outbound
    // ---------------------------------------------------------------------------

    private sendFullSnapshotFor(reason: 'explicit' | 'peer-joined'): boolean {
        const volume = this.volume;
        if (!volume || this.status !== 'connected' || this.state.applyingRemote) {
            return false;
        }
        return this.transmit(encodeFullSnapshot(this.participantId, volume), volume, {
            type: MsgType.FullSnapshot,
            voxels: volume.voxelCount,
            reason,
        });
    }

    private transmit(message: OutgoingMessage, volume: VolumeBuffer, info: SentInfo): boolean {
        if (!this.sendFrame(message)) {
            return false;
        }
        this.sentCount++;
        this.state.previousSnapshot = volume.snapshot();
        this.logger.debug(`Sent ${info.type} #${this.sentCount} (${info.voxels} voxels)`);
        this.emit('sent', info);
        return true;
    }

    private sendFrame(message: OutgoingMessage): boolean {
        try {
            this.transport.send(serializeMessage(message));
            return true;
        } catch (e) {
            this.logger.warn(`Failed to send ${message.type}: ${toError(e).message}`);
            return false;
        }
    }

    // ---------------------------------------------------------------------------
    // Inbound
    // ---------------------------------------------------------------------------

    private handleMessage(raw: string): void {
        if (this.status === 'disconnected') return;
        this.lastInboundAt = Date.now();

        try {
            this.dispatch(parseMessage(raw));
        } catch (e) {
            const error = e instanceof SegSyncError
                ? e
                : new ProtocolError(`Failed to handle message: ${toError(e).message}`, raw);
            this.logger.warn(`Dropped message: ${error.message}`);
            this.emit('messageDropped', error, truncate(raw));
        }
    }

    private dispatch(message: InboundMessage): void {
        switch (message.type) {
            case MsgType.Delta: {
                const frame = message;
                this.applyRemote(frame.userId, () => {
                    const volume = this.volume;
                    if (!volume) {
                        this.logger.debug(`No volume attached; ignoring delta from ${frame.userId}`);
                        return null;
                    }
                    return this.reconciler.applyDelta(volume, decodeDelta(frame));
                }, MsgType.Delta);
                break;
            }

            case MsgType.FullSnapshot: {
                const frame = message;
                this.applyRemote(frame.userId, () => {
                    const snapshot = decodeFullSnapshot(frame);
                    const volume = this.volume;
                    if (volume) {
                        return this.reconciler.applyFull(volume, snapshot);
                    }
                    const adopted = VolumeBuffer.create({
                        dimensions: snapshot.dimensions,
                        labels: snapshot.labels,
                        spacing: snapshot.spacing,
                        origin: snapshot.origin,
                        segmentNames: snapshot.segmentNames,
                    });
                    this.volume = adopted;
                    this.state.previousSnapshot = adopted.snapshot();
                    this.emit('volumeAttached', adopted);
                    return { applied: adopted.voxelCount, skipped: 0, rescaled: false };
                }, MsgType.FullSnapshot);
                break;
            }

            case MsgType.UserJoined:
                this.setConnectedUsers(message.totalUsers ?? this.connectedUsers + 1);
                this.logger.info(`User joined: ${message.userId}`);
                if (this.config.snapshotOnPeerJoin && message.userId !== this.participantId) {
                    this.sendFullSnapshotFor('peer-joined');
                }
                break;

            case MsgType.UserLeft:
                this.setConnectedUsers(message.totalUsers ?? Math.max(0, this.connectedUsers - 1));
                this.logger.info(`User left: ${message.userId}`);
                break;

            case MsgType.UserList:
                this.setConnectedUsers(message.users.length);
                break;

            case MsgType.Error:
                this.logger.warn(`Server error: ${message.message}`);
                this.emit('serverError', message.message);
                break;

            case MsgType.SessionEnded:
                this.logger.info('Session ended by the server');
                this.emit('sessionEnded');
                this.disconnect();
                break;

            case MsgType.Join:
            case MsgType.Ping:
            case MsgType.Pong:
                this.logger.debug(`Received ${message.type}`);
                break;
        }
    }

    /**
     * Runs a remote apply with `applyingRemote` raised for its whole duration,
     * listeners of `remoteApplied` included.
     */
    private applyRemote(from: string, apply: () => ApplyReport | null, type: PayloadType): void {
        if (from === this.participantId) {
            this.logger.debug(`Ignoring echo of own ${type}`);
            return;
        }

        this.state.applyingRemote = true;
        try {
            const report = apply();
            if (!report) return;
            this.receivedCount++;
            this.logger.debug(`Applied ${type} #${this.receivedCount} from ${from} (${report.applied} voxels)`);
            this.emit('remoteApplied', { type, from, report });
        } finally {
            this.state.applyingRemote = false;
        }
    }

    private setConnectedUsers(count: number): void {
        this.connectedUsers = count;
        this.emit('peers', count);
    }
}

/** Appends the token as a query parameter, the way the room server expects it. */
export function buildEndpointUrl(endpoint: string, credentials: SessionCredentials = {}): string {
    if (!credentials.token) return endpoint;
    const separator = endpoint.includes('?') ? '&' : '?';
    return `${endpoint}${separator}token=${encodeURIComponent(credentials.token)}`;
}
