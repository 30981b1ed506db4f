import WebSocket from 'ws';
import { TransportError, toError } from '../errors';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger } from '../utils/Logger';
import type { Transport, TransportConnectOptions, TransportEvents } from './Transport';

export interface WebSocketTransportConfig {
    /** Default bounded wait for `connect()` when the caller passes none (ms). */
    connectionTimeout?: number;
    /** Extra headers for the upgrade request, e.g. a bearer token. */
    headers?: Record<string, string>;
    logger?: Logger;
}

/**
 * Text-frame transport over the `ws` package.
 *
 * Reconnection policy is the session's business; this class only reports
 * `close` and `error` for channels it did not close itself.
 */
export class WebSocketTransport extends EventEmitter<TransportEvents> implements Transport {
    private ws: WebSocket | null = null;
    private isIntentionallyClosed = false;
    private readonly connectionTimeout: number;
    private readonly headers?: Record<string, string>;
    private readonly logger: Logger;

    constructor(config: WebSocketTransportConfig = {}) {
        super();
        this.connectionTimeout = config.connectionTimeout ?? 30000;
        this.headers = config.headers;
        this.logger = config.logger ?? new Logger('SegSync:WebSocket');
    }

    public isOpen(): boolean {
        return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
    }

    public connect(url: string, options: TransportConnectOptions = {}): Promise<void> {
        if (this.ws) {
            return Promise.reject(new TransportError('WebSocketTransport is already connected or connecting', undefined, false));
        }

        this.isIntentionallyClosed = false;
        const timeoutMs = options.timeoutMs ?? this.connectionTimeout;

        return new Promise((resolve, reject) => {
            let settled = false;
            const settle = (error?: TransportError) => {
                if (settled) return;
                settled = true;
                clearTimeout(timeout);
                if (error) reject(error);
                else resolve();
            };

            const timeout = setTimeout(() => {
                this.logger.warn(`Connection to ${redact(url)} timed out after ${timeoutMs}ms`);
                settle(new TransportError(`Connection timed out after ${timeoutMs}ms`));
                this.teardownSocket();
            }, timeoutMs);

            let ws: WebSocket;
            try {
                ws = new WebSocket(url, { headers: this.headers });
            } catch (e) {
                settle(new TransportError(`Failed to open ${redact(url)}`, toError(e), false));
                return;
            }
            this.ws = ws;

            ws.on('open', () => {
                this.logger.conn(`Opened ${redact(url)}`);
                settle();
            });

            ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
                if (isBinary) {
                    this.logger.warn('Dropping binary frame; the protocol is text-only');
                    return;
                }
                this.emit('message', rawToText(data));
            });

            ws.on('error', (err: Error) => {
                if (!settled) {
                    settle(new TransportError(`Failed to connect to ${redact(url)}: ${err.message}`, err));
                    this.teardownSocket();
                    return;
                }
                if (this.ws === ws) {
                    this.emit('error', err);
                }
            });

            ws.on('close', (code: number, reason: Buffer) => {
                const active = this.ws === ws;
                if (active) {
                    this.ws = null;
                }
                if (!settled) {
                    settle(new TransportError(`Closed with code: ${code} before opening`));
                    return;
                }
                if (active && !this.isIntentionallyClosed) {
                    this.emit('close', code, reason.toString());
                }
            });
        });
    }

    public send(text: string): void {
        if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
            throw new TransportError('Cannot send: WebSocket is not open');
        }
        try {
            this.ws.send(text);
        } catch (e) {
            throw new TransportError('WebSocket send failed', toError(e));
        }
    }

    public close(): void {
        this.isIntentionallyClosed = true;
        this.teardownSocket();
    }

    private teardownSocket(): void {
        const ws = this.ws;
        this.ws = null;
        if (!ws) return;
        ws.removeAllListeners('message');
        if (ws.readyState === WebSocket.CONNECTING) {
            // Aborting a connecting socket raises one last error event.
            ws.on('error', (err: Error) => this.logger.debug(`Error while aborting connect: ${err.message}`));
            ws.terminate();
        } else if (ws.readyState === WebSocket.OPEN) {
            ws.close(1000, 'client closed');
        }
    }
}

function rawToText(data: WebSocket.RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
    if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
    return data.toString('utf8');
}

/** Strips the token query parameter before a URL reaches a log line. */
export function redact(url: string): string {
    return url.replace(/([?&]token=)[^&]*/, '$1***');
}
