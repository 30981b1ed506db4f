/**
 * @file debug.ts
 * @brief Human-readable summaries of wire frames for logs and the CLI.
 *
 * @example
 * ```typescript
 * import { describeFrame } from 'segsync';
 *
 * transport.on('message', (text) => console.log(describeFrame(text)));
 * ```
 */

import { MsgType } from './protocol';
import { toError } from './errors';
import { parseMessage, truncate, type InboundMessage } from './validation';

/**
 * One-line summary of a validated message. Payloads are summarised by their
 * declared geometry and encoded size, never decoded.
 */
export function describeMessage(message: InboundMessage): string {
    const from = 'userId' in message && message.userId ? ` from ${message.userId}` : '';

    switch (message.type) {
        case MsgType.Delta: {
            const { data } = message;
            const size = data.indices.length + data.values.length;
            return `delta${from}: ${data.numChanges} changes on [${data.dimensions.join('x')}] ${data.dataType}, ${formatBytes(size)} encoded`;
        }
        case MsgType.FullSnapshot: {
            const { data } = message;
            const names = data.segmentNames ? Object.keys(data.segmentNames).length : 0;
            return `full_snapshot${from}: [${data.dimensions.join('x')}] ${data.dataType}, ${formatBytes(data.imageData.length)} encoded, ${names} segment names`;
        }
        case MsgType.UserJoined:
        case MsgType.UserLeft:
            return message.totalUsers !== undefined
                ? `${message.type}${from} (${message.totalUsers} connected)`
                : `${message.type}${from}`;
        case MsgType.UserList:
            return `user_list: ${message.users.length} users [${message.users.join(', ')}]`;
        case MsgType.Error:
            return `error${from}: ${message.message}`;
        case MsgType.Join:
        case MsgType.Ping:
        case MsgType.Pong:
        case MsgType.SessionEnded:
            return `${message.type}${from}`;
    }
}

/**
 * Summary of a raw text frame; invalid frames are described, not thrown.
 */
export function describeFrame(raw: string): string {
    try {
        return describeMessage(parseMessage(raw));
    } catch (e) {
        return `invalid frame (${toError(e).message}): ${truncate(raw, 80)}`;
    }
}

/**
 * Measures the size of data and returns human-readable string.
 */
export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

/**
 * Performance timer for measuring operation latency.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * engine.computeDelta(baseline, volume);
 * console.log(`Took ${timer.elapsed()}ms`);
 * ```
 */
export function startTimer(): { elapsed: () => number } {
    const start = performance.now();
    return {
        elapsed: () => performance.now() - start,
    };
}
