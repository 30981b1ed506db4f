/**
 * segsync - Protocol Layer
 *
 * One JSON object per text frame:
 * `{ "type": tag, "userId"?: string, "timestamp": epoch-ms, "data"?: {...} }`.
 * Label payloads inside `data` are `base64(zlib(bytes))`.
 */

import {
    compress,
    decodeFromTransport,
    decompress,
    encodeForTransport,
    packIndices,
    packLabels,
    unpackIndices,
    unpackLabels,
} from './codec';
import { CodecError } from './errors';
import type { Delta, Dimensions, FullSnapshot, LabelDataType, SegmentNames, Vec3 } from './types';
import { allocateLabels } from './volume/labels';
import type { VolumeBuffer } from './volume/VolumeBuffer';

// =============================================================================
// Message Types
// =============================================================================

export enum MsgType {
    Join = 'join',
    Delta = 'delta',
    FullSnapshot = 'full_snapshot',
    UserJoined = 'user_joined',
    UserLeft = 'user_left',
    UserList = 'user_list',
    Error = 'error',
    Ping = 'ping',
    Pong = 'pong',
    SessionEnded = 'session_ended',
}

/** Tag older peers use for a full snapshot. Accepted on input only. */
export const LEGACY_SNAPSHOT_TAG = 'segmentation_update';

type Triple = [number, number, number];

export interface DeltaPayload {
    /** base64(zlib(uint16[N * 3])) */
    indices: string;
    /** base64(zlib(raw label bytes)) */
    values: string;
    numChanges: number;
    dimensions: Triple;
    spacing: Triple;
    origin: Triple;
    dataType: LabelDataType;
}

export interface SnapshotPayload {
    /** base64(zlib(raw label bytes)) */
    imageData: string;
    dimensions: Triple;
    spacing: Triple;
    origin: Triple;
    dataType: LabelDataType;
    segmentNames?: Record<string, string>;
}

export interface JoinMessage {
    type: MsgType.Join;
    userId: string;
    timestamp: number;
}

export interface PingMessage {
    type: MsgType.Ping;
    timestamp: number;
}

export interface DeltaMessage {
    type: MsgType.Delta;
    userId: string;
    timestamp: number;
    data: DeltaPayload;
}

export interface FullSnapshotMessage {
    type: MsgType.FullSnapshot;
    userId: string;
    timestamp: number;
    data: SnapshotPayload;
}

export type OutgoingMessage = JoinMessage | PingMessage | DeltaMessage | FullSnapshotMessage;

// =============================================================================
// Encoders
// =============================================================================

export function encodeJoin(userId: string, now: number = Date.now()): JoinMessage {
    return { type: MsgType.Join, userId, timestamp: now };
}

export function encodePing(now: number = Date.now()): PingMessage {
    return { type: MsgType.Ping, timestamp: now };
}

export function encodeDelta(userId: string, delta: Delta): DeltaMessage {
    const values = allocateLabels(delta.dataType, delta.values.length);
    values.set(delta.values);

    return {
        type: MsgType.Delta,
        userId,
        timestamp: delta.timestamp,
        data: {
            indices: encodeForTransport(compress(packIndices(delta.indices))),
            values: encodeForTransport(compress(packLabels(values))),
            numChanges: delta.values.length,
            dimensions: triple(delta.sourceDimensions),
            spacing: triple(delta.spacing),
            origin: triple(delta.origin),
            dataType: delta.dataType,
        },
    };
}

export function encodeFullSnapshot(userId: string, volume: VolumeBuffer, now: number = Date.now()): FullSnapshotMessage {
    const data: SnapshotPayload = {
        imageData: encodeForTransport(compress(packLabels(volume.labels))),
        dimensions: triple(volume.dimensions),
        spacing: triple(volume.spacing),
        origin: triple(volume.origin),
        dataType: volume.dataType,
    };
    if (volume.segmentNames.size > 0) {
        data.segmentNames = Object.fromEntries(
            Array.from(volume.segmentNames, ([label, name]) => [String(label), name])
        );
    }
    return { type: MsgType.FullSnapshot, userId, timestamp: now, data };
}

export function serializeMessage(message: OutgoingMessage): string {
    return JSON.stringify(message);
}

// =============================================================================
// Decoders
// =============================================================================

/**
 * @throws {CodecError} on corrupt payloads or counts that disagree with `numChanges`
 */
export function decodeDelta(message: { timestamp: number; data: DeltaPayload }): Delta {
    const { data } = message;
    const indices = unpackIndices(decompress(decodeFromTransport(data.indices)));
    const values = unpackLabels(decompress(decodeFromTransport(data.values)), data.dataType);

    if (values.length !== data.numChanges || indices.length !== data.numChanges * 3) {
        throw new CodecError(
            `Delta declares ${data.numChanges} changes but carries ${indices.length / 3} indices and ${values.length} values`
        );
    }

    return {
        indices,
        values: Uint32Array.from(values),
        sourceDimensions: data.dimensions,
        spacing: data.spacing,
        origin: data.origin,
        dataType: data.dataType,
        timestamp: message.timestamp,
    };
}

/**
 * @throws {CodecError} on corrupt payloads or a voxel count that disagrees with the dimensions
 */
export function decodeFullSnapshot(message: { timestamp: number; data: SnapshotPayload }): FullSnapshot {
    const { data } = message;
    const labels = unpackLabels(decompress(decodeFromTransport(data.imageData)), data.dataType);
    const expected = data.dimensions[0] * data.dimensions[1] * data.dimensions[2];

    if (labels.length !== expected) {
        throw new CodecError(
            `Snapshot carries ${labels.length} voxels but dimensions [${data.dimensions.join(', ')}] need ${expected}`
        );
    }

    const segmentNames: SegmentNames = new Map();
    for (const [label, name] of Object.entries(data.segmentNames ?? {})) {
        const numeric = Number(label);
        if (Number.isInteger(numeric) && numeric >= 0) {
            segmentNames.set(numeric, name);
        }
    }

    return {
        labels,
        dimensions: data.dimensions,
        spacing: data.spacing,
        origin: data.origin,
        dataType: data.dataType,
        segmentNames,
        timestamp: message.timestamp,
    };
}

function triple(value: Dimensions | Vec3): Triple {
    return [value[0], value[1], value[2]];
}
