/**
 * segsync - Type Definitions
 *
 * Shared shapes of the engine: geometry, label storage, deltas, snapshots
 * and session bookkeeping. Wire shapes live in `protocol.ts`.
 */

import type { ApplyError } from './errors';

// =============================================================================
// Geometry & Labels
// =============================================================================

/** Volume extent in voxels, always `[z, y, x]`. */
export type Dimensions = readonly [z: number, y: number, x: number];

/** Physical spacing or origin, in the same `[z, y, x]` order as dimensions. */
export type Vec3 = readonly [number, number, number];

/** Element type of a label array, named as the peers put it on the wire. */
export type LabelDataType = 'uint8' | 'uint16' | 'uint32';

export type LabelArray = Uint8Array | Uint16Array | Uint32Array;

/** label -> segment name. May be partial or stale. */
export type SegmentNames = Map<number, string>;

// =============================================================================
// Sync Payloads
// =============================================================================

/** Sparse set of label changes since the last agreed baseline. */
export interface Delta {
    /** Flat `(z, y, x)` triples; length is `3 * values.length`. */
    indices: Uint32Array;
    values: Uint32Array;
    /** Geometry the indices were computed against. */
    sourceDimensions: Dimensions;
    spacing: Vec3;
    origin: Vec3;
    dataType: LabelDataType;
    /** Epoch milliseconds */
    timestamp: number;
}

/** The entire label volume with its geometry. */
export interface FullSnapshot {
    labels: LabelArray;
    dimensions: Dimensions;
    spacing: Vec3;
    origin: Vec3;
    dataType: LabelDataType;
    segmentNames: SegmentNames;
    timestamp: number;
}

/** Outcome of applying a remote payload to a local volume. */
export interface ApplyReport {
    applied: number;
    skipped: number;
    /** True when indices were remapped onto a different local geometry. */
    rescaled: boolean;
    /** Present when entries were skipped. */
    error?: ApplyError;
}

// =============================================================================
// Session
// =============================================================================

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected';

export interface SessionStats {
    status: ConnectionStatus;
    sentCount: number;
    receivedCount: number;
    connectedUsers: number;
    hasBaseline: boolean;
    pendingLocalMutation: boolean;
    /** Epoch ms of the last inbound frame, or null before the first one. */
    lastInboundAt: number | null;
}

/** Already-resolved credentials handed over by the host's auth layer. */
export interface SessionCredentials {
    token?: string;
}
