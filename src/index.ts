/**
 * segsync - Volumetric delta synchronization for collaborative label editing.
 *
 * Participants edit a shared 3-D label volume; each one sends compact deltas
 * (or a full snapshot when a delta would not pay off) through a relay room.
 *
 * @example
 * ```typescript
 * import { SyncSession, VolumeBuffer } from 'segsync';
 *
 * const volume = VolumeBuffer.create({ dimensions: [64, 256, 256] });
 * const session = new SyncSession({ participantId: 'reader-2', volume });
 *
 * await session.connect('wss://rooms.example.org/ws/sessions/7', { token });
 * volume.setLabelAt(10, 20, 30, 3);
 * session.notifyLocalEdit();
 * ```
 *
 * @packageDocumentation
 */

export { SyncSession, buildEndpointUrl } from './session/SyncSession';
export type {
    SyncSessionOptions,
    SyncSessionEvents,
    SentInfo,
    RemoteAppliedInfo,
    PayloadType,
} from './session/SyncSession';

// Volume
export { VolumeBuffer } from './volume/VolumeBuffer';
export type { VolumeInit } from './volume/VolumeBuffer';
export { mapAxisIndex, resampleLabels, sameDimensions } from './volume/resample';
export { LABEL_DATA_TYPES, bytesPerElement, maxLabelFor, isLabelDataType } from './volume/labels';

// Diff & reconcile
export { DiffEngine } from './diff/DiffEngine';
export type { DiffResult, DiffEngineOptions, FullResyncReason } from './diff/DiffEngine';
export { Reconciler, writeDelta } from './sync/Reconciler';
export type { ReconcileState } from './sync/Reconciler';
export { ChangeCoalescer } from './sync/ChangeCoalescer';

// Wire
export {
    compress,
    decompress,
    encodeForTransport,
    decodeFromTransport,
    packLabels,
    unpackLabels,
    packIndices,
    unpackIndices,
    MAX_WIRE_INDEX,
} from './codec';
export {
    MsgType,
    LEGACY_SNAPSHOT_TAG,
    encodeJoin,
    encodePing,
    encodeDelta,
    encodeFullSnapshot,
    decodeDelta,
    decodeFullSnapshot,
    serializeMessage,
} from './protocol';
export type {
    DeltaPayload,
    SnapshotPayload,
    DeltaMessage,
    FullSnapshotMessage,
    JoinMessage,
    PingMessage,
    OutgoingMessage,
} from './protocol';
export { parseMessage, MessageSchema } from './validation';
export type { InboundMessage } from './validation';

// Transport
export type { Transport, TransportEvents, TransportConnectOptions } from './transport/Transport';
export { WebSocketTransport } from './transport/WebSocketTransport';
export type { WebSocketTransportConfig } from './transport/WebSocketTransport';
export { InMemoryRelay, InMemoryTransport } from './transport/InMemoryTransport';
export type { InMemoryRelayOptions, RelayedFrame } from './transport/InMemoryTransport';

// Config
export { DEFAULT_CONFIG, EngineConfigSchema, resolveConfig } from './config';
export type { EngineConfig } from './config';

// Types
export type {
    Dimensions,
    Vec3,
    LabelDataType,
    LabelArray,
    SegmentNames,
    Delta,
    FullSnapshot,
    ApplyReport,
    ConnectionStatus,
    SessionStats,
    SessionCredentials,
} from './types';

// Errors
export {
    SegSyncError,
    ConfigurationError,
    CodecError,
    GeometryMismatchError,
    ApplyError,
    TransportError,
    ProtocolError,
} from './errors';

// Utilities
export { Logger, LogLevel, logger } from './utils/Logger';
export { EventEmitter } from './utils/EventEmitter';
export { describeMessage, describeFrame, formatBytes, startTimer } from './debug';
