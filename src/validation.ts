import { z } from 'zod';
import { ProtocolError } from './errors';
import { LEGACY_SNAPSHOT_TAG, MsgType } from './protocol';
import type { LabelDataType } from './types';
import { LABEL_DATA_TYPES, isLabelDataType } from './volume/labels';

/**
 * Zod schemas for inbound frames. Nothing from the wire reaches the
 * engine without passing through `parseMessage`.
 */

const KNOWN_TYPES = new Set<string>(Object.values(MsgType));

const TripleSchema = z.tuple([z.number(), z.number(), z.number()]);

const DimensionsSchema = z.tuple([
    z.number().int().positive(),
    z.number().int().positive(),
    z.number().int().positive(),
]);

const DataTypeSchema = z.enum(LABEL_DATA_TYPES);

const ISO_OFFSET = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/;

// ISO-8601 without an offset is read as UTC.
function isoToEpochMs(iso: string): number {
    return Date.parse(ISO_OFFSET.test(iso) ? iso : `${iso}Z`);
}

// Epoch milliseconds or ISO-8601, normalised to epoch milliseconds.
const TimestampSchema = z.union([
    z.number(),
    z.string().datetime({ offset: true, local: true }).transform(isoToEpochMs),
]);

const UserIdSchema = z.string().min(1);

const JoinMessageSchema = z.object({
    type: z.literal(MsgType.Join),
    userId: UserIdSchema,
    timestamp: TimestampSchema,
});

const DeltaMessageSchema = z.object({
    type: z.literal(MsgType.Delta),
    userId: UserIdSchema,
    timestamp: TimestampSchema,
    data: z.object({
        indices: z.string(),
        values: z.string(),
        numChanges: z.number().int().nonnegative(),
        dimensions: DimensionsSchema,
        spacing: TripleSchema,
        origin: TripleSchema,
        dataType: DataTypeSchema,
    }),
});

const FullSnapshotMessageSchema = z.object({
    type: z.literal(MsgType.FullSnapshot),
    userId: UserIdSchema,
    timestamp: TimestampSchema,
    data: z.object({
        imageData: z.string(),
        dimensions: DimensionsSchema,
        spacing: TripleSchema,
        origin: TripleSchema,
        dataType: DataTypeSchema,
        segmentNames: z.record(z.string()).optional(),
    }),
});

const UserJoinedMessageSchema = z.object({
    type: z.literal(MsgType.UserJoined),
    userId: UserIdSchema,
    timestamp: TimestampSchema.optional(),
    totalUsers: z.number().int().nonnegative().optional(),
});

const UserLeftMessageSchema = z.object({
    type: z.literal(MsgType.UserLeft),
    userId: UserIdSchema,
    timestamp: TimestampSchema.optional(),
    totalUsers: z.number().int().nonnegative().optional(),
});

const UserListMessageSchema = z.object({
    type: z.literal(MsgType.UserList),
    userId: UserIdSchema.optional(),
    timestamp: TimestampSchema.optional(),
    users: z.array(z.string()),
});

const ErrorMessageSchema = z.object({
    type: z.literal(MsgType.Error),
    userId: UserIdSchema.optional(),
    timestamp: TimestampSchema.optional(),
    message: z.string(),
});

const PingMessageSchema = z.object({
    type: z.literal(MsgType.Ping),
    timestamp: TimestampSchema.optional(),
});

const PongMessageSchema = z.object({
    type: z.literal(MsgType.Pong),
    timestamp: TimestampSchema.optional(),
});

const SessionEndedMessageSchema = z.object({
    type: z.literal(MsgType.SessionEnded),
    userId: UserIdSchema.optional(),
    timestamp: TimestampSchema.optional(),
});

// Discriminated union for performance and type safety
export const MessageSchema = z.discriminatedUnion('type', [
    JoinMessageSchema,
    DeltaMessageSchema,
    FullSnapshotMessageSchema,
    UserJoinedMessageSchema,
    UserLeftMessageSchema,
    UserListMessageSchema,
    ErrorMessageSchema,
    PingMessageSchema,
    PongMessageSchema,
    SessionEndedMessageSchema,
]);

export type InboundMessage = z.infer<typeof MessageSchema>;

/** Signed element names map to the unsigned type of the same width. */
const LEGACY_DATA_TYPES: Partial<Record<string, LabelDataType>> = {
    int8: 'uint8',
    int16: 'uint16',
    int32: 'uint32',
};

/**
 * Older peers tag full snapshots `segmentation_update` and identify
 * themselves as `username`; both are rewritten to the current names.
 */
function normalizeLegacy(json: Record<string, unknown>): Record<string, unknown> {
    const out = { ...json };
    if (out.type === LEGACY_SNAPSHOT_TAG) {
        out.type = MsgType.FullSnapshot;
        if (isRecord(out.data)) {
            out.data = normalizeLegacySnapshot(out.data);
        }
    }
    if (out.userId === undefined && typeof out.username === 'string') {
        out.userId = out.username;
    }
    return out;
}

/**
 * Legacy snapshots list their geometry x-first and name the element type
 * after the sender's array dtype. Their voxel bytes already run x-fastest,
 * so only the triples are reversed.
 */
function normalizeLegacySnapshot(data: Record<string, unknown>): Record<string, unknown> {
    const out = { ...data };
    for (const key of ['dimensions', 'spacing', 'origin'] as const) {
        const triple = out[key];
        if (Array.isArray(triple)) {
            out[key] = [...triple].reverse();
        }
    }
    if (typeof out.dataType === 'string' && !isLabelDataType(out.dataType)) {
        out.dataType = LEGACY_DATA_TYPES[out.dataType] ?? out.dataType;
    }
    return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses and validates a raw text frame.
 *
 * @throws {ProtocolError} on invalid JSON, an unknown tag or missing fields
 */
export function parseMessage(raw: string): InboundMessage {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new ProtocolError(
            `Failed to parse message as JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
            raw
        );
    }

    if (!isRecord(json)) {
        throw new ProtocolError('Message is not a JSON object', raw);
    }

    const normalized = normalizeLegacy(json);
    if (typeof normalized.type !== 'string' || !KNOWN_TYPES.has(normalized.type)) {
        throw new ProtocolError(`Unknown message type: ${String(normalized.type)}`, raw);
    }

    const result = MessageSchema.safeParse(normalized);
    if (!result.success) {
        const errorMessages = result.error.issues
            .map(e => `${e.path.join('.')}: ${e.message}`)
            .join(', ');

        throw new ProtocolError(
            `Validation failed for ${normalized.type}: ${errorMessages}`,
            raw
        );
    }

    return result.data;
}

/**
 * Safely truncates a string for logging/error messages.
 */
export function truncate(str: string, maxLength: number = 200): string {
    if (str.length <= maxLength) return str;
    return str.substring(0, maxLength) + `... (${str.length - maxLength} more chars)`;
}
