/**
 * Error types for segsync.
 *
 * Per-message failures (`CodecError`, `ProtocolError`, `ApplyError`) are
 * isolated to the message that caused them; only `TransportError` ends a
 * session.
 */

/**
 * Base class for all segsync errors.
 */
export class SegSyncError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'SegSyncError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, SegSyncError);
        }
    }
}

/**
 * Thrown when configuration or constructor input is invalid.
 */
export class ConfigurationError extends SegSyncError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * A payload could not be decompressed, decoded or unpacked.
 */
export class CodecError extends SegSyncError {
    constructor(message: string, public readonly cause?: Error) {
        super(message, 'CODEC_ERROR');
        this.name = 'CodecError';
    }
}

/**
 * Label array length disagrees with the declared dimensions.
 * Geometry differences between peers are resampled, not raised.
 */
export class GeometryMismatchError extends SegSyncError {
    constructor(
        message: string,
        public readonly expected: number,
        public readonly actual: number
    ) {
        super(message, 'GEOMETRY_MISMATCH');
        this.name = 'GeometryMismatchError';
    }
}

/**
 * Some entries of a delta could not be written. The rest were applied.
 */
export class ApplyError extends SegSyncError {
    constructor(
        message: string,
        public readonly skippedCount: number
    ) {
        super(message, 'APPLY_ERROR');
        this.name = 'ApplyError';
    }
}

/**
 * Connect failure, connect timeout or a mid-session drop.
 */
export class TransportError extends SegSyncError {
    constructor(
        message: string,
        public readonly cause?: Error,
        public readonly isRetryable: boolean = true
    ) {
        super(message, 'TRANSPORT_ERROR');
        this.name = 'TransportError';
    }
}

/**
 * An inbound frame was not JSON, had an unknown tag or was missing fields.
 */
export class ProtocolError extends SegSyncError {
    constructor(
        message: string,
        public readonly rawMessage?: string
    ) {
        super(message, 'PROTOCOL_ERROR');
        this.name = 'ProtocolError';
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
