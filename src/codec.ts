/**
 * @file codec.ts
 * @brief Payload compression and text-safe transport encoding.
 *
 * Label payloads travel as `base64(zlib(bytes))` inside JSON text frames.
 * zlib's container format is what the existing peers emit, so compressed
 * payloads are interchangeable with theirs.
 *
 * @example
 * ```typescript
 * import { compress, encodeForTransport, decodeFromTransport, decompress } from 'segsync';
 *
 * const text = encodeForTransport(compress(packLabels(volume.labels)));
 * const bytes = decompress(decodeFromTransport(text));
 * ```
 */

import { deflateSync, inflateSync } from 'node:zlib';
import { CodecError, toError } from './errors';
import type { LabelArray, LabelDataType } from './types';
import { allocateLabels, bytesPerElement } from './volume/labels';

const NON_BASE64_CHAR = /[^A-Za-z0-9+/]/;

/** Largest coordinate a `uint16` index triple can carry. */
export const MAX_WIRE_INDEX = 0xffff;

// =============================================================================
// Compression
// =============================================================================

export function compress(bytes: Uint8Array): Uint8Array {
    return new Uint8Array(deflateSync(bytes));
}

/**
 * @throws {CodecError} when the input is not a complete zlib stream
 */
export function decompress(bytes: Uint8Array): Uint8Array {
    try {
        return new Uint8Array(inflateSync(bytes));
    } catch (e) {
        throw new CodecError(`Failed to decompress payload: ${toError(e).message}`, toError(e));
    }
}

// =============================================================================
// Transport Encoding
// =============================================================================

export function encodeForTransport(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Strict inverse of `encodeForTransport`. Node's own decoder silently skips
 * invalid characters, so the text is checked against canonical base64 first.
 *
 * @throws {CodecError} on non-base64 text
 */
export function decodeFromTransport(text: string): Uint8Array {
    if (!isBase64(text)) {
        throw new CodecError(`Payload is not valid base64 (${text.length} chars)`);
    }
    return new Uint8Array(Buffer.from(text, 'base64'));
}

// Linear scan; snapshot payloads run to tens of megabytes.
function isBase64(text: string): boolean {
    if (text.length % 4 !== 0) return false;
    const padding = text.endsWith('==') ? 2 : text.endsWith('=') ? 1 : 0;
    return !NON_BASE64_CHAR.test(text.slice(0, text.length - padding));
}

// =============================================================================
// Typed Array Packing
// =============================================================================

/** Raw little-endian element bytes of a label array. */
export function packLabels(labels: LabelArray): Uint8Array {
    if (labels instanceof Uint8Array) {
        return labels.slice();
    }
    const width = labels instanceof Uint16Array ? 2 : 4;
    const out = new Uint8Array(labels.length * width);
    const view = new DataView(out.buffer);
    for (let i = 0; i < labels.length; i++) {
        if (width === 2) {
            view.setUint16(i * 2, labels[i], true);
        } else {
            view.setUint32(i * 4, labels[i], true);
        }
    }
    return out;
}

/**
 * @throws {CodecError} when the byte count is not a multiple of the element width
 */
export function unpackLabels(bytes: Uint8Array, dataType: LabelDataType): LabelArray {
    const width = bytesPerElement(dataType);
    if (bytes.length % width !== 0) {
        throw new CodecError(`${bytes.length} bytes cannot hold whole ${dataType} elements`);
    }
    const count = bytes.length / width;
    const out = allocateLabels(dataType, count);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    for (let i = 0; i < count; i++) {
        if (width === 1) {
            out[i] = bytes[i];
        } else if (width === 2) {
            out[i] = view.getUint16(i * 2, true);
        } else {
            out[i] = view.getUint32(i * 4, true);
        }
    }
    return out;
}

/** Index triples as little-endian `uint16[N * 3]`. */
export function packIndices(indices: Uint32Array): Uint8Array {
    const out = new Uint8Array(indices.length * 2);
    const view = new DataView(out.buffer);
    for (let i = 0; i < indices.length; i++) {
        const value = indices[i];
        if (value > MAX_WIRE_INDEX) {
            throw new CodecError(`Index ${value} exceeds the uint16 wire range`);
        }
        view.setUint16(i * 2, value, true);
    }
    return out;
}

/**
 * @throws {CodecError} when the bytes do not form whole `(z, y, x)` triples
 */
export function unpackIndices(bytes: Uint8Array): Uint32Array {
    if (bytes.length % 6 !== 0) {
        throw new CodecError(`${bytes.length} bytes do not form whole uint16 index triples`);
    }
    const count = bytes.length / 2;
    const out = new Uint32Array(count);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    for (let i = 0; i < count; i++) {
        out[i] = view.getUint16(i * 2, true);
    }
    return out;
}

