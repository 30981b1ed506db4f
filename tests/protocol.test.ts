import { describe, it, expect } from 'vitest';
import { compress, encodeForTransport, packIndices, packLabels } from '../src/codec';
import { CodecError, ProtocolError } from '../src/errors';
import {
    MsgType,
    decodeDelta,
    decodeFullSnapshot,
    encodeDelta,
    encodeFullSnapshot,
    encodeJoin,
    encodePing,
    serializeMessage,
    type SnapshotPayload,
} from '../src/protocol';
import type { Delta } from '../src/types';
import { parseMessage, truncate } from '../src/validation';
import { VolumeBuffer } from '../src/volume/VolumeBuffer';

const singleChange: Delta = {
    indices: Uint32Array.from([0, 0, 0]),
    values: Uint32Array.from([1]),
    sourceDimensions: [2, 2, 2],
    spacing: [1, 1, 1],
    origin: [0, 0, 0],
    dataType: 'uint16',
    timestamp: 1700000000000,
};

describe('protocol', () => {
    describe('encoders', () => {
        it('builds join and ping frames', () => {
            expect(serializeMessage(encodeJoin('alice', 5))).toBe('{"type":"join","userId":"alice","timestamp":5}');
            expect(serializeMessage(encodePing(6))).toBe('{"type":"ping","timestamp":6}');
        });

        it('builds a delta frame', () => {
            const message = encodeDelta('alice', singleChange);

            expect(message.type).toBe(MsgType.Delta);
            expect(message.userId).toBe('alice');
            expect(message.timestamp).toBe(1700000000000);
            expect(message.data.numChanges).toBe(1);
            expect(message.data.dimensions).toEqual([2, 2, 2]);
            expect(message.data.dataType).toBe('uint16');
            expect(message.data.indices).toBe(encodeForTransport(compress(new Uint8Array(6))));
            expect(message.data.values).toBe(encodeForTransport(compress(new Uint8Array([1, 0]))));
        });

        it('builds a full snapshot frame', () => {
            const volume = VolumeBuffer.create({
                dimensions: [1, 1, 2],
                labels: new Uint8Array([3, 4]),
                spacing: [2, 1, 1],
                segmentNames: { 3: 'liver' },
            });
            const message = encodeFullSnapshot('bob', volume, 9);

            expect(message.timestamp).toBe(9);
            expect(message.data.imageData).toBe(encodeForTransport(compress(new Uint8Array([3, 4]))));
            expect(message.data.dataType).toBe('uint8');
            expect(message.data.spacing).toEqual([2, 1, 1]);
            expect(message.data.segmentNames).toEqual({ '3': 'liver' });
        });

        it('omits segment names when there are none', () => {
            const message = encodeFullSnapshot('bob', VolumeBuffer.create({ dimensions: [1, 1, 1] }));
            expect('segmentNames' in message.data).toBe(false);
        });
    });

    describe('decoders', () => {
        it('recovers a delta from its wire form', () => {
            const parsed = parseMessage(serializeMessage(encodeDelta('alice', singleChange)));
            if (parsed.type !== MsgType.Delta) throw new Error(`expected delta, got ${parsed.type}`);

            const decoded = decodeDelta(parsed);
            expect(Array.from(decoded.indices)).toEqual([0, 0, 0]);
            expect(Array.from(decoded.values)).toEqual([1]);
            expect(decoded.sourceDimensions).toEqual([2, 2, 2]);
            expect(decoded.timestamp).toBe(1700000000000);
        });

        it('recovers a full snapshot from its wire form', () => {
            const volume = VolumeBuffer.create({ dimensions: [1, 2, 1], labels: new Uint32Array([70000, 2]) });
            const parsed = parseMessage(serializeMessage(encodeFullSnapshot('bob', volume, 1)));
            if (parsed.type !== MsgType.FullSnapshot) throw new Error(`expected full_snapshot, got ${parsed.type}`);

            const snapshot = decodeFullSnapshot(parsed);
            expect(snapshot.labels).toBeInstanceOf(Uint32Array);
            expect(Array.from(snapshot.labels)).toEqual([70000, 2]);
            expect(snapshot.dimensions).toEqual([1, 2, 1]);
            expect(snapshot.segmentNames.size).toBe(0);
        });

        it('recovers a busy full-size snapshot', () => {
            const labels = new Uint16Array(64 * 256 * 256);
            let seed = 12345;
            for (let i = 0; i < labels.length; i++) {
                seed = (Math.imul(seed, 1103515245) + 12345) >>> 0;
                labels[i] = seed >>> 16;
            }
            const volume = VolumeBuffer.create({ dimensions: [64, 256, 256], labels });

            const parsed = parseMessage(serializeMessage(encodeFullSnapshot('bob', volume, 1)));
            if (parsed.type !== MsgType.FullSnapshot) throw new Error(`expected full_snapshot, got ${parsed.type}`);

            const snapshot = decodeFullSnapshot(parsed);
            expect(snapshot.dimensions).toEqual([64, 256, 256]);
            expect(snapshot.labels.length).toBe(labels.length);
            expect(snapshot.labels[0]).toBe(labels[0]);
            expect(snapshot.labels[labels.length - 1]).toBe(labels[labels.length - 1]);
            expect(Buffer.from(packLabels(snapshot.labels)).equals(Buffer.from(packLabels(labels)))).toBe(true);
        }, 30000);

        it('rejects a delta whose counts disagree with numChanges', () => {
            const data = {
                ...encodeDelta('alice', singleChange).data,
                numChanges: 2,
            };
            expect(() => decodeDelta({ timestamp: 0, data })).toThrow(CodecError);
        });

        it('rejects corrupt payload text', () => {
            const data = { ...encodeDelta('alice', singleChange).data, values: '@@@@' };
            expect(() => decodeDelta({ timestamp: 0, data })).toThrow(CodecError);
        });

        it('rejects a snapshot whose voxel count disagrees with its dimensions', () => {
            const data: SnapshotPayload = {
                imageData: encodeForTransport(compress(packLabels(new Uint16Array(3)))),
                dimensions: [2, 2, 1],
                spacing: [1, 1, 1],
                origin: [0, 0, 0],
                dataType: 'uint16',
            };
            expect(() => decodeFullSnapshot({ timestamp: 0, data })).toThrow(
                'Snapshot carries 3 voxels but dimensions [2, 2, 1] need 4'
            );
        });

        it('keeps only integer segment name keys', () => {
            const data: SnapshotPayload = {
                imageData: encodeForTransport(compress(packLabels(new Uint16Array(1)))),
                dimensions: [1, 1, 1],
                spacing: [1, 1, 1],
                origin: [0, 0, 0],
                dataType: 'uint16',
                segmentNames: { '1': 'liver', other: 'ignored', '-2': 'ignored' },
            };
            const snapshot = decodeFullSnapshot({ timestamp: 0, data });
            expect(Array.from(snapshot.segmentNames.entries())).toEqual([[1, 'liver']]);
        });
    });
});

describe('parseMessage', () => {
    it('rejects text that is not JSON', () => {
        expect(() => parseMessage('not json')).toThrow(ProtocolError);
        expect(() => parseMessage('not json')).toThrow(/^Failed to parse message as JSON/);
    });

    it('rejects JSON that is not an object', () => {
        expect(() => parseMessage('[1, 2]')).toThrow('Message is not a JSON object');
    });

    it('rejects unknown tags', () => {
        expect(() => parseMessage('{"type":"cursor","userId":"a"}')).toThrow('Unknown message type: cursor');
        expect(() => parseMessage('{"userId":"a"}')).toThrow('Unknown message type: undefined');
    });

    it('rejects frames missing required fields', () => {
        expect(() => parseMessage('{"type":"delta","userId":"a","timestamp":1}')).toThrow(
            'Validation failed for delta: data: Required'
        );
    });

    it('keeps the raw frame on the error', () => {
        try {
            parseMessage('{"type":"nope"}');
            throw new Error('expected parseMessage to throw');
        } catch (e) {
            expect(e).toBeInstanceOf(ProtocolError);
            if (e instanceof ProtocolError) {
                expect(e.rawMessage).toBe('{"type":"nope"}');
                expect(e.code).toBe('PROTOCOL_ERROR');
            }
        }
    });

    it('accepts the legacy snapshot tag and username field', () => {
        const legacy = JSON.stringify({
            type: 'segmentation_update',
            username: 'carol',
            timestamp: 1,
            data: {
                imageData: encodeForTransport(compress(packLabels(new Uint16Array(1)))),
                dimensions: [1, 1, 1],
                spacing: [1, 1, 1],
                origin: [0, 0, 0],
                dataType: 'uint16',
            },
        });
        const parsed = parseMessage(legacy);
        expect(parsed.type).toBe(MsgType.FullSnapshot);
        if (parsed.type === MsgType.FullSnapshot) {
            expect(parsed.userId).toBe('carol');
        }
    });

    it('normalises ISO timestamps to epoch milliseconds', () => {
        const parsed = parseMessage('{"type":"join","userId":"a","timestamp":"2024-01-01T00:00:00Z"}');
        expect(parsed.timestamp).toBe(1704067200000);
    });

    it('honours the offset of an ISO timestamp', () => {
        const parsed = parseMessage('{"type":"join","userId":"a","timestamp":"2024-01-01T00:00:00+01:00"}');
        expect(parsed.timestamp).toBe(1704063600000);
    });

    it('reads ISO timestamps without an offset as UTC', () => {
        expect(parseMessage('{"type":"join","userId":"a","timestamp":"2024-01-01T00:00:00"}').timestamp).toBe(
            1704067200000
        );
        expect(parseMessage('{"type":"join","userId":"a","timestamp":"2024-01-01T00:00:00.250"}').timestamp).toBe(
            1704067200250
        );
    });

    describe('legacy snapshots', () => {
        function legacyFrame(voxels: Uint8Array, data: Record<string, unknown>): string {
            return JSON.stringify({
                type: 'segmentation_update',
                userId: 'carol',
                timestamp: 1700000000000,
                data: { imageData: encodeForTransport(compress(voxels)), ...data },
            });
        }

        it('reorders x-first geometry to z, y, x', () => {
            const parsed = parseMessage(legacyFrame(new Uint8Array([1, 2, 3, 4, 5, 6]), {
                dimensions: [3, 2, 1],
                spacing: [0.5, 0.75, 2.5],
                origin: [10, 20, 30],
                dataType: 'uint8',
            }));
            if (parsed.type !== MsgType.FullSnapshot) throw new Error(`expected full_snapshot, got ${parsed.type}`);

            const snapshot = decodeFullSnapshot(parsed);
            expect(snapshot.dimensions).toEqual([1, 2, 3]);
            expect(snapshot.spacing).toEqual([2.5, 0.75, 0.5]);
            expect(snapshot.origin).toEqual([30, 20, 10]);

            const volume = VolumeBuffer.create({ dimensions: snapshot.dimensions, labels: snapshot.labels });
            expect(volume.labelAt(0, 0, 2)).toBe(3);
            expect(volume.labelAt(0, 1, 0)).toBe(4);
            expect(volume.labelAt(0, 1, 2)).toBe(6);
        });

        it('reads signed label maps as the unsigned type of the same width', () => {
            const parsed = parseMessage(legacyFrame(new Uint8Array([0, 0, 7, 0]), {
                dimensions: [2, 1, 1],
                spacing: [1, 1, 1],
                origin: [0, 0, 0],
                dataType: 'int16',
            }));
            if (parsed.type !== MsgType.FullSnapshot) throw new Error(`expected full_snapshot, got ${parsed.type}`);

            const snapshot = decodeFullSnapshot(parsed);
            expect(snapshot.dataType).toBe('uint16');
            expect(snapshot.labels).toBeInstanceOf(Uint16Array);
            expect(Array.from(snapshot.labels)).toEqual([0, 7]);
            expect(snapshot.dimensions).toEqual([1, 1, 2]);
        });

        it('still rejects element types with no label counterpart', () => {
            const frame = legacyFrame(new Uint8Array(4), {
                dimensions: [1, 1, 1],
                spacing: [1, 1, 1],
                origin: [0, 0, 0],
                dataType: 'float32',
            });
            expect(() => parseMessage(frame)).toThrow(/^Validation failed for full_snapshot: data\.dataType/);
        });

        it('leaves the geometry of current snapshots as sent', () => {
            const parsed = parseMessage(JSON.stringify({
                type: 'full_snapshot',
                userId: 'dave',
                timestamp: 1,
                data: { imageData: '', dimensions: [1, 2, 3], spacing: [1, 2, 3], origin: [4, 5, 6], dataType: 'uint8' },
            }));
            if (parsed.type !== MsgType.FullSnapshot) throw new Error(`expected full_snapshot, got ${parsed.type}`);
            expect(parsed.data.dimensions).toEqual([1, 2, 3]);
            expect(parsed.data.origin).toEqual([4, 5, 6]);
        });
    });

    it('parses presence and server frames', () => {
        expect(parseMessage('{"type":"user_list","users":["a","b"]}')).toEqual({ type: 'user_list', users: ['a', 'b'] });
        expect(parseMessage('{"type":"user_joined","userId":"b","totalUsers":2}')).toEqual({
            type: 'user_joined',
            userId: 'b',
            totalUsers: 2,
        });
        expect(parseMessage('{"type":"error","message":"room full"}')).toEqual({ type: 'error', message: 'room full' });
        expect(parseMessage('{"type":"session_ended"}')).toEqual({ type: 'session_ended' });
    });

    it('rejects a delta with an unsupported element type', () => {
        const frame = JSON.stringify({
            type: 'delta',
            userId: 'a',
            timestamp: 1,
            data: {
                indices: encodeForTransport(compress(packIndices(new Uint32Array(3)))),
                values: '',
                numChanges: 1,
                dimensions: [1, 1, 1],
                spacing: [1, 1, 1],
                origin: [0, 0, 0],
                dataType: 'float32',
            },
        });
        expect(() => parseMessage(frame)).toThrow(/^Validation failed for delta: data\.dataType/);
    });
});

describe('truncate', () => {
    it('leaves short strings alone', () => {
        expect(truncate('abc', 5)).toBe('abc');
    });

    it('notes how much was cut', () => {
        expect(truncate('abcdefgh', 5)).toBe('abcde... (3 more chars)');
    });
});
