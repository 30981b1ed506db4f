import { describe, it, expect } from 'vitest';
import { DiffEngine } from '../src/diff/DiffEngine';
import { ApplyError, GeometryMismatchError } from '../src/errors';
import { Reconciler, writeDelta, type ReconcileState } from '../src/sync/Reconciler';
import type { Delta, FullSnapshot } from '../src/types';
import { VolumeBuffer } from '../src/volume/VolumeBuffer';

function delta(sourceDimensions: [number, number, number], indices: number[], values: number[]): Delta {
    return {
        indices: Uint32Array.from(indices),
        values: Uint32Array.from(values),
        sourceDimensions,
        spacing: [1, 1, 1],
        origin: [0, 0, 0],
        dataType: 'uint16',
        timestamp: 0,
    };
}

function state(overrides: Partial<ReconcileState> = {}): ReconcileState {
    return { previousSnapshot: null, applyingRemote: false, pendingLocalMutation: false, ...overrides };
}

describe('writeDelta', () => {
    it('is the inverse of a computed delta', () => {
        const previous = VolumeBuffer.create({ dimensions: [3, 4, 5] });
        for (let i = 0; i < previous.voxelCount; i += 7) previous.labels[i] = 2;
        const current = previous.snapshot();
        current.setLabelAt(0, 0, 0, 1);
        current.setLabelAt(1, 2, 3, 6);
        current.setLabelAt(2, 3, 4, 0);

        const result = new DiffEngine().computeDelta(previous, current);
        if (result.kind !== 'delta') throw new Error(`expected delta, got ${result.kind}`);

        const replica = previous.snapshot();
        const report = writeDelta(replica, result.delta);
        expect(replica.equals(current)).toBe(true);
        expect(report).toEqual({ applied: result.delta.values.length, skipped: 0, rescaled: false });
    });

    it('remaps indices from a finer grid', () => {
        const local = VolumeBuffer.create({ dimensions: [1, 1, 2] });
        // 3 / (4 / 2) = 1.5 -> 2, clamped to 1
        const report = writeDelta(local, delta([1, 1, 4], [0, 0, 3], [9]));
        expect(Array.from(local.labels)).toEqual([0, 9]);
        expect(report.rescaled).toBe(true);
        expect(report.applied).toBe(1);
    });

    it('skips entries outside the source grid and values too wide for the target', () => {
        const local = VolumeBuffer.create({ dimensions: [1, 1, 3], dataType: 'uint8' });
        const report = writeDelta(local, delta([1, 1, 3], [0, 0, 0, 1, 0, 0, 0, 0, 2], [4, 5, 300]));

        expect(Array.from(local.labels)).toEqual([4, 0, 0]);
        expect(report.applied).toBe(1);
        expect(report.skipped).toBe(2);
        expect(report.error).toBeInstanceOf(ApplyError);
        expect(report.error?.skippedCount).toBe(2);
        expect(report.error?.message).toBe('Skipped 2 of 3 delta entries');
    });

    it('lets the last write to a voxel win', () => {
        const local = VolumeBuffer.create({ dimensions: [1, 1, 1] });
        writeDelta(local, delta([1, 1, 1], [0, 0, 0, 0, 0, 0], [3, 8]));
        expect(local.labels[0]).toBe(8);
    });
});

describe('Reconciler', () => {
    describe('applyDelta', () => {
        it('moves the baseline to the new local state', () => {
            const shared = state();
            const reconciler = new Reconciler(shared);
            const local = VolumeBuffer.create({ dimensions: [1, 1, 2] });

            reconciler.applyDelta(local, delta([1, 1, 2], [0, 0, 1], [3]));

            expect(shared.previousSnapshot).not.toBeNull();
            expect(shared.previousSnapshot).not.toBe(local);
            expect(shared.previousSnapshot?.equals(local)).toBe(true);
            expect(reconciler.baseline).toBe(shared.previousSnapshot);
            expect(new DiffEngine().computeDelta(shared.previousSnapshot, local)).toEqual({ kind: 'none' });
        });

        it('keeps unsent local edits visible to the next diff', () => {
            const local = VolumeBuffer.create({ dimensions: [1, 1, 4] });
            const shared = state({ previousSnapshot: local.snapshot(), pendingLocalMutation: true });
            local.setLabelAt(0, 0, 1, 5);

            new Reconciler(shared).applyDelta(local, delta([1, 1, 4], [0, 0, 0], [3]));

            expect(Array.from(local.labels)).toEqual([3, 5, 0, 0]);
            const result = new DiffEngine().computeDelta(shared.previousSnapshot, local);
            if (result.kind !== 'delta') throw new Error(`expected delta, got ${result.kind}`);
            expect(Array.from(result.delta.indices)).toEqual([0, 0, 1]);
            expect(Array.from(result.delta.values)).toEqual([5]);
        });

        it('clears applyingRemote afterwards', () => {
            const shared = state();
            const reconciler = new Reconciler(shared);
            reconciler.applyDelta(VolumeBuffer.create({ dimensions: [1, 1, 1] }), delta([1, 1, 1], [0, 0, 0], [1]));
            expect(shared.applyingRemote).toBe(false);
            expect(reconciler.applyingRemote).toBe(false);
        });
    });

    describe('applyFull', () => {
        const snapshot = (): FullSnapshot => ({
            labels: new Uint16Array([1, 2, 3, 4]),
            dimensions: [1, 2, 2],
            spacing: [3, 1, 1],
            origin: [0, 5, 5],
            dataType: 'uint16',
            segmentNames: new Map([[1, 'liver']]),
            timestamp: 0,
        });

        it('replaces labels and geometry, merging names', () => {
            const shared = state();
            const local = VolumeBuffer.create({ dimensions: [1, 1, 1], segmentNames: { 7: 'tumor' } });
            const incoming = snapshot();

            const report = new Reconciler(shared).applyFull(local, incoming);

            expect(report).toEqual({ applied: 4, skipped: 0, rescaled: false });
            expect(local.dimensions).toEqual([1, 2, 2]);
            expect(Array.from(local.labels)).toEqual([1, 2, 3, 4]);
            expect(local.spacing).toEqual([3, 1, 1]);
            expect(local.segmentNames.get(1)).toBe('liver');
            expect(local.segmentNames.get(7)).toBe('tumor');
            expect(shared.previousSnapshot?.equals(local)).toBe(true);

            incoming.labels[0] = 99;
            expect(local.labels[0]).toBe(1);
        });

        it('restores applyingRemote when the snapshot is rejected', () => {
            const shared = state();
            const broken = { ...snapshot(), labels: new Uint16Array(3) };
            expect(() => new Reconciler(shared).applyFull(VolumeBuffer.create({ dimensions: [1, 1, 1] }), broken))
                .toThrow(GeometryMismatchError);
            expect(shared.applyingRemote).toBe(false);
            expect(shared.previousSnapshot).toBeNull();
        });
    });
});
