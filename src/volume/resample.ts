/**
 * Nearest-neighbor index mapping between two volume geometries.
 *
 * Used in both directions: the DiffEngine pulls a stale baseline onto the
 * current grid, and the Reconciler pushes delta indices onto the local grid.
 * No interpolation ever happens; labels are categorical.
 */

import type { Dimensions, LabelArray, LabelDataType } from '../types';
import { allocateLabels } from './labels';

/**
 * Maps an index on an axis of length `fromDim` onto an axis of length `toDim`.
 *
 * `scale = fromDim / toDim`, `mapped = round(index / scale)` (half rounds up),
 * clamped into `[0, toDim - 1]`.
 */
export function mapAxisIndex(index: number, fromDim: number, toDim: number): number {
    if (fromDim === toDim) return index;
    const scale = fromDim / toDim;
    const mapped = Math.round(index / scale);
    if (mapped < 0) return 0;
    if (mapped > toDim - 1) return toDim - 1;
    return mapped;
}

/** Precomputed `mapAxisIndex` for every index of the `fromDim` axis. */
export function axisLookup(fromDim: number, toDim: number): Int32Array {
    const table = new Int32Array(fromDim);
    for (let i = 0; i < fromDim; i++) {
        table[i] = mapAxisIndex(i, fromDim, toDim);
    }
    return table;
}

export function sameDimensions(a: Dimensions, b: Dimensions): boolean {
    return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

/**
 * Resamples `labels` laid out on `from` onto a new array laid out on `to`.
 * Each destination voxel takes the label of its nearest source voxel.
 */
export function resampleLabels(
    labels: LabelArray,
    from: Dimensions,
    to: Dimensions,
    dataType: LabelDataType
): LabelArray {
    const [tz, ty, tx] = to;
    const [, fy, fx] = from;
    const out = allocateLabels(dataType, tz * ty * tx);

    // Destination axis -> source axis
    const zMap = axisLookup(tz, from[0]);
    const yMap = axisLookup(ty, fy);
    const xMap = axisLookup(tx, fx);

    let dst = 0;
    for (let z = 0; z < tz; z++) {
        const zBase = zMap[z] * fy;
        for (let y = 0; y < ty; y++) {
            const rowBase = (zBase + yMap[y]) * fx;
            for (let x = 0; x < tx; x++) {
                out[dst++] = labels[rowBase + xMap[x]];
            }
        }
    }
    return out;
}
