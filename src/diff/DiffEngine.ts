/**
 * @file DiffEngine.ts
 * @brief Decides what a peer needs to hear about since the last baseline.
 *
 * The result is one of three outcomes:
 * - `none`: nothing changed
 * - `delta`: a sparse list of changed voxels
 * - `full`: the whole volume must be sent (no baseline, too many changes, or
 *   a grid too large for `uint16` wire indices)
 */

import { MAX_WIRE_INDEX } from '../codec';
import { DEFAULT_CONFIG } from '../config';
import type { Delta, LabelArray } from '../types';
import { Logger } from '../utils/Logger';
import { sameDimensions } from '../volume/resample';
import type { VolumeBuffer } from '../volume/VolumeBuffer';

export type FullResyncReason = 'no-baseline' | 'threshold' | 'index-overflow';

export type DiffResult =
    | { kind: 'none' }
    | { kind: 'delta'; delta: Delta; changeRatio: number }
    | { kind: 'full'; reason: FullResyncReason; changeRatio?: number };

export interface DiffEngineOptions {
    fullResyncRatio?: number;
    logger?: Logger;
}

export class DiffEngine {
    readonly fullResyncRatio: number;
    private logger: Logger;

    constructor(options: DiffEngineOptions = {}) {
        this.fullResyncRatio = options.fullResyncRatio ?? DEFAULT_CONFIG.fullResyncRatio;
        this.logger = options.logger ?? new Logger('SegSync:Diff');
    }

    /**
     * Compares `current` against the baseline `previous`.
     *
     * A baseline with a different grid is first resampled onto `current`'s
     * grid so both peers keep diffing in the same index space after a resize.
     */
    computeDelta(previous: VolumeBuffer | null, current: VolumeBuffer, now: number = Date.now()): DiffResult {
        if (!previous) {
            return { kind: 'full', reason: 'no-baseline' };
        }

        const dims = current.dimensions;
        let baseline: LabelArray = previous.labels;
        if (!sameDimensions(previous.dimensions, dims)) {
            this.logger.debug(`Baseline [${previous.dimensions.join(', ')}] resampled onto [${dims.join(', ')}]`);
            baseline = previous.resampledLabels(dims);
        }

        const labels = current.labels;
        const total = labels.length;
        const changed: number[] = [];
        for (let i = 0; i < total; i++) {
            if (labels[i] !== baseline[i]) {
                changed.push(i);
            }
        }

        if (changed.length === 0) {
            return { kind: 'none' };
        }

        const changeRatio = changed.length / total;
        if (changeRatio > this.fullResyncRatio) {
            return { kind: 'full', reason: 'threshold', changeRatio };
        }
        if (dims[0] - 1 > MAX_WIRE_INDEX || dims[1] - 1 > MAX_WIRE_INDEX || dims[2] - 1 > MAX_WIRE_INDEX) {
            return { kind: 'full', reason: 'index-overflow', changeRatio };
        }

        const indices = new Uint32Array(changed.length * 3);
        const values = new Uint32Array(changed.length);
        const plane = dims[1] * dims[2];
        const row = dims[2];
        for (let n = 0; n < changed.length; n++) {
            const flat = changed[n];
            const z = Math.floor(flat / plane);
            const rest = flat - z * plane;
            const y = Math.floor(rest / row);
            indices[n * 3] = z;
            indices[n * 3 + 1] = y;
            indices[n * 3 + 2] = rest - y * row;
            values[n] = labels[flat];
        }

        return {
            kind: 'delta',
            changeRatio,
            delta: {
                indices,
                values,
                sourceDimensions: dims,
                spacing: current.spacing,
                origin: current.origin,
                dataType: current.dataType,
                timestamp: now,
            },
        };
    }
}
