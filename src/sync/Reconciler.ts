/**
 * @file Reconciler.ts
 * @brief Applies remote deltas and snapshots to the local volume.
 *
 * After every apply the diffing baseline is moved forward, so voxels a peer
 * just supplied are never echoed back to the room by the next local diff.
 */

import { ApplyError } from '../errors';
import type { ApplyReport, Delta, FullSnapshot } from '../types';
import { Logger } from '../utils/Logger';
import { maxLabelFor } from '../volume/labels';
import { mapAxisIndex, sameDimensions } from '../volume/resample';
import type { VolumeBuffer } from '../volume/VolumeBuffer';

/**
 * The slice of session state a reconcile touches. SyncSession shares its own;
 * standalone callers get a private one.
 */
export interface ReconcileState {
    previousSnapshot: VolumeBuffer | null;
    applyingRemote: boolean;
    /** True while local edits are waiting in the debounce window. */
    readonly pendingLocalMutation: boolean;
}

/**
 * Writes `delta` into `target`, remapping indices when the delta was computed
 * against another grid. Indices outside the source grid and values that do
 * not fit the target's element type are skipped; the last write to a voxel wins.
 */
export function writeDelta(target: VolumeBuffer, delta: Delta): ApplyReport {
    const [sz, sy, sx] = delta.sourceDimensions;
    const [lz, ly, lx] = target.dimensions;
    const rescaled = !sameDimensions(delta.sourceDimensions, target.dimensions);
    const maxLabel = maxLabelFor(target.dataType);
    const labels = target.labels;

    const pairs = Math.min(Math.floor(delta.indices.length / 3), delta.values.length);
    let skipped = Math.max(delta.values.length, Math.floor(delta.indices.length / 3)) - pairs;
    let applied = 0;

    for (let n = 0; n < pairs; n++) {
        const z = delta.indices[n * 3];
        const y = delta.indices[n * 3 + 1];
        const x = delta.indices[n * 3 + 2];
        const value = delta.values[n];

        if (z >= sz || y >= sy || x >= sx || value > maxLabel) {
            skipped++;
            continue;
        }

        const tz = rescaled ? mapAxisIndex(z, sz, lz) : z;
        const ty = rescaled ? mapAxisIndex(y, sy, ly) : y;
        const tx = rescaled ? mapAxisIndex(x, sx, lx) : x;
        labels[(tz * ly + ty) * lx + tx] = value;
        applied++;
    }

    const report: ApplyReport = { applied, skipped, rescaled };
    if (skipped > 0) {
        report.error = new ApplyError(`Skipped ${skipped} of ${pairs + skipped} delta entries`, skipped);
    }
    return report;
}

export class Reconciler {
    private readonly state: ReconcileState;
    private readonly logger: Logger;

    constructor(state?: ReconcileState, logger?: Logger) {
        this.state = state ?? { previousSnapshot: null, applyingRemote: false, pendingLocalMutation: false };
        this.logger = logger ?? new Logger('SegSync:Reconciler');
    }

    get baseline(): VolumeBuffer | null {
        return this.state.previousSnapshot;
    }

    get applyingRemote(): boolean {
        return this.state.applyingRemote;
    }

    applyDelta(local: VolumeBuffer, delta: Delta): ApplyReport {
        return this.guarded(() => {
            const report = writeDelta(local, delta);
            if (report.rescaled) {
                this.logger.debug(
                    `Delta from [${delta.sourceDimensions.join(', ')}] remapped onto [${local.dimensions.join(', ')}]`
                );
            }
            if (report.error) {
                this.logger.warn(report.error.message);
            }

            const baseline = this.state.previousSnapshot;
            if (this.state.pendingLocalMutation && baseline && sameDimensions(baseline.dimensions, local.dimensions)) {
                // Keep unsent local edits visible to the next diff.
                writeDelta(baseline, delta);
            } else {
                this.state.previousSnapshot = local.snapshot();
            }
            return report;
        });
    }

    /**
     * Wholesale replace of labels and geometry. Segment names known locally
     * survive even when the snapshot omits them.
     */
    applyFull(local: VolumeBuffer, snapshot: FullSnapshot): ApplyReport {
        return this.guarded(() => {
            local.replaceWith({
                dimensions: snapshot.dimensions,
                labels: snapshot.labels.slice(),
                spacing: snapshot.spacing,
                origin: snapshot.origin,
                segmentNames: snapshot.segmentNames,
            });
            this.state.previousSnapshot = local.snapshot();
            return { applied: local.voxelCount, skipped: 0, rescaled: false };
        });
    }

    private guarded<T>(apply: () => T): T {
        const previous = this.state.applyingRemote;
        this.state.applyingRemote = true;
        try {
            return apply();
        } finally {
            this.state.applyingRemote = previous;
        }
    }
}
