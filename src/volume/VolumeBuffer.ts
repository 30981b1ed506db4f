/**
 * @file VolumeBuffer.ts
 * @brief The local 3-D label volume and its geometry.
 *
 * A VolumeBuffer is owned by exactly one SyncSession. It is mutated either by
 * the host applying local edits (`setLabelAt`, or writing `labels` directly)
 * or by the Reconciler applying remote payloads. Label 0 means "unlabeled".
 *
 * @example
 * ```typescript
 * const volume = VolumeBuffer.create({ dimensions: [64, 256, 256] });
 * volume.setLabelAt(10, 128, 128, 3);
 * volume.labelAt(10, 128, 128); // 3
 * ```
 */

import { ConfigurationError, GeometryMismatchError } from '../errors';
import type { Dimensions, LabelArray, LabelDataType, SegmentNames, Vec3 } from '../types';
import { allocateLabels, dataTypeOf, maxLabelFor } from './labels';
import { resampleLabels, sameDimensions } from './resample';

export interface VolumeInit {
    dimensions: Dimensions;
    spacing?: Vec3;
    origin?: Vec3;
    /** Element type for a freshly allocated volume (default `uint16`). Ignored when `labels` is given. */
    dataType?: LabelDataType;
    labels?: LabelArray;
    segmentNames?: SegmentNames | Record<number, string>;
}

const UNIT_SPACING: Vec3 = [1, 1, 1];
const ZERO_ORIGIN: Vec3 = [0, 0, 0];

export class VolumeBuffer {
    private _dimensions: Dimensions;
    private _labels: LabelArray;
    public spacing: Vec3;
    public origin: Vec3;
    public readonly segmentNames: SegmentNames;

    private constructor(dimensions: Dimensions, labels: LabelArray, spacing: Vec3, origin: Vec3, segmentNames: SegmentNames) {
        this._dimensions = dimensions;
        this._labels = labels;
        this.spacing = spacing;
        this.origin = origin;
        this.segmentNames = segmentNames;
    }

    /**
     * Validates the geometry and builds a buffer. Without `labels` the volume
     * starts fully unlabeled.
     *
     * @throws {ConfigurationError} on non-integer or non-positive dimensions
     * @throws {GeometryMismatchError} when `labels.length` is not `z * y * x`
     */
    static create(init: VolumeInit): VolumeBuffer {
        const dimensions = validateDimensions(init.dimensions);
        const expected = dimensions[0] * dimensions[1] * dimensions[2];
        const labels = init.labels ?? allocateLabels(init.dataType ?? 'uint16', expected);

        if (labels.length !== expected) {
            throw new GeometryMismatchError(
                `Label array holds ${labels.length} voxels but dimensions [${dimensions.join(', ')}] need ${expected}`,
                expected,
                labels.length
            );
        }

        return new VolumeBuffer(
            dimensions,
            labels,
            init.spacing ?? UNIT_SPACING,
            init.origin ?? ZERO_ORIGIN,
            toSegmentNames(init.segmentNames)
        );
    }

    get dimensions(): Dimensions {
        return this._dimensions;
    }

    /** Flat label storage, x fastest: `(z * Y + y) * X + x`. */
    get labels(): LabelArray {
        return this._labels;
    }

    get dataType(): LabelDataType {
        return dataTypeOf(this._labels);
    }

    get voxelCount(): number {
        return this._labels.length;
    }

    contains(z: number, y: number, x: number): boolean {
        const [dz, dy, dx] = this._dimensions;
        return Number.isInteger(z) && Number.isInteger(y) && Number.isInteger(x)
            && z >= 0 && z < dz && y >= 0 && y < dy && x >= 0 && x < dx;
    }

    flatIndex(z: number, y: number, x: number): number {
        if (!this.contains(z, y, x)) {
            throw new RangeError(`Voxel (${z}, ${y}, ${x}) is outside [${this._dimensions.join(', ')}]`);
        }
        return (z * this._dimensions[1] + y) * this._dimensions[2] + x;
    }

    coordsOf(flat: number): [number, number, number] {
        const [, dy, dx] = this._dimensions;
        const x = flat % dx;
        const rest = (flat - x) / dx;
        const y = rest % dy;
        return [(rest - y) / dy, y, x];
    }

    labelAt(z: number, y: number, x: number): number {
        return this._labels[this.flatIndex(z, y, x)];
    }

    setLabelAt(z: number, y: number, x: number, label: number): void {
        if (!Number.isInteger(label) || label < 0 || label > maxLabelFor(this.dataType)) {
            throw new RangeError(`Label ${label} does not fit ${this.dataType}`);
        }
        this._labels[this.flatIndex(z, y, x)] = label;
    }

    fill(label: number): void {
        this._labels.fill(label);
    }

    /** Deep copy: labels, geometry and segment names. */
    snapshot(): VolumeBuffer {
        return new VolumeBuffer(
            this._dimensions,
            this._labels.slice(),
            this.spacing,
            this.origin,
            new Map(this.segmentNames)
        );
    }

    /** Same dimensions and same label contents. Element type is not compared. */
    equals(other: VolumeBuffer): boolean {
        if (!sameDimensions(this._dimensions, other._dimensions)) return false;
        const a = this._labels;
        const b = other._labels;
        for (let i = 0; i < a.length; i++) {
            if (a[i] !== b[i]) return false;
        }
        return true;
    }

    /** This volume's labels laid out on another grid, nearest-neighbor. */
    resampledLabels(dimensions: Dimensions): LabelArray {
        if (sameDimensions(this._dimensions, dimensions)) {
            return this._labels.slice();
        }
        return resampleLabels(this._labels, this._dimensions, dimensions, this.dataType);
    }

    /**
     * Wholesale replace of labels and geometry. Segment names are merged, not
     * replaced.
     */
    replaceWith(source: {
        dimensions: Dimensions;
        labels: LabelArray;
        spacing: Vec3;
        origin: Vec3;
        segmentNames?: SegmentNames;
    }): void {
        const dimensions = validateDimensions(source.dimensions);
        const expected = dimensions[0] * dimensions[1] * dimensions[2];
        if (source.labels.length !== expected) {
            throw new GeometryMismatchError(
                `Replacement holds ${source.labels.length} voxels but dimensions need ${expected}`,
                expected,
                source.labels.length
            );
        }
        this._dimensions = dimensions;
        this._labels = source.labels;
        this.spacing = source.spacing;
        this.origin = source.origin;
        if (source.segmentNames) {
            this.mergeSegmentNames(source.segmentNames);
        }
    }

    /** Incoming names win for labels present in both; no local name is dropped. */
    mergeSegmentNames(incoming: SegmentNames): void {
        for (const [label, name] of incoming) {
            this.segmentNames.set(label, name);
        }
    }
}

function validateDimensions(dimensions: Dimensions): Dimensions {
    if (dimensions.length !== 3 || !dimensions.every((d) => Number.isInteger(d) && d > 0)) {
        throw new ConfigurationError(`Dimensions must be three positive integers, got [${dimensions.join(', ')}]`);
    }
    return [dimensions[0], dimensions[1], dimensions[2]];
}

function toSegmentNames(names: VolumeInit['segmentNames']): SegmentNames {
    if (!names) return new Map();
    if (names instanceof Map) return new Map(names);
    const map: SegmentNames = new Map();
    for (const [label, name] of Object.entries(names)) {
        map.set(Number(label), name);
    }
    return map;
}
