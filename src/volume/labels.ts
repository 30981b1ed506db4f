import type { LabelArray, LabelDataType } from '../types';

export const LABEL_DATA_TYPES = ['uint8', 'uint16', 'uint32'] as const satisfies readonly LabelDataType[];

export function bytesPerElement(dataType: LabelDataType): number {
    switch (dataType) {
        case 'uint8': return 1;
        case 'uint16': return 2;
        case 'uint32': return 4;
    }
}

/** Largest label the element type can hold. */
export function maxLabelFor(dataType: LabelDataType): number {
    return 2 ** (8 * bytesPerElement(dataType)) - 1;
}

export function allocateLabels(dataType: LabelDataType, length: number): LabelArray {
    switch (dataType) {
        case 'uint8': return new Uint8Array(length);
        case 'uint16': return new Uint16Array(length);
        case 'uint32': return new Uint32Array(length);
    }
}

export function dataTypeOf(labels: LabelArray): LabelDataType {
    if (labels instanceof Uint8Array) return 'uint8';
    if (labels instanceof Uint16Array) return 'uint16';
    return 'uint32';
}

export function isLabelDataType(value: string): value is LabelDataType {
    return LABEL_DATA_TYPES.some((type) => type === value);
}
