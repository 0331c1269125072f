import type { CaptureFormat, WindowRequest } from '../iq-types.js';
import { WindowRangeError } from './errors.js';

/** Storage units of one file: frames, blocks, records or single samples. */
export interface UnitGrid {
    samplesPerUnit: number;
    unitsPerFile: number;
    /** Bytes per unit; `byteEnd` counts samples when absent. */
    unitBytes?: number;
    /** File offset of unit 0. */
    dataOffset?: number;
}

export interface WindowAddress {
    /** First sample of the window, 0-based. */
    startSample: number;
    /** Samples in the window (N * L). */
    sampleCount: number;
    /** 0-based index of the first unit touched. */
    startUnit: number;
    /** Sample offset of the window inside `startUnit`. */
    intraUnitOffset: number;
    /** Units to fetch, starting at `startUnit`. */
    unitsNeeded: number;
    /** Absolute end (exclusive) of the last unit fetched. */
    byteEnd: number;
}

export function validateWindowRequest(request: WindowRequest, format: CaptureFormat | null = null): void {
    const { frameLength, frameCount, startFrame } = request;
    if (!Number.isSafeInteger(frameLength) || frameLength <= 0) {
        throw new WindowRangeError(`Frame length must be a positive integer, got ${frameLength}`, request, format);
    }
    if (!Number.isSafeInteger(frameCount) || frameCount <= 0) {
        throw new WindowRangeError(`Frame count must be a positive integer, got ${frameCount}`, request, format);
    }
    if (!Number.isSafeInteger(startFrame) || startFrame < 1) {
        throw new WindowRangeError(`Start frame is 1-based, got ${startFrame}`, request, format);
    }
}

/**
 * Maps a `(L, N, S)` request onto a unit grid.
 *
 * `unitsNeeded` is the ceiling of the covered span, so a window that ends
 * exactly on a unit boundary does not pull in the following unit.
 */
export function addressWindow(request: WindowRequest, grid: UnitGrid, format: CaptureFormat | null = null): WindowAddress {
    validateWindowRequest(request, format);
    const { samplesPerUnit, unitsPerFile } = grid;
    if (!Number.isSafeInteger(samplesPerUnit) || samplesPerUnit <= 0) {
        throw new WindowRangeError(`Unit grid has no samples per unit (${samplesPerUnit})`, request, format);
    }

    const startSample = (request.startFrame - 1) * request.frameLength;
    const sampleCount = request.frameCount * request.frameLength;
    const startUnit = Math.floor(startSample / samplesPerUnit);
    const intraUnitOffset = startSample % samplesPerUnit;
    const unitsNeeded = Math.ceil((intraUnitOffset + sampleCount) / samplesPerUnit);

    if (startUnit + unitsNeeded > unitsPerFile) {
        throw new WindowRangeError(
            `Window of ${sampleCount} samples at sample ${startSample} needs units ${startUnit}..${startUnit + unitsNeeded - 1}, file has ${unitsPerFile}`,
            request,
            format
        );
    }

    const byteEnd = (grid.dataOffset ?? 0) + (startUnit + unitsNeeded) * (grid.unitBytes ?? samplesPerUnit);
    return { startSample, sampleCount, startUnit, intraUnitOffset, unitsNeeded, byteEnd };
}

/** Whole frames of length `frameLength` in `numberSamples`. */
export function countFrames(numberSamples: number, frameLength: number): number {
    return frameLength > 0 ? Math.floor(numberSamples / frameLength) : 0;
}
