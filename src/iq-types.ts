/**
 * Shared value types for I/Q capture decoding.
 *
 * @module iq
 */

/** Format identifiers understood by the reader registry. */
export type CaptureFormat = 'iqt' | 'tiq' | 'tcap' | 'tdms' | 'bin' | 'ascii' | 'wav';

/**
 * Acquisition parameters of one capture file. Filled once by a probe and
 * frozen afterwards.
 */
export interface CaptureMetadata {
    /** Center frequency in Hz. */
    centerFrequency: number;
    /** Sampling rate in samples per second. */
    sampleRate: number;
    /** Span in Hz (0 when the instrument does not state it). */
    span: number;
    /** Resolution bandwidth in Hz. */
    resolutionBandwidth: number;
    /** RF attenuation in dB. */
    attenuation: number;
    /** Acquisition bandwidth in Hz. */
    acquisitionBandwidth: number;
    /** Linear factor applied once to raw integer samples. */
    scale: number;
    /** Capture time, as the instrument writes it or ISO 8601 when derived. */
    timestamp: string;
    /** Total number of complex samples in the file. */
    numberSamples: number;
}

/** A windowed read request. All fields are integers; `startFrame` is 1-based. */
export interface WindowRequest {
    frameLength: number;
    frameCount: number;
    startFrame: number;
}

/**
 * Complex samples in physical units.
 * `iq` holds interleaved pairs `[re0, im0, re1, im1, ...]`.
 */
export interface SampleBuffer {
    readonly iq: Float64Array;
    /** Number of complex samples (half of `iq.length`). */
    readonly length: number;
}

export const EMPTY_METADATA: Readonly<CaptureMetadata> = Object.freeze({
    centerFrequency: 0,
    sampleRate: 0,
    span: 0,
    resolutionBandwidth: 0,
    attenuation: 0,
    acquisitionBandwidth: 0,
    scale: 1,
    timestamp: '',
    numberSamples: 0,
});

/** Builds frozen metadata from the fields a reader knows; the rest stay at their empty values. */
export function makeMetadata(fields: Partial<CaptureMetadata>): Readonly<CaptureMetadata> {
    return Object.freeze({ ...EMPTY_METADATA, ...fields });
}
