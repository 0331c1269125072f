import type { SampleBuffer } from '../iq-types.js';

/** Order of the two components inside each stored pair. */
export type PairOrder = 'iq' | 'qi';

export function makeSampleBuffer(iq: Float64Array): SampleBuffer {
    return { iq, length: iq.length >> 1 };
}

/**
 * Turns interleaved integer pairs into scaled complex samples.
 * `qi` pairs are swapped so the output is always `[re, im, ...]`.
 */
export function normalizeInterleaved(values: ArrayLike<number>, scale: number, order: PairOrder = 'iq'): SampleBuffer {
    const count = values.length >> 1;
    const out = new Float64Array(count * 2);
    const re = order === 'iq' ? 0 : 1;
    const im = 1 - re;
    for (let k = 0; k < count; k++) {
        out[2 * k] = values[2 * k + re] * scale;
        out[2 * k + 1] = values[2 * k + im] * scale;
    }
    return makeSampleBuffer(out);
}

/** Interleaves separate I and Q channels into scaled complex samples. */
export function normalizeChannels(i: ArrayLike<number>, q: ArrayLike<number>, scale: number): SampleBuffer {
    const count = Math.min(i.length, q.length);
    const out = new Float64Array(count * 2);
    for (let k = 0; k < count; k++) {
        out[2 * k] = i[k] * scale;
        out[2 * k + 1] = q[k] * scale;
    }
    return makeSampleBuffer(out);
}

/** Copies `count` samples starting at sample `start`. */
export function sliceSamples(buffer: SampleBuffer, start: number, count: number): SampleBuffer {
    return makeSampleBuffer(buffer.iq.slice(2 * start, 2 * (start + count)));
}
