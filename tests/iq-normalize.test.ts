import { normalizeChannels, normalizeInterleaved, sliceSamples } from '../src/iq/normalize.js';

describe('normalize', () => {
    it('scales interleaved I/Q pairs', () => {
        const buffer = normalizeInterleaved([1, 2, 3, 4], 0.5);
        expect(buffer.length).toBe(2);
        expect(Array.from(buffer.iq)).toEqual([0.5, 1, 1.5, 2]);
    });

    it('swaps Q/I pairs into I/Q order', () => {
        const buffer = normalizeInterleaved([1, 2, 3, 4], 2, 'qi');
        expect(Array.from(buffer.iq)).toEqual([4, 2, 8, 6]);
    });

    it('ignores a trailing unpaired value', () => {
        expect(normalizeInterleaved([1, 2, 3], 1).length).toBe(1);
    });

    it('interleaves separate channels up to the shorter one', () => {
        const buffer = normalizeChannels([1, 2, 3], [4, 5], 0.5);
        expect(buffer.length).toBe(2);
        expect(Array.from(buffer.iq)).toEqual([0.5, 2, 1, 2.5]);
    });

    it('slices whole samples', () => {
        const buffer = normalizeInterleaved([1, -1, 2, -2, 3, -3], 1);
        const slice = sliceSamples(buffer, 1, 2);
        expect(slice.length).toBe(2);
        expect(Array.from(slice.iq)).toEqual([2, -2, 3, -3]);
    });
});
