import { RecordBoundaryTracker } from '../src/iq/tdms/record-boundary.js';

describe('RecordBoundaryTracker', () => {
    it('learns the first record end and the record stride', () => {
        const tracker = new RecordBoundaryTracker();

        expect(tracker.observe({ offset: 10 })).toBe('scanning-metadata');
        expect(tracker.observe({ offset: 20, lastI: 1, lastQ: -1 })).toBe('boundary-detected');
        expect(tracker.firstRecordEnd).toBe(20);
        expect(tracker.otherRecordSize).toBeNull();

        expect(tracker.observe({ offset: 30, lastI: 1, lastQ: -1 })).toBe('scanning-record');
        // one channel changing is not enough
        expect(tracker.observe({ offset: 35, lastI: 2, lastQ: -1 })).toBe('scanning-record');
        expect(tracker.observe({ offset: 50, lastI: 3, lastQ: -3 })).toBe('boundary-detected');

        expect(tracker.complete).toBe(true);
        expect(tracker.boundaries).toBe(2);
        expect(tracker.otherRecordSize).toBe(30);
    });

    it('ignores observations once complete', () => {
        const tracker = new RecordBoundaryTracker();
        tracker.observe({ offset: 5, lastI: 1, lastQ: 1 });
        tracker.observe({ offset: 9, lastI: 2, lastQ: 2 });
        expect(tracker.observe({ offset: 20, lastI: 7, lastQ: 7 })).toBe('boundary-detected');
        expect(tracker.boundaries).toBe(2);
        expect(tracker.otherRecordSize).toBe(4);
    });

    it('counts a first record whose last values are zero', () => {
        const tracker = new RecordBoundaryTracker();
        expect(tracker.observe({ offset: 12, lastI: 0, lastQ: 0 })).toBe('boundary-detected');
        expect(tracker.firstRecordEnd).toBe(12);
    });
});
