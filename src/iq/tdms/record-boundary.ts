export type BoundaryState = 'scanning-metadata' | 'scanning-record' | 'boundary-detected';

/** What the probe saw after parsing one segment. */
export interface SegmentObservation {
    /** File offset right after the segment. */
    offset: number;
    /** Last value of the I channel so far, if any arrived yet. */
    lastI?: number;
    /** Last value of the Q channel so far. */
    lastQ?: number;
}

/**
 * Learns record geometry from a stream of segment observations.
 *
 * Records are not delimited in the file. A record has been completed when
 * the last I and the last Q value both differ from the ones seen at the
 * previous boundary: the new record's tail has replaced the old one.
 */
export class RecordBoundaryTracker {
    private current: BoundaryState = 'scanning-metadata';
    private lastI: number | undefined;
    private lastQ: number | undefined;
    private readonly offsets: number[] = [];

    /** Boundaries seen so far. */
    get boundaries(): number {
        return this.offsets.length;
    }

    /** True once both the first record end and the stride are known. */
    get complete(): boolean {
        return this.offsets.length >= 2;
    }

    get firstRecordEnd(): number | null {
        return this.offsets[0] ?? null;
    }

    /** Byte distance between the ends of the first and second records. */
    get otherRecordSize(): number | null {
        return this.offsets.length >= 2 ? this.offsets[1] - this.offsets[0] : null;
    }

    observe(observation: SegmentObservation): BoundaryState {
        if (this.complete) return this.current;
        const { offset, lastI, lastQ } = observation;

        if (lastI === undefined || lastQ === undefined) {
            this.current = 'scanning-metadata';
            return this.current;
        }

        const changed = this.lastI === undefined || (lastI !== this.lastI && lastQ !== this.lastQ);

        if (changed) {
            this.offsets.push(offset);
            this.lastI = lastI;
            this.lastQ = lastQ;
            this.current = 'boundary-detected';
        } else {
            this.current = 'scanning-record';
        }
        return this.current;
    }
}
