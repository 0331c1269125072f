import type { SampleBuffer, WindowRequest } from '../../iq-types.js';
import { makeMetadata } from '../../iq-types.js';
import { MalformedMetadataError, ProbeBudgetExceededError, StructuralMismatchError } from '../errors.js';
import type { FileSource } from '../file-source.js';
import { normalizeChannels } from '../normalize.js';
import { CaptureReader } from '../reader.js';
import { RecordBoundaryTracker } from '../tdms/record-boundary.js';
import { TdmsStream } from '../tdms/segment.js';
import { TDMS_DEFAULTS } from '../types.js';
import type { IqReaderOptions, ProbeResult, TdmsGeometry, TdmsOptions } from '../types.js';
import { addressWindow } from '../window.js';

export const TDMS_ROOT = '/';
export const TDMS_I_CHANNEL = "/'RecordData'/'I'";
export const TDMS_Q_CHANNEL = "/'RecordData'/'Q'";
export const TDMS_GAIN_CHANNEL = "/'RecordHeader'/'gain'";

/** Root properties the reader relies on; the first name listed is the one the instrument writes. */
const ROOT_FIELDS = {
    sampleRate: ['IQRate'],
    attenuation: ['RFAttentuation', 'RFAttenuation'],
    centerFrequency: ['IQCarrierFrequency'],
    samplesPerRecord: ['NSamplesPerRecord'],
    recordsPerFile: ['NRecordsPerFile'],
} as const;

function rootNumber(stream: TdmsStream, names: readonly string[]): number {
    for (const name of names) {
        const value = stream.property(TDMS_ROOT, name);
        if (value === undefined) continue;
        const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
        if (!Number.isFinite(parsed) || (typeof value === 'string' && value.trim() === '')) {
            throw new MalformedMetadataError(`Root property ${name} is not numeric: ${String(value)}`, name, 'tdms');
        }
        return parsed;
    }
    throw new MalformedMetadataError(`Root property ${names[0]} is missing`, names[0], 'tdms');
}

function rootCount(stream: TdmsStream, names: readonly string[]): number {
    const value = rootNumber(stream, names);
    if (!Number.isSafeInteger(value) || value <= 0) {
        throw new MalformedMetadataError(`Root property ${names[0]} is not a positive count: ${value}`, names[0], 'tdms');
    }
    return value;
}

/**
 * Segmented token-stream captures. Record boundaries are learned by a
 * bounded probe over the first two records; later windows parse the first
 * record and then seek straight to the records they need.
 */
export class TdmsReader extends CaptureReader<TdmsGeometry> {
    readonly format = 'tdms' as const;
    private readonly tdms: Required<TdmsOptions>;

    constructor(filename: string, options: IqReaderOptions = {}) {
        super(filename, options);
        this.tdms = { ...TDMS_DEFAULTS, ...options.tdms };
    }

    protected async probeFile(file: FileSource): Promise<ProbeResult<TdmsGeometry>> {
        const stream = new TdmsStream(file);
        const tracker = new RecordBoundaryTracker();
        let position = 0;
        let segments = 0;

        while (position < file.size && !tracker.complete) {
            if (segments >= this.tdms.maxProbeSegments || position >= this.tdms.maxProbeBytes) {
                throw new ProbeBudgetExceededError(
                    `No record stride after ${segments} segments (${position} bytes)`,
                    this.format
                );
            }
            position = await stream.readSegment(position);
            segments++;
            tracker.observe({
                offset: position,
                lastI: stream.channel(TDMS_I_CHANNEL)?.last(),
                lastQ: stream.channel(TDMS_Q_CHANNEL)?.last(),
            });
        }

        const samplesPerRecord = rootCount(stream, ROOT_FIELDS.samplesPerRecord);
        const recordsPerFile = rootCount(stream, ROOT_FIELDS.recordsPerFile);
        const firstRecordEnd = tracker.firstRecordEnd;
        if (firstRecordEnd === null) {
            throw new StructuralMismatchError('No I/Q record data found', this.format);
        }
        let otherRecordSize = tracker.otherRecordSize;
        if (otherRecordSize === null) {
            if (recordsPerFile > 1) {
                throw new StructuralMismatchError(`Found one record, header declares ${recordsPerFile}`, this.format);
            }
            otherRecordSize = 0;
        }
        const lastRecordEnd = firstRecordEnd + (recordsPerFile - 1) * otherRecordSize;
        if (lastRecordEnd > file.size) {
            throw new StructuralMismatchError(
                `${recordsPerFile} records of ${otherRecordSize} bytes need ${lastRecordEnd} bytes, file holds ${file.size}`,
                this.format
            );
        }

        const gain = stream.channel(TDMS_GAIN_CHANNEL);
        const scale = gain?.toFloat64Array()[0];
        if (scale === undefined) {
            throw new MalformedMetadataError('Record header has no gain value', TDMS_GAIN_CHANNEL, this.format);
        }

        const metadata = makeMetadata({
            sampleRate: rootNumber(stream, ROOT_FIELDS.sampleRate),
            attenuation: rootNumber(stream, ROOT_FIELDS.attenuation),
            centerFrequency: rootNumber(stream, ROOT_FIELDS.centerFrequency),
            numberSamples: samplesPerRecord * recordsPerFile,
            scale,
            timestamp: file.changedAt.toISOString(),
        });
        this.logger?.info?.(
            `[tdms] ${recordsPerFile} records of ${samplesPerRecord} samples, first record ends at ${firstRecordEnd}, stride ${otherRecordSize} (${segments} segments probed)`
        );

        return {
            format: this.format,
            metadata,
            geometry: { kind: 'tdms', samplesPerRecord, recordsPerFile, firstRecordEnd, otherRecordSize },
        };
    }

    protected async readWindow(file: FileSource, probe: ProbeResult<TdmsGeometry>, request: WindowRequest): Promise<SampleBuffer> {
        const { geometry, metadata } = probe;
        // record r (0-based) ends at firstRecordEnd + r * otherRecordSize
        const address = addressWindow(request, {
            samplesPerUnit: geometry.samplesPerRecord,
            unitsPerFile: geometry.recordsPerFile,
            unitBytes: geometry.otherRecordSize,
            dataOffset: geometry.firstRecordEnd - geometry.otherRecordSize,
        }, this.format);

        const startRecord = address.startUnit + 1;
        const stopOffset = address.byteEnd;

        // The first record is always parsed: it defines the objects every later segment reuses.
        const stream = new TdmsStream(file);
        let position = 0;
        while (position < stopOffset) {
            if (startRecord > 1 && position === geometry.firstRecordEnd) {
                position += (startRecord - 2) * geometry.otherRecordSize;
                this.logger?.debug?.(`[tdms] end of first record, jumping to ${position}`);
            }
            position = await stream.readSegment(position);
        }

        const i = stream.channel(TDMS_I_CHANNEL)?.toFloat64Array();
        const q = stream.channel(TDMS_Q_CHANNEL)?.toFloat64Array();
        if (!i || !q) {
            throw new StructuralMismatchError('Window holds no I/Q record data', this.format);
        }

        // drop the first record when it is not part of the window
        const begin = (startRecord > 1 ? geometry.samplesPerRecord : 0) + address.intraUnitOffset;
        const end = begin + address.sampleCount;
        if (i.length < end || q.length < end) {
            throw new StructuralMismatchError(
                `Records ${startRecord}..${startRecord + address.unitsNeeded - 1} hold ${Math.min(i.length, q.length)} samples, needed ${end}`,
                this.format
            );
        }
        return normalizeChannels(i.subarray(begin, end), q.subarray(begin, end), metadata.scale);
    }
}
