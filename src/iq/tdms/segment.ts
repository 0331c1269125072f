import { StructuralMismatchError } from '../errors.js';
import { dataView } from '../file-source.js';
import type { FileSource } from '../file-source.js';

export const TDMS_TAG = new Uint8Array([0x54, 0x44, 0x53, 0x6d]); // "TDSm"
export const TDMS_LEAD_IN_SIZE = 28;

/** Table-of-contents bits of a segment lead-in. */
export const TocFlag = {
    META_DATA: 1 << 1,
    NEW_OBJ_LIST: 1 << 2,
    RAW_DATA: 1 << 3,
    INTERLEAVED_DATA: 1 << 5,
    BIG_ENDIAN: 1 << 6,
    DAQMX_RAW_DATA: 1 << 7,
} as const;

export enum TdmsDataType {
    VOID = 0x00,
    I8 = 0x01,
    I16 = 0x02,
    I32 = 0x03,
    I64 = 0x04,
    U8 = 0x05,
    U16 = 0x06,
    U32 = 0x07,
    U64 = 0x08,
    SGL = 0x09,
    DBL = 0x0a,
    STRING = 0x20,
    BOOLEAN = 0x21,
    TIMESTAMP = 0x44,
}

const NO_RAW_DATA = 0xffffffff;
const SAME_AS_PREVIOUS = 0x00000000;
const DAQMX_FORMAT_CHANGING = 0x69120000;
const DAQMX_DIGITAL_LINE = 0x69130000;
const INCOMPLETE_SEGMENT = 0xffffffffffffffffn;
// 1904-01-01T00:00:00Z
const TDMS_EPOCH_MS = Date.UTC(1904, 0, 1);

const FIXED_SIZES: ReadonlyMap<number, number> = new Map([
    [TdmsDataType.I8, 1], [TdmsDataType.U8, 1], [TdmsDataType.BOOLEAN, 1],
    [TdmsDataType.I16, 2], [TdmsDataType.U16, 2],
    [TdmsDataType.I32, 4], [TdmsDataType.U32, 4], [TdmsDataType.SGL, 4],
    [TdmsDataType.I64, 8], [TdmsDataType.U64, 8], [TdmsDataType.DBL, 8],
    [TdmsDataType.TIMESTAMP, 16],
]);

export type TdmsValue = number | string | boolean | Date;

/** Per-segment layout of one channel's raw data. */
export interface RawDataIndex {
    dataType: number;
    /** Values per chunk. */
    count: number;
    /** Bytes per chunk. */
    totalSize: number;
}

export interface TdmsObject {
    path: string;
    properties: Map<string, TdmsValue>;
    index: RawDataIndex | null;
}

export interface LeadIn {
    toc: number;
    version: number;
    littleEndian: boolean;
    /** File offset of the next segment. */
    segmentEnd: number;
    /** File offset of this segment's raw data. */
    rawStart: number;
}

/** Growable numeric channel. */
export class ChannelData {
    private chunks: Float64Array[] = [];
    private total = 0;

    get length(): number {
        return this.total;
    }

    push(values: Float64Array): void {
        if (values.length === 0) return;
        this.chunks.push(values);
        this.total += values.length;
    }

    last(): number | undefined {
        const chunk = this.chunks[this.chunks.length - 1];
        return chunk ? chunk[chunk.length - 1] : undefined;
    }

    toFloat64Array(): Float64Array {
        if (this.chunks.length === 1) return this.chunks[0];
        const out = new Float64Array(this.total);
        let offset = 0;
        for (const chunk of this.chunks) {
            out.set(chunk, offset);
            offset += chunk.length;
        }
        this.chunks = [out];
        return out;
    }
}

function structural(message: string): StructuralMismatchError {
    return new StructuralMismatchError(message, 'tdms');
}

/** Sequential reader over one metadata block. */
class MetaCursor {
    private pos = 0;
    private readonly view: DataView;
    private static readonly decoder = new TextDecoder('utf-8');

    constructor(private readonly bytes: Uint8Array, private readonly le: boolean) {
        this.view = dataView(bytes);
    }

    private need(n: number): number {
        if (this.pos + n > this.bytes.length) {
            throw structural(`Metadata ends after ${this.bytes.length} bytes, needed ${this.pos + n}`);
        }
        const at = this.pos;
        this.pos += n;
        return at;
    }

    u8(): number { return this.view.getUint8(this.need(1)); }
    u32(): number { return this.view.getUint32(this.need(4), this.le); }

    u64(): number {
        const value = this.view.getBigUint64(this.need(8), this.le);
        if (value > BigInt(Number.MAX_SAFE_INTEGER)) throw structural(`64-bit count ${value} is out of range`);
        return Number(value);
    }

    string(): string {
        const length = this.u32();
        const at = this.need(length);
        return MetaCursor.decoder.decode(this.bytes.subarray(at, at + length));
    }

    value(dataType: number): TdmsValue {
        switch (dataType) {
            case TdmsDataType.STRING:
                return this.string();
            case TdmsDataType.BOOLEAN:
                return this.u8() !== 0;
            case TdmsDataType.TIMESTAMP:
                return readTimestamp(this.view, this.need(16), this.le);
            default: {
                const size = FIXED_SIZES.get(dataType);
                if (size === undefined) throw structural(`Unsupported property type 0x${dataType.toString(16)}`);
                return readNumber(this.view, this.need(size), dataType, this.le);
            }
        }
    }
}

function readNumber(view: DataView, offset: number, dataType: number, le: boolean): number {
    switch (dataType) {
        case TdmsDataType.I8: return view.getInt8(offset);
        case TdmsDataType.U8: return view.getUint8(offset);
        case TdmsDataType.BOOLEAN: return view.getUint8(offset) !== 0 ? 1 : 0;
        case TdmsDataType.I16: return view.getInt16(offset, le);
        case TdmsDataType.U16: return view.getUint16(offset, le);
        case TdmsDataType.I32: return view.getInt32(offset, le);
        case TdmsDataType.U32: return view.getUint32(offset, le);
        case TdmsDataType.I64: return Number(view.getBigInt64(offset, le));
        case TdmsDataType.U64: return Number(view.getBigUint64(offset, le));
        case TdmsDataType.SGL: return view.getFloat32(offset, le);
        case TdmsDataType.DBL: return view.getFloat64(offset, le);
        default: throw structural(`Type 0x${dataType.toString(16)} is not numeric`);
    }
}

function readTimestamp(view: DataView, offset: number, le: boolean): Date {
    // little-endian: fractions then seconds; big-endian: seconds then fractions
    const fractions = view.getBigUint64(le ? offset : offset + 8, le);
    const seconds = view.getBigInt64(le ? offset + 8 : offset, le);
    const ms = Number(seconds) * 1000 + Math.floor(Number(fractions >> 32n) / 2 ** 32 * 1000);
    return new Date(TDMS_EPOCH_MS + ms);
}

function isNumericType(dataType: number): boolean {
    return FIXED_SIZES.has(dataType) && dataType !== TdmsDataType.TIMESTAMP;
}

/**
 * Parses TDMS segments one at a time and accumulates object properties and
 * numeric channel data. The object list of a segment carries over to later
 * segments that do not redefine it, which is what lets callers seek over
 * whole records without parsing them.
 */
export class TdmsStream {
    readonly objects = new Map<string, TdmsObject>();
    private active: TdmsObject[] = [];
    private readonly data = new Map<string, ChannelData>();

    constructor(private readonly file: FileSource) { }

    property(path: string, name: string): TdmsValue | undefined {
        return this.objects.get(path)?.properties.get(name);
    }

    channel(path: string): ChannelData | undefined {
        return this.data.get(path);
    }

    async readLeadIn(position: number): Promise<LeadIn> {
        if (position + TDMS_LEAD_IN_SIZE > this.file.size) {
            throw structural(`Segment lead-in at ${position} runs past end of file`);
        }
        const bytes = await this.file.readAt(position, TDMS_LEAD_IN_SIZE);
        for (let i = 0; i < TDMS_TAG.length; i++) {
            if (bytes[i] !== TDMS_TAG[i]) throw structural(`Missing TDSm tag at ${position}`);
        }
        const view = dataView(bytes);
        const toc = view.getUint32(4, true);
        const le = (toc & TocFlag.BIG_ENDIAN) === 0;
        const version = view.getUint32(8, le);
        const next = view.getBigUint64(12, le);
        const rawOffset = view.getBigUint64(20, le);

        const start = position + TDMS_LEAD_IN_SIZE;
        const segmentEnd = next === INCOMPLETE_SEGMENT ? this.file.size : start + Number(next);
        const rawStart = start + Number(rawOffset);
        if (segmentEnd > this.file.size || rawStart > segmentEnd) {
            throw structural(`Segment at ${position} declares ${next} bytes, file holds ${this.file.size - start}`);
        }
        return { toc, version, littleEndian: le, segmentEnd, rawStart };
    }

    /** Parses the segment at `position` and returns the offset of the next one. */
    async readSegment(position: number): Promise<number> {
        const leadIn = await this.readLeadIn(position);
        if (leadIn.toc & TocFlag.DAQMX_RAW_DATA) {
            throw structural(`Segment at ${position} holds DAQmx raw data`);
        }
        const metaStart = position + TDMS_LEAD_IN_SIZE;
        if (leadIn.toc & TocFlag.META_DATA) {
            const meta = await this.file.readAt(metaStart, leadIn.rawStart - metaStart);
            this.readMetadata(meta, leadIn);
        }
        if (leadIn.toc & TocFlag.RAW_DATA) {
            await this.readRawData(leadIn);
        }
        return leadIn.segmentEnd;
    }

    private readMetadata(bytes: Uint8Array, leadIn: LeadIn): void {
        const cursor = new MetaCursor(bytes, leadIn.littleEndian);
        const list = leadIn.toc & TocFlag.NEW_OBJ_LIST ? [] : [...this.active];
        const count = cursor.u32();

        for (let n = 0; n < count; n++) {
            const path = cursor.string();
            let object = this.objects.get(path);
            if (!object) {
                object = { path, properties: new Map(), index: null };
                this.objects.set(path, object);
            }

            const indexLength = cursor.u32();
            if (indexLength === NO_RAW_DATA) {
                object.index = null;
            } else if (indexLength === SAME_AS_PREVIOUS) {
                if (!object.index) throw structural(`${path} reuses a raw data index it never had`);
            } else if (indexLength === DAQMX_FORMAT_CHANGING || indexLength === DAQMX_DIGITAL_LINE) {
                throw structural(`${path} uses a DAQmx raw data index`);
            } else {
                const dataType = cursor.u32();
                const dimension = cursor.u32();
                if (dimension !== 1) throw structural(`${path} has array dimension ${dimension}`);
                const values = cursor.u64();
                let totalSize: number;
                if (dataType === TdmsDataType.STRING) {
                    totalSize = cursor.u64();
                } else {
                    const size = FIXED_SIZES.get(dataType);
                    if (size === undefined) throw structural(`${path} has unsupported type 0x${dataType.toString(16)}`);
                    totalSize = values * size;
                }
                object.index = { dataType, count: values, totalSize };
            }

            const propertyCount = cursor.u32();
            for (let p = 0; p < propertyCount; p++) {
                const name = cursor.string();
                const dataType = cursor.u32();
                object.properties.set(name, cursor.value(dataType));
            }

            if (!list.includes(object)) list.push(object);
        }
        this.active = list;
    }

    private async readRawData(leadIn: LeadIn): Promise<void> {
        const channels = this.active.filter((o): o is TdmsObject & { index: RawDataIndex } => o.index !== null);
        const chunkSize = channels.reduce((sum, o) => sum + o.index.totalSize, 0);
        if (chunkSize === 0) return;

        const chunks = Math.floor((leadIn.segmentEnd - leadIn.rawStart) / chunkSize);
        if (chunks === 0) return;
        const bytes = await this.file.readAt(leadIn.rawStart, chunks * chunkSize);
        const view = dataView(bytes);
        const le = leadIn.littleEndian;

        if (leadIn.toc & TocFlag.INTERLEAVED_DATA) {
            this.readInterleaved(view, channels, chunks, le);
            return;
        }

        let offset = 0;
        for (let c = 0; c < chunks; c++) {
            for (const channel of channels) {
                const { dataType, count, totalSize } = channel.index;
                const size = FIXED_SIZES.get(dataType);
                if (size !== undefined && isNumericType(dataType)) {
                    const values = new Float64Array(count);
                    for (let k = 0; k < count; k++) {
                        values[k] = readNumber(view, offset + k * size, dataType, le);
                    }
                    this.channelFor(channel.path).push(values);
                }
                offset += totalSize;
            }
        }
    }

    private readInterleaved(view: DataView, channels: (TdmsObject & { index: RawDataIndex })[], chunks: number, le: boolean): void {
        for (const channel of channels) {
            if (!isNumericType(channel.index.dataType)) {
                throw structural(`Interleaved channel ${channel.path} is not numeric`);
            }
        }
        const count = channels[0].index.count;
        const columns = channels.map(() => new Float64Array(count * chunks));

        let offset = 0;
        for (let row = 0; row < count * chunks; row++) {
            channels.forEach((channel, i) => {
                columns[i][row] = readNumber(view, offset, channel.index.dataType, le);
                offset += FIXED_SIZES.get(channel.index.dataType) ?? 0;
            });
        }
        channels.forEach((channel, i) => this.channelFor(channel.path).push(columns[i]));
    }

    private channelFor(path: string): ChannelData {
        let channel = this.data.get(path);
        if (!channel) {
            channel = new ChannelData();
            this.data.set(path, channel);
        }
        return channel;
    }
}
