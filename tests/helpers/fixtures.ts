import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ByteWriter, concatBytes, prefixedHeader, utf8 } from './bytes.js';

/** Writes `bytes` to a fresh directory inside the test sandbox and returns the file path. */
export async function writeFixture(name: string, bytes: Uint8Array): Promise<string> {
    const root = process.env.IQ_TEST_ROOT ?? os.tmpdir();
    const dir = await fs.mkdtemp(path.join(root, 'case-'));
    const file = path.join(dir, name);
    await fs.writeFile(file, bytes);
    return file;
}

// ============================================================================
// IQT
// ============================================================================

export const IQT_HEADER_DEFAULTS: Record<string, string> = {
    FFTPoints: '4',
    // 0 + 10 + 0 dB gives a scale of exactly 1
    MaxInputLevel: '10',
    LevelOffset: '0',
    GainOffset: '0',
    FrameLength: '1m',
    CenterFrequency: '100M',
    Span: '20M',
    ValidFrames: '3',
    DateTime: '10/18/2026 3:04:05 PM',
};

export interface IqtFixture {
    /** Overrides of header fields; null drops the field. */
    header?: Record<string, string | null>;
    /** Frames physically written; defaults to ValidFrames. */
    framesWritten?: number;
    /** 1-based frames whose header carries the overload flag. */
    overloadFrames?: number[];
}

/** Sample `n` (0-based, whole file) stores I = n + 1 and Q = -(n + 1). */
export function buildIqt(fixture: IqtFixture = {}): Uint8Array {
    const fields: Record<string, string> = { ...IQT_HEADER_DEFAULTS };
    for (const [key, value] of Object.entries(fixture.header ?? {})) {
        if (value === null) delete fields[key];
        else fields[key] = value;
    }
    const text = Object.entries(fields).map(([k, v]) => `${k}=${v}`).join('\n');
    const fftPoints = Number(fields.FFTPoints ?? IQT_HEADER_DEFAULTS.FFTPoints);
    const frames = fixture.framesWritten ?? Number(fields.ValidFrames ?? IQT_HEADER_DEFAULTS.ValidFrames);

    const body = new ByteWriter(true);
    for (let f = 0; f < frames; f++) {
        const overload = fixture.overloadFrames?.includes(f + 1) ? 1 : 0;
        // reserved1, validA, validP, validI, validQ, bins, reserved2, triggered, overLoad, lastFrame
        body.i16(0).i16(1).i16(1).i16(1).i16(1).i16(fftPoints).i16(0).i16(0).i16(overload).i16(f === frames - 1 ? 1 : 0);
        body.i32(f * 1000);
        for (let k = 0; k < fftPoints; k++) {
            const n = f * fftPoints + k;
            body.i16(-(n + 1)).i16(n + 1);
        }
    }
    return concatBytes(prefixedHeader(text), body.toUint8Array());
}

// ============================================================================
// TIQ
// ============================================================================

export interface TiqFixture {
    numberSamples?: number;
    /** Samples physically written; defaults to numberSamples. */
    samplesWritten?: number;
    scaling?: string | null;
    /** 'prefixed' uses a length-prefixed header, 'offset' a first line declaring the data offset. */
    style?: 'prefixed' | 'offset';
}

function tiqBody(numberSamples: number, scaling: string | null): string {
    return [
        '<DataSetsCollection>',
        '<DataSets>',
        '<DataDescription>',
        `<NumberSamples>${numberSamples}</NumberSamples>`,
        '<SamplingFrequency>1000000</SamplingFrequency>',
        '<Frequency>915000000</Frequency>',
        '<AcquisitionBandwidth>800000</AcquisitionBandwidth>',
        '<DateTime>2026-10-18T10:00:00.000Z</DateTime>',
        '</DataDescription>',
        '<ProductSpecific>',
        '<RFAttenuation>10</RFAttenuation>',
        scaling === null ? '' : `<Scaling>${scaling}</Scaling>`,
        '</ProductSpecific>',
        '</DataSets>',
        '</DataSetsCollection>',
        '<Setup>',
        '<NumericParameter name="Span" pid="spanlimit"><Value>1</Value></NumericParameter>',
        '<NumericParameter name="Span" pid="globalrange"><Value>500000</Value></NumericParameter>',
        '<NumericParameter name="Center" pid="globalrange"><Value>2</Value></NumericParameter>',
        '<NumericParameter name="Resolution Bandwidth" pid="rbw"><Value>1000</Value></NumericParameter>',
        '</Setup>',
    ].join('\n');
}

/** Sample `n` stores I = 10 (n + 1) and Q = -10 (n + 1) as int32. */
export function buildTiq(fixture: TiqFixture = {}): Uint8Array {
    const numberSamples = fixture.numberSamples ?? 16;
    const written = fixture.samplesWritten ?? numberSamples;
    const body = tiqBody(numberSamples, fixture.scaling === undefined ? '0.5' : fixture.scaling);

    let header: Uint8Array;
    if (fixture.style === 'offset') {
        const open = (offset: number) => `<DataFile offset="${String(offset).padStart(9, '0')}" xmlns="urn:example:iq">\n`;
        const xml = open(0) + body + '\n</DataFile>';
        const offset = Math.ceil((utf8(xml).length + 1) / 64) * 64;
        const text = utf8(open(offset) + body + '\n</DataFile>');
        header = new Uint8Array(offset);
        header.set(text, 0);
    } else {
        header = prefixedHeader(`<?xml version="1.0" encoding="utf-8"?>\n<DataFile xmlns="urn:example:iq">\n${body}\n</DataFile>`);
    }

    const payload = new ByteWriter(true);
    for (let n = 0; n < written; n++) {
        payload.i32(10 * (n + 1)).i32(-10 * (n + 1));
    }
    return concatBytes(header, payload.toUint8Array());
}

// ============================================================================
// TCAP
// ============================================================================

export const TCAP_BLOCK_HEADER = 88;
export const TCAP_BLOCK_PAYLOAD = 2 ** 17;
export const TCAP_BLOCK = TCAP_BLOCK_HEADER + TCAP_BLOCK_PAYLOAD;

/** Day 005, 12:30:45.1234567 */
export const SAMPLE_TIME_REGISTER = [0x00, 0x00, 0x00, 0x00, 0x05, 0x12, 0x30, 0x45, 0x12, 0x34, 0x56, 0x70];

export function tcapI(n: number): number {
    return n % 16384;
}

/**
 * `blocks` blocks; the first header carries `timeRegister`, later headers
 * are filled with 0xEE. Sample `n` stores I = n % 16384 and Q = -I as
 * big-endian int16.
 */
export function buildTcap(blocks: number, timeRegister: number[] = SAMPLE_TIME_REGISTER): Uint8Array {
    const out = new Uint8Array(blocks * TCAP_BLOCK);
    const view = new DataView(out.buffer);
    const samplesPerBlock = TCAP_BLOCK_PAYLOAD / 4;
    for (let b = 0; b < blocks; b++) {
        const base = b * TCAP_BLOCK;
        if (b === 0) {
            out.set(timeRegister, 0);
            for (let i = 12; i < TCAP_BLOCK_HEADER; i++) out[i] = i;
        } else {
            out.fill(0xee, base, base + TCAP_BLOCK_HEADER);
        }
        for (let k = 0; k < samplesPerBlock; k++) {
            const n = b * samplesPerBlock + k;
            const at = base + TCAP_BLOCK_HEADER + k * 4;
            view.setInt16(at, tcapI(n), false);
            view.setInt16(at + 2, -tcapI(n), false);
        }
    }
    return out;
}

// ============================================================================
// TDMS
// ============================================================================

const TOC_META = 1 << 1;
const TOC_NEW_OBJ_LIST = 1 << 2;
const TOC_RAW = 1 << 3;
const TYPE_I16 = 0x02;
const TYPE_I32 = 0x03;
const TYPE_DBL = 0x0a;
const NO_INDEX = 0xffffffff;
const SAME_INDEX = 0;

type TdmsProperty = [name: string, type: number, value: number];

export interface TdmsObjectSpec {
    path: string;
    /** Full index as [dataType, count], or reuse/none. */
    index: [number, number] | 'same' | 'none';
    properties?: TdmsProperty[];
}

function tdmsString(w: ByteWriter, text: string): void {
    const bytes = utf8(text);
    w.u32(bytes.length).bytes(bytes);
}

export function tdmsMetadata(objects: TdmsObjectSpec[]): Uint8Array {
    const w = new ByteWriter(true);
    w.u32(objects.length);
    for (const object of objects) {
        tdmsString(w, object.path);
        if (object.index === 'none') {
            w.u32(NO_INDEX);
        } else if (object.index === 'same') {
            w.u32(SAME_INDEX);
        } else {
            w.u32(20).u32(object.index[0]).u32(1).u64(object.index[1]);
        }
        const properties = object.properties ?? [];
        w.u32(properties.length);
        for (const [name, type, value] of properties) {
            tdmsString(w, name);
            w.u32(type);
            if (type === TYPE_I32) w.i32(value);
            else w.f64(value);
        }
    }
    return w.toUint8Array();
}

export function tdmsSegment(toc: number, meta: Uint8Array, raw: Uint8Array): Uint8Array {
    const w = new ByteWriter(true);
    w.ascii('TDSm').u32(toc).u32(4713).u64(meta.length + raw.length).u64(meta.length);
    return concatBytes(w.toUint8Array(), meta, raw);
}

export function tdmsI(record: number, k: number): number {
    return record * 100 + k;
}

export interface TdmsFixture {
    samplesPerRecord?: number;
    records?: number;
    /** Value written to NRecordsPerFile; defaults to `records`. */
    declaredRecords?: number;
    gain?: number;
}

export interface TdmsFixtureFile {
    bytes: Uint8Array;
    /** File offset right after each record. */
    recordEnds: number[];
}

/**
 * Each record is a gain segment followed by an I/Q segment. The first
 * record defines the root properties and the channel indexes; later
 * records reuse them. Record `r`, sample `k` holds I = 100 r + k, Q = -I.
 */
export function buildTdms(fixture: TdmsFixture = {}): TdmsFixtureFile {
    const samplesPerRecord = fixture.samplesPerRecord ?? 8;
    const records = fixture.records ?? 4;
    const gain = fixture.gain ?? 0.5;
    const segments: Uint8Array[] = [];
    const recordEnds: number[] = [];
    let size = 0;
    const push = (segment: Uint8Array) => {
        segments.push(segment);
        size += segment.length;
    };

    for (let r = 1; r <= records; r++) {
        const gainObjects: TdmsObjectSpec[] = r === 1
            ? [
                {
                    path: '/',
                    index: 'none',
                    properties: [
                        ['IQRate', TYPE_DBL, 1e6],
                        ['RFAttentuation', TYPE_DBL, 10],
                        ['IQCarrierFrequency', TYPE_DBL, 2.4e9],
                        ['NSamplesPerRecord', TYPE_I32, samplesPerRecord],
                        ['NRecordsPerFile', TYPE_I32, fixture.declaredRecords ?? records],
                    ],
                },
                { path: "/'RecordHeader'/'gain'", index: [TYPE_DBL, 1] },
            ]
            : [{ path: "/'RecordHeader'/'gain'", index: 'same' }];
        push(tdmsSegment(TOC_META | TOC_NEW_OBJ_LIST | TOC_RAW, tdmsMetadata(gainObjects), new ByteWriter(true).f64(gain).toUint8Array()));

        const dataObjects: TdmsObjectSpec[] = r === 1
            ? [
                { path: "/'RecordData'/'I'", index: [TYPE_I16, samplesPerRecord] },
                { path: "/'RecordData'/'Q'", index: [TYPE_I16, samplesPerRecord] },
            ]
            : [
                { path: "/'RecordData'/'I'", index: 'same' },
                { path: "/'RecordData'/'Q'", index: 'same' },
            ];
        const raw = new ByteWriter(true);
        for (let k = 0; k < samplesPerRecord; k++) raw.i16(tdmsI(r, k));
        for (let k = 0; k < samplesPerRecord; k++) raw.i16(-tdmsI(r, k));
        push(tdmsSegment(TOC_META | TOC_NEW_OBJ_LIST | TOC_RAW, tdmsMetadata(dataObjects), raw.toUint8Array()));
        recordEnds.push(size);
    }
    return { bytes: concatBytes(...segments), recordEnds };
}

// ============================================================================
// BIN / ASCII / WAV
// ============================================================================

/** First value is (fs, center); sample `n` is (n + 0.5, -(n + 0.5)). */
export function buildBin(samples: number, sampleRate = 1e6, centerFrequency = 1e8): Uint8Array {
    const w = new ByteWriter(true);
    w.f32(sampleRate).f32(centerFrequency);
    for (let n = 0; n < samples; n++) w.f32(n + 0.5).f32(-(n + 0.5));
    return w.toUint8Array();
}

export interface WavFixture {
    channels?: number;
    format?: 'pcm16' | 'float32';
    samples?: number;
    /** Adds an odd-sized chunk before `data`. */
    extraChunk?: boolean;
}

/** Sample `n` is (100 (n + 1), -100 (n + 1)) for PCM, (n / 4, -n / 4) for float. */
export function buildWav(fixture: WavFixture = {}): Uint8Array {
    const channels = fixture.channels ?? 2;
    const float = fixture.format === 'float32';
    const bits = float ? 32 : 16;
    const samples = fixture.samples ?? 8;
    const blockAlign = channels * bits / 8;

    const data = new ByteWriter(true);
    for (let n = 0; n < samples; n++) {
        for (let c = 0; c < channels; c++) {
            const sign = c === 0 ? 1 : -1;
            if (float) data.f32(sign * n / 4);
            else data.i16(sign * 100 * (n + 1));
        }
    }
    const dataBytes = data.toUint8Array();

    const chunks = new ByteWriter(true);
    chunks.ascii('fmt ').u32(16)
        .u16(float ? 3 : 1).u16(channels).u32(48000).u32(48000 * blockAlign).u16(blockAlign).u16(bits);
    if (fixture.extraChunk) {
        chunks.ascii('note').u32(3).ascii('abc').u8(0);
    }
    chunks.ascii('data').u32(dataBytes.length).bytes(dataBytes);

    const body = chunks.toUint8Array();
    const riff = new ByteWriter(true).ascii('RIFF').u32(4 + body.length).ascii('WAVE').toUint8Array();
    return concatBytes(riff, body);
}
