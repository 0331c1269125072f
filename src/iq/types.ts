import type { CaptureFormat, CaptureMetadata, SampleBuffer, WindowRequest } from '../iq-types.js';
import type { BcdTimestamp } from './bcd.js';

export type IqLogger = {
    debug?: (msg: string) => void;
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type TcapOptions = {
    /** Number of blocks a valid file holds. Default 15625. */
    blockCount?: number;
    /** Default 312500 Hz. */
    sampleRate?: number;
    /** Default 160 kHz. */
    centerFrequency?: number;
    /** Default 312500 Hz. */
    span?: number;
    /** Linear factor for the raw int16 samples. Default 6.25e-2. */
    scale?: number;
    /** Origin the BCD time register counts from. Default Unix epoch. */
    epoch?: Date;
};

export type TdmsOptions = {
    /** Segments the probe may parse before giving up. Default 4096. */
    maxProbeSegments?: number;
    /** Bytes the probe may advance through before giving up. Default 256 MiB. */
    maxProbeBytes?: number;
};

export type IqReaderOptions = {
    /** Optional logger hook; src/ never writes to the console itself. */
    logger?: IqLogger | null;
    tcap?: TcapOptions;
    tdms?: TdmsOptions;
};

export const TCAP_DEFAULTS: Required<TcapOptions> = {
    blockCount: 15625,
    sampleRate: 312500,
    centerFrequency: 1.6e5,
    span: 312500,
    scale: 6.25e-2,
    epoch: new Date(0),
};

export const TDMS_DEFAULTS: Required<TdmsOptions> = {
    maxProbeSegments: 4096,
    maxProbeBytes: 256 * 1024 * 1024,
};

// ============================================================================
// Geometry
// ============================================================================

export interface IqtGeometry {
    kind: 'iqt';
    dataOffset: number;
    frameHeaderSize: number;
    frameSize: number;
    samplesPerFrame: number;
    framesPerFile: number;
}

export interface TiqGeometry {
    kind: 'tiq';
    dataOffset: number;
    bytesPerSample: number;
}

export interface TcapHeader {
    timeRegister: Uint8Array;
    positionIndicator: Uint8Array;
    scalers: Uint8Array;
    time: BcdTimestamp;
}

export interface TcapGeometry {
    kind: 'tcap';
    blockHeaderSize: number;
    blockPayloadSize: number;
    blockCount: number;
    samplesPerBlock: number;
    header: TcapHeader;
}

export interface TdmsGeometry {
    kind: 'tdms';
    samplesPerRecord: number;
    recordsPerFile: number;
    firstRecordEnd: number;
    otherRecordSize: number;
}

export interface BinGeometry {
    kind: 'bin';
    dataOffset: number;
    bytesPerSample: number;
}

export interface AsciiGeometry {
    kind: 'ascii';
    /** Raw I/Q values parsed at probe time, interleaved. */
    values: Float64Array;
}

export interface WavGeometry {
    kind: 'wav';
    dataOffset: number;
    blockAlign: number;
    bitsPerSample: number;
    sampleFormat: 'pcm' | 'float';
}

export type GeometryDescriptor =
    | IqtGeometry
    | TiqGeometry
    | TcapGeometry
    | TdmsGeometry
    | BinGeometry
    | AsciiGeometry
    | WavGeometry;

export interface ProbeResult<G extends GeometryDescriptor = GeometryDescriptor> {
    format: CaptureFormat;
    metadata: Readonly<CaptureMetadata>;
    geometry: G;
}

export interface ReadResult {
    samples: SampleBuffer;
    metadata: Readonly<CaptureMetadata>;
    request: WindowRequest;
    /** Whole frames of the requested length the file holds. */
    totalFrames: number;
}
