import type { SampleBuffer, WindowRequest } from '../../iq-types.js';
import { makeMetadata } from '../../iq-types.js';
import { decodeBcdTimestamp } from '../bcd.js';
import { StructuralMismatchError } from '../errors.js';
import { dataView } from '../file-source.js';
import type { FileSource } from '../file-source.js';
import {
    TCAP_BLOCK_HEADER_SIZE, TCAP_BLOCK_PAYLOAD_SIZE, TCAP_BLOCK_SIZE, TCAP_BYTES_PER_SAMPLE,
    TCAP_POSITION_INDICATOR_SIZE, TCAP_SCALERS_SIZE, TCAP_TIME_REGISTER_SIZE
} from '../format.js';
import { normalizeInterleaved } from '../normalize.js';
import { CaptureReader } from '../reader.js';
import { TCAP_DEFAULTS } from '../types.js';
import type { IqReaderOptions, ProbeResult, TcapGeometry, TcapOptions } from '../types.js';
import { addressWindow } from '../window.js';

/** A run of payload bytes that sits inside one block. */
export interface PayloadSpan {
    fileOffset: number;
    payloadOffset: number;
    length: number;
}

/** File offset of payload byte `payloadOffset`. */
export function payloadToFileOffset(payloadOffset: number): number {
    const block = Math.floor(payloadOffset / TCAP_BLOCK_PAYLOAD_SIZE);
    return block * TCAP_BLOCK_SIZE + TCAP_BLOCK_HEADER_SIZE + (payloadOffset % TCAP_BLOCK_PAYLOAD_SIZE);
}

/**
 * Splits `length` payload bytes starting at `payloadStart` into per-block
 * spans. Every span after the first starts right after a skipped header.
 */
export function tcapPayloadSpans(payloadStart: number, length: number): PayloadSpan[] {
    const spans: PayloadSpan[] = [];
    let payloadOffset = payloadStart;
    let remaining = length;
    while (remaining > 0) {
        const toBoundary = TCAP_BLOCK_PAYLOAD_SIZE - (payloadOffset % TCAP_BLOCK_PAYLOAD_SIZE);
        const chunk = Math.min(remaining, toBoundary);
        spans.push({ fileOffset: payloadToFileOffset(payloadOffset), payloadOffset, length: chunk });
        payloadOffset += chunk;
        remaining -= chunk;
    }
    return spans;
}

export function expectedTcapFileSize(blockCount: number): number {
    return blockCount * TCAP_BLOCK_SIZE;
}

/**
 * Block-structured captures: a grid of fixed blocks, each an 88-byte header
 * followed by big-endian int16 I/Q payload. The first header carries the
 * BCD time register, position indicator and scaler table.
 */
export class TcapReader extends CaptureReader<TcapGeometry> {
    readonly format = 'tcap' as const;
    private readonly tcap: Required<TcapOptions>;

    constructor(filename: string, options: IqReaderOptions = {}) {
        super(filename, options);
        this.tcap = { ...TCAP_DEFAULTS, ...options.tcap };
    }

    protected async probeFile(file: FileSource): Promise<ProbeResult<TcapGeometry>> {
        const expected = expectedTcapFileSize(this.tcap.blockCount);
        if (file.size !== expected) {
            throw new StructuralMismatchError(
                `File size ${file.size} does not match ${this.tcap.blockCount} blocks of ${TCAP_BLOCK_SIZE} bytes (${expected})`,
                this.format
            );
        }

        const head = await file.readAt(0, TCAP_BLOCK_HEADER_SIZE);
        let pos = 0;
        const timeRegister = head.slice(pos, pos + TCAP_TIME_REGISTER_SIZE); pos += TCAP_TIME_REGISTER_SIZE;
        const positionIndicator = head.slice(pos, pos + TCAP_POSITION_INDICATOR_SIZE); pos += TCAP_POSITION_INDICATOR_SIZE;
        const scalers = head.slice(pos, pos + TCAP_SCALERS_SIZE);
        const time = decodeBcdTimestamp(timeRegister, this.tcap.epoch);

        const samplesPerBlock = TCAP_BLOCK_PAYLOAD_SIZE / TCAP_BYTES_PER_SAMPLE;
        const metadata = makeMetadata({
            sampleRate: this.tcap.sampleRate,
            centerFrequency: this.tcap.centerFrequency,
            span: this.tcap.span,
            scale: this.tcap.scale,
            numberSamples: this.tcap.blockCount * samplesPerBlock,
            timestamp: time.iso,
        });
        this.logger?.info?.(`[tcap] ${this.tcap.blockCount} blocks, capture time ${time.iso}`);

        return {
            format: this.format,
            metadata,
            geometry: {
                kind: 'tcap',
                blockHeaderSize: TCAP_BLOCK_HEADER_SIZE,
                blockPayloadSize: TCAP_BLOCK_PAYLOAD_SIZE,
                blockCount: this.tcap.blockCount,
                samplesPerBlock,
                header: { timeRegister, positionIndicator, scalers, time },
            },
        };
    }

    protected async readWindow(file: FileSource, probe: ProbeResult<TcapGeometry>, request: WindowRequest): Promise<SampleBuffer> {
        const { geometry, metadata } = probe;
        const address = addressWindow(request, {
            samplesPerUnit: geometry.samplesPerBlock,
            unitsPerFile: geometry.blockCount,
        }, this.format);

        const payloadStart = address.startSample * TCAP_BYTES_PER_SAMPLE;
        const payloadLength = address.sampleCount * TCAP_BYTES_PER_SAMPLE;
        const spans = tcapPayloadSpans(payloadStart, payloadLength);
        const first = spans[0];
        const last = spans[spans.length - 1];
        const raw = await file.readAt(first.fileOffset, last.fileOffset + last.length - first.fileOffset);

        const payload = new Uint8Array(payloadLength);
        for (const span of spans) {
            const from = span.fileOffset - first.fileOffset;
            payload.set(raw.subarray(from, from + span.length), span.payloadOffset - payloadStart);
        }
        if (spans.length > 1) {
            this.logger?.debug?.(`[tcap] skipped ${spans.length - 1} block header(s) inside the window`);
        }

        const view = dataView(payload);
        const values = new Int16Array(payloadLength / 2);
        for (let k = 0; k < values.length; k++) {
            values[k] = view.getInt16(k * 2, false);
        }
        return normalizeInterleaved(values, metadata.scale);
    }
}
