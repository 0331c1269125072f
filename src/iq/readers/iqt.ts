import type { SampleBuffer, WindowRequest } from '../../iq-types.js';
import { makeMetadata } from '../../iq-types.js';
import { StructuralMismatchError } from '../errors.js';
import { dataView } from '../file-source.js';
import type { FileSource } from '../file-source.js';
import { IQT_BYTES_PER_SAMPLE, IQT_FRAME_HEADER_SIZE } from '../format.js';
import type { IqtFrameHeader } from '../format.js';
import { normalizeInterleaved, sliceSamples } from '../normalize.js';
import { CaptureReader } from '../reader.js';
import { readPrefixedHeader, TextHeader } from '../text-header.js';
import type { IqtGeometry, ProbeResult } from '../types.js';
import { addressWindow } from '../window.js';

/** Fields of the IQT text header this reader relies on. */
export interface IqtHeader {
    fftPoints: number;
    maxInputLevel: number;
    levelOffset: number;
    frameLength: number;
    gainOffset: number;
    centerFrequency: number;
    span: number;
    validFrames: number;
    dateTime: string;
}

export function parseIqtHeader(text: string): IqtHeader {
    const header = new TextHeader(text, 'iqt');
    return {
        fftPoints: header.integer('FFTPoints'),
        maxInputLevel: header.number('MaxInputLevel'),
        levelOffset: header.number('LevelOffset'),
        frameLength: header.number('FrameLength'),
        gainOffset: header.number('GainOffset'),
        centerFrequency: header.number('CenterFrequency'),
        span: header.number('Span'),
        validFrames: header.integer('ValidFrames'),
        dateTime: header.text('DateTime'),
    };
}

/** Voltage scale derived from the three level parameters of the header. */
export function iqtScale(gainOffset: number, maxInputLevel: number, levelOffset: number): number {
    return Math.sqrt(Math.pow(10, (gainOffset + maxInputLevel + levelOffset) / 10) / 20 * 2);
}

export function decodeIqtFrameHeader(view: DataView, offset: number): IqtFrameHeader {
    const field = (index: number) => view.getInt16(offset + index * 2, true);
    return {
        reserved1: field(0),
        validA: field(1),
        validP: field(2),
        validI: field(3),
        validQ: field(4),
        bins: field(5),
        reserved2: field(6),
        triggered: field(7),
        overLoad: field(8),
        lastFrame: field(9),
        ticks: view.getInt32(offset + 20, true),
    };
}

/**
 * Fixed frame-size files: text header, then frames of a 24-byte header and
 * `FFTPoints` Q/I int16 pairs. Any frame can be reached by absolute seek.
 */
export class IqtReader extends CaptureReader<IqtGeometry> {
    readonly format = 'iqt' as const;

    protected async probeFile(file: FileSource): Promise<ProbeResult<IqtGeometry>> {
        const { text, dataOffset } = await readPrefixedHeader(file, this.format);
        const header = parseIqtHeader(text);
        if (header.fftPoints <= 0) {
            throw new StructuralMismatchError(`FFTPoints must be positive, got ${header.fftPoints}`, this.format);
        }
        const frameSize = IQT_FRAME_HEADER_SIZE + header.fftPoints * IQT_BYTES_PER_SAMPLE;
        const available = Math.floor((file.size - dataOffset) / frameSize);
        if (available < header.validFrames) {
            throw new StructuralMismatchError(
                `Header declares ${header.validFrames} frames but file holds ${available} of ${frameSize} bytes`,
                this.format
            );
        }

        const metadata = makeMetadata({
            centerFrequency: header.centerFrequency,
            span: header.span,
            sampleRate: header.fftPoints / header.frameLength,
            numberSamples: header.validFrames * header.fftPoints,
            scale: iqtScale(header.gainOffset, header.maxInputLevel, header.levelOffset),
            timestamp: header.dateTime,
        });
        this.logger?.info?.(
            `[iqt] ${header.validFrames} frames of ${header.fftPoints} samples, center ${metadata.centerFrequency} Hz, span ${metadata.span} Hz`
        );

        return {
            format: this.format,
            metadata,
            geometry: {
                kind: 'iqt',
                dataOffset,
                frameHeaderSize: IQT_FRAME_HEADER_SIZE,
                frameSize,
                samplesPerFrame: header.fftPoints,
                framesPerFile: header.validFrames,
            },
        };
    }

    protected async readWindow(file: FileSource, probe: ProbeResult<IqtGeometry>, request: WindowRequest): Promise<SampleBuffer> {
        const { geometry, metadata } = probe;
        const address = addressWindow(request, {
            samplesPerUnit: geometry.samplesPerFrame,
            unitsPerFile: geometry.framesPerFile,
            unitBytes: geometry.frameSize,
            dataOffset: geometry.dataOffset,
        }, this.format);

        const start = geometry.dataOffset + address.startUnit * geometry.frameSize;
        const bytes = await file.readAt(start, address.byteEnd - start);
        const view = dataView(bytes);
        const pairsPerFrame = geometry.samplesPerFrame * 2;
        const raw = new Int16Array(address.unitsNeeded * pairsPerFrame);

        for (let f = 0; f < address.unitsNeeded; f++) {
            const frameStart = f * geometry.frameSize;
            const frameHeader = decodeIqtFrameHeader(view, frameStart);
            if (frameHeader.overLoad !== 0) {
                this.logger?.warn?.(`[iqt] frame ${address.startUnit + f + 1} is flagged as overloaded`);
            }
            const dataStart = frameStart + geometry.frameHeaderSize;
            for (let k = 0; k < pairsPerFrame; k++) {
                raw[f * pairsPerFrame + k] = view.getInt16(dataStart + k * 2, true);
            }
        }

        const samples = normalizeInterleaved(raw, metadata.scale, 'qi');
        return sliceSamples(samples, address.intraUnitOffset, address.sampleCount);
    }
}
