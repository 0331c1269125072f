import type { SampleBuffer, WindowRequest } from '../../iq-types.js';
import { makeMetadata } from '../../iq-types.js';
import { StructuralMismatchError } from '../errors.js';
import { dataView } from '../file-source.js';
import type { FileSource } from '../file-source.js';
import { normalizeInterleaved } from '../normalize.js';
import { CaptureReader } from '../reader.js';
import type { ProbeResult, WavGeometry } from '../types.js';
import { addressWindow } from '../window.js';

const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;
const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

function fourCC(bytes: Uint8Array, offset: number): string {
    return String.fromCharCode(bytes[offset], bytes[offset + 1], bytes[offset + 2], bytes[offset + 3]);
}

interface WavFormat {
    formatTag: number;
    channels: number;
    sampleRate: number;
    blockAlign: number;
    bitsPerSample: number;
}

/** Two-channel WAV captures: left is I, right is Q. Samples are not rescaled. */
export class WavReader extends CaptureReader<WavGeometry> {
    readonly format = 'wav' as const;

    protected async probeFile(file: FileSource): Promise<ProbeResult<WavGeometry>> {
        if (file.size < RIFF_HEADER_SIZE) {
            throw new StructuralMismatchError('File is shorter than a RIFF header', this.format);
        }
        const riff = await file.readAt(0, RIFF_HEADER_SIZE);
        if (fourCC(riff, 0) !== 'RIFF' || fourCC(riff, 8) !== 'WAVE') {
            throw new StructuralMismatchError('Not a RIFF/WAVE file', this.format);
        }

        let fmt: WavFormat | null = null;
        let pos = RIFF_HEADER_SIZE;
        while (pos + CHUNK_HEADER_SIZE <= file.size) {
            const header = await file.readAt(pos, CHUNK_HEADER_SIZE);
            const id = fourCC(header, 0);
            const size = dataView(header).getUint32(4, true);
            const body = pos + CHUNK_HEADER_SIZE;

            if (id === 'fmt ') {
                const view = dataView(await file.readAt(body, Math.min(size, 16)));
                fmt = {
                    formatTag: view.getUint16(0, true),
                    channels: view.getUint16(2, true),
                    sampleRate: view.getUint32(4, true),
                    blockAlign: view.getUint16(12, true),
                    bitsPerSample: view.getUint16(14, true),
                };
                if (fmt.formatTag === WAVE_FORMAT_EXTENSIBLE && size >= 26) {
                    // sub-format GUID starts with the actual format tag
                    fmt.formatTag = dataView(await file.readAt(body + 24, 2)).getUint16(0, true);
                }
            } else if (id === 'data') {
                if (!fmt) throw new StructuralMismatchError('data chunk comes before fmt chunk', this.format);
                return this.describe(file, fmt, body, Math.min(size, file.size - body));
            }
            // chunks are word aligned
            pos = body + size + (size & 1);
        }
        throw new StructuralMismatchError('No data chunk found', this.format);
    }

    private describe(file: FileSource, fmt: WavFormat, dataOffset: number, dataSize: number): ProbeResult<WavGeometry> {
        if (fmt.channels !== 2) {
            throw new StructuralMismatchError(`Expected 2 channels (I, Q), found ${fmt.channels}`, this.format);
        }
        let sampleFormat: WavGeometry['sampleFormat'];
        if (fmt.formatTag === WAVE_FORMAT_PCM && (fmt.bitsPerSample === 16 || fmt.bitsPerSample === 32)) {
            sampleFormat = 'pcm';
        } else if (fmt.formatTag === WAVE_FORMAT_IEEE_FLOAT && fmt.bitsPerSample === 32) {
            sampleFormat = 'float';
        } else {
            throw new StructuralMismatchError(`Unsupported sample format ${fmt.formatTag}/${fmt.bitsPerSample} bit`, this.format);
        }
        if (fmt.blockAlign !== 2 * fmt.bitsPerSample / 8) {
            throw new StructuralMismatchError(`Block align ${fmt.blockAlign} does not fit two ${fmt.bitsPerSample}-bit channels`, this.format);
        }

        return {
            format: this.format,
            metadata: makeMetadata({
                sampleRate: fmt.sampleRate,
                centerFrequency: 0,
                numberSamples: Math.floor(dataSize / fmt.blockAlign),
                timestamp: file.changedAt.toISOString(),
            }),
            geometry: {
                kind: 'wav',
                dataOffset,
                blockAlign: fmt.blockAlign,
                bitsPerSample: fmt.bitsPerSample,
                sampleFormat,
            },
        };
    }

    protected async readWindow(file: FileSource, probe: ProbeResult<WavGeometry>, request: WindowRequest): Promise<SampleBuffer> {
        const { geometry, metadata } = probe;
        const address = addressWindow(request, { samplesPerUnit: 1, unitsPerFile: metadata.numberSamples }, this.format);
        const bytes = await file.readAt(
            geometry.dataOffset + address.startSample * geometry.blockAlign,
            address.sampleCount * geometry.blockAlign
        );
        const view = dataView(bytes);
        const width = geometry.bitsPerSample / 8;
        const values = new Float64Array(address.sampleCount * 2);
        for (let k = 0; k < values.length; k++) {
            const offset = k * width;
            if (geometry.sampleFormat === 'float') values[k] = view.getFloat32(offset, true);
            else if (width === 2) values[k] = view.getInt16(offset, true);
            else values[k] = view.getInt32(offset, true);
        }
        return normalizeInterleaved(values, metadata.scale);
    }
}
