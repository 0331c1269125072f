import type { SampleBuffer, WindowRequest } from '../../iq-types.js';
import { makeMetadata } from '../../iq-types.js';
import { StructuralMismatchError } from '../errors.js';
import { dataView } from '../file-source.js';
import type { FileSource } from '../file-source.js';
import { BIN_BYTES_PER_SAMPLE } from '../format.js';
import { normalizeInterleaved } from '../normalize.js';
import { CaptureReader } from '../reader.js';
import type { BinGeometry, ProbeResult } from '../types.js';
import { addressWindow } from '../window.js';

/**
 * Raw little-endian complex64 files. The first complex value carries the
 * sample rate (real part) and center frequency (imaginary part).
 */
export class BinReader extends CaptureReader<BinGeometry> {
    readonly format = 'bin' as const;

    protected async probeFile(file: FileSource): Promise<ProbeResult<BinGeometry>> {
        if (file.size < BIN_BYTES_PER_SAMPLE || file.size % BIN_BYTES_PER_SAMPLE !== 0) {
            throw new StructuralMismatchError(`File size ${file.size} is not a whole number of complex64 values`, this.format);
        }
        const view = dataView(await file.readAt(0, BIN_BYTES_PER_SAMPLE));
        const metadata = makeMetadata({
            sampleRate: view.getFloat32(0, true),
            centerFrequency: view.getFloat32(4, true),
            numberSamples: file.size / BIN_BYTES_PER_SAMPLE - 1,
            timestamp: file.changedAt.toISOString(),
        });
        return {
            format: this.format,
            metadata,
            geometry: { kind: 'bin', dataOffset: BIN_BYTES_PER_SAMPLE, bytesPerSample: BIN_BYTES_PER_SAMPLE },
        };
    }

    protected async readWindow(file: FileSource, probe: ProbeResult<BinGeometry>, request: WindowRequest): Promise<SampleBuffer> {
        const { geometry, metadata } = probe;
        const address = addressWindow(request, { samplesPerUnit: 1, unitsPerFile: metadata.numberSamples }, this.format);
        const bytes = await file.readAt(
            geometry.dataOffset + address.startSample * geometry.bytesPerSample,
            address.sampleCount * geometry.bytesPerSample
        );
        const view = dataView(bytes);
        const values = new Float32Array(address.sampleCount * 2);
        for (let k = 0; k < values.length; k++) {
            values[k] = view.getFloat32(k * 4, true);
        }
        return normalizeInterleaved(values, metadata.scale);
    }
}
