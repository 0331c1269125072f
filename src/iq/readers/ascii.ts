import type { SampleBuffer, WindowRequest } from '../../iq-types.js';
import { makeMetadata } from '../../iq-types.js';
import { StructuralMismatchError } from '../errors.js';
import type { FileSource } from '../file-source.js';
import { normalizeInterleaved } from '../normalize.js';
import { CaptureReader } from '../reader.js';
import type { AsciiGeometry, ProbeResult } from '../types.js';
import { addressWindow } from '../window.js';

/**
 * Parses two-column text. Blank lines and `#` comments are skipped; the
 * first row is `sampleRate centerFrequency`, every other row one `I Q`
 * sample.
 */
export function parseAsciiColumns(text: string): { sampleRate: number; centerFrequency: number; values: Float64Array } {
    const rows: [number, number][] = [];
    const lines = text.split(/\r?\n/);
    for (let n = 0; n < lines.length; n++) {
        const content = lines[n].split('#', 1)[0].trim();
        if (content === '') continue;
        const fields = content.split(/[\s,]+/);
        const a = Number(fields[0]);
        const b = Number(fields[1]);
        if (fields.length < 2 || !Number.isFinite(a) || !Number.isFinite(b)) {
            throw new StructuralMismatchError(`Line ${n + 1} is not two numeric columns: "${content}"`, 'ascii');
        }
        rows.push([a, b]);
    }
    if (rows.length === 0) {
        throw new StructuralMismatchError('File holds no header row', 'ascii');
    }

    const [[sampleRate, centerFrequency], ...samples] = rows;
    const values = new Float64Array(samples.length * 2);
    samples.forEach(([i, q], k) => {
        values[2 * k] = i;
        values[2 * k + 1] = q;
    });
    return { sampleRate, centerFrequency, values };
}

/** Text captures. The whole file is parsed once at probe time. */
export class AsciiReader extends CaptureReader<AsciiGeometry> {
    readonly format = 'ascii' as const;

    protected async probeFile(file: FileSource): Promise<ProbeResult<AsciiGeometry>> {
        const text = new TextDecoder('utf-8').decode(await file.readAll());
        const { sampleRate, centerFrequency, values } = parseAsciiColumns(text);
        return {
            format: this.format,
            metadata: makeMetadata({
                sampleRate,
                centerFrequency,
                numberSamples: values.length / 2,
                timestamp: file.changedAt.toISOString(),
            }),
            geometry: { kind: 'ascii', values },
        };
    }

    protected async readWindow(_file: FileSource, probe: ProbeResult<AsciiGeometry>, request: WindowRequest): Promise<SampleBuffer> {
        const { geometry, metadata } = probe;
        const address = addressWindow(request, { samplesPerUnit: 1, unitsPerFile: metadata.numberSamples }, this.format);
        const window = geometry.values.subarray(2 * address.startSample, 2 * (address.startSample + address.sampleCount));
        return normalizeInterleaved(window, metadata.scale);
    }
}
