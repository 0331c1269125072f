import type { CaptureMetadata } from '../iq-types.js';

/** Human-readable summary of a capture, one `Label: value` per line. */
export function describeCapture(metadata: CaptureMetadata): string {
    const duration = metadata.sampleRate > 0 ? metadata.numberSamples / metadata.sampleRate : 0;
    return [
        `Record length: ${duration.toExponential(2)} [s]`,
        `No. Samples: ${metadata.numberSamples}`,
        `Sampling rate: ${metadata.sampleRate} [sps]`,
        `Center freq.: ${metadata.centerFrequency} [Hz]`,
        `Span: ${metadata.span} [Hz]`,
        `Acq. BW.: ${metadata.acquisitionBandwidth}`,
        `RBW: ${metadata.resolutionBandwidth}`,
        `RF Att.: ${metadata.attenuation}`,
        `Date and Time: ${metadata.timestamp}`,
    ].join('\n');
}
