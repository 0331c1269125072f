/**
 * iqfile-decoder public API
 *
 * @module iq
 */

import type { CaptureMetadata, WindowRequest } from './iq-types.js';
import { describeCapture } from './iq/describe.js';
import { createReader } from './iq/registry.js';
import type { IqReaderOptions, ProbeResult, ReadResult } from './iq/types.js';

export type { CaptureFormat, CaptureMetadata, SampleBuffer, WindowRequest } from './iq-types.js';
export type {
    IqLogger, IqReaderOptions, TcapOptions, TdmsOptions, GeometryDescriptor, ProbeResult, ReadResult,
    IqtGeometry, TiqGeometry, TcapGeometry, TcapHeader, TdmsGeometry, BinGeometry, AsciiGeometry, WavGeometry
} from './iq/types.js';
export {
    IqError, StructuralMismatchError, WindowRangeError, MalformedMetadataError, IqIoError,
    UnsupportedFormatError, ProbeBudgetExceededError
} from './iq/errors.js';
export { CaptureReader } from './iq/reader.js';
export { createReader, createReaderForFormat, formatForFile } from './iq/registry.js';
export { addressWindow, countFrames } from './iq/window.js';
export type { WindowAddress, UnitGrid } from './iq/window.js';
export { decodeBcdTimestamp } from './iq/bcd.js';
export type { BcdTimestamp } from './iq/bcd.js';
export { normalizeInterleaved, normalizeChannels } from './iq/normalize.js';
export { IqtReader } from './iq/readers/iqt.js';
export { TiqReader } from './iq/readers/tiq.js';
export { TcapReader } from './iq/readers/tcap.js';
export { TdmsReader } from './iq/readers/tdms.js';
export { BinReader } from './iq/readers/bin.js';
export { AsciiReader } from './iq/readers/ascii.js';
export { WavReader } from './iq/readers/wav.js';
export { describeCapture } from './iq/describe.js';

export const IQ = {
    /**
     * Reads the file header and learns its geometry without decoding samples.
     */
    probe: async (filename: string, options?: IqReaderOptions): Promise<ProbeResult> => {
        return createReader(filename, options).probe();
    },

    /**
     * Decodes one window of `frameCount` frames of `frameLength` samples, starting at 1-based `startFrame`.
     */
    read: async (filename: string, request: WindowRequest, options?: IqReaderOptions): Promise<ReadResult> => {
        return createReader(filename, options).read(request);
    },

    /** Reader bound to one file, for several windows over the same capture. */
    open: createReader,

    describe: (metadata: CaptureMetadata): string => describeCapture(metadata),
};

export default IQ;
