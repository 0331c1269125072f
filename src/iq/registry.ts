import * as path from 'path';
import type { CaptureFormat } from '../iq-types.js';
import { UnsupportedFormatError } from './errors.js';
import type { CaptureReader } from './reader.js';
import { AsciiReader } from './readers/ascii.js';
import { BinReader } from './readers/bin.js';
import { IqtReader } from './readers/iqt.js';
import { TcapReader } from './readers/tcap.js';
import { TdmsReader } from './readers/tdms.js';
import { TiqReader } from './readers/tiq.js';
import { WavReader } from './readers/wav.js';
import type { IqReaderOptions } from './types.js';

const EXTENSIONS: Record<string, CaptureFormat> = {
    '.iqt': 'iqt',
    '.tiq': 'tiq',
    '.dat': 'tcap',
    '.tdms': 'tdms',
    '.bin': 'bin',
    '.txt': 'ascii',
    '.csv': 'ascii',
    '.wav': 'wav',
};

export function formatForFile(filename: string): CaptureFormat | null {
    return EXTENSIONS[path.extname(filename).toLowerCase()] ?? null;
}

export function createReaderForFormat(format: CaptureFormat, filename: string, options: IqReaderOptions = {}): CaptureReader {
    switch (format) {
        case 'iqt': return new IqtReader(filename, options);
        case 'tiq': return new TiqReader(filename, options);
        case 'tcap': return new TcapReader(filename, options);
        case 'tdms': return new TdmsReader(filename, options);
        case 'bin': return new BinReader(filename, options);
        case 'ascii': return new AsciiReader(filename, options);
        case 'wav': return new WavReader(filename, options);
    }
}

/** Picks a reader by file extension. */
export function createReader(filename: string, options: IqReaderOptions = {}): CaptureReader {
    const format = formatForFile(filename);
    if (!format) throw new UnsupportedFormatError(filename);
    return createReaderForFormat(format, filename, options);
}
