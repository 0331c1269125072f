import type { CaptureFormat } from '../iq-types.js';
import { MalformedMetadataError, StructuralMismatchError } from './errors.js';
import type { FileSource } from './file-source.js';

const textDecoder = new TextDecoder('utf-8');

export interface PrefixedHeader {
    /** Header body, decoded as UTF-8. */
    text: string;
    /** File offset of the first byte after the header. */
    dataOffset: number;
}

function parseDigits(bytes: Uint8Array): number | null {
    if (bytes.length === 0) return null;
    let value = 0;
    for (const b of bytes) {
        if (b < 0x30 || b > 0x39) return null;
        value = value * 10 + (b - 0x30);
    }
    return value;
}

/**
 * Reads a `<d><d digits: length><length bytes>` header from the start of
 * the file.
 */
export async function readPrefixedHeader(file: FileSource, format: CaptureFormat): Promise<PrefixedHeader> {
    const first = await file.readAt(0, 1);
    const digits = parseDigits(first);
    if (digits === null || digits === 0) {
        throw new StructuralMismatchError(`Header must start with a length digit, found byte 0x${first[0].toString(16)}`, format);
    }
    const length = parseDigits(await file.readAt(1, digits));
    if (length === null) {
        throw new StructuralMismatchError(`Header length field is not a ${digits}-digit number`, format);
    }
    const dataOffset = 1 + digits + length;
    if (dataOffset > file.size) {
        throw new StructuralMismatchError(`Header declares ${length} bytes but file holds ${file.size}`, format);
    }
    const body = await file.readAt(1 + digits, length);
    return { text: textDecoder.decode(body), dataOffset };
}

/**
 * Expands the instrument's unit letters: `k` -> e3, `m` -> e-3, `u` -> e-6
 * and `M` -> e6. `M` is left alone when the value carries AM or PM, since
 * then it belongs to a time of day.
 */
export function expandUnitSuffixes(value: string): string {
    let out = value.replaceAll('k', 'e3').replaceAll('m', 'e-3').replaceAll('u', 'e-6');
    if (!out.includes('PM') && !out.includes('AM')) {
        out = out.replaceAll('M', 'e6');
    }
    return out;
}

export function parseScaledNumber(value: string): number | null {
    const expanded = expandUnitSuffixes(value.trim());
    if (expanded === '') return null;
    const parsed = Number(expanded);
    return Number.isFinite(parsed) ? parsed : null;
}

/** `Key=Value` lines, keys and values trimmed. Lines without `=` are skipped. */
export class TextHeader {
    readonly entries: ReadonlyMap<string, string>;

    constructor(text: string, private readonly format: CaptureFormat) {
        const entries = new Map<string, string>();
        for (const line of text.split(/\r?\n/)) {
            const eq = line.indexOf('=');
            if (eq < 0) continue;
            entries.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
        }
        this.entries = entries;
    }

    text(key: string): string {
        const value = this.entries.get(key);
        if (value === undefined) {
            throw new MalformedMetadataError(`Header field ${key} is missing`, key, this.format);
        }
        return value;
    }

    number(key: string): number {
        const raw = this.text(key);
        const value = parseScaledNumber(raw);
        if (value === null) {
            throw new MalformedMetadataError(`Header field ${key} is not numeric: "${raw}"`, key, this.format);
        }
        return value;
    }

    integer(key: string): number {
        const value = this.number(key);
        if (!Number.isSafeInteger(value)) {
            throw new MalformedMetadataError(`Header field ${key} is not an integer: ${value}`, key, this.format);
        }
        return value;
    }
}
