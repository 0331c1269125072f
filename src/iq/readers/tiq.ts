import { XMLParser } from 'fast-xml-parser';
import type { CaptureMetadata, SampleBuffer, WindowRequest } from '../../iq-types.js';
import { makeMetadata } from '../../iq-types.js';
import { MalformedMetadataError, StructuralMismatchError } from '../errors.js';
import { dataView } from '../file-source.js';
import type { FileSource } from '../file-source.js';
import { TIQ_BYTES_PER_SAMPLE } from '../format.js';
import { normalizeInterleaved } from '../normalize.js';
import { CaptureReader } from '../reader.js';
import { readPrefixedHeader } from '../text-header.js';
import type { PrefixedHeader } from '../text-header.js';
import type { ProbeResult, TiqGeometry } from '../types.js';
import { addressWindow } from '../window.js';

type XmlRecord = { [key: string]: unknown };

/** One element of the ordered parse tree. */
interface XmlElement {
    tag: string;
    children: unknown[];
    attributes: unknown;
}

const ATTR = '@_';
const ATTRIBUTES = ':@';
const TEXT = '#text';
// Enough for the opening element that carries the data offset.
const FIRST_LINE_LIMIT = 4096;

// preserveOrder keeps siblings of different names in document order
const xmlParser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTR,
    textNodeName: TEXT,
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
});

function isRecord(value: unknown): value is XmlRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asElement(node: unknown): XmlElement | null {
    if (!isRecord(node)) return null;
    for (const [key, children] of Object.entries(node)) {
        if (key === ATTRIBUTES || key === TEXT) continue;
        return Array.isArray(children) ? { tag: key, children, attributes: node[ATTRIBUTES] } : null;
    }
    return null;
}

/** Every element named `tag` below `nodes`, in document order. */
function* findElements(nodes: unknown[], tag: string): Generator<XmlElement> {
    for (const node of nodes) {
        const element = asElement(node);
        if (!element) continue;
        if (element.tag === tag) yield element;
        yield* findElements(element.children, tag);
    }
}

function childElement(element: XmlElement, tag: string): XmlElement | null {
    for (const node of element.children) {
        const child = asElement(node);
        if (child && child.tag === tag) return child;
    }
    return null;
}

function textOf(element: XmlElement): string | null {
    const parts: string[] = [];
    for (const node of element.children) {
        if (!isRecord(node)) continue;
        const text = node[TEXT];
        if (typeof text === 'string' || typeof text === 'number') parts.push(String(text));
    }
    return parts.length > 0 ? parts.join('') : null;
}

function attributeOf(element: XmlElement, name: string): string | null {
    if (!isRecord(element.attributes)) return null;
    const value = element.attributes[ATTR + name];
    return typeof value === 'string' ? value : null;
}

function toNumber(raw: string, field: string): number {
    const value = Number(raw.trim());
    if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new MalformedMetadataError(`XML field ${field} is not numeric: "${raw}"`, field, 'tiq');
    }
    return value;
}

/** Instrument header values read from the XML block. */
export class TiqDescriptor {
    constructor(private readonly root: unknown[]) { }

    static parse(xml: string): TiqDescriptor {
        let root: unknown;
        try {
            root = xmlParser.parse(xml);
        } catch (error) {
            throw new StructuralMismatchError(`XML header does not parse: ${error instanceof Error ? error.message : String(error)}`, 'tiq');
        }
        if (!Array.isArray(root)) {
            throw new StructuralMismatchError('XML header has no elements', 'tiq');
        }
        return new TiqDescriptor(root);
    }

    /** Text of the last element named `tag`, or null when there is none. */
    text(tag: string): string | null {
        let last: string | null = null;
        for (const element of findElements(this.root, tag)) {
            const text = textOf(element);
            if (text !== null) last = text;
        }
        return last;
    }

    number(tag: string): number | null {
        const text = this.text(tag);
        return text === null ? null : toNumber(text, tag);
    }

    requireNumber(tag: string): number {
        const value = this.number(tag);
        if (value === null) {
            throw new MalformedMetadataError(`XML field ${tag} is missing`, tag, 'tiq');
        }
        return value;
    }

    /**
     * Value of a `NumericParameter` matching both its display name and its
     * pid. Other parameters share either key, so one alone is not enough.
     */
    numericParameter(name: string, pid: string): number | null {
        let last: number | null = null;
        for (const element of findElements(this.root, 'NumericParameter')) {
            if (attributeOf(element, 'name') !== name || attributeOf(element, 'pid') !== pid) continue;
            const value = childElement(element, 'Value');
            const text = value === null ? null : textOf(value);
            if (text !== null) last = toNumber(text, `${name} (${pid})`);
        }
        return last;
    }

    toMetadata(): Readonly<CaptureMetadata> {
        return makeMetadata({
            acquisitionBandwidth: this.number('AcquisitionBandwidth') ?? 0,
            centerFrequency: this.number('Frequency') ?? 0,
            timestamp: this.text('DateTime') ?? '',
            numberSamples: this.requireNumber('NumberSamples'),
            resolutionBandwidth: this.numericParameter('Resolution Bandwidth', 'rbw') ?? 0,
            attenuation: this.number('RFAttenuation') ?? 0,
            sampleRate: this.requireNumber('SamplingFrequency'),
            span: this.numericParameter('Span', 'globalrange') ?? 0,
            scale: this.requireNumber('Scaling'),
        });
    }
}

/**
 * Locates the XML block. Either a length-prefixed header, or a first line
 * whose first quoted attribute holds the payload offset.
 */
export async function locateTiqHeader(file: FileSource): Promise<PrefixedHeader> {
    const first = await file.readAt(0, 1);
    if (first[0] >= 0x30 && first[0] <= 0x39) {
        return readPrefixedHeader(file, 'tiq');
    }

    const head = new TextDecoder('utf-8').decode(await file.readAt(0, Math.min(file.size, FIRST_LINE_LIMIT)));
    const firstLine = head.split('\n', 1)[0];
    const quoted = firstLine.split('"');
    const offset = quoted.length > 1 && /^\d+$/.test(quoted[1]) ? Number(quoted[1]) : NaN;
    if (!Number.isSafeInteger(offset) || offset <= 0 || offset > file.size) {
        throw new StructuralMismatchError('First line does not declare a data offset', 'tiq');
    }
    const text = new TextDecoder('utf-8').decode(await file.readAt(0, offset)).replace(/\0+$/, '');
    return { text, dataOffset: offset };
}

/**
 * XML-described captures with a flat payload of int32 I/Q pairs.
 */
export class TiqReader extends CaptureReader<TiqGeometry> {
    readonly format = 'tiq' as const;

    protected async probeFile(file: FileSource): Promise<ProbeResult<TiqGeometry>> {
        const { text, dataOffset } = await locateTiqHeader(file);
        const metadata = TiqDescriptor.parse(text).toMetadata();
        if (!Number.isSafeInteger(metadata.numberSamples) || metadata.numberSamples < 0) {
            throw new MalformedMetadataError(`NumberSamples is not a count: ${metadata.numberSamples}`, 'NumberSamples', this.format);
        }
        const payload = file.size - dataOffset;
        if (payload < metadata.numberSamples * TIQ_BYTES_PER_SAMPLE) {
            throw new StructuralMismatchError(
                `Header declares ${metadata.numberSamples} samples but payload holds ${payload} bytes`,
                this.format
            );
        }

        this.logger?.info?.(
            `[tiq] center ${metadata.centerFrequency} Hz, span ${metadata.span} Hz, fs ${metadata.sampleRate}, scale ${metadata.scale}, header ${dataOffset} bytes`
        );
        return {
            format: this.format,
            metadata,
            geometry: { kind: 'tiq', dataOffset, bytesPerSample: TIQ_BYTES_PER_SAMPLE },
        };
    }

    protected async readWindow(file: FileSource, probe: ProbeResult<TiqGeometry>, request: WindowRequest): Promise<SampleBuffer> {
        const { geometry, metadata } = probe;
        const address = addressWindow(request, { samplesPerUnit: 1, unitsPerFile: metadata.numberSamples }, this.format);
        const bytes = await file.readAt(
            geometry.dataOffset + address.startSample * geometry.bytesPerSample,
            address.sampleCount * geometry.bytesPerSample
        );
        const view = dataView(bytes);
        const raw = new Int32Array(address.sampleCount * 2);
        for (let k = 0; k < raw.length; k++) {
            raw[k] = view.getInt32(k * 4, true);
        }
        return normalizeInterleaved(raw, metadata.scale);
    }
}
