import type { CaptureFormat, SampleBuffer, WindowRequest } from '../iq-types.js';
import { FileSource } from './file-source.js';
import type { GeometryDescriptor, IqLogger, IqReaderOptions, ProbeResult, ReadResult } from './types.js';
import { countFrames, validateWindowRequest } from './window.js';

/**
 * Common probe/read contract. A reader is bound to one file; the probe
 * result is cached for the reader's lifetime and every call opens and
 * closes its own file handle.
 */
export abstract class CaptureReader<G extends GeometryDescriptor = GeometryDescriptor> {
    abstract readonly format: CaptureFormat;
    protected readonly logger: IqLogger | null;
    private pendingProbe: Promise<ProbeResult<G>> | null = null;

    constructor(public readonly filename: string, protected readonly options: IqReaderOptions = {}) {
        this.logger = options.logger ?? null;
    }

    probe(): Promise<ProbeResult<G>> {
        if (!this.pendingProbe) {
            const pending = FileSource.with(this.filename, this.format, (file) => this.probeFile(file), this.logger);
            // a failed probe may be retried by the next caller
            void pending.catch((error: unknown) => {
                this.logger?.error?.(
                    `[${this.format}] probe of ${this.filename} failed: ${error instanceof Error ? error.message : String(error)}`
                );
                if (this.pendingProbe === pending) this.pendingProbe = null;
            });
            this.pendingProbe = pending;
        }
        return this.pendingProbe;
    }

    async read(request: WindowRequest): Promise<ReadResult> {
        validateWindowRequest(request, this.format);
        const probe = await this.probe();
        const samples = await FileSource.with(this.filename, this.format, (file) => this.readWindow(file, probe, request), this.logger);
        this.logger?.debug?.(
            `[${this.format}] read ${samples.length} samples from ${this.filename} (L=${request.frameLength}, N=${request.frameCount}, S=${request.startFrame})`
        );
        return {
            samples,
            metadata: probe.metadata,
            request: { ...request },
            totalFrames: countFrames(probe.metadata.numberSamples, request.frameLength),
        };
    }

    protected abstract probeFile(file: FileSource): Promise<ProbeResult<G>>;

    protected abstract readWindow(file: FileSource, probe: ProbeResult<G>, request: WindowRequest): Promise<SampleBuffer>;
}
