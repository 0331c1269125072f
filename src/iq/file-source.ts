import * as fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import type { CaptureFormat } from '../iq-types.js';
import { IqIoError } from './errors.js';
import type { IqLogger } from './types.js';

/**
 * Positional reads over one open capture file.
 * Every read either returns exactly the bytes asked for or throws.
 */
export class FileSource {
    private constructor(
        public readonly path: string,
        private readonly handle: FileHandle,
        public readonly size: number,
        public readonly changedAt: Date,
        private readonly format: CaptureFormat | null
    ) { }

    static async open(path: string, format: CaptureFormat | null = null): Promise<FileSource> {
        let handle: FileHandle;
        try {
            handle = await fs.open(path, 'r');
        } catch (error) {
            throw new IqIoError(`Cannot open ${path}`, path, error, format);
        }
        try {
            const stat = await handle.stat();
            return new FileSource(path, handle, stat.size, stat.ctime, format);
        } catch (error) {
            await handle.close();
            throw new IqIoError(`Cannot stat ${path}`, path, error, format);
        }
    }

    /**
     * Opens `path`, runs `run` and closes the handle whatever happens.
     * When `run` throws, a failing close is logged and the error from `run`
     * is the one that propagates.
     */
    static async with<T>(
        path: string,
        format: CaptureFormat | null,
        run: (file: FileSource) => Promise<T>,
        logger: IqLogger | null = null
    ): Promise<T> {
        const file = await FileSource.open(path, format);
        let result: T;
        try {
            result = await run(file);
        } catch (error) {
            try {
                await file.close();
            } catch (closeError) {
                logger?.warn?.(
                    `[${format ?? 'io'}] close of ${path} failed: ${closeError instanceof Error ? closeError.message : String(closeError)}`
                );
            }
            throw error;
        }
        await file.close();
        return result;
    }

    async readAt(position: number, length: number): Promise<Uint8Array> {
        if (position < 0 || position + length > this.size) {
            throw new IqIoError(
                `Read of ${length} bytes at ${position} runs past end of file (${this.size} bytes)`,
                this.path,
                undefined,
                this.format
            );
        }
        const buffer = new Uint8Array(length);
        let filled = 0;
        while (filled < length) {
            let bytesRead: number;
            try {
                ({ bytesRead } = await this.handle.read(buffer, filled, length - filled, position + filled));
            } catch (error) {
                throw new IqIoError(`Read failed at ${position + filled}`, this.path, error, this.format);
            }
            if (bytesRead === 0) {
                throw new IqIoError(`Unexpected end of file at ${position + filled}`, this.path, undefined, this.format);
            }
            filled += bytesRead;
        }
        return buffer;
    }

    async readAll(): Promise<Uint8Array> {
        return this.readAt(0, this.size);
    }

    async close(): Promise<void> {
        await this.handle.close();
    }
}

export function dataView(bytes: Uint8Array): DataView {
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
