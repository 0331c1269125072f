import type { CaptureFormat, WindowRequest } from '../iq-types.js';

export class IqError extends Error {
    constructor(message: string, public readonly format: CaptureFormat | null = null, public originalError?: unknown) {
        super(format ? `[${format}] ${message}` : message);
        this.name = 'IqError';
    }
}

/** File size or header shape violates a format invariant. */
export class StructuralMismatchError extends IqError {
    constructor(message: string, format: CaptureFormat | null = null) {
        super(message, format);
        this.name = 'StructuralMismatchError';
    }
}

/** The requested window is invalid or lies outside the capture. */
export class WindowRangeError extends IqError {
    constructor(message: string, public readonly request: WindowRequest | null = null, format: CaptureFormat | null = null) {
        super(message, format);
        this.name = 'WindowRangeError';
    }
}

/** A required header field is absent or cannot be read as the expected type. */
export class MalformedMetadataError extends IqError {
    constructor(message: string, public readonly field: string, format: CaptureFormat | null = null) {
        super(message, format);
        this.name = 'MalformedMetadataError';
    }
}

/** The file could not be opened or read, or ended early. */
export class IqIoError extends IqError {
    constructor(message: string, public readonly path: string, originalError?: unknown, format: CaptureFormat | null = null) {
        super(message, format, originalError);
        this.name = 'IqIoError';
    }
}

export class UnsupportedFormatError extends IqError {
    constructor(filename: string) {
        super(`No reader registered for ${filename}`);
        this.name = 'UnsupportedFormatError';
    }
}

/** A probe scan hit its segment or byte budget before learning the file geometry. */
export class ProbeBudgetExceededError extends IqError {
    constructor(message: string, format: CaptureFormat | null = null) {
        super(message, format);
        this.name = 'ProbeBudgetExceededError';
    }
}
