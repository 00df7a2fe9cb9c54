export class PipelineError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

export class ConfigurationError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/** Library root unreadable, duplicate relative keys. Aborts before any work starts. */
export class PlanningError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/** Remote host unreachable or not ready. */
export class EnvironmentError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export type TransferErrorOptions = ErrorOptions & { retryable?: boolean };

export class TransferError extends PipelineError {
    readonly retryable: boolean;

    constructor(message: string, options?: TransferErrorOptions) {
        super(message, options);
        this.retryable = options?.retryable ?? true;
    }
}

export type ConversionErrorKind = 'transient' | 'unprocessable';

export class ConversionError extends PipelineError {
    readonly kind: ConversionErrorKind;

    constructor(message: string, kind: ConversionErrorKind, options?: ErrorOptions) {
        super(message, options);
        this.kind = kind;
    }
}

export class MetadataError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class CancelledError extends PipelineError {
    constructor(message = 'Run cancelled', options?: ErrorOptions) {
        super(message, options);
    }
}

export class FfmpegNotFoundError extends MetadataError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export function isFatalError(error: unknown): boolean {
    return (
        error instanceof ConfigurationError ||
        error instanceof PlanningError ||
        error instanceof EnvironmentError
    );
}

export function isRetryableError(error: unknown): boolean {
    if (error instanceof TransferError) return error.retryable;
    if (error instanceof ConversionError) return error.kind === 'transient';
    return false;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
