/**
 * Error types raised by collaborators at the engine's edges.
 *
 * None of these escape the public API: per-photo failures are logged and the
 * photo is dropped, per-face gaps fall back to neutral defaults.
 */

export class EngineError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type ImageLoadErrorKind = 'not_found' | 'io_error';

export class ImageLoadError extends EngineError {
    constructor(
        readonly kind: ImageLoadErrorKind,
        readonly photoId: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/** Non-recoverable detector failure for one photo. */
export class DetectionError extends EngineError {
    constructor(readonly photoId: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class EmbeddingError extends EngineError { }

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
