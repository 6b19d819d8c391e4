/**
 * Error taxonomy
 *
 * Feed-level errors (FetchError, ParseError) skip one feed for one pass.
 * Episode-level errors (DownloadError, TranscriptionError, UnknownError) fail
 * one episode, which is retried on the next pass. StateStoreError is fatal.
 */

export class PodscribeError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PodscribeError';
    }
}

export class FetchError extends PodscribeError {
    readonly feedUrl: string;
    readonly status?: number;

    constructor(feedUrl: string, message: string, options?: { cause?: unknown; status?: number }) {
        super(message, options);
        this.name = 'FetchError';
        this.feedUrl = feedUrl;
        this.status = options?.status;
    }
}

export class ParseError extends PodscribeError {
    readonly feedUrl: string;

    constructor(feedUrl: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ParseError';
        this.feedUrl = feedUrl;
    }
}

export class DownloadError extends PodscribeError {
    readonly url: string;
    readonly retryable: boolean;

    constructor(url: string, message: string, options?: { cause?: unknown; retryable?: boolean }) {
        super(message, options);
        this.name = 'DownloadError';
        this.url = url;
        this.retryable = options?.retryable ?? false;
    }
}

export class TranscriptionError extends PodscribeError {
    readonly engine: string;

    constructor(engine: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TranscriptionError';
        this.engine = engine;
    }
}

export class UnknownError extends PodscribeError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'UnknownError';
    }
}

export class StateStoreError extends PodscribeError {
    readonly path: string;

    constructor(path: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StateStoreError';
        this.path = path;
    }
}

export class ConfigurationError extends PodscribeError {
    readonly problems: string[];

    constructor(problems: string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`);
        this.name = 'ConfigurationError';
        this.problems = problems;
    }
}

/** Episode-level failures carried by a failed ProcessingOutcome. */
export type EpisodeError = DownloadError | TranscriptionError | UnknownError;

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

export const isNodeError = (error: unknown, code: string): boolean =>
    error instanceof Error && 'code' in error && error.code === code;
