export class FetchSessionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'FetchSessionError';
    }
}

export class MalformedURLError extends FetchSessionError {
    constructor(
        public url: string,
        cause?: unknown
    ) {
        super(`Malformed URL '${url}'`, { cause });
        this.name = 'MalformedURLError';
    }
}

export class EncodingError extends FetchSessionError {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'EncodingError';
    }
}

export class IOError extends FetchSessionError {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'IOError';
    }
}

export class RequestConstructionError extends FetchSessionError {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'RequestConstructionError';
    }
}

export class TooManyRedirectsError extends FetchSessionError {
    constructor(
        public limit: number,
        public url: string
    ) {
        super(`Stopped after ${limit} redirects (next: ${url})`);
        this.name = 'TooManyRedirectsError';
    }
}

export type PrepareStage = 'url' | 'body' | 'construct' | 'headers';

export class PrepareRequestError extends FetchSessionError {
    constructor(
        public stage: PrepareStage,
        public cause: Error
    ) {
        super(`Failed to prepare request (${stage}): ${cause.message}`, { cause });
        this.name = 'PrepareRequestError';
    }
}

export class HttpStatusError extends FetchSessionError {
    constructor(
        public status: number,
        public url: string
    ) {
        super(`Request to ${url} failed with status ${status}`);
        this.name = 'HttpStatusError';
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
