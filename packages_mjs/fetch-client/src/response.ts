/**
 * Response wrapper over a raw transport response.
 */
import { EncodingError, HttpStatusError } from './errors.js';
import { RawResponse, ResponseHeaders } from './types.js';

export class Response {
    readonly status: number;
    readonly headers: ResponseHeaders;
    readonly url: string;
    readonly redirects: number;
    private readonly body: Buffer;

    constructor(raw: RawResponse) {
        this.status = raw.statusCode;
        this.headers = raw.headers;
        this.url = raw.url;
        this.redirects = raw.redirects;
        this.body = raw.body;
    }

    /** Status is 2xx. */
    get ok(): boolean {
        return this.status >= 200 && this.status < 300;
    }

    /**
     * First value of a header, case-insensitive.
     */
    header(name: string): string | undefined {
        const lower = name.toLowerCase();
        for (const [key, value] of Object.entries(this.headers)) {
            if (key.toLowerCase() === lower) {
                return Array.isArray(value) ? value[0] : value;
            }
        }
        return undefined;
    }

    content(): Buffer {
        return this.body;
    }

    text(): string {
        return this.body.toString('utf8');
    }

    json<T = unknown>(): T {
        try {
            return JSON.parse(this.text());
        } catch (e) {
            throw new EncodingError(`Response from ${this.url} is not valid JSON`, e);
        }
    }

    raiseForStatus(): this {
        if (this.status >= 400) {
            throw new HttpStatusError(this.status, this.url);
        }
        return this;
    }
}
