/**
 * Core type definitions for fetch-session.
 */
import type { Readable } from 'node:stream';
import type { Cookie } from 'tough-cookie';
import type { Headers } from 'undici';

export const HTTP_METHODS = [
    'GET',
    'HEAD',
    'POST',
    'PUT',
    'PATCH',
    'DELETE',
    'OPTIONS',
    'TRACE',
    'CONNECT'
] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

/**
 * Pluggable cookie store. Cookies are read and written per URL.
 */
export interface CookieJar {
    getCookies(url: string): Cookie[];
    setCookies(url: string, cookies: Cookie[]): void;
}

export interface BasicAuth {
    username: string;
    password: string;
}

interface FilePart {
    fieldName: string;
    fileName: string;
}

/**
 * A file part of a multipart body. The encoder owns `content` and destroys it
 * once copied, or once another body strategy wins.
 */
export interface StreamFileField extends FilePart {
    content: Readable;
}

/**
 * A file part read from disk. The file is opened only when the multipart
 * body is encoded.
 */
export interface PathFileField extends FilePart {
    path: string;
}

export type FileField = StreamFileField | PathFileField;

export type JsonPayload =
    | { kind: 'text'; text: string }
    | { kind: 'bytes'; bytes: Uint8Array }
    | { kind: 'structured'; value: unknown };

export type BodySource =
    | { kind: 'text'; text: string }
    | { kind: 'bytes'; bytes: Uint8Array }
    | { kind: 'stream'; stream: Readable }
    | { kind: 'file'; path: string };

export type QueryScalar = string | number | boolean | bigint | Date;

export interface QueryObject {
    [key: string]: QueryScalar | QueryScalar[] | QueryObject | null | undefined;
}

export interface RedirectCheck {
    (redirectCount: number, nextUrl: string): void;
}

export interface ExecuteOptions {
    checkRedirect?: RedirectCheck;
    /** Milliseconds; 0 leaves the dispatcher defaults in place. */
    timeout?: number;
}

/**
 * Fully assembled outbound request.
 */
export interface PreparedRequest {
    method: HttpMethod;
    url: string;
    headers: Headers;
    body: Buffer | Readable | null;
    contentLength?: number;
    /** Jar used when the request is executed. */
    jar?: CookieJar;
    /** Fresh reader over a buffered body; null for streamed or empty bodies. */
    getBody(): Readable | null;
}

export type ResponseHeaders = Record<string, string | string[] | undefined>;

export interface RawResponse {
    statusCode: number;
    headers: ResponseHeaders;
    body: Buffer;
    /** Final URL after redirects. */
    url: string;
    redirects: number;
}

/**
 * Transport capability used by the request pipeline.
 */
export interface HttpClient {
    readonly jar?: CookieJar;
    do(request: PreparedRequest, options?: ExecuteOptions): Promise<RawResponse>;
    close(): Promise<void>;
}

/**
 * The argument bag: every request-shaping input of one call.
 */
export interface RequestArguments {
    client: HttpClient;
    headers: Record<string, string>;
    params: Record<string, string>;
    objectParams?: QueryObject;
    auth?: BasicAuth;
    cookies?: Record<string, string>;
    jar?: CookieJar;
    body?: BodySource;
    json?: JsonPayload;
    files?: FileField[];
    data?: Record<string, string>;
    redirectLimit: number;
    timeout: number;
}

export type RequestOption = (args: RequestArguments) => void;
