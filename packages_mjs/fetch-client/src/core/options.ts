/**
 * Request options: composable mutators over the argument bag.
 */
import { basename } from 'node:path';
import { Readable } from 'node:stream';
import { ClientDefaults, DEFAULT_CLIENT_DEFAULTS } from '../config.js';
import { createCookieJar } from '../cookies/jar.js';
import {
    CookieJar,
    FileField,
    HttpClient,
    QueryObject,
    RequestArguments,
    RequestOption
} from '../types.js';
import { UndiciHttpClient } from './base-client.js';

/**
 * Fresh argument bag seeded from `defaults`. Without a client, a new one is
 * created around its own cookie jar.
 */
export function newRequestArguments(
    defaults: ClientDefaults = DEFAULT_CLIENT_DEFAULTS,
    httpClient?: HttpClient
): RequestArguments {
    return {
        client: httpClient ?? new UndiciHttpClient({ jar: createCookieJar() }),
        headers: { ...defaults.headers },
        params: {},
        redirectLimit: defaults.redirectLimit,
        timeout: defaults.timeout
    };
}

export function applyOptions(args: RequestArguments, options: RequestOption[]): RequestArguments {
    for (const option of options) {
        option(args);
    }
    return args;
}

// Map-valued options merge into what is already there.

export function headers(map: Record<string, string>): RequestOption {
    return args => {
        args.headers = { ...args.headers, ...map };
    };
}

export function header(name: string, value: string): RequestOption {
    return headers({ [name]: value });
}

export function params(map: Record<string, string>): RequestOption {
    return args => {
        args.params = { ...args.params, ...map };
    };
}

export function cookies(map: Record<string, string>): RequestOption {
    return args => {
        args.cookies = { ...args.cookies, ...map };
    };
}

export function data(map: Record<string, string>): RequestOption {
    return args => {
        args.data = { ...args.data, ...map };
    };
}

// Everything else replaces.

export function objectParams(object: QueryObject): RequestOption {
    return args => {
        args.objectParams = object;
    };
}

export function auth(username: string, password: string): RequestOption {
    return args => {
        args.auth = { username, password };
    };
}

export function jar(cookieJar: CookieJar): RequestOption {
    return args => {
        args.jar = cookieJar;
    };
}

export function client(httpClient: HttpClient): RequestOption {
    return args => {
        args.client = httpClient;
    };
}

/**
 * JSON body. Strings and byte arrays are sent as is; anything else is
 * serialized when the request is prepared.
 */
export function json(value: unknown): RequestOption {
    return args => {
        if (typeof value === 'string') {
            args.json = { kind: 'text', text: value };
        } else if (value instanceof Uint8Array) {
            args.json = { kind: 'bytes', bytes: value };
        } else {
            args.json = { kind: 'structured', value };
        }
    };
}

/**
 * Explicit body, sent without Content-Type inference. Takes precedence over
 * json, files and data.
 */
export function body(value: string | Uint8Array | Readable): RequestOption {
    return args => {
        if (typeof value === 'string') {
            args.body = { kind: 'text', text: value };
        } else if (value instanceof Uint8Array) {
            args.body = { kind: 'bytes', bytes: value };
        } else {
            args.body = { kind: 'stream', stream: value };
        }
    };
}

/**
 * Explicit body read from a file when the request is prepared.
 */
export function fileContent(path: string): RequestOption {
    return args => {
        args.body = { kind: 'file', path };
    };
}

/**
 * Multipart file parts. Each call appends to the parts already set.
 */
export function files(fields: FileField[]): RequestOption {
    return args => {
        args.files = [...(args.files ?? []), ...fields];
    };
}

/**
 * Multipart file part read from disk, named after the file. The file is
 * opened when the body is encoded.
 */
export function formFile(fieldName: string, path: string): RequestOption {
    return files([{ fieldName, fileName: basename(path), path }]);
}

export function timeout(ms: number): RequestOption {
    if (!Number.isFinite(ms) || ms < 0) {
        throw new RangeError(`timeout must be a non-negative number, got ${ms}`);
    }
    return args => {
        args.timeout = ms;
    };
}

export function redirectLimit(limit: number): RequestOption {
    if (!Number.isInteger(limit) || limit < 0) {
        throw new RangeError(`redirectLimit must be a non-negative integer, got ${limit}`);
    }
    return args => {
        args.redirectLimit = limit;
    };
}
