/**
 * Request assembly: URL, body, transport request, auth, headers, cookies.
 */
import { Readable } from 'node:stream';
import { encodeBasicAuth } from '@fetch-session/auth-encoding';
import { Headers } from 'undici';
import { cookiesFromMap, formatCookieHeader } from '../cookies/jar.js';
import { PrepareRequestError, PrepareStage, RequestConstructionError, toError } from '../errors.js';
import { getLogger, redactHeaders } from '../logger.js';
import {
    CookieJar,
    HTTP_METHODS,
    HttpMethod,
    PreparedRequest,
    RequestArguments,
    RequestOption
} from '../types.js';
import { EncodedBody, encodeBody, releaseFiles } from './body.js';
import { applyOptions, newRequestArguments } from './options.js';
import { mergeObjectParams, mergeParams } from './url.js';

const logger = getLogger();

export function parseMethod(method: string): HttpMethod {
    const upper = method.toUpperCase();
    const found = HTTP_METHODS.find(m => m === upper);
    if (!found) {
        throw new RequestConstructionError(`Unsupported HTTP method '${method}'`);
    }
    return found;
}

function parseRequestUrl(url: string): URL {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch (e) {
        throw new RequestConstructionError(`Invalid request URL '${url}'`, e);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new RequestConstructionError(`Unsupported URL scheme '${parsed.protocol}' in '${url}'`);
    }
    return parsed;
}

async function stage<T>(name: PrepareStage, fn: () => T | Promise<T>): Promise<T> {
    try {
        return await fn();
    } catch (e) {
        throw new PrepareRequestError(name, toError(e));
    }
}

function resolveUrl(url: string, args: RequestArguments): string {
    // params win over objectParams when both are set
    if (Object.keys(args.params).length > 0) {
        return mergeParams(url, args.params);
    }
    if (args.objectParams) {
        return mergeObjectParams(url, args.objectParams);
    }
    return url;
}

/**
 * Streams the encoder would have consumed; released when assembly fails.
 */
function releaseStreams(args: RequestArguments, encoded?: EncodedBody): void {
    releaseFiles(args.files);
    if (args.body?.kind === 'stream' && !args.body.stream.destroyed) {
        args.body.stream.destroy();
    }
    if (encoded?.body instanceof Readable && !encoded.body.destroyed) {
        encoded.body.destroy();
    }
}

/**
 * Reconcile the per-call jar, the cookie map and the client's jar. Returns
 * the jar the request runs with.
 */
export function injectCookies(args: RequestArguments, url: string): CookieJar | undefined {
    if (args.jar) {
        return args.jar;
    }
    const clientJar = args.client.jar;
    if (args.cookies && clientJar) {
        const existing = clientJar.getCookies(url);
        clientJar.setCookies(url, [...existing, ...cookiesFromMap(args.cookies)]);
    }
    return clientJar;
}

function attachCookies(headers: Headers, url: string, args: RequestArguments, jar: CookieJar | undefined): void {
    const cookies = jar ? jar.getCookies(url) : cookiesFromMap(args.cookies ?? {});
    if (cookies.length === 0) return;

    const value = formatCookieHeader(cookies);
    const explicit = headers.get('cookie');
    headers.set('cookie', explicit ? `${explicit}; ${value}` : value);
}

/**
 * Assemble one outbound request from a populated argument bag.
 */
export async function prepareRequest(method: string, url: string, args: RequestArguments): Promise<PreparedRequest> {
    let encoded: EncodedBody | undefined;
    try {
        const target = await stage('url', () => resolveUrl(url, args));

        encoded = await stage('body', () => encodeBody(args));
        const { body, contentType, contentLength } = encoded;

        const { verb, parsed, headers } = await stage('construct', () => {
            const headers = new Headers();
            if (contentType) headers.set('content-type', contentType);
            if (contentLength !== undefined && contentLength > 0) {
                headers.set('content-length', String(contentLength));
            }
            return { verb: parseMethod(method), parsed: parseRequestUrl(target), headers };
        });
        const finalUrl = parsed.toString();

        const requestJar = await stage('headers', () => {
            if (args.auth) {
                headers.set('authorization', encodeBasicAuth(args.auth.username, args.auth.password));
            }
            for (const [name, value] of Object.entries(args.headers)) {
                headers.set(name, value);
            }
            const jar = injectCookies(args, finalUrl);
            attachCookies(headers, finalUrl, args, jar);
            return jar;
        });

        logger.debug(`Prepared ${verb} ${finalUrl}`, redactHeaders(headers));

        return {
            method: verb,
            url: finalUrl,
            headers,
            body,
            contentLength,
            jar: requestJar,
            getBody: () => (Buffer.isBuffer(body) ? Readable.from([body]) : null)
        };
    } catch (e) {
        releaseStreams(args, encoded);
        throw e;
    }
}

/**
 * Build an argument bag from `options` and assemble the request.
 */
export async function newRequest(method: string, url: string, ...options: RequestOption[]): Promise<PreparedRequest> {
    const args = applyOptions(newRequestArguments(), options);
    return prepareRequest(method, url, args);
}
