/**
 * Core HTTP client implementation based on undici.
 */
import { Readable } from 'node:stream';
import { Agent, Dispatcher, Headers } from 'undici';
import { formatCookieHeader, parseSetCookie } from '../cookies/jar.js';
import { getLogger, redactHeaders } from '../logger.js';
import {
    CookieJar,
    ExecuteOptions,
    HttpClient,
    HttpMethod,
    PreparedRequest,
    RawResponse,
    ResponseHeaders
} from '../types.js';
import { REDIRECT_STATUSES, redirectPolicy } from './redirect.js';

const logger = getLogger();

export interface UndiciHttpClientOptions {
    /** Dispatcher used for every hop; an Agent is created when omitted. */
    dispatcher?: Dispatcher;
    jar?: CookieJar;
    /** Connect timeout for the Agent created by this client (ms). */
    connectTimeout?: number;
}

interface Hop {
    method: HttpMethod;
    url: URL;
    headers: Headers;
    body: Buffer | Readable | null;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}

export class UndiciHttpClient implements HttpClient {
    readonly jar?: CookieJar;
    private dispatcher?: Dispatcher;
    private ownDispatcher: boolean = false;
    private connectTimeout?: number;

    constructor(options: UndiciHttpClientOptions = {}) {
        this.jar = options.jar;
        this.dispatcher = options.dispatcher;
        this.connectTimeout = options.connectTimeout;
    }

    /**
     * Initialize dispatcher if needed.
     */
    private ensureDispatcher(): Dispatcher {
        if (!this.dispatcher) {
            this.dispatcher = new Agent({
                connect: { timeout: this.connectTimeout }
            });
            this.ownDispatcher = true;
        }
        return this.dispatcher;
    }

    async close(): Promise<void> {
        if (this.ownDispatcher && this.dispatcher) {
            await this.dispatcher.close();
            this.dispatcher = undefined;
            this.ownDispatcher = false;
        }
    }

    /**
     * Execute `request`, storing cookies and following redirects.
     */
    async do(request: PreparedRequest, options: ExecuteOptions = {}): Promise<RawResponse> {
        const dispatcher = this.ensureDispatcher();
        const checkRedirect = options.checkRedirect ?? redirectPolicy();
        const jar = request.jar;

        let hop: Hop = {
            method: request.method,
            url: new URL(request.url),
            headers: new Headers(request.headers),
            body: request.body
        };
        let redirects = 0;

        for (;;) {
            logger.debug(`${hop.method} ${hop.url}`, redactHeaders(hop.headers));

            let response: Dispatcher.ResponseData;
            try {
                response = await dispatcher.request({
                    origin: hop.url.origin,
                    path: `${hop.url.pathname}${hop.url.search}`,
                    method: hop.method,
                    headers: Object.fromEntries(hop.headers),
                    body: hop.body,
                    ...(options.timeout ? { headersTimeout: options.timeout, bodyTimeout: options.timeout } : {})
                });
            } catch (e) {
                logger.error(`${hop.method} ${hop.url} failed`, e);
                throw e;
            }

            if (jar) {
                jar.setCookies(hop.url.toString(), parseSetCookie(response.headers['set-cookie']));
            }

            const next = this.nextHop(hop, response.statusCode, response.headers);
            if (!next) {
                const body = Buffer.from(await response.body.arrayBuffer());
                return {
                    statusCode: response.statusCode,
                    headers: response.headers,
                    body,
                    url: hop.url.toString(),
                    redirects
                };
            }

            await response.body.dump();
            redirects += 1;
            checkRedirect(redirects, next.url.toString());
            logger.debug(`Redirect ${redirects}: ${response.statusCode} -> ${next.url}`);

            if (jar) {
                next.headers.delete('cookie');
                const cookies = jar.getCookies(next.url.toString());
                if (cookies.length > 0) next.headers.set('cookie', formatCookieHeader(cookies));
            }
            hop = next;
        }
    }

    /**
     * The request to issue for a redirect response, or null when the response
     * is final.
     */
    private nextHop(hop: Hop, status: number, headers: ResponseHeaders): Hop | null {
        const location = firstHeader(headers.location);
        if (!REDIRECT_STATUSES.includes(status) || !location) {
            return null;
        }

        const url = new URL(location, hop.url);
        const nextHeaders = new Headers(hop.headers);
        if (url.host !== hop.url.host) {
            nextHeaders.delete('authorization');
        }

        if (status === 307 || status === 308) {
            // a consumed stream cannot be replayed
            if (hop.body instanceof Readable) return null;
            return { method: hop.method, url, headers: nextHeaders, body: hop.body };
        }

        nextHeaders.delete('content-type');
        nextHeaders.delete('content-length');
        return {
            method: hop.method === 'HEAD' ? 'HEAD' : 'GET',
            url,
            headers: nextHeaders,
            body: null
        };
    }
}
