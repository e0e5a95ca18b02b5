/**
 * Session: one client and cookie jar shared by every call.
 *
 * The jar is shared, not copied, so cookies stored by one call are sent on
 * the next. Overlapping calls are not serialized; a custom client or jar used
 * that way must tolerate interleaved access.
 */
import type { Dispatcher } from 'undici';
import { send } from './client.js';
import { ClientDefaults, ClientDefaultsInput, resolveDefaults } from './config.js';
import { createCookieJar } from './cookies/jar.js';
import { UndiciHttpClient } from './core/base-client.js';
import { applyOptions, newRequestArguments } from './core/options.js';
import { Response } from './response.js';
import { CookieJar, HttpClient, RequestOption } from './types.js';

export interface SessionOptions {
    /** Client to borrow; it is not closed by the session. */
    client?: HttpClient;
    jar?: CookieJar;
    /** Dispatcher for the client the session creates. */
    dispatcher?: Dispatcher;
    defaults?: ClientDefaultsInput;
}

export class Session {
    readonly client: HttpClient;
    readonly jar?: CookieJar;
    readonly defaults: ClientDefaults;
    private readonly ownClient: boolean;

    constructor(options: SessionOptions = {}) {
        this.defaults = resolveDefaults(options.defaults);
        if (options.client) {
            this.client = options.client;
            this.jar = options.jar ?? options.client.jar;
            this.ownClient = false;
        } else {
            this.jar = options.jar ?? createCookieJar();
            this.client = new UndiciHttpClient({ jar: this.jar, dispatcher: options.dispatcher });
            this.ownClient = true;
        }
    }

    static create(options?: SessionOptions): Session {
        return new Session(options);
    }

    async request(method: string, url: string, ...options: RequestOption[]): Promise<Response> {
        const args = newRequestArguments(this.defaults, this.client);
        if (this.jar && this.jar !== this.client.jar) {
            args.jar = this.jar;
        }
        applyOptions(args, options);
        return send(method, url, args);
    }

    get(url: string, ...options: RequestOption[]): Promise<Response> {
        return this.request('GET', url, ...options);
    }

    head(url: string, ...options: RequestOption[]): Promise<Response> {
        return this.request('HEAD', url, ...options);
    }

    post(url: string, ...options: RequestOption[]): Promise<Response> {
        return this.request('POST', url, ...options);
    }

    put(url: string, ...options: RequestOption[]): Promise<Response> {
        return this.request('PUT', url, ...options);
    }

    patch(url: string, ...options: RequestOption[]): Promise<Response> {
        return this.request('PATCH', url, ...options);
    }

    delete(url: string, ...options: RequestOption[]): Promise<Response> {
        return this.request('DELETE', url, ...options);
    }

    options(url: string, ...options: RequestOption[]): Promise<Response> {
        return this.request('OPTIONS', url, ...options);
    }

    async close(): Promise<void> {
        if (this.ownClient) {
            await this.client.close();
        }
    }
}
