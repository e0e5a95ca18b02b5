/**
 * Request builder helper: a fluent front for the request options.
 */
import { Readable } from 'node:stream';
import { ClientDefaults, DEFAULT_CLIENT_DEFAULTS } from '../config.js';
import { Response } from '../response.js';
import {
    CookieJar,
    FileField,
    HttpClient,
    HttpMethod,
    PreparedRequest,
    QueryObject,
    RequestOption
} from '../types.js';
import * as opt from './options.js';
import { prepareRequest } from './prepare.js';
import { send } from '../client.js';

export class RequestBuilder {
    private readonly collected: RequestOption[] = [];

    constructor(
        private readonly target: string,
        private readonly verb: HttpMethod = 'GET',
        private readonly defaults: ClientDefaults = DEFAULT_CLIENT_DEFAULTS
    ) { }

    private add(option: RequestOption): this {
        this.collected.push(option);
        return this;
    }

    header(name: string, value: string): this {
        return this.add(opt.header(name, value));
    }

    headers(headers: Record<string, string>): this {
        return this.add(opt.headers(headers));
    }

    param(key: string, value: string): this {
        return this.add(opt.params({ [key]: value }));
    }

    params(params: Record<string, string>): this {
        return this.add(opt.params(params));
    }

    objectParams(object: QueryObject): this {
        return this.add(opt.objectParams(object));
    }

    auth(username: string, password: string): this {
        return this.add(opt.auth(username, password));
    }

    cookies(cookies: Record<string, string>): this {
        return this.add(opt.cookies(cookies));
    }

    jar(jar: CookieJar): this {
        return this.add(opt.jar(jar));
    }

    client(client: HttpClient): this {
        return this.add(opt.client(client));
    }

    json(data: unknown): this {
        return this.add(opt.json(data));
    }

    data(data: Record<string, string>): this {
        return this.add(opt.data(data));
    }

    files(files: FileField[]): this {
        return this.add(opt.files(files));
    }

    formFile(fieldName: string, path: string): this {
        return this.add(opt.formFile(fieldName, path));
    }

    /**
     * Set raw body.
     */
    body(data: string | Uint8Array | Readable): this {
        return this.add(opt.body(data));
    }

    fileContent(path: string): this {
        return this.add(opt.fileContent(path));
    }

    timeout(ms: number): this {
        return this.add(opt.timeout(ms));
    }

    redirectLimit(limit: number): this {
        return this.add(opt.redirectLimit(limit));
    }

    /** Options collected so far, in call order. */
    options(): RequestOption[] {
        return [...this.collected];
    }

    /**
     * Assemble without sending.
     */
    prepare(): Promise<PreparedRequest> {
        const args = opt.applyOptions(opt.newRequestArguments(this.defaults), this.collected);
        return prepareRequest(this.verb, this.target, args);
    }

    /**
     * Assemble and send through `client`, or through the client set with
     * `client()`.
     */
    async send(client?: HttpClient): Promise<Response> {
        const args = opt.newRequestArguments(this.defaults, client);
        const created = client ? undefined : args.client;
        opt.applyOptions(args, this.collected);
        try {
            return await send(this.verb, this.target, args);
        } finally {
            if (created && args.client === created) {
                await created.close();
            }
        }
    }
}
