/**
 * One-shot requests: each call builds a fresh argument bag and client.
 */
import { applyOptions, newRequestArguments } from './core/options.js';
import { prepareRequest } from './core/prepare.js';
import { redirectPolicy } from './core/redirect.js';
import { Response } from './response.js';
import { RequestArguments, RequestOption } from './types.js';

/**
 * Assemble and execute a request from a populated argument bag.
 */
export async function send(method: string, url: string, args: RequestArguments): Promise<Response> {
    const prepared = await prepareRequest(method, url, args);
    const raw = await args.client.do(prepared, {
        checkRedirect: redirectPolicy(args.redirectLimit),
        timeout: args.timeout
    });
    return new Response(raw);
}

export async function request(method: string, url: string, ...options: RequestOption[]): Promise<Response> {
    const args = newRequestArguments();
    const owned = args.client;
    applyOptions(args, options);
    try {
        return await send(method, url, args);
    } finally {
        // a client passed in through options belongs to the caller
        if (args.client === owned) {
            await owned.close();
        }
    }
}

export function get(url: string, ...options: RequestOption[]): Promise<Response> {
    return request('GET', url, ...options);
}

export function head(url: string, ...options: RequestOption[]): Promise<Response> {
    return request('HEAD', url, ...options);
}

export function post(url: string, ...options: RequestOption[]): Promise<Response> {
    return request('POST', url, ...options);
}

export function put(url: string, ...options: RequestOption[]): Promise<Response> {
    return request('PUT', url, ...options);
}

export function patch(url: string, ...options: RequestOption[]): Promise<Response> {
    return request('PATCH', url, ...options);
}

export function del(url: string, ...options: RequestOption[]): Promise<Response> {
    return request('DELETE', url, ...options);
}

export function options(url: string, ...opts: RequestOption[]): Promise<Response> {
    return request('OPTIONS', url, ...opts);
}
