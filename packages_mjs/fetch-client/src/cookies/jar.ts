/**
 * Default cookie jar backed by tough-cookie.
 */
import { Cookie, CookieJar as ToughCookieJar } from 'tough-cookie';
import { CookieJar } from '../types.js';

export class MemoryCookieJar implements CookieJar {
    private store: ToughCookieJar;

    constructor(store?: ToughCookieJar) {
        this.store = store ?? new ToughCookieJar();
    }

    getCookies(url: string): Cookie[] {
        return this.store.getCookiesSync(url);
    }

    setCookies(url: string, cookies: Cookie[]): void {
        for (const cookie of cookies) {
            this.store.setCookieSync(cookie, url);
        }
    }
}

export function createCookieJar(): CookieJar {
    return new MemoryCookieJar();
}

export function cookiesFromMap(map: Record<string, string>): Cookie[] {
    return Object.entries(map).map(([key, value]) => new Cookie({ key, value }));
}

/**
 * Parse `Set-Cookie` header values, skipping the ones tough-cookie rejects.
 */
export function parseSetCookie(values: string | string[] | undefined): Cookie[] {
    if (values === undefined) return [];
    const list = Array.isArray(values) ? values : [values];
    const cookies: Cookie[] = [];
    for (const value of list) {
        const cookie = Cookie.parse(value);
        if (cookie) cookies.push(cookie);
    }
    return cookies;
}

export function formatCookieHeader(cookies: Cookie[]): string {
    return cookies.map(cookie => cookie.cookieString()).join('; ');
}
