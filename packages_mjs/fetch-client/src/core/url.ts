/**
 * Query string merging.
 */
import { EncodingError, MalformedURLError } from '../errors.js';
import { QueryObject, QueryScalar } from '../types.js';

function parseUrl(url: string): URL {
    try {
        return new URL(url);
    } catch (e) {
        throw new MalformedURLError(url, e);
    }
}

/**
 * Form-encode with keys sorted, values of one key kept in order
 * (URLSearchParams.sort is stable). `*` is escaped and `~` left bare, so
 * only letters, digits and `-_.~` appear unescaped.
 */
function encodeSorted(query: URLSearchParams): string {
    query.sort();
    return query.toString().replace(/\*/g, '%2A').replace(/%7E/g, '~');
}

function replaceQuery(parsed: URL, query: URLSearchParams): string {
    parsed.search = encodeSorted(query);
    return parsed.toString();
}

/**
 * Set each of `params` on the URL's query, overwriting existing values.
 */
export function mergeParams(url: string, params: Record<string, string>): string {
    const entries = Object.entries(params);
    if (entries.length === 0) return url;

    const parsed = parseUrl(url);
    const query = new URLSearchParams(parsed.search);
    for (const [key, value] of entries) {
        query.set(key, value);
    }
    return replaceQuery(parsed, query);
}

/**
 * Add every value of a structured query object to the URL's query.
 */
export function mergeObjectParams(url: string, object: QueryObject): string {
    const parsed = parseUrl(url);
    const query = new URLSearchParams(parsed.search);
    for (const [key, value] of queryValues(object)) {
        query.append(key, value);
    }
    return replaceQuery(parsed, query);
}

function formatScalar(value: QueryScalar): string {
    if (value instanceof Date) {
        if (Number.isNaN(value.getTime())) {
            throw new EncodingError('Cannot encode an invalid Date as a query value');
        }
        return value.toISOString();
    }
    return String(value);
}

function isQueryObject(value: QueryObject[string]): value is QueryObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Flatten a query object into ordered key/value pairs.
 * Nested objects become `parent[child]`; null and undefined are skipped.
 */
export function queryValues(object: QueryObject, prefix?: string): Array<[string, string]> {
    const pairs: Array<[string, string]> = [];
    for (const [field, value] of Object.entries(object)) {
        const key = prefix ? `${prefix}[${field}]` : field;
        if (value === undefined || value === null) continue;
        if (Array.isArray(value)) {
            for (const item of value) {
                pairs.push([key, formatScalar(item)]);
            }
        } else if (isQueryObject(value)) {
            pairs.push(...queryValues(value, key));
        } else {
            pairs.push([key, formatScalar(value)]);
        }
    }
    return pairs;
}

/**
 * URL-encode a flat map with keys sorted alphabetically.
 */
export function encodeForm(data: Record<string, string>): string {
    return encodeSorted(new URLSearchParams(data));
}
