/**
 * Tests for query merging.
 */
import { MalformedURLError } from '../src/errors.js';
import { encodeForm, mergeObjectParams, mergeParams, queryValues } from '../src/core/url.js';

describe('mergeParams', () => {
    test('sets params and sorts the query', () => {
        expect(mergeParams('http://simple.org/path/?b=a', { b: 'b', a: 'c' }))
            .toBe('http://simple.org/path/?a=c&b=b');
    });

    test('keeps existing keys that are not overwritten', () => {
        expect(mergeParams('https://example.com/x?keep=1&b=old', { b: 'new' }))
            .toBe('https://example.com/x?b=new&keep=1');
    });

    test('replaces every existing value of a key', () => {
        expect(mergeParams('https://example.com/?a=1&a=2', { a: '3' })).toBe('https://example.com/?a=3');
    });

    test('keeps the fragment after the query', () => {
        expect(mergeParams('https://example.com/x?z=1#frag', { a: '1' }))
            .toBe('https://example.com/x?a=1&z=1#frag');
    });

    test('form-encodes values', () => {
        expect(mergeParams('https://example.com/', { q: 'a b&c' })).toBe('https://example.com/?q=a+b%26c');
        expect(mergeParams('https://example.com/', { q: '*~' })).toBe('https://example.com/?q=%2A~');
    });

    test('parsed result holds exactly the merged keys', () => {
        const params = { page: '2', sort: 'name', q: 'x=y' };
        const merged = new URL(mergeParams('https://example.com/list?page=1&lang=en', params));

        for (const [key, value] of Object.entries(params)) {
            expect(merged.searchParams.getAll(key)).toEqual([value]);
        }
        expect(merged.searchParams.getAll('lang')).toEqual(['en']);
        expect([...merged.searchParams.keys()]).toEqual(['lang', 'page', 'q', 'sort']);
    });

    test('returns the URL untouched for an empty map', () => {
        expect(mergeParams('not a url', {})).toBe('not a url');
    });

    test('rejects an unparsable URL', () => {
        expect(() => mergeParams('not a url', { a: '1' })).toThrow(MalformedURLError);
    });
});

describe('mergeObjectParams', () => {
    test('adds values, keeping repeated keys in order', () => {
        const url = mergeObjectParams('https://e.com/?tag=x', {
            tag: ['a', 'b'],
            page: 2,
            q: undefined,
            flag: true
        });
        expect(url).toBe('https://e.com/?flag=true&page=2&tag=x&tag=a&tag=b');
    });

    test('leaves a URL without query alone for an empty object', () => {
        expect(mergeObjectParams('https://e.com/path', {})).toBe('https://e.com/path');
    });

    test('rejects an unparsable URL', () => {
        expect(() => mergeObjectParams('::', { a: 1 })).toThrow(MalformedURLError);
    });
});

describe('queryValues', () => {
    test('flattens nested objects with bracketed keys', () => {
        expect(queryValues({ filter: { status: 'open', ids: [1, 2] } })).toEqual([
            ['filter[status]', 'open'],
            ['filter[ids]', '1'],
            ['filter[ids]', '2']
        ]);
    });

    test('formats dates as ISO strings and skips null', () => {
        expect(queryValues({ since: new Date(Date.UTC(2024, 0, 2)), until: null })).toEqual([
            ['since', '2024-01-02T00:00:00.000Z']
        ]);
    });
});

describe('encodeForm', () => {
    test('sorts keys and form-encodes values', () => {
        expect(encodeForm({ b: '2', a: '1 2' })).toBe('a=1+2&b=2');
    });

    test('escapes asterisks and leaves tildes bare', () => {
        expect(encodeForm({ k: 'a*b~c' })).toBe('k=a%2Ab~c');
    });
});
