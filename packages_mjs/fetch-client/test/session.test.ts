/**
 * Tests for Session.
 */
import { MockAgent } from 'undici';
import { createCookieJar } from '../src/cookies/jar.js';
import { UndiciHttpClient } from '../src/core/base-client.js';
import * as opt from '../src/core/options.js';
import { TooManyRedirectsError } from '../src/errors.js';
import { Session } from '../src/session.js';

describe('Session', () => {
    let mockAgent: MockAgent;

    beforeEach(() => {
        mockAgent = new MockAgent();
        mockAgent.disableNetConnect();
    });

    afterEach(async () => {
        await mockAgent.close();
    });

    test('cookies set by one call are sent on the next', async () => {
        const pool = mockAgent.get('https://example.com');
        pool.intercept({ path: '/set' }).reply(200, 'stored', {
            headers: { 'set-cookie': 'token=test-secret; Path=/' }
        });
        pool.intercept({ path: '/cookies', headers: { cookie: 'token=test-secret' } }).reply(200, 'seen');

        const session = new Session({ dispatcher: mockAgent });
        await session.get('https://example.com/set');
        const res = await session.get('https://example.com/cookies');

        expect(res.text()).toBe('seen');
        await session.close();
    });

    test('sessions do not share jars', async () => {
        const pool = mockAgent.get('https://example.com');
        pool.intercept({ path: '/set' }).reply(200, '', {
            headers: { 'set-cookie': 'token=test-secret; Path=/' }
        });
        pool.intercept({
            path: '/cookies',
            headers: (headers: Record<string, string>) => !('cookie' in headers)
        }).reply(200, 'no cookies');

        const first = Session.create({ dispatcher: mockAgent });
        const second = Session.create({ dispatcher: mockAgent });
        await first.get('https://example.com/set');
        const res = await second.get('https://example.com/cookies');

        expect(res.text()).toBe('no cookies');
        expect(first.jar).not.toBe(second.jar);
    });

    test('default headers are sent with every request', async () => {
        mockAgent.get('https://example.com')
            .intercept({ path: '/ua', method: 'POST', headers: { 'user-agent': 'test-agent/1.0' } })
            .reply(200, 'ok');

        const session = new Session({
            dispatcher: mockAgent,
            defaults: { headers: { 'User-Agent': 'test-agent/1.0' } }
        });
        const res = await session.post('https://example.com/ua', opt.json({ a: 1 }));

        expect(res.status).toBe(200);
    });

    test('a per-call jar receives the cookies instead of the session jar', async () => {
        mockAgent.get('https://example.com')
            .intercept({ path: '/set' })
            .reply(200, '', { headers: { 'set-cookie': 'other=1; Path=/' } });

        const session = new Session({ dispatcher: mockAgent });
        const jar = createCookieJar();
        await session.get('https://example.com/set', opt.jar(jar));

        expect(jar.getCookies('https://example.com/').map(c => c.key)).toEqual(['other']);
        expect(session.jar?.getCookies('https://example.com/')).toEqual([]);
    });

    test('cookie map is added to the session jar', async () => {
        const pool = mockAgent.get('https://example.com');
        pool.intercept({ path: '/first', headers: { cookie: 'pref=dark' } }).reply(200, '');
        pool.intercept({ path: '/second', headers: { cookie: 'pref=dark' } }).reply(200, 'kept');

        const session = new Session({ dispatcher: mockAgent });
        await session.get('https://example.com/first', opt.cookies({ pref: 'dark' }));
        const res = await session.get('https://example.com/second');

        expect(res.text()).toBe('kept');
    });

    test('redirect limit from defaults applies', async () => {
        const pool = mockAgent.get('https://example.com');
        pool.intercept({ path: '/a' }).reply(302, '', { headers: { location: '/b' } });
        pool.intercept({ path: '/b' }).reply(302, '', { headers: { location: '/c' } });

        const session = new Session({ dispatcher: mockAgent, defaults: { redirectLimit: 1 } });

        await expect(session.get('https://example.com/a')).rejects.toThrow(TooManyRedirectsError);
    });

    test('uses a supplied client and its jar', async () => {
        mockAgent.get('https://example.com').intercept({ path: '/x', method: 'DELETE' }).reply(204, '');

        const client = new UndiciHttpClient({ dispatcher: mockAgent, jar: createCookieJar() });
        const session = new Session({ client });
        const res = await session.delete('https://example.com/x');

        expect(session.client).toBe(client);
        expect(session.jar).toBe(client.jar);
        expect(res.status).toBe(204);
    });
});
