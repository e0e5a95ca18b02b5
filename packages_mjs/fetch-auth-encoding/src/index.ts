// --- Basic authentication header encoding ---

export interface BasicCredentials {
    username: string;
    password: string;
}

function b64(str: string): string {
    return Buffer.from(str, 'utf8').toString('base64');
}

/**
 * `Basic <base64(username:password)>`. Empty values are allowed.
 */
export function encodeBasicAuth(username: string, password: string): string {
    return `Basic ${b64(`${username}:${password}`)}`;
}

export function encodeBasicAuthHeader(creds: BasicCredentials): Record<string, string> {
    return { Authorization: encodeBasicAuth(creds.username, creds.password) };
}

/**
 * Inverse of encodeBasicAuth. The username ends at the first ':', so the
 * password may contain colons. Returns null when the value is not Basic auth.
 */
export function decodeBasicAuth(header: string | null | undefined): BasicCredentials | null {
    if (!header) return null;

    const match = /^basic\s+(.*)$/i.exec(header.trim());
    if (!match) return null;

    const encoded = match[1];
    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(encoded)) return null;

    const decoded = Buffer.from(encoded, 'base64').toString('utf8');
    const sep = decoded.indexOf(':');
    if (sep < 0) return null;

    return {
        username: decoded.slice(0, sep),
        password: decoded.slice(sep + 1)
    };
}
