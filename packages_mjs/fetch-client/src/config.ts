/**
 * Default configuration for requests and sessions.
 */

import { z } from 'zod';

export const VERSION = '0.1.0';

// Constants
export const DEFAULT_REDIRECT_LIMIT = 10;
export const DEFAULT_USER_AGENT = `fetch-session/${VERSION}`;
export const JSON_CONTENT_TYPE = 'application/json';
export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

// Schemas

export const ClientDefaultsSchema = z.object({
    headers: z.record(z.string()).default({ 'User-Agent': DEFAULT_USER_AGENT }),
    redirectLimit: z.number().int().nonnegative().default(DEFAULT_REDIRECT_LIMIT),
    timeout: z.number().nonnegative().default(0)
});

export type ClientDefaults = z.infer<typeof ClientDefaultsSchema>;
export type ClientDefaultsInput = z.input<typeof ClientDefaultsSchema>;

export function resolveDefaults(input: ClientDefaultsInput = {}): ClientDefaults {
    return ClientDefaultsSchema.parse(input);
}

export const DEFAULT_CLIENT_DEFAULTS: ClientDefaults = resolveDefaults();
