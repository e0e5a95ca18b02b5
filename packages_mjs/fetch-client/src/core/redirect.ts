/**
 * Bounded redirect policy.
 */
import { DEFAULT_REDIRECT_LIMIT } from '../config.js';
import { TooManyRedirectsError } from '../errors.js';
import { RedirectCheck } from '../types.js';

/**
 * Check run before following redirect number `redirectCount` (1-based).
 * A limit of 0 falls back to the default.
 */
export function redirectPolicy(limit: number = 0): RedirectCheck {
    const max = limit > 0 ? limit : DEFAULT_REDIRECT_LIMIT;
    return (redirectCount, nextUrl) => {
        if (redirectCount > max) {
            throw new TooManyRedirectsError(max, nextUrl);
        }
    };
}

export const REDIRECT_STATUSES = [301, 302, 303, 307, 308];
