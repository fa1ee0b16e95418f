/**
 * Expiration Policy — computes `exp` on encode and enforces it on decode.
 *
 * @example
 * ```typescript
 * computeExpiry(900, now);                          // now + 15 minutes
 * computeExpiry({ kind: 'hourly', offset: 1800 }, now); // half past the current hour
 * computeExpiry({ kind: 'daily', offset: 0 }, now);     // midnight UTC today
 * ```
 *
 * @module
 */
import { fail, succeed, type Result } from '../result.js';

export const SECONDS_PER_HOUR = 3600;
export const SECONDS_PER_DAY = SECONDS_PER_HOUR * 24;

/** Seconds relative to the start of the current UTC hour or day. */
export interface AnchoredExpiration {
    readonly kind: 'hourly' | 'daily';
    readonly offset: number;
}

/** Seconds from now, or an offset anchored to the current hour or day. */
export type ExpirationSpec = number | AnchoredExpiration;

/** Current time in whole Unix seconds. */
export function epochSeconds(): number {
    return Math.floor(Date.now() / 1000);
}

function isNonNegativeInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Reject expirations that would produce a fractional or backdated `exp`.
 */
export function validateExpiration(spec: ExpirationSpec): Result<ExpirationSpec, 'invalid_expiration'> {
    if (typeof spec === 'number') {
        return isNonNegativeInteger(spec)
            ? succeed(spec)
            : fail('invalid_expiration', `Expiration must be a non-negative integer number of seconds, got ${spec}`);
    }
    // Untyped callers can reach here with any kind
    const kind: string = spec.kind;
    if (kind !== 'hourly' && kind !== 'daily') {
        return fail('invalid_expiration', `Unknown expiration kind '${kind}'`);
    }
    if (!isNonNegativeInteger(spec.offset)) {
        return fail('invalid_expiration', `Expiration offset must be a non-negative integer, got ${spec.offset}`);
    }
    return succeed(spec);
}

/**
 * Absolute expiry (Unix seconds) for `spec`, evaluated at `now`.
 *
 * Anchored specs depend only on the hour (or day) `now` falls in, so two
 * calls within the same hour yield the same value.
 */
export function computeExpiry(spec: ExpirationSpec, now: number): number {
    if (typeof spec === 'number') return now + spec;

    const period = spec.kind === 'hourly' ? SECONDS_PER_HOUR : SECONDS_PER_DAY;
    return now - (now % period) + spec.offset;
}

/**
 * A token is expired once no whole second remains: `exp === now` is
 * already expired. Claims without `exp` never expire.
 */
export function isExpired(claims: { readonly exp?: number }, now: number): boolean {
    if (claims.exp === undefined) return false;
    return claims.exp - now <= 0;
}
