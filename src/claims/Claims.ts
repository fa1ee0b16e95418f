/**
 * Claims — the payload of a token.
 *
 * Callers may pass claims as a plain object, a `Map`, or a list of
 * `[key, value]` pairs. Everything downstream works on the normalized
 * plain-object form, which is always a fresh copy.
 *
 * @module
 */
import type { JsonValue } from '../codec/schemas.js';

export type { JsonValue } from '../codec/schemas.js';

/** Decoded claims, as returned by `decode()`. */
export interface JwtClaims {
    /** Issuer, used to select a verification key */
    readonly iss?: JsonValue;
    /** Expiration time (Unix seconds) */
    readonly exp?: number;
    readonly [key: string]: JsonValue | undefined;
}

export type ClaimsRecord = { readonly [key: string]: JsonValue };

export type ClaimsPair = readonly [key: string, value: JsonValue];

/** Every shape `encode()` accepts for its claims argument. */
export type ClaimsInput = ClaimsRecord | ReadonlyMap<string, JsonValue> | readonly ClaimsPair[];

/**
 * Normalize any {@link ClaimsInput} into a fresh plain object.
 * For repeated keys in a pair list, the last pair wins.
 */
export function normalizeClaims(claims: ClaimsInput): Record<string, JsonValue> {
    if (isClaimsMap(claims) || isPairList(claims)) {
        return Object.fromEntries(claims);
    }
    return { ...claims };
}

function isClaimsMap(claims: ClaimsInput): claims is ReadonlyMap<string, JsonValue> {
    return claims instanceof Map;
}

function isPairList(claims: ClaimsInput): claims is readonly ClaimsPair[] {
    return Array.isArray(claims);
}

/** Copy of `claims` with `exp` set, replacing any existing value. */
export function withExpiry(claims: ClaimsInput, exp: number): Record<string, JsonValue> {
    return { ...normalizeClaims(claims), exp };
}
