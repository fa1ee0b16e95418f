/**
 * Decode a token's header and claims WITHOUT verifying the signature.
 * Useful for inspecting tokens in logging/debugging, or for reading
 * `iss` before choosing which key set to load.
 *
 * ⚠️ Never trust peeked claims for authorization decisions.
 *
 * @module
 */
import type { JwtClaims } from './claims/Claims.js';
import type { JwtHeader } from './codec/schemas.js';
import { parseToken } from './Decoder.js';

export interface PeekedToken {
    readonly header: JwtHeader;
    readonly claims: JwtClaims;
}

/**
 * @returns Header and claims, or `null` when the token is structurally invalid
 */
export function peek(token: string): PeekedToken | null {
    const parsed = parseToken(token);
    if (!parsed.ok) return null;
    return { header: parsed.value.header, claims: parsed.value.claims };
}
