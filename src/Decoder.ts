/**
 * Decoder — verifies a compact JWT and returns its claims.
 *
 * The checks run in a fixed order, and the first failure wins:
 *
 * 1. Structure: exactly three segments, header and claims decodable
 *    into JSON objects → otherwise `invalid_token`
 * 2. Signature against the issuer's key or the default key
 *    → otherwise `invalid_signature`
 * 3. Expiry → `expired`
 *
 * A forged token is therefore always reported as `invalid_signature`,
 * even when it is also expired. Nothing here throws.
 *
 * @example
 * ```typescript
 * import { decode } from 'jwt-codec';
 *
 * const result = decode(token, defaultSecret, { 'https://partner.example': partnerPublicPem });
 * if (result.ok) console.log(result.value.sub);
 * ```
 *
 * @module
 */
import { resolveAlgorithm } from './algorithms/AlgorithmRegistry.js';
import type { JwtClaims } from './claims/Claims.js';
import { epochSeconds, isExpired } from './claims/ExpirationPolicy.js';
import * as base64url from './codec/Base64Url.js';
import * as json from './codec/JsonCodec.js';
import { claimsSchema, conforms, headerSchema, shapeIssues, type JwtHeader } from './codec/schemas.js';
import { verify } from './crypto/Verifier.js';
import type { DecodeErrorCode } from './errors.js';
import type { KeyInput } from './keys/KeyMaterial.js';
import { fail, succeed, type Result } from './result.js';

// ============================================================================
// Types
// ============================================================================

/** Verification keys by `iss` claim value. */
export type IssuerKeyMapping =
    | ReadonlyMap<string, KeyInput>
    | { readonly [issuer: string]: KeyInput };

/** Which key a token was checked against. */
export type KeySource = 'issuer' | 'default';

/**
 * Decode result plus what was learned on the way, for observers.
 * Fields are absent when decoding stopped before reaching them.
 */
export interface DecodeOutcome {
    readonly result: Result<JwtClaims, DecodeErrorCode>;
    readonly alg?: string;
    readonly issuer?: string;
    readonly keySource?: KeySource;
}

export interface ParsedToken {
    readonly header: JwtHeader;
    readonly claims: JwtClaims;
    /** `header.claims` exactly as received */
    readonly signingInput: string;
    readonly signature: string;
}

// ============================================================================
// Parsing
// ============================================================================

const SEGMENT_COUNT = 3;

function decodeSegment(segment: string, name: string): Result<unknown, 'invalid_token'> {
    const bytes = base64url.decode(segment);
    if (!bytes.ok) return fail('invalid_token', `${name}: ${bytes.reason}`);

    const value = json.decode(bytes.value);
    if (!value.ok) return fail('invalid_token', `${name}: ${value.reason}`);
    return value;
}

/**
 * Split and decode a token without checking its signature.
 * @internal
 */
export function parseToken(token: unknown): Result<ParsedToken, 'invalid_token'> {
    if (typeof token !== 'string') {
        return fail('invalid_token', 'Token is not a string');
    }

    const segments = token.split('.');
    if (segments.length !== SEGMENT_COUNT) {
        return fail('invalid_token', `Expected ${SEGMENT_COUNT} segments, got ${segments.length}`);
    }
    const [headerSegment = '', claimsSegment = '', signature = ''] = segments;

    const headerJson = decodeSegment(headerSegment, 'header');
    if (!headerJson.ok) return headerJson;
    const header = headerJson.value;
    if (!conforms(headerSchema, header)) return fail('invalid_token', `header: ${shapeIssues(headerSchema, header)}`);

    const claimsJson = decodeSegment(claimsSegment, 'claims');
    if (!claimsJson.ok) return claimsJson;
    const claims = claimsJson.value;
    if (!conforms(claimsSchema, claims)) return fail('invalid_token', `claims: ${shapeIssues(claimsSchema, claims)}`);

    return succeed({
        header,
        claims,
        signingInput: `${headerSegment}.${claimsSegment}`,
        signature,
    });
}

// ============================================================================
// Key selection
// ============================================================================

function isIssuerMap(mapping: IssuerKeyMapping): mapping is ReadonlyMap<string, KeyInput> {
    return mapping instanceof Map;
}

function lookupIssuerKey(mapping: IssuerKeyMapping, issuer: string): KeyInput | undefined {
    if (isIssuerMap(mapping)) return mapping.get(issuer);
    return Object.prototype.hasOwnProperty.call(mapping, issuer) ? mapping[issuer] : undefined;
}

/**
 * The key mapped to the token's `iss`, or `defaultKey` when the token
 * names no issuer (or one the mapping does not know).
 */
export function selectKey(
    claims: JwtClaims,
    defaultKey: KeyInput,
    issuerKeys: IssuerKeyMapping,
): { readonly key: KeyInput; readonly source: KeySource } {
    const issuer = claims.iss;
    if (typeof issuer === 'string') {
        const key = lookupIssuerKey(issuerKeys, issuer);
        if (key !== undefined) return { key, source: 'issuer' };
    }
    return { key: defaultKey, source: 'default' };
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode and verify, reading the time from `now` (Unix seconds).
 * @internal
 */
export function decodeToken(
    token: string,
    defaultKey: KeyInput,
    issuerKeys: IssuerKeyMapping,
    now: number,
): DecodeOutcome {
    const parsed = parseToken(token);
    if (!parsed.ok) return { result: parsed };

    const { header, claims, signingInput, signature } = parsed.value;
    const issuer = typeof claims.iss === 'string' ? claims.iss : undefined;
    const { key, source } = selectKey(claims, defaultKey, issuerKeys);
    const trace = { alg: header.alg, issuer, keySource: source };

    if (!verify(resolveAlgorithm(header.alg), signingInput, signature, key)) {
        return { ...trace, result: fail('invalid_signature', `Signature does not verify for alg '${header.alg}'`) };
    }

    if (isExpired(claims, now)) {
        return { ...trace, result: fail('expired', `Token expired at ${claims.exp ?? 'unknown'}`) };
    }

    return { ...trace, result: succeed(claims) };
}

/**
 * Verify a token against a single key.
 */
export function decode(token: string, key: KeyInput): Result<JwtClaims, DecodeErrorCode>;
/**
 * Verify a token, picking the key by its `iss` claim and falling back
 * to `defaultKey`.
 */
export function decode(
    token: string,
    defaultKey: KeyInput,
    issuerKeys: IssuerKeyMapping,
): Result<JwtClaims, DecodeErrorCode>;
export function decode(
    token: string,
    defaultKey: KeyInput,
    issuerKeys: IssuerKeyMapping = {},
): Result<JwtClaims, DecodeErrorCode> {
    return decodeToken(token, defaultKey, issuerKeys, epochSeconds()).result;
}
