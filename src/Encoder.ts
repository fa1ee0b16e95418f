/**
 * Encoder — builds and signs a compact JWT.
 *
 * ```
 * base64url(JSON(header)) + "." + base64url(JSON(claims)) + "." + base64url(signature)
 * ```
 *
 * The header is always `{"alg": <alg>, "typ": "JWT"}`. The only change
 * made to caller claims is the optional `exp`, and it is made on a copy.
 *
 * @example
 * ```typescript
 * import { encode } from 'jwt-codec';
 *
 * const token = encode('HS256', { sub: 'user-1' }, 'test-secret');
 * const expiring = encode('HS256', { sub: 'user-1' }, 3600, 'test-secret');
 * const hourly = encode('ES256', { sub: 'user-1' }, { kind: 'hourly', offset: 1800 }, privatePem);
 * ```
 *
 * @module
 */
import { resolveAlgorithm } from './algorithms/AlgorithmRegistry.js';
import { normalizeClaims, withExpiry, type ClaimsInput } from './claims/Claims.js';
import {
    computeExpiry,
    epochSeconds,
    validateExpiration,
    type ExpirationSpec,
} from './claims/ExpirationPolicy.js';
import * as base64url from './codec/Base64Url.js';
import * as json from './codec/JsonCodec.js';
import { sign } from './crypto/Signer.js';
import type { EncodeErrorCode } from './errors.js';
import type { KeyInput } from './keys/KeyMaterial.js';
import { fail, succeed, type Result } from './result.js';

export const TOKEN_TYPE = 'JWT';

export interface EncodeRequest {
    readonly alg: string;
    readonly claims: ClaimsInput;
    readonly key: KeyInput;
    readonly expiration?: ExpirationSpec;
}

function isExpirationSpec(value: KeyInput | ExpirationSpec): value is ExpirationSpec {
    if (typeof value === 'number') return true;
    return typeof value === 'object'
        && 'kind' in value
        && (value.kind === 'hourly' || value.kind === 'daily');
}

/**
 * Map the 3- and 4-argument call forms onto one request.
 * @internal
 */
export function toEncodeRequest(
    alg: string,
    claims: ClaimsInput,
    keyOrExpiration: KeyInput | ExpirationSpec,
    key: KeyInput | undefined,
): Result<EncodeRequest, EncodeErrorCode> {
    if (key === undefined) {
        return isExpirationSpec(keyOrExpiration)
            ? fail('invalid_key', 'No signing key was given')
            : succeed({ alg, claims, key: keyOrExpiration });
    }
    return isExpirationSpec(keyOrExpiration)
        ? succeed({ alg, claims, key, expiration: keyOrExpiration })
        : fail('invalid_expiration', 'Expiration must be a number of seconds or an hourly/daily offset');
}

/**
 * Encode a request, reading the time from `now` (Unix seconds).
 * @internal
 */
export function encodeRequest(request: EncodeRequest, now: number): Result<string, EncodeErrorCode> {
    let claims = normalizeClaims(request.claims);
    if (request.expiration !== undefined) {
        const expiration = validateExpiration(request.expiration);
        if (!expiration.ok) return expiration;
        claims = withExpiry(claims, computeExpiry(expiration.value, now));
    }

    const claimsJson = json.encode(claims);
    if (!claimsJson.ok) return fail('invalid_claims', `Claims are not serializable: ${claimsJson.reason}`);

    const headerJson = json.encode({ alg: request.alg, typ: TOKEN_TYPE });
    if (!headerJson.ok) return fail('invalid_claims', headerJson.reason);

    const signingInput = `${base64url.encode(headerJson.value)}.${base64url.encode(claimsJson.value)}`;

    const signature = sign(resolveAlgorithm(request.alg), signingInput, request.key);
    if (!signature.ok) {
        return signature.error === 'algorithm_not_supported'
            ? fail('algorithm_not_supported', `Algorithm '${request.alg}' is not supported`)
            : signature;
    }

    return succeed(`${signingInput}.${signature.value}`);
}

/**
 * Create a signed token.
 *
 * @param alg - One of HS256, HS384, HS512, RS256, ES256
 * @param claims - Object, `Map`, or list of `[key, value]` pairs
 * @param key - Shared secret (hmac) or private key / PEM (rsa, ecdsa)
 */
export function encode(alg: string, claims: ClaimsInput, key: KeyInput): Result<string, EncodeErrorCode>;
/**
 * Create a signed token carrying an `exp` claim computed from `expiration`.
 * An `exp` already present in `claims` is replaced.
 */
export function encode(
    alg: string,
    claims: ClaimsInput,
    expiration: ExpirationSpec,
    key: KeyInput,
): Result<string, EncodeErrorCode>;
export function encode(
    alg: string,
    claims: ClaimsInput,
    keyOrExpiration: KeyInput | ExpirationSpec,
    key?: KeyInput,
): Result<string, EncodeErrorCode> {
    const request = toEncodeRequest(alg, claims, keyOrExpiration, key);
    if (!request.ok) return request;
    return encodeRequest(request.value, epochSeconds());
}
