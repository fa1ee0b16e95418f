/**
 * jwt-codec — Compact JSON Web Tokens for Node.js
 *
 * Encodes and verifies JWTs signed with HS256, HS384, HS512, RS256 or
 * ES256, with per-issuer key selection and `exp` enforcement. Every
 * operation returns a `Result` instead of throwing.
 *
 * @example
 * ```ts
 * import { encode, decode } from 'jwt-codec';
 *
 * const token = encode('HS256', { sub: 'user-1' }, 3600, 'test-secret');
 * if (!token.ok) throw new Error(token.error);
 *
 * const claims = decode(token.value, 'test-secret');
 * if (claims.ok) console.log(claims.value.sub);
 * ```
 *
 * @module jwt-codec
 * @license Apache-2.0
 */

// ── Encode / Decode ──────────────────────────────────────
export { encode, TOKEN_TYPE } from './Encoder.js';
export { decode, selectKey } from './Decoder.js';
export type { IssuerKeyMapping, KeySource, ParsedToken } from './Decoder.js';
export { JwtCodec } from './JwtCodec.js';
export type { JwtCodecConfig } from './JwtCodec.js';
export { peek } from './inspect.js';
export type { PeekedToken } from './inspect.js';

// ── Algorithms & Keys ────────────────────────────────────
export {
    ALGORITHMS,
    SUPPORTED_ALGORITHMS,
    isSupportedAlgorithm,
    resolveAlgorithm,
} from './algorithms/AlgorithmRegistry.js';
export type {
    AlgorithmDescriptor,
    AlgorithmFamily,
    HashAlgorithm,
    SupportedAlgorithm,
} from './algorithms/AlgorithmRegistry.js';
export { keyHandle, pemKey, resolveKey, secretKey } from './keys/KeyMaterial.js';
export type {
    HandleKeyMaterial,
    KeyInput,
    KeyMaterial,
    KeyUsage,
    PemKeyMaterial,
    ResolvedKey,
    SecretKeyMaterial,
} from './keys/KeyMaterial.js';
export { sign } from './crypto/Signer.js';
export type { SignErrorCode } from './crypto/Signer.js';
export { verify } from './crypto/Verifier.js';

// ── Claims & Expiration ──────────────────────────────────
export { normalizeClaims, withExpiry } from './claims/Claims.js';
export type { ClaimsInput, ClaimsPair, ClaimsRecord, JsonValue, JwtClaims } from './claims/Claims.js';
export {
    SECONDS_PER_DAY,
    SECONDS_PER_HOUR,
    computeExpiry,
    epochSeconds,
    isExpired,
    validateExpiration,
} from './claims/ExpirationPolicy.js';
export type { AnchoredExpiration, ExpirationSpec } from './claims/ExpirationPolicy.js';
export type { JwtHeader } from './codec/schemas.js';

// ── Results & Errors ─────────────────────────────────────
export { fail, succeed, unwrap } from './result.js';
export type { Failure, Result, Success } from './result.js';
export { JwtError } from './errors.js';
export type { DecodeErrorCode, EncodeErrorCode, JwtErrorCode } from './errors.js';

// ── Observability ────────────────────────────────────────
export { createDebugObserver } from './observability/DebugObserver.js';
export type { DebugEvent, DebugObserverFn, DecodeEvent, EncodeEvent } from './observability/DebugObserver.js';
export { SpanStatusCode } from './observability/Tracing.js';
export type { JwtAttributeValue, JwtSpan, JwtTracer } from './observability/Tracing.js';
