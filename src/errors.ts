/**
 * Error codes and the exception type used by the throwing helpers.
 *
 * The codes are the contract: `reason` strings may change between
 * releases, the codes below may not.
 *
 * @module
 */

/** Failures reported by `encode()`. */
export type EncodeErrorCode =
    | 'algorithm_not_supported'
    | 'invalid_claims'
    | 'invalid_expiration'
    | 'invalid_key';

/** Failures reported by `decode()`. */
export type DecodeErrorCode =
    | 'invalid_token'
    | 'invalid_signature'
    | 'expired';

export type JwtErrorCode = EncodeErrorCode | DecodeErrorCode;

/**
 * Thrown by {@link unwrap} and the `*OrThrow` methods of `JwtCodec`.
 *
 * @example
 * ```typescript
 * try {
 *     codec.decodeOrThrow(token, secret);
 * } catch (e) {
 *     if (e instanceof JwtError && e.code === 'expired') refresh();
 * }
 * ```
 */
export class JwtError extends Error {
    readonly code: JwtErrorCode;

    constructor(code: JwtErrorCode, reason: string) {
        super(`[${code}] ${reason}`);
        this.name = 'JwtError';
        this.code = code;
    }
}
