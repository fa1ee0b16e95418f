/**
 * Result\<T, E\> — Failures as Values
 *
 * A discriminated union for expressing success/failure without throwing.
 * Every public operation of the codec returns one of these: the decoder in
 * particular is the single funnel that turns every internal failure into
 * one of its error codes.
 *
 * @example
 * ```typescript
 * import { decode } from 'jwt-codec';
 *
 * const result = decode(token, 'test-secret');
 * if (!result.ok) return reply(401, result.error); // 'invalid_signature', 'expired', ...
 * const claims = result.value;                    // Narrowed to JwtClaims
 * ```
 *
 * @module
 */
import { JwtError, type JwtErrorCode } from './errors.js';

// ── Discriminated Union ──────────────────────────────────

/**
 * Successful result containing a typed value.
 *
 * @typeParam T - The success value type
 */
export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/**
 * Failed result carrying a machine-readable error code.
 *
 * `reason` is a human-readable detail meant for logs. Callers should
 * branch on `error`, never on `reason`.
 */
export interface Failure<E extends string = string> {
    readonly ok: false;
    readonly error: E;
    readonly reason: string;
}

/**
 * Either `Success<T>` or `Failure<E>`. Check `result.ok` to narrow.
 */
export type Result<T, E extends string = string> = Success<T> | Failure<E>;

// ── Constructors ─────────────────────────────────────────

/**
 * Create a successful result.
 *
 * @example
 * ```typescript
 * return succeed(token);
 * ```
 */
export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

/**
 * Create a failed result.
 *
 * @example
 * ```typescript
 * return fail('invalid_token', 'Expected 3 segments, got 2');
 * ```
 */
export function fail<E extends string>(error: E, reason: string): Failure<E> {
    return { ok: false, error, reason };
}

// ── Unwrapping ───────────────────────────────────────────

/**
 * Extract the value or throw a {@link JwtError} carrying the failure code.
 *
 * @example
 * ```typescript
 * const claims = unwrap(decode(token, secret)); // throws JwtError on rejection
 * ```
 */
export function unwrap<T, E extends JwtErrorCode>(result: Result<T, E>): T {
    if (result.ok) return result.value;
    throw new JwtError(result.error, result.reason);
}
