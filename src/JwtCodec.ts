/**
 * JwtCodec — configured encode/decode with clock, debug and tracing.
 *
 * The free `encode()` / `decode()` functions use the system clock and
 * emit nothing. A `JwtCodec` carries per-instance configuration instead;
 * it still holds no key state, so one instance can be shared freely.
 *
 * @example
 * ```typescript
 * import { JwtCodec, createDebugObserver } from 'jwt-codec';
 * import { trace } from '@opentelemetry/api';
 *
 * const codec = new JwtCodec({
 *     debug: createDebugObserver(),
 *     tracing: trace.getTracer('auth'),
 * });
 *
 * const token = codec.encodeOrThrow('HS256', { sub: 'user-1' }, 3600, secret);
 * const result = codec.decode(token, secret);
 * ```
 */
import type { ClaimsInput, JwtClaims } from './claims/Claims.js';
import { epochSeconds, isExpired, type ExpirationSpec } from './claims/ExpirationPolicy.js';
import { decodeToken, type IssuerKeyMapping } from './Decoder.js';
import { encodeRequest, toEncodeRequest } from './Encoder.js';
import type { DecodeErrorCode, EncodeErrorCode } from './errors.js';
import type { KeyInput } from './keys/KeyMaterial.js';
import type { DebugEvent, DebugObserverFn } from './observability/DebugObserver.js';
import { SpanStatusCode, type JwtSpan, type JwtTracer } from './observability/Tracing.js';
import { unwrap, type Result } from './result.js';

// ============================================================================
// Types
// ============================================================================

export interface JwtCodecConfig {
    /** Current time in Unix seconds. Default: `Math.floor(Date.now() / 1000)` */
    readonly clock?: () => number;

    /**
     * Receives one event per encode/decode call. See `createDebugObserver()`.
     * An exception it throws is reported with `console.warn` and never reaches the caller.
     */
    readonly debug?: DebugObserverFn;

    /** OpenTelemetry-compatible tracer; one span per encode/decode call. */
    readonly tracing?: JwtTracer;
}

// ============================================================================
// JwtCodec
// ============================================================================

export class JwtCodec {
    private readonly _clock: () => number;
    private readonly _debug: DebugObserverFn | undefined;
    private readonly _tracer: JwtTracer | undefined;

    constructor(config: JwtCodecConfig = {}) {
        if (config.clock !== undefined && typeof config.clock !== 'function') {
            throw new TypeError('JwtCodec: clock must be a function returning Unix seconds');
        }
        if (config.debug !== undefined && typeof config.debug !== 'function') {
            throw new TypeError('JwtCodec: debug must be an observer function');
        }
        if (config.tracing !== undefined && typeof config.tracing.startSpan !== 'function') {
            throw new TypeError('JwtCodec: tracing must implement startSpan()');
        }
        this._clock = config.clock ?? epochSeconds;
        this._debug = config.debug;
        this._tracer = config.tracing;
    }

    // ── Public API ───────────────────────────────────────

    encode(alg: string, claims: ClaimsInput, key: KeyInput): Result<string, EncodeErrorCode>;
    encode(alg: string, claims: ClaimsInput, expiration: ExpirationSpec, key: KeyInput): Result<string, EncodeErrorCode>;
    encode(
        alg: string,
        claims: ClaimsInput,
        keyOrExpiration: KeyInput | ExpirationSpec,
        key?: KeyInput,
    ): Result<string, EncodeErrorCode> {
        return this._encode(alg, claims, keyOrExpiration, key);
    }

    decode(token: string, key: KeyInput): Result<JwtClaims, DecodeErrorCode>;
    decode(token: string, defaultKey: KeyInput, issuerKeys: IssuerKeyMapping): Result<JwtClaims, DecodeErrorCode>;
    decode(token: string, defaultKey: KeyInput, issuerKeys: IssuerKeyMapping = {}): Result<JwtClaims, DecodeErrorCode> {
        const start = performance.now();
        const span = this._tracer?.startSpan('jwt.decode');

        try {
            const { result, alg, issuer, keySource } = decodeToken(token, defaultKey, issuerKeys, this._clock());
            const outcome = result.ok ? 'ok' : result.error;

            if (alg !== undefined) span?.setAttribute('jwt.alg', alg);
            if (issuer !== undefined) span?.setAttribute('jwt.issuer', issuer);
            if (keySource !== undefined) span?.setAttribute('jwt.key_source', keySource);
            this._settle(span, outcome);

            this._emit({
                type: 'decode',
                alg,
                issuer,
                keySource,
                outcome,
                durationMs: performance.now() - start,
                timestamp: Date.now(),
            });
            return result;
        } catch (err) {
            this._crash(span, err);
            throw err;
        } finally {
            span?.end();
        }
    }

    /**
     * Like {@link encode}, but returns the token directly.
     * @throws {JwtError} with the failure code
     */
    encodeOrThrow(alg: string, claims: ClaimsInput, key: KeyInput): string;
    encodeOrThrow(alg: string, claims: ClaimsInput, expiration: ExpirationSpec, key: KeyInput): string;
    encodeOrThrow(
        alg: string,
        claims: ClaimsInput,
        keyOrExpiration: KeyInput | ExpirationSpec,
        key?: KeyInput,
    ): string {
        return unwrap(this._encode(alg, claims, keyOrExpiration, key));
    }

    /**
     * Like {@link decode}, but returns the claims directly.
     * @throws {JwtError} with the failure code
     */
    decodeOrThrow(token: string, defaultKey: KeyInput, issuerKeys: IssuerKeyMapping = {}): JwtClaims {
        return unwrap(this.decode(token, defaultKey, issuerKeys));
    }

    /** Whether `claims` are expired according to this codec's clock. */
    isExpired(claims: { readonly exp?: number }): boolean {
        return isExpired(claims, this._clock());
    }

    // ── Internals ────────────────────────────────────────

    private _encode(
        alg: string,
        claims: ClaimsInput,
        keyOrExpiration: KeyInput | ExpirationSpec,
        key: KeyInput | undefined,
    ): Result<string, EncodeErrorCode> {
        const start = performance.now();
        const span = this._tracer?.startSpan('jwt.encode', { attributes: { 'jwt.alg': alg } });

        try {
            const request = toEncodeRequest(alg, claims, keyOrExpiration, key);
            const result = request.ok ? encodeRequest(request.value, this._clock()) : request;
            const outcome = result.ok ? 'ok' : result.error;

            this._settle(span, outcome);
            this._emit({
                type: 'encode',
                alg,
                outcome,
                durationMs: performance.now() - start,
                timestamp: Date.now(),
            });
            return result;
        } catch (err) {
            this._crash(span, err);
            throw err;
        } finally {
            span?.end();
        }
    }

    private _emit(event: DebugEvent): void {
        if (!this._debug) return;
        try {
            this._debug(event);
        } catch (err) {
            // Observers are fire-and-forget: a failing one must not change the call's result or span
            console.warn(`[jwt] debug observer threw on ${event.type}:`, err);
        }
    }

    private _settle(span: JwtSpan | undefined, outcome: string): void {
        if (!span) return;
        span.setAttribute('jwt.outcome', outcome);
        span.setStatus(outcome === 'ok'
            ? { code: SpanStatusCode.OK }
            : { code: SpanStatusCode.UNSET, message: outcome });
    }

    private _crash(span: JwtSpan | undefined, err: unknown): void {
        if (!span) return;
        const message = err instanceof Error ? err.message : String(err);
        span.setAttribute('jwt.outcome', 'exception');
        span.recordException(err instanceof Error ? err : new Error(message));
        span.setStatus({ code: SpanStatusCode.ERROR, message });
    }
}
