/**
 * Tracing — OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces that are structurally compatible with OpenTelemetry's
 * `Tracer` and `Span`, so `trace.getTracer('jwt')` can be passed to
 * {@link JwtCodec} directly, without an adapter or an `@opentelemetry/*`
 * dependency.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const codec = new JwtCodec({ tracing: trace.getTracer('auth') });
 * ```
 *
 * @module
 */

/**
 * Span status codes matching OpenTelemetry's `SpanStatusCode` enum.
 *
 * - `UNSET` (0) — Token rejections (bad signature, expired, unsupported
 *   algorithm). These are caller errors and must not trigger alerts.
 * - `OK` (1) — Token encoded or accepted.
 * - `ERROR` (2) — An unexpected exception escaped the codec.
 */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

/**
 * Attribute value type, identical to OpenTelemetry's `SpanAttributeValue`
 * so an OTel `Tracer` stays assignable under `strict`.
 */
export type JwtAttributeValue =
    | string
    | number
    | boolean
    | ReadonlyArray<string>
    | ReadonlyArray<number>
    | ReadonlyArray<boolean>;

/** Structural subset of OTel's `Span`. */
export interface JwtSpan {
    setAttribute(key: string, value: JwtAttributeValue): void;
    setStatus(status: { code: number; message?: string }): void;
    /** Optional: not every tracer supports events. */
    addEvent?(name: string, attributes?: Record<string, JwtAttributeValue>): void;
    /** Called exactly once, from a `finally` block. */
    end(): void;
    recordException(exception: Error | string): void;
}

/** Structural subset of OTel's `Tracer` (the first two `startSpan` parameters). */
export interface JwtTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, JwtAttributeValue>;
    }): JwtSpan;
}
