/**
 * DebugObserver — structured debug events for encode/decode calls.
 *
 * When no observer is configured nothing is built or emitted.
 *
 * @example
 * ```typescript
 * import { JwtCodec, createDebugObserver } from 'jwt-codec';
 *
 * // Default: compact console.debug output
 * const codec = new JwtCodec({ debug: createDebugObserver() });
 *
 * // Custom handler (e.g. structured logger)
 * const codec = new JwtCodec({
 *     debug: createDebugObserver((event) => logger.debug(event, `jwt.${event.type}`)),
 * });
 * ```
 *
 * @module
 */
import type { DecodeErrorCode, EncodeErrorCode } from '../errors.js';
import type { KeySource } from '../Decoder.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted once per `encode()` call. */
export interface EncodeEvent {
    readonly type: 'encode';
    readonly alg: string;
    readonly outcome: 'ok' | EncodeErrorCode;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Emitted once per `decode()` call. `alg`, `issuer` and `keySource` are
 * absent when the token was rejected before its header could be read.
 */
export interface DecodeEvent {
    readonly type: 'decode';
    readonly alg?: string;
    readonly issuer?: string;
    readonly keySource?: KeySource;
    readonly outcome: 'ok' | DecodeErrorCode;
    readonly durationMs: number;
    readonly timestamp: number;
}

export type DebugEvent = EncodeEvent | DecodeEvent;

export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer.
 *
 * If a custom handler is provided it is returned as-is. Otherwise events
 * are printed with `console.debug`:
 *
 * ```
 * [jwt] encode  HS256 ✓ 0.1ms
 * [jwt] decode  RS256 iss=https://idp.example (issuer key) ✗ invalid_signature 0.4ms
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[jwt]';
        const status = event.outcome === 'ok' ? '✓' : `✗ ${event.outcome}`;
        const timing = `${event.durationMs.toFixed(1)}ms`;

        switch (event.type) {
            case 'encode':
                console.debug(`${prefix} encode  ${event.alg} ${status} ${timing}`);
                break;

            case 'decode': {
                const alg = event.alg ?? '-';
                const issuer = event.issuer !== undefined ? ` iss=${event.issuer}` : '';
                const source = event.keySource !== undefined ? ` (${event.keySource} key)` : '';
                console.debug(`${prefix} decode  ${alg}${issuer}${source} ${status} ${timing}`);
                break;
            }
        }
    };
}
