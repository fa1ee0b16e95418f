/**
 * Signer — produces the encoded signature segment for a signing input.
 *
 * - hmac: `HMAC(hash, secret, input)`
 * - rsa: RSASSA-PKCS1-v1_5
 * - ecdsa: raw `r || s` (IEEE P1363), as JWS requires, rather than DER
 *
 * The output is always base64url without padding.
 *
 * @module
 */
import * as crypto from 'node:crypto';
import type { AlgorithmDescriptor } from '../algorithms/AlgorithmRegistry.js';
import { resolveKey, type KeyInput, type ResolvedKey } from '../keys/KeyMaterial.js';
import { fail, succeed, type Result } from '../result.js';

export type SignErrorCode = 'algorithm_not_supported' | 'invalid_key';

/** @internal */
export function signWithResolvedKey(hash: string, signingInput: string, resolved: ResolvedKey): string {
    switch (resolved.family) {
        case 'hmac':
            return crypto
                .createHmac(hash, resolved.secret)
                .update(signingInput)
                .digest('base64url');
        case 'rsa':
            return crypto
                .sign(hash, Buffer.from(signingInput, 'utf8'), resolved.key)
                .toString('base64url');
        case 'ecdsa':
            return crypto
                .sign(hash, Buffer.from(signingInput, 'utf8'), { key: resolved.key, dsaEncoding: 'ieee-p1363' })
                .toString('base64url');
    }
}

/**
 * Sign `signingInput` (the `header.claims` text) with `key`.
 *
 * @param descriptor - Resolved algorithm, or `undefined` when unsupported
 * @returns The encoded signature, or `algorithm_not_supported` / `invalid_key`
 */
export function sign(
    descriptor: AlgorithmDescriptor | undefined,
    signingInput: string,
    key: KeyInput,
): Result<string, SignErrorCode> {
    if (!descriptor) {
        return fail('algorithm_not_supported', 'Algorithm is not in the supported set');
    }

    const resolved = resolveKey(key, descriptor.family, 'sign');
    if (!resolved.ok) return resolved;

    try {
        return succeed(signWithResolvedKey(descriptor.hash, signingInput, resolved.value));
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return fail('invalid_key', `Signing failed: ${message}`);
    }
}
