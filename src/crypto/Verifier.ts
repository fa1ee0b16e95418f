/**
 * Verifier — checks a received signature segment against a signing input.
 *
 * The two families compare different things:
 * - hmac recomputes the encoded signature and compares the base64url
 *   text (in constant time);
 * - rsa/ecdsa decode the segment to raw bytes and hand them to
 *   `crypto.verify`.
 *
 * `verify` never throws: an unsupported algorithm, an unusable key,
 * malformed PEM or an undecodable segment all yield `false`.
 *
 * @module
 */
import * as crypto from 'node:crypto';
import type { AlgorithmDescriptor } from '../algorithms/AlgorithmRegistry.js';
import { decode as decodeBase64Url } from '../codec/Base64Url.js';
import { resolveKey, type KeyInput } from '../keys/KeyMaterial.js';
import { signWithResolvedKey } from './Signer.js';

function constantTimeEqual(a: string, b: string): boolean {
    const left = Buffer.from(a, 'utf8');
    const right = Buffer.from(b, 'utf8');
    if (left.length !== right.length) return false;
    return crypto.timingSafeEqual(left, right);
}

export function verify(
    descriptor: AlgorithmDescriptor | undefined,
    signingInput: string,
    signature: string,
    key: KeyInput,
): boolean {
    if (!descriptor) return false;

    const resolved = resolveKey(key, descriptor.family, 'verify');
    if (!resolved.ok) return false;
    const keyForFamily = resolved.value;

    try {
        if (keyForFamily.family === 'hmac') {
            const expected = signWithResolvedKey(descriptor.hash, signingInput, keyForFamily);
            return constantTimeEqual(expected, signature);
        }

        const raw = decodeBase64Url(signature);
        if (!raw.ok) return false;

        const data = Buffer.from(signingInput, 'utf8');
        return keyForFamily.family === 'ecdsa'
            ? crypto.verify(descriptor.hash, data, { key: keyForFamily.key, dsaEncoding: 'ieee-p1363' }, raw.value)
            : crypto.verify(descriptor.hash, data, keyForFamily.key, raw.value);
    } catch {
        return false;
    }
}
