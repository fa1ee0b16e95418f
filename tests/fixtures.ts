/**
 * Shared test keys and token helpers.
 *
 * Key pairs are generated in-process once per test file.
 */
import * as crypto from 'node:crypto';

export const SECRET = 'test-secret';
export const OTHER_SECRET = 'other-test-secret';

const pemEncoding = {
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
} as const;

const rsaOptions: crypto.RSAKeyPairOptions<'pem', 'pem'> = { modulusLength: 2048, ...pemEncoding };
const p256Options: crypto.ECKeyPairOptions<'pem', 'pem'> = { namedCurve: 'P-256', ...pemEncoding };
const p384Options: crypto.ECKeyPairOptions<'pem', 'pem'> = { namedCurve: 'P-384', ...pemEncoding };

export const rsaPair = crypto.generateKeyPairSync('rsa', rsaOptions);
export const otherRsaPair = crypto.generateKeyPairSync('rsa', rsaOptions);
export const ecPair = crypto.generateKeyPairSync('ec', p256Options);
export const otherEcPair = crypto.generateKeyPairSync('ec', p256Options);
export const p384Pair = crypto.generateKeyPairSync('ec', p384Options);

export function b64url(value: string | Record<string, unknown>): string {
    const text = typeof value === 'string' ? value : JSON.stringify(value);
    return Buffer.from(text, 'utf8').toString('base64url');
}

/** Hand-built HS256 token, independent of the encoder. */
export function hs256Token(
    payload: Record<string, unknown>,
    secret: string,
    header: Record<string, unknown> = { alg: 'HS256', typ: 'JWT' },
): string {
    const signingInput = `${b64url(header)}.${b64url(payload)}`;
    const signature = crypto.createHmac('sha256', secret).update(signingInput).digest('base64url');
    return `${signingInput}.${signature}`;
}

/** Replace the character at `index` of the signature segment with a different one. */
export function tamperSignature(token: string, index = 5): string {
    const [header, claims, signature = ''] = token.split('.');
    const current = signature.charAt(index);
    const replacement = current === 'A' ? 'B' : 'A';
    return `${header}.${claims}.${signature.slice(0, index)}${replacement}${signature.slice(index + 1)}`;
}
