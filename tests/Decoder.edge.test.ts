/**
 * Decoder — Edge Cases & Sad Paths
 *
 * Covers:
 * - Security attacks: alg:none, stripped signature, algorithm confusion
 * - Malformed segments: bad base64url, bad JSON, wrong JSON shape
 * - Prototype pollution attempts in claims
 * - Untyped input that must not throw
 * - Concurrency and per-call key isolation
 */
import { describe, it, expect } from 'vitest';
import * as crypto from 'node:crypto';
import { decode } from '../src/Decoder.js';
import { encode } from '../src/Encoder.js';
import type { ClaimsRecord } from '../src/claims/Claims.js';
import type { EncodeErrorCode } from '../src/errors.js';
import type { Result } from '../src/result.js';
import { SECRET, b64url, ecPair, hs256Token, otherEcPair, rsaPair } from './fixtures.js';

const FAR_FUTURE = 4_102_444_800; // 2100-01-01

function tokenOf(result: Result<string, EncodeErrorCode>): string {
    if (!result.ok) throw new Error(`${result.error}: ${result.reason}`);
    return result.value;
}

// ============================================================================
// Security Attack Vectors
// ============================================================================

describe('decode — security attacks', () => {
    it('rejects alg:none with an empty signature', () => {
        const token = `${b64url({ alg: 'none', typ: 'JWT' })}.${b64url({ sub: 'admin' })}.`;
        expect(decode(token, SECRET)).toMatchObject({ ok: false, error: 'invalid_signature' });
    });

    it('rejects a stripped signature', () => {
        const token = tokenOf(encode('HS256', { sub: 'user-1' }, SECRET));
        const [header, claims] = token.split('.');
        expect(decode(`${header}.${claims}.`, SECRET)).toMatchObject({ ok: false, error: 'invalid_signature' });
    });

    it('rejects an RS256 public key reused as an HS256 secret (algorithm confusion)', () => {
        const forged = hs256Token({ sub: 'admin' }, rsaPair.publicKey);
        expect(decode(forged, rsaPair.publicKey)).toMatchObject({ ok: false, error: 'invalid_signature' });
    });

    it('refuses to sign HS256 with PEM key material', () => {
        expect(encode('HS256', { sub: 'admin' }, rsaPair.publicKey)).toMatchObject({ ok: false, error: 'invalid_key' });
    });

    it('rejects an ES256 token presented as RS256', () => {
        const token = tokenOf(encode('ES256', { sub: 'user-1' }, ecPair.privateKey));
        const [, claims, signature] = token.split('.');
        const relabeled = `${b64url({ alg: 'RS256', typ: 'JWT' })}.${claims}.${signature}`;
        expect(decode(relabeled, ecPair.publicKey)).toMatchObject({ ok: false, error: 'invalid_signature' });
    });

    it('rejects a padded signature segment', () => {
        const hs = tokenOf(encode('HS256', { sub: 'user-1' }, SECRET));
        expect(decode(`${hs}=`, SECRET)).toMatchObject({ ok: false, error: 'invalid_signature' });

        const rs = tokenOf(encode('RS256', { sub: 'user-1' }, rsaPair.privateKey));
        expect(decode(`${rs}==`, rsaPair.publicKey)).toMatchObject({ ok: false, error: 'invalid_signature' });
    });

    it('rejects a signature made with another EC key', () => {
        const token = tokenOf(encode('ES256', { sub: 'user-1' }, otherEcPair.privateKey));
        expect(decode(token, ecPair.publicKey)).toMatchObject({ ok: false, error: 'invalid_signature' });
    });
});

// ============================================================================
// Malformed segments
// ============================================================================

describe('decode — malformed segments', () => {
    const claims = b64url({ sub: 'user-1' });
    const header = b64url({ alg: 'HS256', typ: 'JWT' });

    it.each([
        ['header is not base64url', `${header}!.${claims}.sig`],
        ['claims are not base64url', `${header}.${claims}*.sig`],
        ['header is not JSON', `${b64url('{alg:HS256}')}.${claims}.sig`],
        ['claims are not JSON', `${header}.${b64url('sub=user-1')}.sig`],
        ['header is empty', `.${claims}.sig`],
        ['claims are empty', `${header}..sig`],
        ['all segments empty', '..'],
        ['header has no alg', `${b64url({ typ: 'JWT' })}.${claims}.sig`],
        ['alg is not a string', `${b64url({ alg: 256 })}.${claims}.sig`],
        ['header is an array', `${b64url('["HS256"]')}.${claims}.sig`],
        ['claims are an array', `${header}.${b64url('[1,2,3]')}.sig`],
        ['claims are null', `${header}.${b64url('null')}.sig`],
        ['claims are a string', `${header}.${b64url('"user-1"')}.sig`],
        ['exp is not a number', `${header}.${b64url({ exp: 'tomorrow' })}.sig`],
        ['leading whitespace', ` ${header}.${claims}.sig`],
    ])('%s → invalid_token', (_label, token) => {
        expect(decode(token, SECRET)).toMatchObject({ ok: false, error: 'invalid_token' });
    });

    it('reports shape problems before the signature', () => {
        const token = hs256Token({ exp: 'tomorrow' }, SECRET);
        const result = decode(token, SECRET);
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBe('invalid_token');
            expect(result.reason).toBe("claims: 'exp': Expected number, received string");
        }
    });

    it('names the missing header member in the reason', () => {
        const result = decode(`${b64url({ typ: 'JWT' })}.${claims}.sig`, SECRET);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.reason).toBe("header: 'alg': Required");
    });
});

// ============================================================================
// Untyped input
// ============================================================================

describe('decode — untyped input', () => {
    it.each<[unknown]>([[undefined], [null], [42], [{}], [['a', 'b', 'c']]])('returns invalid_token for %j', (token) => {
        expect(decode(token as string, SECRET)).toMatchObject({ ok: false, error: 'invalid_token' });
    });

    it('returns invalid_signature for an unusable key', () => {
        const token = tokenOf(encode('RS256', { sub: 'user-1' }, rsaPair.privateKey));
        expect(decode(token, 'not a pem')).toMatchObject({ ok: false, error: 'invalid_signature' });
        expect(decode(token, SECRET)).toMatchObject({ ok: false, error: 'invalid_signature' });
        expect(decode(token, crypto.createSecretKey(Buffer.from(SECRET)))).toMatchObject({ ok: false, error: 'invalid_signature' });
    });
});

// ============================================================================
// Prototype pollution
// ============================================================================

describe('decode — prototype pollution', () => {
    const PROTO_PAYLOAD = '{"sub":"user-1","__proto__":{"isAdmin":true},"nested":{"__proto__":2}}';

    it('returns a signed __proto__ claim as an own data property', () => {
        const signingInput = `${b64url({ alg: 'HS256', typ: 'JWT' })}.${b64url(PROTO_PAYLOAD)}`;
        const signature = crypto.createHmac('sha256', SECRET).update(signingInput).digest('base64url');

        const result = decode(`${signingInput}.${signature}`, SECRET);
        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(JSON.stringify(result.value)).toBe(PROTO_PAYLOAD);
            expect(Object.getOwnPropertyDescriptor(result.value, '__proto__')?.value).toEqual({ isAdmin: true });
            expect(Object.getPrototypeOf(result.value)).toBe(Object.prototype);
        }
        expect(({} as Record<string, unknown>)['isAdmin']).toBeUndefined();
    });

    it('round-trips claims that carry __proto__ keys', () => {
        const claims: ClaimsRecord = JSON.parse(PROTO_PAYLOAD);
        const result = decode(tokenOf(encode('HS256', claims, SECRET)), SECRET);

        expect(result.ok).toBe(true);
        if (result.ok) expect(JSON.stringify(result.value)).toBe(PROTO_PAYLOAD);
        expect(({} as Record<string, unknown>)['isAdmin']).toBeUndefined();
    });

    it('keeps a constructor claim as plain data', () => {
        const token = hs256Token({ sub: 'user-1', constructor: { prototype: { isAdmin: true } } }, SECRET);
        const result = decode(token, SECRET);
        expect(result.ok).toBe(true);
        expect(({} as Record<string, unknown>)['isAdmin']).toBeUndefined();
    });
});

// ============================================================================
// Size, concurrency, isolation
// ============================================================================

describe('decode — size and isolation', () => {
    it('handles a large claims payload', () => {
        const token = tokenOf(encode('HS256', { sub: 'user-1', data: 'x'.repeat(100_000), exp: FAR_FUTURE }, SECRET));
        const result = decode(token, SECRET);
        expect(result.ok).toBe(true);
        if (result.ok) expect(result.value['data']).toHaveLength(100_000);
    });

    it('keeps results independent across interleaved calls', async () => {
        const secrets = Array.from({ length: 20 }, (_, i) => `test-secret-${i}`);
        const tokens = secrets.map((secret, i) => tokenOf(encode('HS256', { sub: `user-${i}` }, secret)));

        const results = await Promise.all(
            tokens.map((token, i) => Promise.resolve().then(() => decode(token, secrets[(i + 1) % secrets.length] ?? ''))),
        );
        expect(results.every(r => !r.ok && r.error === 'invalid_signature')).toBe(true);

        const matched = await Promise.all(tokens.map((token, i) => Promise.resolve().then(() => decode(token, secrets[i] ?? ''))));
        expect(matched.map(r => (r.ok ? r.value['sub'] : null))).toEqual(secrets.map((_, i) => `user-${i}`));
    });

    it('picks up a different key on the next call', () => {
        const token = tokenOf(encode('ES256', { sub: 'user-1' }, ecPair.privateKey));
        expect(decode(token, ecPair.publicKey).ok).toBe(true);
        expect(decode(token, otherEcPair.publicKey).ok).toBe(false);
        expect(decode(token, ecPair.publicKey).ok).toBe(true);
    });
});
