/**
 * Key Material — the keys a caller can hand to `encode` and `decode`.
 *
 * Three explicit variants plus bare shorthands:
 *
 * | Input | hmac | rsa / ecdsa |
 * |---|---|---|
 * | `string` / `Uint8Array` | shared secret | PEM text |
 * | `KeyObject` | must be a `secret` key | must match the family |
 * | `secretKey()` / `pemKey()` / `keyHandle()` | explicit | explicit |
 *
 * PEM is parsed on every call; nothing is cached, so a fresh key argument
 * is always picked up by the next call.
 *
 * @module
 */
import { createPrivateKey, createPublicKey, KeyObject } from 'node:crypto';
import type { AlgorithmFamily } from '../algorithms/AlgorithmRegistry.js';
import { fail, succeed, type Result } from '../result.js';

// ============================================================================
// Types
// ============================================================================

export interface SecretKeyMaterial {
    readonly kind: 'secret';
    readonly secret: string | Uint8Array;
}

export interface PemKeyMaterial {
    readonly kind: 'pem';
    readonly pem: string | Uint8Array;
}

export interface HandleKeyMaterial {
    readonly kind: 'handle';
    readonly key: KeyObject;
}

export type KeyMaterial = SecretKeyMaterial | PemKeyMaterial | HandleKeyMaterial;

/** Anything accepted where a key is expected. */
export type KeyInput = KeyMaterial | string | Uint8Array | KeyObject;

/** Key ready for the signature primitives. */
export type ResolvedKey =
    | { readonly family: 'hmac'; readonly secret: Buffer | KeyObject }
    | { readonly family: 'rsa' | 'ecdsa'; readonly key: KeyObject };

export type KeyUsage = 'sign' | 'verify';

// ============================================================================
// Constructors
// ============================================================================

/**
 * Shared HMAC secret, taken as opaque bytes.
 *
 * A secret containing `-----BEGIN ` is refused (`invalid_key` on encode,
 * `invalid_signature` on decode): it is almost always a PEM key passed
 * to an HS* algorithm, and an HMAC keyed with a public key can be forged
 * by anyone who has that key.
 */
export function secretKey(secret: string | Uint8Array): SecretKeyMaterial {
    return { kind: 'secret', secret };
}

export function pemKey(pem: string | Uint8Array): PemKeyMaterial {
    return { kind: 'pem', pem };
}

export function keyHandle(key: KeyObject): HandleKeyMaterial {
    return { kind: 'handle', key };
}

// ============================================================================
// Resolution
// ============================================================================

const ASYMMETRIC_KEY_TYPE = { rsa: 'rsa', ecdsa: 'ec' } as const;

const PEM_PREAMBLE = '-----BEGIN ';

// OpenSSL name of P-256, the only curve of the supported ECDSA algorithm
const ES256_CURVE = 'prime256v1';

function toKeyMaterial(input: KeyInput, family: AlgorithmFamily): KeyMaterial {
    if (input instanceof KeyObject) return keyHandle(input);
    if (typeof input === 'string' || input instanceof Uint8Array) {
        return family === 'hmac' ? secretKey(input) : pemKey(input);
    }
    return input;
}

function toBytes(value: string | Uint8Array): Buffer {
    return typeof value === 'string' ? Buffer.from(value, 'utf8') : Buffer.from(value);
}

function parsePem(pem: string | Uint8Array, usage: KeyUsage): KeyObject {
    const text = typeof pem === 'string' ? pem : toBytes(pem).toString('utf8');
    // createPublicKey accepts private PEM too and derives the public half
    return usage === 'sign'
        ? createPrivateKey({ key: text, format: 'pem' })
        : createPublicKey({ key: text, format: 'pem' });
}

function resolveHmacKey(material: KeyMaterial): Result<ResolvedKey, 'invalid_key'> {
    switch (material.kind) {
        case 'secret': {
            const secret = toBytes(material.secret);
            // A public key used as an HMAC secret lets anyone holding it forge tokens
            if (secret.includes(PEM_PREAMBLE)) {
                return fail('invalid_key', `HMAC secret contains '${PEM_PREAMBLE.trim()}'; PEM key material is refused as a shared secret`);
            }
            return succeed({ family: 'hmac' as const, secret });
        }
        case 'handle':
            return material.key.type === 'secret'
                ? succeed({ family: 'hmac' as const, secret: material.key })
                : fail('invalid_key', `HMAC requires a secret key, got a ${material.key.type} key`);
        case 'pem':
            return fail('invalid_key', 'HMAC requires a shared secret, not PEM key material');
    }
}

function toKeyObject(material: KeyMaterial, usage: KeyUsage): Result<KeyObject, 'invalid_key'> {
    switch (material.kind) {
        case 'secret':
            return fail('invalid_key', 'Asymmetric algorithms require a key pair, not a shared secret');
        case 'handle':
            return succeed(material.key);
        case 'pem':
            try {
                return succeed(parsePem(material.pem, usage));
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                return fail('invalid_key', `Malformed PEM: ${message}`);
            }
    }
}

/**
 * Turn a caller-supplied key into something the primitives accept for
 * the given family and usage.
 *
 * Fails on malformed PEM, on a secret handed to an asymmetric family,
 * and on a key whose type does not match the family (an EC key for RS256).
 */
export function resolveKey(
    input: KeyInput,
    family: AlgorithmFamily,
    usage: KeyUsage,
): Result<ResolvedKey, 'invalid_key'> {
    const material = toKeyMaterial(input, family);
    if (family === 'hmac') return resolveHmacKey(material);

    const handle = toKeyObject(material, usage);
    if (!handle.ok) return handle;
    const key = handle.value;

    if (key.type === 'secret') {
        return fail('invalid_key', `${family.toUpperCase()} requires an asymmetric key, got a secret key`);
    }
    if (usage === 'sign' && key.type !== 'private') {
        return fail('invalid_key', 'Signing requires a private key');
    }
    const expected = ASYMMETRIC_KEY_TYPE[family];
    if (key.asymmetricKeyType !== expected) {
        return fail('invalid_key', `Expected a ${expected} key, got ${key.asymmetricKeyType ?? 'unknown'}`);
    }
    if (family === 'ecdsa' && key.asymmetricKeyDetails?.namedCurve !== ES256_CURVE) {
        return fail('invalid_key', `ES256 requires a P-256 key, got ${key.asymmetricKeyDetails?.namedCurve ?? 'unknown curve'}`);
    }
    return succeed({ family, key });
}
