/**
 * Algorithm Registry — maps a JWS `alg` identifier to its family and hash.
 *
 * Only a fixed subset of the JWA algorithm space is supported. Every
 * identifier not listed here (RS384, ES512, PS256, `none`, ...) resolves
 * to `undefined`, which the signer reports as `algorithm_not_supported`
 * and the verifier treats as a failed signature.
 *
 * @module
 */

export type AlgorithmFamily = 'hmac' | 'rsa' | 'ecdsa';

export type HashAlgorithm = 'sha256' | 'sha384' | 'sha512';

export interface AlgorithmDescriptor {
    readonly family: AlgorithmFamily;
    readonly hash: HashAlgorithm;
}

export const ALGORITHMS = {
    HS256: { family: 'hmac', hash: 'sha256' },
    HS384: { family: 'hmac', hash: 'sha384' },
    HS512: { family: 'hmac', hash: 'sha512' },
    RS256: { family: 'rsa', hash: 'sha256' },
    ES256: { family: 'ecdsa', hash: 'sha256' },
} as const satisfies Record<string, AlgorithmDescriptor>;

export type SupportedAlgorithm = keyof typeof ALGORITHMS;

export const SUPPORTED_ALGORITHMS: readonly SupportedAlgorithm[] = ['HS256', 'HS384', 'HS512', 'RS256', 'ES256'];

export function isSupportedAlgorithm(identifier: string): identifier is SupportedAlgorithm {
    return Object.prototype.hasOwnProperty.call(ALGORITHMS, identifier);
}

/**
 * Resolve an algorithm identifier. Matching is exact and case-sensitive.
 *
 * @returns The descriptor, or `undefined` when the algorithm is unsupported
 */
export function resolveAlgorithm(identifier: string): AlgorithmDescriptor | undefined {
    return isSupportedAlgorithm(identifier) ? ALGORITHMS[identifier] : undefined;
}
