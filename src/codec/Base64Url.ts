/**
 * Base64url — unpadded URL-safe base64 (RFC 4648 §5).
 *
 * `Buffer.from(text, 'base64url')` silently skips characters outside the
 * alphabet and ignores trailing bits, so `decode` validates the text first
 * and only accepts the canonical encoding of its output.
 *
 * @module
 */
import { fail, succeed, type Result } from '../result.js';

const ALPHABET = /^[A-Za-z0-9_-]*$/;

export function encode(input: Uint8Array | string): string {
    const bytes = typeof input === 'string' ? Buffer.from(input, 'utf8') : Buffer.from(input);
    return bytes.toString('base64url');
}

export function decode(text: string): Result<Buffer, 'malformed_base64url'> {
    if (!ALPHABET.test(text)) {
        return fail('malformed_base64url', 'Segment contains characters outside the base64url alphabet');
    }
    if (text.length % 4 === 1) {
        return fail('malformed_base64url', `Segment length ${text.length} is not a valid base64url length`);
    }

    const bytes = Buffer.from(text, 'base64url');
    // Non-zero padding bits decode to the same bytes as the canonical form
    if (bytes.toString('base64url') !== text) {
        return fail('malformed_base64url', 'Segment is not canonically encoded');
    }
    return succeed(bytes);
}
