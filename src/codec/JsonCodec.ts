/**
 * JSON codec returning results instead of throwing.
 *
 * @module
 */
import { fail, succeed, type Result } from '../result.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Serialize a value to JSON text.
 * Fails on values `JSON.stringify` rejects (BigInt, cycles) or drops entirely.
 */
export function encode(value: unknown): Result<string, 'unserializable'> {
    try {
        const text: unknown = JSON.stringify(value);
        if (typeof text !== 'string') {
            return fail('unserializable', 'Value has no JSON representation');
        }
        return succeed(text);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return fail('unserializable', message);
    }
}

/** Parse UTF-8 encoded JSON. Invalid UTF-8 is a failure, not U+FFFD. */
export function decode(bytes: Uint8Array): Result<unknown, 'malformed_json'> {
    let text: string;
    try {
        text = utf8.decode(bytes);
    } catch {
        return fail('malformed_json', 'Segment is not valid UTF-8');
    }

    try {
        const value: unknown = JSON.parse(text);
        return succeed(value);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return fail('malformed_json', message);
    }
}
