/**
 * Shape validation for decoded header and claims segments.
 *
 * @module
 */
import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

const jsonPrimitiveSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([jsonPrimitiveSchema, z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

/** `alg` is required; every other header member passes through untouched. */
export const headerSchema = z
    .object({
        alg: z.string(),
        typ: z.string().optional(),
    })
    .passthrough();

export type JwtHeader = z.infer<typeof headerSchema>;

/** A JSON object (never an array or `null`) whose `exp`, when present, is numeric. */
export const claimsSchema = z
    .object({
        exp: z.number().optional(),
    })
    .catchall(jsonValueSchema);

/**
 * Whether `value` matches `schema`, narrowing the original value.
 *
 * zod's parsed output is a copy rebuilt by assignment, which drops own
 * `__proto__` members; decoded segments must come back exactly as signed,
 * so callers keep `value` instead of `data`.
 */
export function conforms<S extends z.ZodTypeAny>(schema: S, value: unknown): value is z.infer<S> {
    return schema.safeParse(value).success;
}

/** {@link describeIssues} for a value that failed {@link conforms}. */
export function shapeIssues(schema: z.ZodTypeAny, value: unknown): string {
    const parsed = schema.safeParse(value);
    return parsed.success ? '' : describeIssues(parsed.error);
}

/**
 * Format zod issues as a single line for `Failure.reason`.
 * @internal
 */
export function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => {
            const path = issue.path.length > 0 ? `'${issue.path.join('.')}'` : '(root)';
            return `${path}: ${issue.message}`;
        })
        .join('; ');
}
