import { z } from 'zod';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Body of a form submission. Unknown top-level keys are dropped; a missing or
 * null token reads as empty and a missing or null payload as `{}`.
 *
 * The payload is passed through as decoded rather than rebuilt by
 * `z.record`, which would drop a `__proto__` field.
 */
export const submissionSchema = z.object({
  token: z
    .string()
    .nullish()
    .transform((t) => t ?? ''),
  payload: z
    .custom<Record<string, unknown>>(isPlainObject, { message: 'Expected object' })
    .nullish()
    .transform((p) => p ?? {}),
});

export type SubmissionRequest = z.infer<typeof submissionSchema>;

/** Short reason string for the operator log. */
export function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
