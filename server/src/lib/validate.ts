import type { z } from 'zod';

/**
 * Validates untrusted input (form fields, queue payloads) against a Zod schema.
 */
export function validateInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
): { success: true; data: z.infer<T> } | { success: false; issues: string[] } {
  const result = schema.safeParse(input);
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
  }
  return { success: true, data: result.data };
}
