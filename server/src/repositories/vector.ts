import { z } from 'zod';

/**
 * pgvector columns come back from PostgREST as their text form ("[0.1,0.2]");
 * older rows stored as JSON arrays come back as arrays. Both parse to number[].
 */
export const VectorColumnSchema = z
  .union([
    z.array(z.number()),
    z.string().transform((raw, ctx) => {
      let decoded: unknown;
      try {
        decoded = JSON.parse(raw);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Vector column is not valid JSON' });
        return z.NEVER;
      }
      const parsed = z.array(z.number()).safeParse(decoded);
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Vector column is not a list of numbers' });
        return z.NEVER;
      }
      return parsed.data;
    }),
  ])
  .nullable()
  .optional()
  .transform((value) => value ?? null);
