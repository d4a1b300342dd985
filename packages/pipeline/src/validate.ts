import { formatIssues, rawItemSchema, type ValidatedRawItem } from '@digestline/source-sdk';

export type ValidationResult = { ok: true; item: ValidatedRawItem } | { ok: false; error: string };

/**
 * Validate one raw item using the source-sdk Zod schema.
 */
export function validateItem(raw: unknown): ValidationResult {
  const result = rawItemSchema.safeParse(raw);
  if (result.success) {
    return { ok: true, item: result.data };
  }

  return { ok: false, error: formatIssues(result.error.issues) };
}
