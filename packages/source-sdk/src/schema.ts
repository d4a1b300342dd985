import { z } from 'zod';

// Scheme-less origin URLs ("a.com/1") are accepted; the fingerprint stage defaults them to https.
export const rawItemSchema = z.object({
  sourceId: z.string().min(1),
  externalId: z.string().min(1),
  url: z.string().trim().min(1),
  title: z.string().trim().min(1),
  body: z.string(),
  sourceType: z.enum(['feed', 'video']),
  publishedAt: z.date().optional(),
  sourceName: z.string().optional(),
  category: z.string().optional(),
  raw: z.record(z.string(), z.unknown()).optional(),
});

export type ValidatedRawItem = z.infer<typeof rawItemSchema>;

export interface ValidateRawItemsOptions {
  onInvalid?: (issues: z.ZodIssue[], item: unknown) => void;
}

export function validateRawItems(items: unknown[], options?: ValidateRawItemsOptions): ValidatedRawItem[] {
  const valid: ValidatedRawItem[] = [];

  for (const item of items) {
    const result = rawItemSchema.safeParse(item);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, item);
    }
  }

  return valid;
}

export function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
