import { z } from 'zod';

const sourceIdSchema = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9_-]*$/i, 'source id may only contain letters, digits, "-" and "_"');

const baseSourceConfigSchema = z.object({
  id: sourceIdSchema,
  name: z.string().min(1),
  schedule: z.string().min(1).default('0 */2 * * *'),
  maxEntries: z.number().int().positive().default(30),
  category: z.string().optional(),
  enabled: z.boolean().default(true),
});

export const rssSourceConfigSchema = baseSourceConfigSchema.extend({
  type: z.literal('rss'),
  url: z.string().url(),
});

export const youtubeSourceConfigSchema = baseSourceConfigSchema
  .extend({
    type: z.literal('youtube'),
    channelId: z.string().min(1).optional(),
    username: z.string().min(1).optional(),
  })
  .refine((value) => Boolean(value.channelId) !== Boolean(value.username), {
    message: 'exactly one of channelId or username is required',
  });

export const sourceConfigSchema = z.union([rssSourceConfigSchema, youtubeSourceConfigSchema]);

export type RssSourceConfig = z.infer<typeof rssSourceConfigSchema>;
export type YoutubeSourceConfig = z.infer<typeof youtubeSourceConfigSchema>;
export type SourceConfig = z.infer<typeof sourceConfigSchema>;
