import { z } from 'zod';
import type { Classification } from '../types.js';
import type { ChatMessage } from './client.js';

export const MIN_SUMMARY_INPUT_CHARS = 50;
export const MIN_TRANSLATION_INPUT_CHARS = 20;

export function contentOf(item: { title: string; body: string }): string {
  return item.body ? `${item.title}\n\n${item.body}` : item.title;
}

export function summaryMessages(content: string): ChatMessage[] {
  return [
    {
      role: 'system',
      content:
        'You are a helpful assistant that creates concise summaries of technical content. Summarize the following content in 2-3 sentences, focusing on key points and innovations.',
    },
    { role: 'user', content: `Summarize this content:\n\n${content}` },
  ];
}

export function translationMessages(content: string, language: string): ChatMessage[] {
  return [
    {
      role: 'system',
      content: `You are a professional translator. Translate the following content to ${language}, maintaining technical accuracy and natural phrasing. Reply with the translation only.`,
    },
    { role: 'user', content: `Translate to ${language}:\n\n${content}` },
  ];
}

export function classificationMessages(content: string, priorityLevels: string[], knownTopics: string[]): ChatMessage[] {
  const topicHint = knownTopics.length > 0 ? ` Prefer these tags when they fit: ${knownTopics.join(', ')}.` : '';

  return [
    {
      role: 'system',
      content: [
        'You are a content categorization assistant. Analyze the content and provide:',
        `1. A list of 1-3 relevant topic tags.${topicHint}`,
        `2. A priority level, one of: ${priorityLevels.join(', ')}`,
        '',
        'Respond in JSON format: {"topics": ["tag1", "tag2"], "priority": "<level>"}',
      ].join('\n'),
    },
    { role: 'user', content: `Categorize this content:\n\n${content}` },
  ];
}

const classificationResponseSchema = z.object({
  topics: z.array(z.string().trim().min(1)).max(10),
  priority: z.string().trim().min(1),
});

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced?.[1] ?? trimmed;
}

/**
 * Parse a model's JSON classification. Returns undefined on malformed output
 * or a priority outside the configured levels.
 */
export function parseClassificationResponse(text: string, priorityLevels: string[]): Classification | undefined {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(text));
  } catch {
    return undefined;
  }

  const result = classificationResponseSchema.safeParse(json);
  if (!result.success) {
    return undefined;
  }

  const priority = priorityLevels.find((level) => level.toLowerCase() === result.data.priority.toLowerCase());
  if (!priority) {
    return undefined;
  }

  return { topics: [...new Set(result.data.topics)], priority };
}
