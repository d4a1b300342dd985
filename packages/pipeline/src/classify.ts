import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { Classification } from './types.js';

export const DEFAULT_PRIORITY = 'Low';

const keywordListSchema = z.array(z.string().trim().min(1, 'keywords must not be empty')).min(1);

export const classificationRulesSchema = z.object({
  /** topic → keywords, in table order */
  topics: z.record(z.string().min(1), keywordListSchema).default({}),
  /** priority → keywords, highest priority first */
  priorities: z.record(z.string().min(1), keywordListSchema).default({}),
  defaultPriority: z.string().min(1).default(DEFAULT_PRIORITY),
});

export type ClassificationRules = z.infer<typeof classificationRulesSchema>;

/**
 * Validate a rule table. Malformed rules are a startup error.
 */
export function parseClassificationRules(input: unknown): ClassificationRules {
  const result = classificationRulesSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      'Invalid classification rules',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  return result.data;
}

interface CompiledRule {
  label: string;
  keywords: string[];
}

function compile(table: Record<string, string[]>): CompiledRule[] {
  return Object.entries(table).map(([label, keywords]) => ({
    label,
    keywords: keywords.map((keyword) => keyword.toLowerCase()),
  }));
}

/**
 * Deterministic keyword tagging: case-insensitive substring match over title
 * and body. Topics are the union of matching rules in table order; priority is
 * the first matching level, else the default.
 */
export class KeywordClassifier {
  private readonly topics: CompiledRule[];
  private readonly priorities: CompiledRule[];
  readonly defaultPriority: string;
  readonly priorityLevels: string[];

  constructor(rules: ClassificationRules) {
    this.topics = compile(rules.topics);
    this.priorities = compile(rules.priorities);
    this.defaultPriority = rules.defaultPriority;
    this.priorityLevels = this.priorities.map((rule) => rule.label);
    if (!this.priorityLevels.includes(this.defaultPriority)) {
      this.priorityLevels.push(this.defaultPriority);
    }
  }

  classify(item: { title: string; body: string }): Classification {
    const text = `${item.title}\n${item.body}`.toLowerCase();
    const matches = (rule: CompiledRule): boolean => rule.keywords.some((keyword) => text.includes(keyword));

    return {
      topics: this.topics.filter(matches).map((rule) => rule.label),
      priority: this.priorities.find(matches)?.label ?? this.defaultPriority,
    };
  }

  /** Rank of a priority label; lower is more urgent, unknown labels rank last. */
  rank(priority: string): number {
    const index = this.priorityLevels.indexOf(priority);
    return index === -1 ? this.priorityLevels.length : index;
  }
}
