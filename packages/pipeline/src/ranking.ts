import { systemClock, type Clock } from './clock.js';
import { ageInDays, type QualityAssessment } from './quality.js';
import type { Classification } from './types.js';

export interface RankingWeights {
  quality: number;
  relevance: number;
  timeliness: number;
  source: number;
}

export const DEFAULT_RANKING_WEIGHTS: RankingWeights = { quality: 0.4, relevance: 0.3, timeliness: 0.2, source: 0.1 };

/** Labels for scores ≥ 0.7, ≥ 0.4 and below. */
export const DEFAULT_RANK_LABELS: [string, string, string] = ['High', 'Medium', 'Low'];

export interface Ranking {
  score: number;
  priority: string;
  reason: string;
}

export interface PriorityRankerOptions {
  weights?: Partial<RankingWeights>;
  labels?: [string, string, string];
  /** Priority the keyword classifier assigns when no rule matched. */
  defaultPriority: string;
  /** Levels the classifier knows; a ranked label outside them is not applied. */
  priorityLevels: string[];
  clock?: Clock;
}

function freshness(age: number | undefined): number {
  if (age === undefined) return 0.5;
  if (age < 1) return 1;
  if (age < 7) return 0.9;
  if (age < 30) return 0.7;
  if (age < 90) return 0.5;
  if (age < 365) return 0.3;
  return 0.1;
}

/**
 * Weighted quality, relevance, freshness and source score mapped onto three
 * priority labels. Only a keyword priority left at the default is replaced.
 */
export class PriorityRanker {
  private readonly weights: RankingWeights;
  private readonly labels: [string, string, string];
  private readonly defaultPriority: string;
  private readonly priorityLevels: string[];
  private readonly clock: Clock;

  constructor(options: PriorityRankerOptions) {
    this.weights = { ...DEFAULT_RANKING_WEIGHTS, ...options.weights };
    this.labels = options.labels ?? DEFAULT_RANK_LABELS;
    this.defaultPriority = options.defaultPriority;
    this.priorityLevels = options.priorityLevels;
    this.clock = options.clock ?? systemClock;
  }

  rank(classification: Classification, publishedAt: Date | undefined, quality?: QualityAssessment): Ranking {
    const age = ageInDays(publishedAt, this.clock());
    const qualityScore = quality?.overall ?? 0.5;
    const relevance = classification.topics.length > 0 ? Math.min(0.5 + classification.topics.length * 0.15, 1) : 0.5;
    const source = quality?.scores.credibility ?? 0.5;

    const raw =
      qualityScore * this.weights.quality +
      relevance * this.weights.relevance +
      freshness(age) * this.weights.timeliness +
      source * this.weights.source;
    const score = Math.min(Math.max(raw, 0), 1);

    const [high, medium, low] = this.labels;
    const priority = score >= 0.7 ? high : score >= 0.4 ? medium : low;

    const reasons: string[] = [];
    if (quality && quality.overall >= 0.7) reasons.push('high quality');
    if (classification.topics.length >= 2) reasons.push('highly relevant');
    if (age !== undefined && age < 7) reasons.push('recent');

    return {
      score,
      priority,
      reason:
        reasons.length > 0 ? `Ranked ${priority} due to: ${reasons.join(', ')}` : `Ranked ${priority} (score: ${score.toFixed(2)})`,
    };
  }

  /** The keyword classification with its default priority replaced by the ranked one. */
  refine(classification: Classification, ranking: Ranking): Classification {
    if (classification.priority !== this.defaultPriority || !this.priorityLevels.includes(ranking.priority)) {
      return classification;
    }

    return { ...classification, priority: ranking.priority };
  }
}
