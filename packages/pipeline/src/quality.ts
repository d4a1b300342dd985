import { DAY_MS, systemClock, type Clock } from './clock.js';
import type { Classification, CleanItem } from './types.js';

export const DEFAULT_MIN_QUALITY_SCORE = 0.3;
export const DEFAULT_MIN_CONTENT_LENGTH = 50;

export const AUTHORITATIVE_DOMAINS = [
  'arxiv.org',
  'github.com',
  'openai.com',
  'anthropic.com',
  'deepmind.com',
  'huggingface.co',
  'paperswithcode.com',
];

export type QualityGrade = 'A' | 'B' | 'C' | 'D';

export interface QualityScores {
  credibility: number;
  completeness: number;
  relevance: number;
  timeliness: number;
}

export interface QualityAssessment {
  scores: QualityScores;
  overall: number;
  grade: QualityGrade;
}

export type QualityVerdict =
  | { pass: true; assessment: QualityAssessment }
  | { pass: false; reason: 'blacklisted' | 'low-score'; assessment: QualityAssessment };

export interface QualityGateOptions {
  minScore?: number;
  minContentLength?: number;
  /** Host substrings that are trusted outright. */
  sourceWhitelist?: string[];
  /** Host substrings whose items are dropped. */
  sourceBlacklist?: string[];
  clock?: Clock;
}

const clamp = (value: number): number => Math.min(Math.max(value, 0), 1);

export function hostOf(rawUrl: string): string | undefined {
  const trimmed = rawUrl.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    return new URL(withScheme).host.toLowerCase().replace(/^www\./, '');
  } catch {
    return undefined;
  }
}

/** Whole days since publication, or undefined when the date is unknown. */
export function ageInDays(publishedAt: Date | undefined, now: number): number | undefined {
  if (!publishedAt || Number.isNaN(publishedAt.getTime())) {
    return undefined;
  }

  return Math.floor((now - publishedAt.getTime()) / DAY_MS);
}

export function gradeOf(overall: number): QualityGrade {
  if (overall >= 0.8) return 'A';
  if (overall >= 0.6) return 'B';
  if (overall >= 0.4) return 'C';
  return 'D';
}

/**
 * Scores an item on source credibility, completeness, topic relevance and
 * freshness, and drops it below `minScore` or when its host is blacklisted.
 */
export class QualityGate {
  private readonly minScore: number;
  private readonly minContentLength: number;
  private readonly whitelist: string[];
  private readonly blacklist: string[];
  private readonly clock: Clock;

  constructor(options: QualityGateOptions = {}) {
    this.minScore = options.minScore ?? DEFAULT_MIN_QUALITY_SCORE;
    this.minContentLength = options.minContentLength ?? DEFAULT_MIN_CONTENT_LENGTH;
    this.whitelist = (options.sourceWhitelist ?? []).map((domain) => domain.toLowerCase());
    this.blacklist = (options.sourceBlacklist ?? []).map((domain) => domain.toLowerCase());
    this.clock = options.clock ?? systemClock;
  }

  assess(item: CleanItem, classification: Classification): QualityVerdict {
    const host = hostOf(item.url);
    const scores: QualityScores = {
      credibility: this.credibility(host),
      completeness: this.completeness(item),
      relevance: classification.topics.length > 0 ? 0.9 : 0.7,
      timeliness: this.timeliness(item.publishedAt),
    };
    const overall =
      scores.credibility * 0.4 + scores.completeness * 0.3 + scores.relevance * 0.2 + scores.timeliness * 0.1;
    const assessment: QualityAssessment = { scores, overall, grade: gradeOf(overall) };

    if (host && this.blacklist.some((domain) => host.includes(domain))) {
      return { pass: false, reason: 'blacklisted', assessment };
    }
    if (overall < this.minScore) {
      return { pass: false, reason: 'low-score', assessment };
    }

    return { pass: true, assessment };
  }

  private credibility(host: string | undefined): number {
    if (host === undefined) {
      return 0.3;
    }

    let score = 0.5;
    if (this.whitelist.some((domain) => host.includes(domain))) {
      score = 1;
    }
    if (this.blacklist.some((domain) => host.includes(domain))) {
      score = 0;
    }
    if (AUTHORITATIVE_DOMAINS.some((domain) => host.includes(domain))) {
      score += 0.2;
    }

    return clamp(score);
  }

  private completeness(item: CleanItem): number {
    const length = item.body.length;
    let lengthScore = 1;
    if (length < this.minContentLength) lengthScore = 0.2;
    else if (length < 100) lengthScore = 0.4;
    else if (length < 200) lengthScore = 0.6;
    else if (length < 500) lengthScore = 0.8;

    const elements = [item.title.length > 5, length > 20, item.url.length > 0].filter(Boolean).length;
    return clamp(lengthScore * 0.6 + (elements / 3) * 0.4);
  }

  private timeliness(publishedAt: Date | undefined): number {
    const age = ageInDays(publishedAt, this.clock());
    if (age === undefined) return 0.5;
    if (age < 7) return 1;
    if (age < 30) return 0.8;
    if (age < 90) return 0.6;
    if (age < 365) return 0.4;
    return 0.2;
  }
}
