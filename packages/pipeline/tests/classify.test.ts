import { describe, it, expect } from 'vitest';
import { KeywordClassifier, parseClassificationRules } from '../src/classify.js';
import { ConfigError } from '../src/errors.js';

const rules = parseClassificationRules({
  topics: {
    AI: ['GPT-4', 'LLM'],
    RAG: ['retrieval-augmented'],
    Infra: ['kubernetes'],
  },
  priorities: {
    High: ['release'],
    Medium: ['survey', 'benchmark'],
  },
});

describe('parseClassificationRules', () => {
  it('fills in the default priority', () => {
    expect(rules.defaultPriority).toBe('Low');
  });

  it('rejects empty keyword lists', () => {
    expect(() => parseClassificationRules({ topics: { AI: [] } })).toThrow(ConfigError);
  });

  it('lists the offending paths', () => {
    try {
      parseClassificationRules({ topics: { AI: [''] } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect((error as ConfigError).issues).toEqual(['topics.AI.0: keywords must not be empty']);
    }
  });
});

describe('KeywordClassifier', () => {
  const classifier = new KeywordClassifier(rules);

  it('matches case-insensitively over title and body', () => {
    expect(classifier.classify({ title: 'gpt-4 Release announcement', body: '' })).toEqual({ topics: ['AI'], priority: 'High' });
  });

  it('unions topics in rule table order', () => {
    const result = classifier.classify({
      title: 'Running an LLM on Kubernetes',
      body: 'with retrieval-augmented generation',
    });
    expect(result.topics).toEqual(['AI', 'RAG', 'Infra']);
  });

  it('picks the first matching priority level', () => {
    expect(classifier.classify({ title: 'Benchmark release', body: '' }).priority).toBe('High');
  });

  it('uses lower levels, then the default priority', () => {
    expect(classifier.classify({ title: 'retrieval-augmented generation survey', body: '' })).toEqual({
      topics: ['RAG'],
      priority: 'Medium',
    });
    expect(classifier.classify({ title: 'Gardening tips', body: 'tomatoes' })).toEqual({ topics: [], priority: 'Low' });
  });

  it('ranks priorities in declaration order', () => {
    expect(classifier.priorityLevels).toEqual(['High', 'Medium', 'Low']);
    expect(classifier.rank('High')).toBe(0);
    expect(classifier.rank('Low')).toBe(2);
    expect(classifier.rank('Unknown')).toBe(3);
  });
});
