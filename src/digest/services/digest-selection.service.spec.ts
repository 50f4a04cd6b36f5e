import { KEYWORD_ONLY_SCORING_POLICY } from '../config/digest.constants';
import { DigestContractError } from '../errors/digest.errors';
import { Item, SelectionOptions } from '../types/digest.types';
import { DigestDedupeService } from './digest-dedupe.service';
import { DigestScoringService } from './digest-scoring.service';
import { DigestSelectionService } from './digest-selection.service';

const NOW = new Date('2026-10-19T12:00:00Z');

function hoursAgo(hours: number): Date {
  return new Date(NOW.getTime() - hours * 60 * 60 * 1000);
}

function makeItem(overrides: Partial<Item>): Item {
  return {
    source: 'Example Feed',
    title: '',
    description: '',
    url: '',
    publishedAt: '',
    publishedAtParsed: null,
    score: 0,
    ...overrides,
  };
}

function options(overrides: Partial<SelectionOptions> = {}): SelectionOptions {
  return {
    budget: 10,
    keywordWeights: { ai: 1.0 },
    relevanceThreshold: 0.5,
    perSourceCap: 3,
    now: NOW,
    ...overrides,
  };
}

const WORDS = [
  'chip',
  'cloud',
  'robot',
  'vision',
  'speech',
  'search',
  'health',
  'legal',
  'music',
  'retail',
];

describe('DigestSelectionService', () => {
  let service: DigestSelectionService;

  beforeEach(() => {
    service = new DigestSelectionService(
      new DigestScoringService(),
      new DigestDedupeService(),
    );
  });

  it('drops an exact url duplicate and keeps the rest', () => {
    const items = [
      makeItem({
        source: 'A',
        title: 'AI chip demand rises',
        url: 'https://example.com/a',
      }),
      makeItem({
        source: 'B',
        title: 'New AI model tops benchmarks',
        url: 'https://example.com/b',
      }),
      makeItem({
        source: 'C',
        title: 'Regulators study AI rules',
        url: 'https://example.com/c',
      }),
      makeItem({
        source: 'D',
        title: 'Different headline about ai',
        url: ' HTTPS://example.com/a',
      }),
      makeItem({
        source: 'E',
        title: 'AI startup raises funding round',
        url: 'https://example.com/e',
      }),
    ];

    const result = service.select(items, options());

    expect(result.map((item) => item.url)).toEqual([
      'https://example.com/a',
      'https://example.com/b',
      'https://example.com/c',
      'https://example.com/e',
    ]);
    result.forEach((item) => {
      const text = `${item.title} ${item.description}`.toLowerCase();
      expect(text).toContain('ai');
    });
  });

  it('caps a single source at perSourceCap, keeping the highest scored', () => {
    const items = WORDS.map((word, index) =>
      makeItem({
        title: `${word} ai update`,
        url: `https://example.com/${word}`,
        publishedAtParsed: hoursAgo(index + 1),
      }),
    ).reverse();

    const result = service.select(items, options({ perSourceCap: 3 }));

    expect(result.map((item) => item.title)).toEqual([
      'chip ai update',
      'cloud ai update',
      'robot ai update',
    ]);
  });

  it('returns an empty list for empty input', () => {
    expect(service.select([], options())).toEqual([]);
  });

  it('keeps only the first of two near-duplicate titles', () => {
    const items = [
      makeItem({
        source: 'A',
        title: 'OpenAI releases GPT-5 model today',
        url: 'https://example.com/1',
      }),
      makeItem({
        source: 'B',
        title: 'OpenAI releases GPT-5 model this week',
        url: 'https://example.com/2',
      }),
    ];

    const result = service.select(
      items,
      options({ keywordWeights: { openai: 1.0 } }),
    );

    expect(result.map((item) => item.url)).toEqual(['https://example.com/1']);
  });

  it('requires a score strictly above the threshold', () => {
    const items = [makeItem({ title: 'ai', url: 'https://example.com/x' })];

    expect(service.select(items, options({ relevanceThreshold: 1.0 }))).toEqual(
      [],
    );
    expect(
      service.select(items, options({ relevanceThreshold: 0.99 })),
    ).toHaveLength(1);
  });

  it('never exceeds the budget', () => {
    const items = WORDS.map((word) =>
      makeItem({
        source: word,
        title: `${word} ai update`,
        url: `https://example.com/${word}`,
      }),
    );

    expect(service.select(items, options({ budget: 4 }))).toHaveLength(4);
  });

  it('does not count skipped duplicates toward the budget', () => {
    const items = [
      makeItem({ source: 'X', title: 'chip ai update', url: 'u1' }),
      makeItem({ source: 'Y', title: 'Repeat of chip story ai', url: 'u1' }),
      makeItem({ source: 'Z', title: 'cloud ai update', url: 'u2' }),
      makeItem({ source: 'W', title: 'robot ai update', url: 'u3' }),
    ];

    const result = service.select(items, options({ budget: 2 }));

    expect(result.map((item) => item.url)).toEqual(['u1', 'u2']);
  });

  it('does not refill the budget after the source cap removes items', () => {
    const items = [
      makeItem({
        source: 'X',
        title: 'chip ai update',
        url: 'u1',
      }),
      makeItem({
        source: 'X',
        title: 'cloud ai update',
        url: 'u2',
      }),
      makeItem({
        source: 'Y',
        title: 'robot ai update',
        url: 'u3',
      }),
      makeItem({
        source: 'Z',
        title: 'vision ai update',
        url: 'u4',
      }),
    ];

    const result = service.select(
      items,
      options({ budget: 3, perSourceCap: 1 }),
    );

    expect(result.map((item) => item.url)).toEqual(['u1', 'u3']);
  });

  it('keeps input order for equal scores and is deterministic', () => {
    const items = WORDS.slice(0, 5).map((word) =>
      makeItem({
        source: word,
        title: `${word} ai update`,
        url: `https://example.com/${word}`,
      }),
    );

    const first = service.select(items, options());
    const second = service.select(items, options());

    expect(first.map((item) => item.url)).toEqual(
      items.map((item) => item.url),
    );
    expect(second).toEqual(first);
  });

  it('returns scored copies without touching the input', () => {
    const items = [makeItem({ title: 'ai', url: 'https://example.com/x' })];

    const result = service.select(
      items,
      options({ scoringPolicy: KEYWORD_ONLY_SCORING_POLICY }),
    );

    expect(result[0]?.score).toBe(1);
    expect(items[0]?.score).toBe(0);
  });

  it('rejects contract violations', () => {
    expect(() => service.select([], options({ budget: -1 }))).toThrow(
      DigestContractError,
    );
    expect(() =>
      service.select([], options({ budget: 5, perSourceCap: 0 })),
    ).toThrow(DigestContractError);
    expect(() =>
      service.select([], options({ keywordWeights: { ai: -0.5 } })),
    ).toThrow(DigestContractError);
  });

  it('allows a zero cap when the budget is zero', () => {
    expect(
      service.select(
        [makeItem({ title: 'ai' })],
        options({ budget: 0, perSourceCap: 0 }),
      ),
    ).toEqual([]);
  });
});
