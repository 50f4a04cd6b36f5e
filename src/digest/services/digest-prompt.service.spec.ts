import { FALLBACK_PROMPT, SYSTEM_PROMPTS } from '../prompts/digest.prompt';
import { Item } from '../types/digest.types';
import { DigestPromptService } from './digest-prompt.service';

const item: Item = {
  source: 'Example Feed',
  title: 'New model ships',
  description: 'A lab released a model.',
  url: 'https://example.com/model',
  publishedAt: 'Mon, 19 Oct 2026 08:00:00 GMT',
  publishedAtParsed: new Date('2026-10-19T08:00:00Z'),
  score: 3.456,
};

describe('DigestPromptService', () => {
  const service = new DigestPromptService();

  it('formats one article block', () => {
    expect(service.formatArticle(item, 2)).toBe(
      [
        '[2] Title: New model ships',
        'Source: Example Feed',
        'Published: Mon, 19 Oct 2026 08:00:00 GMT',
        'URL: https://example.com/model',
        'Description: A lab released a model.',
        'Relevance Score: 3.46',
      ].join('\n'),
    );
  });

  it('builds a prompt with the date and articles in rank order', () => {
    const second: Item = { ...item, title: 'Second', score: 1 };

    const prompt = service.buildPrompt(
      'ai-media',
      [item, second],
      new Date('2026-10-19T12:30:00Z'),
    );

    expect(prompt.system).toBe(SYSTEM_PROMPTS['ai-media']);
    expect(prompt.user).toContain('Date: 2026-10-19 12:30 UTC');
    expect(prompt.user).toContain('=== KEY THEMES TODAY ===');
    expect(prompt.user.indexOf('[1] Title: New model ships')).toBeLessThan(
      prompt.user.indexOf('[2] Title: Second'),
    );
    expect(prompt.user.endsWith('Write the digest now.')).toBe(true);
  });

  it('uses the plain format for the plain style', () => {
    const prompt = service.buildPrompt('plain', [item], new Date());

    expect(prompt.user).toContain('Top stories:');
    expect(prompt.user).not.toContain('=== TOP INSIGHT ===');
  });

  it('builds the no-articles fallback prompt', () => {
    expect(service.buildFallbackPrompt('plain')).toEqual({
      system: SYSTEM_PROMPTS.plain,
      user: FALLBACK_PROMPT,
    });
  });
});
