import { Injectable } from '@nestjs/common';
import {
  ANALYSIS_FORMAT,
  ARTICLE_RULES,
  FALLBACK_PROMPT,
  PLAIN_FORMAT,
  STYLE_FOCUS,
  SYSTEM_PROMPTS,
} from '../prompts/digest.prompt';
import { Item, PromptStyle } from '../types/digest.types';
import { formatDigestDate } from '../utils/date.util';

export interface DigestPrompt {
  system: string;
  user: string;
}

@Injectable()
export class DigestPromptService {
  buildPrompt(
    style: PromptStyle,
    items: readonly Item[],
    now: Date,
  ): DigestPrompt {
    const format = style === 'plain' ? PLAIN_FORMAT : ANALYSIS_FORMAT;
    const sections = [
      ARTICLE_RULES,
      STYLE_FOCUS[style],
      format,
      `Date: ${formatDigestDate(now)}`,
      'Articles (highest relevance first):',
      items
        .map((item, index) => this.formatArticle(item, index + 1))
        .join('\n\n'),
      'Write the digest now.',
    ];

    return {
      system: SYSTEM_PROMPTS[style],
      user: sections.join('\n\n'),
    };
  }

  buildFallbackPrompt(style: PromptStyle): DigestPrompt {
    return { system: SYSTEM_PROMPTS[style], user: FALLBACK_PROMPT };
  }

  formatArticle(item: Item, position: number): string {
    return [
      `[${position}] Title: ${item.title}`,
      `Source: ${item.source}`,
      `Published: ${item.publishedAt}`,
      `URL: ${item.url}`,
      `Description: ${item.description}`,
      `Relevance Score: ${item.score.toFixed(2)}`,
    ].join('\n');
  }
}
