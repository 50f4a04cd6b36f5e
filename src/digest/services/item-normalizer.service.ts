import { Injectable } from '@nestjs/common';
import { DESCRIPTION_MAX_CHARS } from '../config/digest.constants';
import { Item, RawFeedEntry } from '../types/digest.types';
import { timeStructToDate } from '../utils/date.util';
import { asText, stripMarkup, truncate } from '../utils/text.util';

@Injectable()
export class ItemNormalizerService {
  normalize(entry: RawFeedEntry | null | undefined, sourceName: string): Item {
    const raw: RawFeedEntry = entry ?? {};

    return {
      source: (sourceName || '').trim(),
      title: asText(raw.title).trim(),
      description: truncate(
        stripMarkup(this.pickBody(raw)),
        DESCRIPTION_MAX_CHARS,
      ),
      url: asText(raw.link).trim(),
      publishedAt: this.pickPublishedText(raw),
      publishedAtParsed: this.parsePublished(raw),
      score: 0,
    };
  }

  normalizeAll(
    entries: Array<{ sourceName: string; entry: RawFeedEntry }>,
  ): Item[] {
    return entries.map(({ sourceName, entry }) =>
      this.normalize(entry, sourceName),
    );
  }

  // summary, then content (first variant when it is a list), then description
  private pickBody(raw: RawFeedEntry): string {
    const summary = asText(raw.summary).trim();
    if (summary) {
      return summary;
    }

    const content = this.contentText(raw.content);
    if (content) {
      return content;
    }

    return asText(raw.description).trim();
  }

  private contentText(content: unknown): string {
    if (Array.isArray(content)) {
      if (content.length === 0) {
        return '';
      }
      const first: unknown = content[0];
      if (first && typeof first === 'object' && 'value' in first) {
        return asText(first.value).trim();
      }
      return asText(first).trim();
    }
    return asText(content).trim();
  }

  private pickPublishedText(raw: RawFeedEntry): string {
    if (raw.published !== undefined && raw.published !== null) {
      return asText(raw.published);
    }
    return asText(raw.updated);
  }

  private parsePublished(raw: RawFeedEntry): Date | null {
    const struct = this.isPresent(raw.published_parsed)
      ? raw.published_parsed
      : raw.updated_parsed;
    if (struct instanceof Date) {
      return Number.isNaN(struct.getTime()) ? null : struct;
    }
    return timeStructToDate(struct);
  }

  private isPresent(value: unknown): boolean {
    if (Array.isArray(value)) {
      return value.length > 0;
    }
    return Boolean(value);
  }
}
