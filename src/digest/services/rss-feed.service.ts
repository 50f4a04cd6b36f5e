import { Inject, Injectable, Logger } from '@nestjs/common';
import { DIGEST_CONFIG, DigestConfig } from '../config/digest.config';
import {
  FEED_USER_AGENT,
  SEARCH_FEED_LOCALE,
  SEARCH_FEED_URL,
} from '../config/digest.constants';
import { FetchedEntry, RawFeedEntry } from '../types/digest.types';
import { toTimeStruct } from '../utils/date.util';
import {
  decodeHtmlEntities,
  stripCdata,
  stripMarkup,
} from '../utils/text.util';
import { DigestStorageService } from './digest-storage.service';

interface ParsedFeed {
  title: string;
  entries: RawFeedEntry[];
}

@Injectable()
export class RssFeedService {
  private readonly logger = new Logger(RssFeedService.name);

  constructor(
    @Inject(DIGEST_CONFIG) private readonly config: DigestConfig,
    private readonly storageService: DigestStorageService,
  ) {}

  /**
   * Reads feeds in order until `maxItems * fetchMultiplier` entries are
   * collected. A failing feed is logged and skipped.
   */
  async fetchFeeds(
    urls: readonly string[],
    maxItems: number,
    fetchMultiplier: number,
  ): Promise<FetchedEntry[]> {
    const startedAt = Date.now();
    const cap = Math.max(0, maxItems * fetchMultiplier);
    const collected: FetchedEntry[] = [];

    for (const url of urls) {
      if (collected.length >= cap) {
        break;
      }
      const feed = await this.fetchOnce(url);
      if (!feed) {
        continue;
      }
      const sourceName = feed.title || url;
      for (const entry of feed.entries) {
        collected.push({ sourceName, entry });
        if (collected.length >= cap) {
          break;
        }
      }
    }

    this.logger.log(
      `rss fetch done: feeds=${urls.length} entries=${collected.length} cap=${cap} elapsedMs=${Date.now() - startedAt}`,
    );
    return collected;
  }

  async fetchSearchFeeds(
    queries: readonly string[],
    perQueryLimit: number,
    sourceName: string,
  ): Promise<FetchedEntry[]> {
    const collected: FetchedEntry[] = [];
    for (const query of queries) {
      const feed = await this.fetchOnce(this.buildSearchUrl(query));
      if (!feed) {
        continue;
      }
      for (const entry of feed.entries.slice(0, perQueryLimit)) {
        collected.push({ sourceName, entry });
      }
    }
    this.logger.log(
      `search feeds done: queries=${queries.length} entries=${collected.length}`,
    );
    return collected;
  }

  buildSearchUrl(query: string): string {
    return `${SEARCH_FEED_URL}?q=${query}&${SEARCH_FEED_LOCALE}`;
  }

  private async fetchOnce(url: string): Promise<ParsedFeed | null> {
    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(),
      this.config.httpTimeoutMs,
    );
    try {
      const res = await fetch(url, {
        headers: {
          'User-Agent': FEED_USER_AGENT,
          Accept:
            'application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8',
        },
        signal: controller.signal,
      });

      if (!res.ok) {
        this.logger.warn(`rss fetch failed: ${res.status} ${url}`);
        await this.storageService.appendFeedHealth(
          url,
          false,
          `HTTP ${res.status}`,
        );
        return null;
      }

      const parsed = this.parseFeed(await res.text());
      await this.storageService.appendFeedHealth(url, true);
      return parsed;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`rss fetch error: ${url} ${message}`);
      await this.storageService.appendFeedHealth(url, false, message);
      return null;
    } finally {
      clearTimeout(timeout);
    }
  }

  parseFeed(xml: string): ParsedFeed {
    const blocks: string[] =
      xml.match(/<(item|entry)\b[\s\S]*?<\/\1>/gi) ?? [];
    const firstBlockAt = blocks.length > 0 ? xml.indexOf(blocks[0]) : -1;
    const header = firstBlockAt >= 0 ? xml.slice(0, firstBlockAt) : xml;

    return {
      title: stripMarkup(this.extractTag(header, 'title')),
      entries: blocks.map((block) => this.parseEntry(block)),
    };
  }

  private parseEntry(block: string): RawFeedEntry {
    const entry: RawFeedEntry = {
      title: stripMarkup(this.extractTag(block, 'title')),
      link: this.extractLink(block),
    };

    // RSS carries the summary in <description>
    const summary =
      this.extractTag(block, 'summary') ||
      this.extractTag(block, 'description');
    if (summary) {
      entry.summary = summary;
    }
    const description = this.extractTag(block, 'description');
    if (description) {
      entry.description = description;
    }
    const content =
      this.extractTag(block, 'content:encoded') ||
      this.extractTag(block, 'content');
    if (content) {
      entry.content = [{ value: content }];
    }

    const published =
      this.extractTag(block, 'pubDate') ||
      this.extractTag(block, 'published') ||
      this.extractTag(block, 'dc:date');
    if (published) {
      entry.published = published;
      entry.published_parsed = this.toStruct(published);
    }
    const updated = this.extractTag(block, 'updated');
    if (updated) {
      entry.updated = updated;
      entry.updated_parsed = this.toStruct(updated);
    }

    return entry;
  }

  private toStruct(value: string): number[] | undefined {
    const date = new Date(value.trim());
    return Number.isNaN(date.getTime()) ? undefined : toTimeStruct(date);
  }

  private extractLink(block: string): string {
    const text = stripMarkup(this.extractTag(block, 'link'));
    if (text) {
      return text;
    }
    const alternate =
      block.match(
        /<link\b(?=[^>]*\brel=["']alternate["'])[^>]*\bhref=["']([^"']+)["']/i,
      ) ?? block.match(/<link\b[^>]*\bhref=["']([^"']+)["']/i);
    return alternate?.[1] ? decodeHtmlEntities(alternate[1]).trim() : '';
  }

  private extractTag(xml: string, tagName: string): string {
    const escapedTag = tagName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp(
      `<${escapedTag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${escapedTag}>`,
      'i',
    );
    const match = xml.match(regex);
    if (!match?.[1]) {
      return '';
    }
    return decodeHtmlEntities(stripCdata(match[1])).trim();
  }
}
