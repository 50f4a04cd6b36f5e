import { Injectable } from '@nestjs/common';
import {
  TITLE_OVERLAP_DUPLICATE_MIN,
  TITLE_PREFIX_TOKENS,
} from '../config/digest.constants';
import { Item } from '../types/digest.types';
import { overlapCount } from '../utils/similarity.util';
import { titlePrefixTokens } from '../utils/text.util';

type DedupeFields = Pick<Item, 'url' | 'title'>;

/**
 * Accepted-so-far state for one selection pass. Never shared between runs.
 */
export class DedupeLedger {
  private readonly identityKeys = new Set<string>();
  private readonly titleTokenSets: Set<string>[] = [];

  constructor(private readonly dedupe: DigestDedupeService) {}

  get size(): number {
    return this.titleTokenSets.length;
  }

  isDuplicate(candidate: DedupeFields): boolean {
    const key = this.dedupe.identityKey(candidate);
    if (key && this.identityKeys.has(key)) {
      return true;
    }
    const tokens = this.dedupe.titleTokens(candidate.title);
    return this.titleTokenSets.some((seen) =>
      this.dedupe.isNearDuplicateTokens(tokens, seen),
    );
  }

  accept(item: DedupeFields): void {
    const key = this.dedupe.identityKey(item);
    if (key) {
      this.identityKeys.add(key);
    }
    this.titleTokenSets.push(this.dedupe.titleTokens(item.title));
  }
}

@Injectable()
export class DigestDedupeService {
  createLedger(): DedupeLedger {
    return new DedupeLedger(this);
  }

  /**
   * Same story as anything already accepted: equal identity key, or 3+ shared
   * words among the first five title words.
   */
  isDuplicate(
    candidate: DedupeFields,
    acceptedSoFar: readonly DedupeFields[],
  ): boolean {
    const ledger = this.createLedger();
    acceptedSoFar.forEach((item) => ledger.accept(item));
    return ledger.isDuplicate(candidate);
  }

  /**
   * `url:` plus the trimmed, lower-cased URL; `title:` plus the title when
   * the URL is empty. Empty string when both are empty.
   */
  identityKey(item: DedupeFields): string {
    const url = (item.url || '').trim().toLowerCase();
    if (url) {
      return `url:${url}`;
    }
    const title = (item.title || '').trim().toLowerCase();
    return title ? `title:${title}` : '';
  }

  titleTokens(title: string): Set<string> {
    return titlePrefixTokens(title, TITLE_PREFIX_TOKENS);
  }

  // Known limitation: short generic headlines ("AI news roundup for today")
  // can collide without being the same story.
  isNearDuplicateTokens(a: Set<string>, b: Set<string>): boolean {
    return overlapCount(a, b) >= TITLE_OVERLAP_DUPLICATE_MIN;
  }
}
