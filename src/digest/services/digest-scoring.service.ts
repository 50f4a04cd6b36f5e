import { Injectable } from '@nestjs/common';
import { DEFAULT_SCORING_POLICY } from '../config/digest.constants';
import { DigestContractError } from '../errors/digest.errors';
import { Item, KeywordWeights, ScoringPolicy } from '../types/digest.types';
import { computeAgeHours } from '../utils/date.util';

type ScorableItem = Pick<Item, 'title' | 'description' | 'publishedAtParsed'>;

@Injectable()
export class DigestScoringService {
  /**
   * Relevance of one item: every keyword found anywhere in title or
   * description adds its weight (matches stack), plus a linear freshness
   * boost and two fixed length bonuses.
   */
  score(
    item: ScorableItem,
    keywordWeights: KeywordWeights,
    now: Date,
    policy: ScoringPolicy = DEFAULT_SCORING_POLICY,
  ): number {
    const title = item.title || '';
    const description = item.description || '';

    const total =
      this.keywordScore(`${title} ${description}`, keywordWeights) +
      this.recencyBoost(item.publishedAtParsed, now, policy) +
      (title.length > policy.titleLengthThreshold
        ? policy.titleLengthBonus
        : 0) +
      (description.length > policy.descriptionLengthThreshold
        ? policy.descriptionLengthBonus
        : 0);

    return Number.isFinite(total) ? Math.max(0, total) : 0;
  }

  keywordScore(text: string, keywordWeights: KeywordWeights): number {
    const haystack = (text || '').toLowerCase();
    let score = 0;
    for (const [keyword, weight] of Object.entries(keywordWeights)) {
      const needle = keyword.toLowerCase();
      if (!needle.trim()) {
        continue;
      }
      if (haystack.includes(needle)) {
        score += weight;
      }
    }
    return score;
  }

  recencyBoost(
    publishedAt: Date | null,
    now: Date,
    policy: ScoringPolicy = DEFAULT_SCORING_POLICY,
  ): number {
    if (!publishedAt || Number.isNaN(publishedAt.getTime())) {
      return 0;
    }
    if (policy.recencyWindowHours <= 0 || policy.maxRecencyBoost <= 0) {
      return 0;
    }

    // future timestamps count as brand new
    const ageHours = Math.max(0, computeAgeHours(publishedAt, now));
    if (ageHours >= policy.recencyWindowHours) {
      return 0;
    }
    return policy.maxRecencyBoost * (1 - ageHours / policy.recencyWindowHours);
  }

  assertValidWeights(keywordWeights: KeywordWeights): void {
    for (const [keyword, weight] of Object.entries(keywordWeights)) {
      if (typeof weight !== 'number' || !Number.isFinite(weight)) {
        throw new DigestContractError(
          `keyword weight must be a finite number: ${keyword}`,
          { keyword, weight },
        );
      }
      if (weight < 0) {
        throw new DigestContractError(
          `keyword weight must not be negative: ${keyword}`,
          { keyword, weight },
        );
      }
    }
  }
}
