import { Injectable } from '@nestjs/common';
import {
  DEFAULT_MAX_QUERIES,
  DEFAULT_QUERY_POLICY,
  QUERY_OR_JOINER,
  QUERY_TERM_SEPARATOR,
} from '../config/digest.constants';
import { DigestContractError } from '../errors/digest.errors';
import { KeywordWeights, QueryGenerationPolicy } from '../types/digest.types';

@Injectable()
export class QueryGeneratorService {
  /**
   * Search queries for widening discovery: the heaviest keywords first (one
   * query each), then the curated entity groups, truncated to `maxQueries`.
   */
  generateQueries(
    keywordWeights: KeywordWeights,
    maxQueries: number = DEFAULT_MAX_QUERIES,
    policy: QueryGenerationPolicy = DEFAULT_QUERY_POLICY,
  ): string[] {
    if (!Number.isInteger(maxQueries) || maxQueries < 0) {
      throw new DigestContractError(
        'maxQueries must be a non-negative integer',
        { maxQueries },
      );
    }

    const derived = Object.entries(keywordWeights)
      .filter(([keyword]) => keyword.trim().length > 0)
      .sort((a, b) => b[1] - a[1])
      .filter(([, weight]) => weight >= policy.topTierCutoff)
      .slice(0, Math.max(0, policy.maxTopKeywords))
      .map(([keyword]) => this.encodeTerm(keyword));

    const curated = policy.curatedGroups
      .map((group) =>
        group
          .map((term) => this.encodeTerm(term))
          .filter(Boolean)
          .join(QUERY_OR_JOINER),
      )
      .filter(Boolean);

    return [...derived, ...curated].slice(0, maxQueries);
  }

  /** `"Google AI"` -> `"Google+AI"`, `"Disney+"` -> `"Disney%2B"`. */
  encodeTerm(term: string): string {
    return term
      .trim()
      .split(/\s+/)
      .filter(Boolean)
      .map((word) => encodeURIComponent(word))
      .join(QUERY_TERM_SEPARATOR);
  }
}
