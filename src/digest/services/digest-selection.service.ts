import { Injectable, Logger } from '@nestjs/common';
import { DEFAULT_SCORING_POLICY } from '../config/digest.constants';
import { DigestContractError } from '../errors/digest.errors';
import { Item, SelectionOptions } from '../types/digest.types';
import { DigestDedupeService } from './digest-dedupe.service';
import { DigestScoringService } from './digest-scoring.service';

@Injectable()
export class DigestSelectionService {
  private readonly logger = new Logger(DigestSelectionService.name);

  constructor(
    private readonly scoringService: DigestScoringService,
    private readonly dedupeService: DigestDedupeService,
  ) {}

  /**
   * Ranked, de-duplicated, source-capped candidates for one digest.
   *
   * Items scoring at or below the threshold are dropped; the rest are sorted
   * by score (stable, so ties keep input order), walked once for duplicates
   * up to `budget`, then walked again to enforce `perSourceCap`. The second
   * pass only removes items, so output stays in descending-score order.
   * The input items are not modified; scored copies are returned.
   */
  select(rawItems: readonly Item[], options: SelectionOptions): Item[] {
    this.assertValidOptions(options);
    const { budget, keywordWeights, relevanceThreshold, perSourceCap, now } =
      options;
    const policy = options.scoringPolicy ?? DEFAULT_SCORING_POLICY;

    if (budget === 0 || rawItems.length === 0) {
      return [];
    }

    const scored = rawItems
      .map((item) => ({
        ...item,
        score: this.scoringService.score(item, keywordWeights, now, policy),
      }))
      .filter((item) => item.score > relevanceThreshold);

    scored.sort((a, b) => b.score - a.score);

    const ledger = this.dedupeService.createLedger();
    const unique: Item[] = [];
    for (const item of scored) {
      if (unique.length >= budget) {
        break;
      }
      if (ledger.isDuplicate(item)) {
        continue;
      }
      ledger.accept(item);
      unique.push(item);
    }

    const sourceCounts = new Map<string, number>();
    const diverse: Item[] = [];
    for (const item of unique) {
      const count = sourceCounts.get(item.source) ?? 0;
      if (count >= perSourceCap) {
        continue;
      }
      sourceCounts.set(item.source, count + 1);
      diverse.push(item);
    }

    this.logger.log(
      `select done: in=${rawItems.length} aboveThreshold=${scored.length} unique=${unique.length} out=${diverse.length} budget=${budget}`,
    );
    return diverse;
  }

  private assertValidOptions(options: SelectionOptions): void {
    const { budget, perSourceCap, relevanceThreshold } = options;
    if (!Number.isInteger(budget) || budget < 0) {
      throw new DigestContractError(
        'budget must be a non-negative integer',
        { budget },
      );
    }
    if (!Number.isInteger(perSourceCap) || perSourceCap < 0) {
      throw new DigestContractError(
        'perSourceCap must be a non-negative integer',
        { perSourceCap },
      );
    }
    if (perSourceCap === 0 && budget > 0) {
      throw new DigestContractError(
        'perSourceCap of 0 would reject every item',
        { budget, perSourceCap },
      );
    }
    if (!Number.isFinite(relevanceThreshold)) {
      throw new DigestContractError('relevanceThreshold must be finite', {
        relevanceThreshold,
      });
    }
    if (Number.isNaN(options.now.getTime())) {
      throw new DigestContractError('now must be a valid date');
    }
    this.scoringService.assertValidWeights(options.keywordWeights);
  }
}
