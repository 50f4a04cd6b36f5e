import { Inject, Injectable, Logger } from '@nestjs/common';
import { DIGEST_CONFIG, DigestConfig } from '../config/digest.config';
import { findVariant } from '../config/digest-variants';
import { NarratorError, UnknownVariantError } from '../errors/digest.errors';
import {
  DigestPreview,
  DigestRunResult,
  DigestVariant,
  FetchedEntry,
  Item,
} from '../types/digest.types';
import { DigestFormatterService } from './digest-formatter.service';
import { DigestMailerService } from './digest-mailer.service';
import { DigestPrompt, DigestPromptService } from './digest-prompt.service';
import { DigestSelectionService } from './digest-selection.service';
import { DigestStorageService } from './digest-storage.service';
import { ItemNormalizerService } from './item-normalizer.service';
import { LlmClientService } from './llm-client.service';
import { QueryGeneratorService } from './query-generator.service';
import { RssFeedService } from './rss-feed.service';

export interface DigestRunOptions {
  dryRun?: boolean;
  budget?: number;
  now?: Date;
}

@Injectable()
export class DigestGeneratorService {
  private readonly logger = new Logger(DigestGeneratorService.name);
  private readonly inFlightRuns = new Map<string, Promise<DigestRunResult>>();

  constructor(
    @Inject(DIGEST_CONFIG) private readonly config: DigestConfig,
    private readonly rssFeedService: RssFeedService,
    private readonly normalizerService: ItemNormalizerService,
    private readonly selectionService: DigestSelectionService,
    private readonly queryGeneratorService: QueryGeneratorService,
    private readonly promptService: DigestPromptService,
    private readonly llmClientService: LlmClientService,
    private readonly formatterService: DigestFormatterService,
    private readonly mailerService: DigestMailerService,
    private readonly storageService: DigestStorageService,
  ) {}

  /** Variant definition with environment overrides applied. */
  resolveVariant(variantId: string, budget?: number): DigestVariant {
    const base = findVariant(variantId);
    if (!base) {
      throw new UnknownVariantError(variantId);
    }
    const resolvedBudget = budget ?? this.config.budgetOverride ?? base.budget;
    return {
      ...base,
      budget: resolvedBudget,
      perSourceCap: base.perSourceCap ?? resolvedBudget,
      feeds: this.config.feedsOverride ?? base.feeds,
      searchFeeds: {
        ...base.searchFeeds,
        enabled: this.config.searchFeedsEnabled ?? base.searchFeeds.enabled,
      },
      mobileTldr: this.config.mobileTldrEnabled ?? base.mobileTldr,
    };
  }

  generateQueries(variantId: string): string[] {
    const variant = this.resolveVariant(variantId);
    return this.queryGeneratorService.generateQueries(
      variant.keywordWeights,
      variant.searchFeeds.maxQueries,
      variant.searchFeeds.policy,
    );
  }

  async preview(
    variantId: string,
    options?: { budget?: number; now?: Date },
  ): Promise<DigestPreview> {
    const variant = this.resolveVariant(variantId, options?.budget);
    const now = options?.now ?? new Date();
    const { fetched, selected } = await this.collectAndSelect(variant, now);
    return {
      variant: variant.id,
      generatedAt: now.toISOString(),
      fetched,
      budget: variant.budget,
      relevanceThreshold: variant.relevanceThreshold,
      perSourceCap: variant.perSourceCap,
      items: selected,
    };
  }

  async run(
    variantId: string,
    options?: DigestRunOptions,
  ): Promise<DigestRunResult> {
    const variant = this.resolveVariant(variantId, options?.budget);
    const dryRun = options?.dryRun ?? this.config.dryRun;
    const lockKey = `${variant.id}:${variant.budget}:${dryRun ? '1' : '0'}`;

    const inFlight = this.inFlightRuns.get(lockKey);
    if (inFlight) {
      return inFlight;
    }

    const task = this.runCore(variant, dryRun, options?.now ?? new Date());
    this.inFlightRuns.set(lockKey, task);
    try {
      return await task;
    } finally {
      if (this.inFlightRuns.get(lockKey) === task) {
        this.inFlightRuns.delete(lockKey);
      }
    }
  }

  private async runCore(
    variant: DigestVariant,
    dryRun: boolean,
    now: Date,
  ): Promise<DigestRunResult> {
    const startedAt = Date.now();
    this.logger.log(
      `run start: variant=${variant.id} budget=${variant.budget} dryRun=${dryRun ? 1 : 0} feeds=${variant.feeds.length}`,
    );

    const { fetched, selected } = await this.collectAndSelect(variant, now);
    const base: DigestRunResult = {
      variant: variant.id,
      status: 'no_articles',
      generatedAt: now.toISOString(),
      fetched,
      selected,
      subject: null,
      body: null,
      mobileTldr: null,
    };

    let prompt: DigestPrompt;
    if (selected.length > 0) {
      selected.slice(0, 5).forEach((item, index) => {
        this.logger.log(
          `top #${index + 1} score=${item.score.toFixed(2)} ${item.title.slice(0, 80)}`,
        );
      });
      prompt = this.promptService.buildPrompt(
        variant.promptStyle,
        selected,
        now,
      );
    } else if (variant.promptStyle === 'plain') {
      prompt = this.promptService.buildFallbackPrompt(variant.promptStyle);
    } else {
      this.logger.warn(`run done: variant=${variant.id} no relevant articles`);
      return base;
    }

    const narrative = await this.llmClientService.generateText(
      prompt.system,
      prompt.user,
    );
    if (!narrative) {
      throw new NarratorError('narrator returned no text', {
        variant: variant.id,
      });
    }

    const { subject, body } = this.formatterService.parseSubjectAndBody(
      narrative,
      variant.fallbackSubject,
    );
    const mobileTldr = variant.mobileTldr
      ? this.formatterService.createMobileTldr(narrative, subject)
      : null;
    const result: DigestRunResult = {
      ...base,
      status: dryRun ? 'dry_run' : 'sent',
      subject,
      body,
      mobileTldr,
    };

    if (dryRun) {
      this.logger.log(`dry run preview: subject="${subject}"`);
      await this.storageService.appendSendLog(subject, 'DRY_RUN', now);
    } else {
      await this.deliver(subject, body, mobileTldr, now);
    }

    this.logger.log(
      `run done: variant=${variant.id} status=${result.status} selected=${selected.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return result;
  }

  private async deliver(
    subject: string,
    body: string,
    mobileTldr: string | null,
    now: Date,
  ): Promise<void> {
    try {
      await this.mailerService.send({ subject, body, mobileTldr });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      await this.storageService.appendSendLog(
        subject,
        `FAILED: ${message.slice(0, 100)}`,
        now,
      );
      throw error;
    }
    await this.storageService.appendSendLog(subject, 'SUCCESS', now);
  }

  private async collectAndSelect(
    variant: DigestVariant,
    now: Date,
  ): Promise<{ fetched: number; selected: Item[] }> {
    const entries: FetchedEntry[] = [
      ...(await this.rssFeedService.fetchFeeds(
        variant.feeds,
        variant.budget,
        variant.fetchMultiplier,
      )),
    ];

    if (variant.searchFeeds.enabled) {
      const queries = this.queryGeneratorService.generateQueries(
        variant.keywordWeights,
        variant.searchFeeds.maxQueries,
        variant.searchFeeds.policy,
      );
      this.logger.log(
        `search queries: count=${queries.length} first=${queries.slice(0, 3).join(', ')}`,
      );
      entries.push(
        ...(await this.rssFeedService.fetchSearchFeeds(
          queries,
          variant.searchFeeds.perQueryLimit,
          variant.searchFeeds.sourceName,
        )),
      );
    }

    const items = this.normalizerService.normalizeAll(entries);
    const selected = this.selectionService.select(items, {
      budget: variant.budget,
      keywordWeights: variant.keywordWeights,
      relevanceThreshold: variant.relevanceThreshold,
      perSourceCap: variant.perSourceCap,
      scoringPolicy: variant.scoringPolicy,
      now,
    });
    return { fetched: entries.length, selected };
  }
}
