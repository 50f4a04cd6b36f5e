import {
  BadRequestException,
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { DIGEST_VARIANTS } from './config/digest-variants';
import { SERVICE_NAME } from './config/digest.constants';
import {
  DigestContractError,
  UnknownVariantError,
} from './errors/digest.errors';
import { DigestPreview, DigestRunResult } from './types/digest.types';
import { DigestGeneratorService } from './services/digest-generator.service';
import { DigestStorageService } from './services/digest-storage.service';

export interface VariantSummary {
  id: string;
  title: string;
  feeds: number;
  keywords: number;
  budget: number;
  relevanceThreshold: number;
  perSourceCap: number | null;
  searchFeeds: boolean;
}

@Controller()
export class DigestController {
  constructor(
    private readonly digestGeneratorService: DigestGeneratorService,
    private readonly digestStorageService: DigestStorageService,
  ) {}

  @Get('health')
  getHealth(): { status: string; service: string } {
    return {
      status: 'ok',
      service: SERVICE_NAME,
    };
  }

  @Get('digest/variants')
  listVariants(): VariantSummary[] {
    return DIGEST_VARIANTS.map((variant) => ({
      id: variant.id,
      title: variant.title,
      feeds: variant.feeds.length,
      keywords: Object.keys(variant.keywordWeights).length,
      budget: variant.budget,
      relevanceThreshold: variant.relevanceThreshold,
      perSourceCap: variant.perSourceCap,
      searchFeeds: variant.searchFeeds.enabled,
    }));
  }

  @Get('digest/send-log')
  async getSendLog(): Promise<{ entries: string[] }> {
    return { entries: await this.digestStorageService.loadSendLog() };
  }

  @Get('digest/:variant/queries')
  getQueries(@Param('variant') variantId: string): { queries: string[] } {
    return this.translate(() => ({
      queries: this.digestGeneratorService.generateQueries(variantId),
    }));
  }

  @Get('digest/:variant/preview')
  async previewDigest(
    @Param('variant') variantId: string,
    @Query('budget') budgetRaw?: string,
  ): Promise<DigestPreview> {
    const budget = this.parseBudget(budgetRaw);
    return this.translateAsync(() =>
      this.digestGeneratorService.preview(variantId, { budget }),
    );
  }

  @Post('digest/:variant/run')
  async runDigest(
    @Param('variant') variantId: string,
    @Body('budget') budgetRaw?: unknown,
    @Body('dryRun') dryRunRaw?: unknown,
  ): Promise<DigestRunResult> {
    const budget = this.parseBudget(budgetRaw);
    const dryRun = this.parseBoolean(dryRunRaw, 'dryRun');
    return this.translateAsync(() =>
      this.digestGeneratorService.run(variantId, { budget, dryRun }),
    );
  }

  private translate<T>(action: () => T): T {
    try {
      return action();
    } catch (error) {
      throw this.toHttpError(error);
    }
  }

  private async translateAsync<T>(action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw this.toHttpError(error);
    }
  }

  private toHttpError(error: unknown): unknown {
    if (error instanceof UnknownVariantError) {
      return new NotFoundException(error.message);
    }
    if (error instanceof DigestContractError) {
      return new BadRequestException(error.message);
    }
    return error;
  }

  private parseBudget(value: unknown): number | undefined {
    if (value == null || value === '') {
      return undefined;
    }

    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new BadRequestException('budget must be a non-negative integer');
    }
    return parsed;
  }

  private parseBoolean(value: unknown, fieldName: string): boolean | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'number') {
      if (value === 1) {
        return true;
      }
      if (value === 0) {
        return false;
      }
    }
    if (typeof value === 'string') {
      const lowered = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'y'].includes(lowered)) {
        return true;
      }
      if (['0', 'false', 'no', 'n'].includes(lowered)) {
        return false;
      }
    }

    throw new BadRequestException(`${fieldName} must be a boolean value`);
  }
}
