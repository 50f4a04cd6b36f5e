import { Module } from '@nestjs/common';
import { DIGEST_CONFIG, loadDigestConfig } from './config/digest.config';
import { DigestController } from './digest.controller';
import { DigestGeneratorService } from './services/digest-generator.service';
import { DigestStorageService } from './services/digest-storage.service';
import { DigestScoringService } from './services/digest-scoring.service';
import { DigestDedupeService } from './services/digest-dedupe.service';
import { DigestSelectionService } from './services/digest-selection.service';
import { ItemNormalizerService } from './services/item-normalizer.service';
import { QueryGeneratorService } from './services/query-generator.service';
import { RssFeedService } from './services/rss-feed.service';
import { LlmClientService } from './services/llm-client.service';
import { DigestPromptService } from './services/digest-prompt.service';
import { DigestFormatterService } from './services/digest-formatter.service';
import { DigestMailerService } from './services/digest-mailer.service';

@Module({
  controllers: [DigestController],
  providers: [
    { provide: DIGEST_CONFIG, useFactory: () => loadDigestConfig() },
    DigestGeneratorService,
    DigestStorageService,
    DigestScoringService,
    DigestDedupeService,
    DigestSelectionService,
    ItemNormalizerService,
    QueryGeneratorService,
    RssFeedService,
    LlmClientService,
    DigestPromptService,
    DigestFormatterService,
    DigestMailerService,
  ],
  exports: [DIGEST_CONFIG, DigestGeneratorService, DigestStorageService],
})
export class DigestModule {}
