#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DIGEST_CONFIG, DigestConfig } from './digest/config/digest.config';
import { DigestModule } from './digest/digest.module';
import { DigestError } from './digest/errors/digest.errors';
import { DigestGeneratorService } from './digest/services/digest-generator.service';

const logger = new Logger('RunDigest');

// Usage: run-digest [variant] [--dry-run]
async function main(argv: string[]): Promise<number> {
  const app = await NestFactory.createApplicationContext(DigestModule, {
    logger: ['log', 'warn', 'error'],
  });
  try {
    const config = app.get<DigestConfig>(DIGEST_CONFIG);
    const positional = argv.filter((arg) => !arg.startsWith('--'));
    const variantId = positional[0] ?? config.defaultVariant;
    const dryRun = argv.includes('--dry-run') ? true : undefined;

    const result = await app
      .get(DigestGeneratorService)
      .run(variantId, { dryRun });
    if (result.status === 'dry_run') {
      const parts = [`Subject: ${result.subject ?? ''}`];
      if (result.mobileTldr) {
        parts.push(result.mobileTldr);
      }
      parts.push(result.body ?? '');
      process.stdout.write(`${parts.join('\n\n')}\n`);
    }
    logger.log(
      `finished: variant=${result.variant} status=${result.status} selected=${result.selected.length}`,
    );
    return 0;
  } catch (error) {
    if (error instanceof DigestError) {
      logger.error(`${error.code}: ${error.message}`);
    } else {
      logger.error(error instanceof Error ? error.message : String(error));
    }
    return 1;
  } finally {
    await app.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
