import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { DIGEST_CONFIG, DigestConfig } from '../config/digest.config';
import {
  FEED_HEALTH_LOG_FILE,
  SEND_LOG_FILE,
} from '../config/digest.constants';
import { formatLogTimestamp } from '../utils/date.util';

@Injectable()
export class DigestStorageService {
  private readonly logger = new Logger(DigestStorageService.name);

  constructor(@Inject(DIGEST_CONFIG) private readonly config: DigestConfig) {}

  get sendLogPath(): string {
    return path.join(this.config.dataDir, SEND_LOG_FILE);
  }

  get feedHealthPath(): string {
    return path.join(this.config.dataDir, FEED_HEALTH_LOG_FILE);
  }

  /** Keeps the newest `sendLogMaxEntries` lines. */
  async appendSendLog(
    subject: string,
    status: string,
    now: Date = new Date(),
  ): Promise<void> {
    const lines = await this.readLines(this.sendLogPath);
    lines.push(`${formatLogTimestamp(now)} | ${status} | ${subject}`);
    const kept = lines.slice(-this.config.sendLogMaxEntries);
    await this.safeWrite(this.sendLogPath, `${kept.join('\n')}\n`);
  }

  async loadSendLog(): Promise<string[]> {
    return this.readLines(this.sendLogPath);
  }

  // Health logging must never break a fetch.
  async appendFeedHealth(
    url: string,
    success: boolean,
    error = '',
    now: Date = new Date(),
  ): Promise<void> {
    const status = success ? 'SUCCESS' : `FAILED: ${error.slice(0, 50)}`;
    const line = `${formatLogTimestamp(now)} | ${url.slice(0, 60)} | ${status}\n`;
    try {
      await fs.mkdir(this.config.dataDir, { recursive: true });
      await fs.appendFile(this.feedHealthPath, line, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`feed health log write failed: ${message}`);
    }
  }

  private async readLines(filePath: string): Promise<string[]> {
    try {
      const raw = await fs.readFile(filePath, 'utf-8');
      return raw.split('\n').filter((line) => line.length > 0);
    } catch {
      return [];
    }
  }

  private async safeWrite(filePath: string, payload: string): Promise<void> {
    const dir = path.dirname(filePath);
    const base = path.basename(filePath);
    const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);

    await fs.mkdir(dir, { recursive: true });
    try {
      await fs.writeFile(tmpPath, payload, 'utf-8');
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.unlink(tmpPath).catch(() => undefined);
      throw error;
    }
  }
}
