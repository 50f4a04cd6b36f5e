import path from 'node:path';

export const DIGEST_CONFIG = Symbol('DIGEST_CONFIG');

export interface NarratorConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  maxRetries: number;
  timeoutMs: number;
  temperature: number;
}

export interface MailConfig {
  from: string;
  to: string;
  host: string;
  port: number;
  user: string;
  pass: string;
}

export interface DigestConfig {
  defaultVariant: string;
  budgetOverride: number | null;
  feedsOverride: string[] | null;
  searchFeedsEnabled: boolean | null;
  mobileTldrEnabled: boolean | null;
  httpTimeoutMs: number;
  dryRun: boolean;
  narrator: NarratorConfig;
  mail: MailConfig;
  dataDir: string;
  sendLogMaxEntries: number;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback = ''): string {
  const raw = (env[name] ?? '').trim();
  return raw || fallback;
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = (env[name] ?? '').trim();
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readBoolean(env: Env, name: string): boolean | null {
  const raw = (env[name] ?? '').trim().toLowerCase();
  if (!raw) {
    return null;
  }
  return ['1', 'true', 'yes'].includes(raw);
}

function readPositiveInt(env: Env, name: string): number | null {
  const parsed = readNumber(env, name, Number.NaN);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return Math.floor(parsed);
}

/**
 * The only reader of process environment. Everything downstream receives the
 * returned object through the `DIGEST_CONFIG` provider.
 */
export function loadDigestConfig(env: Env = process.env): DigestConfig {
  const feedsRaw = readString(env, 'FEEDS');
  const feeds = feedsRaw
    .split(',')
    .map((url) => url.trim())
    .filter(Boolean);
  const from = readString(env, 'FROM_EMAIL');

  return Object.freeze({
    defaultVariant: readString(env, 'DIGEST_VARIANT', 'ai-daily'),
    budgetOverride: readPositiveInt(env, 'MAX_ARTICLES'),
    feedsOverride: feeds.length > 0 ? feeds : null,
    searchFeedsEnabled: readBoolean(env, 'ENABLE_SEARCH_FEEDS'),
    mobileTldrEnabled: readBoolean(env, 'ENABLE_MOBILE_TLDR'),
    httpTimeoutMs: Math.max(1, readNumber(env, 'HTTP_TIMEOUT', 15)) * 1000,
    dryRun: readBoolean(env, 'DRY_RUN') ?? false,
    narrator: {
      apiKey: readString(env, 'OPENAI_API_KEY'),
      baseUrl: readString(env, 'OPENAI_BASE_URL', 'https://api.openai.com/v1'),
      model: readString(env, 'OPENAI_MODEL', 'gpt-4o-mini'),
      maxRetries: Math.max(
        0,
        Math.floor(readNumber(env, 'OPENAI_MAX_RETRIES', 2)),
      ),
      timeoutMs: Math.max(1, readNumber(env, 'OPENAI_TIMEOUT_SEC', 60)) * 1000,
      temperature: readNumber(env, 'OPENAI_TEMPERATURE', 0.2),
    },
    mail: {
      from,
      to: readString(env, 'TO_EMAIL'),
      host: readString(env, 'SMTP_HOST', 'smtp.gmail.com'),
      port: readNumber(env, 'SMTP_PORT', 465),
      user: readString(env, 'SMTP_USER', from),
      pass: readString(
        env,
        'SMTP_PASS',
        readString(env, 'GMAIL_APP_PASSWORD'),
      ),
    },
    dataDir: readString(env, 'DATA_DIR', path.join(process.cwd(), 'data')),
    sendLogMaxEntries: Math.max(
      1,
      Math.floor(readNumber(env, 'SEND_LOG_MAX_ENTRIES', 30)),
    ),
  });
}
