/**
 * Loosely-typed feed entry as handed over by a feed source. Every field may be
 * missing or carry an unexpected shape; `ItemNormalizerService` is the only
 * place that reads it.
 */
export interface RawFeedEntry {
  title?: unknown;
  summary?: unknown;
  content?: unknown;
  description?: unknown;
  link?: unknown;
  published?: unknown;
  updated?: unknown;
  published_parsed?: unknown;
  updated_parsed?: unknown;
}

/** `[year, month(1-12), day, hour, minute, second, ...]`, as feed parsers emit. */
export type TimeStruct = readonly number[];

export interface FetchedEntry {
  sourceName: string;
  entry: RawFeedEntry;
}

export interface Item {
  readonly source: string;
  readonly title: string;
  readonly description: string;
  readonly url: string;
  readonly publishedAt: string;
  readonly publishedAtParsed: Date | null;
  score: number;
}

export type KeywordWeights = Readonly<Record<string, number>>;

export interface ScoringPolicy {
  recencyWindowHours: number;
  maxRecencyBoost: number;
  titleLengthThreshold: number;
  titleLengthBonus: number;
  descriptionLengthThreshold: number;
  descriptionLengthBonus: number;
}

export interface SelectionOptions {
  budget: number;
  keywordWeights: KeywordWeights;
  relevanceThreshold: number;
  perSourceCap: number;
  now: Date;
  scoringPolicy?: ScoringPolicy;
}

export interface QueryGenerationPolicy {
  topTierCutoff: number;
  maxTopKeywords: number;
  /** Each group becomes one query; terms inside a group are OR-ed. */
  curatedGroups: string[][];
}

export type PromptStyle = 'plain' | 'ai-media' | 'media-innovation';

export interface DigestVariant {
  id: string;
  title: string;
  feeds: string[];
  keywordWeights: KeywordWeights;
  budget: number;
  relevanceThreshold: number;
  perSourceCap: number;
  fetchMultiplier: number;
  scoringPolicy: ScoringPolicy;
  searchFeeds: {
    enabled: boolean;
    sourceName: string;
    maxQueries: number;
    perQueryLimit: number;
    policy: QueryGenerationPolicy;
  };
  promptStyle: PromptStyle;
  fallbackSubject: string;
  mobileTldr: boolean;
}

/**
 * Variant as configured. A `null` per-source cap means "as large as the
 * budget", resolved once the run's budget is known.
 */
export type DigestVariantDefinition = Omit<DigestVariant, 'perSourceCap'> & {
  perSourceCap: number | null;
};

export type DigestRunStatus = 'sent' | 'dry_run' | 'no_articles';

export interface DigestRunResult {
  variant: string;
  status: DigestRunStatus;
  generatedAt: string;
  fetched: number;
  selected: Item[];
  subject: string | null;
  body: string | null;
  mobileTldr: string | null;
}

export interface DigestPreview {
  variant: string;
  generatedAt: string;
  fetched: number;
  budget: number;
  relevanceThreshold: number;
  perSourceCap: number;
  items: Item[];
}
