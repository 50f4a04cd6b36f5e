import { QueryGenerationPolicy, ScoringPolicy } from '../types/digest.types';

export const SERVICE_NAME = 'ranked-news-digest';
export const SERVICE_VERSION = '1.0.0';

export const DESCRIPTION_MAX_CHARS = 500;

export const TITLE_PREFIX_TOKENS = 5;
export const TITLE_OVERLAP_DUPLICATE_MIN = 3;

export const DEFAULT_RELEVANCE_THRESHOLD = 0.8;
export const DEFAULT_PER_SOURCE_CAP = 3;
export const DEFAULT_MAX_QUERIES = 10;

export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  recencyWindowHours: 24,
  maxRecencyBoost: 2.0,
  titleLengthThreshold: 60,
  titleLengthBonus: 0.3,
  descriptionLengthThreshold: 200,
  descriptionLengthBonus: 0.5,
};

// Keyword hits only: a plain "does it mention any keyword" filter.
export const KEYWORD_ONLY_SCORING_POLICY: ScoringPolicy = {
  ...DEFAULT_SCORING_POLICY,
  maxRecencyBoost: 0,
  titleLengthBonus: 0,
  descriptionLengthBonus: 0,
};

export const DEFAULT_QUERY_POLICY: QueryGenerationPolicy = {
  topTierCutoff: 2.5,
  maxTopKeywords: 6,
  curatedGroups: [],
};

export const QUERY_TERM_SEPARATOR = '+';
export const QUERY_OR_JOINER = '+OR+';

export const SEARCH_FEED_URL = 'https://news.google.com/rss/search';
export const SEARCH_FEED_LOCALE = 'hl=en&gl=US&ceid=US:en';

export const FEED_USER_AGENT =
  'Mozilla/5.0 (compatible; RankedNewsDigest/1.0; +https://example.com)';

export const SEND_LOG_FILE = 'email_log.txt';
export const FEED_HEALTH_LOG_FILE = 'feed_health.log';

export const MOBILE_TLDR_MAX_THEMES = 3;
export const MOBILE_TLDR_MAX_STORIES = 5;
export const MOBILE_TLDR_TITLE_CHARS = 60;
