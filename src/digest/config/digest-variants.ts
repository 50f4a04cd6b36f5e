import {
  DigestVariantDefinition,
  KeywordWeights,
} from '../types/digest.types';
import {
  DEFAULT_PER_SOURCE_CAP,
  DEFAULT_QUERY_POLICY,
  DEFAULT_RELEVANCE_THRESHOLD,
  DEFAULT_SCORING_POLICY,
  KEYWORD_ONLY_SCORING_POLICY,
} from './digest.constants';
import aiDaily from './variants/ai-daily.json';
import aiMedia from './variants/ai-media.json';
import mediaInnovation from './variants/media-innovation.json';

interface VariantData {
  feeds: string[];
  keywordWeights: Record<string, number>;
}

function weights(data: VariantData): KeywordWeights {
  return Object.freeze({ ...data.keywordWeights });
}

// Relevance thresholds and per-source caps differ per variant on purpose.
export const DIGEST_VARIANTS: readonly DigestVariantDefinition[] = [
  {
    id: 'ai-daily',
    title: 'Daily AI Digest',
    feeds: aiDaily.feeds,
    keywordWeights: weights(aiDaily),
    budget: 10,
    relevanceThreshold: 0.5,
    perSourceCap: null,
    fetchMultiplier: 3,
    scoringPolicy: KEYWORD_ONLY_SCORING_POLICY,
    searchFeeds: {
      enabled: false,
      sourceName: 'Google News',
      maxQueries: 0,
      perQueryLimit: 5,
      policy: DEFAULT_QUERY_POLICY,
    },
    promptStyle: 'plain',
    fallbackSubject: 'Daily AI Digest',
    mobileTldr: false,
  },
  {
    id: 'ai-media',
    title: 'AI + Media Innovation Digest',
    feeds: aiMedia.feeds,
    keywordWeights: weights(aiMedia),
    budget: 20,
    relevanceThreshold: DEFAULT_RELEVANCE_THRESHOLD,
    perSourceCap: DEFAULT_PER_SOURCE_CAP,
    fetchMultiplier: 5,
    scoringPolicy: DEFAULT_SCORING_POLICY,
    searchFeeds: {
      enabled: true,
      sourceName: 'Google News (Real-time)',
      maxQueries: 10,
      perQueryLimit: 5,
      policy: {
        ...DEFAULT_QUERY_POLICY,
        curatedGroups: [
          ['OpenAI', 'Anthropic', 'Google AI', 'DeepMind'],
          ['Netflix', 'Disney+', 'Spotify', 'YouTube'],
          ['AI video generation'],
          ['AI content personalization'],
          ['broadcast television streaming'],
          ['linear TV ratings'],
        ],
      },
    },
    promptStyle: 'ai-media',
    fallbackSubject: 'Daily AI Digest - Innovation Insights',
    mobileTldr: true,
  },
  {
    id: 'media-innovation',
    title: 'Media Innovation Digest',
    feeds: mediaInnovation.feeds,
    keywordWeights: weights(mediaInnovation),
    budget: 20,
    relevanceThreshold: 1.0,
    perSourceCap: DEFAULT_PER_SOURCE_CAP,
    fetchMultiplier: 5,
    scoringPolicy: DEFAULT_SCORING_POLICY,
    searchFeeds: {
      enabled: true,
      sourceName: 'Google News',
      maxQueries: 10,
      perQueryLimit: 5,
      // Curated only: this variant never searched for single keywords.
      policy: {
        ...DEFAULT_QUERY_POLICY,
        maxTopKeywords: 0,
        curatedGroups: [
          ['streaming service innovation'],
          ['netflix disney strategy'],
          ['content personalization'],
          ['OTT platform launch'],
          ['video streaming technology'],
          ['creator economy'],
        ],
      },
    },
    promptStyle: 'media-innovation',
    fallbackSubject: 'Media Innovation Digest',
    mobileTldr: true,
  },
];

export function findVariant(
  id: string,
): DigestVariantDefinition | undefined {
  return DIGEST_VARIANTS.find((variant) => variant.id === id);
}
