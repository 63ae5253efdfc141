/**
 * Analyzer Configuration
 *
 * Immutable settings consumed by the segment and rank stages. Built once at
 * start-up by loadAnalyzerConfig() and injected under ANALYZER_CONFIG.
 */

export const ANALYZER_CONFIG = Symbol('ANALYZER_CONFIG');

export const EMBEDDING_PROVIDERS = ['ollama', 'openai', 'google'] as const;
export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];

export const ANALYSIS_PROFILES = [
  'default',
  'technical',
  'research',
  'legal',
  'marketing',
] as const;
export type AnalysisProfile = (typeof ANALYSIS_PROFILES)[number];

export interface AnalyzerConfig {
  readonly profile: AnalysisProfile;

  // Segmentation
  readonly minSectionLength: number;
  readonly maxHeadingLength: number;
  readonly maxHeadingWords: number;
  readonly sectionSizeBudget: number;

  // Ranking
  readonly topNSections: number;
  readonly minSimilarityThreshold: number;
  readonly maxRefinedTextLength: number;
  readonly embeddingPrefixLength: number;

  // Embeddings
  readonly similarityModel: string;
  readonly embeddingProvider: EmbeddingProviderName;
}

export type AnalyzerSettings = Omit<AnalyzerConfig, 'profile'>;

export const DEFAULT_ANALYZER_SETTINGS: AnalyzerSettings = {
  minSectionLength: 50,
  maxHeadingLength: 200,
  maxHeadingWords: 10,
  sectionSizeBudget: 2000,
  topNSections: 5,
  minSimilarityThreshold: 0.1,
  maxRefinedTextLength: 1000,
  embeddingPrefixLength: 1000,
  // Ollama build of all-MiniLM-L6-v2
  similarityModel: 'all-minilm',
  embeddingProvider: 'ollama',
};

/**
 * Preset tunings per document family, applied on top of the defaults and
 * below explicit environment overrides.
 */
export const PROFILE_SETTINGS: Record<
  AnalysisProfile,
  Partial<AnalyzerSettings>
> = {
  default: {},
  technical: {
    minSectionLength: 100,
    maxHeadingLength: 300,
    topNSections: 10,
    minSimilarityThreshold: 0.05,
  },
  research: {
    minSectionLength: 200,
    maxRefinedTextLength: 2000,
    topNSections: 8,
    maxHeadingWords: 15,
  },
  legal: {
    minSectionLength: 150,
    topNSections: 7,
    minSimilarityThreshold: 0.08,
    maxRefinedTextLength: 1500,
  },
  marketing: {
    minSectionLength: 30,
    maxHeadingLength: 150,
    topNSections: 6,
    minSimilarityThreshold: 0.15,
  },
};

/**
 * Build a frozen config from partial settings. Used by tests and by the
 * loader after validation.
 */
export function createAnalyzerConfig(
  overrides: Partial<AnalyzerSettings> = {},
  profile: AnalysisProfile = 'default',
): AnalyzerConfig {
  return Object.freeze({
    profile,
    ...DEFAULT_ANALYZER_SETTINGS,
    ...PROFILE_SETTINGS[profile],
    ...overrides,
  });
}
