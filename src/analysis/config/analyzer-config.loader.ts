/**
 * Analyzer Config Loader
 *
 * Reads analyzer settings from ConfigService, validates them with
 * class-validator and layers them: defaults ← profile ← environment.
 */

import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
  ValidationError,
} from 'class-validator';
import {
  ANALYSIS_PROFILES,
  AnalysisProfile,
  AnalyzerConfig,
  AnalyzerSettings,
  EMBEDDING_PROVIDERS,
  EmbeddingProviderName,
  createAnalyzerConfig,
} from './analyzer-config';
import { ConfigurationInvalidError } from './errors/configuration-errors';

/**
 * Environment variables understood by the analyzer
 */
export class AnalyzerEnvironment {
  @IsOptional()
  @IsIn(ANALYSIS_PROFILES)
  ANALYSIS_PROFILE?: AnalysisProfile;

  @IsOptional()
  @IsInt()
  @Min(0)
  MIN_SECTION_LENGTH?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  MAX_HEADING_LENGTH?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  MAX_HEADING_WORDS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  SECTION_SIZE_BUDGET?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  TOP_N_SECTIONS?: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(-1)
  @Max(1)
  MIN_SIMILARITY_THRESHOLD?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  MAX_REFINED_TEXT_LENGTH?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  EMBEDDING_PREFIX_LENGTH?: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  SIMILARITY_MODEL?: string;

  @IsOptional()
  @IsIn(EMBEDDING_PROVIDERS)
  EMBEDDING_PROVIDER?: EmbeddingProviderName;
}

const ENVIRONMENT_KEYS: (keyof AnalyzerEnvironment)[] = [
  'ANALYSIS_PROFILE',
  'MIN_SECTION_LENGTH',
  'MAX_HEADING_LENGTH',
  'MAX_HEADING_WORDS',
  'SECTION_SIZE_BUDGET',
  'TOP_N_SECTIONS',
  'MIN_SIMILARITY_THRESHOLD',
  'MAX_REFINED_TEXT_LENGTH',
  'EMBEDDING_PREFIX_LENGTH',
  'SIMILARITY_MODEL',
  'EMBEDDING_PROVIDER',
];

/**
 * Load and validate analyzer config
 *
 * @throws ConfigurationInvalidError listing every violation
 */
export function loadAnalyzerConfig(
  configService: ConfigService,
): AnalyzerConfig {
  const raw: Record<string, unknown> = {};

  for (const key of ENVIRONMENT_KEYS) {
    const value = configService.get<unknown>(key);
    const cleaned = typeof value === 'string' ? value.trim() : value;

    // Blank .env entries count as unset
    if (cleaned !== undefined && cleaned !== null && cleaned !== '') {
      raw[key] = cleaned;
    }
  }

  const env = plainToInstance(AnalyzerEnvironment, raw, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(env, { skipMissingProperties: false });
  if (errors.length > 0) {
    throw new ConfigurationInvalidError(errors.map(formatValidationError));
  }

  const overrides: Partial<AnalyzerSettings> = {};
  assignDefined(overrides, 'minSectionLength', env.MIN_SECTION_LENGTH);
  assignDefined(overrides, 'maxHeadingLength', env.MAX_HEADING_LENGTH);
  assignDefined(overrides, 'maxHeadingWords', env.MAX_HEADING_WORDS);
  assignDefined(overrides, 'sectionSizeBudget', env.SECTION_SIZE_BUDGET);
  assignDefined(overrides, 'topNSections', env.TOP_N_SECTIONS);
  assignDefined(
    overrides,
    'minSimilarityThreshold',
    env.MIN_SIMILARITY_THRESHOLD,
  );
  assignDefined(
    overrides,
    'maxRefinedTextLength',
    env.MAX_REFINED_TEXT_LENGTH,
  );
  assignDefined(
    overrides,
    'embeddingPrefixLength',
    env.EMBEDDING_PREFIX_LENGTH,
  );
  assignDefined(overrides, 'similarityModel', env.SIMILARITY_MODEL);
  assignDefined(overrides, 'embeddingProvider', env.EMBEDDING_PROVIDER);

  return createAnalyzerConfig(overrides, env.ANALYSIS_PROFILE ?? 'default');
}

function assignDefined<K extends keyof AnalyzerSettings>(
  target: Partial<AnalyzerSettings>,
  key: K,
  value: AnalyzerSettings[K] | undefined,
): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

function formatValidationError(error: ValidationError): string {
  const constraints = Object.values(error.constraints ?? {});
  return `${error.property} (${String(error.value)}): ${constraints.join(', ')}`;
}
