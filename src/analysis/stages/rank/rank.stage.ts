/**
 * Rank Stage
 *
 * Third stage of the analysis pipeline:
 * Extract → Segment → Rank → Assemble
 *
 * Responsibilities:
 * - Embed the persona/task query once
 * - Embed each candidate section (title + body prefix), one call at a time
 * - Score by cosine similarity, drop sections under the threshold
 * - Order by similarity, ties by discovery order, keep the top N
 * - Attach rank and refined text
 *
 * A failure on the query embedding aborts the run. A failure on a single
 * section drops that section and records a warning.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Embeddings } from '@langchain/core/embeddings';
import { ANALYZER_CONFIG, AnalyzerConfig } from '../../config';
import {
  AnalysisWarning,
  AnalysisWarningType,
} from '../../common/types';
import { Section } from '../segment/types';
import { EMBEDDINGS } from './providers/embedding-provider.factory';
import {
  EmbeddingProviderError,
  SectionEmbeddingError,
} from './errors/rank-errors';
import { QueryTextBuilder, SimilarityScorer, TextRefiner } from './services';
import {
  RankInput,
  RankOutput,
  RankedResult,
  ScoredSection,
} from './types';

interface PoolEntry extends ScoredSection {
  /** index in the candidate pool, i.e. discovery order */
  index: number;
}

@Injectable()
export class RankStage {
  private readonly logger = new Logger(RankStage.name);

  constructor(
    @Inject(ANALYZER_CONFIG) private readonly config: AnalyzerConfig,
    @Inject(EMBEDDINGS) private readonly embeddings: Embeddings,
    private readonly queryTextBuilder: QueryTextBuilder,
    private readonly similarityScorer: SimilarityScorer,
    private readonly textRefiner: TextRefiner,
  ) {}

  /**
   * @throws EmbeddingProviderError if the query cannot be embedded
   */
  async execute(input: RankInput): Promise<RankOutput> {
    const startTime = Date.now();
    const candidateCount = input.sections.length;
    const queryText = this.queryTextBuilder.build(input.query);

    this.logger.log(
      `=== Rank Stage Start === ${candidateCount} candidates ` +
        `(model: ${this.config.similarityModel}, topN: ${this.config.topNSections}, ` +
        `threshold: ${this.config.minSimilarityThreshold})`,
    );

    if (candidateCount === 0 || queryText.length === 0) {
      this.logger.warn(
        candidateCount === 0
          ? 'No candidate sections, skipping ranking'
          : 'Query is empty, skipping ranking',
      );
      return { result: this.emptyResult(candidateCount), warnings: [] };
    }

    const queryVector = await this.embedQuery(queryText);

    const warnings: AnalysisWarning[] = [];
    const scored: PoolEntry[] = [];

    for (const [index, section] of input.sections.entries()) {
      try {
        const similarity = await this.scoreSection(section, queryVector);
        scored.push({ section, similarity, index });
      } catch (error) {
        const failure =
          error instanceof SectionEmbeddingError
            ? error
            : this.toSectionError(section, error);

        this.logger.warn(
          `Dropping "${section.title}" (${section.documentId}): ${failure.message}`,
        );
        warnings.push({
          type: AnalysisWarningType.SECTION_EMBEDDING_FAILED,
          documentId: section.documentId,
          message: `${section.title}: ${failure.message}`,
        });
      }
    }

    const retained = scored
      .filter((entry) => entry.similarity >= this.config.minSimilarityThreshold)
      .sort((a, b) => b.similarity - a.similarity || a.index - b.index)
      .slice(0, this.config.topNSections);

    const result: RankedResult = {
      sections: retained.map((entry, i) => ({
        section: entry.section,
        similarity: entry.similarity,
        rank: i + 1,
        refinedText: this.textRefiner.refine(
          entry.section.body,
          this.config.maxRefinedTextLength,
        ),
      })),
      candidateCount,
      embeddedCount: scored.length,
      droppedCount: candidateCount - retained.length,
    };

    this.logger.log(
      `=== Rank Stage Complete === Duration: ${Date.now() - startTime}ms, ` +
        `Embedded: ${result.embeddedCount}/${candidateCount}, ` +
        `Ranked: ${result.sections.length}, Failed: ${warnings.length}`,
    );

    return { result, warnings };
  }

  private async embedQuery(queryText: string): Promise<number[]> {
    let vector: number[];

    try {
      vector = await this.embeddings.embedQuery(queryText);
    } catch (error) {
      throw new EmbeddingProviderError(
        this.config.similarityModel,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined,
      );
    }

    if (vector.length === 0) {
      throw new EmbeddingProviderError(
        this.config.similarityModel,
        'query embedding is empty',
      );
    }

    return vector;
  }

  private async scoreSection(
    section: Section,
    queryVector: number[],
  ): Promise<number> {
    const text = `${section.title} ${section.body.slice(0, this.config.embeddingPrefixLength)}`;
    const [vector] = await this.embeddings.embedDocuments([text]);

    if (!vector) {
      throw new SectionEmbeddingError(
        section.documentId,
        section.title,
        'Provider returned no vector',
      );
    }

    return this.similarityScorer.score(queryVector, vector);
  }

  private toSectionError(
    section: Section,
    error: unknown,
  ): SectionEmbeddingError {
    return new SectionEmbeddingError(
      section.documentId,
      section.title,
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error : undefined,
    );
  }

  private emptyResult(candidateCount: number): RankedResult {
    return {
      sections: [],
      candidateCount,
      embeddedCount: 0,
      droppedCount: candidateCount,
    };
  }
}
