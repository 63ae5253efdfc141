/**
 * Rank Stage Module
 */

import { Module } from '@nestjs/common';
import { RankStage } from './rank.stage';
import {
  EMBEDDINGS,
  EmbeddingProviderFactory,
} from './providers/embedding-provider.factory';
import { QueryTextBuilder, SimilarityScorer, TextRefiner } from './services';

@Module({
  providers: [
    RankStage,
    EmbeddingProviderFactory,
    {
      provide: EMBEDDINGS,
      useFactory: (factory: EmbeddingProviderFactory) =>
        factory.createEmbeddingModel(),
      inject: [EmbeddingProviderFactory],
    },
    QueryTextBuilder,
    SimilarityScorer,
    TextRefiner,
  ],
  exports: [RankStage],
})
export class RankStageModule {}
