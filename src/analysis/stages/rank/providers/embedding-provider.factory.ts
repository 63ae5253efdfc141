/**
 * Embedding Provider Factory
 * Multi-provider support: Ollama, OpenAI, Google
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import {
  ANALYZER_CONFIG,
  AnalyzerConfig,
  EmbeddingProviderName,
} from '../../../config';
import { EmbeddingProviderError } from '../errors/rank-errors';

export const EMBEDDINGS = Symbol('EMBEDDINGS');

export interface EmbeddingProviderSettings {
  provider: EmbeddingProviderName;
  model: string;
  baseUrl?: string;
}

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(
    @Inject(ANALYZER_CONFIG) private readonly config: AnalyzerConfig,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Create embedding model based on configuration
   *
   * @throws EmbeddingProviderError when the provider's API key is missing
   */
  createEmbeddingModel(): Embeddings {
    const settings = this.getProviderSettings();

    this.logger.log(
      `Creating embedding model: ${settings.provider}/${settings.model}`,
    );

    switch (settings.provider) {
      case 'ollama':
        return this.createOllamaEmbeddings(settings);
      case 'openai':
        return this.createOpenAIEmbeddings(settings);
      case 'google':
        return this.createGoogleEmbeddings(settings);
    }
  }

  getProviderSettings(): EmbeddingProviderSettings {
    const provider = this.config.embeddingProvider;

    return {
      provider,
      model: this.config.similarityModel,
      baseUrl: provider === 'ollama' ? this.getOllamaBaseUrl() : undefined,
    };
  }

  private getOllamaBaseUrl(): string {
    return this.configService.get<string>(
      'OLLAMA_BASE_URL',
      'http://localhost:11434',
    );
  }

  private createOllamaEmbeddings({
    model,
    baseUrl,
  }: EmbeddingProviderSettings): OllamaEmbeddings {
    return new OllamaEmbeddings({ model, baseUrl });
  }

  private createOpenAIEmbeddings({
    model,
  }: EmbeddingProviderSettings): OpenAIEmbeddings {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');

    if (!apiKey) {
      throw new EmbeddingProviderError(
        model,
        'OPENAI_API_KEY is required for OpenAI embeddings',
      );
    }

    return new OpenAIEmbeddings({
      model,
      openAIApiKey: apiKey,
    });
  }

  private createGoogleEmbeddings({
    model,
  }: EmbeddingProviderSettings): GoogleGenerativeAIEmbeddings {
    const apiKey = this.configService.get<string>('GOOGLE_API_KEY');

    if (!apiKey) {
      throw new EmbeddingProviderError(
        model,
        'GOOGLE_API_KEY is required for Google embeddings',
      );
    }

    return new GoogleGenerativeAIEmbeddings({
      model,
      apiKey,
    });
  }
}
