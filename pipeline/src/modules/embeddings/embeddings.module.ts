import { Module } from '@nestjs/common';
import OpenAI from 'openai';
import { PIPELINE_CONFIG, PipelineConfig } from '../../config/app.config';
import { EmbeddingBackendKind } from '../../config/env.validation';
import { EMBEDDING_BACKEND, EmbeddingBackend } from './embedding-backend.interface';
import { EmbeddingService } from './services/embedding.service';
import { LocalHashEmbeddingBackend } from './services/local-hash-embedding.backend';
import { OpenAIEmbeddingBackend } from './services/openai-embedding.backend';

export function createEmbeddingBackend(config: PipelineConfig['embedding']): EmbeddingBackend {
  if (config.backend === EmbeddingBackendKind.Local) {
    return new LocalHashEmbeddingBackend(config.dimension);
  }

  if (!config.apiKey) {
    throw new Error('EMBEDDING_API_KEY or OPENAI_API_KEY must be set for the openai embedding backend');
  }
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    maxRetries: config.maxRetries,
  });
  return new OpenAIEmbeddingBackend(client, { model: config.model, dimension: config.dimension });
}

@Module({
  providers: [
    {
      provide: EMBEDDING_BACKEND,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) => createEmbeddingBackend(config.embedding),
    },
    EmbeddingService,
  ],
  exports: [EmbeddingService],
})
export class EmbeddingsModule {}
