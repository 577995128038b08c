import { Module } from '@nestjs/common';
import OpenAI from 'openai';
import { PIPELINE_CONFIG, PipelineConfig } from '../../config/app.config';
import { LANGUAGE_MODEL, LanguageModel } from './language-model.interface';
import { OpenAILanguageModel } from './services/openai-language.model';

export function createLanguageModel(config: PipelineConfig['llm']): LanguageModel {
  if (!config.apiKey) {
    throw new Error('LLM_API_KEY or OPENAI_API_KEY must be set for the language model');
  }
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    maxRetries: config.maxRetries,
  });
  return new OpenAILanguageModel(client, { model: config.model, temperature: config.temperature });
}

@Module({
  providers: [
    {
      provide: LANGUAGE_MODEL,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) => createLanguageModel(config.llm),
    },
  ],
  exports: [LANGUAGE_MODEL],
})
export class LlmModule {}
