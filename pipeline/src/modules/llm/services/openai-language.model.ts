/**
 * OpenAI Language Model
 *
 * Single-shot chat completion against any OpenAI-compatible endpoint. The
 * prompt pins the model to the retrieved evidence. Callers are expected to
 * hold a rate-limiter token before calling `complete`.
 */

import { Logger } from '@nestjs/common';
import { describeError, LanguageModelError } from '../../../common/errors/pipeline.errors';
import { LanguageModel } from '../language-model.interface';
import { buildAnswerPrompt, SYSTEM_PROMPT } from '../prompt';

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

/** The slice of the OpenAI SDK client this model calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: ChatMessage[];
        temperature: number;
      }): Promise<{ choices: { message: { content: string | null } }[] }>;
    };
  };
}

export interface OpenAILanguageModelOptions {
  model: string;
  temperature: number;
}

export class OpenAILanguageModel implements LanguageModel {
  readonly name = 'openai';
  private readonly logger = new Logger(OpenAILanguageModel.name);

  constructor(
    private readonly client: ChatCompletionsClient,
    private readonly options: OpenAILanguageModelOptions,
  ) {}

  async complete(question: string, evidence: string[]): Promise<string> {
    this.logger.debug(`Requesting completion from ${this.options.model} with ${evidence.length} facts`);
    const startTime = Date.now();

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildAnswerPrompt(question, evidence) },
        ],
        temperature: this.options.temperature,
      });
      content = response.choices[0]?.message.content;
    } catch (error) {
      throw this.toLanguageModelError(error);
    }

    const answer = content?.trim() ?? '';
    if (!answer) {
      throw new LanguageModelError(`${this.options.model} returned an empty completion`, true);
    }

    this.logger.debug(`Completion received in ${Date.now() - startTime}ms`);
    return answer;
  }

  /**
   * A 4xx other than 429 means the request itself was rejected and will be
   * rejected again; everything else (429, 5xx, connection) may succeed later.
   */
  private toLanguageModelError(error: unknown): LanguageModelError {
    const status = upstreamStatus(error);
    const retryable = status === undefined || status === 429 || status >= 500;
    this.logger.warn(
      `Completion request failed${status ? ` with status ${status}` : ''}: ${describeError(error)}`,
    );
    return new LanguageModelError(
      `Language model request failed: ${describeError(error)}`,
      retryable,
      status,
      error,
    );
  }
}

function upstreamStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}
