/**
 * LLM integration layer using AI SDK for provider-agnostic support.
 *
 * Every provider sits behind one `complete(prompt)` call: a single round
 * trip, no retries and no streaming. Failures surface as LLMError.
 *
 * Providers:
 *   - anthropic: Claude models through @ai-sdk/anthropic
 *   - openai: GPT models through @ai-sdk/openai
 *   - google: Gemini models through @ai-sdk/google
 *   - bedrock: AWS Bedrock models (e.g. Titan, Claude on Bedrock) through @ai-sdk/amazon-bedrock
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import type { LLMConfig } from '../config.js';
import { LLMError } from '../types/errors.js';
import { errorMessage } from '../types/utils.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

/**
 * Transport used by the query generator.
 */
export interface LanguageModelClient {
  complete(prompt: string): Promise<string>;
}

/**
 * Service for interacting with LLM APIs via AI SDK.
 */
export class AiSdkModelClient implements LanguageModelClient {
  private modelPromise: Promise<LanguageModel> | null = null;

  constructor(
    private readonly config: LLMConfig,
    private readonly log: Logger = defaultLogger
  ) {}

  /**
   * Lazy initialization of the provider model.
   * A failed load is forgotten so the next call tries again.
   */
  private getModel(): Promise<LanguageModel> {
    if (!this.modelPromise) {
      this.modelPromise = this.loadModel().catch((error: unknown) => {
        this.modelPromise = null;
        throw error;
      });
    }
    return this.modelPromise;
  }

  /**
   * Load the model based on provider configuration
   */
  private async loadModel(): Promise<LanguageModel> {
    const { provider, model, apiKey } = this.config;
    this.log.info(`Initializing LLM: ${provider}/${model}`);

    switch (provider) {
      case 'anthropic': {
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        return createAnthropic({ apiKey })(model);
      }

      case 'openai': {
        const { createOpenAI } = await import('@ai-sdk/openai');
        return createOpenAI({ apiKey })(model);
      }

      case 'google': {
        const { createGoogleGenerativeAI } = await import('@ai-sdk/google');
        return createGoogleGenerativeAI({ apiKey })(model);
      }

      case 'bedrock': {
        const { createAmazonBedrock } = await import('@ai-sdk/amazon-bedrock');
        return createAmazonBedrock({
          region: this.config.region,
          accessKeyId: this.config.accessKeyId,
          secretAccessKey: this.config.secretAccessKey,
        })(model);
      }
    }
  }

  /**
   * Send one prompt and return the raw response text.
   *
   * @throws LLMError on transport, authentication or provider failure
   */
  async complete(prompt: string): Promise<string> {
    try {
      const model = await this.getModel();
      const result = await generateText({
        model,
        prompt,
        temperature: 0,
        maxOutputTokens: this.config.maxTokens,
      });

      this.log.info(
        `LLM API call successful - ` +
          `Input: ${result.usage.inputTokens}, ` +
          `Output: ${result.usage.outputTokens}`
      );

      return result.text;
    } catch (error) {
      this.log.warn(`LLM API call failed: ${errorMessage(error)}`);
      throw new LLMError(`LLM API call failed: ${errorMessage(error)}`);
    }
  }
}
