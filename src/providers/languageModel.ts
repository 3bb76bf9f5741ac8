/**
 * Language model client backed by the AI SDK
 */
import { generateText, LanguageModel } from 'ai';
import { CompletionContext, LanguageModelClient } from '../types/providers.js';
import { ProviderError, describeError } from '../types/errors.js';

export interface AiSdkLanguageModelOptions {
  /** Used when the completion context sets no temperature */
  temperature?: number;
  /** Used when the completion context sets no token limit */
  maxTokens?: number;
}

/**
 * Completes prompts with `generateText` against any AI SDK language model
 *
 * @example
 * ```typescript
 * import { openai } from '@ai-sdk/openai';
 *
 * const llm = new AiSdkLanguageModel(openai('gpt-4o-mini'));
 * ```
 */
export class AiSdkLanguageModel implements LanguageModelClient {
  constructor(
    private readonly model: LanguageModel,
    private readonly options: AiSdkLanguageModelOptions = {}
  ) {}

  async complete(prompt: string, context: CompletionContext): Promise<string> {
    try {
      const { text } = await generateText({
        model: this.model,
        system: context.system,
        prompt,
        temperature: context.temperature ?? this.options.temperature,
        maxTokens: context.maxTokens ?? this.options.maxTokens ?? 4096,
        abortSignal: context.abortSignal,
      });
      return text;
    } catch (error: unknown) {
      throw new ProviderError({
        message: `Language model request failed: ${describeError(error)}`,
        provider: this.model.provider,
        step: context.step,
        details: { originalError: error, modelId: this.model.modelId },
        suggestions: [
          'Check the API key and remaining quota of the model provider',
          'Try a shorter prompt or a model with a larger context window',
        ],
      });
    }
  }
}
