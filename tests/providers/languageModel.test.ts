import type { LanguageModel } from 'ai';
import { AiSdkLanguageModel } from '../../src/providers/languageModel';
import { ProviderError } from '../../src/types/errors';

type DoGenerate = LanguageModel['doGenerate'];

function createTestModel() {
  const doGenerate = jest.fn<ReturnType<DoGenerate>, Parameters<DoGenerate>>().mockResolvedValue({
    text: 'Generated text',
    finishReason: 'stop',
    usage: { promptTokens: 10, completionTokens: 5 },
    rawCall: { rawPrompt: null, rawSettings: {} },
  });

  const model: LanguageModel = {
    specificationVersion: 'v1',
    provider: 'test-provider',
    modelId: 'test-model',
    defaultObjectGenerationMode: undefined,
    doGenerate,
    doStream: jest.fn(),
  };

  return { model, doGenerate };
}

describe('AiSdkLanguageModel', () => {
  it('should return the generated text', async () => {
    const { model, doGenerate } = createTestModel();

    const text = await new AiSdkLanguageModel(model).complete('Summarize', {
      step: 'analysis',
      system: 'Be brief.',
      temperature: 0.5,
    });

    expect(text).toBe('Generated text');
    expect(doGenerate).toHaveBeenCalledTimes(1);
    expect(doGenerate.mock.calls[0][0]).toMatchObject({ temperature: 0.5, maxTokens: 4096 });
  });

  it('should fall back to the client defaults', async () => {
    const { model, doGenerate } = createTestModel();

    await new AiSdkLanguageModel(model, { temperature: 0.2, maxTokens: 1000 }).complete('Write', {
      step: 'report_writing',
    });

    expect(doGenerate.mock.calls[0][0]).toMatchObject({ temperature: 0.2, maxTokens: 1000 });
  });

  it('should forward the abort signal', async () => {
    const { model, doGenerate } = createTestModel();
    const controller = new AbortController();

    await new AiSdkLanguageModel(model).complete('Summarize', {
      step: 'analysis',
      abortSignal: controller.signal,
    });

    expect(doGenerate.mock.calls[0][0].abortSignal).toBe(controller.signal);
  });

  it('should wrap failures in a ProviderError naming the provider', async () => {
    const { model, doGenerate } = createTestModel();
    doGenerate.mockRejectedValue(new Error('rate limited'));

    const completion = new AiSdkLanguageModel(model).complete('Summarize', { step: 'analysis' });

    await expect(completion).rejects.toBeInstanceOf(ProviderError);
    await expect(completion).rejects.toMatchObject({
      message: 'Language model request failed: rate limited',
      provider: 'test-provider',
      step: 'analysis',
    });
  });
});
