import { TranslationService } from '../../../src/app/translation/translation-service.js';
import { buildTranslationPrompt } from '../../../src/infra/conversation/prompts/translation.js';
import { StubLLMGateway } from '../../../src/infra/llm/stub-gateway.js';

describe('TranslationService', () => {
  let gateway: StubLLMGateway;

  beforeEach(() => {
    gateway = new StubLLMGateway();
  });

  it('defaults to an English pivot and a Japanese display language', () => {
    expect(new TranslationService(gateway).languages).toEqual({ pivot: 'en', display: 'ja' });
    expect(new TranslationService(gateway, { display: 'en', pivot: 'ja' }).languages).toEqual({
      pivot: 'ja',
      display: 'en',
    });
  });

  it('translates display text to the pivot language and trims the answer', async () => {
    const service = new TranslationService(gateway);
    gateway.addTranslation('  I am an engineer\n');

    await expect(service.toPivot('私はエンジニアです')).resolves.toBe('I am an engineer');
    expect(gateway.calls).toEqual([
      {
        type: 'generate',
        taskKind: 'translation_to_pivot',
        prompt: buildTranslationPrompt('私はエンジニアです', 'Japanese', 'English'),
        attributeName: undefined,
      },
    ]);
  });

  it('translates pivot text to the display language with context', async () => {
    const service = new TranslationService(gateway);
    const context = [
      { role: 'user' as const, content: 'Do you like tea?' },
      { role: 'assistant' as const, content: 'Yes.' },
    ];

    await expect(service.toDisplay('Hello', context)).resolves.toBe('Hello');

    const call = gateway.calls[0];
    expect(call).toEqual({
      type: 'generate',
      taskKind: 'translation_to_display',
      prompt: buildTranslationPrompt('Hello', 'English', 'Japanese', context),
      attributeName: undefined,
    });
  });

  it('propagates gateway failures', async () => {
    const failing = {
      getName: () => 'failing',
      generate: jest.fn().mockRejectedValue(new Error('offline')),
    };
    const service = new TranslationService(failing);

    await expect(service.toPivot('こんにちは')).rejects.toThrow('offline');
  });
});
