import {
  defaultExtract,
  defaultGenerateReply,
  defaultJudge,
  extractWith,
  generateReplyWith,
  isAffirmative,
  judgeWith,
  parseExtraction,
} from '../../../src/infra/llm/gateway-behaviors.js';
import type { GenerateResult, ILLMGateway, LLMTaskKind } from '../../../src/infra/llm/llm-gateway.js';
import { buildAnswerVocabulary } from '../../../src/domain/conversation/language.js';

interface RecordedCall {
  prompt: string;
  taskKind: LLMTaskKind;
  attributeName?: string;
}

class ScriptedGateway implements ILLMGateway {
  calls: RecordedCall[] = [];

  constructor(private answers: string[]) {}

  async generate(prompt: string, taskKind: LLMTaskKind, attributeName?: string): Promise<GenerateResult> {
    this.calls.push({ prompt, taskKind, attributeName });
    return { text: this.answers.shift() ?? '' };
  }

  getName(): string {
    return 'scripted';
  }
}

describe('isAffirmative', () => {
  it('matches affirmative tokens case-insensitively anywhere in the answer', () => {
    expect(isAffirmative('Yes.')).toBe(true);
    expect(isAffirmative('  YES, it is needed')).toBe(true);
    expect(isAffirmative('はい、必要です')).toBe(true);
  });

  it('treats anything else as negative', () => {
    expect(isAffirmative('no')).toBe(false);
    expect(isAffirmative('いいえ')).toBe(false);
    expect(isAffirmative('maybe')).toBe(false);
    expect(isAffirmative('')).toBe(false);
  });

  it('only accepts tokens of the configured languages', () => {
    expect(isAffirmative('はい', buildAnswerVocabulary('en', 'en'))).toBe(false);
  });
});

describe('parseExtraction', () => {
  it('returns null for the sentinels and empty answers', () => {
    expect(parseExtraction('none')).toBeNull();
    expect(parseExtraction('  NONE \n')).toBeNull();
    expect(parseExtraction('なし')).toBeNull();
    expect(parseExtraction('   ')).toBeNull();
  });

  it('returns null when a sentinel appears within the first ten characters', () => {
    expect(parseExtraction('None found.')).toBeNull();
    expect(parseExtraction('Nonet player')).toBeNull();
  });

  it('keeps a sentinel that appears after the first ten characters', () => {
    expect(parseExtraction('The user has none')).toBe('The user has none');
  });

  it('returns the trimmed answer otherwise', () => {
    expect(parseExtraction('  engineer\n')).toBe('engineer');
  });
});

describe('default behaviors', () => {
  it('judge sends the judgment template with the attribute name', async () => {
    const gateway = new ScriptedGateway(['yes']);

    await expect(defaultJudge(gateway, 'is profile needed?', 'I am an engineer', 'Profile')).resolves.toBe(true);
    expect(gateway.calls).toHaveLength(1);
    expect(gateway.calls[0].taskKind).toBe('judgment');
    expect(gateway.calls[0].attributeName).toBe('Profile');
    expect(gateway.calls[0].prompt).toContain('is profile needed?');
  });

  it('extract asks for the first sentinel and parses the answer', async () => {
    const gateway = new ScriptedGateway(['none', ' engineer ']);

    await expect(defaultExtract(gateway, 'extract profile', 'hello', 'Profile')).resolves.toBeNull();
    await expect(defaultExtract(gateway, 'extract profile', 'I am an engineer', 'Profile')).resolves.toBe('engineer');
    expect(gateway.calls[0].taskKind).toBe('extraction');
    expect(gateway.calls[0].prompt).toContain("please respond with 'none'.");
  });

  it('extract names the pivot sentinel of a custom vocabulary', async () => {
    const gateway = new ScriptedGateway(['なし']);

    await expect(
      defaultExtract(gateway, 'extract profile', 'こんにちは', 'Profile', buildAnswerVocabulary('ja', 'en'))
    ).resolves.toBeNull();
    expect(gateway.calls[0].prompt).toContain("please respond with 'なし'.");
  });

  it('generateReply trims the reply and tags the call as a response', async () => {
    const gateway = new ScriptedGateway(['  Hi there!\n']);

    await expect(defaultGenerateReply(gateway, [], 'Hello', {})).resolves.toBe('Hi there!');
    expect(gateway.calls[0].taskKind).toBe('response');
    expect(gateway.calls[0].attributeName).toBeUndefined();
  });
});

describe('dispatchers', () => {
  it('prefer gateway overrides', async () => {
    const gateway = new ScriptedGateway([]);
    const withOverrides: ILLMGateway = {
      generate: (prompt, taskKind, attributeName) => gateway.generate(prompt, taskKind, attributeName),
      getName: () => 'override',
      judge: async () => true,
      extract: async () => 'from override',
      generateReply: async () => 'custom reply',
    };

    await expect(judgeWith(withOverrides, 'q', 'input')).resolves.toBe(true);
    await expect(extractWith(withOverrides, 'i', 'input')).resolves.toBe('from override');
    await expect(generateReplyWith(withOverrides, [], 'input', {})).resolves.toBe('custom reply');
    expect(gateway.calls).toHaveLength(0);
  });

  it('fall back to the templates over generate', async () => {
    const gateway = new ScriptedGateway(['no', 'engineer', 'reply']);

    await expect(judgeWith(gateway, 'q', 'input', 'Profile')).resolves.toBe(false);
    await expect(extractWith(gateway, 'i', 'input', 'Profile')).resolves.toBe('engineer');
    await expect(generateReplyWith(gateway, [], 'input', {})).resolves.toBe('reply');
    expect(gateway.calls.map(call => call.taskKind)).toEqual(['judgment', 'extraction', 'response']);
  });
});
