import { InvalidArgumentError } from 'commander';

import { formatDebugEvent, formatError, parsePositiveInt, withAssistant } from '../../src/cli/shared.js';
import { ConfigError, ValidationError } from '../../src/domain/errors.js';

describe('cli shared helpers', () => {
  describe('parsePositiveInt', () => {
    it('accepts positive integers', () => {
      expect(parsePositiveInt('42')).toBe(42);
      expect(parsePositiveInt(' 7 ')).toBe(7);
    });

    it.each(['0', '-3', '1.5', 'abc', '12abc'])('rejects %p', value => {
      expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
    });
  });

  describe('formatError', () => {
    it('prefixes recollect errors with their name and code', () => {
      const error = new ValidationError([{ field: 'name', message: 'Name cannot be empty' }]);

      expect(formatError(error)).toBe('ValidationError [validation_failed]: Validation failed: name: Name cannot be empty');
    });

    it('falls back to the message of other errors', () => {
      expect(formatError(new Error('boom'))).toBe('boom');
      expect(formatError('plain')).toBe('plain');
    });
  });

  it('formats debug events on one line', () => {
    const line = formatDebugEvent({
      id: 'e1',
      timestamp: Date.UTC(2024, 0, 2, 3, 4, 5, 678),
      type: 'turn.step',
      source: 'turn-pipeline',
      data: { kind: 'response' },
    });

    expect(line).toBe('03:04:05.678 turn.step (turn-pipeline) {"kind":"response"}');
  });

  describe('withAssistant', () => {
    const originalDbPath = process.env.RECOLLECT_DB_PATH;
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
      process.env.RECOLLECT_DB_PATH = ':memory:';
      errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      errorSpy.mockRestore();
      process.exitCode = undefined;
      if (originalDbPath === undefined) {
        delete process.env.RECOLLECT_DB_PATH;
      } else {
        process.env.RECOLLECT_DB_PATH = originalDbPath;
      }
    });

    it('hands an open assistant to the callback', async () => {
      const names: string[] = [];

      await withAssistant(assistant => {
        names.push(assistant.gateway.getName());
      });

      expect(names).toEqual(['stub']);
      expect(process.exitCode).toBeUndefined();
    });

    it('reports failures and sets a non-zero exit code', async () => {
      await withAssistant(() => {
        throw new ConfigError('Invalid runtime configuration: /llm/provider: bad');
      });

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(process.exitCode).toBe(1);
    });
  });
});
