import {
  elideString,
  getMaxLoggedStringLength,
  summarizeArguments,
} from '../../src/utils/ArgumentSummary.js';

describe('ArgumentSummary', () => {
  afterEach(() => {
    delete process.env.MCP_LOG_MAX_ARG_LENGTH;
  });

  describe('getMaxLoggedStringLength', () => {
    it('should default to 120 characters', () => {
      expect(getMaxLoggedStringLength()).toBe(120);
    });

    it('should read the limit from the environment', () => {
      process.env.MCP_LOG_MAX_ARG_LENGTH = '40';

      expect(getMaxLoggedStringLength()).toBe(40);
    });

    it('should ignore invalid limits', () => {
      process.env.MCP_LOG_MAX_ARG_LENGTH = '-3';

      expect(getMaxLoggedStringLength()).toBe(120);
    });
  });

  describe('elideString', () => {
    it('should keep short strings', () => {
      expect(elideString('print(1)', 10)).toBe('print(1)');
    });

    it('should cut long strings and note their length', () => {
      expect(elideString('abcdefghij', 4)).toBe('abcd... (10 chars)');
    });
  });

  describe('summarizeArguments', () => {
    it('should elide long strings at any depth', () => {
      expect(
        summarizeArguments(
          { userId: 'alice', code: 'x'.repeat(12), packages: ['requests', 'y'.repeat(9)] },
          8,
        ),
      ).toEqual({
        userId: 'alice',
        code: 'xxxxxxxx... (12 chars)',
        packages: ['requests', 'yyyyyyyy... (9 chars)'],
      });
    });

    it('should leave other values untouched', () => {
      expect(summarizeArguments({ page: 2, recursive: true, path: null }, 8)).toEqual({
        page: 2,
        recursive: true,
        path: null,
      });
    });

    it('should replace deep nesting with a marker', () => {
      const nested = { a: { b: { c: { d: { e: { f: { g: 1 } } } } } } };

      expect(summarizeArguments(nested, 8)).toEqual({
        a: { b: { c: { d: { e: { f: '[nested]' } } } } },
      });
    });
  });
});
