import { describe, expect, it } from 'vitest';
import { applyRenameRule, isRenameRule, splitWords } from '../src/utils.js';

describe('rename rules', () => {
  it('splits identifiers into words', () => {
    expect(splitWords('maxRetryCount')).toEqual(['max', 'retry', 'count']);
    expect(splitWords('HTTP_PORT')).toEqual(['http', 'port']);
    expect(splitWords('HTTPServer')).toEqual(['http', 'server']);
  });

  it('applies each rule', () => {
    expect(applyRenameRule('maxRetryCount', 'snake_case')).toBe('max_retry_count');
    expect(applyRenameRule('maxRetryCount', 'kebab-case')).toBe('max-retry-count');
    expect(applyRenameRule('maxRetryCount', 'SCREAMING_SNAKE_CASE')).toBe('MAX_RETRY_COUNT');
    expect(applyRenameRule('maxRetryCount', 'SCREAMING-KEBAB-CASE')).toBe('MAX-RETRY-COUNT');
    expect(applyRenameRule('http_port', 'PascalCase')).toBe('HttpPort');
    expect(applyRenameRule('HTTPServer', 'camelCase')).toBe('httpServer');
    expect(applyRenameRule('max_retry', 'lowercase')).toBe('maxretry');
    expect(applyRenameRule('max_retry', 'UPPERCASE')).toBe('MAXRETRY');
  });

  it('recognizes rule names', () => {
    expect(isRenameRule('camelCase')).toBe(true);
    expect(isRenameRule('Camel')).toBe(false);
  });
});
