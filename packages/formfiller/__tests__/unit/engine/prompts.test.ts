import { describe, expect, test } from 'vitest';
import { cleanAnswer, truncateResume } from '../../../src/engine/prompts.js';

describe('cleanAnswer', () => {
  test('strips wrapping quotes of any kind', () => {
    expect(cleanAnswer('"Yes"')).toBe('Yes');
    expect(cleanAnswer("'No'")).toBe('No');
    expect(cleanAnswer('`42`')).toBe('42');
    expect(cleanAnswer('" \'nested\' "')).toBe('nested');
  });

  test('unwraps code fences with or without a language', () => {
    expect(cleanAnswer('```text\nhello world\n```')).toBe('hello world');
    expect(cleanAnswer('```\nhello\n```')).toBe('hello');
  });

  test('leaves inner quotes alone', () => {
    expect(cleanAnswer('He said "hi"')).toBe('He said "hi"');
  });
});

describe('truncateResume', () => {
  test('keeps short resumes and cuts long ones', () => {
    expect(truncateResume('  short  ', 100)).toBe('short');
    expect(truncateResume('abcdef', 4)).toBe('abcd');
  });

  test('substitutes a marker for an empty resume', () => {
    expect(truncateResume('   ', 100)).toBe('(no resume provided)');
  });
});
