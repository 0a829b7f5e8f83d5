import { describe, expect, it } from 'vitest';
import { buildContextPrompt, joinTokens, tokenize } from './transcript';

describe('transcript helpers', () => {
  it('splits on any whitespace and tags every token with its pass', () => {
    expect(tokenize('  hello\tthere \n friend ', 3)).toEqual([
      { text: 'hello', pass: 3 },
      { text: 'there', pass: 3 },
      { text: 'friend', pass: 3 }
    ]);
  });

  it('joins tokens with single spaces', () => {
    expect(joinTokens(tokenize('a  b   c', 1))).toBe('a b c');
    expect(joinTokens([])).toBe('');
  });

  it('builds the prompt from the last committed words only', () => {
    const committed = tokenize('one two three four five', 1);

    expect(buildContextPrompt(committed, 3)).toBe('three four five');
    expect(buildContextPrompt(committed, 50)).toBe('one two three four five');
  });

  it('omits the prompt when there is nothing committed or prompting is off', () => {
    expect(buildContextPrompt([], 50)).toBeUndefined();
    expect(buildContextPrompt(tokenize('hi', 1), 0)).toBeUndefined();
  });
});
