import { describe, expect, it } from 'vitest';
import type { Hypothesis } from '../types';
import { DEFAULT_ARTIFACT_PHRASES } from '../config';
import { ArtifactFilter } from './ArtifactFilter';
import { joinTokens, tokenize } from './transcript';

const hypothesis = (text: string): Hypothesis => ({ pass: 7, tokens: tokenize(text, 7), final: false });

describe('ArtifactFilter', () => {
  const filter = new ArtifactFilter(DEFAULT_ARTIFACT_PHRASES);

  it('returns hypotheses without markers unchanged', () => {
    const input = hypothesis('open the pod bay doors');

    expect(filter.clean(input)).toBe(input);
  });

  it('removes bracketed tags anywhere in the text', () => {
    const cleaned = filter.clean(hypothesis('[MUSIC] hello [ Applause ] world'));

    expect(joinTokens(cleaned.tokens)).toBe('hello world');
    expect(cleaned.tokens.every((token) => token.pass === 7)).toBe(true);
  });

  it('removes known parenthesized sound cues but keeps other asides', () => {
    expect(joinTokens(filter.clean(hypothesis('(Laughter) fine')).tokens)).toBe('fine');
    expect(joinTokens(filter.clean(hypothesis('call me (maybe)')).tokens)).toBe('call me (maybe)');
  });

  it('empties a pass whose only content is a filler phrase', () => {
    expect(filter.clean(hypothesis('Thanks for watching!')).tokens).toEqual([]);
    expect(filter.clean(hypothesis(' Subscribe ')).tokens).toEqual([]);
    expect(filter.clean(hypothesis('[BLANK_AUDIO] Thank you.')).tokens).toEqual([]);
  });

  it('keeps one-word answers that are not on the list', () => {
    expect(joinTokens(filter.clean(hypothesis('Bye.')).tokens)).toBe('Bye.');
    expect(joinTokens(filter.clean(hypothesis('you')).tokens)).toBe('you');
  });

  it('keeps filler phrases inside longer speech', () => {
    expect(joinTokens(filter.clean(hypothesis('see you tomorrow')).tokens)).toBe('see you tomorrow');
  });

  it('accepts an empty phrase list', () => {
    const permissive = new ArtifactFilter([]);

    expect(joinTokens(permissive.clean(hypothesis('thank you')).tokens)).toBe('thank you');
  });
});
