import type { Hypothesis } from '../types';
import { joinTokens, tokenize } from './transcript';

// Bracketed tags are never speech; parenthesized ones only for known sound cues.
const BRACKET_TAG = /\[[^\]]*\]/g;
const SOUND_CUE = /\((?:music|silence|blank_audio|applause|laughter|inaudible|noise)\)/gi;

const normalizePhrase = (value: string): string =>
  value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s']/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();

/**
 * Strips non-speech markers from a hypothesis and drops passes whose only remaining content is a
 * known filler phrase the engine tends to produce on silence.
 */
export class ArtifactFilter {
  private readonly fillerPhrases: Set<string>;

  public constructor(phrases: readonly string[]) {
    this.fillerPhrases = new Set(phrases.map(normalizePhrase).filter(Boolean));
  }

  public clean(hypothesis: Hypothesis): Hypothesis {
    const raw = joinTokens(hypothesis.tokens);
    const stripped = raw.replace(BRACKET_TAG, ' ').replace(SOUND_CUE, ' ');

    if (this.fillerPhrases.has(normalizePhrase(stripped))) {
      return { ...hypothesis, tokens: [] };
    }

    if (stripped === raw) {
      return hypothesis;
    }

    return { ...hypothesis, tokens: tokenize(stripped, hypothesis.pass) };
  }
}
