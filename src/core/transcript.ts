import type { Token } from '../types';

export const TOKEN_SEPARATOR = ' ';

export const tokenize = (text: string, pass: number): Token[] =>
  text
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => ({ text: word, pass }));

export const joinTokens = (tokens: readonly Token[]): string =>
  tokens.map((token) => token.text).join(TOKEN_SEPARATOR);

/** Last `maxWords` words of the committed text, used as decoder context. */
export const buildContextPrompt = (committed: readonly Token[], maxWords: number): string | undefined => {
  if (maxWords <= 0 || committed.length === 0) {
    return undefined;
  }

  return joinTokens(committed.slice(-maxWords));
};
