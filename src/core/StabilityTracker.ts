import type { Hypothesis, StabilityUpdate, Token, TranscriptState } from '../types';
import { ArtifactFilter } from './ArtifactFilter';
import { joinTokens } from './transcript';

export interface StabilityTrackerOptions {
  /** Consecutive agreeing passes a tentative token needs before it is committed. */
  stabilityPasses: number;
  artifactPhrases: readonly string[];
}

interface TentativeToken {
  token: Token;
  /** Consecutive passes, including the current one, that produced this token at this position. */
  matchCount: number;
}

/**
 * Splits successive full re-transcriptions into committed text, which only ever grows, and a
 * tentative tail that each pass may replace.
 *
 * Hypotheses are aligned by position. Token `i` of a hypothesis corresponds to committed token
 * `segmentStart + i` while `i` is inside the committed part of the current audio segment, and to
 * tentative token `i - (committed.length - segmentStart)` after it. A segment starts at the
 * session start and again at every hangover boundary or window-limit cut, where the audio behind
 * the committed text is dropped from the ring buffer.
 */
export class StabilityTracker {
  private committed: Token[] = [];
  private tentative: TentativeToken[] = [];
  private segmentStart = 0;
  private readonly filter: ArtifactFilter;

  public constructor(private readonly options: StabilityTrackerOptions) {
    if (options.stabilityPasses < 1) {
      throw new Error(`stabilityPasses must be at least 1, got ${options.stabilityPasses}`);
    }

    this.filter = new ArtifactFilter(options.artifactPhrases);
  }

  public getState(): TranscriptState {
    const tentative = this.tentative.map((entry) => entry.token);
    const committedText = joinTokens(this.committed);
    const tentativeText = joinTokens(tentative);

    return {
      committed: [...this.committed],
      tentative,
      committedText,
      tentativeText,
      fullText: joinTokens([...this.committed, ...tentative])
    };
  }

  public getMatchCounts(): number[] {
    return this.tentative.map((entry) => entry.matchCount);
  }

  public apply(hypothesis: Hypothesis): StabilityUpdate {
    const cleaned = this.filter.clean(hypothesis);
    if (cleaned.tokens.length === 0) {
      return this.toUpdate(hypothesis.pass, false, [], true);
    }

    this.align(cleaned.tokens);

    let stableLength = 0;
    while (
      stableLength < this.tentative.length &&
      this.tentative[stableLength].matchCount >= this.options.stabilityPasses
    ) {
      stableLength += 1;
    }

    const promoted = this.promote(stableLength);
    return this.toUpdate(hypothesis.pass, false, promoted, false);
  }

  /**
   * Terminal pass for the current segment: aligns the hypothesis when one is given, then commits
   * every tentative token unconditionally and opens a new segment.
   */
  public finalize(hypothesis: Hypothesis | undefined, pass: number): StabilityUpdate {
    let skipped = hypothesis === undefined;

    if (hypothesis) {
      const cleaned = this.filter.clean(hypothesis);
      if (cleaned.tokens.length > 0) {
        this.align(cleaned.tokens);
      } else {
        skipped = true;
      }
    }

    const promoted = this.promote(this.tentative.length);
    this.segmentStart = this.committed.length;

    return this.toUpdate(pass, true, promoted, skipped);
  }

  public reset(): void {
    this.committed = [];
    this.tentative = [];
    this.segmentStart = 0;
  }

  private align(tokens: Token[]): void {
    const committedInSegment = this.committed.length - this.segmentStart;
    const incoming = tokens.slice(committedInSegment);
    const aligned: TentativeToken[] = [];
    let diverged = false;

    incoming.forEach((token, index) => {
      const previous = this.tentative[index];

      if (!diverged && previous && previous.token.text === token.text) {
        aligned.push({ token: previous.token, matchCount: previous.matchCount + 1 });
        return;
      }

      // Everything from the first disagreement on is new, even if later positions happen to match.
      diverged = true;
      aligned.push({ token, matchCount: 1 });
    });

    this.tentative = aligned;
  }

  private promote(count: number): Token[] {
    if (count <= 0) {
      return [];
    }

    const promoted = this.tentative.slice(0, count).map((entry) => entry.token);
    this.committed.push(...promoted);
    this.tentative = this.tentative.slice(count);
    return promoted;
  }

  private toUpdate(pass: number, final: boolean, promoted: Token[], skipped: boolean): StabilityUpdate {
    return {
      ...this.getState(),
      pass,
      final,
      promoted,
      skipped
    };
  }
}
