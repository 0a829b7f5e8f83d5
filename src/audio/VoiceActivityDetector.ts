import type { VadState } from '../types';

export interface VoiceActivityOptions {
  /** RMS a frame must exceed to count toward speech onset. */
  enterThreshold: number;
  /** RMS a frame must stay below to count toward the hangover. */
  exitThreshold: number;
  enterFrames: number;
  /** Consecutive quiet frames that end speech; must exceed `enterFrames`. */
  exitFrames: number;
}

export type VadTransition = 'speech-started' | 'speech-ended';

/**
 * Energy gate with two-threshold hysteresis.
 *
 * `speechSinceBoundary` remembers whether any speech was heard since the last committed
 * boundary; the scheduler uses it to skip inference on pure silence.
 */
export class VoiceActivityDetector {
  private current: VadState = 'silence';
  private framesAbove = 0;
  private framesBelow = 0;
  private speechSinceBoundary = false;
  private lastTransition: VadTransition | undefined;

  public constructor(private readonly options: VoiceActivityOptions) {
    if (options.exitFrames <= options.enterFrames) {
      throw new Error(
        `VAD exit frames (${options.exitFrames}) must exceed enter frames (${options.enterFrames})`
      );
    }

    if (options.exitThreshold > options.enterThreshold) {
      throw new Error('VAD exit threshold must not be higher than the enter threshold');
    }
  }

  public get state(): VadState {
    return this.current;
  }

  /** Root-mean-square amplitude of the frame; 0 for an empty frame. */
  public classify(frame: Float32Array): number {
    if (frame.length === 0) {
      return 0;
    }

    let sumSquares = 0;
    for (let index = 0; index < frame.length; index += 1) {
      sumSquares += frame[index] * frame[index];
    }

    return Math.sqrt(sumSquares / frame.length);
  }

  public update(energy: number): VadState {
    this.lastTransition = undefined;
    this.framesAbove = energy > this.options.enterThreshold ? this.framesAbove + 1 : 0;
    this.framesBelow = energy < this.options.exitThreshold ? this.framesBelow + 1 : 0;

    if (this.current === 'silence' && this.framesAbove >= this.options.enterFrames) {
      this.current = 'speech';
      this.speechSinceBoundary = true;
      this.lastTransition = 'speech-started';
      this.framesAbove = 0;
      this.framesBelow = 0;
    } else if (this.current === 'speech' && this.framesBelow >= this.options.exitFrames) {
      this.current = 'silence';
      this.lastTransition = 'speech-ended';
      this.framesAbove = 0;
      this.framesBelow = 0;
    }

    return this.current;
  }

  public process(frame: Float32Array): VadState {
    return this.update(this.classify(frame));
  }

  /** Transition caused by the most recent `update`, if any. */
  public getLastTransition(): VadTransition | undefined {
    return this.lastTransition;
  }

  public hasSpeechSinceBoundary(): boolean {
    return this.speechSinceBoundary;
  }

  /**
   * Marks everything heard so far as committed. Speech still in progress stays pending, as does
   * an utterance the caller knows began after the committed audio.
   */
  public markBoundary(speechAfterBoundary = false): void {
    this.speechSinceBoundary = this.current === 'speech' || speechAfterBoundary;
  }

  public reset(): void {
    this.current = 'silence';
    this.framesAbove = 0;
    this.framesBelow = 0;
    this.speechSinceBoundary = false;
    this.lastTransition = undefined;
  }
}
