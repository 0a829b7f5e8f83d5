import { RingBuffer } from '../audio/RingBuffer';
import { type VadTransition, type VoiceActivityOptions, VoiceActivityDetector } from '../audio/VoiceActivityDetector';
import { StabilityTracker, type StabilityTrackerOptions } from './StabilityTracker';

export interface LiveSessionOptions {
  sampleRate: number;
  bufferSeconds: number;
  vad: VoiceActivityOptions;
  stability: StabilityTrackerOptions;
}

/**
 * State owned by one start-to-stop dictation session. The controller creates a fresh instance on
 * every start and drops it when the session returns to idle, so nothing leaks between sessions.
 */
export class LiveSession {
  public readonly buffer: RingBuffer;
  public readonly vad: VoiceActivityDetector;
  public readonly tracker: StabilityTracker;
  public readonly startedAtMs = Date.now();
  /** Set once a stop is requested; later hangovers and restarts are skipped. */
  public stopRequested = false;
  private passCounter = 0;
  /** Buffer position where the most recent utterance began. */
  private speechStartPosition: number | undefined;

  public constructor(
    public readonly id: number,
    private readonly options: LiveSessionOptions
  ) {
    this.buffer = RingBuffer.forDuration(options.bufferSeconds, options.sampleRate);
    this.vad = new VoiceActivityDetector(options.vad);
    this.tracker = new StabilityTracker(options.stability);
  }

  public get passes(): number {
    return this.passCounter;
  }

  public nextPass(): number {
    this.passCounter += 1;
    return this.passCounter;
  }

  /** Appends a captured frame and runs it through the VAD. */
  public acceptFrame(frame: Float32Array): VadTransition | undefined {
    this.buffer.write(frame);
    this.vad.process(frame);

    const transition = this.vad.getLastTransition();
    if (transition === 'speech-started') {
      // Onset is confirmed only after `enterFrames` loud frames; the utterance began with the first.
      const onsetSamples = this.options.vad.enterFrames * frame.length;
      this.speechStartPosition = Math.max(0, this.buffer.writePosition - onsetSamples);
    }

    return transition;
  }

  /** An utterance was heard after the last boundary and has already ended. */
  public hasPendingUtterance(): boolean {
    return this.vad.hasSpeechSinceBoundary() && this.vad.state === 'silence';
  }

  /** Everything up to `position` is now committed text; its audio is no longer needed. */
  public commitBoundary(position: number): void {
    this.buffer.discardThrough(position);
    this.vad.markBoundary(this.speechStartPosition !== undefined && this.speechStartPosition >= position);
  }
}
