import type { AudioWindow, Hypothesis } from '../types';
import type { TranscribeOptions, TranscriptionPort } from '../services/asr/TranscriptionPort';
import type { AudioRecorder, FrameStreamOptions } from '../services/capture/AudioRecorder';
import type { KeystrokeSurface } from '../services/inject/KeystrokeSurface';
import { tokenize } from '../core/transcript';

export type SurfaceOperation = { kind: 'delete'; count: number } | { kind: 'insert'; text: string };

/** Keeps a model of the focused field and every operation issued against it. */
export class RecordingSurface implements KeystrokeSurface {
  public readonly operations: SurfaceOperation[] = [];
  public text = '';
  public failNext = false;

  public async delete(count: number): Promise<void> {
    this.throwIfFailing();
    this.operations.push({ kind: 'delete', count });
    this.text = Array.from(this.text).slice(0, Math.max(0, Array.from(this.text).length - count)).join('');
  }

  public async insert(text: string): Promise<void> {
    this.throwIfFailing();
    this.operations.push({ kind: 'insert', text });
    this.text += text;
  }

  private throwIfFailing(): void {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('focused element went away');
    }
  }
}

export interface RecordedCall {
  samples: number;
  options: TranscribeOptions;
}

type ScriptedReply = string | Error;

/**
 * Returns scripted transcripts in order; once the script runs out the last entry repeats.
 * Calls can be held open with `hold()` to simulate a slow engine.
 */
export class ScriptedTranscriptionPort implements TranscriptionPort {
  public readonly calls: RecordedCall[] = [];
  private inFlight = 0;
  public maxConcurrent = 0;
  private gate: Promise<void> | undefined;
  private releaseGate: (() => void) | undefined;

  public constructor(private readonly script: ScriptedReply[]) {}

  public hold(): void {
    this.gate = new Promise((resolve) => {
      this.releaseGate = resolve;
    });
  }

  public release(): void {
    this.releaseGate?.();
    this.gate = undefined;
    this.releaseGate = undefined;
  }

  public async transcribe(window: AudioWindow, options: TranscribeOptions): Promise<Hypothesis> {
    const index = Math.min(this.calls.length, this.script.length - 1);
    this.calls.push({ samples: window.samples.length, options });
    this.inFlight += 1;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.inFlight);

    try {
      if (this.gate) {
        await this.gate;
      }

      const reply = this.script[index];
      if (reply instanceof Error) {
        throw reply;
      }

      return { pass: options.pass, tokens: tokenize(reply, options.pass), final: options.final };
    } finally {
      this.inFlight -= 1;
    }
  }
}

export const tone = (length: number, amplitude: number): Float32Array => new Float32Array(length).fill(amplitude);

/** Recorder driven by the test: frames are pushed with `emit`. */
export class ScriptedRecorder implements AudioRecorder {
  public starts = 0;
  public stops = 0;
  public failNextStart: Error | undefined;
  private onFrame: ((frame: Float32Array) => void) | undefined;

  public isRecording(): boolean {
    return this.onFrame !== undefined;
  }

  public async startStreaming(options: FrameStreamOptions): Promise<void> {
    this.starts += 1;
    if (this.failNextStart) {
      const error = this.failNextStart;
      this.failNextStart = undefined;
      throw error;
    }

    this.onFrame = options.onFrame;
  }

  public async stop(): Promise<void> {
    this.stops += 1;
    this.onFrame = undefined;
  }

  public emit(frame: Float32Array, times = 1): void {
    for (let index = 0; index < times; index += 1) {
      this.onFrame?.(frame);
    }
  }
}

/** `w<from> ... w<to - 1>`, the words a `TimelineTranscriptionPort` hears for those seconds. */
export const timelineWords = (from: number, to: number): string => {
  const words: string[] = [];
  for (let second = from; second < to; second += 1) {
    words.push(`w${second}`);
  }
  return words.join(' ');
};

/**
 * Engine stand-in that hears one word per whole second of audio, named after the absolute
 * second it covers, so a test can tell exactly which stretch of audio a window held.
 */
export class TimelineTranscriptionPort implements TranscriptionPort {
  public readonly calls: RecordedCall[] = [];

  public async transcribe(window: AudioWindow, options: TranscribeOptions): Promise<Hypothesis> {
    this.calls.push({ samples: window.samples.length, options });
    const firstSecond = Math.ceil((window.endPosition - window.samples.length) / window.sampleRate);
    const endSecond = Math.floor(window.endPosition / window.sampleRate);
    const text = timelineWords(firstSecond, endSecond);

    return { pass: options.pass, tokens: tokenize(text, options.pass), final: options.final };
  }
}
