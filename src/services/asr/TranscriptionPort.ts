import type { AudioWindow, Hypothesis } from '../../types';

export interface TranscribeOptions {
  pass: number;
  /** Recently committed text, offered to the decoder as context. */
  prompt?: string;
  final: boolean;
}

/**
 * Stateless speech-to-text capability. Every call re-transcribes the whole window; callers never
 * issue overlapping calls and the implementation must not keep `window.samples` after returning.
 */
export interface TranscriptionPort {
  transcribe(window: AudioWindow, options: TranscribeOptions): Promise<Hypothesis>;
}
