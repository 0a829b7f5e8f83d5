export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type SessionStage = 'warming' | 'idle' | 'recording' | 'finalizing' | 'error';

export type VadState = 'silence' | 'speech';

export type FinalPassReason = 'stop' | 'hangover' | 'window-full';

export interface AppState {
  stage: SessionStage;
  detail?: string;
}

/**
 * Contiguous run of mono samples copied out of the ring buffer.
 * `endPosition` is the absolute sample index one past the last sample, so a caller can later
 * discard exactly the audio it consumed.
 */
export interface AudioWindow {
  samples: Float32Array;
  sampleRate: number;
  endPosition: number;
}

export interface Token {
  text: string;
  pass: number;
}

export interface Hypothesis {
  pass: number;
  tokens: Token[];
  final: boolean;
}

export interface TranscriptState {
  committed: Token[];
  tentative: Token[];
  committedText: string;
  tentativeText: string;
  fullText: string;
}

export interface StabilityUpdate extends TranscriptState {
  pass: number;
  final: boolean;
  promoted: Token[];
  /** True when the hypothesis carried nothing but non-speech artifacts and was ignored. */
  skipped: boolean;
}

export interface SessionSummary {
  sessionId: number;
  committedText: string;
  passes: number;
  durationMs: number;
}

export interface AppConfig {
  hotkey: string;
  toggleDebounceMs: number;
  ffmpegInputFormat: string;
  ffmpegInputDevice: string;
  workerBin: string;
  modelPath: string;
  workerThreads: number;
  inferenceTimeoutMs: number;
  textInjectBin: string;
  injectionRetryCount: number;
  injectionRetryDelayMs: number;
  sampleRate: number;
  bufferSeconds: number;
  windowSeconds: number;
  frameMs: number;
  inferenceIntervalMs: number;
  minAudioMs: number;
  vadEnterThreshold: number;
  vadExitThreshold: number;
  vadEnterFrames: number;
  hangoverMs: number;
  stabilityPasses: number;
  useContextPrompt: boolean;
  promptMaxWords: number;
  artifactPhrases: string[];
  logDir: string;
  consoleLogLevel: LogLevel;
}
