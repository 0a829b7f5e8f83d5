import os from 'node:os';
import path from 'node:path';
import type { AppConfig, LogLevel } from './types';

type Env = Record<string, string | undefined>;

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseFloatOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
};

const parseListOrDefault = (value: string | undefined, fallback: string[]): string[] => {
  if (value === undefined) {
    return fallback;
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
};

const resolveLogLevel = (value: string | undefined): LogLevel => {
  if (value === 'debug' || value === 'warn' || value === 'error' || value === 'info') {
    return value;
  }

  return 'info';
};

export const DEFAULT_ARTIFACT_PHRASES = ['thank you', 'thanks for watching', 'subscribe'];

export const SAMPLE_RATE = 16000;

export const resolveConfig = (env: Env = process.env): AppConfig => {
  const rootDir = path.resolve(__dirname, '..');

  return {
    hotkey: env.STREAMSCRIBE_HOTKEY ?? 'RightAlt',
    toggleDebounceMs: parseIntOrDefault(env.STREAMSCRIBE_TOGGLE_DEBOUNCE_MS, 200),
    ffmpegInputFormat: env.STREAMSCRIBE_FFMPEG_FORMAT ?? 'avfoundation',
    ffmpegInputDevice: env.STREAMSCRIBE_FFMPEG_INPUT ?? ':0',
    workerBin:
      env.STREAMSCRIBE_WORKER_BIN ??
      path.join(rootDir, 'native', 'whisper_worker', 'target', 'release', 'streamscribe-whisper-worker'),
    modelPath: env.STREAMSCRIBE_MODEL_PATH ?? path.join(rootDir, 'models', 'ggml-small.en.bin'),
    workerThreads: parseIntOrDefault(env.STREAMSCRIBE_WORKER_THREADS, 4),
    inferenceTimeoutMs: parseIntOrDefault(env.STREAMSCRIBE_INFERENCE_TIMEOUT_MS, 10000),
    textInjectBin:
      env.STREAMSCRIBE_TEXT_INJECT_BIN ??
      path.join(rootDir, 'native', 'text_injector', 'bin', 'streamscribe-text-injector'),
    injectionRetryCount: parseIntOrDefault(env.STREAMSCRIBE_INJECTION_RETRY_COUNT, 2),
    injectionRetryDelayMs: parseIntOrDefault(env.STREAMSCRIBE_INJECTION_RETRY_DELAY_MS, 120),
    sampleRate: SAMPLE_RATE,
    bufferSeconds: parseFloatOrDefault(env.STREAMSCRIBE_BUFFER_SECONDS, 12),
    windowSeconds: parseFloatOrDefault(env.STREAMSCRIBE_WINDOW_SECONDS, 10),
    frameMs: parseIntOrDefault(env.STREAMSCRIBE_FRAME_MS, 100),
    inferenceIntervalMs: parseIntOrDefault(env.STREAMSCRIBE_INFERENCE_INTERVAL_MS, 500),
    minAudioMs: parseIntOrDefault(env.STREAMSCRIBE_MIN_AUDIO_MS, 100),
    vadEnterThreshold: parseFloatOrDefault(env.STREAMSCRIBE_VAD_ENTER_THRESHOLD, 0.01),
    vadExitThreshold: parseFloatOrDefault(env.STREAMSCRIBE_VAD_EXIT_THRESHOLD, 0.006),
    vadEnterFrames: parseIntOrDefault(env.STREAMSCRIBE_VAD_ENTER_FRAMES, 2),
    hangoverMs: parseIntOrDefault(env.STREAMSCRIBE_HANGOVER_MS, 600),
    stabilityPasses: parseIntOrDefault(env.STREAMSCRIBE_STABILITY_PASSES, 2),
    useContextPrompt: parseBoolOrDefault(env.STREAMSCRIBE_CONTEXT_PROMPT, true),
    promptMaxWords: parseIntOrDefault(env.STREAMSCRIBE_PROMPT_MAX_WORDS, 50),
    artifactPhrases: parseListOrDefault(env.STREAMSCRIBE_ARTIFACT_PHRASES, DEFAULT_ARTIFACT_PHRASES),
    logDir: env.STREAMSCRIBE_LOG_DIR ?? path.join(os.homedir(), '.streamscribe', 'logs'),
    consoleLogLevel: resolveLogLevel(env.STREAMSCRIBE_CONSOLE_LOG_LEVEL)
  };
};

/** Number of consecutive quiet frames that make up the hangover. */
export const hangoverFrames = (config: Pick<AppConfig, 'hangoverMs' | 'frameMs'>): number =>
  Math.max(1, Math.ceil(config.hangoverMs / config.frameMs));

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!config.hotkey.trim()) {
    errors.push('STREAMSCRIBE_HOTKEY must not be empty.');
  }

  if (config.toggleDebounceMs < 0 || config.toggleDebounceMs > 2000) {
    errors.push('STREAMSCRIBE_TOGGLE_DEBOUNCE_MS must be between 0 and 2000 milliseconds.');
  }

  if (!config.ffmpegInputFormat.trim()) {
    errors.push('STREAMSCRIBE_FFMPEG_FORMAT must not be empty.');
  }

  if (!config.workerBin.trim()) {
    errors.push('STREAMSCRIBE_WORKER_BIN must not be empty.');
  }

  if (!config.modelPath.trim()) {
    errors.push('STREAMSCRIBE_MODEL_PATH must not be empty.');
  }

  if (config.workerThreads < 1 || config.workerThreads > 64) {
    errors.push('STREAMSCRIBE_WORKER_THREADS must be between 1 and 64.');
  }

  if (config.inferenceTimeoutMs < 500 || config.inferenceTimeoutMs > 120000) {
    errors.push('STREAMSCRIBE_INFERENCE_TIMEOUT_MS must be between 500 and 120000 milliseconds.');
  }

  if (config.injectionRetryCount < 1 || config.injectionRetryCount > 8) {
    errors.push('STREAMSCRIBE_INJECTION_RETRY_COUNT must be between 1 and 8.');
  }

  if (config.injectionRetryDelayMs < 0 || config.injectionRetryDelayMs > 5000) {
    errors.push('STREAMSCRIBE_INJECTION_RETRY_DELAY_MS must be between 0 and 5000 milliseconds.');
  }

  if (config.bufferSeconds < 1 || config.bufferSeconds > 60) {
    errors.push('STREAMSCRIBE_BUFFER_SECONDS must be between 1 and 60 seconds.');
  }

  if (config.windowSeconds <= 0 || config.windowSeconds > config.bufferSeconds) {
    errors.push('STREAMSCRIBE_WINDOW_SECONDS must be positive and no longer than STREAMSCRIBE_BUFFER_SECONDS.');
  }

  if (config.frameMs < 20 || config.frameMs > 500) {
    errors.push('STREAMSCRIBE_FRAME_MS must be between 20 and 500 milliseconds.');
  }

  if (config.inferenceIntervalMs < 100 || config.inferenceIntervalMs > 5000) {
    errors.push('STREAMSCRIBE_INFERENCE_INTERVAL_MS must be between 100 and 5000 milliseconds.');
  }

  if (config.minAudioMs < 0 || config.minAudioMs > 2000) {
    errors.push('STREAMSCRIBE_MIN_AUDIO_MS must be between 0 and 2000 milliseconds.');
  }

  if (config.vadEnterThreshold <= 0 || config.vadEnterThreshold > 1) {
    errors.push('STREAMSCRIBE_VAD_ENTER_THRESHOLD must be in (0, 1].');
  }

  if (config.vadExitThreshold <= 0 || config.vadExitThreshold > config.vadEnterThreshold) {
    errors.push('STREAMSCRIBE_VAD_EXIT_THRESHOLD must be positive and no higher than the enter threshold.');
  }

  if (config.vadEnterFrames < 1 || config.vadEnterFrames > 50) {
    errors.push('STREAMSCRIBE_VAD_ENTER_FRAMES must be between 1 and 50.');
  }

  if (config.hangoverMs < 100 || config.hangoverMs > 10000) {
    errors.push('STREAMSCRIBE_HANGOVER_MS must be between 100 and 10000 milliseconds.');
  } else if (
    config.frameMs > 0 &&
    hangoverFrames(config) <= config.vadEnterFrames
  ) {
    errors.push(
      'Hangover must span more frames than speech onset: STREAMSCRIBE_HANGOVER_MS / STREAMSCRIBE_FRAME_MS must exceed STREAMSCRIBE_VAD_ENTER_FRAMES.'
    );
  }

  if (config.stabilityPasses < 1 || config.stabilityPasses > 10) {
    errors.push('STREAMSCRIBE_STABILITY_PASSES must be between 1 and 10.');
  }

  if (config.promptMaxWords < 0 || config.promptMaxWords > 224) {
    errors.push('STREAMSCRIBE_PROMPT_MAX_WORDS must be between 0 and 224.');
  }

  return errors;
};
