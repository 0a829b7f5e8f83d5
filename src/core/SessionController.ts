import { EventEmitter } from 'node:events';
import type { VoiceActivityOptions } from '../audio/VoiceActivityDetector';
import { hangoverFrames } from '../config';
import type { StructuredLogger } from '../logging/StructuredLogger';
import { LatencyTracker, type LatencySummary } from '../perf/LatencyTracker';
import type { TranscriptionPort } from '../services/asr/TranscriptionPort';
import type { AudioRecorder } from '../services/capture/AudioRecorder';
import type { KeystrokeSurface } from '../services/inject/KeystrokeSurface';
import type { AppConfig, AppState, SessionSummary, StabilityUpdate, TranscriptState } from '../types';
import { DiffInjector, type InjectionResult } from './DiffInjector';
import { InferenceScheduler, type PassReport } from './InferenceScheduler';
import { LiveSession } from './LiveSession';

export interface SessionControllerOptions {
  sampleRate: number;
  bufferSeconds: number;
  windowSeconds: number;
  frameMs: number;
  inferenceIntervalMs: number;
  minAudioMs: number;
  vad: VoiceActivityOptions;
  stabilityPasses: number;
  artifactPhrases: readonly string[];
  useContextPrompt: boolean;
  promptMaxWords: number;
}

export const controllerOptionsFromConfig = (config: AppConfig): SessionControllerOptions => ({
  sampleRate: config.sampleRate,
  bufferSeconds: config.bufferSeconds,
  windowSeconds: config.windowSeconds,
  frameMs: config.frameMs,
  inferenceIntervalMs: config.inferenceIntervalMs,
  minAudioMs: config.minAudioMs,
  vad: {
    enterThreshold: config.vadEnterThreshold,
    exitThreshold: config.vadExitThreshold,
    enterFrames: config.vadEnterFrames,
    exitFrames: hangoverFrames(config)
  },
  stabilityPasses: config.stabilityPasses,
  artifactPhrases: config.artifactPhrases,
  useContextPrompt: config.useContextPrompt,
  promptMaxWords: config.promptMaxWords
});

interface WarmableTranscriber extends TranscriptionPort {
  warmup?: () => Promise<void>;
  shutdown?: () => Promise<void>;
}

export interface SessionControllerDependencies {
  recorder: AudioRecorder;
  transcriber: WarmableTranscriber;
  surface: KeystrokeSurface;
}

export interface TranscriptEvent {
  sessionId: number;
  update: StabilityUpdate;
  injection: InjectionResult;
}

export interface InjectionFailure {
  sessionId: number;
  detail: string;
}

export interface SessionReport extends SessionSummary {
  latency: LatencySummary;
}

export declare interface SessionController {
  on(event: 'stateChanged', listener: (state: AppState) => void): this;
  on(event: 'transcriptUpdated', listener: (event: TranscriptEvent) => void): this;
  on(event: 'injectionFailed', listener: (failure: InjectionFailure) => void): this;
  on(event: 'sessionCompleted', listener: (report: SessionReport) => void): this;
}

/**
 * Owns the dictation lifecycle: start, live passes, hangover commits and the terminal pass on
 * stop. Start, hangover and stop transitions run one after another on a single chain, so a
 * stop that lands during a hangover pass waits for it and then finishes the session.
 */
export class SessionController extends EventEmitter {
  private state: AppState = { stage: 'idle' };
  private session: LiveSession | undefined;
  private sessionCounter = 0;
  private acceptingAudio = false;
  private transitions: Promise<void> = Promise.resolve();
  private readonly scheduler: InferenceScheduler;
  private readonly injector: DiffInjector;
  private readonly latencyTracker = new LatencyTracker();

  public constructor(
    private readonly deps: SessionControllerDependencies,
    private readonly options: SessionControllerOptions,
    private readonly logger?: StructuredLogger
  ) {
    super();
    this.injector = new DiffInjector(deps.surface, logger);
    this.scheduler = new InferenceScheduler(
      deps.transcriber,
      {
        intervalMs: options.inferenceIntervalMs,
        windowSeconds: options.windowSeconds,
        minAudioMs: options.minAudioMs,
        useContextPrompt: options.useContextPrompt,
        promptMaxWords: options.promptMaxWords
      },
      {
        onPass: (report) => this.handlePass(report),
        onTickSkipped: () => this.latencyTracker.recordSkippedTick()
      },
      logger
    );
  }

  public getState(): AppState {
    return this.state;
  }

  public getTranscript(): TranscriptState | undefined {
    return this.session?.tracker.getState();
  }

  public isSessionActive(): boolean {
    return this.session !== undefined;
  }

  /** Resolves once every queued start, hangover and stop transition has run. */
  public async whenSettled(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.transitions;
      await current;
    } while (current !== this.transitions);
  }

  public async warmupWorkers(): Promise<void> {
    this.setState({ stage: 'warming', detail: 'Loading transcription model' });

    try {
      await this.deps.transcriber.warmup?.();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.setState({ stage: 'error', detail });
      this.logger?.error('Transcription worker warmup failed', { detail });
      throw error;
    }

    this.setState({ stage: 'idle' });
    this.logger?.info('Workers warmed and ready');
  }

  public async handleToggle(): Promise<void> {
    if (this.session) {
      await this.handleStop();
      return;
    }

    await this.handleStart();
  }

  /** Ignored while a session exists, including one that is still finalizing after a stop. */
  public async handleStart(): Promise<void> {
    if (this.session || this.state.stage === 'finalizing') {
      this.logger?.debug('Start ignored', { stage: this.state.stage });
      return;
    }

    await this.enqueue(() => this.startSession());
  }

  public async handleStop(): Promise<void> {
    const session = this.session;
    if (!session || session.stopRequested) {
      return;
    }

    session.stopRequested = true;
    if (this.state.stage === 'finalizing') {
      this.logger?.info('Stop requested during a hangover pass; finishing afterwards', { sessionId: session.id });
    }

    await this.enqueue(() => this.finishSession(session));
  }

  public setError(detail: string): void {
    this.setState({ stage: 'error', detail });
  }

  public clearError(): void {
    if (this.state.stage === 'error') {
      this.setState({ stage: 'idle' });
    }
  }

  public async shutdown(): Promise<void> {
    await this.handleStop();
    await this.whenSettled();
    this.scheduler.stop();
    this.acceptingAudio = false;

    await this.deps.recorder.stop().catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Recorder stop failed during shutdown', { detail });
    });
    await this.deps.transcriber.shutdown?.().catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Transcription worker shutdown failed', { detail });
    });
  }

  private async startSession(): Promise<void> {
    if (this.session || (this.state.stage !== 'idle' && this.state.stage !== 'error')) {
      this.logger?.debug('Start ignored', { stage: this.state.stage });
      return;
    }

    this.sessionCounter += 1;
    const session = new LiveSession(this.sessionCounter, {
      sampleRate: this.options.sampleRate,
      bufferSeconds: this.options.bufferSeconds,
      vad: this.options.vad,
      stability: {
        stabilityPasses: this.options.stabilityPasses,
        artifactPhrases: this.options.artifactPhrases
      }
    });

    this.injector.reset();
    this.latencyTracker.reset();
    this.session = session;
    this.acceptingAudio = true;

    try {
      await this.deps.recorder.startStreaming({
        frameDurationMs: this.options.frameMs,
        onFrame: (frame) => this.onFrame(session, frame)
      });
    } catch (error) {
      this.acceptingAudio = false;
      this.session = undefined;
      const detail = error instanceof Error ? error.message : String(error);
      this.setState({ stage: 'error', detail });
      this.logger?.error('Failed to start recording', { sessionId: session.id, detail });
      return;
    }

    this.scheduler.start(session);
    this.setState({ stage: 'recording', detail: 'Live dictation' });
    this.logger?.info('Recording started', {
      sessionId: session.id,
      frameMs: this.options.frameMs,
      intervalMs: this.options.inferenceIntervalMs,
      windowSeconds: this.options.windowSeconds,
      stabilityPasses: this.options.stabilityPasses,
      hangoverFrames: this.options.vad.exitFrames
    });
  }

  private onFrame(session: LiveSession, frame: Float32Array): void {
    if (!this.acceptingAudio || this.session !== session || frame.length === 0) {
      return;
    }

    const transition = session.acceptFrame(frame);
    if (transition === 'speech-ended' && this.state.stage === 'recording' && !session.stopRequested) {
      this.queueHangover(session);
    }
  }

  private queueHangover(session: LiveSession): void {
    this.enqueue(() => this.commitHangover(session)).catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.error('Hangover commit failed', { sessionId: session.id, detail });
    });
  }

  private async commitHangover(session: LiveSession): Promise<void> {
    if (this.session !== session || this.state.stage !== 'recording' || session.stopRequested) {
      return;
    }

    this.setState({ stage: 'finalizing', detail: 'Committing after pause' });
    const result = await this.scheduler.runFinalPass(session, 'hangover');
    session.commitBoundary(result.endPosition);

    if (this.session === session && !session.stopRequested) {
      this.scheduler.start(session);
      this.setState({ stage: 'recording', detail: 'Live dictation' });

      // An utterance that began and ended while the pass ran missed its own hangover trigger.
      if (session.hasPendingUtterance()) {
        this.queueHangover(session);
      }
    }
  }

  private async finishSession(session: LiveSession): Promise<void> {
    try {
      this.setState({ stage: 'finalizing', detail: 'Final pass' });
      this.scheduler.stop();

      await this.deps.recorder.stop().catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.warn('Recorder stop failed; finishing with buffered audio', { sessionId: session.id, detail });
      });
      this.acceptingAudio = false;

      const result = await this.scheduler.runFinalPass(session, 'stop');
      const report: SessionReport = {
        sessionId: session.id,
        committedText: result.update.committedText,
        passes: session.passes,
        durationMs: Date.now() - session.startedAtMs,
        latency: this.latencyTracker.summarize()
      };

      this.emit('sessionCompleted', report);
      this.logger?.info('Dictation session completed', {
        sessionId: report.sessionId,
        transcriptLength: report.committedText.length,
        passes: report.passes,
        durationMs: report.durationMs,
        injectionSuspended: this.injector.isSuspended(),
        latencySummary: report.latency
      });

      this.session = undefined;
      this.setState({ stage: 'idle' });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.session = undefined;
      this.acceptingAudio = false;
      this.setState({ stage: 'error', detail });
      this.logger?.error('Session finalization failed', { sessionId: session.id, detail });
    }
  }

  private async handlePass(report: PassReport): Promise<void> {
    const injectStartedAtMs = Date.now();
    const injection = await this.injector.apply(report.update.fullText);
    const injectMs = Date.now() - injectStartedAtMs;

    if (injection.outcome === 'failed') {
      const detail = injection.detail ?? 'unknown injection failure';
      this.emit('injectionFailed', { sessionId: report.sessionId, detail });
    }

    if (report.asrMs > 0) {
      this.latencyTracker.push({
        windowMs: report.windowMs,
        asrMs: report.asrMs,
        injectMs,
        passMs: Date.now() - report.startedAtMs
      });
    }

    this.emit('transcriptUpdated', { sessionId: report.sessionId, update: report.update, injection });
  }

  private enqueue(work: () => Promise<void>): Promise<void> {
    const next = this.transitions.then(work);
    this.transitions = next.catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.error('Session transition failed', { detail });
    });
    return next;
  }

  private setState(next: AppState): void {
    this.state = next;
    this.emit('stateChanged', next);
    this.logger?.info('State changed', {
      stage: next.stage,
      detail: next.detail
    });
  }
}
