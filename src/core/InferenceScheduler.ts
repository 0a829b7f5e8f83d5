import { msToSamples, samplesToMs } from '../audio/pcm';
import type { StructuredLogger } from '../logging/StructuredLogger';
import type { TranscriptionPort } from '../services/asr/TranscriptionPort';
import type { AudioWindow, FinalPassReason, Hypothesis, StabilityUpdate } from '../types';
import type { LiveSession } from './LiveSession';
import { buildContextPrompt } from './transcript';

export interface InferenceSchedulerOptions {
  intervalMs: number;
  /**
   * Longest audio sent in one pass. Every pass covers all audio since the last committed
   * boundary; once that reaches this length the segment is committed and a new one begins.
   */
  windowSeconds: number;
  minAudioMs: number;
  useContextPrompt: boolean;
  promptMaxWords: number;
}

export type TickOutcome = 'busy' | 'gated' | 'too-short' | 'failed' | 'filtered' | 'applied' | 'segmented';

export interface PassReport {
  sessionId: number;
  update: StabilityUpdate;
  reason?: FinalPassReason;
  windowMs: number;
  /** 0 when the pass made no engine call. */
  asrMs: number;
  startedAtMs: number;
}

export interface FinalPassResult {
  update: StabilityUpdate;
  /** End of the audio the final hypothesis covered. */
  endPosition: number;
}

/** Receives every pass in order; the next pass does not start until this resolves. */
export type PassHandler = (report: PassReport) => Promise<void>;

export interface InferenceSchedulerHooks {
  onPass: PassHandler;
  onTickSkipped?: () => void;
}

/**
 * Fixed-cadence driver of the transcription engine for one session at a time.
 *
 * At most one engine call is in flight: a tick that fires while the previous pass (call plus
 * handler) is still running is dropped rather than queued.
 */
export class InferenceScheduler {
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<unknown> | undefined;

  public constructor(
    private readonly port: TranscriptionPort,
    private readonly options: InferenceSchedulerOptions,
    private readonly hooks: InferenceSchedulerHooks,
    private readonly logger?: StructuredLogger
  ) {}

  public isRunning(): boolean {
    return this.timer !== undefined;
  }

  public start(session: LiveSession): void {
    this.stop();
    this.timer = setInterval(() => {
      this.tick(session).catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.error('Inference tick failed', { sessionId: session.id, detail });
      });
    }, this.options.intervalMs);
  }

  /** Cancels future ticks; a call already in flight still completes. */
  public stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** Resolves once no pass is running. A failed pass has already been reported to its caller. */
  public async waitForIdle(): Promise<void> {
    while (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
  }

  public async tick(session: LiveSession): Promise<TickOutcome> {
    if (this.inFlight) {
      this.hooks.onTickSkipped?.();
      this.logger?.debug('Inference tick skipped; previous pass still running', { sessionId: session.id });
      return 'busy';
    }

    if (!session.vad.hasSpeechSinceBoundary()) {
      return 'gated';
    }

    const window = session.buffer.snapshot();
    if (window.samples.length < msToSamples(this.options.minAudioMs, window.sampleRate)) {
      return 'too-short';
    }

    if (window.samples.length >= msToSamples(this.options.windowSeconds * 1000, window.sampleRate)) {
      return this.track(this.cutSegment(session, window));
    }

    return this.track(this.runPass(session, window));
  }

  /**
   * Terminal pass over everything buffered since the last boundary. Any call already in flight
   * is awaited and consumed first. When there is nothing worth transcribing, or the engine
   * fails, the tentative text is committed as it stands.
   */
  public async runFinalPass(session: LiveSession, reason: FinalPassReason): Promise<FinalPassResult> {
    this.stop();
    await this.waitForIdle();
    return this.track(this.runFinal(session, reason, session.buffer.snapshot()));
  }

  private async runPass(session: LiveSession, window: AudioWindow): Promise<TickOutcome> {
    const startedAtMs = Date.now();
    const pass = session.nextPass();
    const hypothesis = await this.transcribe(session, window, pass, false);
    const asrMs = Date.now() - startedAtMs;

    if (!hypothesis) {
      return 'failed';
    }

    const update = session.tracker.apply(hypothesis);
    if (update.skipped) {
      this.logger?.debug('Hypothesis held only non-speech artifacts', { sessionId: session.id, pass });
      return 'filtered';
    }

    await this.hooks.onPass({
      sessionId: session.id,
      update,
      windowMs: Math.round(samplesToMs(window.samples.length, window.sampleRate)),
      asrMs,
      startedAtMs
    });

    return 'applied';
  }

  /**
   * Commits the whole segment so the next hypothesis again starts at a segment boundary. A failed
   * call leaves the segment open and the next tick retries it.
   */
  private async cutSegment(session: LiveSession, window: AudioWindow): Promise<TickOutcome> {
    const startedAtMs = Date.now();
    const pass = session.nextPass();
    const hypothesis = await this.transcribe(session, window, pass, true);
    const asrMs = Date.now() - startedAtMs;

    if (!hypothesis) {
      return 'failed';
    }

    const update = session.tracker.finalize(hypothesis, pass);
    session.commitBoundary(window.endPosition);
    this.logger?.info('Segment committed at window limit', {
      sessionId: session.id,
      pass,
      promotedTokens: update.promoted.length
    });

    await this.hooks.onPass({
      sessionId: session.id,
      update,
      reason: 'window-full',
      windowMs: Math.round(samplesToMs(window.samples.length, window.sampleRate)),
      asrMs,
      startedAtMs
    });

    return 'segmented';
  }

  private async runFinal(
    session: LiveSession,
    reason: FinalPassReason,
    window: AudioWindow
  ): Promise<FinalPassResult> {
    const startedAtMs = Date.now();
    const pass = session.nextPass();
    const minSamples = msToSamples(this.options.minAudioMs, window.sampleRate);

    let hypothesis: Hypothesis | undefined;
    if (session.vad.hasSpeechSinceBoundary() && window.samples.length >= minSamples) {
      hypothesis = await this.transcribe(session, window, pass, true);
    }

    const asrMs = hypothesis ? Date.now() - startedAtMs : 0;
    const update = session.tracker.finalize(hypothesis, pass);

    this.logger?.info('Final pass committed', {
      sessionId: session.id,
      reason,
      pass,
      promotedTokens: update.promoted.length,
      usedEngine: hypothesis !== undefined
    });

    await this.hooks.onPass({
      sessionId: session.id,
      update,
      reason,
      windowMs: Math.round(samplesToMs(window.samples.length, window.sampleRate)),
      asrMs,
      startedAtMs
    });

    return { update, endPosition: window.endPosition };
  }

  private async transcribe(
    session: LiveSession,
    window: AudioWindow,
    pass: number,
    final: boolean
  ): Promise<Hypothesis | undefined> {
    const prompt = this.options.useContextPrompt
      ? buildContextPrompt(session.tracker.getState().committed, this.options.promptMaxWords)
      : undefined;

    try {
      return await this.port.transcribe(window, { pass, prompt, final });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Transcription pass failed', { sessionId: session.id, pass, final, detail });
      return undefined;
    }
  }

  private async track<T>(work: Promise<T>): Promise<T> {
    this.inFlight = work;

    try {
      return await work;
    } finally {
      if (this.inFlight === work) {
        this.inFlight = undefined;
      }
    }
  }
}
