import { z } from 'zod';
import { float32ToLeBuffer } from '../../audio/pcm';
import { tokenize } from '../../core/transcript';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { AppConfig, AudioWindow, Hypothesis } from '../../types';
import { type FramedTransport, PersistentFramedWorker } from '../process/PersistentFramedWorker';
import type { TranscribeOptions, TranscriptionPort } from './TranscriptionPort';

export const transcriptResultSchema = z.object({
  text: z.string(),
  segments: z.array(z.object({ text: z.string() })).optional()
});

export type TranscriptResult = z.infer<typeof transcriptResultSchema>;

const warmupResultSchema = z.object({ ready: z.boolean().optional() }).passthrough();

const WARMUP_TIMEOUT_MS = 20000;

type WhisperWorkerConfig = Pick<AppConfig, 'workerBin' | 'modelPath' | 'workerThreads' | 'inferenceTimeoutMs'>;

/** Segment text wins over the flat `text` field when the worker sends both. */
export const transcriptText = (result: TranscriptResult): string => {
  if (result.segments && result.segments.length > 0) {
    return result.segments
      .map((segment) => segment.text.trim())
      .filter(Boolean)
      .join(' ');
  }

  return result.text.trim();
};

/**
 * Transcription port backed by a resident whisper.cpp worker. Every call re-decodes the whole
 * window; the worker keeps the model loaded between calls but no decoding state.
 */
export class WhisperWorkerClient implements TranscriptionPort {
  private readonly worker: FramedTransport;

  public constructor(
    private readonly config: WhisperWorkerConfig,
    private readonly logger?: StructuredLogger,
    worker?: FramedTransport
  ) {
    this.worker =
      worker ??
      new PersistentFramedWorker({
        name: 'whisper',
        command: this.config.workerBin,
        args: ['--model', this.config.modelPath, '--threads', String(this.config.workerThreads), '--serve'],
        logger: this.logger
      });
  }

  public async warmup(): Promise<void> {
    await this.worker.start();
    await this.worker.request({ action: 'warmup' }, warmupResultSchema, WARMUP_TIMEOUT_MS);
  }

  public async transcribe(window: AudioWindow, options: TranscribeOptions): Promise<Hypothesis> {
    const result = await this.worker.request(
      {
        action: 'transcribe',
        sampleRate: window.sampleRate,
        pass: options.pass,
        final: options.final,
        prompt: options.prompt
      },
      transcriptResultSchema,
      this.config.inferenceTimeoutMs,
      float32ToLeBuffer(window.samples)
    );

    const text = transcriptText(result);
    this.logger?.debug('Transcription received', {
      pass: options.pass,
      final: options.final,
      samples: window.samples.length,
      textLength: text.length
    });

    return {
      pass: options.pass,
      tokens: tokenize(text, options.pass),
      final: options.final
    };
  }

  public async shutdown(): Promise<void> {
    await this.worker.stop();
  }
}
