import { type ChildProcessWithoutNullStreams, spawn } from 'node:child_process';
import { BYTES_PER_S16_SAMPLE, msToSamples, s16leToFloat32 } from '../../audio/pcm';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { AudioRecorder, FrameStreamOptions } from './AudioRecorder';
import { PcmFrameAssembler } from './PcmFrameAssembler';

const START_STABILITY_DELAY_MS = 300;

export interface FfmpegRecorderOptions {
  inputFormat: string;
  inputDevice: string;
  sampleRate: number;
  logger?: StructuredLogger;
}

export const normalizeMicError = (raw: string): string => {
  const detail = raw.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Microphone permission denied. Grant the terminal microphone access in your system privacy settings, then restart streamscribe.';
  }

  if (/Input\/output error|No such file|device not found|could not find/i.test(detail)) {
    return 'Microphone input device is unavailable. Check STREAMSCRIBE_FFMPEG_FORMAT and STREAMSCRIBE_FFMPEG_INPUT.';
  }

  if (detail) {
    return `Microphone capture failed: ${detail}`;
  }

  return 'Microphone capture failed. Verify ffmpeg availability and microphone permissions.';
};

export const ffmpegCaptureArgs = (inputFormat: string, inputDevice: string, sampleRate: number): string[] => [
  '-hide_banner',
  '-loglevel',
  'error',
  '-f',
  inputFormat,
  '-i',
  inputDevice,
  '-ac',
  '1',
  '-ar',
  String(sampleRate),
  '-f',
  's16le',
  '-acodec',
  'pcm_s16le',
  'pipe:1'
];

/** Streams microphone audio from an ffmpeg child as mono float frames. */
export class FfmpegRecorder implements AudioRecorder {
  private process: ChildProcessWithoutNullStreams | undefined;
  private assembler: PcmFrameAssembler | undefined;
  private onFrame: ((frame: Float32Array) => void) | undefined;

  public constructor(private readonly options: FfmpegRecorderOptions) {}

  public isRecording(): boolean {
    return Boolean(this.process);
  }

  public async startStreaming(stream: FrameStreamOptions): Promise<void> {
    if (this.process) {
      throw new Error('Recorder is already active');
    }

    if (stream.frameDurationMs < 20 || stream.frameDurationMs > 2000) {
      throw new Error('frameDurationMs must be between 20 and 2000.');
    }

    const frameBytes = Math.max(
      BYTES_PER_S16_SAMPLE,
      msToSamples(stream.frameDurationMs, this.options.sampleRate) * BYTES_PER_S16_SAMPLE
    );
    this.assembler = new PcmFrameAssembler(frameBytes);
    this.onFrame = stream.onFrame;

    const ffmpeg = spawn(
      'ffmpeg',
      ffmpegCaptureArgs(this.options.inputFormat, this.options.inputDevice, this.options.sampleRate),
      { stdio: 'pipe' }
    );
    let stderrLog = '';
    let settled = false;

    ffmpeg.on('close', () => {
      if (this.process === ffmpeg) {
        this.process = undefined;
      }
    });

    ffmpeg.stderr.on('data', (chunk: Buffer) => {
      stderrLog += chunk.toString();
    });

    ffmpeg.stdout.on('data', (chunk: Buffer) => {
      this.handleAudioData(chunk);
    });

    await new Promise<void>((resolve, reject) => {
      ffmpeg.once('error', (error) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(error);
      });

      ffmpeg.once('spawn', () => {
        setTimeout(() => {
          if (settled) {
            return;
          }

          if (ffmpeg.exitCode !== null) {
            settled = true;
            reject(new Error(normalizeMicError(stderrLog)));
            return;
          }

          this.process = ffmpeg;
          settled = true;
          resolve();
        }, START_STABILITY_DELAY_MS);
      });

      ffmpeg.once('close', (code) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(new Error(normalizeMicError(`${stderrLog}\nexit code=${code}`)));
      });
    });

    this.logger?.info('Recorder started', {
      inputFormat: this.options.inputFormat,
      inputDevice: this.options.inputDevice,
      sampleRate: this.options.sampleRate,
      frameBytes
    });
  }

  public async stop(): Promise<void> {
    const current = this.process;
    if (!current) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      current.once('close', (code) => {
        this.process = undefined;
        // ffmpeg exits with 255 when interrupted.
        if (code === 0 || code === 255) {
          resolve();
          return;
        }

        reject(new Error(`ffmpeg exited with code ${code}`));
      });

      current.once('error', (error) => {
        this.process = undefined;
        reject(error);
      });

      current.stdin.end();
      current.kill('SIGINT');
    });

    this.flushTailFrame();
    this.assembler = undefined;
    this.onFrame = undefined;

    this.logger?.info('Recorder stopped');
  }

  private get logger(): StructuredLogger | undefined {
    return this.options.logger;
  }

  private handleAudioData(chunk: Buffer): void {
    if (!this.assembler || chunk.length === 0) {
      return;
    }

    for (const frame of this.assembler.push(chunk)) {
      this.emitFrame(frame);
    }
  }

  private flushTailFrame(): void {
    if (!this.assembler) {
      return;
    }

    const tail = this.assembler.drain(Math.floor(this.assembler.frameBytes / 2));
    if (tail) {
      this.emitFrame(tail);
    }
  }

  private emitFrame(bytes: Buffer): void {
    if (!this.onFrame) {
      return;
    }

    try {
      this.onFrame(s16leToFloat32(bytes));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Recorder frame callback failed', { detail });
    }
  }
}
