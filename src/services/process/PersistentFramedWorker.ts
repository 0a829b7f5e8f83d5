import { type ChildProcessWithoutNullStreams, spawn } from 'node:child_process';
import { z } from 'zod';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import { ResponseFrameDecoder, encodeRequestFrame } from './framing';

const workerResponseSchema = z.object({
  id: z.string().optional(),
  ok: z.boolean().optional(),
  result: z.unknown().optional(),
  error: z.string().optional()
});

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (reason: Error) => void;
  timeoutHandle: NodeJS.Timeout;
}

export interface PersistentFramedWorkerOptions {
  name: string;
  command: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
  logger?: StructuredLogger;
}

/** Request/response channel to a long-lived worker process. */
export interface FramedTransport {
  start(): Promise<void>;
  request<T>(
    payload: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    timeoutMs: number,
    binaryData?: Buffer
  ): Promise<T>;
  stop(): Promise<void>;
}

const STOP_GRACE_MS = 1500;

/**
 * Child process speaking length-prefixed JSON over stdio, with an optional binary payload per
 * request. Responses are matched to requests by id and validated before they reach the caller.
 */
export class PersistentFramedWorker implements FramedTransport {
  private child: ChildProcessWithoutNullStreams | undefined;
  private startPromise: Promise<void> | undefined;
  private stopping = false;
  private nextRequestId = 0;
  private stderrBuffer = '';
  private readonly decoder = new ResponseFrameDecoder();
  private readonly pending = new Map<string, PendingRequest>();
  private stdinWriteQueue: Promise<void> = Promise.resolve();

  public constructor(private readonly options: PersistentFramedWorkerOptions) {}

  public async start(): Promise<void> {
    if (this.child) {
      return;
    }

    if (this.startPromise) {
      await this.startPromise;
      return;
    }

    this.startPromise = this.spawnWorker();

    try {
      await this.startPromise;
    } finally {
      this.startPromise = undefined;
    }
  }

  public async request<T>(
    payload: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    timeoutMs: number,
    binaryData?: Buffer
  ): Promise<T> {
    await this.start();

    const current = this.child;
    if (!current) {
      throw new Error(`${this.options.name} worker is not running`);
    }

    const requestId = `${Date.now()}-${++this.nextRequestId}`;
    const parts = encodeRequestFrame({ ...payload, id: requestId }, binaryData);

    return new Promise<T>((resolve, reject) => {
      const timeoutHandle = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new Error(`${this.options.name} worker request timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.pending.set(requestId, {
        resolve: (value: unknown) => {
          const parsed = schema.safeParse(value);
          if (!parsed.success) {
            reject(new Error(`${this.options.name} worker returned a malformed result: ${parsed.error.message}`));
            return;
          }

          resolve(parsed.data);
        },
        reject,
        timeoutHandle
      });

      this.stdinWriteQueue = this.stdinWriteQueue
        .then(async () => {
          for (const part of parts) {
            await this.writeToStdin(current, part);
          }
        })
        .catch((error: unknown) => {
          const pending = this.pending.get(requestId);
          if (!pending) {
            return;
          }

          clearTimeout(pending.timeoutHandle);
          this.pending.delete(requestId);
          pending.reject(error instanceof Error ? error : new Error(String(error)));
        });
    });
  }

  public async stop(): Promise<void> {
    this.stopping = true;

    const current = this.child;
    if (!current) {
      return;
    }

    await new Promise<void>((resolve) => {
      let settled = false;

      const finish = (): void => {
        if (settled) {
          return;
        }

        settled = true;
        resolve();
      };

      current.once('close', () => {
        finish();
      });

      setTimeout(() => {
        if (!settled) {
          current.kill('SIGKILL');
          finish();
        }
      }, STOP_GRACE_MS);

      current.kill('SIGTERM');
    });

    this.child = undefined;
  }

  private writeToStdin(child: ChildProcessWithoutNullStreams, data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      child.stdin.write(data, (error) => {
        if (error) {
          reject(error);
          return;
        }

        resolve();
      });
    });
  }

  private async spawnWorker(): Promise<void> {
    this.stopping = false;

    await new Promise<void>((resolve, reject) => {
      const child = spawn(this.options.command, this.options.args, {
        env: this.options.env,
        stdio: 'pipe'
      });

      const onError = (error: Error): void => {
        this.child = undefined;
        reject(error);
      };

      child.once('error', onError);
      child.once('spawn', () => {
        child.off('error', onError);

        this.child = child;
        this.decoder.reset();
        this.stderrBuffer = '';
        this.stdinWriteQueue = Promise.resolve();

        child.on('error', (error) => {
          this.options.logger?.warn(`${this.options.name} worker process error`, { detail: error.message });
        });

        child.stdout.on('data', (chunk: Buffer) => {
          this.handleStdoutChunk(chunk);
        });

        child.stderr.on('data', (chunk: Buffer) => {
          const text = chunk.toString();
          this.stderrBuffer = this.tailString(`${this.stderrBuffer}${text}`, 4000);
          this.options.logger?.debug(`${this.options.name} worker stderr`, {
            detail: text.trim()
          });
        });

        child.on('close', (code, signal) => {
          if (this.stopping) {
            this.options.logger?.info(`${this.options.name} worker stopped`, { code, signal });
          } else {
            this.options.logger?.warn(`${this.options.name} worker exited`, {
              code,
              signal,
              stderr: this.stderrBuffer.trim()
            });
          }

          this.child = undefined;
          this.rejectAllPending(
            new Error(`${this.options.name} worker exited (code=${code}, signal=${signal ?? 'none'})`)
          );
        });

        this.options.logger?.info(`${this.options.name} worker started`, {
          command: this.options.command
        });

        resolve();
      });
    });
  }

  private handleStdoutChunk(chunk: Buffer): void {
    const { bodies, invalidLength } = this.decoder.push(chunk);

    for (const body of bodies) {
      this.dispatchResponse(body);
    }

    if (invalidLength !== undefined) {
      this.options.logger?.warn(`${this.options.name} worker produced an invalid response length`, {
        jsonLength: invalidLength
      });
    }
  }

  private dispatchResponse(body: string): void {
    let decoded: unknown;
    try {
      decoded = JSON.parse(body);
    } catch (error) {
      this.options.logger?.debug(`${this.options.name} worker emitted invalid framed JSON`, {
        detail: error instanceof Error ? error.message : String(error)
      });
      return;
    }

    const envelope = workerResponseSchema.safeParse(decoded);
    if (!envelope.success) {
      this.options.logger?.debug(`${this.options.name} worker response has an unexpected shape`, { body });
      return;
    }

    const { id, ok, result, error } = envelope.data;
    if (!id) {
      this.options.logger?.debug(`${this.options.name} worker response missing id`, { body });
      return;
    }

    const pending = this.pending.get(id);
    if (!pending) {
      this.options.logger?.debug(`${this.options.name} worker response for unknown request`, {
        responseId: id
      });
      return;
    }

    clearTimeout(pending.timeoutHandle);
    this.pending.delete(id);

    if (ok === false) {
      pending.reject(new Error(error ?? `${this.options.name} worker request failed`));
      return;
    }

    pending.resolve(result);
  }

  private rejectAllPending(error: Error): void {
    const entries = Array.from(this.pending.values());
    this.pending.clear();

    for (const entry of entries) {
      clearTimeout(entry.timeoutHandle);
      entry.reject(error);
    }
  }

  private tailString(value: string, maxLength: number): string {
    if (value.length <= maxLength) {
      return value;
    }

    return value.slice(value.length - maxLength);
  }
}
