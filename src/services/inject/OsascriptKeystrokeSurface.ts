import fs from 'node:fs';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import { type CommandRunner, runCommand } from '../process/runCommand';
import type { KeystrokeSurface } from './KeystrokeSurface';

interface OsascriptKeystrokeSurfaceOptions {
  nativeBinaryPath?: string;
  retryCount: number;
  retryDelayMs: number;
  commandRunner?: CommandRunner;
  logger?: StructuredLogger;
}

const sleep = async (ms: number): Promise<void> => {
  if (ms <= 0) {
    return;
  }

  await new Promise((resolve) => setTimeout(resolve, ms));
};

const osascriptArgsForBackspace = (count: number): string[] => [
  '-e',
  'on run argv',
  '-e',
  'set deleteCount to (item 1 of argv) as integer',
  '-e',
  'tell application "System Events"',
  '-e',
  'repeat deleteCount times',
  '-e',
  'key code 51',
  '-e',
  'end repeat',
  '-e',
  'end tell',
  '-e',
  'end run',
  '--',
  String(count)
];

const osascriptArgsForKeystroke = (text: string): string[] => [
  '-e',
  'on run argv',
  '-e',
  'set targetText to item 1 of argv',
  '-e',
  'tell application "System Events"',
  '-e',
  'keystroke targetText',
  '-e',
  'end tell',
  '-e',
  'end run',
  '--',
  text
];

/**
 * Synthetic keystrokes at the frontmost app's caret. Prefers the native helper, which posts
 * CGEvents directly, and falls back to System Events scripting.
 */
export class OsascriptKeystrokeSurface implements KeystrokeSurface {
  private readonly nativeBinaryPath?: string;
  private readonly retryCount: number;
  private readonly retryDelayMs: number;
  private readonly commandRunner: CommandRunner;
  private readonly logger?: StructuredLogger;

  public constructor(options: OsascriptKeystrokeSurfaceOptions) {
    if (options.nativeBinaryPath && fs.existsSync(options.nativeBinaryPath)) {
      this.nativeBinaryPath = options.nativeBinaryPath;
    } else if (options.nativeBinaryPath) {
      options.logger?.warn('Native text injector binary not found; using osascript keystrokes', {
        binaryPath: options.nativeBinaryPath
      });
    }

    this.retryCount = Math.max(1, options.retryCount);
    this.retryDelayMs = options.retryDelayMs;
    this.commandRunner = options.commandRunner ?? runCommand;
    this.logger = options.logger;
  }

  public async delete(count: number): Promise<void> {
    if (count <= 0) {
      return;
    }

    await this.withRetries('delete', count, async (binaryPath) => {
      if (binaryPath) {
        await this.commandRunner(binaryPath, ['--mode', 'delete', '--count', String(count)], {
          timeoutMs: 2500
        });
        return;
      }

      await this.commandRunner('osascript', osascriptArgsForBackspace(count), { timeoutMs: 4000 });
    });
  }

  public async insert(text: string): Promise<void> {
    if (text.length === 0) {
      return;
    }

    await this.withRetries('insert', text.length, async (binaryPath) => {
      if (binaryPath) {
        await this.commandRunner(binaryPath, ['--mode', 'insert'], { stdin: text, timeoutMs: 2500 });
        return;
      }

      await this.commandRunner('osascript', osascriptArgsForKeystroke(text), { timeoutMs: 4000 });
    });
  }

  private async withRetries(
    operation: 'delete' | 'insert',
    size: number,
    attemptOnce: (binaryPath: string | undefined) => Promise<void>
  ): Promise<void> {
    const failures: string[] = [];

    for (let attempt = 1; attempt <= this.retryCount; attempt += 1) {
      if (this.nativeBinaryPath) {
        try {
          await attemptOnce(this.nativeBinaryPath);
          return;
        } catch (error) {
          const detail = error instanceof Error ? error.message : String(error);
          failures.push(`native attempt ${attempt}: ${detail}`);
          this.logger?.warn('Native keystroke injection failed; trying osascript', {
            operation,
            attempt,
            detail
          });
        }
      }

      try {
        await attemptOnce(undefined);
        return;
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        failures.push(`osascript attempt ${attempt}: ${detail}`);
        this.logger?.warn('Osascript keystroke injection failed', { operation, attempt, detail });
      }

      if (attempt < this.retryCount) {
        await sleep(this.retryDelayMs);
      }
    }

    throw new Error(
      `Keystroke ${operation} of ${size} failed after ${this.retryCount} attempts. ${failures.slice(-4).join(' | ')}`
    );
  }
}
