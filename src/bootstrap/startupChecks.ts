import fs from 'node:fs';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import type { StructuredLogger } from '../logging/StructuredLogger';
import { type CommandRunner, runCommand } from '../services/process/runCommand';
import type { AppConfig } from '../types';

export type StartupCheckConfig = Pick<AppConfig, 'modelPath' | 'workerBin' | 'textInjectBin'>;

export interface StartupCheckOptions {
  /** Skip the keystroke checks when output goes somewhere other than the focused app. */
  checkInjection?: boolean;
  runner?: CommandRunner;
}

const assertPathExists = (absolutePath: string, label: string): void => {
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`${label} not found at '${absolutePath}'. Update your StreamScribe env config.`);
  }
};

const assertExecutable = (absolutePath: string, label: string): void => {
  assertPathExists(absolutePath, label);

  try {
    fs.accessSync(absolutePath, fsConstants.X_OK);
  } catch {
    throw new Error(`${label} at '${absolutePath}' is not executable.`);
  }
};

export const runStartupChecks = async (
  config: StartupCheckConfig,
  logger?: StructuredLogger,
  options: StartupCheckOptions = {}
): Promise<void> => {
  const run = options.runner ?? runCommand;
  logger?.info('Running startup checks');

  assertPathExists(path.resolve(config.modelPath), 'Transcription model');

  const workerPath = path.resolve(config.workerBin);
  assertExecutable(workerPath, 'Transcription worker binary');
  await run(workerPath, ['--healthcheck'], { timeoutMs: 8000 });

  await run('ffmpeg', ['-version'], { timeoutMs: 8000 });

  if (options.checkInjection ?? true) {
    const injectPath = path.resolve(config.textInjectBin);
    if (fs.existsSync(injectPath)) {
      assertExecutable(injectPath, 'Native text injector binary');
      await run(injectPath, ['--healthcheck'], { timeoutMs: 8000 });
    } else {
      logger?.warn('Native text injector binary not found; osascript fallback remains active', {
        binaryPath: injectPath
      });
      await run('osascript', ['-e', 'return "ok"'], { timeoutMs: 8000 });
    }
  }

  logger?.info('Startup checks completed successfully');
};
