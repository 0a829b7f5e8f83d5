#!/usr/bin/env node
import 'dotenv/config';
import { runStartupChecks } from './bootstrap/startupChecks';
import { resolveConfig, validateConfig } from './config';
import { SessionController, controllerOptionsFromConfig } from './core/SessionController';
import { StructuredLogger } from './logging/StructuredLogger';
import { WhisperWorkerClient } from './services/asr/WhisperWorkerClient';
import { FfmpegRecorder } from './services/capture/FfmpegRecorder';
import { ToggleHotkey } from './services/hotkey/ToggleHotkey';
import { OsascriptKeystrokeSurface } from './services/inject/OsascriptKeystrokeSurface';

let hotkeyHandler: ToggleHotkey | undefined;
let controller: SessionController | undefined;
let logger: StructuredLogger | undefined;
let shuttingDown = false;

const bootstrap = async (): Promise<void> => {
  const config = resolveConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    throw new Error(`Invalid StreamScribe configuration:\n- ${configErrors.join('\n- ')}`);
  }

  logger = await StructuredLogger.create(config.logDir, { consoleLevel: config.consoleLogLevel });
  logger.info('StreamScribe bootstrap started', {
    logPath: logger.getLogPath(),
    hotkey: config.hotkey,
    modelPath: config.modelPath
  });

  controller = new SessionController(
    {
      recorder: new FfmpegRecorder({
        inputFormat: config.ffmpegInputFormat,
        inputDevice: config.ffmpegInputDevice,
        sampleRate: config.sampleRate,
        logger
      }),
      transcriber: new WhisperWorkerClient(config, logger),
      surface: new OsascriptKeystrokeSurface({
        nativeBinaryPath: config.textInjectBin,
        retryCount: config.injectionRetryCount,
        retryDelayMs: config.injectionRetryDelayMs,
        logger
      })
    },
    controllerOptionsFromConfig(config),
    logger
  );

  const activeController = controller;
  hotkeyHandler = new ToggleHotkey(
    config.hotkey,
    config.toggleDebounceMs,
    () => activeController.handleToggle(),
    logger
  );

  await runStartupChecks(config, logger);
  await activeController.warmupWorkers();
  await hotkeyHandler.start();
  logger.info('Ready; press the hotkey to start and stop dictation', { hotkey: hotkeyHandler.describeBinding() });
};

const shutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) {
    return;
  }

  shuttingDown = true;
  logger?.info('Shutting down', { signal });
  hotkeyHandler?.stop();
  await controller?.shutdown();
  await logger?.flush();
  process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      process.stderr.write(`Shutdown failed: ${detail}\n`);
      process.exit(1);
    });
  });
}

bootstrap().catch(async (error: unknown) => {
  const detail = error instanceof Error ? error.message : String(error);
  controller?.setError(detail);
  logger?.error('Fatal bootstrap failure', { detail });
  await logger?.flush();
  hotkeyHandler?.stop();
  await controller?.shutdown();

  process.stderr.write(`StreamScribe startup error: ${detail}\n\nCheck your .env settings for worker and model paths and retry.\n`);
  process.exit(1);
});
