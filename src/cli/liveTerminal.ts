#!/usr/bin/env node
import 'dotenv/config';
import readline from 'node:readline';
import { runStartupChecks } from '../bootstrap/startupChecks';
import { resolveConfig, validateConfig } from '../config';
import { SessionController, controllerOptionsFromConfig } from '../core/SessionController';
import { StructuredLogger } from '../logging/StructuredLogger';
import { WhisperWorkerClient } from '../services/asr/WhisperWorkerClient';
import { FfmpegRecorder } from '../services/capture/FfmpegRecorder';
import { TerminalKeystrokeSurface } from '../services/inject/TerminalKeystrokeSurface';

const printHelp = (): void => {
  process.stdout.write('\n');
  process.stdout.write('Commands:\n');
  process.stdout.write('  <enter>             Start/stop dictation\n');
  process.stdout.write('  /status             Print current state and transcript\n');
  process.stdout.write('  /quit               Exit\n');
  process.stdout.write('\n');
};

const main = async (): Promise<void> => {
  const config = resolveConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
  }

  // Live text goes to stdout, so only warnings reach the console.
  const logger = await StructuredLogger.create(config.logDir, { consoleLevel: 'warn' });

  const controller = new SessionController(
    {
      recorder: new FfmpegRecorder({
        inputFormat: config.ffmpegInputFormat,
        inputDevice: config.ffmpegInputDevice,
        sampleRate: config.sampleRate,
        logger
      }),
      transcriber: new WhisperWorkerClient(config, logger),
      surface: new TerminalKeystrokeSurface(process.stdout)
    },
    controllerOptionsFromConfig(config),
    logger
  );

  let shuttingDown = false;
  let commandChain = Promise.resolve();

  const queue = (fn: () => Promise<void>): void => {
    commandChain = commandChain.then(fn).catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      process.stderr.write(`\n[error] ${detail}\n`);
    });
  };

  controller.on('stateChanged', (state) => {
    if (state.stage === 'error' && state.detail) {
      process.stderr.write(`\n[state:error] ${state.detail}\n`);
      return;
    }

    if (state.stage === 'recording' && !controller.getTranscript()?.fullText) {
      process.stdout.write('\n[listening]\n');
    }
  });

  controller.on('sessionCompleted', (report) => {
    process.stdout.write('\n\n--- dictation completed ---\n');
    process.stdout.write(`text: ${report.committedText}\n`);
    process.stdout.write(
      `passes: ${report.passes}  asr p50: ${report.latency.asrMs.p50}ms  skipped ticks: ${report.latency.skippedTicks}\n`
    );
    process.stdout.write('---------------------------\n\n');
  });

  await runStartupChecks(config, logger, { checkInjection: false });
  process.stdout.write('Warming up transcription worker...\n');
  await controller.warmupWorkers();
  process.stdout.write('Ready.\n');
  process.stdout.write(`Model: ${config.modelPath}\n`);
  process.stdout.write(`Input: ${config.ffmpegInputFormat} ${config.ffmpegInputDevice}\n`);
  printHelp();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true
  });

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    await controller.shutdown();
    await logger.flush();
    rl.close();
    process.stdout.write('\nBye.\n');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    queue(shutdown);
  });

  rl.on('line', (line) => {
    const input = line.trim();

    if (input === '/quit') {
      queue(shutdown);
      return;
    }

    if (input === '/status') {
      const state = controller.getState();
      const transcript = controller.getTranscript();
      process.stdout.write(`[status] stage=${state.stage}${state.detail ? ` detail=${state.detail}` : ''}\n`);
      if (transcript) {
        process.stdout.write(`[committed] ${transcript.committedText}\n`);
        process.stdout.write(`[tentative] ${transcript.tentativeText}\n`);
      }
      return;
    }

    if (input === '/help') {
      printHelp();
      return;
    }

    if (input.length > 0) {
      process.stdout.write('Unknown command. Use /help, /status, or /quit.\n');
      return;
    }

    queue(() => controller.handleToggle());
  });
};

main().catch((error: unknown) => {
  const detail = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${detail}\n`);
  process.exit(1);
});
