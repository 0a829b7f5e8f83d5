import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CommandRunner } from '../services/process/runCommand';
import { runStartupChecks, type StartupCheckConfig } from './startupChecks';

describe('runStartupChecks', () => {
  let tempDir: string;
  let config: StartupCheckConfig;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'streamscribe-checks-'));
    const modelPath = path.join(tempDir, 'model.bin');
    const workerBin = path.join(tempDir, 'worker');
    fs.writeFileSync(modelPath, 'model');
    fs.writeFileSync(workerBin, '#!/bin/sh\n', { mode: 0o755 });
    config = { modelPath, workerBin, textInjectBin: path.join(tempDir, 'missing-injector') };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const okRunner = () => vi.fn<CommandRunner>().mockResolvedValue({ stdout: 'ok', stderr: '' });

  it('health-checks the worker and the capture tool, then falls back to osascript', async () => {
    const runner = okRunner();

    await runStartupChecks(config, undefined, { runner });

    expect(runner.mock.calls.map((call) => [call[0], call[1]])).toEqual([
      [config.workerBin, ['--healthcheck']],
      ['ffmpeg', ['-version']],
      ['osascript', ['-e', 'return "ok"']]
    ]);
  });

  it('health-checks the native injector when it is installed', async () => {
    const injector = path.join(tempDir, 'injector');
    fs.writeFileSync(injector, '#!/bin/sh\n', { mode: 0o755 });
    const runner = okRunner();

    await runStartupChecks({ ...config, textInjectBin: injector }, undefined, { runner });

    expect(runner.mock.calls[2][0]).toBe(injector);
    expect(runner.mock.calls[2][1]).toEqual(['--healthcheck']);
  });

  it('skips keystroke checks when asked to', async () => {
    const runner = okRunner();

    await runStartupChecks(config, undefined, { runner, checkInjection: false });

    expect(runner).toHaveBeenCalledTimes(2);
  });

  it('fails fast on a missing model', async () => {
    const runner = okRunner();
    const modelPath = path.join(tempDir, 'nope.bin');

    await expect(runStartupChecks({ ...config, modelPath }, undefined, { runner })).rejects.toThrow(
      `Transcription model not found at '${modelPath}'. Update your StreamScribe env config.`
    );
    expect(runner).not.toHaveBeenCalled();
  });

  it('propagates a failing health check', async () => {
    const runner = vi.fn<CommandRunner>().mockRejectedValue(new Error('Command failed (1): worker'));

    await expect(runStartupChecks(config, undefined, { runner })).rejects.toThrow('Command failed (1): worker');
  });
});
