import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CommandRunner } from '../process/runCommand';
import { OsascriptKeystrokeSurface } from './OsascriptKeystrokeSurface';

describe('OsascriptKeystrokeSurface', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'streamscribe-inject-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('presses backspace through System Events when no native helper exists', async () => {
    const commandRunner = vi.fn<CommandRunner>().mockResolvedValue({ stdout: '', stderr: '' });
    const surface = new OsascriptKeystrokeSurface({ retryCount: 2, retryDelayMs: 0, commandRunner });

    await surface.delete(3);

    expect(commandRunner).toHaveBeenCalledTimes(1);
    const [command, args] = commandRunner.mock.calls[0];
    expect(command).toBe('osascript');
    expect(args).toContain('key code 51');
    expect(args.at(-1)).toBe('3');
  });

  it('sends inserted text to the native helper on stdin', async () => {
    const binaryPath = path.join(tempDir, 'text-injector');
    fs.writeFileSync(binaryPath, '');
    const commandRunner = vi.fn<CommandRunner>().mockResolvedValue({ stdout: '', stderr: '' });
    const surface = new OsascriptKeystrokeSurface({
      nativeBinaryPath: binaryPath,
      retryCount: 2,
      retryDelayMs: 0,
      commandRunner
    });

    await surface.insert('héllo');

    expect(commandRunner).toHaveBeenCalledWith(binaryPath, ['--mode', 'insert'], {
      stdin: 'héllo',
      timeoutMs: 2500
    });
  });

  it('falls back to osascript when the native helper fails', async () => {
    const binaryPath = path.join(tempDir, 'text-injector');
    fs.writeFileSync(binaryPath, '');
    const commandRunner = vi
      .fn<CommandRunner>()
      .mockRejectedValueOnce(new Error('not trusted'))
      .mockResolvedValue({ stdout: '', stderr: '' });
    const surface = new OsascriptKeystrokeSurface({
      nativeBinaryPath: binaryPath,
      retryCount: 1,
      retryDelayMs: 0,
      commandRunner
    });

    await surface.delete(2);

    expect(commandRunner.mock.calls.map((call) => call[0])).toEqual([binaryPath, 'osascript']);
    expect(commandRunner.mock.calls[0][1]).toEqual(['--mode', 'delete', '--count', '2']);
  });

  it('rejects once every attempt has failed', async () => {
    const commandRunner = vi.fn<CommandRunner>().mockRejectedValue(new Error('no focused element'));
    const surface = new OsascriptKeystrokeSurface({ retryCount: 2, retryDelayMs: 0, commandRunner });

    await expect(surface.insert('text')).rejects.toThrow(
      'Keystroke insert of 4 failed after 2 attempts. osascript attempt 1: no focused element | osascript attempt 2: no focused element'
    );
    expect(commandRunner).toHaveBeenCalledTimes(2);
  });

  it('does nothing for empty edits', async () => {
    const commandRunner = vi.fn<CommandRunner>();
    const surface = new OsascriptKeystrokeSurface({ retryCount: 1, retryDelayMs: 0, commandRunner });

    await surface.delete(0);
    await surface.insert('');

    expect(commandRunner).not.toHaveBeenCalled();
  });
});
