import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StructuredLogger } from './StructuredLogger';

describe('StructuredLogger', () => {
  let logDir: string;

  beforeEach(async () => {
    logDir = await fs.mkdtemp(path.join(os.tmpdir(), 'streamscribe-log-'));
  });

  afterEach(async () => {
    await fs.rm(logDir, { recursive: true, force: true });
  });

  it('writes one JSON object per line with level, message and context', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = await StructuredLogger.create(logDir);

    logger.info('Session started', { sessionId: 3 });
    logger.warn('Injection failed', { detail: 'focus lost' });
    await logger.flush();

    const lines = (await fs.readFile(logger.getLogPath(), 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);

    const first: unknown = JSON.parse(lines[0]);
    expect(first).toMatchObject({ level: 'info', message: 'Session started', sessionId: 3 });

    const second: unknown = JSON.parse(lines[1]);
    expect(second).toMatchObject({ level: 'warn', message: 'Injection failed', detail: 'focus lost' });
  });

  it('names the file after the current date', async () => {
    const logger = await StructuredLogger.create(logDir);
    const datePrefix = new Date().toISOString().slice(0, 10);

    expect(path.basename(logger.getLogPath())).toBe(`streamscribe-${datePrefix}.log`);
  });

  it('keeps lines below the console level off the console but still in the file', async () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = await StructuredLogger.create(logDir, { consoleLevel: 'warn' });

    logger.debug('Tick gated');
    logger.info('Pass applied');
    logger.warn('Inference failed');
    await logger.flush();

    expect(consoleLog).not.toHaveBeenCalled();
    expect(consoleWarn).toHaveBeenCalledTimes(1);
    expect(consoleWarn).toHaveBeenCalledWith('[streamscribe] Inference failed', {});

    const lines = (await fs.readFile(logger.getLogPath(), 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(3);
  });
});
