import { describe, expect, it } from 'vitest';
import { ffmpegCaptureArgs, normalizeMicError } from './FfmpegRecorder';

describe('ffmpegCaptureArgs', () => {
  it('asks for mono s16le at the session rate on stdout', () => {
    expect(ffmpegCaptureArgs('pulse', 'default', 16000)).toEqual([
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      'pulse',
      '-i',
      'default',
      '-ac',
      '1',
      '-ar',
      '16000',
      '-f',
      's16le',
      '-acodec',
      'pcm_s16le',
      'pipe:1'
    ]);
  });
});

describe('normalizeMicError', () => {
  it('explains permission failures', () => {
    expect(normalizeMicError('[avfoundation] Operation not permitted')).toMatch(/^Microphone permission denied\./);
  });

  it('points at the device settings when the input is missing', () => {
    expect(normalizeMicError(':3: No such file or directory')).toBe(
      'Microphone input device is unavailable. Check STREAMSCRIBE_FFMPEG_FORMAT and STREAMSCRIBE_FFMPEG_INPUT.'
    );
  });

  it('passes other detail through and has a fallback for silence', () => {
    expect(normalizeMicError('  codec mismatch \n')).toBe('Microphone capture failed: codec mismatch');
    expect(normalizeMicError('')).toBe(
      'Microphone capture failed. Verify ffmpeg availability and microphone permissions.'
    );
  });
});
