import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import { VoiceActivityDetector } from './VoiceActivityDetector';

const options = {
  enterThreshold: 0.5,
  exitThreshold: 0.3,
  enterFrames: 2,
  exitFrames: 4
};

const LOUD = 0.9;
const QUIET = 0.1;
const MIDDLE = 0.4;

const feed = (vad: VoiceActivityDetector, energies: number[]): void => {
  for (const energy of energies) {
    vad.update(energy);
  }
};

describe('VoiceActivityDetector', () => {
  it('computes frame RMS', () => {
    const vad = new VoiceActivityDetector(options);

    expect(vad.classify(Float32Array.from([0.5, -0.5, 0.5, -0.5]))).toBeCloseTo(0.5);
    expect(vad.classify(new Float32Array(0))).toBe(0);
    expect(vad.classify(new Float32Array(160))).toBe(0);
  });

  it('rejects a hangover no longer than the onset', () => {
    expect(() => new VoiceActivityDetector({ ...options, exitFrames: 2 })).toThrow(
      'VAD exit frames (2) must exceed enter frames (2)'
    );
  });

  it('enters speech only after the configured run of loud frames', () => {
    const vad = new VoiceActivityDetector(options);

    expect(vad.update(LOUD)).toBe('silence');
    expect(vad.update(LOUD)).toBe('speech');
    expect(vad.getLastTransition()).toBe('speech-started');
    expect(vad.hasSpeechSinceBoundary()).toBe(true);
  });

  it('ignores a single loud transient', () => {
    const vad = new VoiceActivityDetector(options);
    feed(vad, [LOUD, QUIET, LOUD, QUIET]);

    expect(vad.state).toBe('silence');
    expect(vad.hasSpeechSinceBoundary()).toBe(false);
  });

  it('stays in speech through pauses shorter than the hangover', () => {
    const vad = new VoiceActivityDetector(options);
    feed(vad, [LOUD, LOUD, QUIET, QUIET, QUIET, LOUD, QUIET, QUIET, QUIET]);

    expect(vad.state).toBe('speech');
    expect(vad.getLastTransition()).toBeUndefined();
  });

  it('treats energy between the thresholds as neither onset nor quiet', () => {
    const vad = new VoiceActivityDetector(options);
    feed(vad, [LOUD, LOUD, QUIET, QUIET, QUIET, MIDDLE, QUIET, QUIET, QUIET]);

    expect(vad.state).toBe('speech');
  });

  it('ends speech after sustained quiet', () => {
    const vad = new VoiceActivityDetector(options);
    feed(vad, [LOUD, LOUD, QUIET, QUIET, QUIET]);
    expect(vad.state).toBe('speech');

    vad.update(QUIET);

    expect(vad.state).toBe('silence');
    expect(vad.getLastTransition()).toBe('speech-ended');
    expect(vad.hasSpeechSinceBoundary()).toBe(true);
  });

  it('clears pending speech at a boundary unless speech is ongoing', () => {
    const vad = new VoiceActivityDetector(options);
    feed(vad, [LOUD, LOUD, QUIET, QUIET, QUIET, QUIET]);
    vad.markBoundary();

    expect(vad.hasSpeechSinceBoundary()).toBe(false);

    feed(vad, [LOUD, LOUD]);
    vad.markBoundary();

    expect(vad.hasSpeechSinceBoundary()).toBe(true);
  });

  it('keeps an utterance that began after the boundary pending', () => {
    const vad = new VoiceActivityDetector(options);
    feed(vad, [LOUD, LOUD, QUIET, QUIET, QUIET, QUIET]);
    vad.markBoundary(true);

    expect(vad.state).toBe('silence');
    expect(vad.hasSpeechSinceBoundary()).toBe(true);
  });

  it('resets to silence', () => {
    const vad = new VoiceActivityDetector(options);
    feed(vad, [LOUD, LOUD]);
    vad.reset();

    expect(vad.state).toBe('silence');
    expect(vad.hasSpeechSinceBoundary()).toBe(false);
  });

  it('never flips state without a full run of qualifying frames', () => {
    fc.assert(
      fc.property(fc.array(fc.constantFrom(LOUD, MIDDLE, QUIET), { maxLength: 120 }), (energies) => {
        const vad = new VoiceActivityDetector(options);
        let previous = vad.state;

        energies.forEach((energy, index) => {
          const next = vad.update(energy);
          if (previous === 'silence' && next === 'speech') {
            const run = energies.slice(index - options.enterFrames + 1, index + 1);
            expect(run).toHaveLength(options.enterFrames);
            expect(run.every((value) => value > options.enterThreshold)).toBe(true);
          }

          if (previous === 'speech' && next === 'silence') {
            const run = energies.slice(index - options.exitFrames + 1, index + 1);
            expect(run).toHaveLength(options.exitFrames);
            expect(run.every((value) => value < options.exitThreshold)).toBe(true);
          }

          previous = next;
        });
      })
    );
  });
});
