import { describe, expect, it } from 'vitest';
import { tone } from '../testing/fakes';
import { LiveSession } from './LiveSession';

const FRAME = 1600;

const createSession = (): LiveSession =>
  new LiveSession(1, {
    sampleRate: 16000,
    bufferSeconds: 12,
    vad: { enterThreshold: 0.1, exitThreshold: 0.05, enterFrames: 2, exitFrames: 3 },
    stability: { stabilityPasses: 2, artifactPhrases: [] }
  });

const feed = (session: LiveSession, amplitude: number, times: number): void => {
  for (let index = 0; index < times; index += 1) {
    session.acceptFrame(tone(FRAME, amplitude));
  }
};

describe('LiveSession', () => {
  it('drops an utterance that ended before the committed position', () => {
    const session = createSession();
    feed(session, 0.5, 2);
    feed(session, 0, 3);

    expect(session.hasPendingUtterance()).toBe(true);

    session.commitBoundary(5 * FRAME);

    expect(session.hasPendingUtterance()).toBe(false);
    expect(session.vad.hasSpeechSinceBoundary()).toBe(false);
    expect(session.buffer.available).toBe(0);
  });

  it('keeps an utterance that started at or after the committed position', () => {
    const session = createSession();
    feed(session, 0.5, 2);
    feed(session, 0, 3);
    feed(session, 0.5, 2);
    feed(session, 0, 3);

    session.commitBoundary(5 * FRAME);

    expect(session.hasPendingUtterance()).toBe(true);
    expect(session.buffer.available).toBe(5 * FRAME);
  });

  it('keeps an utterance that is still going at the boundary', () => {
    const session = createSession();
    feed(session, 0.5, 4);

    session.commitBoundary(2 * FRAME);

    expect(session.vad.hasSpeechSinceBoundary()).toBe(true);
    expect(session.hasPendingUtterance()).toBe(false);
  });
});
