import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BellCue } from '../BellCue';

describe('BellCue', () => {
  let written: string[];
  let bell: BellCue;

  beforeEach(() => {
    vi.useFakeTimers();
    written = [];
    bell = new BellCue({ write: (chunk: string) => written.push(chunk) }, 400);
  });

  afterEach(() => {
    bell.stop();
    vi.useRealTimers();
  });

  it('rings once right away without waiting', () => {
    bell.play('shortBreak');
    expect(written).toEqual(['\u0007']);
    vi.advanceTimersByTime(2000);
    expect(written).toHaveLength(1);
  });

  it('rings twice after a focus phase', () => {
    bell.play('focus');
    expect(written).toHaveLength(1);
    vi.advanceTimersByTime(400);
    expect(written).toEqual(['\u0007', '\u0007']);
  });

  it('stop cancels pending rings', () => {
    bell.play('focus');
    bell.stop();
    vi.advanceTimersByTime(1000);
    expect(written).toHaveLength(1);
  });

  it('stays silent when muted', () => {
    bell.setMuted(true);
    bell.play('longBreak');
    expect(written).toEqual([]);
    expect(bell.muted).toBe(true);
  });
});
