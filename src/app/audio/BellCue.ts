import { TimedPhase } from '../../shared/types';

const BELL = '\u0007';

export interface SoundCue {
  /** Announces that `endedPhase` just finished. Must return immediately. */
  play(endedPhase: TimedPhase): void;
  stop(): void;
}

export interface BellOutput {
  write(chunk: string): unknown;
}

// Rings per phase: focus end is louder than break end
const RINGS: Record<TimedPhase, number> = {
  focus: 2,
  shortBreak: 1,
  longBreak: 1,
};

/** Terminal-bell sound cue. Repeats are spaced with timers so `play` never blocks. */
export class BellCue implements SoundCue {
  private _pending: ReturnType<typeof setTimeout>[] = [];
  private _muted = false;

  constructor(
    private out: BellOutput,
    private gapMs = 400,
  ) {}

  setMuted(muted: boolean): void {
    this._muted = muted;
    if (muted) this.stop();
  }

  get muted(): boolean { return this._muted; }

  play(endedPhase: TimedPhase): void {
    this.stop();
    if (this._muted) return;

    const rings = RINGS[endedPhase];
    this.out.write(BELL);
    for (let i = 1; i < rings; i++) {
      const handle = setTimeout(() => {
        this._pending = this._pending.filter(h => h !== handle);
        this.out.write(BELL);
      }, i * this.gapMs);
      this._pending.push(handle);
    }
  }

  stop(): void {
    this._pending.forEach(h => clearTimeout(h));
    this._pending = [];
  }
}
