import { TimerStatus, TimerSnapshot } from '../../shared/types';
import { Emitter } from '../../shared/emitter';

interface TimerEvents {
  tick: TimerSnapshot;
  stateChange: TimerSnapshot;
  finished: TimerSnapshot;
}

/**
 * One-second countdown. Time only moves when the owner calls `tick()`,
 * so the host event loop decides the cadence.
 */
export class TimerState {
  private _status: TimerStatus = 'idle';
  private _label = '';
  private _totalSeconds = 0;
  private _remainingSeconds = 0;
  private _events = new Emitter<TimerEvents>();

  on(event: keyof TimerEvents, fn: (snapshot: TimerSnapshot) => void): void {
    this._events.on(event, fn);
  }

  off(event: keyof TimerEvents, fn: (snapshot: TimerSnapshot) => void): void {
    this._events.off(event, fn);
  }

  private _emit(event: keyof TimerEvents): void {
    this._events.emit(event, this.snapshot());
  }

  snapshot(): TimerSnapshot {
    return {
      status: this._status,
      label: this._label,
      totalSeconds: this._totalSeconds,
      remainingSeconds: this._remainingSeconds,
      progress: this._totalSeconds > 0 ? 1 - this._remainingSeconds / this._totalSeconds : 0,
    };
  }

  get status(): TimerStatus { return this._status; }
  get label(): string { return this._label; }
  get totalSeconds(): number { return this._totalSeconds; }
  get remainingSeconds(): number { return this._remainingSeconds; }

  configure(label: string, durationSeconds: number): void {
    this._status = 'idle';
    this._label = label;
    this._totalSeconds = durationSeconds;
    this._remainingSeconds = durationSeconds;
    this._emit('stateChange');
  }

  /** Starts a configured countdown or resumes a paused one. */
  start(): void {
    if (this._status === 'running' || this._status === 'finished') return;
    if (this._remainingSeconds <= 0) return;
    this._status = 'running';
    this._emit('stateChange');
  }

  pause(): void {
    if (this._status !== 'running') return;
    this._status = 'paused';
    this._emit('stateChange');
  }

  reset(): void {
    this._status = 'idle';
    this._label = '';
    this._totalSeconds = 0;
    this._remainingSeconds = 0;
    this._emit('stateChange');
  }

  /**
   * Advances the countdown by one second. Ignored unless running.
   * Returns true when this tick brought the countdown to zero.
   */
  tick(): boolean {
    if (this._status !== 'running') return false;

    this._remainingSeconds = Math.max(0, this._remainingSeconds - 1);
    this._emit('tick');

    if (this._remainingSeconds > 0) return false;
    this._finish();
    return true;
  }

  /** Ends the countdown immediately, whatever is left on it. */
  finish(): void {
    if (this._status === 'finished' || this._totalSeconds <= 0) return;
    this._remainingSeconds = 0;
    this._finish();
  }

  private _finish(): void {
    this._status = 'finished';
    this._emit('stateChange');
    this._emit('finished');
  }
}
