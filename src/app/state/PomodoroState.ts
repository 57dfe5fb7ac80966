import {
  PhaseCompletion,
  PomodoroPhase,
  PomodoroSnapshot,
  Task,
  TimedPhase,
  TimerConfig,
} from '../../shared/types';
import { Emitter } from '../../shared/emitter';
import { TimerState } from './TimerState';

/** Whoever owns the active task; credited when a focus phase completes. */
export interface ActiveTaskSource {
  activeId(): string | null;
  creditActive(): Task | null;
}

interface PomodoroEvents {
  phaseChange: PomodoroSnapshot;
  phaseComplete: PhaseCompletion;
}

const PHASE_LABELS: Record<Exclude<TimedPhase, 'focus'>, string> = {
  shortBreak: 'Short Break',
  longBreak: 'Long Break',
};

export class PomodoroState {
  private _phase: PomodoroPhase = 'idle';
  private _sessionCount = 0;
  private _config: TimerConfig;
  private _skipping = false;
  private _completion: PhaseCompletion | null = null;
  private _events = new Emitter<PomodoroEvents>();

  constructor(
    private timer: TimerState,
    config: TimerConfig,
    private tasks?: ActiveTaskSource,
  ) {
    this._config = { ...config };
    this.timer.on('finished', () => {
      if (this._phase === 'idle') return;
      this._completion = this._onPhaseComplete();
    });
  }

  on<K extends keyof PomodoroEvents>(event: K, fn: (payload: PomodoroEvents[K]) => void): void {
    this._events.on(event, fn);
  }

  off<K extends keyof PomodoroEvents>(event: K, fn: (payload: PomodoroEvents[K]) => void): void {
    this._events.off(event, fn);
  }

  snapshot(): PomodoroSnapshot {
    return {
      phase: this._phase,
      status: this.timer.status,
      remainingSeconds: this.timer.remainingSeconds,
      totalSeconds: this.timer.totalSeconds,
      sessionCount: this._sessionCount,
      activeTaskId: this.tasks?.activeId() ?? null,
    };
  }

  get phase(): PomodoroPhase { return this._phase; }
  get sessionCount(): number { return this._sessionCount; }
  get config(): TimerConfig { return { ...this._config }; }

  /** Duration of a timed phase, in seconds. */
  phaseDurationSeconds(phase: TimedPhase): number {
    switch (phase) {
      case 'focus': return this._config.focusMinutes * 60;
      case 'shortBreak': return this._config.shortBreakMinutes * 60;
      case 'longBreak': return this._config.longBreakMinutes * 60;
    }
  }

  /** From Idle, begins a focus phase; otherwise resumes the loaded phase. */
  start(): void {
    if (this._phase === 'idle') this._setupPhase('focus');
    this.timer.start();
  }

  pause(): void {
    this.timer.pause();
  }

  resume(): void {
    if (this.timer.status !== 'paused') return;
    this.timer.start();
  }

  /** Back to Idle. The session counter is kept. */
  reset(): void {
    this._phase = 'idle';
    this.timer.reset();
    this._events.emit('phaseChange', this.snapshot());
  }

  tick(): PhaseCompletion | null {
    this._completion = null;
    this.timer.tick();
    return this._takeCompletion();
  }

  /** Completes the current phase now. Nothing to skip while idle. */
  skip(): PhaseCompletion | null {
    if (this._phase === 'idle') return null;
    this._completion = null;
    this._skipping = true;
    try {
      this.timer.finish();
    } finally {
      this._skipping = false;
    }
    return this._takeCompletion();
  }

  /** New durations restart the cycle from Idle. */
  applyConfig(config: TimerConfig): void {
    this._config = { ...config };
    this._sessionCount = 0;
    this.reset();
  }

  private _takeCompletion(): PhaseCompletion | null {
    const completion = this._completion;
    this._completion = null;
    return completion;
  }

  private _setupPhase(phase: TimedPhase): void {
    this._phase = phase;
    const label = phase === 'focus' ? `Focus #${this._sessionCount + 1}` : PHASE_LABELS[phase];
    this.timer.configure(label, this.phaseDurationSeconds(phase));
    this._events.emit('phaseChange', this.snapshot());
  }

  private _onPhaseComplete(): PhaseCompletion | null {
    const ended = this._phase;
    if (ended === 'idle') return null;

    let creditedTask: Task | null = null;
    let next: TimedPhase;
    if (ended === 'focus') {
      this._sessionCount++;
      creditedTask = this.tasks?.creditActive() ?? null;
      if (this._sessionCount >= this._config.longBreakInterval) {
        next = 'longBreak';
        this._sessionCount = 0;
      } else {
        next = 'shortBreak';
      }
    } else {
      next = 'focus';
    }

    const completion: PhaseCompletion = {
      endedPhase: ended,
      nextPhase: next,
      sessionCount: this._sessionCount,
      creditedTask,
      skipped: this._skipping,
    };
    this._setupPhase(next);
    this._events.emit('phaseComplete', completion);
    return completion;
  }
}
