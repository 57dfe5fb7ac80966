export type TimerStatus = 'idle' | 'running' | 'paused' | 'finished';

export type PomodoroPhase = 'idle' | 'focus' | 'shortBreak' | 'longBreak';

/** Phases that have a configured duration. */
export type TimedPhase = Exclude<PomodoroPhase, 'idle'>;

export interface TimerSnapshot {
  status: TimerStatus;
  label: string;
  totalSeconds: number;
  remainingSeconds: number;
  progress: number; // 0..1, fraction elapsed
}

export interface TimerConfig {
  focusMinutes: number;
  shortBreakMinutes: number;
  longBreakMinutes: number;
  longBreakInterval: number; // focus sessions before a long break
}

export interface Preferences {
  darkMode: boolean;
}

export type Settings = TimerConfig & Preferences;

export interface Task {
  id: string;
  text: string;
  pomodoros: number;  // completed focus sessions credited to this task
  estimated: number;
  position: number;   // 0-based, dense
  completed: boolean;
}

export interface TaskPatch {
  text?: string;
  estimated?: number;
}

export interface PomodoroSnapshot {
  phase: PomodoroPhase;
  status: TimerStatus;
  remainingSeconds: number;
  totalSeconds: number;
  sessionCount: number; // focus completions since the last long break
  activeTaskId: string | null;
}

export interface PhaseCompletion {
  endedPhase: TimedPhase;
  nextPhase: TimedPhase;
  sessionCount: number;
  creditedTask: Task | null;
  skipped: boolean;
}

export interface PersistedRecord {
  version: 1;
  settings: Settings;
  tasks: Task[];
}
