import {
  PersistedRecord,
  PhaseCompletion,
  PomodoroSnapshot,
  Settings,
  Task,
} from '../shared/types';
import { Emitter } from '../shared/emitter';
import { LedgerError, PersistenceError, InvalidConfigurationError } from '../shared/errors';
import { TimerState } from './state/TimerState';
import { PomodoroState } from './state/PomodoroState';
import { TaskLedger } from './state/TaskLedger';
import { SoundCue } from './audio/BellCue';
import { RecordStorage, StoredRecord } from './storage/JsonFileStorage';
import { DEFAULT_SETTINGS, parseSettings, parseTimerConfig, toTimerConfig } from './settings';
import { DEFAULT_TICK_MS, Ticker } from './Ticker';

const MAX_PENDING_WARNINGS = 20;

export interface AppContextOptions {
  storage: RecordStorage;
  sound?: SoundCue;
  tickMs?: number;
  newId?: () => string;
}

export interface AppSnapshot extends PomodoroSnapshot {
  darkMode: boolean;
}

interface AppEvents {
  tick: AppSnapshot;
  phaseChange: AppSnapshot;
  phaseComplete: PhaseCompletion;
  tasksChange: Task[];
  warning: LedgerError;
}

interface LoadResult {
  settings: Settings;
  tasks: Task[];
  warnings: LedgerError[];
  fresh: boolean;
}

function loadRecord(storage: RecordStorage): LoadResult {
  const warnings: LedgerError[] = [];
  let stored: StoredRecord | null;
  try {
    stored = storage.load();
  } catch (err) {
    if (!(err instanceof PersistenceError)) throw err;
    warnings.push(err);
    stored = null;
  }
  if (!stored) {
    return { settings: { ...DEFAULT_SETTINGS }, tasks: [], warnings, fresh: warnings.length === 0 };
  }

  let settings: Settings;
  try {
    settings = parseSettings(stored.settings);
  } catch (err) {
    if (!(err instanceof InvalidConfigurationError)) throw err;
    warnings.push(err);
    settings = { ...DEFAULT_SETTINGS };
  }
  return { settings, tasks: stored.tasks, warnings, fresh: false };
}

/**
 * Owns the timer, the task ledger and their persistence for one session.
 * Create with `AppContext.init()`, release with `dispose()`.
 */
export class AppContext {
  readonly tasks: TaskLedger;
  private _timer = new TimerState();
  private _pomodoro: PomodoroState;
  private _ticker: Ticker;
  private _darkMode: boolean;
  private _events = new Emitter<AppEvents>();
  private _pendingWarnings: LedgerError[];
  private _warningsHeard = false;
  private _disposed = false;

  private constructor(
    private options: AppContextOptions,
    loaded: LoadResult,
  ) {
    this._darkMode = loaded.settings.darkMode;
    this._pendingWarnings = loaded.warnings;
    this.tasks = new TaskLedger(loaded.tasks, options.newId);
    this._pomodoro = new PomodoroState(this._timer, toTimerConfig(loaded.settings), this.tasks);
    this._ticker = new Ticker(() => { this.tick(); }, options.tickMs ?? DEFAULT_TICK_MS);

    this.tasks.on('change', tasks => {
      this.persist();
      this._events.emit('tasksChange', tasks);
    });
    this._pomodoro.on('phaseChange', () => this._events.emit('phaseChange', this.snapshot()));
    this._pomodoro.on('phaseComplete', completion => {
      this.options.sound?.play(completion.endedPhase);
      this._events.emit('phaseComplete', completion);
    });
  }

  /** Loads the persisted record, falling back to defaults when it is missing or unreadable. */
  static init(options: AppContextOptions): AppContext {
    const loaded = loadRecord(options.storage);
    const ctx = new AppContext(options, loaded);
    if (loaded.fresh) ctx.persist();
    return ctx;
  }

  on<K extends keyof AppEvents>(event: K, fn: (payload: AppEvents[K]) => void): void {
    this._events.on(event, fn);
    // Load problems happen before anyone can listen
    if (event === 'warning' && !this._warningsHeard) {
      this._warningsHeard = true;
      const pending = this._pendingWarnings;
      this._pendingWarnings = [];
      pending.forEach(w => this._events.emit('warning', w));
    }
  }

  off<K extends keyof AppEvents>(event: K, fn: (payload: AppEvents[K]) => void): void {
    this._events.off(event, fn);
  }

  snapshot(): AppSnapshot {
    return { ...this._pomodoro.snapshot(), darkMode: this._darkMode };
  }

  settings(): Settings {
    return { ...this._pomodoro.config, darkMode: this._darkMode };
  }

  get tickerRunning(): boolean { return this._ticker.running; }

  // ── Timer controls ──────────────────────────────

  start(): void {
    this._pomodoro.start();
    this._syncTicker();
  }

  pause(): void {
    this._pomodoro.pause();
    this._syncTicker();
  }

  resume(): void {
    this._pomodoro.resume();
    this._syncTicker();
  }

  reset(): void {
    this.options.sound?.stop();
    this._pomodoro.reset();
    this._syncTicker();
  }

  skip(): PhaseCompletion | null {
    const completion = this._pomodoro.skip();
    this._syncTicker();
    return completion;
  }

  tick(): PhaseCompletion | null {
    const completion = this._pomodoro.tick();
    this._events.emit('tick', this.snapshot());
    this._syncTicker();
    return completion;
  }

  // ── Settings ────────────────────────────────────

  /** Rejects invalid input before the timer sees it; a valid config restarts the cycle. */
  updateConfig(input: unknown): Settings {
    const config = parseTimerConfig(input);
    this._pomodoro.applyConfig(config);
    this._syncTicker();
    this.persist();
    return this.settings();
  }

  setDarkMode(enabled: boolean): void {
    if (this._darkMode === enabled) return;
    this._darkMode = enabled;
    this.persist();
  }

  // ── Persistence & lifecycle ─────────────────────

  record(): PersistedRecord {
    return { version: 1, settings: this.settings(), tasks: this.tasks.list() };
  }

  /** Write-through save. A failed write is reported and the in-memory state stays authoritative. */
  persist(): boolean {
    try {
      this.options.storage.save(this.record());
      return true;
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      this._warn(err);
      return false;
    }
  }

  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    this._ticker.stop();
    this.options.sound?.stop();
    this.persist();
  }

  private _warn(warning: LedgerError): void {
    if (this._warningsHeard) {
      this._events.emit('warning', warning);
    } else {
      if (this._pendingWarnings.length >= MAX_PENDING_WARNINGS) this._pendingWarnings.shift();
      this._pendingWarnings.push(warning);
    }
  }

  private _syncTicker(): void {
    if (!this._disposed && this._timer.status === 'running') {
      this._ticker.start();
    } else {
      this._ticker.stop();
    }
  }
}
