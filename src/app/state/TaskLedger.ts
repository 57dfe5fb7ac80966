import { randomUUID } from 'node:crypto';
import { Task, TaskPatch } from '../../shared/types';
import { Emitter } from '../../shared/emitter';
import { InvalidTaskError, TaskNotFoundError } from '../../shared/errors';
import { ActiveTaskSource } from './PomodoroState';

export const MAX_TASK_TEXT_LENGTH = 200;

interface LedgerEvents {
  change: Task[];
  activeChange: Task | null;
}

/**
 * Ordered to-do list. Positions are always 0..n-1 in list order, and every
 * mutation emits `change` so the owner can write the list through to disk.
 */
export class TaskLedger implements ActiveTaskSource {
  private _tasks: Task[] = [];
  private _activeId: string | null = null;
  private _events = new Emitter<LedgerEvents>();

  constructor(tasks: Task[] = [], private newId: () => string = randomUUID) {
    this._tasks = [...tasks]
      .sort((a, b) => a.position - b.position)
      .map(t => ({ ...t }));
    this._renumber();
  }

  on<K extends keyof LedgerEvents>(event: K, fn: (payload: LedgerEvents[K]) => void): void {
    this._events.on(event, fn);
  }

  off<K extends keyof LedgerEvents>(event: K, fn: (payload: LedgerEvents[K]) => void): void {
    this._events.off(event, fn);
  }

  list(): Task[] {
    return this._tasks.map(t => ({ ...t }));
  }

  get size(): number { return this._tasks.length; }

  get(id: string): Task {
    return { ...this._find(id) };
  }

  active(): Task | null {
    if (this._activeId === null) return null;
    const task = this._tasks.find(t => t.id === this._activeId);
    return task ? { ...task } : null;
  }

  activeId(): string | null {
    return this._activeId;
  }

  add(text: string, estimated = 1): Task {
    const task: Task = {
      id: this.newId(),
      text: cleanText(text),
      pomodoros: 0,
      estimated: checkEstimate(estimated),
      position: this._tasks.length,
      completed: false,
    };
    this._tasks.push(task);
    this._changed();
    return { ...task };
  }

  edit(id: string, patch: TaskPatch): Task {
    const task = this._find(id);
    const text = patch.text === undefined ? task.text : cleanText(patch.text);
    const estimated = patch.estimated === undefined ? task.estimated : checkEstimate(patch.estimated);

    task.text = text;
    task.estimated = estimated;
    // Raising the estimate above the credited count re-opens the task
    if (task.completed && task.pomodoros < task.estimated) task.completed = false;
    this._changed();
    return { ...task };
  }

  delete(id: string): void {
    const idx = this._indexOf(id);
    this._tasks.splice(idx, 1);
    this._renumber();
    if (this._activeId === id) this._setActiveId(null);
    this._changed();
  }

  /** Moves a task to `newPosition` (clamped), shifting the tasks in between. */
  reorder(id: string, newPosition: number): Task {
    const from = this._indexOf(id);
    const to = Math.min(this._tasks.length - 1, Math.max(0, Math.trunc(newPosition)));
    const [task] = this._tasks.splice(from, 1);
    this._tasks.splice(to, 0, task);
    this._renumber();
    this._changed();
    return { ...task };
  }

  setActive(id: string | null): Task | null {
    if (id === null) {
      this._setActiveId(null);
      return null;
    }
    const task = this._find(id);
    this._setActiveId(task.id);
    return { ...task };
  }

  toggleComplete(id: string): Task {
    const task = this._find(id);
    task.completed = !task.completed;
    this._changed();
    return { ...task };
  }

  /**
   * Credits one pomodoro to the active task. Reaching the estimate marks the
   * task completed and releases it from the timer.
   */
  creditActive(): Task | null {
    if (this._activeId === null) return null;
    const task = this._tasks.find(t => t.id === this._activeId);
    if (!task) return null;

    task.pomodoros++;
    if (!task.completed && task.pomodoros >= task.estimated) {
      task.completed = true;
      this._setActiveId(null);
    }
    this._changed();
    return { ...task };
  }

  private _indexOf(id: string): number {
    const idx = this._tasks.findIndex(t => t.id === id);
    if (idx === -1) throw new TaskNotFoundError(id);
    return idx;
  }

  private _find(id: string): Task {
    return this._tasks[this._indexOf(id)];
  }

  private _setActiveId(id: string | null): void {
    if (this._activeId === id) return;
    this._activeId = id;
    this._events.emit('activeChange', this.active());
  }

  private _renumber(): void {
    this._tasks.forEach((t, i) => { t.position = i; });
  }

  private _changed(): void {
    this._events.emit('change', this.list());
  }
}

function cleanText(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) throw new InvalidTaskError('Task description cannot be empty');
  return Array.from(trimmed).slice(0, MAX_TASK_TEXT_LENGTH).join('');
}

function checkEstimate(estimated: number): number {
  if (!Number.isInteger(estimated) || estimated < 1) {
    throw new InvalidTaskError(`Estimated pomodoros must be a positive integer, got ${estimated}`);
  }
  return estimated;
}
