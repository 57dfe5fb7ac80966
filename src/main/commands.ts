import { PomodoroPhase, Task } from '../shared/types';
import type { AppSnapshot } from '../app/AppContext';

export type Command =
  | { kind: 'start' | 'pause' | 'resume' | 'reset' | 'skip' | 'status' | 'list' | 'unselect' | 'dark' | 'help' | 'quit' }
  | { kind: 'add'; text: string; estimated: number }
  | { kind: 'edit'; index: number; text: string }
  | { kind: 'estimate'; index: number; estimated: number }
  | { kind: 'delete' | 'select' | 'done'; index: number }
  | { kind: 'move'; index: number; position: number }
  | { kind: 'config'; values: Record<string, number> };

export type ParseResult = { ok: true; command: Command } | { ok: false; error: string };

const SIMPLE = ['start', 'pause', 'resume', 'reset', 'skip', 'status', 'list', 'unselect', 'dark', 'help', 'quit'] as const;
type SimpleKind = typeof SIMPLE[number];

const ALIASES: Record<string, string> = {
  ls: 'list',
  del: 'delete',
  rm: 'delete',
  exit: 'quit',
  q: 'quit',
  '?': 'help',
};

export const HELP_TEXT = [
  'Timer:   start | pause | resume | reset | skip | status',
  'Tasks:   list | add <text> [#estimate] | edit <n> <text> | estimate <n> <count>',
  '         del <n> | move <n> <position> | select <n> | unselect | done <n>',
  'Setup:   config <focus> <short> <long> <interval> | dark',
  'Other:   help | quit',
  'Task numbers and positions are 1-based, as shown by `list`.',
].join('\n');

function isSimple(word: string): word is SimpleKind {
  return SIMPLE.some(kind => kind === word);
}

/** Parses a 1-based number from user input into a 0-based index. */
function parseIndex(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return n >= 1 ? n - 1 : null;
}

function indexCommand(kind: 'delete' | 'select' | 'done', args: string[]): ParseResult {
  const index = parseIndex(args[0]);
  if (index === null) return { ok: false, error: `Usage: ${kind} <n>` };
  return { ok: true, command: { kind, index } };
}

export function parseCommand(line: string): ParseResult {
  const trimmed = line.trim();
  const [head = '', ...rest] = trimmed.split(/\s+/);
  const word = ALIASES[head.toLowerCase()] ?? head.toLowerCase();
  const args = rest;

  if (!word) return { ok: false, error: 'Empty command' };
  if (isSimple(word)) return { ok: true, command: { kind: word } };

  switch (word) {
    case 'add': {
      let estimated = 1;
      let words = args;
      const last = args[args.length - 1];
      if (last !== undefined && /^#\d+$/.test(last)) {
        estimated = Number(last.slice(1));
        words = args.slice(0, -1);
      }
      const text = words.join(' ');
      if (!text) return { ok: false, error: 'Usage: add <text> [#estimate]' };
      return { ok: true, command: { kind: 'add', text, estimated } };
    }
    case 'edit': {
      const index = parseIndex(args[0]);
      const text = args.slice(1).join(' ');
      if (index === null || !text) return { ok: false, error: 'Usage: edit <n> <text>' };
      return { ok: true, command: { kind: 'edit', index, text } };
    }
    case 'estimate': {
      const index = parseIndex(args[0]);
      const estimated = Number(args[1]);
      if (index === null || args[1] === undefined || Number.isNaN(estimated)) {
        return { ok: false, error: 'Usage: estimate <n> <count>' };
      }
      return { ok: true, command: { kind: 'estimate', index, estimated } };
    }
    case 'delete':
      return indexCommand('delete', args);
    case 'select':
      return indexCommand('select', args);
    case 'done':
      return indexCommand('done', args);
    case 'move': {
      const index = parseIndex(args[0]);
      const position = parseIndex(args[1]);
      if (index === null || position === null) return { ok: false, error: 'Usage: move <n> <position>' };
      return { ok: true, command: { kind: 'move', index, position } };
    }
    case 'config': {
      if (args.length !== 4) return { ok: false, error: 'Usage: config <focus> <short> <long> <interval>' };
      const [focusMinutes, shortBreakMinutes, longBreakMinutes, longBreakInterval] = args.map(Number);
      return {
        ok: true,
        command: { kind: 'config', values: { focusMinutes, shortBreakMinutes, longBreakMinutes, longBreakInterval } },
      };
    }
    default:
      return { ok: false, error: `Unknown command: ${head}. Type "help" for a list.` };
  }
}

export const formatRemaining = (seconds: number): string => {
  const safe = Math.max(0, Math.floor(seconds));
  const mins = Math.floor(safe / 60)
    .toString()
    .padStart(2, '0');
  const secs = (safe % 60).toString().padStart(2, '0');
  return `${mins}:${secs}`;
};

const PHASE_NAMES: Record<PomodoroPhase, string> = {
  idle: 'Idle',
  focus: 'Focus',
  shortBreak: 'Short Break',
  longBreak: 'Long Break',
};

export function phaseName(phase: PomodoroPhase): string {
  return PHASE_NAMES[phase];
}

export function renderStatus(snap: AppSnapshot, activeTask: Task | null): string {
  const state = snap.phase === 'idle'
    ? 'ready'
    : snap.status === 'running' ? 'running' : snap.status === 'paused' ? 'paused' : 'waiting';
  const task = activeTask ? `Doing: ${activeTask.text}` : 'No Task Selected';
  return `${phaseName(snap.phase)} ${formatRemaining(snap.remainingSeconds)} (${state}) | sessions ${snap.sessionCount} | ${task}`;
}

export function renderTasks(tasks: Task[], activeId: string | null): string {
  if (tasks.length === 0) return 'No tasks yet. Add one with: add <text>';
  return tasks
    .map(t => {
      const mark = t.completed ? 'x' : ' ';
      const pointer = t.id === activeId ? '>' : ' ';
      return `${pointer}${t.position + 1}. [${mark}] ${t.text} (${t.pomodoros}/${t.estimated})`;
    })
    .join('\n');
}
