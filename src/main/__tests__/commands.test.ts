import { describe, it, expect } from 'vitest';
import { formatRemaining, parseCommand, renderStatus, renderTasks } from '../commands';
import { Task } from '../../shared/types';

describe('parseCommand', () => {
  it('parses bare timer commands and aliases', () => {
    expect(parseCommand('start')).toEqual({ ok: true, command: { kind: 'start' } });
    expect(parseCommand('  SKIP ')).toEqual({ ok: true, command: { kind: 'skip' } });
    expect(parseCommand('ls')).toEqual({ ok: true, command: { kind: 'list' } });
    expect(parseCommand('q')).toEqual({ ok: true, command: { kind: 'quit' } });
  });

  it('parses add with an optional estimate', () => {
    expect(parseCommand('add Write the summary')).toEqual({
      ok: true,
      command: { kind: 'add', text: 'Write the summary', estimated: 1 },
    });
    expect(parseCommand('add Write the summary #3')).toEqual({
      ok: true,
      command: { kind: 'add', text: 'Write the summary', estimated: 3 },
    });
  });

  it('requires text for add', () => {
    expect(parseCommand('add #2')).toEqual({ ok: false, error: 'Usage: add <text> [#estimate]' });
  });

  it('turns 1-based task numbers into indexes', () => {
    expect(parseCommand('del 2')).toEqual({ ok: true, command: { kind: 'delete', index: 1 } });
    expect(parseCommand('select 1')).toEqual({ ok: true, command: { kind: 'select', index: 0 } });
    expect(parseCommand('move 3 1')).toEqual({ ok: true, command: { kind: 'move', index: 2, position: 0 } });
    expect(parseCommand('edit 1 New words')).toEqual({ ok: true, command: { kind: 'edit', index: 0, text: 'New words' } });
  });

  it('rejects zero and non-numeric task numbers', () => {
    expect(parseCommand('done 0')).toEqual({ ok: false, error: 'Usage: done <n>' });
    expect(parseCommand('done two')).toEqual({ ok: false, error: 'Usage: done <n>' });
  });

  it('parses estimate', () => {
    expect(parseCommand('estimate 2 4')).toEqual({ ok: true, command: { kind: 'estimate', index: 1, estimated: 4 } });
    expect(parseCommand('estimate 2')).toEqual({ ok: false, error: 'Usage: estimate <n> <count>' });
  });

  it('parses config values without validating them', () => {
    expect(parseCommand('config 50 10 0 2')).toEqual({
      ok: true,
      command: {
        kind: 'config',
        values: { focusMinutes: 50, shortBreakMinutes: 10, longBreakMinutes: 0, longBreakInterval: 2 },
      },
    });
    expect(parseCommand('config 50 10')).toEqual({ ok: false, error: 'Usage: config <focus> <short> <long> <interval>' });
  });

  it('reports unknown and empty commands', () => {
    expect(parseCommand('dance')).toEqual({ ok: false, error: 'Unknown command: dance. Type "help" for a list.' });
    expect(parseCommand('   ')).toEqual({ ok: false, error: 'Empty command' });
  });
});

describe('formatRemaining', () => {
  it('pads minutes and seconds', () => {
    expect(formatRemaining(1500)).toBe('25:00');
    expect(formatRemaining(65)).toBe('01:05');
    expect(formatRemaining(-3)).toBe('00:00');
  });
});

describe('rendering', () => {
  const tasks: Task[] = [
    { id: 'a', text: 'Outline', pomodoros: 1, estimated: 2, position: 0, completed: false },
    { id: 'b', text: 'Review', pomodoros: 3, estimated: 3, position: 1, completed: true },
  ];

  it('renders the task list with the active marker', () => {
    expect(renderTasks(tasks, 'a')).toBe('>1. [ ] Outline (1/2)\n 2. [x] Review (3/3)');
  });

  it('renders an empty list hint', () => {
    expect(renderTasks([], null)).toBe('No tasks yet. Add one with: add <text>');
  });

  it('renders the status line', () => {
    const line = renderStatus(
      {
        phase: 'focus',
        status: 'running',
        remainingSeconds: 1499,
        totalSeconds: 1500,
        sessionCount: 2,
        activeTaskId: 'a',
        darkMode: false,
      },
      tasks[0],
    );
    expect(line).toBe('Focus 24:59 (running) | sessions 2 | Doing: Outline');
  });

  it('shows a loaded phase as waiting', () => {
    const line = renderStatus(
      {
        phase: 'shortBreak',
        status: 'idle',
        remainingSeconds: 300,
        totalSeconds: 300,
        sessionCount: 1,
        activeTaskId: null,
        darkMode: false,
      },
      null,
    );
    expect(line).toBe('Short Break 05:00 (waiting) | sessions 1 | No Task Selected');
  });
});
