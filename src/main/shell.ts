import { AppContext } from '../app/AppContext';
import { Command, HELP_TEXT, phaseName, renderStatus, renderTasks } from './commands';

export type ShellReply = { output: string; quit?: boolean };

function taskIdAt(ctx: AppContext, index: number): string {
  const task = ctx.tasks.list()[index];
  // Out-of-range numbers go through the ledger so they fail the same way as a stale id
  return task ? task.id : `#${index + 1}`;
}

/**
 * Applies one user command to the context. Ledger and configuration errors
 * propagate to the caller unchanged.
 */
export function runCommand(ctx: AppContext, command: Command): ShellReply {
  const status = () => renderStatus(ctx.snapshot(), ctx.tasks.active());
  const list = () => renderTasks(ctx.tasks.list(), ctx.tasks.activeId());

  switch (command.kind) {
    case 'start':
      ctx.start();
      return { output: status() };
    case 'pause':
      ctx.pause();
      return { output: status() };
    case 'resume':
      ctx.resume();
      return { output: status() };
    case 'reset':
      ctx.reset();
      return { output: status() };
    case 'skip': {
      const completion = ctx.skip();
      if (!completion) return { output: 'Nothing to skip.' };
      return { output: `Skipped ${phaseName(completion.endedPhase)}. ${status()}` };
    }
    case 'status':
      return { output: status() };
    case 'list':
      return { output: list() };
    case 'add': {
      const task = ctx.tasks.add(command.text, command.estimated);
      return { output: `Added ${task.position + 1}. ${task.text}` };
    }
    case 'edit': {
      const task = ctx.tasks.edit(taskIdAt(ctx, command.index), { text: command.text });
      return { output: `Updated ${task.position + 1}. ${task.text}` };
    }
    case 'estimate': {
      const task = ctx.tasks.edit(taskIdAt(ctx, command.index), { estimated: command.estimated });
      return { output: `${task.text}: ${task.pomodoros}/${task.estimated}` };
    }
    case 'delete': {
      const id = taskIdAt(ctx, command.index);
      const { text } = ctx.tasks.get(id);
      ctx.tasks.delete(id);
      return { output: `Deleted ${text}` };
    }
    case 'move':
      ctx.tasks.reorder(taskIdAt(ctx, command.index), command.position);
      return { output: list() };
    case 'select': {
      const task = ctx.tasks.setActive(taskIdAt(ctx, command.index));
      return { output: `Doing: ${task?.text ?? ''}` };
    }
    case 'unselect':
      ctx.tasks.setActive(null);
      return { output: 'No Task Selected' };
    case 'done': {
      const task = ctx.tasks.toggleComplete(taskIdAt(ctx, command.index));
      return { output: `${task.completed ? 'Completed' : 'Re-opened'} ${task.text}` };
    }
    case 'config': {
      const s = ctx.updateConfig(command.values);
      return {
        output: `Settings saved: focus ${s.focusMinutes}m, short ${s.shortBreakMinutes}m, `
          + `long ${s.longBreakMinutes}m, long break every ${s.longBreakInterval}`,
      };
    }
    case 'dark': {
      const enabled = !ctx.settings().darkMode;
      ctx.setDarkMode(enabled);
      return { output: `Dark mode ${enabled ? 'on' : 'off'}` };
    }
    case 'help':
      return { output: HELP_TEXT };
    case 'quit':
      return { output: 'Bye.', quit: true };
  }
}
