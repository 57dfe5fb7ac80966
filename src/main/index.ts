#!/usr/bin/env node
import os from 'node:os';
import path from 'node:path';
import readline from 'node:readline';
import { parseArgs } from 'node:util';
import { AppContext } from '../app/AppContext';
import { BellCue } from '../app/audio/BellCue';
import { JsonFileStorage } from '../app/storage/JsonFileStorage';
import { DEFAULT_TICK_MS } from '../app/Ticker';
import { LedgerError } from '../shared/errors';
import { HELP_TEXT, parseCommand, phaseName, renderStatus } from './commands';
import { runCommand } from './shell';

const TAG = '[pomodoro-ledger]';

function resolveDataFile(flag: string | undefined): string {
  return flag
    ?? process.env.POMODORO_LEDGER_DATA
    ?? path.join(os.homedir(), '.pomodoro-ledger', 'data.json');
}

function main(): void {
  const { values } = parseArgs({
    options: {
      data: { type: 'string' },
      tick: { type: 'string' },
      quiet: { type: 'boolean', short: 'q' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    console.log('Usage: pomodoro-ledger [--data <file>] [--tick <ms>] [--quiet]\n');
    console.log(HELP_TEXT);
    return;
  }

  const tickMs = values.tick === undefined ? DEFAULT_TICK_MS : Number(values.tick);
  if (!Number.isInteger(tickMs) || tickMs <= 0) {
    console.error(`${TAG} --tick must be a positive integer, got ${values.tick}`);
    process.exitCode = 1;
    return;
  }

  const storage = new JsonFileStorage(resolveDataFile(values.data));
  const sound = new BellCue(process.stdout);
  sound.setMuted(values.quiet === true);
  const ctx = AppContext.init({ storage, sound, tickMs });

  ctx.on('warning', (w) => console.warn(`${TAG} ${w.message}`));

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt('pomodoro> ');

  let lastShown = '';
  ctx.on('tick', (snap) => {
    // Only redraw once per displayed minute so the prompt stays usable
    const shown = `${snap.phase}:${Math.ceil(snap.remainingSeconds / 60)}`;
    if (shown === lastShown) return;
    lastShown = shown;
    console.log(renderStatus(snap, ctx.tasks.active()));
    rl.prompt(true);
  });

  ctx.on('phaseComplete', (c) => {
    const credit = c.creditedTask
      ? ` ${c.creditedTask.text}: ${c.creditedTask.pomodoros}/${c.creditedTask.estimated}`
        + (c.creditedTask.completed ? ' (task completed!)' : '')
      : '';
    console.log(`${phaseName(c.endedPhase)} finished.${credit} Next: ${phaseName(c.nextPhase)}. Type "start" when ready.`);
    rl.prompt(true);
  });

  rl.on('line', (line) => {
    if (!line.trim()) {
      rl.prompt();
      return;
    }
    const parsed = parseCommand(line);
    if (!parsed.ok) {
      console.log(parsed.error);
      rl.prompt();
      return;
    }
    try {
      const reply = runCommand(ctx, parsed.command);
      console.log(reply.output);
      if (reply.quit) {
        rl.close();
        return;
      }
    } catch (err) {
      if (!(err instanceof LedgerError)) throw err;
      console.log(err.message);
    }
    rl.prompt();
  });

  rl.on('close', () => {
    ctx.dispose();
  });

  console.log(`Tasks and settings: ${storage.filePath}`);
  console.log(renderStatus(ctx.snapshot(), ctx.tasks.active()));
  rl.prompt();
}

try {
  main();
} catch (err) {
  console.error(`${TAG} Failed to start:`, err);
  process.exitCode = 1;
}
