import { z } from 'zod';
import { Settings, TimerConfig } from '../shared/types';
import { InvalidConfigurationError } from '../shared/errors';
import { MAX_TASK_TEXT_LENGTH } from './state/TaskLedger';

export const DEFAULT_SETTINGS: Settings = {
  focusMinutes: 25,
  shortBreakMinutes: 5,
  longBreakMinutes: 15,
  longBreakInterval: 4,
  darkMode: false,
};

const positiveInt = (what: string) =>
  z.number({ invalid_type_error: `${what} must be a number` })
    .int(`${what} must be a whole number`)
    .positive(`${what} must be positive`);

export const TimerConfigSchema = z.object({
  focusMinutes: positiveInt('Focus time'),
  shortBreakMinutes: positiveInt('Short break'),
  longBreakMinutes: positiveInt('Long break'),
  longBreakInterval: positiveInt('Long break interval'),
});

export const SettingsSchema = TimerConfigSchema.extend({
  darkMode: z.boolean(),
});

export const TaskSchema = z.object({
  id: z.string().min(1),
  text: z.string()
    .trim()
    .min(1, 'Task text cannot be empty')
    .refine(text => Array.from(text).length <= MAX_TASK_TEXT_LENGTH, `Task text is longer than ${MAX_TASK_TEXT_LENGTH} characters`),
  pomodoros: z.number().int().nonnegative(),
  estimated: z.number().int().positive(),
  position: z.number().int().nonnegative(),
  completed: z.boolean(),
});

export const PersistedRecordSchema = z.object({
  version: z.literal(1),
  settings: z.unknown(),
  tasks: z.array(TaskSchema).superRefine((tasks, ctx) => {
    const seen = new Set<string>();
    tasks.forEach((task, i) => {
      if (seen.has(task.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'id'], message: `Duplicate task id "${task.id}"` });
      }
      seen.add(task.id);
    });
  }),
});

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map(issue => issue.message);
}

/** Validates user-entered timer configuration before it reaches the timer. */
export function parseTimerConfig(input: unknown): TimerConfig {
  const result = TimerConfigSchema.safeParse(input);
  if (!result.success) throw new InvalidConfigurationError(issuesOf(result.error));
  return result.data;
}

/**
 * Reads persisted settings. Missing fields take their defaults; anything
 * present but invalid is rejected as a whole.
 */
export function parseSettings(input: unknown): Settings {
  const base = typeof input === 'object' && input !== null ? input : {};
  const result = SettingsSchema.safeParse({ ...DEFAULT_SETTINGS, ...base });
  if (!result.success) throw new InvalidConfigurationError(issuesOf(result.error));
  return result.data;
}

export function toTimerConfig(settings: Settings): TimerConfig {
  const { focusMinutes, shortBreakMinutes, longBreakMinutes, longBreakInterval } = settings;
  return { focusMinutes, shortBreakMinutes, longBreakMinutes, longBreakInterval };
}
