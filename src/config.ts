import { existsSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);

export const EnvSchema = z.object({
  PLANNER_LOG_LEVEL: LogLevelSchema.optional(),
  PLANNER_STATE_DIR: z.string().min(1).optional(),

  // reminders
  PLANNER_REMINDER_WINDOW_MINUTES: z.coerce.number().int().positive().optional(),
  PLANNER_REMINDER_GRACE_MINUTES: z.coerce.number().int().nonnegative().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export interface PlannerConfig {
  logLevel: z.infer<typeof LogLevelSchema>;
  stateDir: string;
  reminderWindowMinutes: number;
  reminderGraceMinutes: number;
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return EnvSchema.parse(env);
}

export function resolveConfig(env: EnvConfig = readEnv(), cwd: string = process.cwd()): PlannerConfig {
  return {
    logLevel: env.PLANNER_LOG_LEVEL ?? 'info',
    stateDir: path.resolve(cwd, env.PLANNER_STATE_DIR ?? '.planner'),
    reminderWindowMinutes: env.PLANNER_REMINDER_WINDOW_MINUTES ?? 60,
    reminderGraceMinutes: env.PLANNER_REMINDER_GRACE_MINUTES ?? 60,
  };
}

export function doctorReport(env: EnvConfig = readEnv(), cwd: string = process.cwd()) {
  const config = resolveConfig(env, cwd);
  const stateFile = path.join(config.stateDir, 'tasks.json');
  const notes: string[] = [];

  if (!env.PLANNER_STATE_DIR) {
    notes.push('PLANNER_STATE_DIR not set; using ./.planner in the current directory.');
  }
  if (!existsSync(stateFile)) {
    notes.push(`No state file yet at ${stateFile}; it is created on the first write.`);
  }
  if (config.reminderGraceMinutes > config.reminderWindowMinutes) {
    notes.push('Reminder grace is longer than the reminder window; late reminders may outnumber early ones.');
  }

  return { config, stateFile, stateFileExists: existsSync(stateFile), notes };
}
