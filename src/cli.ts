#!/usr/bin/env node
import { readFile, writeFile } from 'node:fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import { doctorReport, readEnv, resolveConfig, type PlannerConfig } from './config.js';
import { loadEnvFiles } from './env.js';
import { createLogger, type Logger } from './log.js';
import type { Task } from './model.js';
import { findDueReminders } from './reminders.js';
import { SchedulingEngine, scheduleScore, type TaskUpdate } from './scheduler/engine.js';
import { JsonStore } from './store/jsonStore.js';
import { withLock } from './store/lock.js';

loadEnvFiles();

type Format = 'pretty' | 'json';

const PRETTY: Format = 'pretty';

function parseIntArg(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function parseFormat(value: string): Format {
  if (value !== 'pretty' && value !== 'json') throw new InvalidArgumentError('Expected pretty|json.');
  return value;
}

function context(): { config: PlannerConfig; logger: Logger } {
  const config = resolveConfig(readEnv());
  return { config, logger: createLogger(config.logLevel) };
}

async function openEngine(config: PlannerConfig, logger: Logger) {
  const store = new JsonStore(config.stateDir);
  const engine = new SchedulingEngine({ logger: logger.child('engine') });
  engine.importSnapshot(await store.loadSnapshot());
  return { store, engine };
}

/** Load, apply `fn`, save; all under the state-dir lock. */
async function mutate<T>(fn: (engine: SchedulingEngine) => T): Promise<T> {
  const { config, logger } = context();
  return withLock(config.stateDir, async () => {
    const { store, engine } = await openEngine(config, logger);
    const out = fn(engine);
    await store.save(engine.exportSnapshot());
    return out;
  });
}

async function read<T>(fn: (engine: SchedulingEngine, config: PlannerConfig) => T): Promise<T> {
  const { config, logger } = context();
  const { engine } = await openEngine(config, logger);
  return fn(engine, config);
}

/** Exact id, or a unique id prefix. Unknown refs are passed through for the engine to reject. */
function resolveId(engine: SchedulingEngine, ref: string): string {
  const all = engine.listTasks();
  if (all.some((t) => t.id === ref)) return ref;
  const matches = all.filter((t) => t.id.startsWith(ref));
  return matches.length === 1 ? matches[0].id : ref;
}

function formatTask(t: Task): string {
  const box = t.completed ? '[x]' : '[ ]';
  const due = t.deadline ?? '-';
  const deps = t.dependencies.length ? ` deps=${t.dependencies.map((d) => d.slice(0, 8)).join(',')}` : '';
  const tags = t.tags.length ? ` #${t.tags.join(' #')}` : '';
  return `${box} ${t.id.slice(0, 8)} p${t.priority} due=${due} ${t.progress}% ${t.title}${tags}${deps}`;
}

function print(format: Format, value: unknown, pretty: () => void) {
  if (format === 'json') console.log(JSON.stringify(value, null, 2));
  else pretty();
}

const program = new Command();

program
  .name('planner')
  .description('Prioritize tasks by urgency, deadline and dependencies')
  .version('0.1.0');

program
  .command('add')
  .description('Create a task (priority, tags and effort are inferred unless --priority is given)')
  .argument('<title...>', 'Task title')
  .option('-d, --description <text>', 'Description', '')
  .option('--deadline <when>', 'Deadline: ISO date/time, today, tomorrow, +3d, friday, jan15, ...')
  .option('-p, --priority <n>', 'Explicit priority (lower = more urgent)', parseIntArg)
  .option('--depends <ids>', 'Comma-separated ids this task depends on', parseList)
  .option('--tags <tags>', 'Comma-separated tags (only with --priority)', parseList)
  .option('--effort <minutes>', 'Estimated effort (only with --priority)', parseIntArg)
  .option('--nl', 'Parse the title as a natural-language sentence first')
  .option('--format <format>', 'Output format: pretty|json', parseFormat, PRETTY)
  .action(
    async (
      title: string[],
      opts: {
        description: string;
        deadline?: string;
        priority?: number;
        depends?: string[];
        tags?: string[];
        effort?: number;
        nl?: boolean;
        format: Format;
      },
    ) => {
      const task = await mutate((engine) =>
        engine.createTask({
          title: title.join(' '),
          description: opts.description,
          deadline: opts.deadline,
          priority: opts.priority,
          dependencies: opts.depends,
          tags: opts.tags,
          estimatedEffortMinutes: opts.effort,
          naturalLanguage: !!opts.nl,
        }),
      );
      print(opts.format, task, () => console.log(`created ${formatTask(task)}`));
    },
  );

program
  .command('list')
  .description('List tasks')
  .option('--active', 'Only tasks that are not completed')
  .option('--format <format>', 'Output format: pretty|json', parseFormat, PRETTY)
  .action(async (opts: { active?: boolean; format: Format }) => {
    const tasks = await read((engine) => engine.listTasks({ includeCompleted: !opts.active }));
    print(opts.format, tasks, () => {
      if (!tasks.length) console.log('(no tasks)');
      for (const t of tasks) console.log(formatTask(t));
    });
  });

program
  .command('show')
  .description('Show one task')
  .argument('<id>', 'Task id or unique prefix')
  .action(async (ref: string) => {
    const task = await read((engine) => engine.getTask(resolveId(engine, ref)));
    console.log(JSON.stringify(task, null, 2));
  });

program
  .command('update')
  .description('Edit task fields')
  .argument('<id>', 'Task id or unique prefix')
  .option('--title <text>')
  .option('-d, --description <text>')
  .option('-p, --priority <n>', 'Priority', parseIntArg)
  .option('--deadline <when>', 'New deadline')
  .option('--clear-deadline', 'Remove the deadline')
  .option('--progress <pct>', 'Progress 0-100', parseIntArg)
  .option('--tags <tags>', 'Replace tags', parseList)
  .option('--depends <ids>', 'Replace dependencies', parseList)
  .option('--effort <minutes>', 'Estimated effort', parseIntArg)
  .action(
    async (
      ref: string,
      opts: {
        title?: string;
        description?: string;
        priority?: number;
        deadline?: string;
        clearDeadline?: boolean;
        progress?: number;
        tags?: string[];
        depends?: string[];
        effort?: number;
      },
    ) => {
      const fields: TaskUpdate = {
        title: opts.title,
        description: opts.description,
        priority: opts.priority,
        progress: opts.progress,
        tags: opts.tags,
        dependencies: opts.depends,
      };
      if (opts.clearDeadline) fields.deadline = null;
      else if (opts.deadline !== undefined) fields.deadline = opts.deadline;
      if (opts.effort !== undefined) fields.estimatedEffortMinutes = opts.effort;

      const task = await mutate((engine) => engine.updateTask(resolveId(engine, ref), fields));
      console.log(`updated ${formatTask(task)}`);
    },
  );

program
  .command('delete')
  .description('Delete a task (no error if it does not exist)')
  .argument('<id>', 'Task id or unique prefix')
  .action(async (ref: string) => {
    await mutate((engine) => engine.deleteTask(resolveId(engine, ref)));
    console.log(`deleted ${ref}`);
  });

program
  .command('progress')
  .description('Set progress (0-100); 100 completes the task')
  .argument('<id>', 'Task id or unique prefix')
  .argument('<pct>', 'Progress', parseIntArg)
  .action(async (ref: string, pct: number) => {
    const task = await mutate((engine) => engine.setProgress(resolveId(engine, ref), pct));
    console.log(`updated ${formatTask(task)}`);
  });

program
  .command('complete')
  .description('Complete a task once all its dependencies are completed')
  .argument('<id>', 'Task id or unique prefix')
  .action(async (ref: string) => {
    const task = await mutate((engine) => engine.completeTask(resolveId(engine, ref)));
    console.log(`completed ${formatTask(task)}`);
  });

program
  .command('next')
  .description('What to work on next, in strict (priority, deadline) order')
  .option('-n, --count <n>', 'How many tasks to show', parseIntArg, 1)
  .option('--format <format>', 'Output format: pretty|json', parseFormat, PRETTY)
  .action(async (opts: { count: number; format: Format }) => {
    const next = await read((engine) => {
      const out: Task[] = [];
      // The index is rebuilt on every load, so popping here never affects stored state.
      while (out.length < opts.count) {
        const t = engine.popNext();
        if (!t) break;
        out.push(t);
      }
      return out;
    });
    print(opts.format, next, () => {
      if (!next.length) console.log('(nothing to do)');
      for (const t of next) console.log(formatTask(t));
    });
  });

program
  .command('schedule')
  .description('Suggested working order blending priority with deadline urgency')
  .option('--format <format>', 'Output format: pretty|json', parseFormat, PRETTY)
  .action(async (opts: { format: Format }) => {
    const now = Date.now();
    const rows = await read((engine) =>
      engine.globalSchedule().map((id) => {
        const task = engine.getTask(id);
        return { id, title: task.title, score: scheduleScore(task, now) };
      }),
    );
    print(opts.format, rows, () => {
      if (!rows.length) console.log('(nothing scheduled)');
      rows.forEach((r, i) => console.log(`${i + 1}. ${r.id.slice(0, 8)} ${r.score.toFixed(2)} ${r.title}`));
    });
  });

program
  .command('remind')
  .description('Report tasks due for a reminder and mark them as reminded')
  .option('--window <minutes>', 'Remind when due within N minutes (or PLANNER_REMINDER_WINDOW_MINUTES)', parseIntArg)
  .option('--grace <minutes>', 'Still remind up to N minutes late (or PLANNER_REMINDER_GRACE_MINUTES)', parseIntArg)
  .action(async (opts: { window?: number; grace?: number }) => {
    const { config, logger } = context();
    const due = await mutate((engine) => {
      const found = findDueReminders(engine.listTasks(), Date.now(), {
        windowMinutes: opts.window ?? config.reminderWindowMinutes,
        graceMinutes: opts.grace ?? config.reminderGraceMinutes,
      });
      for (const t of found) engine.markReminded(t.id);
      return found;
    });
    logger.info(`reminders delivered: ${due.length}`);
    for (const t of due) console.log(`Reminder: ${t.title} (due ${t.deadline})`);
  });

program
  .command('export')
  .description('Write a snapshot of every task (stdout when no file is given)')
  .argument('[file]', 'Destination file')
  .action(async (file?: string) => {
    const snapshot = await read((engine) => engine.exportSnapshot());
    const text = JSON.stringify(snapshot, null, 2) + '\n';
    if (file) await writeFile(file, text, 'utf8');
    else process.stdout.write(text);
  });

program
  .command('import')
  .description('Replace all tasks with the contents of a snapshot file')
  .argument('<file>', 'Snapshot JSON file')
  .action(async (file: string) => {
    const text = await readFile(file, 'utf8');
    const count = await mutate((engine) => {
      engine.importSnapshot(text);
      return engine.listTasks().length;
    });
    console.log(`imported ${count} task(s)`);
  });

program
  .command('demo')
  .description('Seed an in-memory planner with sample tasks and show its ordering (nothing is saved)')
  .action(() => {
    const engine = new SchedulingEngine({ logger: createLogger('info').child('demo') });
    const hour = 60 * 60 * 1000;
    engine.createTask({ title: 'Welcome: your planner is ready', description: 'This is a demo task', priority: 5 });
    engine.createTask({
      title: 'Finish report by tomorrow',
      description: 'Q3 summary',
      priority: 2,
      deadline: new Date(Date.now() + 24 * hour).toISOString(),
    });
    engine.createTask({
      title: 'Quick call with team',
      description: 'Discuss milestones',
      priority: 3,
      deadline: new Date(Date.now() + 8 * hour).toISOString(),
    });

    const next = engine.peekNext();
    console.log(`next: ${next ? formatTask(next) : '(none)'}`);
    console.log('schedule:');
    engine.globalSchedule().forEach((id, i) => console.log(`${i + 1}. ${formatTask(engine.getTask(id))}`));
  });

program
  .command('doctor')
  .description('Check environment/config and the state file')
  .action(() => {
    const report = doctorReport();
    console.log('planner doctor');
    console.log('config:', report.config);
    console.log(`state file: ${report.stateFile} (${report.stateFileExists ? 'present' : 'missing'})`);
    if (report.notes.length) {
      console.log('\nNotes:');
      for (const n of report.notes) console.log(`- ${n}`);
    }
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
