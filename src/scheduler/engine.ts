import { randomUUID } from 'node:crypto';
import { DependencyError } from '../errors.js';
import { estimateTask, parseNaturalText } from '../heuristics.js';
import { createLogger, type Logger } from '../log.js';
import {
  cloneTask,
  fromRecord,
  recomputeOrderingKey,
  systemClock,
  toRecord,
  type Clock,
  type DateParser,
  type IdGenerator,
  type Snapshot,
  type Task,
} from '../model.js';
import { createDateParser } from '../parsers/dateParser.js';
import { parseCreateTask, parseSnapshot, parseTaskUpdate } from '../snapshot.js';
import { TaskStore, type TaskPatch } from '../store/taskStore.js';

export interface CreateTaskInput {
  title: string;
  description?: string;
  /** Free-form date text, resolved through the date parser. */
  deadline?: string;
  /** When given, the heuristic estimator is skipped. */
  priority?: number;
  dependencies?: string[];
  tags?: string[];
  estimatedEffortMinutes?: number;
  /** Run the natural-language stub over the title/description first. */
  naturalLanguage?: boolean;
}

/**
 * Fields `updateTask` understands. Other keys on the object are ignored.
 * Priority and effort must be integers (effort >= 0), as on import.
 * `deadline: null` (or empty text) clears the deadline.
 */
export interface TaskUpdate {
  title?: string;
  description?: string;
  priority?: number;
  deadline?: string | null;
  progress?: number;
  tags?: string[];
  dependencies?: string[];
  estimatedEffortMinutes?: number | null;
}

export interface EngineDeps {
  store?: TaskStore;
  dateParser?: DateParser;
  clock?: Clock;
  ids?: IdGenerator;
  logger?: Logger;
}

const HOUR_MS = 60 * 60 * 1000;
const OVERDUE_URGENCY_HOURS = -1000;

/**
 * Blended urgency used by `globalSchedule`: priority plus remaining hours / 24.
 * Anything at or past its deadline gets a -1000h boost, which puts it ahead
 * of every task that is not overdue.
 */
export function scheduleScore(task: Task, now: number): number {
  let urgencyHours = 0;
  if (task.deadline) {
    const delta = Date.parse(task.deadline) - now;
    urgencyHours = delta <= 0 ? OVERDUE_URGENCY_HOURS : delta / HOUR_MS;
  }
  return task.priority + urgencyHours / 24;
}

export class SchedulingEngine {
  readonly store: TaskStore;
  private readonly dateParser: DateParser;
  private readonly clock: Clock;
  private readonly ids: IdGenerator;
  private readonly log: Logger;

  constructor(deps: EngineDeps = {}) {
    this.store = deps.store ?? new TaskStore();
    this.clock = deps.clock ?? systemClock;
    this.dateParser = deps.dateParser ?? createDateParser({ clock: this.clock });
    this.ids = deps.ids ?? { newId: () => randomUUID() };
    this.log = deps.logger ?? createLogger('silent');
  }

  /** Throws `FormatError` on a non-integer priority or a negative or fractional effort. */
  createTask(raw: CreateTaskInput): Task {
    const input = parseCreateTask(raw);
    const now = this.clock.now();
    let title = input.title;
    let description = input.description ?? '';
    let deadlineText = input.deadline;
    let priority = input.priority;

    if (input.naturalLanguage) {
      const parsed = parseNaturalText(description ? `${title} ${description}` : title, now);
      title = parsed.title;
      description = parsed.description;
      if (parsed.deadline && !deadlineText) deadlineText = parsed.deadline;
      if (parsed.priorityHint === 'urgent' && priority === undefined) priority = 1;
    }

    const deadline = this.resolveDeadline(deadlineText);

    let tags: string[];
    let effort: number | undefined;
    let autoAssigned: boolean;
    if (priority === undefined) {
      const est = estimateTask({ title, description, deadline }, now);
      priority = est.priority;
      tags = est.tags;
      effort = est.estimatedEffortMinutes;
      autoAssigned = true;
    } else {
      tags = [...(input.tags ?? [])];
      effort = input.estimatedEffortMinutes;
      autoAssigned = false;
    }

    const task: Task = {
      id: this.ids.newId(),
      title,
      description,
      priority,
      deadline,
      createdAt: new Date(now).toISOString(),
      completed: false,
      progress: 0,
      dependencies: [...new Set(input.dependencies ?? [])],
      tags,
      estimatedEffortMinutes: effort,
      autoAssigned,
      notified: false,
      orderingKey: [priority, Infinity],
    };
    recomputeOrderingKey(task);

    this.store.create(task);
    this.log.debug('task created', { id: task.id, priority, deadline, autoAssigned });
    return cloneTask(task);
  }

  updateTask(id: string, raw: TaskUpdate): Task {
    this.store.get(id);
    const fields = parseTaskUpdate(raw);

    // Parse before touching anything so a bad date leaves the task as it was.
    const patch: TaskPatch = {};
    if ('deadline' in fields) patch.deadline = this.resolveDeadline(fields.deadline ?? undefined);
    if (fields.title !== undefined) patch.title = fields.title;
    if (fields.description !== undefined) patch.description = fields.description;
    if (fields.priority !== undefined) patch.priority = fields.priority;
    if (fields.progress !== undefined) patch.progress = fields.progress;
    if (fields.tags !== undefined) patch.tags = fields.tags;
    if (fields.dependencies !== undefined) patch.dependencies = fields.dependencies;
    if ('estimatedEffortMinutes' in fields) patch.estimatedEffortMinutes = fields.estimatedEffortMinutes ?? undefined;

    const task = this.store.update(id, patch);
    this.log.debug('task updated', { id, fields: Object.keys(patch) });
    return cloneTask(task);
  }

  /** Hard delete; a missing id is not an error. */
  deleteTask(id: string): void {
    const existed = this.store.delete(id);
    this.log.debug('task deleted', { id, existed });
  }

  setProgress(id: string, value: number): Task {
    const task = this.store.update(id, { progress: value });
    this.log.debug('progress set', { id, progress: task.progress, completed: task.completed });
    return cloneTask(task);
  }

  /** Dependency ids that do not resolve to an existing, completed task. */
  unmetDependencies(id: string): string[] {
    const task = this.store.get(id);
    return task.dependencies.filter((dep) => !this.store.find(dep)?.completed);
  }

  completeTask(id: string): Task {
    const unmet = this.unmetDependencies(id);
    if (unmet.length) {
      this.log.warn('completion blocked', { id, unmet });
      throw new DependencyError(id, unmet);
    }
    const task = this.store.update(id, { completed: true, progress: 100 });
    this.log.debug('task completed', { id });
    return cloneTask(task);
  }

  peekNext(): Task | undefined {
    const task = this.store.peek();
    return task && cloneTask(task);
  }

  popNext(): Task | undefined {
    const task = this.store.popNext();
    return task && cloneTask(task);
  }

  /** Suggested working order (ids, best first) over non-completed tasks. */
  globalSchedule(): string[] {
    const now = this.clock.now();
    return this.store
      .listActive()
      .map((task) => ({ id: task.id, score: scheduleScore(task, now) }))
      .sort((a, b) => a.score - b.score)
      .map((s) => s.id);
  }

  /** Only the flag changes; the index (and anything already popped) is left alone. */
  markReminded(id: string): Task {
    const task = this.store.markNotified(id);
    this.log.debug('task reminded', { id });
    return cloneTask(task);
  }

  getTask(id: string): Task {
    return cloneTask(this.store.get(id));
  }

  listTasks(opts: { includeCompleted?: boolean } = {}): Task[] {
    const tasks = opts.includeCompleted === false ? this.store.listActive() : this.store.listAll();
    return tasks.map(cloneTask);
  }

  exportSnapshot(): Snapshot {
    return { tasks: this.store.listAll().map(toRecord) };
  }

  /** Full overwrite. Nothing changes unless the whole payload is valid. */
  importSnapshot(data: unknown): void {
    const records = parseSnapshot(data, { now: this.clock.now(), newId: () => this.ids.newId() });
    this.store.bulkReplace(records.map(fromRecord));
    this.log.debug('snapshot imported', { tasks: records.length });
  }

  private resolveDeadline(text?: string): string | undefined {
    if (text === undefined || !text.trim()) return undefined;
    return this.dateParser.parse(text);
  }
}
