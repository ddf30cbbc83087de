export const DEFAULT_PRIORITY = 5;

/** `[priority, deadline epoch ms]`; a task without a deadline carries `Infinity`. */
export type OrderingKey = readonly [priority: number, deadlineMs: number];

export interface Task {
  /** Opaque id assigned at creation. */
  readonly id: string;
  title: string;
  description: string;
  /** Lower number = more urgent. */
  priority: number;
  /** Deadline (ISO). */
  deadline?: string;
  readonly createdAt: string; // ISO
  completed: boolean;
  /** 0-100. */
  progress: number;
  /** Ids that must be completed before this task can be. Not checked for existence until then. */
  dependencies: string[];
  tags: string[];
  estimatedEffortMinutes?: number;
  /** Priority, tags and effort were inferred rather than given by the caller. */
  autoAssigned: boolean;
  /** A reminder has already been delivered for this task. */
  notified: boolean;
  /** Derived; see `recomputeOrderingKey`. */
  orderingKey: OrderingKey;
}

/** Plain, serializable form of a task (snapshot/export format). */
export interface TaskRecord {
  id: string;
  title: string;
  description: string;
  priority: number;
  deadline: string | null;
  createdAt: string;
  completed: boolean;
  progress: number;
  dependencies: string[];
  tags: string[];
  estimatedEffortMinutes: number | null;
  autoAssigned: boolean;
  notified: boolean;
}

export interface Snapshot {
  tasks: TaskRecord[];
}

export interface Clock {
  /** Epoch milliseconds. */
  now(): number;
}

export interface IdGenerator {
  newId(): string;
}

export interface DateParser {
  /** Returns an ISO timestamp; throws `ParseError` on text it does not understand. */
  parse(text: string): string;
}

export const systemClock: Clock = { now: () => Date.now() };

export function deadlineMs(deadline?: string): number {
  return deadline ? Date.parse(deadline) : Infinity;
}

/**
 * Refresh the derived ordering key. Must be called after any change to
 * `priority` or `deadline`, before the task is pushed into a priority index.
 */
export function recomputeOrderingKey(task: Task): OrderingKey {
  task.orderingKey = [task.priority, deadlineMs(task.deadline)];
  return task.orderingKey;
}

export function compareOrderingKeys(a: OrderingKey, b: OrderingKey): number {
  if (a[0] !== b[0]) return a[0] - b[0];
  if (a[1] === b[1]) return 0;
  // Infinity - Infinity is NaN, so compare rather than subtract.
  return a[1] < b[1] ? -1 : 1;
}

export function clampProgress(value: number): number {
  const n = Math.trunc(value);
  if (!Number.isFinite(n)) return 0;
  return Math.max(0, Math.min(100, n));
}

/** Detached copy; changes to it never reach the store. */
export function cloneTask(task: Task): Task {
  return { ...task, dependencies: [...task.dependencies], tags: [...task.tags] };
}

export function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    priority: task.priority,
    deadline: task.deadline ?? null,
    createdAt: task.createdAt,
    completed: task.completed,
    progress: task.progress,
    dependencies: [...task.dependencies],
    tags: [...task.tags],
    estimatedEffortMinutes: task.estimatedEffortMinutes ?? null,
    autoAssigned: task.autoAssigned,
    notified: task.notified,
  };
}

export function fromRecord(rec: TaskRecord): Task {
  const task: Task = {
    id: rec.id,
    title: rec.title,
    description: rec.description,
    priority: rec.priority,
    deadline: rec.deadline ?? undefined,
    createdAt: rec.createdAt,
    completed: rec.completed || rec.progress === 100,
    progress: rec.progress,
    dependencies: [...rec.dependencies],
    tags: [...rec.tags],
    estimatedEffortMinutes: rec.estimatedEffortMinutes ?? undefined,
    autoAssigned: rec.autoAssigned,
    notified: rec.notified,
    orderingKey: [rec.priority, Infinity],
  };
  recomputeOrderingKey(task);
  return task;
}
