import type { Task } from './model.js';

export interface ReminderWindow {
  /** Remind when the deadline is at most this many minutes away. Default: 60. */
  windowMinutes?: number;
  /** Still remind up to this many minutes after the deadline passed. Default: 60. */
  graceMinutes?: number;
}

/**
 * Tasks a reminder should be delivered for right now: open, not yet
 * notified, and with a deadline inside [now - grace, now + window].
 *
 * Callers deliver the reminder and then call `markReminded` so it is not
 * repeated.
 */
export function findDueReminders(tasks: Iterable<Task>, now: number, opts: ReminderWindow = {}): Task[] {
  const windowMinutes = opts.windowMinutes ?? 60;
  const graceMinutes = opts.graceMinutes ?? 60;

  const due: Task[] = [];
  for (const t of tasks) {
    if (t.completed || t.notified || !t.deadline) continue;
    const diffMin = (Date.parse(t.deadline) - now) / 60_000;
    if (diffMin <= windowMinutes && diffMin >= -graceMinutes) due.push(t);
  }
  return due;
}
