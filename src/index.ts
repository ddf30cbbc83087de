export * from './errors.js';
export * from './model.js';
export { estimateTask, estimateEffortMinutes, parseNaturalText, type Estimate, type ParsedText } from './heuristics.js';
export { MinHeap, type Comparator } from './queue/minHeap.js';
export { PriorityIndex, compareEntries, type IndexEntry } from './queue/priorityIndex.js';
export { TaskStore, type TaskPatch } from './store/taskStore.js';
export { JsonStore, type PlannerState } from './store/jsonStore.js';
export { acquireLock, withLock, LockBusyError, type LockHandle } from './store/lock.js';
export {
  SchedulingEngine,
  scheduleScore,
  type CreateTaskInput,
  type TaskUpdate,
  type EngineDeps,
} from './scheduler/engine.js';
export { createDateParser, parseDateText } from './parsers/dateParser.js';
export {
  parseSnapshot,
  parseCreateTask,
  parseTaskUpdate,
  SnapshotSchema,
  TaskRecordSchema,
  CreateTaskSchema,
  TaskUpdateSchema,
} from './snapshot.js';
export { findDueReminders, type ReminderWindow } from './reminders.js';
export { createLogger, type Logger, type LogLevel } from './log.js';
