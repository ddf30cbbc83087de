import { z } from 'zod';
import { FormatError } from './errors.js';
import { DEFAULT_PRIORITY, type TaskRecord } from './model.js';

const timestamp = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'invalid timestamp' })
  .transform((s) => new Date(Date.parse(s)).toISOString());

// Shared by import and by create/update, so anything the engine stores can be imported back.
const priority = z.number().int();
const effortMinutes = z.number().int().nonnegative();

/** One task as found in an import payload; optional fields take creation defaults. */
export const TaskRecordSchema = z.object({
  id: z.string().min(1).optional(),
  title: z.string().default(''),
  description: z.string().default(''),
  priority: priority.default(DEFAULT_PRIORITY),
  deadline: timestamp.nullable().optional(),
  createdAt: timestamp.optional(),
  completed: z.boolean().default(false),
  progress: z.number().int().min(0).max(100).default(0),
  dependencies: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  estimatedEffortMinutes: effortMinutes.nullable().optional(),
  autoAssigned: z.boolean().default(false),
  notified: z.boolean().default(false),
});

export const SnapshotSchema = z.object({
  tasks: z.array(TaskRecordSchema).default([]),
});

export const CreateTaskSchema = z.object({
  title: z.string(),
  description: z.string().optional(),
  deadline: z.string().optional(),
  priority: priority.optional(),
  dependencies: z.array(z.string()).optional(),
  tags: z.array(z.string()).optional(),
  estimatedEffortMinutes: effortMinutes.optional(),
  naturalLanguage: z.boolean().optional(),
});

/** Unknown keys are stripped. `deadline: null` clears the deadline. */
export const TaskUpdateSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  priority: priority.optional(),
  deadline: z.string().nullable().optional(),
  // clamped and truncated by the store
  progress: z.number().finite().optional(),
  tags: z.array(z.string()).optional(),
  dependencies: z.array(z.string()).optional(),
  estimatedEffortMinutes: effortMinutes.nullable().optional(),
});

export type CreateTaskFields = z.infer<typeof CreateTaskSchema>;
export type TaskUpdateFields = z.infer<typeof TaskUpdateSchema>;

export interface SnapshotDefaults {
  now: number;
  newId(): string;
}

function describeIssues(err: z.ZodError): string[] {
  return err.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
}

export function parseCreateTask(input: unknown): CreateTaskFields {
  const parsed = CreateTaskSchema.safeParse(input);
  if (!parsed.success) throw new FormatError('Invalid task', describeIssues(parsed.error));
  return parsed.data;
}

export function parseTaskUpdate(fields: unknown): TaskUpdateFields {
  const parsed = TaskUpdateSchema.safeParse(fields);
  if (!parsed.success) throw new FormatError('Invalid task update', describeIssues(parsed.error));
  return parsed.data;
}

/**
 * Validate a whole import payload (object or JSON text) and return complete
 * records. Throws `FormatError` without side effects on the first problem found.
 */
export function parseSnapshot(data: unknown, defaults: SnapshotDefaults): TaskRecord[] {
  let input = data;
  if (typeof data === 'string') {
    try {
      input = JSON.parse(data);
    } catch (e) {
      throw new FormatError('Snapshot is not valid JSON', [e instanceof Error ? e.message : String(e)]);
    }
  }

  const parsed = SnapshotSchema.safeParse(input);
  if (!parsed.success) throw new FormatError('Malformed snapshot', describeIssues(parsed.error));

  const createdAt = new Date(defaults.now).toISOString();
  const records: TaskRecord[] = parsed.data.tasks.map((t) => ({
    ...t,
    id: t.id ?? defaults.newId(),
    deadline: t.deadline ?? null,
    createdAt: t.createdAt ?? createdAt,
    dependencies: [...new Set(t.dependencies)],
    estimatedEffortMinutes: t.estimatedEffortMinutes ?? null,
  }));

  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const r of records) {
    if (seen.has(r.id)) dupes.add(r.id);
    seen.add(r.id);
  }
  if (dupes.size) {
    throw new FormatError('Duplicate task ids in snapshot', [...dupes]);
  }

  return records;
}
