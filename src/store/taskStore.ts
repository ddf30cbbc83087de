import { NotFoundError } from '../errors.js';
import { clampProgress, recomputeOrderingKey, type Task } from '../model.js';
import { PriorityIndex } from '../queue/priorityIndex.js';

/** Fields `update` is allowed to touch. Anything else in a patch is ignored. */
export type TaskPatch = Partial<
  Pick<
    Task,
    | 'title'
    | 'description'
    | 'priority'
    | 'deadline'
    | 'completed'
    | 'progress'
    | 'dependencies'
    | 'tags'
    | 'estimatedEffortMinutes'
  >
>;

/**
 * Authoritative id -> task map. Owns the priority index and rebuilds it after
 * every structural change, so readers never see an index older than the map.
 */
export class TaskStore {
  private tasks = new Map<string, Task>();
  private readonly index = new PriorityIndex((id) => this.tasks.get(id));

  get size() {
    return this.tasks.size;
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  find(id: string): Task | undefined {
    return this.tasks.get(id);
  }

  get(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) throw new NotFoundError(id);
    return task;
  }

  listAll(): Task[] {
    return [...this.tasks.values()];
  }

  listActive(): Task[] {
    return this.listAll().filter((t) => !t.completed);
  }

  create(task: Task): Task {
    if (this.tasks.has(task.id)) throw new Error(`Duplicate task id: ${task.id}`);
    this.tasks.set(task.id, task);
    if (!task.completed) this.index.push(task);
    return task;
  }

  update(id: string, patch: TaskPatch): Task {
    const task = this.get(id);

    if (patch.title !== undefined) task.title = patch.title;
    if (patch.description !== undefined) task.description = patch.description;
    if (patch.priority !== undefined) task.priority = patch.priority;
    // `deadline: undefined` present in the patch clears it.
    if ('deadline' in patch) task.deadline = patch.deadline;
    if (patch.dependencies !== undefined) task.dependencies = [...new Set(patch.dependencies)];
    if (patch.tags !== undefined) task.tags = [...patch.tags];
    if ('estimatedEffortMinutes' in patch) task.estimatedEffortMinutes = patch.estimatedEffortMinutes;
    if (patch.progress !== undefined) task.progress = clampProgress(patch.progress);
    // completion is one-way
    if (patch.completed || task.progress === 100) task.completed = true;

    recomputeOrderingKey(task);
    this.rebuildIndex();
    return task;
  }

  /** Sets the reminder flag. Ordering is unaffected, so the index is left as is. */
  markNotified(id: string): Task {
    const task = this.get(id);
    task.notified = true;
    return task;
  }

  /** Hard delete. Returns false when the id was not present. */
  delete(id: string): boolean {
    const existed = this.tasks.delete(id);
    this.rebuildIndex();
    return existed;
  }

  /** Replace the whole contents (import). */
  bulkReplace(tasks: Iterable<Task>): void {
    const next = new Map<string, Task>();
    for (const t of tasks) {
      if (next.has(t.id)) throw new Error(`Duplicate task id: ${t.id}`);
      next.set(t.id, t);
    }
    this.tasks = next;
    this.rebuildIndex();
  }

  peek(): Task | undefined {
    return this.index.peek();
  }

  popNext(): Task | undefined {
    return this.index.popNext();
  }

  rebuildIndex(): void {
    this.index.rebuild(this.tasks.values());
  }
}
