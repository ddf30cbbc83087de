import { compareOrderingKeys, recomputeOrderingKey, type OrderingKey, type Task } from '../model.js';
import { MinHeap } from './minHeap.js';

export interface IndexEntry {
  readonly key: OrderingKey;
  readonly id: string;
}

export function compareEntries(a: IndexEntry, b: IndexEntry): number {
  const byKey = compareOrderingKeys(a.key, b.key);
  if (byKey !== 0) return byKey;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Min-priority queue over task ids with lazy deletion.
 *
 * Entries are never updated in place. An entry whose task has since been
 * deleted or completed is discarded when it reaches the top; changed keys
 * are handled by the owner calling `rebuild`.
 */
export class PriorityIndex {
  private heap = new MinHeap<IndexEntry>(compareEntries);

  constructor(private readonly lookup: (id: string) => Task | undefined) {}

  /** Heap entries, stale ones included. */
  get size() {
    return this.heap.size;
  }

  push(task: Task): void {
    const key = recomputeOrderingKey(task);
    this.heap.push({ key, id: task.id });
  }

  peek(): Task | undefined {
    for (let top = this.heap.peek(); top; top = this.heap.peek()) {
      const task = this.live(top.id);
      if (task) return task;
      this.heap.pop();
    }
    return undefined;
  }

  popNext(): Task | undefined {
    for (let top = this.heap.pop(); top; top = this.heap.pop()) {
      const task = this.live(top.id);
      if (task) return task;
    }
    return undefined;
  }

  rebuild(tasks: Iterable<Task>): void {
    this.heap.clear();
    for (const t of tasks) {
      if (!t.completed) this.push(t);
    }
  }

  private live(id: string) {
    const task = this.lookup(id);
    return task && !task.completed ? task : undefined;
  }
}
