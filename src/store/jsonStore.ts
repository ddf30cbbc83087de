import { mkdir, readFile, writeFile, rename, copyFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { FormatError } from '../errors.js';
import type { Snapshot, TaskRecord } from '../model.js';

export interface PlannerState {
  /** State schema version. */
  version: 1;
  savedAt?: string;
  /** Records as produced by `exportSnapshot`; validated on import, not here. */
  tasks: unknown[];
}

/** v0 is a bare export payload: `{ tasks: [...] }`. */
const StateFileSchema = z.object({
  version: z.number().int().nonnegative().optional(),
  savedAt: z.string().optional(),
  tasks: z.array(z.unknown()).optional(),
});

type LegacyPlannerState = z.infer<typeof StateFileSchema>;

function isMissingFile(e: unknown) {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Snapshot persistence between CLI runs. The file holds exactly what the
 * engine exports; the engine's import does the validation.
 */
export class JsonStore {
  constructor(private dir = path.join(process.cwd(), '.planner')) {}

  getDir() {
    return this.dir;
  }

  statePath() {
    return path.join(this.dir, 'tasks.json');
  }

  private migrate(input: LegacyPlannerState): PlannerState {
    const version = input.version ?? 0;
    if (version > 1) {
      throw new FormatError(`Unsupported state version ${version} in ${this.statePath()}`);
    }
    return { version: 1, savedAt: input.savedAt, tasks: input.tasks ?? [] };
  }

  async load(): Promise<PlannerState> {
    let raw: string;
    try {
      raw = await readFile(this.statePath(), 'utf8');
    } catch (e) {
      if (isMissingFile(e)) return { version: 1, tasks: [] };
      throw e;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new FormatError(`State file ${this.statePath()} is not valid JSON`, [
        e instanceof Error ? e.message : String(e),
      ]);
    }
    const checked = StateFileSchema.safeParse(parsed);
    if (!checked.success) {
      throw new FormatError(
        `Malformed state file ${this.statePath()}`,
        checked.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      );
    }
    return this.migrate(checked.data);
  }

  /** The loaded state in the engine's import shape. */
  async loadSnapshot(): Promise<{ tasks: unknown[] }> {
    const state = await this.load();
    return { tasks: state.tasks };
  }

  private async backupStateFile(): Promise<void> {
    try {
      await stat(this.statePath());
    } catch (e) {
      if (isMissingFile(e)) return;
      throw e;
    }
    await copyFile(this.statePath(), this.statePath() + '.bak');
  }

  async save(snapshot: Snapshot, now: Date = new Date()): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await this.backupStateFile();
    const state: { version: 1; savedAt: string; tasks: TaskRecord[] } = {
      version: 1,
      savedAt: now.toISOString(),
      tasks: snapshot.tasks,
    };
    const tmp = this.statePath() + '.tmp';
    await writeFile(tmp, JSON.stringify(state, null, 2) + '\n', 'utf8');
    await rename(tmp, this.statePath());
  }
}
