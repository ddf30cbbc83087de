import { describe, expect, it } from 'vitest';
import { FormatError } from '../src/errors.js';
import { fromRecord, toRecord, type TaskRecord } from '../src/model.js';
import { SchedulingEngine } from '../src/scheduler/engine.js';

const NOW = Date.parse('2026-03-02T12:00:00.000Z');

function setup(prefix = 't') {
  let n = 0;
  return new SchedulingEngine({ clock: { now: () => NOW }, ids: { newId: () => `${prefix}${++n}` } });
}

function populate(engine: SchedulingEngine) {
  const a = engine.createTask({ title: 'Design', description: 'important layout work', deadline: '+2d' });
  const b = engine.createTask({ title: 'Build', priority: 3, dependencies: [a.id], tags: ['dev'], estimatedEffortMinutes: 45 });
  engine.createTask({ title: 'Ship', priority: 4, dependencies: [b.id, 'external'] });
  engine.completeTask(a.id);
  engine.markReminded(b.id);
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected an error');
}

describe('toRecord / fromRecord', () => {
  it('round-trips every field, including absent deadline and effort', () => {
    const rec: TaskRecord = {
      id: 'x',
      title: 'X',
      description: 'd',
      priority: 2,
      deadline: null,
      createdAt: '2026-03-01T08:00:00.000Z',
      completed: false,
      progress: 10,
      dependencies: ['y'],
      tags: ['a'],
      estimatedEffortMinutes: null,
      autoAssigned: true,
      notified: true,
    };
    const task = fromRecord(rec);
    expect(task.deadline).toBeUndefined();
    expect(task.estimatedEffortMinutes).toBeUndefined();
    expect(task.orderingKey).toEqual([2, Infinity]);
    expect(toRecord(task)).toEqual(rec);
  });
});

describe('export / import', () => {
  it('reproduces the same task set in an empty store', () => {
    const source = setup();
    populate(source);
    const snapshot = source.exportSnapshot();

    const target = setup('other');
    target.importSnapshot(snapshot);
    expect(target.exportSnapshot()).toEqual(snapshot);
    expect(target.peekNext()?.id).toBe('t2');
  });

  it('overwrites a populated store instead of merging', () => {
    const source = setup();
    populate(source);

    const target = setup('old');
    target.createTask({ title: 'Stale', priority: 1 });
    target.importSnapshot(source.exportSnapshot());

    expect(target.listTasks().map((t) => t.id)).toEqual(['t1', 't2', 't3']);
    expect(target.exportSnapshot()).toEqual(source.exportSnapshot());
  });

  it('exports copies, not live task state', () => {
    const engine = setup();
    engine.createTask({ title: 'A', priority: 1, tags: ['x'] });
    const snapshot = engine.exportSnapshot();
    snapshot.tasks[0].tags.push('y');
    expect(engine.getTask('t1').tags).toEqual(['x']);
  });

  it('accepts JSON text', () => {
    const source = setup();
    populate(source);
    const target = setup();
    target.importSnapshot(JSON.stringify(source.exportSnapshot()));
    expect(target.exportSnapshot()).toEqual(source.exportSnapshot());
  });

  it('fills missing optional fields with creation defaults', () => {
    const engine = setup('fresh');
    engine.importSnapshot({ tasks: [{ title: 'Bare' }] });
    expect(engine.exportSnapshot().tasks).toEqual([
      {
        id: 'fresh1',
        title: 'Bare',
        description: '',
        priority: 5,
        deadline: null,
        createdAt: '2026-03-02T12:00:00.000Z',
        completed: false,
        progress: 0,
        dependencies: [],
        tags: [],
        estimatedEffortMinutes: null,
        autoAssigned: false,
        notified: false,
      },
    ]);
  });

  it('treats a payload without tasks as empty', () => {
    const engine = setup();
    engine.createTask({ title: 'A', priority: 1 });
    engine.importSnapshot({});
    expect(engine.listTasks()).toEqual([]);
  });

  it('normalizes timestamps and completes tasks imported at 100%', () => {
    const engine = setup();
    engine.importSnapshot({
      tasks: [{ id: 'a', title: 'A', deadline: '2026-03-05T09:00:00+02:00', progress: 100 }],
    });
    expect(engine.getTask('a')).toMatchObject({ deadline: '2026-03-05T07:00:00.000Z', completed: true });
    expect(engine.peekNext()).toBeUndefined();
  });

  it('rejects malformed payloads and leaves the store untouched', () => {
    const engine = setup();
    engine.createTask({ title: 'Keep me', priority: 1 });
    const before = engine.exportSnapshot();

    const bad: unknown[] = [
      'not json',
      [],
      { tasks: 'nope' },
      { tasks: [{ id: 'a', progress: 150 }] },
      { tasks: [{ id: 'a', deadline: 'garbage' }] },
      { tasks: [{ id: 'a', priority: 1.5 }] },
      { tasks: [{ id: 'a' }, { id: 'b' }, { id: 'a' }] },
      null,
    ];
    for (const payload of bad) {
      expect(() => engine.importSnapshot(payload)).toThrow(FormatError);
    }
    expect(engine.exportSnapshot()).toEqual(before);
  });

  it('reports what is wrong', () => {
    const engine = setup();
    const err = catchError(() => engine.importSnapshot({ tasks: [{ id: 'a' }, { id: 'a' }] }));
    expect(err).toMatchObject({ issues: ['a'], code: 'FORMAT' });

    const bad = catchError(() => engine.importSnapshot({ tasks: [{ progress: 101 }] }));
    expect(bad).toBeInstanceOf(FormatError);
    expect(bad).toMatchObject({ issues: [expect.stringMatching(/^tasks\.0\.progress: /)] });
  });
});
