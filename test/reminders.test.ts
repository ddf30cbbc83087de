import { describe, expect, it } from 'vitest';
import { findDueReminders } from '../src/reminders.js';
import { SchedulingEngine } from '../src/scheduler/engine.js';

const NOW = Date.parse('2026-03-02T12:00:00.000Z');
const inMinutes = (m: number) => new Date(NOW + m * 60_000).toISOString();

function setup() {
  let n = 0;
  return new SchedulingEngine({ clock: { now: () => NOW }, ids: { newId: () => `t${++n}` } });
}

describe('findDueReminders', () => {
  it('selects open, un-notified tasks inside [now - grace, now + window]', () => {
    const engine = setup();
    engine.createTask({ title: 'in 30m', priority: 3, deadline: inMinutes(30) });
    engine.createTask({ title: 'in 60m', priority: 3, deadline: inMinutes(60) });
    engine.createTask({ title: 'in 61m', priority: 3, deadline: inMinutes(61) });
    engine.createTask({ title: '30m late', priority: 3, deadline: inMinutes(-30) });
    engine.createTask({ title: '61m late', priority: 3, deadline: inMinutes(-61) });
    engine.createTask({ title: 'no deadline', priority: 3 });
    const done = engine.createTask({ title: 'done', priority: 3, deadline: inMinutes(10) });
    const told = engine.createTask({ title: 'told', priority: 3, deadline: inMinutes(10) });
    engine.completeTask(done.id);
    engine.markReminded(told.id);

    const due = findDueReminders(engine.listTasks(), NOW);
    expect(due.map((t) => t.title)).toEqual(['in 30m', 'in 60m', '30m late']);
  });

  it('honours custom window and grace', () => {
    const engine = setup();
    engine.createTask({ title: 'in 90m', priority: 3, deadline: inMinutes(90) });
    engine.createTask({ title: '5m late', priority: 3, deadline: inMinutes(-5) });

    expect(findDueReminders(engine.listTasks(), NOW, { windowMinutes: 120, graceMinutes: 0 }).map((t) => t.title)).toEqual([
      'in 90m',
    ]);
  });

  it('does not repeat once a task is marked reminded', () => {
    const engine = setup();
    engine.createTask({ title: 'soon', priority: 3, deadline: inMinutes(15) });

    const first = findDueReminders(engine.listTasks(), NOW);
    for (const t of first) engine.markReminded(t.id);
    expect(first).toHaveLength(1);
    expect(findDueReminders(engine.listTasks(), NOW)).toEqual([]);
  });
});
