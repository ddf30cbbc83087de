import { describe, expect, it } from 'vitest';
import { countWords, estimateEffortMinutes, estimateTask, parseNaturalText } from '../src/heuristics.js';

const NOW = Date.parse('2026-03-02T12:00:00.000Z');
const HOUR = 60 * 60 * 1000;
const inHours = (h: number) => new Date(NOW + h * HOUR).toISOString();

describe('estimateTask', () => {
  it('marks urgent text as priority 1 with the minimum effort', () => {
    const est = estimateTask({ title: 'Report', description: 'Finish report, urgent' }, NOW);
    expect(est).toEqual({ priority: 1, deadline: undefined, tags: ['urgent'], estimatedEffortMinutes: 15 });
  });

  it('lets the urgent tier win over other keywords', () => {
    const est = estimateTask({ title: 'Important but low effort', description: 'do it ASAP' }, NOW);
    expect(est.priority).toBe(1);
    expect(est.tags).toEqual(['urgent']);
  });

  it('maps high/important to 2 and low/whenever to 7', () => {
    expect(estimateTask({ title: 'Important client call', description: '' }, NOW)).toMatchObject({
      priority: 2,
      tags: ['high'],
    });
    expect(estimateTask({ title: 'Clean desk', description: 'whenever' }, NOW)).toMatchObject({
      priority: 7,
      tags: ['low'],
    });
  });

  it('matches keywords as substrings', () => {
    // "follow" contains "low"
    expect(estimateTask({ title: 'Follow up with Sam', description: '' }, NOW)).toMatchObject({
      priority: 7,
      tags: ['low'],
    });
  });

  it('keeps the default priority when nothing applies', () => {
    expect(estimateTask({ title: 'Write tests', description: 'for the parser' }, NOW)).toMatchObject({
      priority: 5,
      tags: [],
    });
  });

  it('tightens priority by deadline proximity', () => {
    const at = (h: number) => estimateTask({ title: 'Plain task', description: '', deadline: inHours(h) }, NOW);
    expect(at(6)).toMatchObject({ priority: 1, tags: ['due_12h'] });
    expect(at(12)).toMatchObject({ priority: 1, tags: ['due_12h'] });
    expect(at(20)).toMatchObject({ priority: 2, tags: ['due_24h'] });
    expect(at(48)).toMatchObject({ priority: 3, tags: ['due_3d'] });
    expect(at(120)).toMatchObject({ priority: 5, tags: [] });
    expect(at(-3)).toMatchObject({ priority: 1, tags: ['due_12h'] });
  });

  it('never loosens priority because of a deadline but can tighten a low task', () => {
    const urgent = estimateTask({ title: 'urgent', description: '', deadline: inHours(48) }, NOW);
    expect(urgent).toMatchObject({ priority: 1, tags: ['urgent', 'due_3d'] });

    const low = estimateTask({ title: 'whenever', description: '', deadline: inHours(20) }, NOW);
    expect(low).toMatchObject({ priority: 2, tags: ['low', 'due_24h'] });
  });

  it('passes the deadline through unchanged', () => {
    const deadline = inHours(100);
    expect(estimateTask({ title: 'x', description: '', deadline }, NOW).deadline).toBe(deadline);
  });
});

describe('estimateEffortMinutes', () => {
  const words = (n: number) => Array.from({ length: n }, () => 'word').join(' ');

  it('counts whitespace-separated words', () => {
    expect(countWords('')).toBe(0);
    expect(countWords('  two\twords \n')).toBe(2);
  });

  it('adds 8 minutes per 20 words within [15, 80]', () => {
    expect(estimateEffortMinutes('')).toBe(15);
    expect(estimateEffortMinutes(words(19))).toBe(15);
    expect(estimateEffortMinutes(words(40))).toBe(24);
    expect(estimateEffortMinutes(words(60))).toBe(32);
    expect(estimateEffortMinutes(words(200))).toBe(80);
  });
});

describe('parseNaturalText', () => {
  it('keeps short text as the title', () => {
    expect(parseNaturalText('Water the plants', NOW)).toEqual({
      title: 'Water the plants',
      description: 'Water the plants',
    });
  });

  it('truncates titles longer than 60 characters to 57 + ellipsis', () => {
    const text = 'a'.repeat(61);
    const out = parseNaturalText(text, NOW);
    expect(out.title).toBe('a'.repeat(57) + '...');
    expect(out.description).toBe(text);

    expect(parseNaturalText('b'.repeat(60), NOW).title).toBe('b'.repeat(60));
  });

  it('infers a deadline from today/tomorrow, tomorrow first', () => {
    expect(parseNaturalText('Call mom tomorrow', NOW).deadline).toBe('2026-03-03T12:00:00.000Z');
    expect(parseNaturalText('Pay rent TODAY', NOW).deadline).toBe('2026-03-02T12:00:00.000Z');
    expect(parseNaturalText('today or tomorrow', NOW).deadline).toBe('2026-03-03T12:00:00.000Z');
  });

  it('hints urgency with the urgent keywords only', () => {
    expect(parseNaturalText('fix prod immediately', NOW).priorityHint).toBe('urgent');
    expect(parseNaturalText('important memo', NOW).priorityHint).toBeUndefined();
  });
});
