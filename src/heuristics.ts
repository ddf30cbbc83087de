import { DEFAULT_PRIORITY } from './model.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

const URGENT_WORDS = ['urgent', 'asap', 'immediately'];
const HIGH_WORDS = ['high', 'important'];
const LOW_WORDS = ['low', 'whenever'];

export const MIN_EFFORT_MINUTES = 15;
export const MAX_EFFORT_MINUTES = 80;

export interface EstimateInput {
  title: string;
  description: string;
  /** ISO deadline supplied by the caller. */
  deadline?: string;
}

export interface Estimate {
  priority: number;
  /** Passed through unchanged; no deadline is inferred from text here. */
  deadline?: string;
  tags: string[];
  estimatedEffortMinutes: number;
}

function mentionsAny(text: string, words: string[]) {
  return words.some((w) => text.includes(w));
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/** Roughly 8 minutes per 20 words of description, bounded to [15, 80]. */
export function estimateEffortMinutes(description: string): number {
  const raw = 8 * (Math.floor(countWords(description) / 20) + 1);
  return Math.max(MIN_EFFORT_MINUTES, Math.min(raw, MAX_EFFORT_MINUTES));
}

/**
 * Keyword + deadline-proximity heuristic.
 *
 * Keyword tiers are matched as case-insensitive substrings and the first
 * matching tier wins (urgent > high > low). A deadline can then only tighten
 * the priority: within 12h → 1, within 24h → 2, within 3 days → 3.
 */
export function estimateTask(input: EstimateInput, now: number): Estimate {
  const text = `${input.title} ${input.description}`.toLowerCase();
  const tags: string[] = [];
  let priority = DEFAULT_PRIORITY;

  if (mentionsAny(text, URGENT_WORDS)) {
    priority = 1;
    tags.push('urgent');
  } else if (mentionsAny(text, HIGH_WORDS)) {
    priority = Math.min(priority, 2);
    tags.push('high');
  } else if (mentionsAny(text, LOW_WORDS)) {
    priority = Math.max(priority, 7);
    tags.push('low');
  }

  if (input.deadline) {
    const remaining = Date.parse(input.deadline) - now;
    if (remaining <= 12 * HOUR_MS) {
      priority = Math.min(priority, 1);
      tags.push('due_12h');
    } else if (remaining <= 24 * HOUR_MS) {
      priority = Math.min(priority, 2);
      tags.push('due_24h');
    } else if (remaining <= 3 * DAY_MS) {
      priority = Math.min(priority, 3);
      tags.push('due_3d');
    }
  }

  return {
    priority,
    deadline: input.deadline,
    tags,
    estimatedEffortMinutes: estimateEffortMinutes(input.description),
  };
}

export interface ParsedText {
  title: string;
  description: string;
  /** ISO timestamp when the text mentions "tomorrow" or "today". */
  deadline?: string;
  priorityHint?: 'urgent';
}

const MAX_TITLE_LENGTH = 60;

/**
 * Best-effort stub for turning a free-form sentence into task fields. It
 * only knows "tomorrow", "today" and the urgent keywords; it is not a
 * natural-language parser and its vocabulary is intentionally fixed.
 */
export function parseNaturalText(text: string, now: number): ParsedText {
  const out: ParsedText = {
    title: text.length <= MAX_TITLE_LENGTH ? text : text.slice(0, MAX_TITLE_LENGTH - 3) + '...',
    description: text,
  };

  const lower = text.toLowerCase();
  if (lower.includes('tomorrow')) {
    out.deadline = new Date(now + DAY_MS).toISOString();
  } else if (lower.includes('today')) {
    out.deadline = new Date(now).toISOString();
  }

  if (mentionsAny(lower, URGENT_WORDS)) out.priorityHint = 'urgent';
  return out;
}
