export type PlannerErrorCode = 'NOT_FOUND' | 'DEPENDENCY' | 'PARSE' | 'FORMAT';

export class PlannerError extends Error {
  constructor(
    message: string,
    public readonly code: PlannerErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends PlannerError {
  constructor(public readonly id: string) {
    super(`Task not found: ${id}`, 'NOT_FOUND');
  }
}

/** Completion blocked; `unmet` lists the dependency ids that are missing or still open. */
export class DependencyError extends PlannerError {
  constructor(
    public readonly id: string,
    public readonly unmet: string[],
  ) {
    super(`Unmet dependencies for ${id}: ${unmet.join(', ')}`, 'DEPENDENCY');
  }
}

export class ParseError extends PlannerError {
  constructor(public readonly input: string) {
    super(`Could not parse date: "${input}"`, 'PARSE');
  }
}

export class FormatError extends PlannerError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message, 'FORMAT');
  }
}

export function isPlannerError(e: unknown): e is PlannerError {
  return e instanceof PlannerError;
}
