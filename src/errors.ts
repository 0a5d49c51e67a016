// Fatal errors carry exit code 2. Repository findings are never thrown.

export abstract class DoctrineCheckError extends Error {
  readonly exitCode: number = 2;
}

export class PathNotFoundError extends DoctrineCheckError {
  constructor(readonly targetPath: string, reason = 'does not exist') {
    super(`path ${targetPath} ${reason}`);
    this.name = 'PathNotFoundError';
  }
}

export class PermissionError extends DoctrineCheckError {
  constructor(readonly targetPath: string, options?: { cause?: unknown }) {
    super(`cannot read ${targetPath}: permission denied`, options);
    this.name = 'PermissionError';
  }
}

export class ScanError extends DoctrineCheckError {
  constructor(readonly targetPath: string, message: string, options?: { cause?: unknown }) {
    super(`failed to scan ${targetPath}: ${message}`, options);
    this.name = 'ScanError';
  }
}

export class UsageError extends DoctrineCheckError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * A rule predicate threw. This is a defect in the rule, not a finding about
 * the repository; the evaluator converts it into a SKIP result.
 */
export class RuleEvaluationError extends DoctrineCheckError {
  constructor(readonly ruleId: string, options: { cause: unknown }) {
    super(`internal error in rule ${ruleId}: ${describeError(options.cause)}`, options);
    this.name = 'RuleEvaluationError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}
