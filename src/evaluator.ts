import { RuleEvaluationError } from './errors';
import { RULES } from './rule-catalog';
import type {
  Logger,
  Report,
  ReportSummary,
  RepoSnapshot,
  Rule,
  RuleOutcome,
  RuleResult,
  Status,
} from './types';
import { consoleLogger } from './utils';

export type EvaluateOptions = {
  logger?: Logger;
};

export function statusFor(rule: Rule, outcome: RuleOutcome): Status {
  switch (outcome.kind) {
    case 'pass':
      return 'PASS';
    case 'inapplicable':
      return 'SKIP';
    case 'advisory':
      return 'WARN';
    case 'violation':
      return rule.severity === 'MUST' ? 'FAIL' : 'WARN';
  }
}

export function summarize(results: readonly RuleResult[]): ReportSummary {
  const count = (status: Status) =>
    results.filter((r) => r.status === status).length;
  return {
    total: results.length,
    passed: count('PASS'),
    failed: count('FAIL'),
    warned: count('WARN'),
    skipped: count('SKIP'),
  };
}

function evaluateOne(
  rule: Rule,
  snapshot: RepoSnapshot,
  logger: Logger
): RuleResult {
  let outcome: RuleOutcome;
  try {
    outcome = rule.check(snapshot);
  } catch (cause) {
    const err = new RuleEvaluationError(rule.id, { cause });
    logger.warn(`${err.message}; reporting ${rule.id} as SKIP`);
    return {
      rule_id: rule.id,
      severity: rule.severity,
      status: 'SKIP',
      message: err.message,
      file_ref: null,
    };
  }
  return {
    rule_id: rule.id,
    severity: rule.severity,
    status: statusFor(rule, outcome),
    message: outcome.message,
    file_ref: outcome.fileRef ?? null,
  };
}

/**
 * Apply every rule, in order, to one snapshot. A rule that throws is
 * isolated into a SKIP result; the remaining rules still run.
 */
export function evaluateRules(
  snapshot: RepoSnapshot,
  rules: readonly Rule[] = RULES,
  opts: EvaluateOptions = {}
): Report {
  const logger = opts.logger ?? consoleLogger;
  const results = rules.map((rule) => evaluateOne(rule, snapshot, logger));
  return { root: snapshot.rootPath, results, summary: summarize(results) };
}

export function exitCodeFor(report: Report): 0 | 1 {
  return report.results.some((r) => r.status === 'FAIL') ? 1 : 0;
}
