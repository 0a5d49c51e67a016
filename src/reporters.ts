// src/reporters.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import type {
  Report,
  RuleResult,
  Severity,
  Status,
  TextReportOptions,
} from './types';
import { paint } from './utils';
import type { Paint } from './utils';

const SEVERITY_ORDER: readonly Severity[] = ['MUST', 'SHOULD', 'MAY'];

function summaryLine(report: Report): string {
  const { passed, failed, warned, skipped, total } = report.summary;
  return `Summary: ${passed} passed, ${failed} failed, ${warned} warned, ${skipped} skipped (${total} total)`;
}

function paintStatus(p: Paint, status: Status): string {
  switch (status) {
    case 'PASS':
      return p.green(status);
    case 'FAIL':
      return p.red(status);
    case 'WARN':
      return p.yellow(status);
    case 'SKIP':
      return p.gray(status);
  }
}

/* ------------------------------- Text report ------------------------------- */

export function renderTextReport(
  report: Report,
  opts: TextReportOptions = {}
): string {
  const p = paint(!!opts.color);
  const lines = [p.bold(`Doctrine conformance report: ${report.root}`)];

  for (const severity of SEVERITY_ORDER) {
    const group = report.results.filter((r) => r.severity === severity);
    if (!group.length) continue;
    lines.push(p.bold(severity));
    for (const r of group) {
      const ref = r.file_ref ? ' ' + p.dim(`(${r.file_ref})`) : '';
      lines.push(`  ${paintStatus(p, r.status)}  ${r.rule_id}  ${r.message}${ref}`);
    }
  }

  lines.push(summaryLine(report));
  return lines.join('\n') + '\n';
}

/* ------------------------------- JSON report ------------------------------- */

// fixed key order so repeated runs serialize identically
function toRecord(r: RuleResult): RuleResult {
  return {
    rule_id: r.rule_id,
    severity: r.severity,
    status: r.status,
    message: r.message,
    file_ref: r.file_ref,
  };
}

export function renderJsonReport(report: Report): string {
  return JSON.stringify(report.results.map(toRecord), null, 2) + '\n';
}

/* ----------------------------- Markdown report ----------------------------- */

const badge = (status: Status) =>
  ({ PASS: '✅', FAIL: '❌', WARN: '⚠️', SKIP: '⏭️' })[status];

// keep table cells on one line and unbroken by pipes
const safe = (s: string) => s.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');

export function renderMarkdownReport(report: Report): string {
  const { passed, failed, warned, skipped, total } = report.summary;

  const header = [
    `# Doctrine Conformance Report`,
    ``,
    `**Repository:** \`${safe(report.root)}\``,
    ``,
    `| Passed | Failed | Warned | Skipped | Total |`,
    `| ---: | ---: | ---: | ---: | ---: |`,
    `| ${passed} | ${failed} | ${warned} | ${skipped} | ${total} |`,
    ``,
    `## Results`,
    ``,
  ];

  const table = report.results.length
    ? [
        `| Rule | Severity | Status | Message | File |`,
        `|:-----|:---------|:-------|:--------|:-----|`,
        ...report.results.map(
          (r) =>
            `| \`${r.rule_id}\` | ${r.severity} | ${badge(r.status)} ${
              r.status
            } | ${safe(r.message)} | ${r.file_ref ? `\`${safe(r.file_ref)}\`` : '—'} |`
        ),
      ]
    : [`_No rules were evaluated._`];

  const footer = [
    ``,
    `---`,
    failed ? '❌ **Result: FAIL**' : '✅ **Result: PASS**',
    ``,
  ];

  return [...header, ...table, ...footer].join('\n');
}

/* ------------------------------ Write to disk ------------------------------ */

export async function writeJsonSummary(
  report: Report,
  outPath: string
): Promise<string> {
  const target = path.resolve(outPath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  const doc = {
    root: report.root,
    summary: report.summary,
    results: report.results.map(toRecord),
  };
  await fs.writeFile(target, JSON.stringify(doc, null, 2) + '\n', 'utf8');
  return target;
}
