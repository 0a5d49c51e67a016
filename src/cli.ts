import fs from 'node:fs';
import path from 'node:path';
import { DoctrineCheckError, describeError } from './errors';
import { evaluateRules, exitCodeFor } from './evaluator';
import {
  renderJsonReport,
  renderMarkdownReport,
  renderTextReport,
  writeJsonSummary,
} from './reporters';
import { RULES, selectRules } from './rule-catalog';
import { scanRepository } from './scanner';
import type { OutputFormat, Report } from './types';
import { createLogger, parseCLI } from './utils';
import type { Writable } from './utils';

export type CliIO = {
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
  isTTY?: boolean; // whether stdout is a terminal; colors need it
};

export const EXIT_INTERNAL_ERROR = 2;

export const HELP = `Usage: doctrine-check [PATH] [options]

Check a repository against the doctrine conventions for AGENTS.md,
CLAUDE.md/GEMINI.md symlinks, secrets and CHANGELOG.md.

Arguments:
  PATH                     Directory to scan (default: .)

Options:
  --format text|json|markdown
                           Output format (default: text, env DOCTRINE_FORMAT)
  --report FILE            Also write a JSON summary to FILE (env DOCTRINE_REPORT)
  --only R1,R4             Evaluate only the listed rules
  --no-color               Disable colors (also NO_COLOR)
  --version, -v            Print version
  --help, -h               Print this help

Exit codes:
  0  no MUST rule failed
  1  at least one MUST rule failed
  2  usage or internal error
`;

export function readVersion(): string {
  const pkg: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8')
  );
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
    return String(pkg.version);
  }
  return '0.0.0';
}

export function renderReport(
  report: Report,
  format: OutputFormat,
  color: boolean
): string {
  switch (format) {
    case 'json':
      return renderJsonReport(report);
    case 'markdown':
      return renderMarkdownReport(report);
    case 'text':
      return renderTextReport(report, { color });
  }
}

export function exitCodeForError(err: unknown): number {
  return err instanceof DoctrineCheckError ? err.exitCode : EXIT_INTERNAL_ERROR;
}

const defaultIO = (): CliIO => ({
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  isTTY: process.stdout.isTTY,
});

/** Scan, evaluate and print. Resolves to the process exit code; never rejects. */
export async function run(
  argv: string[],
  io: CliIO = defaultIO()
): Promise<number> {
  try {
    const cli = parseCLI(argv, io.env);
    if (cli.help) {
      io.stdout.write(HELP);
      return 0;
    }
    if (cli.version) {
      io.stdout.write(`${readVersion()}\n`);
      return 0;
    }

    const useColor = cli.color && !!io.isTTY;
    const logger = createLogger(io.stderr, useColor);
    const rules = cli.only ? selectRules(cli.only) : RULES;

    const snapshot = await scanRepository(cli.path);
    const report = evaluateRules(snapshot, rules, { logger });

    if (cli.reportPath) {
      const written = await writeJsonSummary(report, cli.reportPath);
      logger.info(`Wrote JSON summary to ${written}`);
    }
    io.stdout.write(renderReport(report, cli.format, useColor));
    return exitCodeFor(report);
  } catch (e) {
    const oneLine = describeError(e).replace(/\s*\r?\n\s*/g, ' ');
    io.stderr.write(`doctrine-check: ${oneLine}\n`);
    return exitCodeForError(e);
  }
}
