import { UsageError } from './errors';
import type { CLIOpts, Logger, OutputFormat } from './types';

// ---------- Pretty logging ----------
export const color = {
  dim: (s: string) => `\x1b[2m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
};

export type Paint = typeof color;

const identity = (s: string) => s;

export const noColor: Paint = {
  dim: identity,
  gray: identity,
  red: identity,
  green: identity,
  yellow: identity,
  cyan: identity,
  bold: identity,
};

export function paint(enabled: boolean): Paint {
  return enabled ? color : noColor;
}

export type Writable = { write: (chunk: string) => unknown };

// diagnostics only; reports are written by the caller
export function createLogger(stream: Writable, useColor = false): Logger {
  const p = paint(useColor);
  return {
    info: (message) => {
      stream.write(`${p.dim('info')} ${message}\n`);
    },
    warn: (message) => {
      stream.write(`${p.yellow('warn')} ${message}\n`);
    },
  };
}

export const consoleLogger: Logger = createLogger(process.stderr);

// ---------- Helpers ----------

const FORMATS: readonly OutputFormat[] = ['text', 'json', 'markdown'];

function isOutputFormat(value: string): value is OutputFormat {
  return FORMATS.some((f) => f === value);
}

export function parseFormat(value: string | undefined): OutputFormat {
  const v = (value ?? '').trim().toLowerCase();
  if (isOutputFormat(v)) return v;
  throw new UsageError(
    `invalid --format '${value ?? ''}' (expected ${FORMATS.join(', ')})`
  );
}

function parseIdList(value: string | undefined): string[] {
  const ids = (value ?? '')
    .split(',')
    .map((s) => s.trim().toUpperCase())
    .filter(Boolean);
  if (ids.length === 0) {
    throw new UsageError('--only expects a comma-separated list of rule ids');
  }
  return ids;
}

export function parseCLI(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): CLIOpts {
  const opts: CLIOpts = {
    path: '.',
    format: env.DOCTRINE_FORMAT ? parseFormat(env.DOCTRINE_FORMAT) : 'text',
    reportPath: env.DOCTRINE_REPORT || null,
    only: null,
    color: !env.NO_COLOR,
    help: false,
    version: false,
  };
  const positional: string[] = [];

  const valueOf = (flag: string, i: number): string => {
    const v = argv[i];
    if (v === undefined || v.startsWith('--')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i];
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const a = eq === -1 ? raw : raw.slice(0, eq);
    const inline = eq === -1 ? undefined : raw.slice(eq + 1);

    switch (a) {
      case '--format':
        opts.format = parseFormat(inline ?? valueOf(a, ++i));
        break;
      case '--report':
        opts.reportPath = inline ?? valueOf(a, ++i);
        break;
      case '--only':
        opts.only = parseIdList(inline ?? valueOf(a, ++i));
        break;
      case '--no-color':
        opts.color = false;
        break;
      case '--help':
      case '-h':
        opts.help = true;
        break;
      case '--version':
      case '-v':
        opts.version = true;
        break;
      default:
        if (a.startsWith('-') && a !== '-') {
          throw new UsageError(`unknown flag: ${a}`);
        }
        positional.push(raw);
    }
  }

  if (positional.length > 1) {
    throw new UsageError(
      `expected at most one PATH, got ${positional.length}: ${positional.join(' ')}`
    );
  }
  if (positional.length === 1) opts.path = positional[0];
  return opts;
}

export function countLines(content: string): number {
  if (content === '') return 0;
  const lines = content.split('\n').length;
  return content.endsWith('\n') ? lines - 1 : lines;
}
