import { fencedLines } from './markdown';

export type SecretPattern = {
  name: string;
  regex: RegExp;
};

export type SecretFinding = {
  pattern: string;
  line: number;
};

// order matters: the first pattern that matches a line names the finding.
// Prefixes may follow `_` or punctuation (KEY_sk_live_...), not a letter or digit.
export const SECRET_PATTERNS: readonly SecretPattern[] = Object.freeze([
  { name: 'payment live key', regex: /[sr]k_live_[A-Za-z0-9]{20,}/ },
  { name: 'Anthropic API key', regex: /(?<![A-Za-z0-9])sk-ant-[A-Za-z0-9_-]{20,}/ },
  { name: 'OpenAI API key', regex: /(?<![A-Za-z0-9])sk-(?:proj-)?[A-Za-z0-9_-]{20,}/ },
  { name: 'AWS access key id', regex: /(?<![A-Za-z0-9])(?:AKIA|ASIA)[0-9A-Z]{16}\b/ },
  { name: 'GitHub token', regex: /(?<![A-Za-z0-9])gh[pousr]_[A-Za-z0-9]{36,}\b/ },
  { name: 'Google API key', regex: /(?<![A-Za-z0-9])AIza[0-9A-Za-z_-]{35}\b/ },
  { name: 'Slack token', regex: /(?<![A-Za-z0-9])xox[abprs]-[A-Za-z0-9-]{10,}/ },
  { name: 'PEM private key', regex: /-----BEGIN (?:[A-Z]+ )*PRIVATE KEY-----/ },
]);

// `password = value` anywhere; `password: value` only in code or with a quoted value
const PASSWORD_ASSIGNMENT =
  /(?:\b|_)(?:password|passwd|pwd)\b["']?\s*([:=])\s*(["'`]?)([^\s"'`,;]+)\2/gi;

const PLACEHOLDER_WORDS = new Set([
  'changeme',
  'example',
  'none',
  'null',
  'password',
  'placeholder',
  'redacted',
  'secret',
  'todo',
  'xxx',
]);

export function isPlaceholder(value: string): boolean {
  const v = value.trim();
  const lower = v.toLowerCase();
  if (v === '' || PLACEHOLDER_WORDS.has(lower)) return true;
  if (/^<.*>$/.test(v) || /^\{\{.*\}\}$/.test(v)) return true; // <your-password>, {{ password }}
  if (/^\$\{?[A-Za-z_][A-Za-z0-9_]*\}?$/.test(v)) return true; // $DB_PASSWORD, ${DB_PASSWORD}
  if (/^[*x.]+$/i.test(v)) return true; // ****, xxxx, ...
  if (lower.startsWith('your') || lower.includes('example')) return true;
  if (lower.includes('process.env') || lower.includes('os.environ') || lower.includes('getenv')) {
    return true;
  }
  return false;
}

function passwordFinding(line: string, inCode: boolean): boolean {
  for (const m of line.matchAll(PASSWORD_ASSIGNMENT)) {
    const [, operator, quote, value] = m;
    if (operator === ':' && !inCode && quote === '') continue;
    if (!isPlaceholder(value)) return true;
  }
  return false;
}

/** Findings in line order; at most one per line. The matched text is never retained. */
export function findSecrets(content: string): SecretFinding[] {
  const fenced = fencedLines(content);
  const findings: SecretFinding[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    const hit = SECRET_PATTERNS.find((p) => p.regex.test(line));
    if (hit) {
      findings.push({ pattern: hit.name, line: index + 1 });
    } else if (passwordFinding(line, fenced[index])) {
      findings.push({ pattern: 'password assignment', line: index + 1 });
    }
  });
  return findings;
}
