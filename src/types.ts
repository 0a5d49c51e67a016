export type Severity = 'MUST' | 'SHOULD' | 'MAY';

export type Status = 'PASS' | 'FAIL' | 'WARN' | 'SKIP';

export type OutputFormat = 'text' | 'json' | 'markdown';

export type CLIOpts = {
  path: string;
  format: OutputFormat;
  reportPath: string | null; // JSON summary file, written alongside stdout output
  only: string[] | null; // rule ids, null = whole catalog
  color: boolean;
  help: boolean;
  version: boolean;
};

export type SnapshotFile = {
  relativePath: string; // POSIX separators, relative to the root
  content: string | null; // read through symlinks; null when the link is broken
  isSymlink: boolean;
  symlinkTarget: string | null; // raw link text, relative or absolute
};

export type RepoSnapshot = {
  rootPath: string;
  files: readonly SnapshotFile[];
};

export type RuleOutcome = {
  // violation maps to FAIL or WARN by severity; advisory is always WARN
  kind: 'pass' | 'violation' | 'advisory' | 'inapplicable';
  message: string;
  fileRef?: string;
};

export type Rule = {
  id: string;
  description: string;
  severity: Severity;
  check: (snapshot: RepoSnapshot) => RuleOutcome;
};

export type RuleResult = {
  rule_id: string;
  severity: Severity;
  status: Status;
  message: string;
  file_ref: string | null;
};

export type ReportSummary = {
  total: number;
  passed: number;
  failed: number;
  warned: number;
  skipped: number;
};

export type Report = {
  root: string;
  results: RuleResult[];
  summary: ReportSummary;
};

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
};

export type TextReportOptions = {
  color?: boolean; // default false
};
