import path from 'node:path';
import { UsageError } from './errors';
import { findReference, parseMarkdown, preamble, splitSections } from './markdown';
import { findFile, linkChain } from './scanner';
import { findSecrets } from './secrets';
import type { RepoSnapshot, Rule, RuleOutcome, SnapshotFile } from './types';
import { countLines } from './utils';

export const AGENTS_MD = 'AGENTS.md';
export const CHANGELOG_MD = 'CHANGELOG.md';
export const AGENTS_MD_WARN_LINES = 500;
export const AGENTS_MD_MAX_LINES = 1000;

const SYMLINKED_NAMES = ['CLAUDE.md', 'GEMINI.md'];
const KEEP_A_CHANGELOG = /keep a changelog|keepachangelog\.com/i;
const STANDARDS_HEADING = /\bstandards\b/i;

// ---------- Outcome constructors ----------

const pass = (message: string, fileRef?: string): RuleOutcome => ({
  kind: 'pass',
  message,
  fileRef,
});
const violation = (message: string, fileRef?: string): RuleOutcome => ({
  kind: 'violation',
  message,
  fileRef,
});
const advisory = (message: string, fileRef?: string): RuleOutcome => ({
  kind: 'advisory',
  message,
  fileRef,
});
const inapplicable = (message: string): RuleOutcome => ({
  kind: 'inapplicable',
  message,
});

function agentsContent(snapshot: RepoSnapshot): string | null {
  return findFile(snapshot, AGENTS_MD)?.content ?? null;
}

/**
 * A tool-specific file must be a symlink whose chain reaches `canonical`.
 * Where `canonical` itself links on, only the readable end of the chain
 * matters.
 */
function checkLinksTo(
  snapshot: RepoSnapshot,
  file: SnapshotFile,
  canonical: string
): RuleOutcome {
  const name = file.relativePath;
  if (!file.isSymlink) {
    return violation(
      `${name} is a regular file; replace it with a symlink to ${canonical}`,
      name
    );
  }
  if (!linkChain(snapshot, file).includes(canonical)) {
    return violation(
      `${name} links to ${file.symlinkTarget ?? '(unknown)'}, not ${canonical}`,
      name
    );
  }
  if (file.content === null) {
    return violation(`${name} links to ${canonical}, which does not exist`, name);
  }
  return pass(`${name} is a symlink to ${canonical}`, name);
}

function rootLinkRule(name: string) {
  return (snapshot: RepoSnapshot): RuleOutcome => {
    const file = findFile(snapshot, name);
    if (!file) return inapplicable(`no ${name} at repository root`);
    return checkLinksTo(snapshot, file, AGENTS_MD);
  };
}

// ---------- Predicates ----------

function agentsExists(snapshot: RepoSnapshot): RuleOutcome {
  const file = findFile(snapshot, AGENTS_MD);
  if (!file) return violation('AGENTS.md not found at repository root');
  if (file.content === null) {
    return violation('AGENTS.md is a broken symlink', AGENTS_MD);
  }
  return pass('AGENTS.md found at repository root', AGENTS_MD);
}

function agentsLength(snapshot: RepoSnapshot): RuleOutcome {
  const content = agentsContent(snapshot);
  if (content === null) return inapplicable('AGENTS.md not available');
  const lines = countLines(content);
  if (lines > AGENTS_MD_MAX_LINES) {
    return violation(
      `AGENTS.md has ${lines} lines, above the limit of ${AGENTS_MD_MAX_LINES}`,
      AGENTS_MD
    );
  }
  if (lines > AGENTS_MD_WARN_LINES) {
    return advisory(
      `AGENTS.md has ${lines} lines; keep it within ${AGENTS_MD_WARN_LINES}`,
      AGENTS_MD
    );
  }
  return pass(`AGENTS.md has ${lines} lines`, AGENTS_MD);
}

function agentsHasNoSecrets(snapshot: RepoSnapshot): RuleOutcome {
  const content = agentsContent(snapshot);
  if (content === null) return inapplicable('AGENTS.md not available');
  const findings = findSecrets(content);
  if (findings.length === 0) {
    return pass('no secret-like patterns in AGENTS.md', AGENTS_MD);
  }
  const [first] = findings;
  const more = findings.length > 1 ? ` (+${findings.length - 1} more)` : '';
  return violation(
    `AGENTS.md contains a ${first.pattern} on line ${first.line}${more}`,
    `${AGENTS_MD}:${first.line}`
  );
}

function agentsReferencesStandards(snapshot: RepoSnapshot): RuleOutcome {
  const raw = agentsContent(snapshot);
  if (raw === null) return inapplicable('AGENTS.md not available');

  const { data, content, frontMatterError } = parseMarkdown(raw);
  const declared = typeof data.doctrine === 'string' ? findReference(data.doctrine) : null;
  if (declared) {
    return pass(`AGENTS.md front matter names doctrine source ${declared}`, AGENTS_MD);
  }

  // section lines are counted from the end of the front matter
  const offset = countLines(raw) - countLines(content);
  const section = splitSections(content).find((s) => STANDARDS_HEADING.test(s.heading));
  if (!section) {
    const note = frontMatterError ? ` (front matter unreadable: ${frontMatterError})` : '';
    return violation(`AGENTS.md has no Standards section${note}`, AGENTS_MD);
  }
  const ref = `${AGENTS_MD}:${section.line + offset}`;
  const source = findReference(section.body);
  if (!source) {
    return violation(
      `Standards section does not reference an external doctrine source`,
      ref
    );
  }
  return pass(`Standards section references ${source}`, ref);
}

function changelogFollowsKeepAChangelog(snapshot: RepoSnapshot): RuleOutcome {
  const file = findFile(snapshot, CHANGELOG_MD);
  if (!file) return violation('CHANGELOG.md not found at repository root');
  if (file.content === null) {
    return violation('CHANGELOG.md is a broken symlink', CHANGELOG_MD);
  }
  if (!KEEP_A_CHANGELOG.test(preamble(file.content))) {
    return violation(
      'CHANGELOG.md preamble lacks the Keep a Changelog marker',
      CHANGELOG_MD
    );
  }
  return pass('CHANGELOG.md follows Keep a Changelog', CHANGELOG_MD);
}

function nestedFilesLinkToSiblings(snapshot: RepoSnapshot): RuleOutcome {
  const nested = snapshot.files.filter((f) => {
    const dir = path.posix.dirname(f.relativePath);
    return dir !== '.' && SYMLINKED_NAMES.includes(path.posix.basename(f.relativePath));
  });
  if (nested.length === 0) {
    return inapplicable('no CLAUDE.md or GEMINI.md below the repository root');
  }

  const failures = nested
    .map((f) =>
      checkLinksTo(
        snapshot,
        f,
        path.posix.join(path.posix.dirname(f.relativePath), AGENTS_MD)
      )
    )
    .filter((o) => o.kind !== 'pass');
  if (failures.length === 0) {
    return pass(`${nested.length} nested file(s) link to their AGENTS.md`);
  }
  const [first] = failures;
  const more = failures.length > 1 ? ` (+${failures.length - 1} more)` : '';
  return violation(`${first.message}${more}`, first.fileRef);
}

// ---------- Catalog ----------

const DEFINITIONS: Rule[] = [
  {
    id: 'R1',
    severity: 'MUST',
    description: 'AGENTS.md exists at repository root',
    check: agentsExists,
  },
  {
    id: 'R2',
    severity: 'MUST',
    description: 'CLAUDE.md, if present, is a symlink to AGENTS.md',
    check: rootLinkRule('CLAUDE.md'),
  },
  {
    id: 'R3',
    severity: 'MUST',
    description: `AGENTS.md is at most ${AGENTS_MD_MAX_LINES} lines (warn above ${AGENTS_MD_WARN_LINES})`,
    check: agentsLength,
  },
  {
    id: 'R4',
    severity: 'MUST',
    description: 'AGENTS.md does not contain committed secrets',
    check: agentsHasNoSecrets,
  },
  {
    id: 'R5',
    severity: 'SHOULD',
    description: 'AGENTS.md has a Standards section referencing the doctrine source',
    check: agentsReferencesStandards,
  },
  {
    id: 'R6',
    severity: 'SHOULD',
    description: 'CHANGELOG.md exists and follows Keep a Changelog',
    check: changelogFollowsKeepAChangelog,
  },
  {
    id: 'R7',
    severity: 'MUST',
    description: 'GEMINI.md, if present, is a symlink to AGENTS.md',
    check: rootLinkRule('GEMINI.md'),
  },
  {
    id: 'R8',
    severity: 'SHOULD',
    description: 'Nested CLAUDE.md and GEMINI.md link to their sibling AGENTS.md',
    check: nestedFilesLinkToSiblings,
  },
  {
    id: 'R9',
    severity: 'MAY',
    description: 'A legacy .cursorrules is kept only as a symlink to AGENTS.md',
    check: rootLinkRule('.cursorrules'),
  },
];

export const RULES: readonly Rule[] = Object.freeze(
  DEFINITIONS.map((r) => Object.freeze(r))
);

export const RULES_BY_ID: ReadonlyMap<string, Rule> = new Map(
  RULES.map((r) => [r.id, r])
);

/** The named rules in catalog order. */
export function selectRules(ids: readonly string[]): readonly Rule[] {
  const unknown = ids.filter((id) => !RULES_BY_ID.has(id));
  if (unknown.length) {
    throw new UsageError(`unknown rule id(s): ${unknown.join(', ')}`);
  }
  return RULES.filter((r) => ids.includes(r.id));
}
