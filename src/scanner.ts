import fs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import {
  PathNotFoundError,
  PermissionError,
  ScanError,
  describeError,
  errnoCode,
} from './errors';
import type { RepoSnapshot, SnapshotFile } from './types';

export const TARGET_FILES = [
  'AGENTS.md',
  'CLAUDE.md',
  'GEMINI.md',
  '.cursorrules',
  'CHANGELOG.md',
] as const;

// version-control metadata, dependency caches and build output
export const IGNORED_DIRS = [
  '.git',
  '.hg',
  '.svn',
  'node_modules',
  'bower_components',
  'vendor',
  '.venv',
  'venv',
  '__pycache__',
  '.tox',
  '.cache',
  '.next',
  'dist',
  'build',
] as const;

const MAX_LINK_HOPS = 8;

function errorPath(err: unknown, fallback: string): string {
  if (typeof err === 'object' && err !== null && 'path' in err) {
    return typeof err.path === 'string' ? err.path : fallback;
  }
  return fallback;
}

/** Map a filesystem error onto the fatal error taxonomy. */
export function toScanError(
  err: unknown,
  target: string
): PathNotFoundError | PermissionError | ScanError {
  const where = errorPath(err, target);
  switch (errnoCode(err)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return new PathNotFoundError(where);
    case 'EACCES':
    case 'EPERM':
      return new PermissionError(where, { cause: err });
    default:
      return new ScanError(where, describeError(err), { cause: err });
  }
}

async function assertReadableDirectory(root: string): Promise<void> {
  const stat = await fs.stat(root).catch((e: unknown) => {
    throw toScanError(e, root);
  });
  if (!stat.isDirectory()) {
    throw new PathNotFoundError(root, 'is not a directory');
  }
  try {
    await fs.access(root, fs.constants.R_OK | fs.constants.X_OK);
  } catch (e) {
    throw toScanError(e, root);
  }
}

async function readContent(abs: string, isSymlink: boolean): Promise<string | null> {
  try {
    return await fs.readFile(abs, 'utf8');
  } catch (e) {
    const code = errnoCode(e);
    const dangling =
      code === 'ENOENT' || code === 'ELOOP' || code === 'ENOTDIR' || code === 'EISDIR';
    if (isSymlink && dangling) return null;
    throw toScanError(e, abs);
  }
}

async function readEntry(root: string, entry: fg.Entry): Promise<SnapshotFile> {
  const abs = path.join(root, entry.path);
  const isSymlink = entry.dirent.isSymbolicLink();
  let symlinkTarget: string | null = null;
  if (isSymlink) {
    try {
      symlinkTarget = await fs.readlink(abs);
    } catch (e) {
      throw toScanError(e, abs);
    }
  }
  const content = await readContent(abs, isSymlink);
  return Object.freeze({
    relativePath: entry.path,
    content,
    isSymlink,
    symlinkTarget,
  });
}

const byPath = (a: fg.Entry, b: fg.Entry) =>
  a.path < b.path ? -1 : a.path > b.path ? 1 : 0;

/**
 * Walk `rootPath` and record every file of interest. Symlinks are recorded,
 * not followed, during the walk; their content is read through the link.
 * The returned snapshot is frozen.
 */
export async function scanRepository(rootPath: string): Promise<RepoSnapshot> {
  const root = path.resolve(rootPath);
  await assertReadableDirectory(root);

  let entries: fg.Entry[];
  try {
    entries = await fg(`**/{${TARGET_FILES.join(',')}}`, {
      cwd: root,
      dot: true,
      onlyFiles: false,
      objectMode: true,
      followSymbolicLinks: false,
      caseSensitiveMatch: true,
      ignore: IGNORED_DIRS.map((d) => `**/${d}/**`),
    });
  } catch (e) {
    throw toScanError(e, root);
  }

  const candidates = entries
    .filter((e) => !e.dirent.isDirectory())
    .sort(byPath);

  const files: SnapshotFile[] = [];
  for (const entry of candidates) {
    files.push(await readEntry(root, entry));
  }

  return Object.freeze({ rootPath: root, files: Object.freeze(files) });
}

// ---------- Snapshot queries (pure) ----------

export function findFile(
  snapshot: RepoSnapshot,
  relativePath: string
): SnapshotFile | undefined {
  return snapshot.files.find((f) => f.relativePath === relativePath);
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/** One hop: the root-relative path a link points at, or null when it leaves the root. */
export function resolveLinkHop(
  rootPath: string,
  linkPath: string,
  target: string
): string | null {
  const rel = path.isAbsolute(target)
    ? toPosix(path.relative(rootPath, target))
    : path.posix.normalize(
        path.posix.join(path.posix.dirname(linkPath), toPosix(target))
      );
  if (rel === '' || rel === '.' || rel === '..' || rel.startsWith('../')) {
    return null;
  }
  if (path.posix.isAbsolute(rel)) return null;
  return rel;
}

/**
 * The root-relative paths a recorded symlink passes through, in hop order,
 * following further recorded symlinks. Stops where the chain leaves the
 * root, cycles, reaches a path that is not a recorded symlink, or exceeds the
 * hop limit. Empty for a regular file.
 */
export function linkChain(snapshot: RepoSnapshot, file: SnapshotFile): string[] {
  const chain: string[] = [];
  const seen = new Set<string>([file.relativePath]);
  let current = file;
  for (let hop = 0; hop < MAX_LINK_HOPS; hop++) {
    if (!current.isSymlink || current.symlinkTarget === null) break;
    const next = resolveLinkHop(
      snapshot.rootPath,
      current.relativePath,
      current.symlinkTarget
    );
    if (next === null || seen.has(next)) break;
    chain.push(next);
    const recorded = findFile(snapshot, next);
    if (!recorded || !recorded.isSymlink) break;
    seen.add(next);
    current = recorded;
  }
  return chain;
}
