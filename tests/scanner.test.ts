import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { PathNotFoundError, PermissionError, ScanError } from '../src/errors';
import {
  findFile,
  resolveLinkHop,
  linkChain,
  scanRepository,
  toScanError,
} from '../src/scanner';
import { file, makeRepo, removeRepo, snapshot } from './helpers';

let root: string | null = null;

afterEach(() => {
  if (root) removeRepo(root);
  root = null;
});

describe('scanRepository', () => {
  it('returns an empty snapshot for an empty directory', async () => {
    root = makeRepo();
    const snap = await scanRepository(root);
    expect(snap.rootPath).toBe(path.resolve(root));
    expect(snap.files).toEqual([]);
  });

  it('finds files of interest anywhere in the tree, sorted by path', async () => {
    root = makeRepo({
      files: {
        'AGENTS.md': '# Root\n',
        'CHANGELOG.md': '# Changelog\n',
        '.cursorrules': 'rules\n',
        'README.md': 'not of interest\n',
        'docs/GEMINI.md': 'gemini\n',
        'packages/a/AGENTS.md': '# A\n',
      },
    });
    const snap = await scanRepository(root);
    expect(snap.files.map((f) => f.relativePath)).toEqual([
      '.cursorrules',
      'AGENTS.md',
      'CHANGELOG.md',
      'docs/GEMINI.md',
      'packages/a/AGENTS.md',
    ]);
    expect(findFile(snap, 'AGENTS.md')).toEqual({
      relativePath: 'AGENTS.md',
      content: '# Root\n',
      isSymlink: false,
      symlinkTarget: null,
    });
  });

  it('skips ignored directories', async () => {
    root = makeRepo({
      files: {
        'AGENTS.md': '# Root\n',
        'node_modules/pkg/AGENTS.md': '# dependency\n',
        '.git/CLAUDE.md': 'metadata\n',
        '.venv/lib/CHANGELOG.md': 'cache\n',
      },
    });
    const snap = await scanRepository(root);
    expect(snap.files.map((f) => f.relativePath)).toEqual(['AGENTS.md']);
  });

  it('records symlinks with their raw target and reads through them', async () => {
    root = makeRepo({
      files: { 'AGENTS.md': '# Root\n' },
      links: { 'CLAUDE.md': 'AGENTS.md' },
    });
    const snap = await scanRepository(root);
    expect(findFile(snap, 'CLAUDE.md')).toEqual({
      relativePath: 'CLAUDE.md',
      content: '# Root\n',
      isSymlink: true,
      symlinkTarget: 'AGENTS.md',
    });
  });

  it('records a broken symlink with null content', async () => {
    root = makeRepo({ links: { 'CLAUDE.md': 'AGENTS.md' } });
    const snap = await scanRepository(root);
    expect(findFile(snap, 'CLAUDE.md')).toEqual({
      relativePath: 'CLAUDE.md',
      content: null,
      isSymlink: true,
      symlinkTarget: 'AGENTS.md',
    });
  });

  it('freezes the snapshot', async () => {
    root = makeRepo({ files: { 'AGENTS.md': '# Root\n' } });
    const snap = await scanRepository(root);
    expect(Object.isFrozen(snap)).toBe(true);
    expect(Object.isFrozen(snap.files)).toBe(true);
    expect(Object.isFrozen(snap.files[0])).toBe(true);
  });

  it('does not write to the scanned tree', async () => {
    root = makeRepo({ files: { 'AGENTS.md': '# Root\n' } });
    const before = fs.readdirSync(root).sort();
    await scanRepository(root);
    expect(fs.readdirSync(root).sort()).toEqual(before);
  });

  it('fails with PathNotFoundError for a missing path', async () => {
    root = makeRepo();
    const missing = path.join(root, 'nope');
    await expect(scanRepository(missing)).rejects.toBeInstanceOf(PathNotFoundError);
    await expect(scanRepository(missing)).rejects.toThrow(
      `path ${missing} does not exist`
    );
  });

  it('fails with PathNotFoundError when the path is a file', async () => {
    root = makeRepo({ files: { 'AGENTS.md': '# Root\n' } });
    const target = path.join(root, 'AGENTS.md');
    await expect(scanRepository(target)).rejects.toThrow(
      `path ${target} is not a directory`
    );
  });
});

describe('toScanError', () => {
  it('maps errno codes onto the fatal taxonomy', () => {
    const denied = toScanError(
      Object.assign(new Error('EACCES'), { code: 'EACCES' }),
      '/repo'
    );
    expect(denied).toBeInstanceOf(PermissionError);
    expect(denied.message).toBe('cannot read /repo: permission denied');
    expect(denied.exitCode).toBe(2);

    expect(toScanError({ code: 'ENOENT' }, '/repo')).toBeInstanceOf(PathNotFoundError);

    const other = toScanError(
      Object.assign(new Error('disk on fire'), { code: 'EIO', path: '/repo/a' }),
      '/repo'
    );
    expect(other).toBeInstanceOf(ScanError);
    expect(other.message).toBe('failed to scan /repo/a: disk on fire');
  });
});

describe('resolveLinkHop', () => {
  it('resolves relative targets against the link directory', () => {
    expect(resolveLinkHop('/repo', 'CLAUDE.md', 'AGENTS.md')).toBe('AGENTS.md');
    expect(resolveLinkHop('/repo', 'CLAUDE.md', './AGENTS.md')).toBe('AGENTS.md');
    expect(resolveLinkHop('/repo', 'pkg/CLAUDE.md', 'AGENTS.md')).toBe('pkg/AGENTS.md');
    expect(resolveLinkHop('/repo', 'pkg/CLAUDE.md', '../AGENTS.md')).toBe('AGENTS.md');
  });

  it('makes absolute targets relative to the root', () => {
    expect(resolveLinkHop('/repo', 'CLAUDE.md', '/repo/AGENTS.md')).toBe('AGENTS.md');
  });

  it('returns null for targets outside the root', () => {
    expect(resolveLinkHop('/repo', 'CLAUDE.md', '../other/AGENTS.md')).toBeNull();
    expect(resolveLinkHop('/repo', 'CLAUDE.md', '/elsewhere/AGENTS.md')).toBeNull();
  });
});

describe('linkChain', () => {
  it('follows chains through recorded symlinks', () => {
    const snap = snapshot(
      file('AGENTS.md', '# Root\n'),
      file('CLAUDE.md', '# Root\n', 'GEMINI.md'),
      file('GEMINI.md', '# Root\n', 'AGENTS.md')
    );
    expect(linkChain(snap, snap.files[1])).toEqual(['GEMINI.md', 'AGENTS.md']);
  });

  it('keeps the hops before a link that leaves the root', () => {
    const snap = snapshot(
      file('AGENTS.md', '# Shared\n', '/shared/AGENTS.md'),
      file('CLAUDE.md', '# Shared\n', 'AGENTS.md')
    );
    expect(linkChain(snap, snap.files[1])).toEqual(['AGENTS.md']);
  });

  it('stops on a cycle', () => {
    const snap = snapshot(
      file('CLAUDE.md', null, 'GEMINI.md'),
      file('GEMINI.md', null, 'CLAUDE.md')
    );
    expect(linkChain(snap, snap.files[0])).toEqual(['GEMINI.md']);
  });

  it('is empty for a regular file', () => {
    const snap = snapshot(file('AGENTS.md', '# Root\n'));
    expect(linkChain(snap, snap.files[0])).toEqual([]);
  });
});
