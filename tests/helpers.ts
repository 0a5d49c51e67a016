import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { RepoSnapshot, SnapshotFile } from '../src/types';

export type RepoLayout = {
  files?: Record<string, string>;
  links?: Record<string, string>; // link path -> raw target
  dirs?: string[];
};

export function makeRepo(layout: RepoLayout = {}): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'doctrine-check-test-'));
  for (const dir of layout.dirs ?? []) {
    fs.mkdirSync(path.join(root, dir), { recursive: true });
  }
  for (const [rel, content] of Object.entries(layout.files ?? {})) {
    const abs = path.join(root, rel);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, content);
  }
  for (const [rel, target] of Object.entries(layout.links ?? {})) {
    const abs = path.join(root, rel);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.symlinkSync(target, abs);
  }
  return root;
}

export function removeRepo(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

export function lines(count: number, prefix = 'line'): string {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}\n`).join('');
}

export function file(
  relativePath: string,
  content: string | null = '',
  symlinkTarget: string | null = null
): SnapshotFile {
  return { relativePath, content, isSymlink: symlinkTarget !== null, symlinkTarget };
}

export function snapshot(...files: SnapshotFile[]): RepoSnapshot {
  return { rootPath: '/repo', files };
}

export type Captured = {
  stream: { write: (chunk: string) => boolean };
  text: () => string;
};

export function capture(): Captured {
  const chunks: string[] = [];
  return {
    stream: {
      write: (chunk: string) => {
        chunks.push(chunk);
        return true;
      },
    },
    text: () => chunks.join(''),
  };
}

// ten lines, a heading, nothing secret, no Standards section
export const PLAIN_AGENTS_MD = ['# Project', '', ...Array.from({ length: 8 }, (_, i) => `Note ${i + 1}.`)]
  .map((l) => `${l}\n`)
  .join('');
