import matter from 'gray-matter';
import { describeError } from './errors';

export type MarkdownSection = {
  heading: string;
  level: number;
  line: number; // 1-based, within the body passed to splitSections
  body: string;
};

export type ParsedMarkdown = {
  data: Record<string, unknown>;
  content: string;
  frontMatterError: string | null;
};

const HEADING = /^ {0,3}(#{1,6})[ \t]+(.*?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE = /^ {0,3}(`{3,}|~{3,})/;

/**
 * Split front matter from the body. Malformed front matter is reported
 * rather than thrown, and the whole input is treated as body.
 */
export function parseMarkdown(raw: string): ParsedMarkdown {
  try {
    const parsed = matter(raw);
    const data: Record<string, unknown> = { ...parsed.data };
    return { data, content: parsed.content, frontMatterError: null };
  } catch (e) {
    return { data: {}, content: raw, frontMatterError: describeError(e) };
  }
}

/** For each line, whether it is a fence marker or sits inside a fenced code block. */
export function fencedLines(markdown: string): boolean[] {
  let fence: { char: string; size: number } | null = null;
  return markdown.split(/\r?\n/).map((line) => {
    const f = FENCE.exec(line);
    if (f) {
      const marker = f[1];
      if (!fence) {
        fence = { char: marker[0], size: marker.length };
      } else if (marker[0] === fence.char && marker.length >= fence.size) {
        fence = null;
      }
      return true;
    }
    return fence !== null;
  });
}

/** ATX headings outside fenced code blocks, each with the text up to the next heading of the same or higher level. */
export function splitSections(markdown: string): MarkdownSection[] {
  const lines = markdown.split(/\r?\n/);
  const fenced = fencedLines(markdown);
  const headings: Array<{ heading: string; level: number; index: number }> = [];

  lines.forEach((line, index) => {
    if (fenced[index]) return;
    const h = HEADING.exec(line);
    if (h) headings.push({ heading: h[2].trim(), level: h[1].length, index });
  });

  return headings.map((h, i) => {
    const next = headings.slice(i + 1).find((o) => o.level <= h.level);
    const end = next ? next.index : lines.length;
    return {
      heading: h.heading,
      level: h.level,
      line: h.index + 1,
      body: lines.slice(h.index + 1, end).join('\n').trim(),
    };
  });
}

/** Everything before the first level-two heading. */
export function preamble(markdown: string): string {
  const first = splitSections(markdown).find((s) => s.level === 2);
  const lines = markdown.split(/\r?\n/);
  return lines.slice(0, first ? first.line - 1 : lines.length).join('\n');
}

const URL_RE = /\bhttps?:\/\/[^\s)>\]]+/i;
const LINK_RE = /\[[^\]]+\]\(\s*<?([^)\s>]+)>?[^)]*\)/g;
const EXTERNAL = /^https?:\/\/\S+$/i;

/**
 * First external reference in the text: an absolute http(s) Markdown link
 * target, else a bare http(s) URL. Anchors and repository paths do not count.
 */
export function findReference(text: string): string | null {
  for (const link of text.matchAll(LINK_RE)) {
    if (EXTERNAL.test(link[1])) return link[1];
  }
  const url = URL_RE.exec(text);
  return url ? url[0] : null;
}
