import { staysWithinRoot } from '@specforge/shared';
import type { ArtifactMap, Outcome } from './types';

const FENCE = '```';
const FILENAME_PREFIX = 'filename:';

/** Labels that name a language rather than a file */
export const LANGUAGE_TAGS: ReadonlySet<string> = new Set([
  'python',
  'py',
  'yaml',
  'yml',
  'bash',
  'sh',
  'shell',
  'dockerfile',
  'json',
  'markdown',
  'md',
  'javascript',
  'js',
  'typescript',
  'ts',
  'text',
  'txt',
  'toml',
  'ini',
  'sql',
  'xml',
  'html',
  'css',
  'go',
  'rust',
]);

type ParserState =
  | { kind: 'OUTSIDE_BLOCK' }
  | { kind: 'IN_LABEL'; label: string }
  | {
      kind: 'IN_BODY';
      /** null for a non-file block, which is consumed and dropped */
      path: string | null;
      depth: number;
      lines: string[];
    };

function splitLines(text: string): string[] {
  return text.replace(/\r\n?/g, '\n').split('\n');
}

/** Label text after the fence marker, or null when the line is not a fence */
function fenceLabel(line: string): string | null {
  const trimmed = line.trimStart();
  return trimmed.startsWith(FENCE) ? trimmed.slice(FENCE.length).trim() : null;
}

/**
 * Resolves a block label to the path it names, or null for a non-file block.
 * `filename:` labels always name a path; a bare label names one unless it is
 * empty or a language tag.
 */
export function labelToPath(label: string): string | null {
  let candidate: string;
  if (label.toLowerCase().startsWith(FILENAME_PREFIX)) {
    candidate = label.slice(FILENAME_PREFIX.length).trim();
  } else {
    if (label === '' || LANGUAGE_TAGS.has(label.toLowerCase())) return null;
    candidate = label;
  }
  const token = candidate.split(/\s+/, 1)[0] ?? '';
  return staysWithinRoot(token) ? token : null;
}

/**
 * Extracts ```` ```filename: path ```` blocks. Bodies are trimmed; a fence
 * line with a label inside a body opens a nested level that a bare fence
 * closes. Unterminated blocks are dropped and later blocks win.
 */
export function parseDelimitedBlocks(text: string): ArtifactMap {
  const files: ArtifactMap = new Map();
  let state: ParserState = { kind: 'OUTSIDE_BLOCK' };

  for (const line of splitLines(text)) {
    const label = fenceLabel(line);

    switch (state.kind) {
      case 'OUTSIDE_BLOCK':
        if (label !== null) {
          state = { kind: 'IN_LABEL', label };
        }
        break;

      case 'IN_BODY':
        if (label === null) {
          state.lines.push(line);
        } else if (label !== '') {
          state.depth++;
          state.lines.push(line);
        } else if (state.depth > 1) {
          state.depth--;
          state.lines.push(line);
        } else {
          if (state.path !== null) {
            files.set(state.path, state.lines.join('\n').trim());
          }
          state = { kind: 'OUTSIDE_BLOCK' };
        }
        break;
    }

    // the label resolves on the line that opened the block
    if (state.kind === 'IN_LABEL') {
      state = { kind: 'IN_BODY', path: labelToPath(state.label), depth: 1, lines: [] };
    }
  }

  return files;
}

/**
 * Removes the outer fence wrapping around a payload. Prose before the opening
 * fence line or after the closing one is dropped with it; a reply without
 * fence lines is returned trimmed.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const lines = splitLines(trimmed);
  const open = lines.findIndex((line) => fenceLabel(line) !== null);
  if (open === -1) return trimmed;

  const opening = lines[open].trim();
  if (opening.length > FENCE.length * 2 && opening.endsWith(FENCE)) {
    // ```json {...}``` on one line
    return opening
      .slice(FENCE.length, -FENCE.length)
      .replace(/^json\b/i, '')
      .trim();
  }

  let close = -1;
  for (let i = lines.length - 1; i > open; i--) {
    if (lines[i].trim() === FENCE) {
      close = i;
      break;
    }
  }

  const body = lines.slice(open + 1, close === -1 ? lines.length : close);
  if (close === -1 && body.length > 0) {
    const last = body[body.length - 1].trimEnd();
    if (last.endsWith(FENCE)) {
      body[body.length - 1] = last.slice(0, -FENCE.length);
    }
  }
  return body.join('\n').trim();
}

/**
 * Drops at most one leading fence line and one trailing bare fence line.
 */
export function stripSingleFencePair(text: string): string {
  const lines = splitLines(text.trim());
  if (lines.length > 0 && fenceLabel(lines[0]) !== null) {
    lines.shift();
  }
  if (lines.length > 0 && lines[lines.length - 1].trim() === FENCE) {
    lines.pop();
  }
  return lines.join('\n').trim();
}

/**
 * Decodes a reply that should be one JSON object of path -> content.
 * Entries whose value is not a string are dropped.
 */
export function parseJsonFileMap(text: string): Outcome<ArtifactMap> {
  const body = stripCodeFences(text);
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch (error) {
    return {
      ok: false,
      reason: `reply is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      raw: text,
    };
  }

  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) {
    return { ok: false, reason: 'reply is not a JSON object', raw: text };
  }

  const files: ArtifactMap = new Map();
  for (const [path, content] of Object.entries(decoded)) {
    if (typeof content === 'string') {
      files.set(path, content);
    }
  }
  return { ok: true, value: files };
}
