import type { ExtractedSelectorList, TextPosition } from './types.js';
import { MalformedInputError } from './errors.js';

type ScanMode = 'default' | 'string' | 'comment';

/**
 * What the scanner does with the contents of an open block:
 * - `at-rule`: conditional group rule, nested rules are extracted
 * - `rule`: style rule body, nested blocks are skipped
 * - `skip`: anything whose contents are not selectors
 */
type BlockKind = 'at-rule' | 'rule' | 'skip';

interface OpenBlock extends TextPosition {
  kind: BlockKind;
}

/**
 * Text collected since the last rule boundary
 */
interface PendingText {
  text: string;
  positions: TextPosition[];
  /** A comment was dropped since the last appended character */
  afterComment: boolean;
}

/**
 * At-rules whose bodies hold descriptors or keyframe offsets instead of rules
 */
export const SKIPPED_AT_RULES = new Set([
  'keyframes',
  'font-face',
  'page',
  'counter-style',
  'property',
  'font-feature-values',
  'font-palette-values',
  'position-try',
  'view-transition',
]);

/**
 * Get the at-rule name from a prelude, without vendor prefix
 * e.g., "@-webkit-keyframes spin" = "keyframes"
 */
export function getAtRuleName(prelude: string): string {
  const match = /^@(?:-[a-z]+-)?([a-z][a-z0-9-]*)/i.exec(prelude);
  return match?.[1]?.toLowerCase() ?? '';
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f';
}

function isNameChar(ch: string): boolean {
  return /^[a-zA-Z0-9_\\-]$/.test(ch) || (ch !== '' && ch.charCodeAt(0) >= 0x80);
}

/**
 * Scan CSS source and yield every selector list that precedes a rule block,
 * in source order. Comments are dropped and whitespace runs outside strings
 * collapse to a single space. A comment between two name characters is kept
 * as an empty comment marker, since it separates tokens.
 *
 * Throws MalformedInputError on unterminated strings or comments and on
 * unbalanced braces. Selector lists yielded before the error stay valid.
 */
export function* extractSelectors(
  css: string
): Generator<ExtractedSelectorList, void, unknown> {
  const blocks: OpenBlock[] = [];
  let mode: ScanMode = 'default';
  let quote = '';
  let modeStart: TextPosition = { offset: 0, line: 1, column: 1 };
  const pending: PendingText = { text: '', positions: [], afterComment: false };
  let line = 1;
  let lineStart = 0;

  const positionAt = (offset: number): TextPosition => ({
    offset,
    line,
    column: offset - lineStart + 1,
  });

  const append = (text: string, offset: number): void => {
    if (pending.afterComment && isNameChar(pending.text.slice(-1)) && isNameChar(text.charAt(0))) {
      pending.text += '/**/';
      for (let k = 0; k < 4; k++) {
        pending.positions.push(modeStart);
      }
    }
    pending.afterComment = false;
    for (let k = 0; k < text.length; k++) {
      pending.positions.push(positionAt(offset + k));
    }
    pending.text += text;
  };

  const reset = (): void => {
    pending.text = '';
    pending.positions = [];
    pending.afterComment = false;
  };

  for (let i = 0; i < css.length; i++) {
    const ch = css.charAt(i);
    if (ch === '\n') {
      line++;
      lineStart = i + 1;
    }

    if (mode === 'comment') {
      if (ch === '*' && css.charAt(i + 1) === '/') {
        mode = 'default';
        pending.afterComment = pending.text !== '';
        i++;
      }
      continue;
    }

    if (mode === 'string') {
      if (ch === '\\') {
        const next = css.charAt(i + 1);
        append(ch + next, i);
        if (next === '\n') {
          line++;
          lineStart = i + 2;
        }
        i++;
      } else if (ch === '\n') {
        throw new MalformedInputError(
          'Unterminated string',
          modeStart.offset,
          modeStart.line,
          modeStart.column
        );
      } else {
        append(ch, i);
        if (ch === quote) {
          mode = 'default';
        }
      }
      continue;
    }

    if (ch === '/' && css.charAt(i + 1) === '*') {
      mode = 'comment';
      modeStart = positionAt(i);
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      mode = 'string';
      quote = ch;
      modeStart = positionAt(i);
      append(ch, i);
      continue;
    }

    if (ch === '\\') {
      const next = css.charAt(i + 1);
      append(ch + next, i);
      if (next === '\n') {
        line++;
        lineStart = i + 2;
      }
      i++;
      continue;
    }

    if (ch === '{') {
      const parent = blocks[blocks.length - 1]?.kind;
      const prelude = pending.text.trim();
      let kind: BlockKind;

      if (parent === 'rule' || parent === 'skip') {
        kind = 'skip';
      } else if (prelude.startsWith('@')) {
        kind = SKIPPED_AT_RULES.has(getAtRuleName(prelude)) ? 'skip' : 'at-rule';
      } else {
        kind = 'rule';
        const start = pending.positions[0];
        if (prelude && start) {
          yield { text: prelude, ...start, positions: pending.positions.slice(0, prelude.length) };
        }
      }

      blocks.push({ kind, ...positionAt(i) });
      reset();
      continue;
    }

    if (ch === '}') {
      if (blocks.length === 0) {
        const at = positionAt(i);
        throw new MalformedInputError('Unmatched "}"', at.offset, at.line, at.column);
      }
      blocks.pop();
      reset();
      continue;
    }

    if (ch === ';') {
      reset();
      continue;
    }

    if (isWhitespace(ch)) {
      if (pending.text && !pending.text.endsWith(' ')) {
        append(' ', i);
      }
      pending.afterComment = false;
      continue;
    }

    append(ch, i);
  }

  if (mode === 'string') {
    throw new MalformedInputError(
      'Unterminated string',
      modeStart.offset,
      modeStart.line,
      modeStart.column
    );
  }

  if (mode === 'comment') {
    throw new MalformedInputError(
      'Unterminated comment',
      modeStart.offset,
      modeStart.line,
      modeStart.column
    );
  }

  const unclosed = blocks[blocks.length - 1];
  if (unclosed) {
    throw new MalformedInputError(
      'Unclosed "{"',
      unclosed.offset,
      unclosed.line,
      unclosed.column
    );
  }

  const trailing = pending.positions[0];
  if (trailing && !pending.text.trim().startsWith('@')) {
    throw new MalformedInputError(
      'Expected "{" after selector',
      trailing.offset,
      trailing.line,
      trailing.column
    );
  }
}

/**
 * Extract every selector list eagerly
 */
export function extractAllSelectors(css: string): ExtractedSelectorList[] {
  return [...extractSelectors(css)];
}
