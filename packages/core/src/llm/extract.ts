/**
 * Pull one SQL statement out of a free-form model reply.
 *
 * Order: fenced code blocks, then inline `code` spans, then the bare text.
 * The first statement-shaped candidate wins and anything after it is
 * dropped. "Statement-shaped" only means it starts with a statement
 * keyword; whether it is valid SQL is for the engine to say.
 */

export const NO_STATEMENT_FOUND = 'no SQL statement found';

export type ExtractionResult = { ok: true; sql: string } | { ok: false; error: string };

const STATEMENT_KEYWORDS = [
  'SELECT',
  'WITH',
  'VALUES',
  'PRAGMA',
  'EXPLAIN',
  'INSERT',
  'UPDATE',
  'DELETE',
  'REPLACE',
  'CREATE',
  'DROP',
  'ALTER',
];

const KEYWORD_AT_START = new RegExp(`^(${STATEMENT_KEYWORDS.join('|')})\\b`, 'i');
const LANGUAGE_TAG = /^[A-Za-z0-9_+.-]*$/;
const FENCE = '```';

function stripLanguageTag(body: string): string {
  const newline = body.indexOf('\n');
  if (newline === -1) return body;
  const firstLine = body.slice(0, newline).trim();
  if (LANGUAGE_TAG.test(firstLine) && !KEYWORD_AT_START.test(firstLine)) {
    return body.slice(newline + 1);
  }
  return body;
}

/** Split text into fenced block bodies and the text outside them. An unclosed fence runs to the end. */
function splitFences(text: string): { blocks: string[]; outside: string } {
  const blocks: string[] = [];
  let outside = '';
  let pos = 0;
  while (pos < text.length) {
    const open = text.indexOf(FENCE, pos);
    if (open === -1) {
      outside += text.slice(pos);
      break;
    }
    outside += text.slice(pos, open) + '\n';
    const close = text.indexOf(FENCE, open + FENCE.length);
    const end = close === -1 ? text.length : close;
    blocks.push(stripLanguageTag(text.slice(open + FENCE.length, end)));
    pos = close === -1 ? text.length : close + FENCE.length;
  }
  return { blocks, outside };
}

function inlineSpans(text: string): string[] {
  return Array.from(text.matchAll(/`([^`\n]+)`/g), (m) => m[1]);
}

/**
 * Positions where a statement may begin: the first non-blank character,
 * each line start (after indentation), and right after a ':' preamble.
 */
function candidateStarts(text: string): number[] {
  const starts = new Set<number>();
  const skipBlank = (i: number): number => {
    while (i < text.length && /\s/.test(text[i])) i++;
    return i;
  };
  starts.add(skipBlank(0));
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n' || text[i] === ':') {
      starts.add(skipBlank(i + 1));
    }
  }
  return [...starts].filter((i) => i < text.length).sort((a, b) => a - b);
}

// Words that can open the next clause of a statement split by a blank line
const CONTINUATION_WORDS = [
  'SELECT',
  'FROM',
  'WHERE',
  'GROUP',
  'ORDER',
  'HAVING',
  'LIMIT',
  'OFFSET',
  'JOIN',
  'INNER',
  'LEFT',
  'RIGHT',
  'FULL',
  'CROSS',
  'NATURAL',
  'ON',
  'USING',
  'UNION',
  'INTERSECT',
  'EXCEPT',
  'AND',
  'OR',
  'WINDOW',
  'VALUES',
  'SET',
  'RETURNING',
];

const CONTINUATION_AT_START = new RegExp(`^(${CONTINUATION_WORDS.join('|')})\\b`, 'i');

/**
 * Whether the paragraph after a blank line carries on the statement: it
 * opens with a clause keyword in the statement's own case, a comment, or
 * punctuation such as `)` or `,`.
 */
function continuesStatement(paragraph: string, lowerCase: boolean): boolean {
  if (/^([(),]|--|\/\*)/.test(paragraph)) return true;
  const match = CONTINUATION_AT_START.exec(paragraph);
  if (!match) return false;
  const word = match[1];
  return word === word.toUpperCase() || (lowerCase && word === word.toLowerCase());
}

interface EndOpts {
  /** Bare text: a blank line ends the statement unless the next paragraph continues it */
  stopAtBlankLine: boolean;
  lowerCase: boolean;
}

/**
 * End of the statement starting at `start`: the first ';' outside quotes and
 * comments, or (in bare text) a blank line followed by prose, or the end of
 * the text.
 */
function statementEnd(text: string, start: number, opts: EndOpts): number {
  let quote: string | null = null;
  let i = start;
  while (i < text.length) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) quote = null;
      i++;
      continue;
    }
    if (ch === "'" || ch === '"' || ch === '`') {
      quote = ch;
    } else if (ch === '[') {
      quote = ']';
    } else if (ch === '-' && text[i + 1] === '-') {
      const eol = text.indexOf('\n', i);
      if (eol === -1) return text.length;
      i = eol;
      continue;
    } else if (ch === '/' && text[i + 1] === '*') {
      const close = text.indexOf('*/', i + 2);
      if (close === -1) return text.length;
      i = close + 2;
      continue;
    } else if (ch === ';') {
      return i;
    } else if (ch === '\n' && opts.stopAtBlankLine) {
      const gap = /^\n[ \t]*\n\s*/.exec(text.slice(i));
      if (gap && !continuesStatement(text.slice(i + gap[0].length), opts.lowerCase)) {
        return i;
      }
    }
    i++;
  }
  return text.length;
}

function statementAt(text: string, start: number, inCode: boolean, keyword: string): string | null {
  const end = statementEnd(text, start, {
    stopAtBlankLine: !inCode,
    lowerCase: keyword === keyword.toLowerCase(),
  });
  const sql = text.slice(start, end).trim();
  // a lone keyword, as in "I can't run `DELETE` statements", is not a statement
  if (!/\s\S/.test(sql)) return null;
  return sql;
}

/**
 * Whether a lower-case keyword may open a statement at `start` in bare
 * text: nothing but blank or `--` comment lines before it, or a ':' preamble.
 */
function opensAfterPreamble(text: string, start: number): boolean {
  const before = text.slice(0, start).trimEnd();
  if (before.endsWith(':')) return true;
  return before.split('\n').every((line) => {
    const trimmed = line.trim();
    return trimmed === '' || trimmed.startsWith('--');
  });
}

/**
 * First statement in `text`. In code, a keyword in any case may open a
 * statement. In bare text an upper-case keyword wins anywhere; a lower-case
 * one is taken only at the top of the reply, after comment lines, or after
 * a ':' preamble, so prose such as "Select the rows..." is not mistaken for
 * a statement.
 */
function firstStatement(text: string, inCode: boolean): string | null {
  const starts = candidateStarts(text);
  const keywordAt = (start: number): string | null => KEYWORD_AT_START.exec(text.slice(start))?.[1] ?? null;

  for (const start of starts) {
    const keyword = keywordAt(start);
    if (!keyword) continue;
    if (!inCode && keyword !== keyword.toUpperCase()) continue;
    const sql = statementAt(text, start, inCode, keyword);
    if (sql) return sql;
  }
  if (inCode) return null;

  for (const start of starts) {
    const keyword = keywordAt(start);
    if (!keyword || keyword === keyword.toUpperCase() || !opensAfterPreamble(text, start)) continue;
    const sql = statementAt(text, start, inCode, keyword);
    if (sql) return sql;
  }
  return null;
}

export function extractQuery(rawText: string): ExtractionResult {
  const { blocks, outside } = splitFences(rawText);

  for (const block of blocks) {
    const sql = firstStatement(block, true);
    if (sql) return { ok: true, sql };
  }

  for (const span of inlineSpans(outside)) {
    const sql = firstStatement(span, true);
    if (sql) return { ok: true, sql };
  }

  const sql = firstStatement(outside, false);
  if (sql) return { ok: true, sql };

  return { ok: false, error: NO_STATEMENT_FOUND };
}
