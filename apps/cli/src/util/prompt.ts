/**
 * Line input for interactive commands.
 */

import { createInterface, type Interface } from 'node:readline';
import type { ConfirmCallback, ConfirmDecision } from '@askdb/core';

export type ConfirmChoice = 'execute' | 'edit' | 'skip';

/**
 * Read a confirmation answer. Empty means the default, execute.
 * Returns null for anything unrecognised.
 */
export function parseConfirmAnswer(answer: string): ConfirmChoice | null {
  switch (answer.trim().toLowerCase()) {
    case '':
    case 'y':
    case 'yes':
    case 'x':
    case 'execute':
      return 'execute';
    case 'e':
    case 'edit':
      return 'edit';
    case 'n':
    case 'no':
    case 's':
    case 'skip':
      return 'skip';
    default:
      return null;
  }
}

export interface QuestionReader {
  question(query: string, prefill?: string): Promise<string | null>;
}

/**
 * A readline interface that resolves pending questions with null once input
 * ends (Ctrl+D or a closed pipe).
 */
export class LineReader implements QuestionReader {
  readonly rl: Interface;
  private closed = false;
  private interrupted = false;
  private pending: ((answer: string | null) => void) | null = null;

  constructor(
    input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, output, terminal: input.isTTY === true });
    this.rl.on('close', () => {
      this.closed = true;
      this.settle(null);
    });
  }

  /** Ask `query`; `prefill` is typed into the line so it can be edited. */
  question(query: string, prefill?: string): Promise<string | null> {
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.pending = resolve;
      this.rl.question(query, (answer) => this.settle(answer));
      if (prefill) this.rl.write(prefill);
    });
  }

  /** Answer the pending question, if any, with null. */
  interrupt(): void {
    if (!this.pending) return;
    this.interrupted = true;
    this.clearLine();
    this.rl.write('\n');
  }

  /** Drop whatever has been typed on the current line. */
  clearLine(): void {
    if (this.rl.terminal) {
      this.rl.write(null, { ctrl: true, name: 'u' });
    }
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }

  private settle(answer: string | null): void {
    const resolve = this.pending;
    this.pending = null;
    const interrupted = this.interrupted;
    this.interrupted = false;
    resolve?.(interrupted ? null : answer);
  }
}

/**
 * Put a statement on one line for editing without changing what it does:
 * `--` comments become block comments and line breaks become spaces.
 * Returns null when a quoted literal spans lines, since joining would change
 * its value.
 */
export function flattenSql(sql: string): string | null {
  let out = '';
  let i = 0;
  while (i < sql.length) {
    const ch = sql[i];
    if (ch === "'" || ch === '"' || ch === '`' || ch === '[') {
      const close = sql.indexOf(ch === '[' ? ']' : ch, i + 1);
      const end = close === -1 ? sql.length : close + 1;
      const literal = sql.slice(i, end);
      if (literal.includes('\n')) return null;
      out += literal;
      i = end;
    } else if (ch === '-' && sql[i + 1] === '-') {
      const eol = sql.indexOf('\n', i);
      const end = eol === -1 ? sql.length : eol;
      const comment = sql.slice(i + 2, end).trim().replace(/\*\//g, '* /');
      out += comment ? `/* ${comment} */` : '';
      i = end;
    } else if (ch === '/' && sql[i + 1] === '*') {
      const close = sql.indexOf('*/', i + 2);
      const end = close === -1 ? sql.length : close + 2;
      out += sql.slice(i, end).replace(/\s*\n\s*/g, ' ');
      i = end;
    } else if (ch === '\r' || ch === '\n') {
      out = out.trimEnd();
      while (i < sql.length && /\s/.test(sql[i])) i++;
      if (out && i < sql.length) out += ' ';
    } else {
      out += ch;
      i++;
    }
  }
  return out.trim();
}

/**
 * Confirmation callback for the repair loop: execute, edit (pre-filled with
 * the candidate) or skip.
 */
export function createConfirm(reader: QuestionReader, print: (message: string) => void): ConfirmCallback {
  return async ({ attempt, maxAttempts, sql }): Promise<ConfirmDecision> => {
    print(`\nCandidate (attempt ${attempt}/${maxAttempts}):\n  ${sql.replace(/\n/g, '\n  ')}\n`);
    for (;;) {
      const answer = await reader.question('Execute? [Y]es / [e]dit / [n]o (skip): ');
      if (answer === null) return { action: 'abort' };

      const choice = parseConfirmAnswer(answer);
      if (choice === 'execute') return { action: 'proceed' };
      if (choice === 'skip') return { action: 'abort' };
      if (choice === 'edit') {
        const prefill = flattenSql(sql);
        if (prefill === null) print('The statement has a multi-line literal; type the edited statement in full.');
        const edited = await reader.question('SQL> ', prefill ?? undefined);
        if (edited === null) return { action: 'abort' };
        return { action: 'edit', sql: edited };
      }
      print('Please answer y, e or n.');
    }
  };
}
