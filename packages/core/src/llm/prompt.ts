/**
 * Prompt construction for schema narration and SQL generation.
 * Inputs are schema metadata, the user's question, and the previous
 * candidate with its error. Nothing read from table rows is ever passed in.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { SchemaDescription } from './schema.js';
import type { PromptMessage } from './types.js';

export interface PriorAttempt {
  /** Extracted candidate; null when the reply held no statement */
  candidate: string | null;
  /** Raw model reply for that attempt */
  rawText: string;
  /** Engine error, or the extraction failure message */
  errorMessage: string;
}

export interface GenerationPromptOpts {
  /** LIMIT the model should add to open-ended queries */
  rowLimit?: number;
}

export function buildNarrationPrompt(schema: SchemaDescription): PromptMessage[] {
  return [
    {
      role: 'system',
      content: `You will analyze the schema of a SQLite3 database to help the user understand it.

${schema.text}`,
    },
    {
      role: 'user',
      content:
        'Guess the overall purpose of this database and briefly summarize its tables and how they relate, in about 100 words.',
    },
  ];
}

function generationRules(rowLimit: number): string {
  return `You write SQL queries for a SQLite3 database described by the schema the user provides.

CONSTRAINTS:
- Respond with exactly ONE SQL statement and nothing else. No explanation, no markdown.
- Use only syntax and functions supported by SQLite3.
- Use only tables and columns present in the schema.
- Give every result column a unique name, aliasing where needed.
- If the query may return many rows, add LIMIT ${rowLimit} unless the user clearly asks for more.
- NEVER insert, update, delete, create, drop or alter anything in the database, even if the user asks you to.`;
}

function revisionRequest(prior: PriorAttempt): string {
  if (prior.candidate === null) {
    return `Your previous response could not be used: ${prior.errorMessage}.
Reissue your answer as exactly ONE SQL statement with no surrounding text.`;
  }
  return `Running that statement failed with this error:
${prior.errorMessage}

Fix this specific error in the statement above instead of starting over.
Respond with ONE corrected SQL statement and nothing else.`;
}

/**
 * Build the generation prompt for one attempt.
 * Only the most recent prior attempt is replayed, so prompt size stays flat
 * however many revisions a run takes.
 */
export function buildGenerationPrompt(
  schema: SchemaDescription,
  intent: string,
  priorAttempts: readonly PriorAttempt[] = [],
  opts: GenerationPromptOpts = {},
): PromptMessage[] {
  const messages: PromptMessage[] = [
    { role: 'system', content: generationRules(opts.rowLimit ?? SAFE_DEFAULTS.promptRowLimit) },
    { role: 'user', content: `My database schema is:\n\n${schema.text}` },
    {
      role: 'assistant',
      content: 'Schema received. Describe the query you need, in words and/or SQL.',
    },
    { role: 'user', content: intent },
  ];

  const prior = priorAttempts[priorAttempts.length - 1];
  if (prior) {
    messages.push(
      { role: 'assistant', content: prior.candidate ?? prior.rawText },
      { role: 'user', content: revisionRequest(prior) },
    );
  }

  return messages;
}

/**
 * Flatten a message list into a single text, for logs and debugging.
 */
export function renderPrompt(messages: readonly PromptMessage[]): string {
  return messages.map((m) => `[${m.role}]\n${m.content}`).join('\n\n');
}
