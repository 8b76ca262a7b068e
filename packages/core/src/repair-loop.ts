/**
 * Query generation and repair loop.
 *
 * One run per intent: generate, extract, confirm, execute. An extraction or
 * execution failure becomes the context for the next attempt until the
 * revision budget is spent. Provider failures end the run at once and do
 * not consume a revision.
 */

import { ConfigError, isGenerationError, GenerationEmptyError, type GenerationError } from './errors.js';
import { buildGenerationPrompt, type GenerationPromptOpts, type PriorAttempt } from './llm/prompt.js';
import { extractQuery } from './llm/extract.js';
import type { SchemaDescription } from './llm/schema.js';
import type { GenerationProvider, ModelConfig, PromptMessage } from './llm/types.js';
import type { QueryExecutor } from './db/execute.js';
import type { ResultSet } from './db/types.js';

export type LoopState =
  | { name: 'generating'; attempt: number }
  | { name: 'extracting'; attempt: number }
  | { name: 'confirming'; attempt: number }
  | { name: 'executing'; attempt: number }
  | { name: 'succeeded' }
  | { name: 'exhausted' }
  | { name: 'aborted' };

export type AttemptOutcome =
  | { kind: 'succeeded'; result: ResultSet }
  | { kind: 'failed'; errorMessage: string }
  | { kind: 'not-attempted' };

export interface Attempt {
  /** 1-based */
  n: number;
  prompt: PromptMessage[];
  rawText: string;
  /** Null when nothing statement-shaped was found in the reply */
  candidate: string | null;
  outcome: AttemptOutcome;
  generationMs: number;
  executionMs: number | null;
}

export type AbortReason = 'skipped' | 'cancelled' | 'generation-failed';

export type LoopResult =
  | { status: 'succeeded'; query: string; result: ResultSet; attempts: Attempt[] }
  | { status: 'exhausted'; lastError: string; lastCandidate: string | null; attempts: Attempt[] }
  | { status: 'aborted'; reason: AbortReason; error?: GenerationError; attempts: Attempt[] };

export type ConfirmDecision = { action: 'proceed' } | { action: 'abort' } | { action: 'edit'; sql: string };

export interface ConfirmRequest {
  attempt: number;
  maxAttempts: number;
  sql: string;
}

export type ConfirmCallback = (request: ConfirmRequest) => Promise<ConfirmDecision>;

export type LoopEvent =
  | { type: 'generating'; attempt: number; maxAttempts: number; prompt: PromptMessage[] }
  | { type: 'generated'; attempt: number; elapsedMs: number }
  | { type: 'extraction-failed'; attempt: number; message: string; rawText: string }
  | { type: 'candidate'; attempt: number; sql: string }
  | { type: 'executing'; attempt: number; sql: string }
  | { type: 'execution-failed'; attempt: number; sql: string; errorMessage: string; elapsedMs: number }
  | { type: 'succeeded'; attempt: number; elapsedMs: number; rowCount: number };

export interface RunIntentOptions {
  intent: string;
  schema: SchemaDescription;
  provider: GenerationProvider;
  execute: QueryExecutor;
  modelConfig: ModelConfig;
  /** Revisions after the first attempt; total attempts are maxRevisions + 1 */
  maxRevisions: number;
  /** Run candidates without asking */
  autoApprove: boolean;
  /** Required unless autoApprove is set; called once per candidate */
  confirm?: ConfirmCallback;
  /** Checked before every remote call; an in-flight call is awaited, then discarded */
  signal?: AbortSignal;
  onEvent?: (event: LoopEvent) => void;
  prompt?: GenerationPromptOpts;
}

export function validateMaxRevisions(maxRevisions: number): void {
  if (!Number.isInteger(maxRevisions) || maxRevisions < 0) {
    throw new ConfigError(`maxRevisions must be a non-negative integer, got ${maxRevisions}.`);
  }
}

export async function runIntent(options: RunIntentOptions): Promise<LoopResult> {
  const { intent, schema, provider, execute, modelConfig, maxRevisions, autoApprove, confirm, signal } = options;
  validateMaxRevisions(maxRevisions);
  if (!autoApprove && !confirm) {
    throw new ConfigError('A confirm callback is required when autoApprove is false.');
  }
  if (!intent.trim()) {
    throw new ConfigError('The question is empty.');
  }

  const emit = options.onEvent ?? (() => {});
  const maxAttempts = maxRevisions + 1;
  const attempts: Attempt[] = [];
  let prior: PriorAttempt | null = null;
  let state: LoopState = { name: 'generating', attempt: 1 };

  const aborted = (reason: AbortReason, error?: GenerationError): LoopResult => {
    state = { name: 'aborted' };
    return error ? { status: 'aborted', reason, error, attempts } : { status: 'aborted', reason, attempts };
  };

  while (state.name === 'generating') {
    const n: number = state.attempt;
    if (signal?.aborted) return aborted('cancelled');

    // Generating(n)
    const prompt = buildGenerationPrompt(schema, intent, prior ? [prior] : [], options.prompt);
    emit({ type: 'generating', attempt: n, maxAttempts, prompt });
    const genStart = performance.now();
    let rawText: string;
    try {
      rawText = await provider.complete(prompt, modelConfig);
      if (!rawText.trim()) throw new GenerationEmptyError();
    } catch (err: unknown) {
      if (isGenerationError(err)) return aborted('generation-failed', err);
      throw err;
    }
    const generationMs = Math.round(performance.now() - genStart);
    emit({ type: 'generated', attempt: n, elapsedMs: generationMs });
    if (signal?.aborted) return aborted('cancelled');

    // Extracting(n)
    state = { name: 'extracting', attempt: n };
    const extraction = extractQuery(rawText);
    const attempt: Attempt = {
      n,
      prompt,
      rawText,
      candidate: extraction.ok ? extraction.sql : null,
      outcome: { kind: 'not-attempted' },
      generationMs,
      executionMs: null,
    };
    attempts.push(attempt);

    let errorMessage: string;
    if (!extraction.ok) {
      errorMessage = extraction.error;
      attempt.outcome = { kind: 'failed', errorMessage };
      emit({ type: 'extraction-failed', attempt: n, message: errorMessage, rawText });
    } else {
      let sql = extraction.sql;
      emit({ type: 'candidate', attempt: n, sql });

      // Confirming(n)
      if (!autoApprove && confirm) {
        state = { name: 'confirming', attempt: n };
        const decision = await confirm({ attempt: n, maxAttempts, sql });
        if (decision.action === 'abort') return aborted('skipped');
        if (decision.action === 'edit') {
          if (!decision.sql.trim()) return aborted('skipped');
          sql = decision.sql.trim();
          attempt.candidate = sql;
        }
      }

      // Executing(n)
      state = { name: 'executing', attempt: n };
      emit({ type: 'executing', attempt: n, sql });
      const execStart = performance.now();
      const outcome = await execute(sql);
      const executionMs = Math.round(performance.now() - execStart);
      attempt.executionMs = executionMs;
      if (outcome.ok) {
        attempt.outcome = { kind: 'succeeded', result: outcome.result };
        state = { name: 'succeeded' };
        emit({ type: 'succeeded', attempt: n, elapsedMs: executionMs, rowCount: outcome.result.rowCount });
        return { status: 'succeeded', query: sql, result: outcome.result, attempts };
      }
      errorMessage = outcome.errorMessage;
      attempt.outcome = { kind: 'failed', errorMessage };
      emit({ type: 'execution-failed', attempt: n, sql, errorMessage, elapsedMs: executionMs });
    }

    prior = { candidate: attempt.candidate, rawText, errorMessage };
    if (n < maxAttempts) {
      state = { name: 'generating', attempt: n + 1 };
    } else {
      state = { name: 'exhausted' };
      return { status: 'exhausted', lastError: errorMessage, lastCandidate: attempt.candidate, attempts };
    }
  }

  throw new Error('Repair loop ended without a result.');
}
