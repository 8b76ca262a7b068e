/**
 * Terminal rendering of repair-loop progress and results.
 */

import type { Ora } from 'ora';
import { renderPrompt, type LoopEvent, type LoopResult } from '@askdb/core';
import { exhaustedError, fromCoreError } from './errors.js';
import {
  printCommandSuccess,
  printDebug,
  printHuman,
  printHumanTable,
  printVerbose,
  printWarning,
  startSpinner,
  type OutputOptions,
} from './output.js';

export interface ProgressOpts {
  /** Print each candidate; the confirm prompt shows it otherwise */
  showCandidates: boolean;
}

/**
 * Build an onEvent handler that drives one spinner per remote call.
 * `stop` clears any spinner left running when the loop throws.
 */
export function createProgress(
  output: OutputOptions,
  opts: ProgressOpts,
): { onEvent: (event: LoopEvent) => void; stop: () => void } {
  let spinner: Ora | null = null;

  const stop = (): void => {
    spinner?.stop();
    spinner = null;
  };

  const onEvent = (event: LoopEvent): void => {
    switch (event.type) {
      case 'generating':
        stop();
        printDebug(`Prompt for attempt ${event.attempt}:\n${renderPrompt(event.prompt)}\n`, output);
        spinner = startSpinner(`Generating SQL (attempt ${event.attempt}/${event.maxAttempts})`, output);
        break;
      case 'generated':
        spinner?.succeed(`Model replied in ${event.elapsedMs} ms`);
        spinner = null;
        break;
      case 'extraction-failed':
        printWarning(`Attempt ${event.attempt}: ${event.message}.`, output);
        printVerbose(`Model reply:\n${event.rawText}`, output);
        break;
      case 'candidate':
        if (opts.showCandidates) printHuman(`\n${event.sql}\n`, output);
        break;
      case 'executing':
        printVerbose(`Executing attempt ${event.attempt}`, output);
        spinner = startSpinner('Executing', output);
        break;
      case 'execution-failed':
        if (spinner) {
          spinner.fail(`Attempt ${event.attempt} failed after ${event.elapsedMs} ms: ${event.errorMessage}`);
        } else {
          printWarning(`Attempt ${event.attempt} failed: ${event.errorMessage}`, output);
        }
        spinner = null;
        break;
      case 'succeeded':
        spinner?.succeed(`${event.rowCount} row${event.rowCount === 1 ? '' : 's'} in ${event.elapsedMs} ms`);
        spinner = null;
        break;
    }
  };

  return { onEvent, stop };
}

/**
 * Print a finished run. Exhaustion and provider failures are thrown as
 * CLI errors; a skip or cancellation is not an error.
 */
export function reportResult(result: LoopResult, output: OutputOptions): void {
  switch (result.status) {
    case 'succeeded': {
      const { query, result: rs, attempts } = result;
      if (output.json) {
        printCommandSuccess(
          {
            query,
            columns: rs.columns,
            rows: rs.rows,
            rowCount: rs.rowCount,
            truncated: rs.truncated,
            attempts: attempts.length,
          },
          output,
        );
        return;
      }
      printHumanTable(rs.columns, rs.rows, output);
      if (rs.truncated) {
        printWarning(`Showing the first ${rs.rows.length} of ${rs.rowCount} rows.`, output);
      }
      return;
    }
    case 'exhausted': {
      const count = result.attempts.length;
      const lastReply = result.attempts[count - 1]?.rawText.trim() ?? null;
      let message = `No working query after ${count} attempt${count === 1 ? '' : 's'}. Last error: ${result.lastError}`;
      // a reply with no SQL is usually the model answering in words
      if (result.lastCandidate === null && lastReply) {
        message += `\nLast reply:\n${lastReply}`;
      }
      throw exhaustedError(message, {
        lastCandidate: result.lastCandidate,
        lastError: result.lastError,
        lastReply,
      });
    }
    case 'aborted':
      if (result.reason === 'generation-failed' && result.error) {
        throw fromCoreError(result.error);
      }
      printCommandSuccess(
        { skipped: true, reason: result.reason },
        output,
        result.reason === 'cancelled' ? 'Cancelled.' : 'Skipped.',
      );
      return;
  }
}
