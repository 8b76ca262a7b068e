import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { Attempt, LoopResult } from '@askdb/core';
import { CliError } from '../errors.js';
import { reportResult } from '../loop-output.js';
import type { OutputOptions } from '../output.js';

const output: OutputOptions = { json: false, quiet: true, verbose: false, debug: false };

function attempt(n: number, rawText: string, candidate: string | null, errorMessage: string): Attempt {
  return {
    n,
    prompt: [],
    rawText,
    candidate,
    outcome: { kind: 'failed', errorMessage },
    generationMs: 5,
    executionMs: candidate === null ? null : 1,
  };
}

function thrown(result: LoopResult): CliError {
  try {
    reportResult(result, output);
  } catch (error: unknown) {
    if (error instanceof CliError) return error;
    throw error;
  }
  assert.fail('expected reportResult to throw');
}

describe('reportResult', () => {
  it('shows the last reply when the model never gave SQL', () => {
    const error = thrown({
      status: 'exhausted',
      lastError: 'no SQL statement found',
      lastCandidate: null,
      attempts: [attempt(1, 'I think the Customer table has what you need.\n', null, 'no SQL statement found')],
    });
    assert.equal(error.code, 'REVISIONS_EXHAUSTED');
    assert.equal(
      error.message,
      'No working query after 1 attempt. Last error: no SQL statement found\nLast reply:\nI think the Customer table has what you need.',
    );
    assert.deepEqual(error.details, {
      lastCandidate: null,
      lastError: 'no SQL statement found',
      lastReply: 'I think the Customer table has what you need.',
    });
  });

  it('leaves the reply out when the last attempt had a candidate', () => {
    const error = thrown({
      status: 'exhausted',
      lastError: 'no such column: Nme',
      lastCandidate: 'SELECT Nme FROM Customer',
      attempts: [
        attempt(1, 'Not sure.', null, 'no SQL statement found'),
        attempt(2, 'SELECT Nme FROM Customer', 'SELECT Nme FROM Customer', 'no such column: Nme'),
      ],
    });
    assert.equal(error.message, 'No working query after 2 attempts. Last error: no such column: Nme');
  });
});
