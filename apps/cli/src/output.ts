import type { Command } from 'commander';
import ora, { type Ora } from 'ora';
import { formatTable } from './util/table.js';
import { CliError, fromCoreError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals?.() ?? command.opts();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet && !output.json) {
    console.log(message);
  }
}

export function printVerbose(message: string, output: OutputOptions): void {
  if (output.verbose && !output.json) {
    console.error(message);
  }
}

export function printDebug(message: string, output: OutputOptions): void {
  if (output.debug && !output.json) {
    console.error(message);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet && !output.json) {
    console.warn(`Warning: ${message}`);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, jsonReplacer, 2));
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (Buffer.isBuffer(value)) return value.toString('base64');
  // Buffer.toJSON runs before the replacer sees the value
  if (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'Buffer' &&
    'data' in value &&
    Array.isArray(value.data)
  ) {
    return Buffer.from(value.data).toString('base64');
  }
  return value;
}

/** Result tables go to stdout even with --quiet; they are the answer. */
export function printHumanTable(columns: string[], rows: unknown[][], output: OutputOptions): void {
  if (output.json) return;
  console.log(formatTable(columns, rows));
}

export function printError(error: unknown, output: OutputOptions): void {
  const mapped = fromCoreError(error);
  const isCliError = mapped instanceof CliError;
  const message = isCliError ? mapped.message : mapped instanceof Error ? mapped.message : String(mapped);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: isCliError ? mapped.code : 'INTERNAL_ERROR',
      message,
    };
    if (output.debug) {
      payload.details = isCliError
        ? mapped.details ?? null
        : mapped instanceof Error
          ? { stack: mapped.stack }
          : { raw: String(mapped) };
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (output.debug) {
    if (isCliError && mapped.details !== undefined) {
      console.error('Details:', JSON.stringify(mapped.details, null, 2));
    }
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

/** Spinner on stderr; silent under --json or --quiet. */
export function startSpinner(text: string, output: OutputOptions): Ora {
  return ora({
    text,
    spinner: 'dots',
    stream: process.stderr,
    isSilent: output.json || output.quiet,
  }).start();
}

export function withOutputFlags<T extends Command>(command: T): T {
  return command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show additional context', false)
    .option('--debug', 'Show prompts, internal error details and stacks', false) as T;
}
