#!/usr/bin/env tsx

/**
 * askdb CLI entrypoint.
 */

import { Command, CommanderError } from 'commander';
import {
  QuerySession,
  OpenAIProvider,
  resolveSettings,
  errorMessage,
  SAFE_DEFAULTS,
  type AskDbSettings,
  type SchemaStyle,
} from '@askdb/core';
import { normalizeArgv } from './argv.js';
import { EXIT_CODE_SUCCESS, EXIT_CODE_USAGE, toExitCode, usageError } from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printVerbose,
  startSpinner,
  withOutputFlags,
  type OutputOptions,
} from './output.js';
import { createProgress, reportResult } from './loop-output.js';
import { createConfirm, LineReader } from './util/prompt.js';
import { AskShell } from './shell.js';

const VERSION = '0.1.0';

interface ModelFlags {
  model?: string;
  temperature?: string;
  maxOutputTokens?: string;
  revisions?: string;
}

interface SessionFlags {
  style: string;
  maxRows: string;
}

interface AskFlags extends ModelFlags, SessionFlags {
  yes: boolean;
}

interface ShellFlags extends AskFlags {
  describe: boolean;
}

// ── Helpers ──────────────────────────────────────────────────────────

async function runCommand(
  command: Command,
  fn: (output: OutputOptions) => Promise<void> | void,
): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function withModelFlags(cmd: Command): Command {
  return cmd
    .option('--model <name>', 'Model identifier (env ASKDB_MODEL)')
    .option('--temperature <t>', 'Sampling temperature, 0-2 (env ASKDB_TEMPERATURE)')
    .option('--max-output-tokens <n>', 'Completion length cap (env ASKDB_MAX_OUTPUT_TOKENS)');
}

function withSessionFlags(cmd: Command): Command {
  return cmd
    .option('--style <style>', 'Schema summary style (compact|ddl)', 'compact')
    .option('--max-rows <n>', 'Rows kept from one result', String(SAFE_DEFAULTS.maxRows));
}

function withLoopFlags(cmd: Command): Command {
  return cmd
    .option('-y, --yes', 'Run generated SQL without asking', false)
    .option('-r, --revisions <n>', 'Revisions after the first attempt (env ASKDB_MAX_REVISIONS)');
}

function parseStyle(value: string): SchemaStyle {
  if (value === 'compact' || value === 'ddl') return value;
  throw usageError(`Invalid --style "${value}". Expected compact or ddl.`);
}

function parseMaxRows(value: string): number {
  const maxRows = Number(value);
  if (!Number.isInteger(maxRows) || maxRows <= 0) {
    throw usageError('Invalid --max-rows. Expected a positive integer.');
  }
  return maxRows;
}

function settingsFromFlags(flags: ModelFlags): AskDbSettings {
  return resolveSettings({
    model: flags.model,
    temperature: flags.temperature,
    maxOutputTokens: flags.maxOutputTokens,
    maxRevisions: flags.revisions,
  });
}

async function openSession(path: string, flags: SessionFlags, output: OutputOptions): Promise<QuerySession> {
  const schemaStyle = parseStyle(flags.style);
  const maxRows = parseMaxRows(flags.maxRows);
  printVerbose(`Opening ${path} read-only`, output);
  const session = await QuerySession.open(path, { schemaStyle, maxRows });
  printVerbose(`Schema: ${session.schema.tableCount} tables, ${session.schema.text.length} characters`, output);
  return session;
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('askdb')
  .description('Ask questions about a SQLite database in plain language')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show prompts, internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check environment and settings')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;
          const openAiKeySet = Boolean(process.env.OPENAI_API_KEY);

          let settings: AskDbSettings | null = null;
          let settingsError: string | null = null;
          try {
            settings = resolveSettings();
          } catch (error: unknown) {
            settingsError = errorMessage(error);
          }

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            openAiKeySet,
            baseUrl: process.env.OPENAI_BASE_URL ?? null,
            settings,
            settingsError,
            safeDefaults: SAFE_DEFAULTS,
          };

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }

          printHuman('askdb doctor', output);
          printHuman('============', output);
          printHuman('', output);
          printHuman(`Node.js:     ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          printHuman(`OpenAI key:  ${openAiKeySet ? 'set ✓' : 'not set ✗'}`, output);
          printHuman(`Base URL:    ${payload.baseUrl ?? '(SDK default)'}`, output);
          if (settings) {
            printHuman(`Model:       ${settings.modelConfig.model}`, output);
            printHuman(`Temperature: ${settings.modelConfig.temperature}`, output);
            printHuman(`Max tokens:  ${settings.modelConfig.maxOutputTokens}`, output);
            printHuman(`Revisions:   ${settings.maxRevisions}`, output);
          } else {
            printHuman(`Settings:    ✗ ${settingsError}`, output);
          }
          printHuman('', output);
          printHuman('Safe defaults:', output);
          printHuman(`  Prompt LIMIT hint: ${SAFE_DEFAULTS.promptRowLimit}`, output);
          printHuman(`  Max rows:          ${SAFE_DEFAULTS.maxRows}`, output);
        });
      }),
  ),
  ['askdb doctor', 'askdb doctor --json'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    withSessionFlags(
      program
        .command('schema <db>')
        .description('Print the schema summary sent to the model'),
    ).action(async function (this: Command, db: string, flags: SessionFlags) {
      await runCommand(this, async (output) => {
        const session = await openSession(db, flags, output);
        try {
          if (output.json) {
            printCommandSuccess(
              { path: session.path, style: session.schema.style, text: session.schema.text, tables: session.snapshot.tables },
              output,
            );
            return;
          }
          console.log(session.schema.text);
        } finally {
          session.close();
        }
      });
    }),
  ),
  ['askdb schema chinook.sqlite', 'askdb schema chinook.sqlite --style ddl'],
);

// ── describe ─────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    withModelFlags(
      withSessionFlags(
        program.command('describe <db>').description('Ask the model what the database is for'),
      ),
    ).action(async function (this: Command, db: string, flags: SessionFlags & ModelFlags) {
      await runCommand(this, async (output) => {
        const settings = settingsFromFlags(flags);
        const provider = new OpenAIProvider();
        const session = await openSession(db, flags, output);
        try {
          const spinner = startSpinner('Reading the schema', output);
          let text: string;
          try {
            text = await session.narrate(provider, settings.modelConfig);
          } finally {
            spinner.stop();
          }
          printCommandSuccess({ path: session.path, description: text }, output, text);
        } finally {
          session.close();
        }
      });
    }),
  ),
  ['askdb describe chinook.sqlite'],
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    withLoopFlags(
      withModelFlags(
        withSessionFlags(
          program
            .command('ask <db> <question...>')
            .description('Turn one question into SQL, run it and print the rows'),
        ),
      ),
    ).action(async function (this: Command, db: string, words: string[], flags: AskFlags) {
      await runCommand(this, async (output) => {
        const intent = words.join(' ').trim();
        if (!intent) throw usageError('The question is empty.');
        const settings = settingsFromFlags(flags);
        const provider = new OpenAIProvider();
        // JSON output cannot share stdout with a prompt
        const autoApprove = flags.yes || output.json;

        const session = await openSession(db, flags, output);
        const reader = autoApprove ? null : new LineReader();
        const progress = createProgress(output, { showCandidates: autoApprove });
        try {
          const result = await session.ask(intent, {
            provider,
            modelConfig: settings.modelConfig,
            maxRevisions: settings.maxRevisions,
            autoApprove,
            confirm: reader ? createConfirm(reader, (message) => printHuman(message, output)) : undefined,
            onEvent: progress.onEvent,
          });
          reportResult(result, output);
        } finally {
          progress.stop();
          reader?.close();
          session.close();
        }
      });
    }),
  ),
  [
    'askdb ask chinook.sqlite "How many customers are there?"',
    'askdb ask chinook.sqlite -y -r 3 --json "Top 5 artists by number of tracks"',
  ],
);

// ── shell ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    withLoopFlags(
      withModelFlags(
        withSessionFlags(
          program
            .command('shell <db>')
            .description('Interactive session: describe the database, then answer questions')
            .option('--no-describe', 'Skip the opening description'),
        ),
      ),
    ).action(async function (this: Command, db: string, flags: ShellFlags) {
      await runCommand(this, async (output) => {
        if (output.json) throw usageError('The shell does not support --json.');
        const settings = settingsFromFlags(flags);
        const provider = new OpenAIProvider();
        const session = await openSession(db, flags, output);
        try {
          await new AskShell({
            session,
            provider,
            settings,
            autoApprove: flags.yes,
            describe: flags.describe,
            output,
          }).start();
        } finally {
          session.close();
        }
      });
    }),
  ),
  ['askdb shell chinook.sqlite', 'askdb shell chinook.sqlite --no-describe -r 4'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const normalizedArgv = normalizeArgv(process.argv);
  try {
    await program.parseAsync(normalizedArgv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    // Commander reports help, version and usage failures as CommanderError
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
