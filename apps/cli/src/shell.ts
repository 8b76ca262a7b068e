/**
 * Interactive shell: narrate the schema once, then answer questions until
 * input ends. Ctrl+C cancels the current run once its in-flight call returns.
 */

import { errorMessage, type GenerationProvider, type QuerySession, type AskDbSettings } from '@askdb/core';
import { createConfirm, LineReader } from './util/prompt.js';
import { createProgress, reportResult } from './loop-output.js';
import { printError, printHuman, printWarning, startSpinner, type OutputOptions } from './output.js';

export interface ShellOpts {
  session: QuerySession;
  provider: GenerationProvider;
  settings: AskDbSettings;
  autoApprove: boolean;
  describe: boolean;
  output: OutputOptions;
}

const EXIT_WORDS = new Set(['exit', 'quit', '\\q']);

export class AskShell {
  private readonly opts: ShellOpts;
  private readonly reader: LineReader;
  private controller: AbortController | null = null;

  constructor(opts: ShellOpts) {
    this.opts = opts;
    this.reader = new LineReader();
    this.reader.rl.on('SIGINT', () => this.handleInterrupt());
  }

  async start(): Promise<void> {
    const { session, output } = this.opts;
    printHuman(`Connected to ${session.path} (${session.schema.tableCount} tables, read-only).`, output);

    if (this.opts.describe) {
      await this.describe();
    }
    printHuman('Ask a question about the data. Ctrl+C cancels a run, Ctrl+D exits.\n', output);

    try {
      for (;;) {
        const line = await this.reader.question('askdb> ');
        if (line === null) break;
        const intent = line.trim();
        if (!intent) continue;
        if (EXIT_WORDS.has(intent.toLowerCase())) break;
        await this.runOne(intent);
      }
    } finally {
      this.reader.close();
    }
    printHuman('', output);
  }

  private async describe(): Promise<void> {
    const { session, provider, settings, output } = this.opts;
    const spinner = startSpinner('Reading the schema', output);
    try {
      const text = await session.narrate(provider, settings.modelConfig);
      spinner.stop();
      printHuman(`\n${text}\n`, output);
    } catch (error: unknown) {
      spinner.stop();
      printWarning(`Could not describe the database: ${errorMessage(error)}`, output);
    }
  }

  private async runOne(intent: string): Promise<void> {
    const { session, provider, settings, autoApprove, output } = this.opts;
    const progress = createProgress(output, { showCandidates: autoApprove });
    this.controller = new AbortController();
    try {
      const result = await session.ask(intent, {
        provider,
        modelConfig: settings.modelConfig,
        maxRevisions: settings.maxRevisions,
        autoApprove,
        confirm: autoApprove ? undefined : createConfirm(this.reader, (message) => printHuman(message, output)),
        signal: this.controller.signal,
        onEvent: progress.onEvent,
      });
      reportResult(result, output);
    } catch (error: unknown) {
      progress.stop();
      printError(error, output);
    } finally {
      this.controller = null;
    }
  }

  private handleInterrupt(): void {
    if (this.controller) {
      if (!this.controller.signal.aborted) {
        this.controller.abort();
        printHuman('\nCancelling after the current step...', this.opts.output);
      }
      this.reader.interrupt();
      return;
    }
    this.reader.clearLine();
    printHuman('\n(Ctrl+D or "exit" leaves the shell)', this.opts.output);
    this.reader.rl.prompt(true);
  }
}
