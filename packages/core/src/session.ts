/**
 * A query session over one SQLite file.
 * Holds the read-only handle and the schema description for the session's
 * lifetime; each question runs through a fresh repair loop.
 */

import { openReadOnly, introspectSchema, type SqliteHandle } from './db/adapters/sqlite.js';
import { createExecutor } from './db/execute.js';
import { SAFE_DEFAULTS } from './db/defaults.js';
import type { SchemaSnapshot } from './db/types.js';
import { summarizeSchema, type SchemaDescription, type SchemaStyle } from './llm/schema.js';
import { buildNarrationPrompt } from './llm/prompt.js';
import type { GenerationProvider, ModelConfig } from './llm/types.js';
import { runIntent, type LoopResult, type RunIntentOptions } from './repair-loop.js';

export interface SessionOpts {
  schemaStyle?: SchemaStyle;
  /** Hard cap on rows kept from one result */
  maxRows?: number;
}

export type AskOptions = Omit<RunIntentOptions, 'intent' | 'schema' | 'execute'>;

export class QuerySession {
  readonly path: string;
  readonly snapshot: SchemaSnapshot;
  readonly schema: SchemaDescription;
  private readonly handle: SqliteHandle;
  private readonly maxRows: number;

  private constructor(path: string, handle: SqliteHandle, snapshot: SchemaSnapshot, schema: SchemaDescription, maxRows: number) {
    this.path = path;
    this.handle = handle;
    this.snapshot = snapshot;
    this.schema = schema;
    this.maxRows = maxRows;
  }

  /**
   * Open `path` read-only and summarize its schema.
   * Throws DatabaseOpenError or SchemaUnavailableError.
   */
  static async open(path: string, opts: SessionOpts = {}): Promise<QuerySession> {
    const handle = openReadOnly(path);
    try {
      const snapshot = await introspectSchema(handle);
      const schema = summarizeSchema(snapshot, { style: opts.schemaStyle });
      return new QuerySession(path, handle, snapshot, schema, opts.maxRows ?? SAFE_DEFAULTS.maxRows);
    } catch (err: unknown) {
      handle.close();
      throw err;
    }
  }

  /** Ask the model what this database appears to be for. */
  async narrate(provider: GenerationProvider, modelConfig: ModelConfig): Promise<string> {
    const text = await provider.complete(buildNarrationPrompt(this.schema), modelConfig);
    return text.trim();
  }

  async ask(intent: string, opts: AskOptions): Promise<LoopResult> {
    return runIntent({
      ...opts,
      intent,
      schema: this.schema,
      execute: createExecutor(this.handle, { maxRows: this.maxRows }),
    });
  }

  close(): void {
    if (this.handle.open) {
      this.handle.close();
    }
  }
}
