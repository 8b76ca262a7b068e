import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import type { GenerationProvider, ModelConfig, PromptMessage } from '../llm/types.js';

export const FIXTURE_SQL = `
CREATE TABLE Employee (
  EmployeeId INTEGER PRIMARY KEY,
  LastName TEXT NOT NULL,
  Email TEXT
);
CREATE TABLE Customer (
  CustomerId INTEGER PRIMARY KEY,
  FirstName TEXT NOT NULL,
  Company TEXT,
  SupportRepId INTEGER REFERENCES Employee(EmployeeId)
);
INSERT INTO Employee VALUES (1, 'Okafor', 'okafor@example.test');
INSERT INTO Customer VALUES
  (1, 'Ines', 'Zeta Widgets', 1),
  (2, 'Tomas', NULL, 1);
`;

/** Row values seeded above; none of them may ever reach a prompt. */
export const FIXTURE_ROW_VALUES = ['Okafor', 'okafor@example.test', 'Ines', 'Zeta Widgets', 'Tomas'];

export const TEST_MODEL_CONFIG: ModelConfig = {
  model: 'test-model',
  temperature: 0,
  maxOutputTokens: 256,
};

export interface FixtureDb {
  path: string;
  cleanup(): void;
}

export function createFixtureDb(sql: string = FIXTURE_SQL): FixtureDb {
  const dir = mkdtempSync(join(tmpdir(), 'askdb-test-'));
  const path = join(dir, 'fixture.sqlite');
  const db = new Database(path);
  db.pragma('user_version = 1');
  if (sql.trim()) db.exec(sql);
  db.close();
  return {
    path,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/**
 * Provider that replays scripted replies in order and records every prompt.
 * An Error entry is thrown instead of returned.
 */
export class ScriptedProvider implements GenerationProvider {
  readonly calls: PromptMessage[][] = [];
  private readonly replies: Array<string | Error>;
  private readonly onCall?: (callIndex: number) => void;

  constructor(replies: Array<string | Error>, onCall?: (callIndex: number) => void) {
    this.replies = [...replies];
    this.onCall = onCall;
  }

  async complete(messages: PromptMessage[], _config: ModelConfig): Promise<string> {
    this.calls.push(messages);
    this.onCall?.(this.calls.length - 1);
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error('ScriptedProvider ran out of replies');
    }
    if (next instanceof Error) throw next;
    return next;
  }
}

export function promptText(messages: PromptMessage[]): string {
  return messages.map((m) => m.content).join('\n');
}
