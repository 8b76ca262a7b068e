import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildGenerationPrompt, buildNarrationPrompt, renderPrompt } from '../prompt.js';
import { summarizeSchema } from '../schema.js';

const schema = summarizeSchema({
  tables: [
    {
      name: 'Track',
      columns: [
        { name: 'TrackId', dataType: 'INTEGER', nullable: false, isPrimaryKey: true },
        { name: 'Name', dataType: 'TEXT', nullable: false, isPrimaryKey: false },
      ],
      foreignKeys: [],
    },
  ],
  capturedAt: new Date(0),
});

describe('buildNarrationPrompt', () => {
  it('asks for a short summary of the schema', () => {
    const messages = buildNarrationPrompt(schema);
    assert.deepEqual(
      messages.map((m) => m.role),
      ['system', 'user'],
    );
    assert.ok(messages[0].content.endsWith(`\n\n${schema.text}`));
    assert.match(messages[1].content, /about 100 words/);
  });
});

describe('buildGenerationPrompt', () => {
  it('carries the rules, the schema and the question on a first attempt', () => {
    const messages = buildGenerationPrompt(schema, 'How many tracks are there?');
    assert.deepEqual(
      messages.map((m) => m.role),
      ['system', 'user', 'assistant', 'user'],
    );
    assert.match(messages[0].content, /exactly ONE SQL statement/);
    assert.match(messages[0].content, /add LIMIT 25 unless/);
    assert.match(messages[0].content, /NEVER insert, update, delete/);
    assert.equal(messages[1].content, `My database schema is:\n\n${schema.text}`);
    assert.equal(messages[3].content, 'How many tracks are there?');
  });

  it('uses the configured row limit', () => {
    const [system] = buildGenerationPrompt(schema, 'list tracks', [], { rowLimit: 10 });
    assert.match(system.content, /add LIMIT 10 unless/);
  });

  it('replays a failed statement with its error verbatim', () => {
    const messages = buildGenerationPrompt(schema, 'How many tracks are there?', [
      {
        candidate: 'SELECT COUNT(*) FROM Tracks',
        rawText: '```sql\nSELECT COUNT(*) FROM Tracks\n```',
        errorMessage: 'no such table: Tracks',
      },
    ]);
    assert.equal(messages.length, 6);
    assert.deepEqual(messages[4], { role: 'assistant', content: 'SELECT COUNT(*) FROM Tracks' });
    assert.equal(messages[5].role, 'user');
    assert.equal(
      messages[5].content,
      'Running that statement failed with this error:\nno such table: Tracks\n\n' +
        'Fix this specific error in the statement above instead of starting over.\n' +
        'Respond with ONE corrected SQL statement and nothing else.',
    );
  });

  it('replays the raw reply when no statement could be extracted', () => {
    const messages = buildGenerationPrompt(schema, 'count tracks', [
      { candidate: null, rawText: 'I think you want to count the tracks.', errorMessage: 'no SQL statement found' },
    ]);
    assert.equal(messages[4].content, 'I think you want to count the tracks.');
    assert.equal(
      messages[5].content,
      'Your previous response could not be used: no SQL statement found.\n' +
        'Reissue your answer as exactly ONE SQL statement with no surrounding text.',
    );
  });

  it('replays only the most recent attempt', () => {
    const messages = buildGenerationPrompt(schema, 'count tracks', [
      { candidate: 'SELECT COUNT(*) FROM Trakc', rawText: 'x', errorMessage: 'no such table: Trakc' },
      { candidate: 'SELECT COUNT(*) FROM Tracks', rawText: 'y', errorMessage: 'no such table: Tracks' },
    ]);
    assert.equal(messages.length, 6);
    const text = renderPrompt(messages);
    assert.equal(text.includes('Trakc'), false);
    assert.equal(text.includes('no such table: Tracks'), true);
  });
});

describe('renderPrompt', () => {
  it('labels each message with its role', () => {
    assert.equal(
      renderPrompt([
        { role: 'system', content: 'rules' },
        { role: 'user', content: 'question' },
      ]),
      '[system]\nrules\n\n[user]\nquestion',
    );
  });
});
