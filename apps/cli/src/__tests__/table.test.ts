import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { formatTable, formatValue } from '../util/table.js';

describe('formatTable', () => {
  it('aligns positional rows under their headers', () => {
    assert.equal(
      formatTable(
        ['id', 'name'],
        [
          [1, 'Ines'],
          [2, null],
        ],
      ),
      ['id | name', '---+-----', '1  | Ines', '2  | NULL'].join('\n'),
    );
  });

  it('keeps duplicate column names apart', () => {
    assert.equal(formatTable(['x', 'x'], [[1, 2]]), ['x | x', '--+--', '1 | 2'].join('\n'));
  });

  it('does not leave trailing padding', () => {
    assert.equal(formatTable(['n', 'name'], [[1, 'a']]), ['n | name', '--+-----', '1 | a'].join('\n'));
  });

  it('cuts long values at 60 characters', () => {
    const lines = formatTable(['v'], [['a'.repeat(70)]]).split('\n');
    assert.equal(lines[2], 'a'.repeat(59) + '…');
  });

  it('keeps the headers of an empty result', () => {
    assert.equal(formatTable(['id', 'name'], []), ['id | name', '---+-----', '(0 rows)'].join('\n'));
    assert.equal(formatTable([], []), '(no columns)');
  });
});

describe('formatValue', () => {
  it('renders SQLite values', () => {
    assert.equal(formatValue(null), 'NULL');
    assert.equal(formatValue(3.5), '3.5');
    assert.equal(formatValue(12345678901234567890n), '12345678901234567890');
    assert.equal(formatValue(Buffer.from([1, 2, 3])), '<blob 3 bytes>');
    assert.equal(formatValue('two\nlines'), 'two lines');
  });
});
