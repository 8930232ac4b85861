import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { closeDb, getDb, initDb, isUniqueViolation, parseEnumColumn, parseJsonColumn } from './index.js';

describe('Database', () => {
  beforeEach(async () => {
    await closeDb();
    await initDb(':memory:');
    getDb().rawExec('CREATE TABLE things (id TEXT PRIMARY KEY, label TEXT NOT NULL UNIQUE)');
  });

  afterAll(async () => {
    await closeDb();
  });

  it('getDb throws before initDb', async () => {
    await closeDb();
    expect(() => getDb()).toThrow('Database not initialized. Call initDb() first.');
  });

  it('rawRun returns the number of changed rows', () => {
    const db = getDb();
    expect(db.rawRun('INSERT INTO things (id, label) VALUES (?, ?)', ['1', 'a'])).toBe(1);
    expect(db.rawRun('INSERT INTO things (id, label) VALUES (?, ?)', ['2', 'b'])).toBe(1);
    expect(db.rawRun('UPDATE things SET label = label || ?', ['!'])).toBe(2);
  });

  it('rawGet returns the first row or undefined', () => {
    const db = getDb();
    db.rawRun('INSERT INTO things (id, label) VALUES (?, ?)', ['1', 'a']);
    expect(db.rawGet('SELECT label FROM things WHERE id = ?', ['1'])).toEqual({ label: 'a' });
    expect(db.rawGet('SELECT label FROM things WHERE id = ?', ['missing'])).toBeUndefined();
  });

  it('transaction rolls back every write when the callback throws', () => {
    const db = getDb();
    expect(() => db.transaction(() => {
      db.rawRun('INSERT INTO things (id, label) VALUES (?, ?)', ['1', 'a']);
      throw new Error('boom');
    })).toThrow('boom');
    expect(db.rawQuery('SELECT * FROM things')).toEqual([]);
  });

  it('transaction returns the callback result', () => {
    const db = getDb();
    const count = db.transaction(() => db.rawRun('INSERT INTO things (id, label) VALUES (?, ?)', ['1', 'a']));
    expect(count).toBe(1);
  });

  it('isUniqueViolation recognises UNIQUE and PRIMARY KEY conflicts only', () => {
    const db = getDb();
    db.rawRun('INSERT INTO things (id, label) VALUES (?, ?)', ['1', 'a']);

    const capture = (fn: () => void): unknown => {
      try {
        fn();
      } catch (error) {
        return error;
      }
      return undefined;
    };

    expect(isUniqueViolation(capture(() => db.rawRun('INSERT INTO things (id, label) VALUES (?, ?)', ['2', 'a'])))).toBe(true);
    expect(isUniqueViolation(capture(() => db.rawRun('INSERT INTO things (id, label) VALUES (?, ?)', ['1', 'b'])))).toBe(true);
    expect(isUniqueViolation(capture(() => db.rawRun('INSERT INTO things (id, label) VALUES (?, NULL)', ['3'])))).toBe(false);
    expect(isUniqueViolation(new Error('plain'))).toBe(false);
  });
});

describe('parseJsonColumn', () => {
  it('parses JSON text', () => {
    expect(parseJsonColumn('{"a":[1,2]}', {})).toEqual({ a: [1, 2] });
  });

  it('returns the fallback for NULL, empty or malformed text', () => {
    expect(parseJsonColumn(null, 'x')).toBe('x');
    expect(parseJsonColumn('', 'x')).toBe('x');
    expect(parseJsonColumn('{oops', 'x')).toBe('x');
  });
});

describe('parseEnumColumn', () => {
  const COLORS = ['red', 'blue'] as const;

  it('returns a known value', () => {
    expect(parseEnumColumn(COLORS, 'blue', 'paint.color')).toBe('blue');
  });

  it('throws on an unexpected value', () => {
    expect(() => parseEnumColumn(COLORS, 'green', 'paint.color')).toThrow("Unexpected value 'green' in column paint.color");
  });
});
