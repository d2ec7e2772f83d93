import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createDb, createTestDb, getRawDb, closeDb } from '../src/db.js';

let dirs: string[] = [];

afterEach(() => {
  for (const dir of dirs) rmSync(dir, { recursive: true, force: true });
  dirs = [];
});

describe('createTestDb', () => {
  it('creates the tasks table and its indexes', () => {
    const raw = getRawDb(createTestDb());
    const names = raw
      .prepare("SELECT name FROM sqlite_master WHERE tbl_name = 'tasks' ORDER BY name")
      .pluck()
      .all();
    expect(names).toEqual([
      'idx_tasks_done_created',
      'idx_tasks_due_date',
      'idx_tasks_open_title_due',
      'tasks',
    ]);
  });
});

describe('createDb', () => {
  it('creates missing parent directories and enables WAL', () => {
    const dir = mkdtempSync(join(tmpdir(), 'todo-hotel-'));
    dirs.push(dir);
    const path = join(dir, 'nested', 'hotel.db');

    const db = createDb(path);
    expect(existsSync(path)).toBe(true);
    expect(getRawDb(db).pragma('journal_mode', { simple: true })).toBe('wal');
    closeDb(db);
  });

  it('can reopen an existing database', () => {
    const dir = mkdtempSync(join(tmpdir(), 'todo-hotel-'));
    dirs.push(dir);
    const path = join(dir, 'hotel.db');

    closeDb(createDb(path));
    const db = createDb(path);
    expect(getRawDb(db).open).toBe(true);
    closeDb(db);
  });
});

describe('closeDb', () => {
  it('can be called twice', () => {
    const db = createTestDb();
    closeDb(db);
    closeDb(db);
    expect(getRawDb(db).open).toBe(false);
  });
});
