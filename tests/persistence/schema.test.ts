/**
 * Migration runner tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { MIGRATIONS, applyMigrations, getSchemaVersion, needsMigration } from '../../src/persistence/schema.js';

describe('schema migrations', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('starts at version 0 and needs migrating', () => {
    expect(getSchemaVersion(db)).toBe(0);
    expect(needsMigration(db)).toBe(true);
  });

  it('applies every migration in order', () => {
    const result = applyMigrations(db);

    expect(result).toEqual({
      applied: MIGRATIONS.length,
      currentVersion: 2,
      appliedMigrations: ['initial', 'message_indexes'],
    });
    expect(needsMigration(db)).toBe(false);
    expect(db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name").all()).toEqual([
      { name: 'messages' },
      { name: 'sessions' },
    ]);
  });

  it('is a no-op when up to date', () => {
    applyMigrations(db);

    expect(applyMigrations(db)).toEqual({ applied: 0, currentVersion: 2, appliedMigrations: [] });
  });

  it('only applies migrations past the stored version', () => {
    db.pragma('user_version = 1');
    db.exec(
      `CREATE TABLE sessions (id TEXT PRIMARY KEY, chat_name TEXT NOT NULL, created_at TEXT NOT NULL,
       last_active_at TEXT NOT NULL, message_count INTEGER NOT NULL DEFAULT 0)`
    );
    db.exec(
      `CREATE TABLE messages (id TEXT PRIMARY KEY, session_id TEXT NOT NULL, seq INTEGER NOT NULL,
       role TEXT NOT NULL, content TEXT NOT NULL, agent_name TEXT, metadata TEXT NOT NULL DEFAULT '{}',
       timestamp TEXT NOT NULL)`
    );

    expect(applyMigrations(db).appliedMigrations).toEqual(['message_indexes']);
  });
});
