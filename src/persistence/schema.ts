/**
 * SQLite Schema Definitions
 *
 * Migrations are embedded as code, versioned through PRAGMA user_version,
 * and written to be re-runnable (IF NOT EXISTS).
 */

import type Database from 'better-sqlite3';

// =============================================================================
// TYPES
// =============================================================================

export interface Migration {
  /** Version number (must be unique and sequential) */
  version: number;
  name: string;
  /** SQL statements to execute (semicolon-separated) */
  sql: string;
}

export interface MigrationResult {
  applied: number;
  currentVersion: number;
  appliedMigrations: string[];
}

// =============================================================================
// EMBEDDED MIGRATIONS
// =============================================================================

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'initial',
    sql: `
      -- One row per group chat session
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        chat_name TEXT NOT NULL,
        created_at TEXT NOT NULL,
        last_active_at TEXT NOT NULL,
        message_count INTEGER NOT NULL DEFAULT 0
      );

      -- Conversation history, in append order per session
      CREATE TABLE IF NOT EXISTS messages (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        seq INTEGER NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        agent_name TEXT,
        metadata TEXT NOT NULL DEFAULT '{}',
        timestamp TEXT NOT NULL,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
      );
    `,
  },
  {
    version: 2,
    name: 'message_indexes',
    sql: `
      CREATE UNIQUE INDEX IF NOT EXISTS idx_messages_session_seq ON messages(session_id, seq);
      CREATE INDEX IF NOT EXISTS idx_sessions_last_active ON sessions(last_active_at);
    `,
  },
];

// =============================================================================
// MIGRATION RUNNER
// =============================================================================

export function getSchemaVersion(db: Database.Database): number {
  const result: unknown = db.pragma('user_version', { simple: true });
  return typeof result === 'number' ? result : 0;
}

function setSchemaVersion(db: Database.Database, version: number): void {
  db.pragma(`user_version = ${version}`);
}

/**
 * Strip leading comment lines from SQL statement.
 */
function stripLeadingComments(sql: string): string {
  const lines = sql.split('\n');
  let startIndex = 0;

  while (startIndex < lines.length) {
    const line = lines[startIndex].trim();
    if (line === '' || line.startsWith('--')) {
      startIndex++;
    } else {
      break;
    }
  }

  return lines.slice(startIndex).join('\n').trim();
}

/**
 * Apply all pending migrations. Each migration runs in its own transaction
 * together with its version bump.
 */
export function applyMigrations(db: Database.Database): MigrationResult {
  const currentVersion = getSchemaVersion(db);
  const pending = MIGRATIONS.filter((m) => m.version > currentVersion);
  const applied: string[] = [];

  for (const migration of pending) {
    const statements = migration.sql
      .split(';')
      .map((s) => stripLeadingComments(s.trim()))
      .filter((s) => s.length > 0);

    try {
      db.transaction(() => {
        for (const statement of statements) {
          db.exec(statement);
        }
        setSchemaVersion(db, migration.version);
      })();
      applied.push(migration.name);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`Migration ${migration.version}_${migration.name} failed: ${msg}`);
    }
  }

  return {
    applied: applied.length,
    currentVersion: getSchemaVersion(db),
    appliedMigrations: applied,
  };
}

export function needsMigration(db: Database.Database): boolean {
  const latestVersion = MIGRATIONS.length > 0 ? MIGRATIONS[MIGRATIONS.length - 1].version : 0;
  return getSchemaVersion(db) < latestVersion;
}
