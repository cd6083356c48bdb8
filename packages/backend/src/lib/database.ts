import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { MIGRATIONS, type Migration } from '../store/migrations.js';
import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';

export type SqliteDatabase = Database.Database;

/**
 * Open the SQLite database named by the config and bring its schema up to date.
 * `:memory:` gives a private in-process database.
 */
export function openDatabase(
  config: Pick<AppConfig, 'databasePath'>,
  logger?: Logger
): SqliteDatabase {
  if (config.databasePath !== ':memory:') {
    mkdirSync(dirname(config.databasePath), { recursive: true });
  }

  const db = new Database(config.databasePath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  const applied = migrate(db);
  if (applied.length > 0) {
    logger?.info({ migrations: applied }, 'Applied database migrations');
  }
  return db;
}

/** Apply every pending migration. Returns the ids applied by this call. */
export function migrate(db: SqliteDatabase, migrations: readonly Migration[] = MIGRATIONS): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id          TEXT PRIMARY KEY,
      applied_at  TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const done = new Set(
    db
      .prepare('SELECT id FROM schema_migrations')
      .pluck()
      .all()
      .filter((id): id is string => typeof id === 'string')
  );
  const record = db.prepare('INSERT INTO schema_migrations (id) VALUES (?)');
  const applied: string[] = [];

  const run = db.transaction((pending: readonly Migration[]) => {
    for (const migration of pending) {
      db.exec(migration.sql);
      record.run(migration.id);
      applied.push(migration.id);
    }
  });
  run(migrations.filter((m) => !done.has(m.id)));

  return applied;
}
