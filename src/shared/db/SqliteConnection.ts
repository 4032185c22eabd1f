// src/shared/db/SqliteConnection.ts

/**
 * Scoped SQLite connections.
 *
 * Every store operation opens its own connection and releases it before
 * returning, on success and on failure alike. Nothing is held between requests.
 */

import Database from 'better-sqlite3';

export type SqliteDatabase = Database.Database;

export type ConnectionFactory = (databasePath: string) => SqliteDatabase;

export const openSqliteConnection: ConnectionFactory = (databasePath) => new Database(databasePath);

/**
 * Run `work` against a freshly opened connection and always close it afterwards.
 */
export function withConnection<T>(
  databasePath: string,
  work: (db: SqliteDatabase) => T,
  open: ConnectionFactory = openSqliteConnection,
): T {
  const db = open(databasePath);
  try {
    return work(db);
  } finally {
    db.close();
  }
}
