import BetterSqlite3 = require('better-sqlite3');
import { SQLiteDriver, RunResult } from '../driver';

export class BetterSqlite3Driver implements SQLiteDriver {
  private db: BetterSqlite3.Database;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;
  }

  /**
   * Opens a database file, or an in-memory database for ':memory:', with
   * foreign key enforcement on.
   */
  static open(filename: string = ':memory:'): BetterSqlite3Driver {
    const db = new BetterSqlite3(filename);
    db.pragma('foreign_keys = ON');
    return new BetterSqlite3Driver(db);
  }

  get rawDb(): BetterSqlite3.Database {
    return this.db;
  }

  run(sql: string, params?: unknown[]): RunResult {
    const result = this.db.prepare(sql).run(...(params ?? []));
    return {
      changes: result.changes,
      lastInsertRowid: Number(result.lastInsertRowid),
    };
  }

  get<T>(sql: string, params?: unknown[]): T | undefined {
    return this.db.prepare(sql).get(...(params ?? [])) as T | undefined;
  }

  all<T>(sql: string, params?: unknown[]): T[] {
    return this.db.prepare(sql).all(...(params ?? [])) as T[];
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
