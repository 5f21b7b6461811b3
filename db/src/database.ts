import { SQLiteDriver } from './driver';
import { RemoteTable, RemoteRowMap, RawRow, StorageObjectRow } from './row-types';
import { RemoteTableClient, ImageStorage } from './client';

export const CURRENT_SCHEMA_VERSION = 1;

export const DEFAULT_STORAGE_BASE_URL = 'https://storage.pocketdesk.app/v1/object/public';

const REMOTE_TABLES: RemoteTable[] = ['notes', 'deleted_notes', 'folders', 'deleted_folders'];

const BOOLEAN_COLUMNS: Record<RemoteTable, string[]> = {
  notes: ['is_locked', 'is_pinned'],
  deleted_notes: ['is_pinned', 'is_locked'],
  folders: [],
  deleted_folders: [],
};

// Stored as JSON text, like a jsonb column: both an array and a string round-trip
const JSON_COLUMNS: Record<RemoteTable, string[]> = {
  notes: ['image_attachments'],
  deleted_notes: ['image_attachments'],
  folders: [],
  deleted_folders: [],
};

export interface RemoteDatabaseOptions {
  storageBaseUrl?: string;
}

/**
 * RemoteDatabase - Relational store for notes, folders, their trash tables and note images
 *
 * Exposes the tables through RemoteTableClient and the image bucket through
 * ImageStorage, decoding rows into the same JSON shapes a REST client returns:
 * booleans as booleans, JSON columns parsed.
 */
export class RemoteDatabase implements RemoteTableClient, ImageStorage {
  protected driver: SQLiteDriver;
  private storageBaseUrl: string;
  private columns = new Map<RemoteTable, Set<string>>();

  constructor(driver: SQLiteDriver, options: RemoteDatabaseOptions = {}) {
    this.driver = driver;
    this.storageBaseUrl = options.storageBaseUrl ?? DEFAULT_STORAGE_BASE_URL;
    this.initializeTables();
    this.runMigrations();
    this.loadColumns();
  }

  private initializeTables(): void {
    this.driver.exec('PRAGMA foreign_keys = ON');

    this.driver.exec(`
      CREATE TABLE IF NOT EXISTS folders (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        name TEXT NOT NULL,
        color TEXT NOT NULL,
        parent_folder_id TEXT,
        created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        FOREIGN KEY (parent_folder_id) REFERENCES folders(id)
      );

      CREATE TABLE IF NOT EXISTS notes (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        title TEXT NOT NULL,
        content TEXT NOT NULL DEFAULT '',
        is_locked INTEGER NOT NULL DEFAULT 0,
        date_created TEXT NOT NULL,
        date_modified TEXT NOT NULL,
        is_pinned INTEGER NOT NULL DEFAULT 0,
        folder_id TEXT,
        image_attachments TEXT
      );

      CREATE TABLE IF NOT EXISTS deleted_notes (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        title TEXT NOT NULL,
        content TEXT NOT NULL DEFAULT '',
        folder_id TEXT,
        is_pinned INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        deleted_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS deleted_folders (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        name TEXT NOT NULL,
        color TEXT NOT NULL,
        parent_folder_id TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        deleted_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS storage_objects (
        bucket TEXT NOT NULL,
        path TEXT NOT NULL,
        content BLOB NOT NULL,
        content_type TEXT NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (bucket, path)
      );

      CREATE INDEX IF NOT EXISTS idx_notes_user ON notes(user_id);
      CREATE INDEX IF NOT EXISTS idx_folders_user ON folders(user_id);
      CREATE INDEX IF NOT EXISTS idx_deleted_notes_user ON deleted_notes(user_id);
      CREATE INDEX IF NOT EXISTS idx_deleted_folders_user ON deleted_folders(user_id);
    `);
  }

  private runMigrations(): void {
    // Trashed notes keep their lock state and image URLs so a purge can remove the images
    const deletedNoteColumns = this.driver.all<{ name: string }>('PRAGMA table_info(deleted_notes)');
    const deletedNoteColumnNames = deletedNoteColumns.map(c => c.name);

    if (!deletedNoteColumnNames.includes('is_locked')) {
      console.log('[DB Migration] Adding is_locked to deleted_notes');
      this.driver.exec('ALTER TABLE deleted_notes ADD COLUMN is_locked INTEGER DEFAULT 0');
    }
    if (!deletedNoteColumnNames.includes('image_attachments')) {
      console.log('[DB Migration] Adding image_attachments to deleted_notes');
      this.driver.exec('ALTER TABLE deleted_notes ADD COLUMN image_attachments TEXT');
    }

    const version = this.driver.get<{ user_version: number }>('PRAGMA user_version');
    if (!version || version.user_version < CURRENT_SCHEMA_VERSION) {
      this.driver.exec(`PRAGMA user_version = ${CURRENT_SCHEMA_VERSION}`);
    }
  }

  private loadColumns(): void {
    for (const table of REMOTE_TABLES) {
      const cols = this.driver.all<{ name: string }>(`PRAGMA table_info(${table})`);
      this.columns.set(table, new Set(cols.map(c => c.name)));
    }
  }

  get schemaVersion(): number {
    return this.driver.get<{ user_version: number }>('PRAGMA user_version')?.user_version ?? 0;
  }

  // ==================== RemoteTableClient ====================

  async select(table: RemoteTable, userId: string): Promise<RawRow[]> {
    const rows = this.driver.all<RawRow>(`SELECT * FROM ${table} WHERE user_id = ? ORDER BY rowid`, [userId]);
    return rows.map(row => this.decodeRow(table, row));
  }

  async insert<T extends RemoteTable>(table: T, row: RemoteRowMap[T]): Promise<void> {
    const entries = this.encodeEntries(table, row);
    const columns = entries.map(([column]) => column);

    this.driver.run(
      `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`,
      entries.map(([, value]) => value)
    );
  }

  async upsert<T extends RemoteTable>(table: T, row: RemoteRowMap[T]): Promise<void> {
    const entries = this.encodeEntries(table, row);
    const columns = entries.map(([column]) => column);
    const updates = columns.filter(column => column !== 'id').map(column => `${column} = excluded.${column}`);

    this.driver.run(
      `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${columns.map(() => '?').join(', ')})
       ON CONFLICT(id) DO UPDATE SET ${updates.join(', ')}`,
      entries.map(([, value]) => value)
    );
  }

  async update<T extends RemoteTable>(table: T, id: string, patch: Partial<RemoteRowMap[T]>): Promise<void> {
    const entries = this.encodeEntries(table, patch).filter(([column]) => column !== 'id');
    if (entries.length === 0) return;

    const fields = entries.map(([column]) => `${column} = ?`);
    if (table === 'folders') {
      fields.push("updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')");
    }

    this.driver.run(
      `UPDATE ${table} SET ${fields.join(', ')} WHERE id = ?`,
      [...entries.map(([, value]) => value), id]
    );
  }

  async delete(table: RemoteTable, id: string): Promise<void> {
    this.driver.run(`DELETE FROM ${table} WHERE id = ?`, [id]);
  }

  // ==================== ImageStorage ====================

  async upload(bucket: string, path: string, data: Uint8Array, contentType: string): Promise<string> {
    this.driver.run(
      `INSERT INTO storage_objects (bucket, path, content, content_type, created_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(bucket, path) DO UPDATE SET content = excluded.content, content_type = excluded.content_type`,
      [bucket, path, Buffer.from(data), contentType, new Date().toISOString()]
    );
    return this.getPublicUrl(bucket, path);
  }

  /** Missing paths are ignored. */
  async remove(bucket: string, paths: string[]): Promise<void> {
    this.driver.transaction(() => {
      for (const path of paths) {
        this.driver.run('DELETE FROM storage_objects WHERE bucket = ? AND path = ?', [bucket, path]);
      }
    });
  }

  getPublicUrl(bucket: string, path: string): string {
    return `${this.storageBaseUrl}/${bucket}/${path}`;
  }

  getObject(bucket: string, path: string): StorageObjectRow | null {
    const row = this.driver.get<StorageObjectRow>(
      'SELECT * FROM storage_objects WHERE bucket = ? AND path = ?',
      [bucket, path]
    );
    return row ?? null;
  }

  listObjectPaths(bucket: string): string[] {
    return this.driver
      .all<{ path: string }>('SELECT path FROM storage_objects WHERE bucket = ? ORDER BY path', [bucket])
      .map(row => row.path);
  }

  close(): void {
    this.driver.close();
  }

  // ==================== Row encoding ====================

  private encodeEntries(table: RemoteTable, row: object): [string, unknown][] {
    const known = this.columns.get(table) ?? new Set<string>();
    const entries: [string, unknown][] = Object.entries(row);

    return entries
      .filter(([, value]) => value !== undefined)
      .map(([column, value]): [string, unknown] => {
        if (!known.has(column)) {
          throw new Error(`Unknown column "${column}" for table ${table}`);
        }
        if (JSON_COLUMNS[table].includes(column)) {
          return [column, value === null ? null : JSON.stringify(value)];
        }
        if (typeof value === 'boolean') {
          return [column, value ? 1 : 0];
        }
        return [column, value];
      });
  }

  private decodeRow(table: RemoteTable, row: RawRow): RawRow {
    const decoded: RawRow = { ...row };

    for (const column of BOOLEAN_COLUMNS[table]) {
      const value = decoded[column];
      if (typeof value === 'number') {
        decoded[column] = value === 1;
      }
    }

    for (const column of JSON_COLUMNS[table]) {
      const value = decoded[column];
      if (typeof value === 'string') {
        try {
          decoded[column] = JSON.parse(value);
        } catch {
          // Not JSON: hand the raw text to the caller's parser
        }
      }
    }

    return decoded;
  }
}
