import {
  EntityStore,
  NotesConfig,
  NotesManager,
  SyncFailure,
  SyncQueue,
  resolveNotesConfig,
} from '@pocketdesk/core';
import { SQLiteDriver } from './driver';
import { BetterSqlite3Driver } from './drivers/better-sqlite3';
import { RemoteDatabase, RemoteDatabaseOptions } from './database';
import { RemoteSync, SessionProvider } from './sync/remote-sync';

export interface NotesWorkspaceOptions {
  session: SessionProvider;
  /** Defaults to an in-memory better-sqlite3 database. */
  driver?: SQLiteDriver;
  database?: RemoteDatabaseOptions;
  config?: Partial<NotesConfig>;
  now?: () => Date;
  onSyncError?: (failure: SyncFailure) => void;
}

export interface NotesWorkspace {
  config: NotesConfig;
  database: RemoteDatabase;
  store: EntityStore;
  queue: SyncQueue;
  remote: RemoteSync;
  manager: NotesManager;
  /** Waits for queued remote work, then closes the database. */
  close(): Promise<void>;
}

/**
 * Wires one store, one sync queue and one remote mirror together. Each
 * workspace owns its own instances; nothing is shared between workspaces.
 */
export function createNotesWorkspace(options: NotesWorkspaceOptions): NotesWorkspace {
  const config = resolveNotesConfig(options.config);
  const database = new RemoteDatabase(options.driver ?? BetterSqlite3Driver.open(), options.database);
  const store = new EntityStore();
  const queue = new SyncQueue({ onError: options.onSyncError });

  const remote = new RemoteSync({
    client: database,
    storage: database,
    session: options.session,
    store,
    config,
    now: options.now,
  });

  const manager = new NotesManager({ store, remote, queue, config, now: options.now });

  return {
    config,
    database,
    store,
    queue,
    remote,
    manager,
    async close() {
      await queue.shutdown();
      database.close();
    },
  };
}
