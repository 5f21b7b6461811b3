// Database
export { SQLiteDriver, RunResult } from './driver';
export { BetterSqlite3Driver } from './drivers/better-sqlite3';
export {
  RemoteDatabase,
  RemoteDatabaseOptions,
  CURRENT_SCHEMA_VERSION,
  DEFAULT_STORAGE_BASE_URL,
} from './database';
export { RemoteTableClient, ImageStorage } from './client';
export * from './row-types';

// Sync
export {
  parseImageAttachments,
  parseNoteRow,
  parseFolderRow,
  parseDeletedNoteRow,
  parseDeletedFolderRow,
  toNoteRow,
  toNoteUpdate,
  toFolderRow,
  toFolderUpdate,
  toDeletedNoteRow,
  toDeletedFolderRow,
} from './sync/row-mapper';
export {
  RemoteSync,
  RemoteSyncDependencies,
  SessionProvider,
  PullResult,
  LoginSyncResult,
  NoteImage,
  ImageUploadResult,
  NOT_AUTHENTICATED,
} from './sync/remote-sync';

// Composition
export { createNotesWorkspace, NotesWorkspace, NotesWorkspaceOptions } from './workspace';
