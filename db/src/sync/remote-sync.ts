import {
  Note,
  NoteFolder,
  DeletedNote,
  DeletedFolder,
  EntityCollection,
  EntityStore,
  NotesConfig,
  DEFAULT_NOTES_CONFIG,
  RemoteMirror,
  SyncResult,
  sortFoldersByHierarchy,
} from '@pocketdesk/core';
import { RemoteTableClient, ImageStorage } from '../client';
import { RemoteTable, RawRow } from '../row-types';
import {
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
} from './row-mapper';

export const NOT_AUTHENTICATED = 'not authenticated';

export interface SessionProvider {
  getCurrentUserId(): string | null;
}

export interface RemoteSyncDependencies {
  client: RemoteTableClient;
  storage: ImageStorage;
  session: SessionProvider;
  store: EntityStore;
  config?: NotesConfig;
  now?: () => Date;
}

export interface PullResult {
  collection: EntityCollection;
  fetched: number;
  parsed: number;
  replaced: boolean;
  error?: string;
}

export interface LoginSyncResult {
  folders: PullResult;
  uploadedFolders: number;
  notes: PullResult;
  deleted: PullResult[];
}

export interface NoteImage {
  data: Uint8Array;
  contentType?: string;
}

export interface ImageUploadResult {
  urls: string[];
  errors: string[];
}

const IMAGE_EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/heic': 'heic',
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function fileNameFromUrl(url: string): string | null {
  const segment = url.split('/').pop();
  return segment ? segment : null;
}

/**
 * RemoteSync - Mirrors local note and folder changes to the remote tables
 *
 * Features:
 * - Push operations for every mutation, each returning a SyncResult
 * - Pulls that replace a local collection only when the remote side returned
 *   at least one parseable row
 * - Purges remove the note's images from object storage as well
 * - Sequential image uploads with per-image error collection
 *
 * Note: without a signed-in user every operation is skipped with a warning.
 * Failures are logged and reported, never thrown.
 */
export class RemoteSync implements RemoteMirror {
  private client: RemoteTableClient;
  private storage: ImageStorage;
  private session: SessionProvider;
  private store: EntityStore;
  private config: NotesConfig;
  private now: () => Date;
  private inFlightPurges = new Map<string, Promise<SyncResult>>();

  constructor(deps: RemoteSyncDependencies) {
    this.client = deps.client;
    this.storage = deps.storage;
    this.session = deps.session;
    this.store = deps.store;
    this.config = deps.config ?? DEFAULT_NOTES_CONFIG;
    this.now = deps.now ?? (() => new Date());
  }

  // ==================== Notes ====================

  createNote(note: Note): Promise<SyncResult> {
    return this.run(`create note ${note.id}`, userId => this.client.insert('notes', toNoteRow(note, userId)));
  }

  updateNote(note: Note): Promise<SyncResult> {
    return this.run(`update note ${note.id}`, () => this.client.update('notes', note.id, toNoteUpdate(note)));
  }

  moveNoteToTrash(deletedNote: DeletedNote): Promise<SyncResult> {
    return this.run(`trash note ${deletedNote.id}`, async userId => {
      await this.client.upsert('deleted_notes', toDeletedNoteRow(deletedNote, userId));
      await this.client.delete('notes', deletedNote.id);
    });
  }

  restoreNote(note: Note): Promise<SyncResult> {
    return this.run(`restore note ${note.id}`, async userId => {
      await this.client.upsert('notes', toNoteRow(note, userId));
      await this.client.delete('deleted_notes', note.id);
    });
  }

  /** Deletes the trashed row and then each image; a failed image removal is only logged. */
  purgeNote(deletedNote: DeletedNote): Promise<SyncResult> {
    return this.coalescePurge(`note:${deletedNote.id}`, () =>
      this.run(`purge note ${deletedNote.id}`, async userId => {
        await this.client.delete('deleted_notes', deletedNote.id);
        await this.removeImages(userId, deletedNote.imageUrls);
      })
    );
  }

  // ==================== Folders ====================

  createFolder(folder: NoteFolder): Promise<SyncResult> {
    return this.upsertFolder(folder);
  }

  upsertFolder(folder: NoteFolder): Promise<SyncResult> {
    return this.run(`save folder ${folder.id}`, userId => this.client.upsert('folders', toFolderRow(folder, userId)));
  }

  updateFolder(folder: NoteFolder): Promise<SyncResult> {
    return this.run(`update folder ${folder.id}`, () =>
      this.client.update('folders', folder.id, toFolderUpdate(folder))
    );
  }

  moveFolderToTrash(deletedFolder: DeletedFolder): Promise<SyncResult> {
    return this.run(`trash folder ${deletedFolder.id}`, async userId => {
      await this.client.upsert('deleted_folders', toDeletedFolderRow(deletedFolder, userId));
      await this.client.delete('folders', deletedFolder.id);
    });
  }

  restoreFolder(folder: NoteFolder): Promise<SyncResult> {
    return this.run(`restore folder ${folder.id}`, async userId => {
      await this.client.upsert('folders', toFolderRow(folder, userId));
      await this.client.delete('deleted_folders', folder.id);
    });
  }

  purgeFolder(deletedFolder: DeletedFolder): Promise<SyncResult> {
    return this.coalescePurge(`folder:${deletedFolder.id}`, () =>
      this.run(`purge folder ${deletedFolder.id}`, () => this.client.delete('deleted_folders', deletedFolder.id))
    );
  }

  // ==================== Pulls ====================

  async loadNotes(): Promise<PullResult> {
    const { result, items } = await this.fetchParsed('notes', 'notes', parseNoteRow);
    if (items) this.store.replaceAll('notes', items);
    return result;
  }

  async loadFolders(): Promise<PullResult> {
    const { result, items } = await this.fetchParsed('folders', 'folders', parseFolderRow);
    if (items) this.store.replaceAll('folders', items);
    return result;
  }

  async loadDeletedItems(): Promise<PullResult[]> {
    const notes = await this.fetchParsed('deletedNotes', 'deleted_notes', parseDeletedNoteRow);
    if (notes.items) this.store.replaceAll('deletedNotes', notes.items);

    const folders = await this.fetchParsed('deletedFolders', 'deleted_folders', parseDeletedFolderRow);
    if (folders.items) this.store.replaceAll('deletedFolders', folders.items);

    return [notes.result, folders.result];
  }

  /**
   * Pulls folders, pushes every local folder parents first so none is sent
   * before the folder it points to, then pulls notes and the trash.
   */
  async syncOnLogin(): Promise<LoginSyncResult> {
    const folders = await this.loadFolders();

    let uploadedFolders = 0;
    for (const folder of sortFoldersByHierarchy(this.store.folders)) {
      const result = await this.upsertFolder(folder);
      if (result.ok) uploadedFolders++;
    }

    const notes = await this.loadNotes();
    const deleted = await this.loadDeletedItems();

    console.log(`[RemoteSync] Login sync complete: ${uploadedFolders} folders uploaded`);
    return { folders, uploadedFolders, notes, deleted };
  }

  // ==================== Images ====================

  async uploadNoteImages(noteId: string, images: NoteImage[]): Promise<ImageUploadResult> {
    const userId = this.session.getCurrentUserId();
    if (!userId) {
      console.warn(`[RemoteSync] Skipping image upload for note ${noteId}: no authenticated user`);
      return { urls: [], errors: images.map(() => NOT_AUTHENTICATED) };
    }

    const stamp = Math.floor(this.now().getTime() / 1000);
    const urls: string[] = [];
    const errors: string[] = [];

    for (const [index, image] of images.entries()) {
      const contentType = image.contentType ?? 'image/jpeg';
      const fileName = `${noteId}_${stamp}_${index}.${IMAGE_EXTENSIONS[contentType] ?? 'jpg'}`;

      try {
        const url = await this.storage.upload(this.config.imageBucket, `${userId}/${fileName}`, image.data, contentType);
        urls.push(url);
      } catch (error) {
        const message = errorMessage(error);
        console.error(`[RemoteSync] Failed to upload image ${fileName}:`, message);
        errors.push(`${fileName}: ${message}`);
      }
    }

    return { urls, errors };
  }

  // ==================== Internals ====================

  private async run(label: string, action: (userId: string) => Promise<void>): Promise<SyncResult> {
    const userId = this.session.getCurrentUserId();
    if (!userId) {
      console.warn(`[RemoteSync] Skipping ${label}: no authenticated user`);
      return { ok: false, error: NOT_AUTHENTICATED };
    }

    try {
      await action(userId);
      return { ok: true };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[RemoteSync] Failed to ${label}:`, message);
      return { ok: false, error: message };
    }
  }

  // A second purge of an id still in flight gets the first one's result
  private coalescePurge(key: string, purge: () => Promise<SyncResult>): Promise<SyncResult> {
    const existing = this.inFlightPurges.get(key);
    if (existing) return existing;

    const pending = purge().finally(() => {
      this.inFlightPurges.delete(key);
    });
    this.inFlightPurges.set(key, pending);
    return pending;
  }

  private async removeImages(userId: string, imageUrls: string[]): Promise<void> {
    for (const url of imageUrls) {
      const fileName = fileNameFromUrl(url);
      if (!fileName) continue;

      try {
        await this.storage.remove(this.config.imageBucket, [`${userId}/${fileName}`]);
      } catch (error) {
        console.error(`[RemoteSync] Failed to delete image ${fileName}:`, errorMessage(error));
      }
    }
  }

  private async fetchParsed<T>(
    collection: EntityCollection,
    table: RemoteTable,
    parse: (row: RawRow) => T | null
  ): Promise<{ result: PullResult; items: T[] | null }> {
    const userId = this.session.getCurrentUserId();
    if (!userId) {
      console.warn(`[RemoteSync] Skipping load of ${table}: no authenticated user`);
      return { result: { collection, fetched: 0, parsed: 0, replaced: false, error: NOT_AUTHENTICATED }, items: null };
    }

    let rows: RawRow[];
    try {
      rows = await this.client.select(table, userId);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[RemoteSync] Failed to load ${table}:`, message);
      return { result: { collection, fetched: 0, parsed: 0, replaced: false, error: message }, items: null };
    }

    const items: T[] = [];
    for (const row of rows) {
      const item = parse(row);
      if (item !== null) items.push(item);
    }

    if (items.length < rows.length) {
      console.warn(`[RemoteSync] Skipped ${rows.length - items.length} unparseable ${table} rows`);
    }

    // An empty or wholly unreadable response never wipes local data
    if (items.length === 0) {
      console.warn(`[RemoteSync] No usable ${table} rows returned; keeping local ${collection}`);
      return { result: { collection, fetched: rows.length, parsed: 0, replaced: false }, items: null };
    }

    console.log(`[RemoteSync] Loaded ${items.length} ${table}`);
    return { result: { collection, fetched: rows.length, parsed: items.length, replaced: true }, items };
  }
}
