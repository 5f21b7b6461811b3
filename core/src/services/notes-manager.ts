import {
  Note,
  NoteFolder,
  DeletedNote,
  DeletedFolder,
  RemoteMirror,
  SyncResult,
} from '../types';
import { EntityStore } from '../store/entity-store';
import { SyncQueue } from './sync-queue';
import { NotesConfig, DEFAULT_NOTES_CONFIG } from '../config';
import { TrashLifecycle } from '../engines/trash-lifecycle-engine';
import { RetentionSweeper, SweepResult } from '../engines/retention-engine';
import {
  assertValidParent,
  collectCascade,
  collectDescendantIds,
  getFolderDepth,
  sortFoldersByHierarchy,
} from '../engines/folder-hierarchy-engine';
import { generateId } from '../utils';

export interface NotesManagerDependencies {
  store: EntityStore;
  remote: RemoteMirror;
  queue: SyncQueue;
  config?: NotesConfig;
  now?: () => Date;
}

export interface NewNoteInput {
  title: string;
  content?: string;
  folderId?: string | null;
}

export interface NewFolderInput {
  name: string;
  color?: string;
  parentFolderId?: string | null;
}

function byDateModifiedDesc(a: Note, b: Note): number {
  return b.dateModified.getTime() - a.dateModified.getTime();
}

/**
 * NotesManager - Entry point for every note and folder mutation
 *
 * Features:
 * - Applies each change to the EntityStore synchronously
 * - Mirrors the change remotely through the SyncQueue, in mutation order
 * - Cascading folder deletion into the trash
 * - Restores bring back trashed parent folders first so the hierarchy stays intact
 * - Retention sweep of trash older than the configured window
 *
 * Note: remote results never roll back local state. A failed push is
 * reconciled by the next pull.
 */
export class NotesManager {
  private store: EntityStore;
  private remote: RemoteMirror;
  private queue: SyncQueue;
  private config: NotesConfig;
  private now: () => Date;
  private lifecycle: TrashLifecycle;

  constructor(deps: NotesManagerDependencies) {
    this.store = deps.store;
    this.remote = deps.remote;
    this.queue = deps.queue;
    this.config = deps.config ?? DEFAULT_NOTES_CONFIG;
    this.now = deps.now ?? (() => new Date());
    this.lifecycle = new TrashLifecycle(this.store, this.now);
  }

  // ==================== Queries ====================

  get notes(): readonly Note[] {
    return this.store.notes;
  }

  get folders(): readonly NoteFolder[] {
    return this.store.folders;
  }

  get deletedNotes(): readonly DeletedNote[] {
    return this.store.deletedNotes;
  }

  get deletedFolders(): readonly DeletedFolder[] {
    return this.store.deletedFolders;
  }

  get pinnedNotes(): Note[] {
    return this.store.notes.filter(note => note.isPinned).sort(byDateModifiedDesc);
  }

  get recentNotes(): Note[] {
    return this.store.notes.filter(note => !note.isPinned).sort(byDateModifiedDesc);
  }

  searchNotes(query: string): Note[] {
    const needle = query.trim().toLowerCase();
    const matches = needle.length === 0
      ? [...this.store.notes]
      : this.store.notes.filter(note =>
          note.title.toLowerCase().includes(needle) || note.content.toLowerCase().includes(needle)
        );
    return matches.sort(byDateModifiedDesc);
  }

  notesInFolder(folderId: string, includeSubfolders: boolean = false): Note[] {
    const folderIds = includeSubfolders
      ? collectDescendantIds(folderId, this.store.folders)
      : new Set([folderId]);
    return this.store.notes.filter(note => note.folderId !== null && folderIds.has(note.folderId));
  }

  getFolderName(folderId: string | null): string {
    if (folderId === null) return 'No Folder';
    return this.store.getFolder(folderId)?.name ?? 'No Folder';
  }

  getFolderDepth(folder: NoteFolder): number {
    return getFolderDepth(folder, this.store.folders, this.config.maxFolderDepth);
  }

  // ==================== Notes ====================

  createNote(input: NewNoteInput): Note {
    const timestamp = this.now();
    const note: Note = {
      id: generateId(),
      title: input.title,
      content: input.content ?? '',
      dateCreated: timestamp,
      dateModified: timestamp,
      isPinned: false,
      folderId: input.folderId ?? null,
      isLocked: false,
      imageUrls: [],
    };
    this.addNote(note);
    return note;
  }

  addNote(note: Note): void {
    this.store.addNote(note);
    this.mirror(`create note ${note.id}`, () => this.remote.createNote(note));
  }

  /** Saves edits and refreshes dateModified. Returns null for a note that is not active. */
  updateNote(note: Note): Note | null {
    if (!this.store.getNote(note.id)) return null;

    const updated: Note = { ...note, dateModified: this.now() };
    this.store.replaceNote(updated);
    this.mirror(`update note ${note.id}`, () => this.remote.updateNote(updated));
    return updated;
  }

  togglePinStatus(noteId: string): Note | null {
    const note = this.store.getNote(noteId);
    if (!note) return null;
    return this.updateNote({ ...note, isPinned: !note.isPinned });
  }

  deleteNote(note: Note): DeletedNote | null {
    if (!this.store.getNote(note.id)) return null;

    const deletedNote = this.lifecycle.softDeleteNote(note);
    this.mirror(`trash note ${note.id}`, () => this.remote.moveNoteToTrash(deletedNote));
    return deletedNote;
  }

  restoreNote(deletedNote: DeletedNote): Note | null {
    if (!this.store.getDeletedNote(deletedNote.id)) return null;

    // The folder link survives even when the folder is not known locally
    this.restoreTrashedAncestors(deletedNote.folderId);
    const note = this.lifecycle.restoreNote(deletedNote);
    this.mirror(`restore note ${note.id}`, () => this.remote.restoreNote(note));
    return note;
  }

  /** Removes a note from the trash for good. Purging an id twice is a no-op. */
  permanentlyDeleteNote(deletedNote: DeletedNote): boolean {
    if (!this.lifecycle.purgeNote(deletedNote)) return false;
    this.mirror(`purge note ${deletedNote.id}`, () => this.remote.purgeNote(deletedNote));
    return true;
  }

  // ==================== Folders ====================

  createFolder(input: NewFolderInput): NoteFolder {
    const folder: NoteFolder = {
      id: generateId(),
      name: input.name,
      color: input.color ?? this.config.defaultFolderColor,
      parentFolderId: input.parentFolderId ?? null,
    };
    this.addFolder(folder);
    return folder;
  }

  /** Throws FolderHierarchyError when the parent is unknown or would form a cycle. */
  addFolder(folder: NoteFolder): void {
    assertValidParent(folder, this.store.folders);
    this.store.addFolder(folder);
    this.mirror(`create folder ${folder.id}`, () => this.remote.createFolder(folder));
  }

  updateFolder(folder: NoteFolder): NoteFolder | null {
    if (!this.store.getFolder(folder.id)) return null;

    assertValidParent(folder, this.store.folders);
    this.store.replaceFolder(folder);
    this.mirror(`update folder ${folder.id}`, () => this.remote.updateFolder(folder));
    return folder;
  }

  /**
   * Moves a folder, all of its subfolders and every note inside them to the trash.
   */
  deleteFolder(folder: NoteFolder): { deletedNotes: DeletedNote[]; deletedFolders: DeletedFolder[] } {
    const cascade = collectCascade(folder, {
      getFolders: () => this.store.folders,
      getNotes: () => this.store.notes,
    });
    const result = this.lifecycle.softDeleteMany(cascade.notes, cascade.folders);

    for (const deletedNote of result.deletedNotes) {
      this.mirror(`trash note ${deletedNote.id}`, () => this.remote.moveNoteToTrash(deletedNote));
    }

    // Children leave the remote folders table before their parents
    const childrenFirst = sortFoldersByHierarchy(result.deletedFolders).reverse();
    for (const deletedFolder of childrenFirst) {
      this.mirror(`trash folder ${deletedFolder.id}`, () => this.remote.moveFolderToTrash(deletedFolder));
    }

    return result;
  }

  restoreFolder(deletedFolder: DeletedFolder): NoteFolder | null {
    if (!this.store.getDeletedFolder(deletedFolder.id)) return null;

    this.restoreTrashedAncestors(deletedFolder.parentFolderId);
    // Folders reference their parent by foreign key, so an unknown parent files the folder at the root
    const parentFolderId = deletedFolder.parentFolderId !== null && this.store.getFolder(deletedFolder.parentFolderId)
      ? deletedFolder.parentFolderId
      : null;
    const folder = this.lifecycle.restoreFolder({ ...deletedFolder, parentFolderId });
    this.mirror(`restore folder ${folder.id}`, () => this.remote.restoreFolder(folder));
    return folder;
  }

  permanentlyDeleteFolder(deletedFolder: DeletedFolder): boolean {
    if (!this.lifecycle.purgeFolder(deletedFolder)) return false;
    this.mirror(`purge folder ${deletedFolder.id}`, () => this.remote.purgeFolder(deletedFolder));
    return true;
  }

  emptyTrash(): { purgedNotes: number; purgedFolders: number } {
    const notes = this.store.deletedNotes;
    const folders = sortFoldersByHierarchy(this.store.deletedFolders).reverse();
    let purgedNotes = 0;
    let purgedFolders = 0;

    for (const note of notes) {
      if (this.permanentlyDeleteNote(note)) purgedNotes++;
    }
    for (const folder of folders) {
      if (this.permanentlyDeleteFolder(folder)) purgedFolders++;
    }

    return { purgedNotes, purgedFolders };
  }

  /** The folder named like the receipts folder, created at the root when missing. */
  getOrCreateReceiptsFolder(): string {
    const existing = this.store.folders.find(folder => folder.name === this.config.receiptsFolderName);
    if (existing) return existing.id;

    return this.createFolder({
      name: this.config.receiptsFolderName,
      color: this.config.receiptsFolderColor,
    }).id;
  }

  // ==================== Retention ====================

  cleanupOldDeletedItems(now: Date = this.now()): SweepResult {
    const sweeper = new RetentionSweeper({
      getDeletedNotes: () => this.store.deletedNotes,
      getDeletedFolders: () => this.store.deletedFolders,
      purgeNote: deletedNote => {
        this.permanentlyDeleteNote(deletedNote);
      },
      purgeFolder: deletedFolder => {
        this.permanentlyDeleteFolder(deletedFolder);
      },
    }, this.config.retentionDays);

    return sweeper.sweep(now);
  }

  // ==================== Internals ====================

  /**
   * Restores, root first, every trashed folder on the path from `folderId` up
   * to the first active ancestor.
   */
  private restoreTrashedAncestors(folderId: string | null): void {
    if (folderId === null) return;

    const chain: DeletedFolder[] = [];
    const visited = new Set<string>();
    let currentId: string | null = folderId;

    while (currentId !== null && !visited.has(currentId) && !this.store.getFolder(currentId)) {
      visited.add(currentId);
      const trashed = this.store.getDeletedFolder(currentId);
      if (!trashed) break;
      chain.unshift(trashed);
      currentId = trashed.parentFolderId;
    }

    for (const deletedFolder of chain) {
      const parentFolderId = deletedFolder.parentFolderId !== null && this.store.getFolder(deletedFolder.parentFolderId)
        ? deletedFolder.parentFolderId
        : null;
      const folder = this.lifecycle.restoreFolder({ ...deletedFolder, parentFolderId });
      this.mirror(`restore folder ${folder.id}`, () => this.remote.restoreFolder(folder));
    }
  }

  // A failed push surfaces as a queue failure; local state stays as it is
  private mirror(label: string, push: () => Promise<SyncResult>): void {
    this.queue.enqueue(label, async () => {
      const result = await push();
      if (!result.ok) {
        throw new Error(result.error);
      }
    });
  }
}
