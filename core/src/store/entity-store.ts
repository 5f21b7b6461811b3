import {
  Note,
  NoteFolder,
  DeletedNote,
  DeletedFolder,
  EntityCollection,
  EntityCollections,
} from '../types';

export type StoreListener = (collections: Readonly<EntityCollections>, changed: EntityCollection[]) => void;

function upsertById<T extends { id: string }>(items: readonly T[], item: T): T[] {
  const index = items.findIndex(existing => existing.id === item.id);
  if (index === -1) {
    return [...items, item];
  }
  const next = items.slice();
  next[index] = item;
  return next;
}

function withoutId<T extends { id: string }>(items: readonly T[], id: string): T[] {
  return items.filter(item => item.id !== id);
}

/**
 * EntityStore - Owns the active and trashed collections of notes and folders
 *
 * Every mutation swaps in new arrays before subscribers are notified, so a
 * snapshot taken through the getters is never modified afterwards and a move
 * between an active and a deleted collection is observed as a single change.
 */
export class EntityStore {
  private state: EntityCollections;
  private listeners = new Set<StoreListener>();

  constructor(initial: Partial<EntityCollections> = {}) {
    this.state = {
      notes: [...(initial.notes ?? [])],
      folders: [...(initial.folders ?? [])],
      deletedNotes: [...(initial.deletedNotes ?? [])],
      deletedFolders: [...(initial.deletedFolders ?? [])],
    };
  }

  get notes(): readonly Note[] {
    return this.state.notes;
  }

  get folders(): readonly NoteFolder[] {
    return this.state.folders;
  }

  get deletedNotes(): readonly DeletedNote[] {
    return this.state.deletedNotes;
  }

  get deletedFolders(): readonly DeletedFolder[] {
    return this.state.deletedFolders;
  }

  snapshot(): Readonly<EntityCollections> {
    return { ...this.state };
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getNote(id: string): Note | undefined {
    return this.state.notes.find(note => note.id === id);
  }

  getFolder(id: string): NoteFolder | undefined {
    return this.state.folders.find(folder => folder.id === id);
  }

  getDeletedNote(id: string): DeletedNote | undefined {
    return this.state.deletedNotes.find(note => note.id === id);
  }

  getDeletedFolder(id: string): DeletedFolder | undefined {
    return this.state.deletedFolders.find(folder => folder.id === id);
  }

  // ==================== Active collections ====================

  addNote(note: Note): void {
    this.commit({ notes: upsertById(this.state.notes, note) });
  }

  /** Replaces an existing note. Returns false when the id is not active. */
  replaceNote(note: Note): boolean {
    if (!this.getNote(note.id)) return false;
    this.commit({ notes: upsertById(this.state.notes, note) });
    return true;
  }

  addFolder(folder: NoteFolder): void {
    this.commit({ folders: upsertById(this.state.folders, folder) });
  }

  replaceFolder(folder: NoteFolder): boolean {
    if (!this.getFolder(folder.id)) return false;
    this.commit({ folders: upsertById(this.state.folders, folder) });
    return true;
  }

  replaceAll<K extends EntityCollection>(collection: K, items: EntityCollections[K]): void {
    const patch: Partial<EntityCollections> = {};
    patch[collection] = items;
    this.commit(patch);
  }

  // ==================== Trash moves ====================

  moveNoteToTrash(deletedNote: DeletedNote): void {
    this.commit({
      notes: withoutId(this.state.notes, deletedNote.id),
      deletedNotes: upsertById(this.state.deletedNotes, deletedNote),
    });
  }

  moveNoteFromTrash(note: Note): void {
    this.commit({
      deletedNotes: withoutId(this.state.deletedNotes, note.id),
      notes: upsertById(this.state.notes, note),
    });
  }

  moveFolderToTrash(deletedFolder: DeletedFolder): void {
    this.commit({
      folders: withoutId(this.state.folders, deletedFolder.id),
      deletedFolders: upsertById(this.state.deletedFolders, deletedFolder),
    });
  }

  moveFolderFromTrash(folder: NoteFolder): void {
    this.commit({
      deletedFolders: withoutId(this.state.deletedFolders, folder.id),
      folders: upsertById(this.state.folders, folder),
    });
  }

  /** Applies several trash moves as one change. */
  moveManyToTrash(deletedNotes: readonly DeletedNote[], deletedFolders: readonly DeletedFolder[]): void {
    const noteIds = new Set(deletedNotes.map(note => note.id));
    const folderIds = new Set(deletedFolders.map(folder => folder.id));

    let trashedNotes = this.state.deletedNotes;
    for (const note of deletedNotes) trashedNotes = upsertById(trashedNotes, note);
    let trashedFolders = this.state.deletedFolders;
    for (const folder of deletedFolders) trashedFolders = upsertById(trashedFolders, folder);

    this.commit({
      notes: this.state.notes.filter(note => !noteIds.has(note.id)),
      folders: this.state.folders.filter(folder => !folderIds.has(folder.id)),
      deletedNotes: trashedNotes,
      deletedFolders: trashedFolders,
    });
  }

  removeDeletedNote(id: string): boolean {
    if (!this.getDeletedNote(id)) return false;
    this.commit({ deletedNotes: withoutId(this.state.deletedNotes, id) });
    return true;
  }

  removeDeletedFolder(id: string): boolean {
    if (!this.getDeletedFolder(id)) return false;
    this.commit({ deletedFolders: withoutId(this.state.deletedFolders, id) });
    return true;
  }

  private commit(patch: Partial<EntityCollections>): void {
    this.state = { ...this.state, ...patch };
    const changed = Object.keys(patch).filter(
      (key): key is EntityCollection => key in this.state
    );
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      listener(snapshot, changed);
    }
  }
}
