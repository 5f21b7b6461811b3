import { Note, NoteFolder, DeletedNote, DeletedFolder } from '../types';
import { EntityStore } from '../store/entity-store';
import { DEFAULT_NOTES_CONFIG } from '../config';
import { MS_PER_DAY, wholeDaysBetween } from '../utils';

export function toDeletedNote(note: Note, deletedAt: Date): DeletedNote {
  return {
    id: note.id,
    title: note.title,
    content: note.content,
    dateCreated: note.dateCreated,
    dateModified: note.dateModified,
    isPinned: note.isPinned,
    folderId: note.folderId,
    isLocked: note.isLocked,
    imageUrls: [...note.imageUrls],
    deletedAt,
  };
}

export function fromDeletedNote(deletedNote: DeletedNote): Note {
  return {
    id: deletedNote.id,
    title: deletedNote.title,
    content: deletedNote.content,
    dateCreated: deletedNote.dateCreated,
    dateModified: deletedNote.dateModified,
    isPinned: deletedNote.isPinned,
    folderId: deletedNote.folderId,
    isLocked: deletedNote.isLocked,
    imageUrls: [...deletedNote.imageUrls],
  };
}

/**
 * Folders carry no timestamps while active, so the trash copy is stamped with
 * the deletion time for all three.
 */
export function toDeletedFolder(folder: NoteFolder, deletedAt: Date): DeletedFolder {
  return {
    id: folder.id,
    name: folder.name,
    color: folder.color,
    parentFolderId: folder.parentFolderId,
    dateCreated: deletedAt,
    dateModified: deletedAt,
    deletedAt,
  };
}

export function fromDeletedFolder(deletedFolder: DeletedFolder): NoteFolder {
  return {
    id: deletedFolder.id,
    name: deletedFolder.name,
    color: deletedFolder.color,
    parentFolderId: deletedFolder.parentFolderId,
  };
}

export function daysUntilPermanentDeletion(
  deletedAt: Date,
  now: Date = new Date(),
  retentionDays: number = DEFAULT_NOTES_CONFIG.retentionDays
): number {
  return Math.max(0, retentionDays - wholeDaysBetween(deletedAt, now));
}

/** Strictly older than the retention window. */
export function isExpired(
  deletedAt: Date,
  now: Date = new Date(),
  retentionDays: number = DEFAULT_NOTES_CONFIG.retentionDays
): boolean {
  return deletedAt.getTime() < now.getTime() - retentionDays * MS_PER_DAY;
}

/**
 * TrashLifecycle - Moves notes and folders between their active and deleted collections
 *
 * All operations are synchronous against the store. Remote mirroring is the
 * caller's concern.
 */
export class TrashLifecycle {
  private store: EntityStore;
  private now: () => Date;

  constructor(store: EntityStore, now: () => Date = () => new Date()) {
    this.store = store;
    this.now = now;
  }

  softDeleteNote(note: Note): DeletedNote {
    const deletedNote = toDeletedNote(note, this.now());
    this.store.moveNoteToTrash(deletedNote);
    return deletedNote;
  }

  softDeleteFolder(folder: NoteFolder): DeletedFolder {
    const deletedFolder = toDeletedFolder(folder, this.now());
    this.store.moveFolderToTrash(deletedFolder);
    return deletedFolder;
  }

  /** Trashes notes and folders together with one deletion timestamp. */
  softDeleteMany(notes: readonly Note[], folders: readonly NoteFolder[]): { deletedNotes: DeletedNote[]; deletedFolders: DeletedFolder[] } {
    const deletedAt = this.now();
    const deletedNotes = notes.map(note => toDeletedNote(note, deletedAt));
    const deletedFolders = folders.map(folder => toDeletedFolder(folder, deletedAt));
    this.store.moveManyToTrash(deletedNotes, deletedFolders);
    return { deletedNotes, deletedFolders };
  }

  restoreNote(deletedNote: DeletedNote): Note {
    const note = fromDeletedNote(deletedNote);
    this.store.moveNoteFromTrash(note);
    return note;
  }

  restoreFolder(deletedFolder: DeletedFolder): NoteFolder {
    const folder = fromDeletedFolder(deletedFolder);
    this.store.moveFolderFromTrash(folder);
    return folder;
  }

  /** Returns false when the note was already purged. */
  purgeNote(deletedNote: DeletedNote): boolean {
    return this.store.removeDeletedNote(deletedNote.id);
  }

  purgeFolder(deletedFolder: DeletedFolder): boolean {
    return this.store.removeDeletedFolder(deletedFolder.id);
  }
}
