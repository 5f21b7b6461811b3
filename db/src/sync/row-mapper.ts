import {
  Note,
  NoteFolder,
  DeletedNote,
  DeletedFolder,
  isUuid,
  parseIsoTimestamp,
  formatIsoTimestamp,
} from '@pocketdesk/core';
import { NoteRow, DeletedNoteRow, FolderRow, DeletedFolderRow, RawRow } from '../row-types';

// ==================== Field readers ====================

function readString(row: RawRow, key: string): string | null {
  const value = row[key];
  return typeof value === 'string' ? value : null;
}

function readBoolean(row: RawRow, key: string): boolean {
  const value = row[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return false;
}

function readTimestamp(row: RawRow, key: string): Date | null {
  const value = readString(row, key);
  return value === null ? null : parseIsoTimestamp(value);
}

/** A reference column: null when absent or not a UUID. */
function readReference(row: RawRow, key: string): string | null {
  const value = row[key];
  return isUuid(value) ? value : null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Reads `image_attachments` in its current array form, then in the legacy
 * form of a JSON-encoded string holding the array. Null when neither parses.
 */
export function parseImageAttachments(value: unknown): string[] | null {
  if (isStringArray(value)) {
    return [...value];
  }

  if (typeof value === 'string') {
    try {
      const decoded: unknown = JSON.parse(value);
      return isStringArray(decoded) ? decoded : null;
    } catch {
      return null;
    }
  }

  return null;
}

// ==================== Row → entity ====================

export function parseNoteRow(row: RawRow): Note | null {
  const id = row.id;
  const title = readString(row, 'title');
  const dateCreated = readTimestamp(row, 'date_created');
  const dateModified = readTimestamp(row, 'date_modified');

  if (!isUuid(id) || title === null || !dateCreated || !dateModified) {
    return null;
  }

  return {
    id,
    title,
    content: readString(row, 'content') ?? '',
    dateCreated,
    dateModified,
    isPinned: readBoolean(row, 'is_pinned'),
    folderId: readReference(row, 'folder_id'),
    isLocked: readBoolean(row, 'is_locked'),
    imageUrls: parseImageAttachments(row.image_attachments) ?? [],
  };
}

export function parseFolderRow(row: RawRow): NoteFolder | null {
  const id = row.id;
  const name = readString(row, 'name');
  const color = readString(row, 'color');

  if (!isUuid(id) || name === null || color === null) {
    return null;
  }

  return {
    id,
    name,
    color,
    parentFolderId: readReference(row, 'parent_folder_id'),
  };
}

/** Rows written before the trash kept lock state and images parse to `false` and `[]`. */
export function parseDeletedNoteRow(row: RawRow): DeletedNote | null {
  const id = row.id;
  const title = readString(row, 'title');
  const dateCreated = readTimestamp(row, 'created_at');
  const dateModified = readTimestamp(row, 'updated_at');
  const deletedAt = readTimestamp(row, 'deleted_at');

  if (!isUuid(id) || title === null || !dateCreated || !dateModified || !deletedAt) {
    return null;
  }

  return {
    id,
    title,
    content: readString(row, 'content') ?? '',
    dateCreated,
    dateModified,
    isPinned: readBoolean(row, 'is_pinned'),
    folderId: readReference(row, 'folder_id'),
    isLocked: readBoolean(row, 'is_locked'),
    imageUrls: parseImageAttachments(row.image_attachments) ?? [],
    deletedAt,
  };
}

export function parseDeletedFolderRow(row: RawRow): DeletedFolder | null {
  const folder = parseFolderRow(row);
  const dateCreated = readTimestamp(row, 'created_at');
  const dateModified = readTimestamp(row, 'updated_at');
  const deletedAt = readTimestamp(row, 'deleted_at');

  if (!folder || !dateCreated || !dateModified || !deletedAt) {
    return null;
  }

  return { ...folder, dateCreated, dateModified, deletedAt };
}

// ==================== Entity → row ====================

export function toNoteRow(note: Note, userId: string): NoteRow {
  return {
    id: note.id,
    user_id: userId,
    title: note.title,
    content: note.content,
    is_locked: note.isLocked,
    date_created: formatIsoTimestamp(note.dateCreated),
    date_modified: formatIsoTimestamp(note.dateModified),
    is_pinned: note.isPinned,
    folder_id: note.folderId,
    image_attachments: note.imageUrls,
  };
}

/** Columns an edit can change; identity and creation date stay as stored. */
export function toNoteUpdate(note: Note): Partial<NoteRow> {
  return {
    title: note.title,
    content: note.content,
    is_locked: note.isLocked,
    date_modified: formatIsoTimestamp(note.dateModified),
    is_pinned: note.isPinned,
    folder_id: note.folderId,
    image_attachments: note.imageUrls,
  };
}

export function toFolderRow(folder: NoteFolder, userId: string): FolderRow {
  return {
    id: folder.id,
    user_id: userId,
    name: folder.name,
    color: folder.color,
    parent_folder_id: folder.parentFolderId,
  };
}

export function toFolderUpdate(folder: NoteFolder): Partial<FolderRow> {
  return {
    name: folder.name,
    color: folder.color,
    parent_folder_id: folder.parentFolderId,
  };
}

export function toDeletedNoteRow(deletedNote: DeletedNote, userId: string): DeletedNoteRow {
  return {
    id: deletedNote.id,
    user_id: userId,
    title: deletedNote.title,
    content: deletedNote.content,
    folder_id: deletedNote.folderId,
    is_pinned: deletedNote.isPinned,
    created_at: formatIsoTimestamp(deletedNote.dateCreated),
    updated_at: formatIsoTimestamp(deletedNote.dateModified),
    deleted_at: formatIsoTimestamp(deletedNote.deletedAt),
    is_locked: deletedNote.isLocked,
    image_attachments: deletedNote.imageUrls,
  };
}

export function toDeletedFolderRow(deletedFolder: DeletedFolder, userId: string): DeletedFolderRow {
  return {
    id: deletedFolder.id,
    user_id: userId,
    name: deletedFolder.name,
    color: deletedFolder.color,
    parent_folder_id: deletedFolder.parentFolderId,
    created_at: formatIsoTimestamp(deletedFolder.dateCreated),
    updated_at: formatIsoTimestamp(deletedFolder.dateModified),
    deleted_at: formatIsoTimestamp(deletedFolder.deletedAt),
  };
}
