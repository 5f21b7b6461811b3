// Row shapes of the remote tables, as sent to and received from the client.
// Timestamps are ISO-8601 strings, ids are UUID text. Declared as type aliases
// so a typed row is also a RawRow.

export type RemoteTable = 'notes' | 'deleted_notes' | 'folders' | 'deleted_folders';

export type NoteRow = {
  id: string;
  user_id: string;
  title: string;
  content: string;
  is_locked: boolean;
  date_created: string;
  date_modified: string;
  is_pinned: boolean;
  folder_id: string | null;
  // Array of image URLs; rows written by older clients hold a JSON-encoded string
  image_attachments: string[] | string | null;
};

export type DeletedNoteRow = {
  id: string;
  user_id: string;
  title: string;
  content: string;
  folder_id: string | null;
  is_pinned: boolean;
  created_at: string;
  updated_at: string;
  deleted_at: string;
  // Added after the first release; absent on older rows
  is_locked?: boolean | null;
  image_attachments?: string[] | string | null;
};

export type FolderRow = {
  id: string;
  user_id: string;
  name: string;
  color: string;
  parent_folder_id: string | null;
};

export type DeletedFolderRow = {
  id: string;
  user_id: string;
  name: string;
  color: string;
  parent_folder_id: string | null;
  created_at: string;
  updated_at: string;
  deleted_at: string;
};

export interface RemoteRowMap {
  notes: NoteRow;
  deleted_notes: DeletedNoteRow;
  folders: FolderRow;
  deleted_folders: DeletedFolderRow;
}

/** A row as it comes back from the remote side, before validation. */
export type RawRow = Record<string, unknown>;

export interface StorageObjectRow {
  bucket: string;
  path: string;
  content: Buffer;
  content_type: string;
  created_at: string;
}
