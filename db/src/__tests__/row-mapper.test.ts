import {
  parseDeletedFolderRow,
  parseDeletedNoteRow,
  parseFolderRow,
  parseImageAttachments,
  parseNoteRow,
  toDeletedFolderRow,
  toDeletedNoteRow,
  toFolderUpdate,
  toNoteRow,
  toNoteUpdate,
} from '../sync/row-mapper'
import { DeletedFolder, DeletedNote, Note } from '@pocketdesk/core'

const USER = '11111111-1111-4111-8111-111111111111'
const NOTE_ID = 'aaaaaaaa-0000-4000-8000-000000000001'
const FOLDER_ID = 'bbbbbbbb-0000-4000-8000-000000000001'

function rawNote(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: NOTE_ID,
    user_id: USER,
    title: 'Groceries',
    content: 'milk',
    is_locked: false,
    date_created: '2026-04-01T08:00:00.123456+00:00',
    date_modified: '2026-04-02T08:00:00Z',
    is_pinned: true,
    folder_id: FOLDER_ID,
    image_attachments: ['url1', 'url2'],
    ...overrides,
  }
}

describe('RowMapper', () => {
  describe('parseImageAttachments', () => {
    it('should read the legacy JSON string the same as the array', () => {
      expect(parseImageAttachments('["url1","url2"]')).toEqual(['url1', 'url2'])
      expect(parseImageAttachments(['url1', 'url2'])).toEqual(['url1', 'url2'])
    })

    it('should return null for anything else', () => {
      expect(parseImageAttachments('not json')).toBeNull()
      expect(parseImageAttachments('"just a string"')).toBeNull()
      expect(parseImageAttachments([1, 2])).toBeNull()
      expect(parseImageAttachments(null)).toBeNull()
      expect(parseImageAttachments(undefined)).toBeNull()
    })
  })

  describe('parseNoteRow', () => {
    it('should parse a complete row', () => {
      expect(parseNoteRow(rawNote())).toEqual({
        id: NOTE_ID,
        title: 'Groceries',
        content: 'milk',
        dateCreated: new Date('2026-04-01T08:00:00.123Z'),
        dateModified: new Date('2026-04-02T08:00:00.000Z'),
        isPinned: true,
        folderId: FOLDER_ID,
        isLocked: false,
        imageUrls: ['url1', 'url2'],
      })
    })

    it('should give the same note for both image encodings', () => {
      const legacy = parseNoteRow(rawNote({ image_attachments: '["url1","url2"]' }))

      expect(legacy).toEqual(parseNoteRow(rawNote()))
    })

    it('should default unreadable images to an empty list', () => {
      expect(parseNoteRow(rawNote({ image_attachments: '{broken' }))?.imageUrls).toEqual([])
      expect(parseNoteRow(rawNote({ image_attachments: null }))?.imageUrls).toEqual([])
    })

    it('should skip rows with a malformed id or timestamp', () => {
      expect(parseNoteRow(rawNote({ id: 'note-1' }))).toBeNull()
      expect(parseNoteRow(rawNote({ date_created: 'yesterday' }))).toBeNull()
      expect(parseNoteRow(rawNote({ date_modified: '2026-02-31T08:00:00Z' }))).toBeNull()
      expect(parseNoteRow(rawNote({ title: null }))).toBeNull()
    })

    it('should drop a malformed folder reference', () => {
      expect(parseNoteRow(rawNote({ folder_id: 'inbox' }))?.folderId).toBeNull()
    })

    it('should read integer booleans', () => {
      const note = parseNoteRow(rawNote({ is_locked: 1, is_pinned: 0 }))

      expect(note?.isLocked).toBe(true)
      expect(note?.isPinned).toBe(false)
    })
  })

  describe('parseFolderRow', () => {
    it('should parse folders with and without a parent', () => {
      expect(parseFolderRow({ id: FOLDER_ID, name: 'Work', color: '#fff', parent_folder_id: null })).toEqual({
        id: FOLDER_ID,
        name: 'Work',
        color: '#fff',
        parentFolderId: null,
      })
      expect(parseFolderRow({ id: FOLDER_ID, name: 'Work', color: '#fff', parent_folder_id: NOTE_ID })?.parentFolderId).toBe(NOTE_ID)
    })

    it('should skip folders without a name or valid id', () => {
      expect(parseFolderRow({ id: FOLDER_ID, color: '#fff' })).toBeNull()
      expect(parseFolderRow({ id: 42, name: 'Work', color: '#fff' })).toBeNull()
    })
  })

  describe('trash rows', () => {
    const deletedAt = new Date('2026-05-01T00:00:00.000Z')

    it('should round-trip a trashed note through its row', () => {
      const deleted: DeletedNote = {
        id: NOTE_ID,
        title: 'Locked note',
        content: 'secret',
        dateCreated: new Date('2026-04-01T08:00:00.000Z'),
        dateModified: new Date('2026-04-02T08:00:00.000Z'),
        isPinned: false,
        folderId: null,
        isLocked: true,
        imageUrls: ['url1'],
        deletedAt,
      }

      expect(parseDeletedNoteRow(toDeletedNoteRow(deleted, USER))).toEqual(deleted)
    })

    it('should read trash rows written before lock state and images were kept', () => {
      const deleted = parseDeletedNoteRow({
        id: NOTE_ID,
        user_id: USER,
        title: 'Old',
        content: '',
        folder_id: null,
        is_pinned: false,
        created_at: '2026-01-01T00:00:00Z',
        updated_at: '2026-01-01T00:00:00Z',
        deleted_at: '2026-01-02T00:00:00Z',
      })

      expect(deleted?.isLocked).toBe(false)
      expect(deleted?.imageUrls).toEqual([])
      expect(deleted?.deletedAt).toEqual(new Date('2026-01-02T00:00:00.000Z'))
    })

    it('should round-trip a trashed folder through its row', () => {
      const deleted: DeletedFolder = {
        id: FOLDER_ID,
        name: 'Old projects',
        color: '#84cae9',
        parentFolderId: null,
        dateCreated: deletedAt,
        dateModified: deletedAt,
        deletedAt,
      }

      expect(parseDeletedFolderRow(toDeletedFolderRow(deleted, USER))).toEqual(deleted)
    })

    it('should skip a trashed folder without a deletion time', () => {
      expect(parseDeletedFolderRow({
        id: FOLDER_ID,
        name: 'x',
        color: '#fff',
        created_at: '2026-01-01T00:00:00Z',
        updated_at: '2026-01-01T00:00:00Z',
      })).toBeNull()
    })
  })

  describe('entity to row', () => {
    const note: Note = {
      id: NOTE_ID,
      title: 'Groceries',
      content: 'milk',
      dateCreated: new Date('2026-04-01T08:00:00.000Z'),
      dateModified: new Date('2026-04-02T08:00:00.000Z'),
      isPinned: true,
      folderId: FOLDER_ID,
      isLocked: false,
      imageUrls: ['url1'],
    }

    it('should write a full note row', () => {
      expect(toNoteRow(note, USER)).toEqual({
        id: NOTE_ID,
        user_id: USER,
        title: 'Groceries',
        content: 'milk',
        is_locked: false,
        date_created: '2026-04-01T08:00:00.000Z',
        date_modified: '2026-04-02T08:00:00.000Z',
        is_pinned: true,
        folder_id: FOLDER_ID,
        image_attachments: ['url1'],
      })
    })

    it('should read back a note from the row it writes', () => {
      expect(parseNoteRow(toNoteRow(note, USER))).toEqual(note)
    })

    it('should leave identity and creation date out of updates', () => {
      const update = toNoteUpdate(note)

      expect(update.id).toBeUndefined()
      expect(update.date_created).toBeUndefined()
      expect(update.date_modified).toBe('2026-04-02T08:00:00.000Z')
      expect(toFolderUpdate({ id: FOLDER_ID, name: 'Work', color: '#fff', parentFolderId: null })).toEqual({
        name: 'Work',
        color: '#fff',
        parent_folder_id: null,
      })
    })
  })
})
