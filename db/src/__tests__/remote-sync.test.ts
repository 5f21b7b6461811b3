import { DeletedNote, EntityStore, Note, NoteFolder } from '@pocketdesk/core'
import { RemoteDatabase } from '../database'
import { BetterSqlite3Driver } from '../drivers/better-sqlite3'
import { ImageStorage, RemoteTableClient } from '../client'
import { RemoteSync, SessionProvider, NOT_AUTHENTICATED } from '../sync/remote-sync'

const USER = '11111111-1111-4111-8111-111111111111'

function uuid(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`
}

function makeNote(n: number, overrides: Partial<Note> = {}): Note {
  return {
    id: uuid(n),
    title: `Note ${n}`,
    content: 'body',
    dateCreated: new Date('2026-04-01T08:00:00.000Z'),
    dateModified: new Date('2026-04-02T08:00:00.000Z'),
    isPinned: false,
    folderId: null,
    isLocked: false,
    imageUrls: [],
    ...overrides,
  }
}

function makeFolder(n: number, parent: number | null = null): NoteFolder {
  return { id: uuid(n), name: `Folder ${n}`, color: '#84cae9', parentFolderId: parent === null ? null : uuid(parent) }
}

function trashed(note: Note): DeletedNote {
  return { ...note, deletedAt: new Date('2026-05-01T00:00:00.000Z') }
}

describe('RemoteSync', () => {
  let db: RemoteDatabase
  let store: EntityStore
  let userId: string | null
  let session: SessionProvider
  let remote: RemoteSync

  function createSync(overrides: { client?: RemoteTableClient; storage?: ImageStorage } = {}): RemoteSync {
    return new RemoteSync({
      client: overrides.client ?? db,
      storage: overrides.storage ?? db,
      session,
      store,
      now: () => new Date('2026-06-10T09:00:00.000Z'),
    })
  }

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {})
    jest.spyOn(console, 'warn').mockImplementation(() => {})
    jest.spyOn(console, 'error').mockImplementation(() => {})
    db = new RemoteDatabase(BetterSqlite3Driver.open())
    store = new EntityStore()
    userId = USER
    session = { getCurrentUserId: () => userId }
    remote = createSync()
  })

  afterEach(() => {
    db.close()
    jest.restoreAllMocks()
  })

  describe('without a session', () => {
    it('should skip pushes without touching the client', async () => {
      userId = null
      const insert = jest.spyOn(db, 'insert')

      const result = await remote.createNote(makeNote(1))

      expect(result).toEqual({ ok: false, error: NOT_AUTHENTICATED })
      expect(insert).not.toHaveBeenCalled()
      expect(console.warn).toHaveBeenCalledWith(`[RemoteSync] Skipping create note ${uuid(1)}: no authenticated user`)
    })

    it('should keep local data on pull', async () => {
      store.addNote(makeNote(1))
      userId = null

      const result = await remote.loadNotes()

      expect(result).toEqual({ collection: 'notes', fetched: 0, parsed: 0, replaced: false, error: NOT_AUTHENTICATED })
      expect(store.notes).toEqual([makeNote(1)])
    })
  })

  describe('note pushes', () => {
    it('should write a note that a later pull reads back unchanged', async () => {
      const note = makeNote(1, { imageUrls: ['https://cdn.test/a.jpg'], isLocked: true })

      expect(await remote.createNote(note)).toEqual({ ok: true })
      await remote.loadNotes()

      expect(store.notes).toEqual([note])
    })

    it('should report a failed write without throwing', async () => {
      await remote.createNote(makeNote(1))

      const result = await remote.createNote(makeNote(1))

      expect(result.ok).toBe(false)
      expect(console.error).toHaveBeenCalledWith(
        `[RemoteSync] Failed to create note ${uuid(1)}:`,
        expect.stringContaining('UNIQUE constraint failed')
      )
    })

    it('should move a note to the trash table and back', async () => {
      const note = makeNote(1, { imageUrls: ['https://cdn.test/a.jpg'] })
      await remote.createNote(note)

      await remote.moveNoteToTrash(trashed(note))
      expect(await db.select('notes', USER)).toEqual([])
      await remote.loadDeletedItems()
      expect(store.deletedNotes).toEqual([trashed(note)])

      await remote.restoreNote(note)
      expect(await db.select('deleted_notes', USER)).toEqual([])
      expect((await db.select('notes', USER)).map(row => row.id)).toEqual([note.id])
    })

    it('should update the editable columns', async () => {
      await remote.createNote(makeNote(1))
      await remote.updateNote(makeNote(1, { content: 'edited', isPinned: true }))

      const [row] = await db.select('notes', USER)
      expect(row.content).toBe('edited')
      expect(row.is_pinned).toBe(true)
    })
  })

  describe('purgeNote', () => {
    it('should delete the trashed row and the note\'s images', async () => {
      const url = await db.upload('note-images', `${USER}/photo.jpg`, new Uint8Array([1]), 'image/jpeg')
      const deleted = trashed(makeNote(1, { imageUrls: [url] }))
      await remote.moveNoteToTrash(deleted)

      expect(await remote.purgeNote(deleted)).toEqual({ ok: true })

      expect(await db.select('deleted_notes', USER)).toEqual([])
      expect(db.listObjectPaths('note-images')).toEqual([])
    })

    it('should finish the purge when an image cannot be removed', async () => {
      const storage: ImageStorage = {
        upload: jest.fn(async () => 'unused'),
        remove: jest.fn(async () => {
          throw new Error('storage offline')
        }),
      }
      const sync = createSync({ storage })
      const deleted = trashed(makeNote(1, { imageUrls: ['https://cdn.test/note-images/u/a.jpg'] }))
      await sync.moveNoteToTrash(deleted)

      expect(await sync.purgeNote(deleted)).toEqual({ ok: true })

      expect(storage.remove).toHaveBeenCalledWith('note-images', [`${USER}/a.jpg`])
      expect(console.error).toHaveBeenCalledWith('[RemoteSync] Failed to delete image a.jpg:', 'storage offline')
      expect(await db.select('deleted_notes', USER)).toEqual([])
    })

    it('should share one purge between concurrent calls for the same id', async () => {
      const deleted = trashed(makeNote(1))
      await remote.moveNoteToTrash(deleted)
      const remove = jest.spyOn(db, 'delete')

      const first = remote.purgeNote(deleted)
      const second = remote.purgeNote(deleted)

      expect(second).toBe(first)
      await first
      expect(remove).toHaveBeenCalledTimes(1)
      expect(await remote.purgeNote(deleted)).toEqual({ ok: true })
    })
  })

  describe('pulls', () => {
    it('should keep the local collection when the remote one is empty', async () => {
      store.addNote(makeNote(1))
      const before = store.notes

      const result = await remote.loadNotes()

      expect(result).toEqual({ collection: 'notes', fetched: 0, parsed: 0, replaced: false })
      expect(store.notes).toBe(before)
    })

    it('should keep the local collection when no row parses', async () => {
      store.addNote(makeNote(1))
      const before = store.notes
      await db.insert('notes', {
        id: 'not-a-uuid',
        user_id: USER,
        title: 'Broken',
        content: '',
        is_locked: false,
        date_created: '2026-04-01T08:00:00Z',
        date_modified: '2026-04-01T08:00:00Z',
        is_pinned: false,
        folder_id: null,
        image_attachments: null,
      })

      const result = await remote.loadNotes()

      expect(result).toEqual({ collection: 'notes', fetched: 1, parsed: 0, replaced: false })
      expect(store.notes).toBe(before)
      expect(console.warn).toHaveBeenCalledWith('[RemoteSync] Skipped 1 unparseable notes rows')
    })

    it('should replace the local collection with exactly the parsed rows', async () => {
      store.addNote(makeNote(1))
      await remote.createNote(makeNote(2))
      await db.insert('notes', {
        id: uuid(3),
        user_id: USER,
        title: 'Bad date',
        content: '',
        is_locked: false,
        date_created: 'last week',
        date_modified: '2026-04-01T08:00:00Z',
        is_pinned: false,
        folder_id: null,
        image_attachments: null,
      })

      const result = await remote.loadNotes()

      expect(result).toEqual({ collection: 'notes', fetched: 2, parsed: 1, replaced: true })
      expect(store.notes).toEqual([makeNote(2)])
    })

    it('should keep local data when the request fails', async () => {
      const client: RemoteTableClient = {
        select: jest.fn(async () => {
          throw new Error('timeout')
        }),
        insert: jest.fn(async () => {}),
        upsert: jest.fn(async () => {}),
        update: jest.fn(async () => {}),
        delete: jest.fn(async () => {}),
      }
      store.addFolder(makeFolder(1))
      const sync = createSync({ client })

      const result = await sync.loadFolders()

      expect(result).toEqual({ collection: 'folders', fetched: 0, parsed: 0, replaced: false, error: 'timeout' })
      expect(store.folders).toEqual([makeFolder(1)])
    })

    it('should apply the same rule to each trash collection', async () => {
      const local = trashed(makeNote(9))
      store.replaceAll('deletedNotes', [local])
      await remote.moveFolderToTrash({
        ...makeFolder(1),
        dateCreated: new Date('2026-05-01T00:00:00.000Z'),
        dateModified: new Date('2026-05-01T00:00:00.000Z'),
        deletedAt: new Date('2026-05-01T00:00:00.000Z'),
      })

      const [notes, folders] = await remote.loadDeletedItems()

      expect(notes.replaced).toBe(false)
      expect(folders.replaced).toBe(true)
      expect(store.deletedNotes).toEqual([local])
      expect(store.deletedFolders.map(f => f.id)).toEqual([uuid(1)])
    })
  })

  describe('folders', () => {
    it('should reject a child sent before its parent', async () => {
      const result = await remote.createFolder(makeFolder(2, 1))

      expect(result.ok).toBe(false)
      expect(result.ok ? '' : result.error).toContain('FOREIGN KEY constraint failed')
    })

    it('should upload local folders parents first on login', async () => {
      // Children listed before their parents
      store.replaceAll('folders', [makeFolder(3, 2), makeFolder(2, 1), makeFolder(1)])
      store.addNote(makeNote(1, { folderId: uuid(3) }))

      const result = await remote.syncOnLogin()

      expect(result.uploadedFolders).toBe(3)
      expect(result.folders.replaced).toBe(false)
      expect((await db.select('folders', USER)).map(row => row.id)).toEqual([uuid(1), uuid(2), uuid(3)])
      expect(store.notes).toEqual([makeNote(1, { folderId: uuid(3) })])
    })

    it('should trash and restore folders', async () => {
      const folder = makeFolder(1)
      await remote.createFolder(folder)
      const deleted = {
        ...folder,
        dateCreated: new Date('2026-05-01T00:00:00.000Z'),
        dateModified: new Date('2026-05-01T00:00:00.000Z'),
        deletedAt: new Date('2026-05-01T00:00:00.000Z'),
      }

      await remote.moveFolderToTrash(deleted)
      expect(await db.select('folders', USER)).toEqual([])

      await remote.restoreFolder(folder)
      expect((await db.select('folders', USER)).map(row => row.name)).toEqual(['Folder 1'])
      expect(await db.select('deleted_folders', USER)).toEqual([])

      await remote.moveFolderToTrash(deleted)
      expect(await remote.purgeFolder(deleted)).toEqual({ ok: true })
      expect(await db.select('deleted_folders', USER)).toEqual([])
    })

    it('should rename a folder', async () => {
      await remote.createFolder(makeFolder(1))

      await remote.updateFolder({ ...makeFolder(1), name: 'Renamed' })

      expect((await db.select('folders', USER))[0].name).toBe('Renamed')
    })
  })

  describe('uploadNoteImages', () => {
    it('should upload in order and collect per-image errors', async () => {
      let calls = 0
      const storage: ImageStorage = {
        upload: async (bucket, path) => {
          calls++
          if (calls === 2) throw new Error('quota exceeded')
          return `https://files.test/${bucket}/${path}`
        },
        remove: async () => {},
      }
      const sync = createSync({ storage })
      const noteId = uuid(1)
      const stamp = Math.floor(new Date('2026-06-10T09:00:00.000Z').getTime() / 1000)

      const result = await sync.uploadNoteImages(noteId, [
        { data: new Uint8Array([1]) },
        { data: new Uint8Array([2]) },
        { data: new Uint8Array([3]), contentType: 'image/png' },
      ])

      expect(result.urls).toEqual([
        `https://files.test/note-images/${USER}/${noteId}_${stamp}_0.jpg`,
        `https://files.test/note-images/${USER}/${noteId}_${stamp}_2.png`,
      ])
      expect(result.errors).toEqual([`${noteId}_${stamp}_1.jpg: quota exceeded`])
    })

    it('should store images in the database bucket', async () => {
      const result = await remote.uploadNoteImages(uuid(1), [{ data: new Uint8Array([7, 8]) }])

      expect(result.errors).toEqual([])
      expect(db.listObjectPaths('note-images')).toHaveLength(1)
    })
  })
})
