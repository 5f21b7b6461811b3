import { Note, NoteFolder } from '../types';

export class FolderHierarchyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FolderHierarchyError';
  }
}

export interface FolderCascade {
  folderIds: Set<string>;
  folders: NoteFolder[];
  notes: Note[];
}

export interface FolderHierarchyDependencies {
  getFolders: () => readonly NoteFolder[];
  getNotes: () => readonly Note[];
}

function indexById<T extends NoteFolder>(folders: readonly T[]): Map<string, T> {
  return new Map(folders.map(folder => [folder.id, folder]));
}

/**
 * Depth of a folder in the parent-pointer forest: 0 for a root, 1 for a child...
 * Counting stops at `maxDepth`, which also bounds the walk on cyclic data.
 */
export function getFolderDepth(folder: NoteFolder, folders: readonly NoteFolder[], maxDepth: number = 3): number {
  const byId = indexById(folders);
  let depth = 0;
  let currentParentId = folder.parentFolderId;

  while (currentParentId !== null && depth < maxDepth) {
    const parent = byId.get(currentParentId);
    if (!parent) break;
    depth++;
    currentParentId = parent.parentFolderId;
  }

  return depth;
}

/**
 * Breadth-first expansion of a folder's subtree. The result contains the
 * starting id and every folder reachable through child links; ids already in
 * the result are never expanded again.
 */
export function collectDescendantIds(folderId: string, folders: readonly NoteFolder[]): Set<string> {
  const result = new Set<string>([folderId]);
  let frontier = [folderId];

  while (frontier.length > 0) {
    const frontierIds = new Set(frontier);
    const next: string[] = [];

    for (const folder of folders) {
      if (folder.parentFolderId !== null
        && frontierIds.has(folder.parentFolderId)
        && !result.has(folder.id)) {
        result.add(folder.id);
        next.push(folder.id);
      }
    }

    frontier = next;
  }

  return result;
}

/**
 * Orders folders so that each one follows its parent whenever the parent is
 * part of the input. Unrelated folders keep their input order.
 */
export function sortFoldersByHierarchy<T extends NoteFolder>(folders: readonly T[]): T[] {
  const byId = indexById(folders);
  const result: T[] = [];
  const processed = new Set<string>();
  const inProgress = new Set<string>();

  const addWithAncestors = (folder: T): void => {
    if (processed.has(folder.id) || inProgress.has(folder.id)) return;
    inProgress.add(folder.id);

    if (folder.parentFolderId !== null) {
      const parent = byId.get(folder.parentFolderId);
      if (parent) addWithAncestors(parent);
    }

    inProgress.delete(folder.id);
    result.push(folder);
    processed.add(folder.id);
  };

  for (const folder of folders) {
    addWithAncestors(folder);
  }

  return result;
}

/**
 * True when giving `folderId` the parent `parentFolderId` would make the folder
 * its own ancestor.
 */
export function wouldCreateCycle(folderId: string, parentFolderId: string | null, folders: readonly NoteFolder[]): boolean {
  if (parentFolderId === null) return false;
  if (parentFolderId === folderId) return true;

  const byId = indexById(folders);
  const visited = new Set<string>();
  let current: string | null = parentFolderId;

  while (current !== null && !visited.has(current)) {
    if (current === folderId) return true;
    visited.add(current);
    current = byId.get(current)?.parentFolderId ?? null;
  }

  return false;
}

/** Whether `folderId` is `ancestorId` or lies somewhere below it. */
export function isUnderFolder(folderId: string | null, ancestorId: string, folders: readonly NoteFolder[]): boolean {
  const byId = indexById(folders);
  const visited = new Set<string>();
  let current = folderId;

  while (current !== null && !visited.has(current)) {
    if (current === ancestorId) return true;
    visited.add(current);
    current = byId.get(current)?.parentFolderId ?? null;
  }

  return false;
}

/** Folder names from the root down to `folderId`. Empty when the folder is unknown. */
export function getFolderPath(folderId: string, folders: readonly NoteFolder[]): string[] {
  const byId = indexById(folders);
  const path: string[] = [];
  const visited = new Set<string>();
  let current = byId.get(folderId);

  while (current && !visited.has(current.id)) {
    visited.add(current.id);
    path.unshift(current.name);
    current = current.parentFolderId !== null ? byId.get(current.parentFolderId) : undefined;
  }

  return path;
}

/**
 * Throws when `folder` cannot be written into `folders`: its parent must exist
 * and must not be the folder itself or one of its descendants.
 */
export function assertValidParent(folder: NoteFolder, folders: readonly NoteFolder[]): void {
  if (folder.parentFolderId === null) return;

  if (!folders.some(existing => existing.id === folder.parentFolderId)) {
    throw new FolderHierarchyError(`Parent folder ${folder.parentFolderId} not found for folder ${folder.id}`);
  }
  if (wouldCreateCycle(folder.id, folder.parentFolderId, folders)) {
    throw new FolderHierarchyError(`Moving folder ${folder.id} under ${folder.parentFolderId} would create a cycle`);
  }
}

/**
 * Deletion set of a folder: the folder, all of its descendants and every note filed in any of them.
 */
export function collectCascade(folder: NoteFolder, deps: FolderHierarchyDependencies): FolderCascade {
  const folders = deps.getFolders();
  const folderIds = collectDescendantIds(folder.id, folders);

  return {
    folderIds,
    folders: folders.filter(f => folderIds.has(f.id)),
    notes: deps.getNotes().filter(note => note.folderId !== null && folderIds.has(note.folderId)),
  };
}
