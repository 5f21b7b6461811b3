import { DeletedNote, DeletedFolder } from '../types';
import { isExpired } from './trash-lifecycle-engine';
import { DEFAULT_NOTES_CONFIG } from '../config';

export interface RetentionDependencies {
  getDeletedNotes: () => readonly DeletedNote[];
  getDeletedFolders: () => readonly DeletedFolder[];
  purgeNote: (deletedNote: DeletedNote) => void;
  purgeFolder: (deletedFolder: DeletedFolder) => void;
}

export interface SweepResult {
  purgedNoteIds: string[];
  purgedFolderIds: string[];
}

export function findExpired<T extends { deletedAt: Date }>(items: readonly T[], now: Date, retentionDays: number): T[] {
  return items.filter(item => isExpired(item.deletedAt, now, retentionDays));
}

/**
 * RetentionSweeper - Permanently removes trash entries older than the retention window
 *
 * The caller decides when to run it (app launch, a timer, opening the trash).
 */
export class RetentionSweeper {
  private deps: RetentionDependencies;
  private retentionDays: number;

  constructor(deps: RetentionDependencies, retentionDays: number = DEFAULT_NOTES_CONFIG.retentionDays) {
    this.deps = deps;
    this.retentionDays = retentionDays;
  }

  sweep(now: Date = new Date()): SweepResult {
    const expiredNotes = findExpired(this.deps.getDeletedNotes(), now, this.retentionDays);
    const expiredFolders = findExpired(this.deps.getDeletedFolders(), now, this.retentionDays);

    for (const note of expiredNotes) {
      this.deps.purgeNote(note);
    }
    for (const folder of expiredFolders) {
      this.deps.purgeFolder(folder);
    }

    if (expiredNotes.length > 0 || expiredFolders.length > 0) {
      console.log(
        `[RetentionSweeper] Purged ${expiredNotes.length} notes and ${expiredFolders.length} folders older than ${this.retentionDays} days`
      );
    }

    return {
      purgedNoteIds: expiredNotes.map(note => note.id),
      purgedFolderIds: expiredFolders.map(folder => folder.id),
    };
  }
}
