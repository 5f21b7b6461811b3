export interface NotesConfig {
  /** Days a trashed note or folder is kept before the sweeper purges it. */
  retentionDays: number;
  /** Depth at which folder depth reporting stops counting. */
  maxFolderDepth: number;
  defaultFolderColor: string;
  receiptsFolderName: string;
  receiptsFolderColor: string;
  /** Object storage bucket holding note images. */
  imageBucket: string;
  previewLength: number;
}

export const DEFAULT_NOTES_CONFIG: NotesConfig = {
  retentionDays: 30,
  maxFolderDepth: 3,
  defaultFolderColor: '#84cae9',
  receiptsFolderName: 'Receipts',
  receiptsFolderColor: '#F59E42',
  imageBucket: 'note-images',
  previewLength: 100,
};

export function resolveNotesConfig(overrides: Partial<NotesConfig> = {}): NotesConfig {
  const config = { ...DEFAULT_NOTES_CONFIG, ...overrides };

  if (!Number.isInteger(config.retentionDays) || config.retentionDays < 0) {
    throw new Error(`retentionDays must be a non-negative integer, got ${config.retentionDays}`);
  }
  if (!Number.isInteger(config.maxFolderDepth) || config.maxFolderDepth < 0) {
    throw new Error(`maxFolderDepth must be a non-negative integer, got ${config.maxFolderDepth}`);
  }

  return config;
}
