// Types
export * from './types';

// Configuration
export { NotesConfig, DEFAULT_NOTES_CONFIG, resolveNotesConfig } from './config';

// Utilities
export {
  MS_PER_DAY,
  generateId,
  isUuid,
  wholeDaysBetween,
  addDays,
  startOfDay,
  isSameDay,
  isoWeek,
} from './utils';
export { formatDateModified, formatShortTime, formatMediumDate, notePreview } from './formatters';

// Store
export { EntityStore, StoreListener } from './store/entity-store';

// Engines
export {
  // Folder Hierarchy
  FolderHierarchyError,
  FolderCascade,
  FolderHierarchyDependencies,
  getFolderDepth,
  collectDescendantIds,
  sortFoldersByHierarchy,
  wouldCreateCycle,
  isUnderFolder,
  getFolderPath,
  assertValidParent,
  collectCascade,
} from './engines/folder-hierarchy-engine';

export {
  // Trash Lifecycle
  toDeletedNote,
  fromDeletedNote,
  toDeletedFolder,
  fromDeletedFolder,
  daysUntilPermanentDeletion,
  isExpired,
  TrashLifecycle,
} from './engines/trash-lifecycle-engine';

export {
  // Retention
  RetentionDependencies,
  SweepResult,
  findExpired,
  RetentionSweeper,
} from './engines/retention-engine';

export {
  // Receipt Statistics
  DEFAULT_RECEIPT_CATEGORY,
  ReceiptStatsOptions,
  roundCurrency,
  buildReceiptStats,
  getReceiptStatistics,
  getCategoryBreakdown,
  summarizeReceipts,
} from './engines/receipt-statistics-engine';

export {
  // Expense Budgets & Reminders
  upsertBudget,
  deleteBudget,
  findBudget,
  receiptsForCurrentPeriod,
  matchesExpense,
  getCurrentSpend,
  getBudgetStatus,
  getNextReminderDate,
  getUpcomingReminders,
} from './engines/expense-budget-engine';

// Parsers
export { extractAmount, formatAmount, formatAmountNoDecimals } from './parsers/currency-parser';
export { parseIsoTimestamp, formatIsoTimestamp, extractDateFromTitle } from './parsers/date-parser';

// Services
export { SyncQueue, SyncTask, SyncFailure, SyncQueueOptions } from './services/sync-queue';
export {
  NotesManager,
  NotesManagerDependencies,
  NewNoteInput,
  NewFolderInput,
} from './services/notes-manager';
