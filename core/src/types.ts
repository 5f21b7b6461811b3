// Core data types for the Pocketdesk data layer

export type ExpenseBudgetPeriod = 'weekly' | 'monthly';
export type ReminderFrequency = 'weekly' | 'biweekly' | 'monthly' | 'yearly';
export type EntityCollection = 'notes' | 'folders' | 'deletedNotes' | 'deletedFolders';

export interface Note {
  id: string;
  title: string;
  content: string;
  dateCreated: Date;
  dateModified: Date;
  isPinned: boolean;
  folderId: string | null;
  isLocked: boolean;
  imageUrls: string[]; // Public URLs of images in object storage
}

export interface NoteFolder {
  id: string;
  name: string;
  color: string; // Hex color string
  parentFolderId: string | null;
}

export interface DeletedNote extends Note {
  deletedAt: Date;
}

export interface DeletedFolder extends NoteFolder {
  dateCreated: Date;
  dateModified: Date;
  deletedAt: Date;
}

export interface EntityCollections {
  notes: readonly Note[];
  folders: readonly NoteFolder[];
  deletedNotes: readonly DeletedNote[];
  deletedFolders: readonly DeletedFolder[];
}

// Expense budgets & reminders

export interface ExpenseBudget {
  id: string;
  name: string;
  limit: number;
  period: ExpenseBudgetPeriod;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface ExpenseBudgetStatus {
  spent: number;
  limit: number;
  progress: number; // 0..1
}

export interface ExpenseReminder {
  id: string;
  title: string;
  amount: number;
  frequency: ReminderFrequency;
  startDate: Date;
  isActive: boolean;
}

export interface UpcomingReminder {
  reminder: ExpenseReminder;
  dueDate: Date;
  daysUntilDue: number;
}

// Receipt statistics (derived from notes, never persisted)

export interface ReceiptStat {
  id: string;
  noteId: string;
  title: string;
  amount: number;
  date: Date;
  category: string;
}

export interface DailyReceiptSummary {
  day: Date; // Local midnight
  dayTotal: number;
  receipts: ReceiptStat[];
}

export interface MonthlyReceiptSummary {
  month: number; // 1-12
  monthDate: Date; // First day of the month, local time
  monthlyTotal: number;
  receipts: ReceiptStat[];
  dailySummaries: DailyReceiptSummary[];
}

export interface YearlyReceiptSummary {
  year: number;
  yearlyTotal: number;
  monthlySummaries: MonthlyReceiptSummary[];
}

export interface CategoryStat {
  category: string;
  total: number;
  count: number;
  percentage: number;
}

export interface CategoryBreakdown {
  yearlyTotal: number;
  categories: CategoryStat[];
}

export interface ReceiptSummary {
  totalAmount: number;
  totalCount: number;
  averageAmount: number;
  highestAmount: number;
  lowestAmount: number;
}

// Sync

export type SyncResult = { ok: true } | { ok: false; error: string };

/**
 * Remote side of every local mutation. Implementations log and report
 * failures through the returned result instead of throwing.
 */
export interface RemoteMirror {
  createNote(note: Note): Promise<SyncResult>;
  updateNote(note: Note): Promise<SyncResult>;
  moveNoteToTrash(deletedNote: DeletedNote): Promise<SyncResult>;
  restoreNote(note: Note): Promise<SyncResult>;
  purgeNote(deletedNote: DeletedNote): Promise<SyncResult>;
  createFolder(folder: NoteFolder): Promise<SyncResult>;
  updateFolder(folder: NoteFolder): Promise<SyncResult>;
  moveFolderToTrash(deletedFolder: DeletedFolder): Promise<SyncResult>;
  restoreFolder(folder: NoteFolder): Promise<SyncResult>;
  purgeFolder(deletedFolder: DeletedFolder): Promise<SyncResult>;
}
