import {
  Note,
  NoteFolder,
  ReceiptStat,
  DailyReceiptSummary,
  MonthlyReceiptSummary,
  YearlyReceiptSummary,
  CategoryStat,
  CategoryBreakdown,
  ReceiptSummary,
} from '../types';
import { isUnderFolder } from './folder-hierarchy-engine';
import { extractAmount } from '../parsers/currency-parser';
import { extractDateFromTitle } from '../parsers/date-parser';
import { startOfDay } from '../utils';

export const DEFAULT_RECEIPT_CATEGORY = 'Other';

export interface ReceiptStatsOptions {
  /** Category for a receipt note; defaults to its subfolder's name, or "Other" directly in the receipts folder. */
  categorize?: (note: Note) => string;
}

export function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}

function sum(receipts: ReceiptStat[]): number {
  return roundCurrency(receipts.reduce((total, receipt) => total + receipt.amount, 0));
}

function byDateDesc(a: ReceiptStat, b: ReceiptStat): number {
  return b.date.getTime() - a.date.getTime();
}

function groupBy<K, T>(items: T[], keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

function subfolderCategory(note: Note, folders: readonly NoteFolder[], receiptsFolderId: string): string {
  if (note.folderId === null || note.folderId === receiptsFolderId) return DEFAULT_RECEIPT_CATEGORY;
  return folders.find(folder => folder.id === note.folderId)?.name ?? DEFAULT_RECEIPT_CATEGORY;
}

/**
 * Receipt notes are the notes filed anywhere under the receipts folder. The
 * transaction date comes from the title; notes without one are skipped rather
 * than being dated by their last edit.
 */
export function buildReceiptStats(
  notes: readonly Note[],
  folders: readonly NoteFolder[],
  receiptsFolderId: string,
  options: ReceiptStatsOptions = {}
): ReceiptStat[] {
  const categorize = options.categorize ?? ((note: Note) => subfolderCategory(note, folders, receiptsFolderId));
  const stats: ReceiptStat[] = [];

  for (const note of notes) {
    if (!isUnderFolder(note.folderId, receiptsFolderId, folders)) continue;

    const date = extractDateFromTitle(note.title);
    if (!date) {
      console.warn(`[ReceiptStats] Skipping receipt with no date in title: ${note.title}`);
      continue;
    }

    const amount = extractAmount(note.content) || extractAmount(note.title);

    stats.push({
      id: note.id,
      noteId: note.id,
      title: note.title,
      amount,
      date,
      category: categorize(note),
    });
  }

  return stats;
}

function buildDailySummaries(receipts: ReceiptStat[]): DailyReceiptSummary[] {
  const byDay = groupBy(receipts, receipt => startOfDay(receipt.date).getTime());

  return [...byDay.entries()]
    .sort(([a], [b]) => b - a)
    .map(([dayTime, dayReceipts]) => ({
      day: new Date(dayTime),
      dayTotal: sum(dayReceipts),
      receipts: [...dayReceipts].sort(byDateDesc),
    }));
}

function buildMonthlySummaries(year: number, receipts: ReceiptStat[]): MonthlyReceiptSummary[] {
  const byMonth = groupBy(receipts, receipt => receipt.date.getMonth());

  return [...byMonth.entries()]
    .sort(([a], [b]) => b - a)
    .map(([monthIndex, monthReceipts]) => ({
      month: monthIndex + 1,
      monthDate: new Date(year, monthIndex, 1),
      monthlyTotal: sum(monthReceipts),
      receipts: [...monthReceipts].sort(byDateDesc),
      dailySummaries: buildDailySummaries(monthReceipts),
    }));
}

/**
 * Groups receipts by year, month and day, newest first at every level.
 * With `year`, only that year is returned (an empty array when it has no receipts).
 */
export function getReceiptStatistics(stats: ReceiptStat[], year?: number): YearlyReceiptSummary[] {
  const scoped = year === undefined ? stats : stats.filter(stat => stat.date.getFullYear() === year);
  const byYear = groupBy(scoped, receipt => receipt.date.getFullYear());

  return [...byYear.entries()]
    .sort(([a], [b]) => b - a)
    .map(([receiptYear, yearReceipts]) => ({
      year: receiptYear,
      yearlyTotal: sum(yearReceipts),
      monthlySummaries: buildMonthlySummaries(receiptYear, yearReceipts),
    }));
}

/**
 * Spending per category for a year, or one month of it (1-12).
 * Categories are ordered by total, largest first.
 */
export function getCategoryBreakdown(stats: ReceiptStat[], year: number, month?: number): CategoryBreakdown {
  const scoped = stats.filter(stat =>
    stat.date.getFullYear() === year && (month === undefined || stat.date.getMonth() + 1 === month)
  );
  const yearlyTotal = sum(scoped);

  const categories: CategoryStat[] = [...groupBy(scoped, stat => stat.category).entries()]
    .map(([category, receipts]) => {
      const total = sum(receipts);
      return {
        category,
        total,
        count: receipts.length,
        percentage: yearlyTotal > 0 ? (total / yearlyTotal) * 100 : 0,
      };
    })
    .sort((a, b) => b.total - a.total || a.category.localeCompare(b.category));

  return { yearlyTotal, categories };
}

export function summarizeReceipts(stats: ReceiptStat[]): ReceiptSummary {
  if (stats.length === 0) {
    return { totalAmount: 0, totalCount: 0, averageAmount: 0, highestAmount: 0, lowestAmount: 0 };
  }

  const amounts = stats.map(stat => stat.amount);
  const totalAmount = sum(stats);

  return {
    totalAmount,
    totalCount: stats.length,
    averageAmount: roundCurrency(totalAmount / stats.length),
    highestAmount: Math.max(...amounts),
    lowestAmount: Math.min(...amounts),
  };
}
