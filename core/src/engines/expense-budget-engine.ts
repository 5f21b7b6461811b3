import {
  ExpenseBudget,
  ExpenseBudgetPeriod,
  ExpenseBudgetStatus,
  ExpenseReminder,
  ReceiptStat,
  UpcomingReminder,
} from '../types';
import { MS_PER_DAY, generateId, isoWeek, startOfDay } from '../utils';
import { roundCurrency } from './receipt-statistics-engine';

const MIN_BUDGET_LIMIT = 0.01;

/**
 * Updates the budget with the same name (case-insensitive) or puts a new one
 * first. Returns the new list and the saved budget.
 */
export function upsertBudget(
  budgets: ExpenseBudget[],
  name: string,
  limit: number,
  period: ExpenseBudgetPeriod,
  now: Date = new Date()
): { budgets: ExpenseBudget[]; budget: ExpenseBudget } {
  const trimmedName = name.trim();
  const index = budgets.findIndex(b => b.name.toLowerCase() === trimmedName.toLowerCase());

  if (index !== -1) {
    const budget: ExpenseBudget = { ...budgets[index], limit, period, updatedAt: now };
    const next = budgets.slice();
    next[index] = budget;
    return { budgets: next, budget };
  }

  const budget: ExpenseBudget = {
    id: generateId(),
    name: trimmedName,
    limit,
    period,
    isActive: true,
    createdAt: now,
    updatedAt: now,
  };
  return { budgets: [budget, ...budgets], budget };
}

export function deleteBudget(budgets: ExpenseBudget[], id: string): ExpenseBudget[] {
  return budgets.filter(budget => budget.id !== id);
}

export function findBudget(budgets: ExpenseBudget[], name: string): ExpenseBudget | null {
  const needle = name.toLowerCase();
  return budgets.find(budget => budget.isActive && budget.name.toLowerCase() === needle) ?? null;
}

export function receiptsForCurrentPeriod(
  stats: ReceiptStat[],
  period: ExpenseBudgetPeriod,
  now: Date = new Date()
): ReceiptStat[] {
  if (period === 'monthly') {
    return stats.filter(stat =>
      stat.date.getFullYear() === now.getFullYear() && stat.date.getMonth() === now.getMonth()
    );
  }

  const current = isoWeek(now);
  return stats.filter(stat => {
    const week = isoWeek(stat.date);
    return week.week === current.week && week.year === current.year;
  });
}

/**
 * A receipt counts toward a budget when the budget name appears in its title
 * or category, or when any word of the name longer than two letters does.
 */
export function matchesExpense(receipt: Pick<ReceiptStat, 'title' | 'category'>, name: string): boolean {
  const needle = name.toLowerCase();
  const haystack = `${receipt.title} ${receipt.category}`.toLowerCase();

  if (haystack.includes(needle)) {
    return true;
  }

  return needle
    .split(' ')
    .filter(token => token.length > 2)
    .some(token => haystack.includes(token));
}

export function getCurrentSpend(budget: ExpenseBudget, stats: ReceiptStat[], now: Date = new Date()): number {
  const matching = receiptsForCurrentPeriod(stats, budget.period, now)
    .filter(receipt => matchesExpense(receipt, budget.name));
  return roundCurrency(matching.reduce((total, receipt) => total + receipt.amount, 0));
}

export function getBudgetStatus(budget: ExpenseBudget, stats: ReceiptStat[], now: Date = new Date()): ExpenseBudgetStatus {
  const spent = getCurrentSpend(budget, stats, now);
  const limit = Math.max(budget.limit, MIN_BUDGET_LIMIT);

  return {
    spent,
    limit: budget.limit,
    progress: Math.min(spent / limit, 1),
  };
}

// ==================== Reminders ====================

function advance(date: Date, frequency: ExpenseReminder['frequency'], steps: number): Date {
  const next = new Date(date.getTime());
  switch (frequency) {
    case 'weekly':
      next.setDate(next.getDate() + 7 * steps);
      break;
    case 'biweekly':
      next.setDate(next.getDate() + 14 * steps);
      break;
    case 'monthly': {
      const day = date.getDate();
      next.setDate(1);
      next.setMonth(next.getMonth() + steps);
      const lastDay = new Date(next.getFullYear(), next.getMonth() + 1, 0).getDate();
      next.setDate(Math.min(day, lastDay));
      break;
    }
    case 'yearly': {
      const day = date.getDate();
      next.setDate(1);
      next.setFullYear(next.getFullYear() + steps);
      const lastDay = new Date(next.getFullYear(), next.getMonth() + 1, 0).getDate();
      next.setDate(Math.min(day, lastDay));
      break;
    }
  }
  return next;
}

/**
 * First occurrence on or after today's date. Monthly and yearly reminders
 * anchored on a day the target month lacks fall on its last day.
 */
export function getNextReminderDate(reminder: ExpenseReminder, now: Date = new Date()): Date {
  const today = startOfDay(now);
  const start = startOfDay(reminder.startDate);
  if (start.getTime() >= today.getTime()) return start;

  let steps = 1;
  let candidate = advance(start, reminder.frequency, steps);
  while (candidate.getTime() < today.getTime()) {
    steps++;
    candidate = advance(start, reminder.frequency, steps);
  }
  return candidate;
}

export function getUpcomingReminders(
  reminders: ExpenseReminder[],
  now: Date = new Date(),
  withinDays: number = 7
): UpcomingReminder[] {
  const today = startOfDay(now);

  return reminders
    .filter(reminder => reminder.isActive)
    .map(reminder => {
      const dueDate = getNextReminderDate(reminder, now);
      // Days between local midnights; a DST shift leaves them an hour off
      const daysUntilDue = Math.round((dueDate.getTime() - today.getTime()) / MS_PER_DAY);
      return { reminder, dueDate, daysUntilDue };
    })
    .filter(upcoming => upcoming.daysUntilDue <= withinDays)
    .sort((a, b) => a.dueDate.getTime() - b.dueDate.getTime());
}
