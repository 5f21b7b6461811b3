import { Note } from './types';
import { addDays, isSameDay } from './utils';
import { DEFAULT_NOTES_CONFIG } from './config';

const MONTH_ABBREVIATIONS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export function formatShortTime(date: Date): string {
  const hours = date.getHours();
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const period = hours < 12 ? 'AM' : 'PM';
  return `${hours % 12 || 12}:${minutes} ${period}`;
}

export function formatMediumDate(date: Date): string {
  return `${MONTH_ABBREVIATIONS[date.getMonth()]} ${date.getDate()}, ${date.getFullYear()}`;
}

/**
 * "Today 3:05 PM", "Yesterday", or "Oct 3, 2025".
 */
export function formatDateModified(note: Pick<Note, 'dateModified'>, now: Date = new Date()): string {
  if (isSameDay(note.dateModified, now)) {
    return `Today ${formatShortTime(note.dateModified)}`;
  }
  if (isSameDay(note.dateModified, addDays(now, -1))) {
    return 'Yesterday';
  }
  return formatMediumDate(note.dateModified);
}

export function notePreview(note: Pick<Note, 'content'>, length: number = DEFAULT_NOTES_CONFIG.previewLength): string {
  const trimmed = note.content.trim();
  if (trimmed.length === 0) {
    return 'No additional text';
  }
  return trimmed.slice(0, length);
}
