/**
 * Reminder and calendar predicates
 * In-memory filtering over the lists returned by the store
 */

import type { Reminder, ReminderCalendar, ReminderFilter } from '../types/reminder.js';
import { priorityFromValue } from '../utils/priority.js';

/**
 * True when the reminder satisfies every filter that is set
 */
export function matchesFilter(reminder: Reminder, filter: ReminderFilter): boolean {
  if (filter.dueAfter !== undefined) {
    if (!reminder.dueDate || reminder.dueDate.getTime() < filter.dueAfter.getTime()) {
      return false;
    }
  }

  if (filter.dueBefore !== undefined) {
    if (!reminder.dueDate || reminder.dueDate.getTime() > filter.dueBefore.getTime()) {
      return false;
    }
  }

  if (filter.completed !== undefined && reminder.completed !== filter.completed) {
    return false;
  }

  if (filter.priority !== undefined && reminder.priority !== priorityFromValue(filter.priority)) {
    return false;
  }

  if (filter.calendarId !== undefined && reminder.calendarId !== filter.calendarId) {
    return false;
  }

  return true;
}

export function filterReminders(reminders: Reminder[], filter: ReminderFilter = {}): Reminder[] {
  return reminders.filter((reminder) => matchesFilter(reminder, filter));
}

/**
 * Case-insensitive substring match on title or notes
 */
export function matchesText(reminder: Reminder, text: string): boolean {
  const needle = text.toLowerCase();

  if (reminder.title.toLowerCase().includes(needle)) {
    return true;
  }

  return reminder.notes !== null && reminder.notes.toLowerCase().includes(needle);
}

export function searchReminders(reminders: Reminder[], text: string): Reminder[] {
  return reminders.filter((reminder) => matchesText(reminder, text));
}

/**
 * Incomplete reminder with the earliest due date after `now`.
 * Equal due dates keep list order.
 */
export function selectNextUpcoming(reminders: Reminder[], now: Date): Reminder | null {
  let next: Reminder | null = null;

  for (const reminder of reminders) {
    if (reminder.completed || !reminder.dueDate) {
      continue;
    }
    if (reminder.dueDate.getTime() <= now.getTime()) {
      continue;
    }
    if (!next || (next.dueDate && reminder.dueDate.getTime() < next.dueDate.getTime())) {
      next = reminder;
    }
  }

  return next;
}

export function searchCalendars(calendars: ReminderCalendar[], query: string): ReminderCalendar[] {
  const needle = query.toLowerCase();
  return calendars.filter((calendar) => calendar.name.toLowerCase().includes(needle));
}
