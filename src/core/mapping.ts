/**
 * Record mapping
 * Converts store records into the package data model and back
 */

import type { Reminder, ReminderCalendar } from '../types/reminder.js';
import type {
  StoreCalendar,
  StoreReminder,
  StoreReminderChanges,
  StoreReminderDraft,
} from '../store/types.js';
import { priorityFromValue } from '../utils/priority.js';
import type { ValidatedCreateReminderInput, ValidatedUpdateReminderInput } from './validation.js';

export function toReminder(record: StoreReminder): Reminder {
  return {
    id: record.id,
    title: record.title,
    dueDate: record.dueDate,
    notes: record.notes,
    url: record.url,
    priority: priorityFromValue(record.priority),
    priorityValue: record.priority,
    completed: record.completed,
    completionDate: record.completionDate,
    flagged: record.flagged,
    createdAt: record.creationDate,
    modifiedAt: record.modificationDate,
    calendarId: record.calendarId,
  };
}

export function toCalendar(record: StoreCalendar, defaultCalendarId: string | null): ReminderCalendar {
  return {
    id: record.id,
    name: record.title,
    color: record.color,
    isDefault: record.id === defaultCalendarId,
  };
}

export function buildDraft(input: ValidatedCreateReminderInput, calendarId: string): StoreReminderDraft {
  return {
    calendarId,
    title: input.title,
    notes: input.notes ?? null,
    url: input.url ?? null,
    dueDate: input.dueDate ?? null,
    priority: input.priority ?? 0,
    completed: input.completed ?? false,
    flagged: input.flagged ?? false,
  };
}

/**
 * Keep only the fields the caller supplied
 */
export function buildChanges(patch: ValidatedUpdateReminderInput): StoreReminderChanges {
  const changes: StoreReminderChanges = {};

  if (patch.title !== undefined) {
    changes.title = patch.title;
  }
  if (patch.dueDate !== undefined) {
    changes.dueDate = patch.dueDate;
  }
  if (patch.notes !== undefined) {
    changes.notes = patch.notes;
  }
  if (patch.url !== undefined) {
    changes.url = patch.url;
  }
  if (patch.priority !== undefined) {
    changes.priority = patch.priority;
  }
  if (patch.completed !== undefined) {
    changes.completed = patch.completed;
  }
  if (patch.flagged !== undefined) {
    changes.flagged = patch.flagged;
  }

  return changes;
}
