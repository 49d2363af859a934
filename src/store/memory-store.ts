/**
 * In-memory reminder store
 * A process-local ReminderStore for hosts without EventKit and for tests
 */

import { randomUUID } from 'node:crypto';
import { StoreError } from '../types/errors.js';
import type {
  ReminderStore,
  StoreCalendar,
  StoreCalendarList,
  StoreReminder,
  StoreReminderChanges,
  StoreReminderDraft,
} from './types.js';

export interface InMemoryStoreOptions {
  calendars?: StoreCalendar[];
  /** Defaults to the first calendar; null means no default */
  defaultCalendarId?: string | null;
  reminders?: StoreReminder[];
  now?: () => Date;
  generateId?: () => string;
}

export const DEFAULT_MEMORY_CALENDAR: StoreCalendar = {
  id: 'reminders',
  title: 'Reminders',
  color: '#1BADF8',
};

function cloneDate(date: Date | null): Date | null {
  return date ? new Date(date.getTime()) : null;
}

function cloneReminder(record: StoreReminder): StoreReminder {
  return {
    ...record,
    dueDate: cloneDate(record.dueDate),
    completionDate: cloneDate(record.completionDate),
    creationDate: cloneDate(record.creationDate),
    modificationDate: cloneDate(record.modificationDate),
  };
}

export class InMemoryReminderStore implements ReminderStore {
  private calendars: StoreCalendar[];
  private defaultCalendarId: string | null;
  private reminders = new Map<string, StoreReminder>();
  private now: () => Date;
  private generateId: () => string;

  constructor(options: InMemoryStoreOptions = {}) {
    this.calendars = (options.calendars ?? [DEFAULT_MEMORY_CALENDAR]).map((calendar) => ({ ...calendar }));
    this.defaultCalendarId =
      options.defaultCalendarId !== undefined ? options.defaultCalendarId : (this.calendars[0]?.id ?? null);
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;

    for (const reminder of options.reminders ?? []) {
      this.reminders.set(reminder.id, cloneReminder(reminder));
    }
  }

  // Access is always granted in memory
  async requestAccess(): Promise<void> {}

  async listCalendars(): Promise<StoreCalendarList> {
    return {
      calendars: this.calendars.map((calendar) => ({ ...calendar })),
      defaultCalendarId: this.defaultCalendarId,
    };
  }

  async fetchReminders(calendarIds?: string[]): Promise<StoreReminder[]> {
    const records = [...this.reminders.values()];
    const selected = calendarIds ? records.filter((r) => calendarIds.includes(r.calendarId)) : records;
    return selected.map(cloneReminder);
  }

  async getReminder(id: string): Promise<StoreReminder | null> {
    const record = this.reminders.get(id);
    return record ? cloneReminder(record) : null;
  }

  async createReminder(draft: StoreReminderDraft): Promise<StoreReminder> {
    if (!this.calendars.some((calendar) => calendar.id === draft.calendarId)) {
      throw new StoreError(`Calendar '${draft.calendarId}' does not exist`);
    }

    const timestamp = this.now();
    const record: StoreReminder = {
      id: this.generateId(),
      title: draft.title,
      notes: draft.notes,
      url: draft.url,
      dueDate: cloneDate(draft.dueDate),
      priority: draft.priority,
      completed: draft.completed,
      completionDate: draft.completed ? cloneDate(timestamp) : null,
      flagged: draft.flagged,
      creationDate: cloneDate(timestamp),
      modificationDate: cloneDate(timestamp),
      calendarId: draft.calendarId,
    };

    this.reminders.set(record.id, record);
    return cloneReminder(record);
  }

  async updateReminder(id: string, changes: StoreReminderChanges): Promise<StoreReminder | null> {
    const current = this.reminders.get(id);
    if (!current) {
      return null;
    }

    const timestamp = this.now();
    const updated: StoreReminder = { ...current, modificationDate: cloneDate(timestamp) };

    // Keys present but undefined leave the stored value alone
    if (changes.title !== undefined) {
      updated.title = changes.title;
    }
    if (changes.notes !== undefined) {
      updated.notes = changes.notes;
    }
    if (changes.url !== undefined) {
      updated.url = changes.url;
    }
    if (changes.dueDate !== undefined) {
      updated.dueDate = cloneDate(changes.dueDate);
    }
    if (changes.priority !== undefined) {
      updated.priority = changes.priority;
    }
    if (changes.completed !== undefined) {
      updated.completed = changes.completed;
    }
    if (changes.flagged !== undefined) {
      updated.flagged = changes.flagged;
    }

    if (changes.completed !== undefined && changes.completed !== current.completed) {
      updated.completionDate = changes.completed ? cloneDate(timestamp) : null;
    }

    this.reminders.set(id, updated);
    return cloneReminder(updated);
  }

  async removeReminder(id: string): Promise<boolean> {
    return this.reminders.delete(id);
  }
}
