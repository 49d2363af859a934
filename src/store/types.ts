/**
 * Reminder store port
 *
 * Everything the client needs from a system of record. Records use the
 * package's 0-9 priority scale; adapters convert to their native one.
 */

export interface StoreCalendar {
  id: string;
  title: string;
  color: string | null;
}

export interface StoreCalendarList {
  calendars: StoreCalendar[];
  /** Null when the host has no default list */
  defaultCalendarId: string | null;
}

export interface StoreReminder {
  id: string;
  title: string;
  notes: string | null;
  url: string | null;
  dueDate: Date | null;
  priority: number;
  completed: boolean;
  completionDate: Date | null;
  flagged: boolean;
  creationDate: Date | null;
  modificationDate: Date | null;
  calendarId: string;
}

export interface StoreReminderDraft {
  calendarId: string;
  title: string;
  notes: string | null;
  url: string | null;
  dueDate: Date | null;
  priority: number;
  completed: boolean;
  flagged: boolean;
}

/**
 * Fields to overwrite; absent keys are left as stored
 */
export type StoreReminderChanges = Partial<Omit<StoreReminderDraft, 'calendarId'>>;

export interface ReminderStore {
  /** Throws PermissionDeniedError when the host refuses access */
  requestAccess(): Promise<void>;
  /** Calendars and the default calendar id, read together */
  listCalendars(): Promise<StoreCalendarList>;
  /** All reminders, or only those in the given calendars */
  fetchReminders(calendarIds?: string[]): Promise<StoreReminder[]>;
  getReminder(id: string): Promise<StoreReminder | null>;
  createReminder(draft: StoreReminderDraft): Promise<StoreReminder>;
  /** Resolves null when no reminder has this id */
  updateReminder(id: string, changes: StoreReminderChanges): Promise<StoreReminder | null>;
  /** Resolves false when no reminder has this id */
  removeReminder(id: string): Promise<boolean>;
}
