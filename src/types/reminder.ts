/**
 * Reminder-related type definitions
 */

/**
 * Semantic priority over the 0-9 urgency scale (higher is more urgent)
 */
export enum Priority {
  NONE = 0,
  LOW = 1,
  MEDIUM = 5,
  HIGH = 9,
}

/**
 * A Priority member, or any integer 0-9
 */
export type PriorityInput = Priority | number;

export interface Reminder {
  id: string;
  title: string;
  dueDate: Date | null;
  notes: string | null;
  url: string | null;
  /** Band of priorityValue */
  priority: Priority;
  /** Raw 0-9 value as stored */
  priorityValue: number;
  completed: boolean;
  completionDate: Date | null;
  flagged: boolean;
  createdAt: Date | null;
  modifiedAt: Date | null;
  calendarId: string;
}

/**
 * A reminder list
 */
export interface ReminderCalendar {
  id: string;
  name: string;
  color: string | null;
  isDefault: boolean;
}

export interface CreateReminderInput {
  title: string;
  calendarId?: string;
  dueDate?: Date | null;
  notes?: string | null;
  url?: string | null;
  priority?: PriorityInput;
  completed?: boolean;
  flagged?: boolean;
}

/**
 * Partial update: absent fields are left untouched, null clears
 */
export interface UpdateReminderInput {
  title?: string;
  dueDate?: Date | null;
  notes?: string | null;
  url?: string | null;
  priority?: PriorityInput;
  completed?: boolean;
  flagged?: boolean;
}

export interface ReminderFilter {
  dueAfter?: Date;
  dueBefore?: Date;
  completed?: boolean;
  priority?: PriorityInput;
  calendarId?: string;
}

export type ReminderCallback = (reminder: Reminder) => void;

export type Unsubscribe = () => void;
