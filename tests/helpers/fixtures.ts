/**
 * Test fixtures for reminder records
 */

import type { StoreCalendar, StoreReminder } from '../../src/store/types.js';
import type { Reminder } from '../../src/types/reminder.js';
import { toReminder } from '../../src/core/mapping.js';

export const CREATED_AT = new Date('2026-01-01T09:00:00.000Z');

export const PERSONAL: StoreCalendar = { id: 'cal-personal', title: 'Personal', color: '#FF9500' };
export const WORK: StoreCalendar = { id: 'cal-work', title: 'Work', color: '#007AFF' };
export const WORK_ARCHIVE: StoreCalendar = { id: 'cal-archive', title: 'Work Archive', color: null };

export function storeReminder(overrides: Partial<StoreReminder> = {}): StoreReminder {
  return {
    id: 'rem-1',
    title: 'Untitled',
    notes: null,
    url: null,
    dueDate: null,
    priority: 0,
    completed: false,
    completionDate: null,
    flagged: false,
    creationDate: CREATED_AT,
    modificationDate: CREATED_AT,
    calendarId: PERSONAL.id,
    ...overrides,
  };
}

export function reminder(overrides: Partial<StoreReminder> = {}): Reminder {
  return toReminder(storeReminder(overrides));
}
