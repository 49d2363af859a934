/**
 * CalendarManager
 * Read access to reminder lists
 */

import { NotFoundError } from '../types/errors.js';
import type { ReminderCalendar } from '../types/reminder.js';
import type { ReminderStore } from '../store/types.js';
import { toCalendar } from '../core/mapping.js';
import { searchCalendars } from '../core/filters.js';

export class CalendarManager {
  constructor(private readonly store: ReminderStore) {}

  async list(): Promise<ReminderCalendar[]> {
    const { calendars, defaultCalendarId } = await this.store.listCalendars();
    return calendars.map((calendar) => toCalendar(calendar, defaultCalendarId));
  }

  /**
   * First calendar whose name matches exactly (case-sensitive)
   */
  async get(name: string): Promise<ReminderCalendar> {
    const calendar = (await this.list()).find((c) => c.name === name);
    if (!calendar) {
      throw new NotFoundError('calendar', name, `Calendar with name '${name}' not found`);
    }
    return calendar;
  }

  async getById(id: string): Promise<ReminderCalendar> {
    const calendar = (await this.list()).find((c) => c.id === id);
    if (!calendar) {
      throw new NotFoundError('calendar', id, `Calendar with ID '${id}' not found`);
    }
    return calendar;
  }

  async getDefault(): Promise<ReminderCalendar> {
    const calendar = (await this.list()).find((c) => c.isDefault);
    if (!calendar) {
      throw new NotFoundError('calendar', 'default', 'No default calendar found');
    }
    return calendar;
  }

  async search(query: string): Promise<ReminderCalendar[]> {
    return searchCalendars(await this.list(), query);
  }
}
