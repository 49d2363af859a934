/**
 * RemindersClient
 * Typed reminder operations over a ReminderStore
 */

import { NotFoundError } from '../types/errors.js';
import type {
  CreateReminderInput,
  Reminder,
  ReminderCalendar,
  ReminderCallback,
  ReminderFilter,
  Unsubscribe,
  UpdateReminderInput,
} from '../types/reminder.js';
import type { ReminderStore } from '../store/types.js';
import { buildChanges, buildDraft, toReminder } from '../core/mapping.js';
import { filterReminders, searchReminders, selectNextUpcoming } from '../core/filters.js';
import {
  CreateReminderInputSchema,
  ReferenceTimeSchema,
  ReminderFilterSchema,
  UpdateReminderInputSchema,
  parseInput,
} from '../core/validation.js';
import { clientLogger } from '../utils/logger.js';
import { priorityName } from '../utils/priority.js';
import { CalendarManager } from './calendar-manager.js';

// Drops one registration, so a callback added twice stays subscribed once
function removeRegistration(callbacks: ReminderCallback[], callback: ReminderCallback): void {
  const index = callbacks.indexOf(callback);
  if (index !== -1) {
    callbacks.splice(index, 1);
  }
}

export interface RemindersClientOptions {
  /** List used when a reminder is created without calendarId */
  defaultCalendarName?: string;
  now?: () => Date;
}

export class RemindersClient {
  readonly calendars: CalendarManager;

  private readonly defaultCalendarName?: string;
  private readonly now: () => Date;
  private readonly createdCallbacks: ReminderCallback[] = [];
  private readonly completedCallbacks: ReminderCallback[] = [];

  constructor(
    private readonly store: ReminderStore,
    options: RemindersClientOptions = {}
  ) {
    this.calendars = new CalendarManager(store);
    this.defaultCalendarName = options.defaultCalendarName;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Ask the store for access; throws PermissionDeniedError when refused
   */
  async authorize(): Promise<void> {
    await this.store.requestAccess();
  }

  async createReminder(input: CreateReminderInput): Promise<Reminder> {
    const validated = parseInput(CreateReminderInputSchema, input, 'reminder');
    const calendar = await this.resolveTargetCalendar(validated.calendarId);

    const record = await this.store.createReminder(buildDraft(validated, calendar.id));
    const reminder = toReminder(record);

    clientLogger.debug(
      { reminderId: reminder.id, calendarId: calendar.id, priority: priorityName(reminder.priority) },
      'Reminder created'
    );

    this.notify(this.createdCallbacks, reminder, 'created');
    return reminder;
  }

  async getReminder(id: string): Promise<Reminder> {
    const record = await this.store.getReminder(id);
    if (!record) {
      throw new NotFoundError('reminder', id);
    }
    return toReminder(record);
  }

  /**
   * Patch a reminder; fields left out keep their stored values
   */
  async updateReminder(id: string, patch: UpdateReminderInput): Promise<Reminder> {
    const validated = parseInput(UpdateReminderInputSchema, patch, 'reminder update');
    const before = await this.getReminder(id);

    const record = await this.store.updateReminder(id, buildChanges(validated));
    if (!record) {
      throw new NotFoundError('reminder', id);
    }

    const reminder = toReminder(record);
    clientLogger.debug({ reminderId: id, fields: Object.keys(validated) }, 'Reminder updated');

    if (!before.completed && reminder.completed) {
      this.notify(this.completedCallbacks, reminder, 'completed');
    }
    return reminder;
  }

  async markComplete(id: string): Promise<Reminder> {
    return this.updateReminder(id, { completed: true });
  }

  async markIncomplete(id: string): Promise<Reminder> {
    return this.updateReminder(id, { completed: false });
  }

  async deleteReminder(id: string): Promise<void> {
    const removed = await this.store.removeReminder(id);
    if (!removed) {
      throw new NotFoundError('reminder', id);
    }
    clientLogger.debug({ reminderId: id }, 'Reminder deleted');
  }

  /**
   * Reminders matching every supplied filter
   */
  async listReminders(filter: ReminderFilter = {}): Promise<Reminder[]> {
    const validated = parseInput(ReminderFilterSchema, filter, 'reminder filter');

    let calendarIds: string[] | undefined;
    if (validated.calendarId !== undefined) {
      const calendar = await this.calendars.getById(validated.calendarId);
      calendarIds = [calendar.id];
    }

    const records = await this.store.fetchReminders(calendarIds);
    return filterReminders(records.map(toReminder), validated);
  }

  /**
   * Case-insensitive match on title or notes
   */
  async searchReminders(text: string): Promise<Reminder[]> {
    const records = await this.store.fetchReminders();
    return searchReminders(records.map(toReminder), text);
  }

  /**
   * Incomplete reminder with the nearest future due date
   */
  async nextUpcoming(now: Date = this.now()): Promise<Reminder | null> {
    const reference = parseInput(ReferenceTimeSchema, now, 'reference time');
    const records = await this.store.fetchReminders();
    return selectNextUpcoming(records.map(toReminder), reference);
  }

  onReminderCreated(callback: ReminderCallback): Unsubscribe {
    this.createdCallbacks.push(callback);
    return () => removeRegistration(this.createdCallbacks, callback);
  }

  onReminderCompleted(callback: ReminderCallback): Unsubscribe {
    this.completedCallbacks.push(callback);
    return () => removeRegistration(this.completedCallbacks, callback);
  }

  private async resolveTargetCalendar(calendarId?: string): Promise<ReminderCalendar> {
    if (calendarId !== undefined) {
      return this.calendars.getById(calendarId);
    }
    if (this.defaultCalendarName !== undefined) {
      return this.calendars.get(this.defaultCalendarName);
    }
    return this.calendars.getDefault();
  }

  private notify(callbacks: ReminderCallback[], reminder: Reminder, event: string): void {
    for (const callback of callbacks) {
      try {
        callback(reminder);
      } catch (error) {
        clientLogger.error({ err: error, event, reminderId: reminder.id }, 'Reminder callback failed');
      }
    }
  }
}
