/**
 * remindkit - typed client for Apple Reminders
 *
 * Create, query, update and delete reminders and read reminder lists
 * through EventKit, or through an in-memory store off macOS.
 */

export { RemindersClient, type RemindersClientOptions } from './client/reminders-client.js';
export { CalendarManager } from './client/calendar-manager.js';
export { createRemindersClient, createStore, type CreateClientOptions } from './client/factory.js';

export { ConfigLoader, type ClientConfig } from './config/loader.js';
export type { StoreKind } from './config/validation.js';

export {
  EventKitReminderStore,
  isEventKitAvailable,
  toHexColor,
  type EventKitStoreOptions,
  type ScriptRunner,
} from './store/eventkit-store.js';
export { InMemoryReminderStore, DEFAULT_MEMORY_CALENDAR, type InMemoryStoreOptions } from './store/memory-store.js';
export type {
  ReminderStore,
  StoreCalendar,
  StoreCalendarList,
  StoreReminder,
  StoreReminderChanges,
  StoreReminderDraft,
} from './store/types.js';

export { filterReminders, matchesFilter, searchReminders, selectNextUpcoming, searchCalendars } from './core/filters.js';
export {
  Priority,
  type PriorityInput,
  type Reminder,
  type ReminderCalendar,
  type CreateReminderInput,
  type UpdateReminderInput,
  type ReminderFilter,
  type ReminderCallback,
  type Unsubscribe,
} from './types/reminder.js';
export {
  priorityFromValue,
  priorityName,
  toPriorityValue,
  toEventKitPriority,
  fromEventKitPriority,
} from './utils/priority.js';
export {
  ErrorType,
  ErrorHandler,
  RemindersError,
  NotFoundError,
  ValidationError,
  PermissionDeniedError,
  StoreUnavailableError,
  StoreError,
  ConfigError,
  type RemindersErrorInfo,
} from './types/errors.js';
export { logger, createLogger } from './utils/logger.js';
export { VERSION, PACKAGE_NAME } from './version.js';
