/**
 * EventKit Reminder Store
 * macOS EventKit integration via AppleScriptObjC
 */

import runAppleScript from 'run-applescript';
import { z } from 'zod';
import { ErrorHandler, StoreError } from '../types/errors.js';
import { fromEventKitPriority } from '../utils/priority.js';
import { storeLogger } from '../utils/logger.js';
import {
  buildAccessScript,
  buildCalendarsScript,
  buildCreateScript,
  buildFetchScript,
  buildGetScript,
  buildRemoveScript,
  buildUpdateScript,
} from './eventkit-scripts.js';
import type {
  ReminderStore,
  StoreCalendarList,
  StoreReminder,
  StoreReminderChanges,
  StoreReminderDraft,
} from './types.js';

/**
 * Executes a script and resolves with its printed result
 */
export type ScriptRunner = (script: string) => Promise<string>;

const EpochSchema = z.number().nullable();

// NSNumber booleans can come back as 0/1
const FlagSchema = z.union([z.boolean(), z.number().transform((n) => n !== 0)]);

const ReminderRecordSchema = z.object({
  id: z.string(),
  title: z.string().nullable(),
  notes: z.string().nullable(),
  url: z.string().nullable(),
  dueDate: EpochSchema,
  priority: z.number().int().min(0).max(9),
  completed: FlagSchema,
  completionDate: EpochSchema,
  flagged: FlagSchema,
  creationDate: EpochSchema,
  modificationDate: EpochSchema,
  calendarId: z.string(),
});

const CalendarsResultSchema = z.object({
  calendars: z.array(
    z.object({
      id: z.string(),
      title: z.string(),
      color: z.array(z.number()).length(3).nullable(),
    })
  ),
  defaultCalendarId: z.string().nullable(),
});

type ReminderRecord = z.infer<typeof ReminderRecordSchema>;

function fromEpoch(seconds: number | null): Date | null {
  return seconds === null ? null : new Date(Math.round(seconds * 1000));
}

/**
 * sRGB components in [0, 1] to "#RRGGBB"
 */
export function toHexColor(components: number[]): string {
  const hex = components
    .map((component) => {
      const byte = Math.round(Math.min(1, Math.max(0, component)) * 255);
      return byte.toString(16).padStart(2, '0');
    })
    .join('');
  return `#${hex.toUpperCase()}`;
}

function toStoreReminder(record: ReminderRecord): StoreReminder {
  return {
    id: record.id,
    title: record.title ?? '',
    notes: record.notes,
    url: record.url,
    dueDate: fromEpoch(record.dueDate),
    priority: fromEventKitPriority(record.priority),
    completed: record.completed,
    completionDate: fromEpoch(record.completionDate),
    flagged: record.flagged,
    creationDate: fromEpoch(record.creationDate),
    modificationDate: fromEpoch(record.modificationDate),
    calendarId: record.calendarId,
  };
}

export function isEventKitAvailable(): boolean {
  return process.platform === 'darwin';
}

export interface EventKitStoreOptions {
  runner?: ScriptRunner;
}

export class EventKitReminderStore implements ReminderStore {
  private runner: ScriptRunner;

  constructor(options: EventKitStoreOptions = {}) {
    this.runner = options.runner ?? runAppleScript;
  }

  async requestAccess(): Promise<void> {
    await this.run('requestAccess', buildAccessScript());
  }

  async listCalendars(): Promise<StoreCalendarList> {
    const output = await this.run('listCalendars', buildCalendarsScript());
    const result = this.parse('listCalendars', CalendarsResultSchema, output);
    return {
      calendars: result.calendars.map((calendar) => ({
        id: calendar.id,
        title: calendar.title,
        color: calendar.color ? toHexColor(calendar.color) : null,
      })),
      defaultCalendarId: result.defaultCalendarId,
    };
  }

  async fetchReminders(calendarIds?: string[]): Promise<StoreReminder[]> {
    const output = await this.run('fetchReminders', buildFetchScript(calendarIds));
    return this.parse('fetchReminders', z.array(ReminderRecordSchema), output).map(toStoreReminder);
  }

  async getReminder(id: string): Promise<StoreReminder | null> {
    const output = await this.run('getReminder', buildGetScript(id));
    const record = this.parse('getReminder', ReminderRecordSchema.nullable(), output);
    return record ? toStoreReminder(record) : null;
  }

  async createReminder(draft: StoreReminderDraft): Promise<StoreReminder> {
    const output = await this.run('createReminder', buildCreateScript(draft));
    return toStoreReminder(this.parse('createReminder', ReminderRecordSchema, output));
  }

  async updateReminder(id: string, changes: StoreReminderChanges): Promise<StoreReminder | null> {
    const output = await this.run('updateReminder', buildUpdateScript(id, changes));
    const record = this.parse('updateReminder', ReminderRecordSchema.nullable(), output);
    return record ? toStoreReminder(record) : null;
  }

  async removeReminder(id: string): Promise<boolean> {
    const output = await this.run('removeReminder', buildRemoveScript(id));
    return this.parse('removeReminder', z.boolean(), output);
  }

  /**
   * Run a script, translating runner failures into RemindersError
   */
  private async run(operation: string, script: string): Promise<string> {
    storeLogger.debug({ operation }, 'Running EventKit script');

    try {
      return await this.runner(script);
    } catch (error) {
      const wrapped = ErrorHandler.fromUnknown(error, `EventKit ${operation} failed`);
      storeLogger.warn({ operation, err: error }, wrapped.message);
      throw wrapped;
    }
  }

  private parse<S extends z.ZodTypeAny>(operation: string, schema: S, output: string): z.infer<S> {
    let json: unknown;
    try {
      json = JSON.parse(output);
    } catch (error) {
      throw new StoreError(`EventKit ${operation} returned non-JSON output`, error);
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      throw new StoreError(
        `EventKit ${operation} returned unexpected data: ${result.error.issues.map((i) => i.message).join('; ')}`,
        result.error
      );
    }
    return result.data;
  }
}
