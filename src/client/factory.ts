/**
 * Client factory
 * Builds a RemindersClient over the configured store
 */

import { ConfigLoader, type ClientConfig } from '../config/loader.js';
import { StoreUnavailableError } from '../types/errors.js';
import { EventKitReminderStore, isEventKitAvailable, type ScriptRunner } from '../store/eventkit-store.js';
import { InMemoryReminderStore } from '../store/memory-store.js';
import type { ReminderStore } from '../store/types.js';
import { clientLogger } from '../utils/logger.js';
import { RemindersClient } from './reminders-client.js';

export interface CreateClientOptions {
  /** Skip the config file and use this configuration */
  config?: ClientConfig;
  /** Use this store instead of building one from the configuration */
  store?: ReminderStore;
  /** Script runner for the EventKit store */
  runner?: ScriptRunner;
  now?: () => Date;
}

export function createStore(config: ClientConfig, runner?: ScriptRunner): ReminderStore {
  switch (config.store) {
    case 'eventkit':
      if (!isEventKitAvailable()) {
        throw new StoreUnavailableError(
          `EventKit is only available on macOS (current platform: ${process.platform})`
        );
      }
      return new EventKitReminderStore({ runner });
    case 'memory':
      return new InMemoryReminderStore();
  }
}

export async function createRemindersClient(options: CreateClientOptions = {}): Promise<RemindersClient> {
  const config = options.config ?? (await ConfigLoader.load());
  const store = options.store ?? createStore(config, options.runner);

  clientLogger.debug({ store: options.store ? 'custom' : config.store }, 'Creating reminders client');

  return new RemindersClient(store, {
    defaultCalendarName: config.defaultCalendarName,
    now: options.now,
  });
}
