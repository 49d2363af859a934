/**
 * Priority mapping
 * Translates between the Priority enum, the raw 0-9 scale and EventKit's ordering
 */

import { ValidationError } from '../types/errors.js';
import { Priority, type PriorityInput } from '../types/reminder.js';

export const MIN_PRIORITY_VALUE = 0;
export const MAX_PRIORITY_VALUE = 9;

export function isPriorityValue(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_PRIORITY_VALUE && value <= MAX_PRIORITY_VALUE;
}

/**
 * Raw 0-9 value for a Priority member or a number
 */
export function toPriorityValue(input: PriorityInput): number {
  if (!isPriorityValue(input)) {
    throw new ValidationError(
      `Priority must be an integer between ${MIN_PRIORITY_VALUE} and ${MAX_PRIORITY_VALUE}, got ${input}`,
      { field: 'priority', value: input }
    );
  }
  return input;
}

/**
 * Classify a raw value: 0 none, 1-4 low, 5 medium, 6-9 high
 */
export function priorityFromValue(value: number): Priority {
  const checked = toPriorityValue(value);

  if (checked === 0) {
    return Priority.NONE;
  }
  if (checked < Priority.MEDIUM) {
    return Priority.LOW;
  }
  if (checked === Priority.MEDIUM) {
    return Priority.MEDIUM;
  }
  return Priority.HIGH;
}

export function priorityName(priority: Priority): keyof typeof Priority {
  switch (priority) {
    case Priority.LOW:
      return 'LOW';
    case Priority.MEDIUM:
      return 'MEDIUM';
    case Priority.HIGH:
      return 'HIGH';
    default:
      return 'NONE';
  }
}

/**
 * EventKit ranks 1 highest and 9 lowest, 0 meaning none.
 * The conversion is its own inverse.
 */
export function toEventKitPriority(value: number): number {
  const checked = toPriorityValue(value);
  return checked === 0 ? 0 : MAX_PRIORITY_VALUE + 1 - checked;
}

export function fromEventKitPriority(nativeValue: number): number {
  return toEventKitPriority(nativeValue);
}
