/**
 * Record Mapping Unit Tests
 */

import { buildChanges, buildDraft, toCalendar, toReminder } from '../../src/core/mapping.js';
import { Priority } from '../../src/types/reminder.js';
import { CREATED_AT, PERSONAL, WORK, storeReminder } from '../helpers/index.js';

describe('toReminder', () => {
  it('should copy fields and classify priority', () => {
    const due = new Date('2026-02-14T18:30:00Z');
    const result = toReminder(
      storeReminder({
        id: 'rem-9',
        title: 'Book table',
        notes: 'Window seat',
        url: 'https://example.com/booking',
        dueDate: due,
        priority: 3,
        flagged: true,
      })
    );

    expect(result).toEqual({
      id: 'rem-9',
      title: 'Book table',
      dueDate: due,
      notes: 'Window seat',
      url: 'https://example.com/booking',
      priority: Priority.LOW,
      priorityValue: 3,
      completed: false,
      completionDate: null,
      flagged: true,
      createdAt: CREATED_AT,
      modifiedAt: CREATED_AT,
      calendarId: PERSONAL.id,
    });
  });
});

describe('toCalendar', () => {
  it('should mark the default calendar', () => {
    expect(toCalendar(WORK, WORK.id)).toEqual({
      id: WORK.id,
      name: 'Work',
      color: '#007AFF',
      isDefault: true,
    });
    expect(toCalendar(WORK, PERSONAL.id).isDefault).toBe(false);
    expect(toCalendar(WORK, null).isDefault).toBe(false);
  });
});

describe('buildDraft', () => {
  it('should fill defaults for omitted fields', () => {
    expect(buildDraft({ title: 'Pay rent' }, WORK.id)).toEqual({
      calendarId: WORK.id,
      title: 'Pay rent',
      notes: null,
      url: null,
      dueDate: null,
      priority: 0,
      completed: false,
      flagged: false,
    });
  });
});

describe('buildChanges', () => {
  it('should keep only supplied fields', () => {
    expect(buildChanges({ title: 'Renamed' })).toEqual({ title: 'Renamed' });
  });

  it('should carry explicit nulls so fields can be cleared', () => {
    expect(buildChanges({ notes: null, dueDate: null, url: null })).toEqual({
      notes: null,
      dueDate: null,
      url: null,
    });
  });

  it('should keep false and zero values', () => {
    expect(buildChanges({ completed: false, flagged: false, priority: 0 })).toEqual({
      completed: false,
      flagged: false,
      priority: 0,
    });
  });
});
