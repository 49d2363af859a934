/**
 * In-Memory Reminder Store Unit Tests
 */

import { DEFAULT_MEMORY_CALENDAR, InMemoryReminderStore } from '../../src/store/memory-store.js';
import { StoreError } from '../../src/types/errors.js';
import { PERSONAL, WORK, storeReminder } from '../helpers/index.js';

describe('InMemoryReminderStore', () => {
  const t0 = new Date('2026-04-01T08:00:00.000Z');
  const t1 = new Date('2026-04-01T09:00:00.000Z');
  let clock: Date;
  let counter: number;
  let store: InMemoryReminderStore;

  beforeEach(() => {
    clock = t0;
    counter = 0;
    store = new InMemoryReminderStore({
      calendars: [PERSONAL, WORK],
      defaultCalendarId: WORK.id,
      now: () => clock,
      generateId: () => `mem-${++counter}`,
    });
  });

  it('should seed a single default calendar when none are given', async () => {
    const bare = new InMemoryReminderStore();

    expect(await bare.listCalendars()).toEqual({
      calendars: [DEFAULT_MEMORY_CALENDAR],
      defaultCalendarId: 'reminders',
    });
  });

  it('should allow a store without a default calendar', async () => {
    const noDefault = new InMemoryReminderStore({ calendars: [PERSONAL], defaultCalendarId: null });
    expect((await noDefault.listCalendars()).defaultCalendarId).toBeNull();
  });

  it('should create reminders with generated ids and timestamps', async () => {
    const created = await store.createReminder({
      calendarId: WORK.id,
      title: 'Send invoice',
      notes: null,
      url: null,
      dueDate: null,
      priority: 5,
      completed: false,
      flagged: true,
    });

    expect(created).toEqual({
      id: 'mem-1',
      title: 'Send invoice',
      notes: null,
      url: null,
      dueDate: null,
      priority: 5,
      completed: false,
      completionDate: null,
      flagged: true,
      creationDate: t0,
      modificationDate: t0,
      calendarId: WORK.id,
    });
  });

  it('should refuse an unknown calendar', async () => {
    await expect(
      store.createReminder({
        calendarId: 'missing',
        title: 'x',
        notes: null,
        url: null,
        dueDate: null,
        priority: 0,
        completed: false,
        flagged: false,
      })
    ).rejects.toThrow(StoreError);
  });

  it('should patch only the given fields and track completion', async () => {
    const seeded = new InMemoryReminderStore({
      calendars: [PERSONAL],
      reminders: [storeReminder({ id: 'r1', title: 'Old', notes: 'keep me' })],
      now: () => clock,
    });

    clock = t1;
    const updated = await seeded.updateReminder('r1', { title: 'New', completed: true });

    expect(updated?.title).toBe('New');
    expect(updated?.notes).toBe('keep me');
    expect(updated?.completed).toBe(true);
    expect(updated?.completionDate).toEqual(t1);
    expect(updated?.modificationDate).toEqual(t1);

    const reopened = await seeded.updateReminder('r1', { completed: false });
    expect(reopened?.completionDate).toBeNull();
  });

  it('should ignore keys that are present but undefined', async () => {
    const seeded = new InMemoryReminderStore({
      calendars: [PERSONAL],
      reminders: [storeReminder({ id: 'r1', title: 'Old', notes: 'keep me', priority: 5 })],
      now: () => clock,
    });

    const updated = await seeded.updateReminder('r1', { title: undefined, notes: undefined, priority: undefined });

    expect(updated?.title).toBe('Old');
    expect(updated?.notes).toBe('keep me');
    expect(updated?.priority).toBe(5);
    expect((await seeded.getReminder('r1'))?.title).toBe('Old');
  });

  it('should return null when updating a missing reminder', async () => {
    expect(await store.updateReminder('nope', { title: 'x' })).toBeNull();
  });

  it('should scope fetches to the given calendars', async () => {
    const seeded = new InMemoryReminderStore({
      calendars: [PERSONAL, WORK],
      reminders: [
        storeReminder({ id: 'p', calendarId: PERSONAL.id }),
        storeReminder({ id: 'w', calendarId: WORK.id }),
      ],
    });

    expect((await seeded.fetchReminders()).map((r) => r.id)).toEqual(['p', 'w']);
    expect((await seeded.fetchReminders([WORK.id])).map((r) => r.id)).toEqual(['w']);
  });

  it('should hand out copies', async () => {
    const seeded = new InMemoryReminderStore({
      reminders: [storeReminder({ id: 'r1', dueDate: new Date('2026-04-02T00:00:00Z') })],
    });

    const first = await seeded.getReminder('r1');
    first?.dueDate?.setFullYear(2030);

    const second = await seeded.getReminder('r1');
    expect(second?.dueDate).toEqual(new Date('2026-04-02T00:00:00Z'));
  });

  it('should remove reminders once', async () => {
    const seeded = new InMemoryReminderStore({ reminders: [storeReminder({ id: 'r1' })] });

    expect(await seeded.removeReminder('r1')).toBe(true);
    expect(await seeded.removeReminder('r1')).toBe(false);
    expect(await seeded.getReminder('r1')).toBeNull();
  });
});
