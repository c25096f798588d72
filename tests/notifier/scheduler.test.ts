import { DateTime } from 'luxon';
import { ConfigurationError } from '../../src/notifier/error-handling';
import { DEFAULT_WINDOW_MINUTES, TaskSelector } from '../../src/notifier/scheduler';
import { Task } from '../../src/notifier/types';

const ZONE = 'Asia/Shanghai';

function at(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: ZONE });
}

function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    index: 0,
    date: '2026-10-19',
    contentSourceKind: 'static',
    content: 'hello',
    mentionPhoneNumbers: [],
    mentionUserIds: [],
    mentionEveryone: false,
    ...overrides
  };
}

describe('TaskSelector', () => {
  let selector: TaskSelector;

  beforeEach(() => {
    selector = new TaskSelector();
  });

  it('should use a 15 minute window by default', () => {
    expect(DEFAULT_WINDOW_MINUTES).toBe(15);
    expect(selector.getWindowMinutes()).toBe(15);
  });

  describe('timed tasks', () => {
    const task = makeTask({ time: '09:00' });

    it('should be due 10 minutes after the scheduled time', () => {
      expect(selector.evaluate(task, at('2026-10-19T09:10:00'))).toEqual({ due: true, elapsedMinutes: 10 });
    });

    it('should be expired 20 minutes after the scheduled time', () => {
      expect(selector.evaluate(task, at('2026-10-19T09:20:00'))).toEqual({
        due: false,
        reason: 'expired',
        elapsedMinutes: 20
      });
    });

    it('should be due exactly at the scheduled time and at the end of the window', () => {
      expect(selector.evaluate(task, at('2026-10-19T09:00:00')).due).toBe(true);
      expect(selector.evaluate(task, at('2026-10-19T09:15:00')).due).toBe(true);
    });

    it('should expire one second after the window closes', () => {
      const verdict = selector.evaluate(task, at('2026-10-19T09:15:01'));
      expect(verdict.due).toBe(false);
      expect(verdict).toMatchObject({ reason: 'expired' });
    });

    it('should not be due before the scheduled time', () => {
      expect(selector.evaluate(task, at('2026-10-19T08:59:00'))).toEqual({
        due: false,
        reason: 'future',
        elapsedMinutes: -1
      });
    });

    it('should accept single digit hours', () => {
      const early = makeTask({ time: '9:05' });
      expect(selector.evaluate(early, at('2026-10-19T09:10:00'))).toEqual({ due: true, elapsedMinutes: 5 });
    });

    it('should honor a custom window', () => {
      const wide = new TaskSelector({ windowMinutes: 30 });
      expect(wide.evaluate(task, at('2026-10-19T09:20:00')).due).toBe(true);
      expect(wide.evaluate(task, at('2026-10-19T09:31:00')).due).toBe(false);
    });
  });

  describe('whole-day tasks', () => {
    it('should be due at any time of the day', () => {
      const task = makeTask();
      for (const time of ['00:00:00', '09:10:00', '23:59:59']) {
        expect(selector.evaluate(task, at(`2026-10-19T${time}`))).toEqual({ due: true });
      }
    });

    it('should treat a blank time as whole-day', () => {
      expect(selector.evaluate(makeTask({ time: '  ' }), at('2026-10-19T17:00:00'))).toEqual({ due: true });
    });
  });

  describe('date matching', () => {
    it('should never select tasks of another date', () => {
      const now = at('2026-10-19T09:05:00');
      const others = [
        makeTask({ date: '2026-10-18' }),
        makeTask({ date: '2026-10-20', time: '09:00' }),
        makeTask({ date: '2025-10-19', time: '09:00' })
      ];

      for (const task of others) {
        expect(selector.evaluate(task, now)).toEqual({ due: false, reason: 'not-today' });
      }
    });

    it('should not select yesterday late tasks just after midnight', () => {
      const task = makeTask({ date: '2026-10-18', time: '23:55' });
      expect(selector.evaluate(task, at('2026-10-19T00:05:00'))).toEqual({ due: false, reason: 'not-today' });
    });
  });

  describe('malformed data', () => {
    it('should report an unparseable time on a task of today', () => {
      expect(selector.evaluate(makeTask({ time: 'nine' }), at('2026-10-19T09:00:00'))).toEqual({
        due: false,
        reason: 'invalid-time',
        message: 'Unparseable time "nine"'
      });
      expect(selector.evaluate(makeTask({ time: '25:00' }), at('2026-10-19T09:00:00'))).toMatchObject({
        reason: 'invalid-time'
      });
    });

    it('should ignore a bad time on a task of another day', () => {
      const task = makeTask({ date: '2026-10-20', time: 'nine' });
      expect(selector.evaluate(task, at('2026-10-19T09:00:00'))).toEqual({ due: false, reason: 'not-today' });
    });

    it('should report an unparseable date', () => {
      expect(selector.evaluate(makeTask({ date: '2026/10/19' }), at('2026-10-19T09:00:00'))).toEqual({
        due: false,
        reason: 'invalid-date',
        message: 'Unparseable date "2026/10/19"'
      });
    });
  });

  describe('select', () => {
    it('should split tasks into due and skipped', () => {
      const tasks = [
        makeTask({ index: 0, time: '09:00' }),
        makeTask({ index: 1, time: '10:00' }),
        makeTask({ index: 2 }),
        makeTask({ index: 3, date: '2026-10-18' }),
        makeTask({ index: 4, time: '08:00' })
      ];

      const result = selector.select(tasks, at('2026-10-19T09:10:00'));

      expect(result.due.map(task => task.index)).toEqual([0, 2]);
      expect(result.skipped).toEqual([
        { taskIndex: 1, reason: 'future' },
        { taskIndex: 3, reason: 'not-today' },
        { taskIndex: 4, reason: 'expired' }
      ]);
    });
  });

  it('should reject a negative window as a configuration error', () => {
    expect(() => new TaskSelector({ windowMinutes: -1 })).toThrow(ConfigurationError);
    expect(() => new TaskSelector({ windowMinutes: -1 })).toThrow('Invalid window: -1 minutes');
  });
});
