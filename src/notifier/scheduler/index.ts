/**
 * Scheduler Module
 *
 * Decides which tasks are due for the current run. A task is due when its
 * date is today and its time, if any, lies at most `windowMinutes` in the
 * past. Nothing is remembered between runs, so the window is the only guard
 * against resending: keep it at least as long as the trigger interval and no
 * longer than needed.
 */

import { DateTime } from 'luxon';
import { ConfigurationError } from '../error-handling';
import { SkipReason, SkippedTask, Task } from '../types';

export const DEFAULT_WINDOW_MINUTES = 15;

const DATE_FORMAT = 'yyyy-MM-dd';
const TIME_FORMAT = 'H:mm';

export interface SelectorOptions {
  windowMinutes?: number;
}

export type TaskVerdict =
  | { due: true; elapsedMinutes?: number }
  | { due: false; reason: SkipReason; message?: string; elapsedMinutes?: number };

export interface SelectionResult {
  due: Task[];
  skipped: SkippedTask[];
}

export class TaskSelector {
  private windowMinutes: number;

  constructor(options: SelectorOptions = {}) {
    const windowMinutes = options.windowMinutes ?? DEFAULT_WINDOW_MINUTES;
    if (!Number.isFinite(windowMinutes) || windowMinutes < 0) {
      throw new ConfigurationError(`Invalid window: ${windowMinutes} minutes`, { windowMinutes });
    }
    this.windowMinutes = windowMinutes;
  }

  getWindowMinutes(): number {
    return this.windowMinutes;
  }

  /**
   * Split the task list into due tasks and skipped tasks with their reasons.
   * `now` must already be in the deployment's timezone.
   */
  select(tasks: Task[], now: DateTime): SelectionResult {
    const result: SelectionResult = { due: [], skipped: [] };

    for (const task of tasks) {
      const verdict = this.evaluate(task, now);
      if (verdict.due) {
        result.due.push(task);
      } else {
        result.skipped.push({ taskIndex: task.index, reason: verdict.reason, message: verdict.message });
      }
    }

    return result;
  }

  evaluate(task: Task, now: DateTime): TaskVerdict {
    const date = DateTime.fromFormat(task.date.trim(), DATE_FORMAT, { zone: now.zone });
    if (!date.isValid) {
      return { due: false, reason: 'invalid-date', message: `Unparseable date "${task.date}"` };
    }

    if (date.toISODate() !== now.toISODate()) {
      return { due: false, reason: 'not-today' };
    }

    // Whole-day task
    if (task.time === undefined || task.time.trim() === '') {
      return { due: true };
    }

    const scheduled = DateTime.fromFormat(
      `${task.date.trim()} ${task.time.trim()}`,
      `${DATE_FORMAT} ${TIME_FORMAT}`,
      { zone: now.zone }
    );
    if (!scheduled.isValid) {
      return { due: false, reason: 'invalid-time', message: `Unparseable time "${task.time}"` };
    }

    const elapsedMinutes = now.diff(scheduled, 'minutes').minutes;

    if (elapsedMinutes < 0) {
      return { due: false, reason: 'future', elapsedMinutes };
    }

    if (elapsedMinutes > this.windowMinutes) {
      return { due: false, reason: 'expired', elapsedMinutes };
    }

    return { due: true, elapsedMinutes };
  }
}
