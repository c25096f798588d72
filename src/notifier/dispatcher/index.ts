/**
 * Dispatcher Module
 *
 * One run: select the due tasks, then for each of them resolve content,
 * render, sign and deliver. Tasks are processed one after another and a
 * failing task never stops the ones after it.
 */

import { DateTime } from 'luxon';
import { NotifierConfig, requireDeliveryConfig } from '../config';
import { ContentResolver } from '../content';
import { DeliveryTransport, RobotWebhookChannel } from '../delivery';
import { NotifierErrorHandler, NotifierErrorType, TaskErrorRecord } from '../error-handling';
import { MessageRenderer, deriveTitle, formatDateTime } from '../rendering';
import { TaskSelector } from '../scheduler';
import { Mentions, RunSummary, SignedRequest, SkippedTask, Task, TaskResult } from '../types';
import { NotifierLogger, createModuleLogger } from '../utils/logger';

export interface DispatcherOptions {
  config: Pick<NotifierConfig, 'webhookUrl' | 'secret'>;
  resolver: ContentResolver;
  renderer: MessageRenderer;
  transport: DeliveryTransport;
  selector?: TaskSelector;
  /** Milliseconds since epoch for request signatures */
  clock?: () => number;
  logger?: NotifierLogger;
  errorHandler?: NotifierErrorHandler;
}

export interface RunOptions {
  /** Render and log messages without signing or sending them */
  dryRun?: boolean;
  /** Once aborted, no further task is started */
  signal?: AbortSignal;
  /** Records the task loader rejected; reported as skipped */
  invalidRecords?: SkippedTask[];
}

const DATA_ERROR_REASONS = new Set(['invalid-date', 'invalid-time', 'invalid-record']);

export class Dispatcher {
  private config: Pick<NotifierConfig, 'webhookUrl' | 'secret'>;
  private resolver: ContentResolver;
  private renderer: MessageRenderer;
  private selector: TaskSelector;
  private channel: RobotWebhookChannel;
  private logger: NotifierLogger;
  private errorHandler: NotifierErrorHandler;

  constructor(options: DispatcherOptions) {
    this.config = options.config;
    this.resolver = options.resolver;
    this.renderer = options.renderer;
    this.selector = options.selector ?? new TaskSelector();
    this.logger = options.logger ?? createModuleLogger('dispatcher');
    this.errorHandler = options.errorHandler ?? new NotifierErrorHandler(this.logger);
    this.channel = new RobotWebhookChannel({
      webhookUrl: options.config.webhookUrl,
      secret: options.config.secret,
      transport: options.transport,
      clock: options.clock
    });
  }

  /**
   * Process every due task. Throws a configuration error, before anything is
   * sent, when the webhook URL or secret is missing.
   */
  async run(tasks: Task[], now: DateTime, options: RunOptions = {}): Promise<RunSummary> {
    const dryRun = options.dryRun ?? false;
    if (!dryRun) {
      requireDeliveryConfig(this.config);
    }

    const summary: RunSummary = {
      ranAt: formatDateTime(now),
      total: tasks.length + (options.invalidRecords?.length ?? 0),
      attempted: 0,
      delivered: 0,
      skipped: [],
      errors: [],
      results: []
    };

    const selection = this.selector.select(tasks, now);
    const byIndex = new Map(tasks.map(task => [task.index, task]));

    for (const skipped of [...(options.invalidRecords ?? []), ...selection.skipped]) {
      summary.skipped.push(skipped);
      if (DATA_ERROR_REASONS.has(skipped.reason)) {
        const task = byIndex.get(skipped.taskIndex);
        summary.errors.push(this.errorHandler.handleTaskError(
          skipped.message ?? skipped.reason,
          { index: skipped.taskIndex, title: task?.title ?? `task #${skipped.taskIndex}` },
          NotifierErrorType.TASK_DATA_ERROR
        ));
      }
    }

    this.logger.info(`Run at ${summary.ranAt}: ${selection.due.length} of ${tasks.length} task(s) due`, {
      dryRun,
      windowMinutes: this.selector.getWindowMinutes()
    }, 'run');

    for (const task of selection.due) {
      if (options.signal?.aborted) {
        summary.skipped.push({ taskIndex: task.index, reason: 'interrupted', message: 'run interrupted before this task started' });
        continue;
      }

      const result = await this.processTask(task, now, dryRun, summary);
      summary.results.push(result);
    }

    if (selection.due.length === 0) {
      this.logger.info('No task due in this run', undefined, 'run');
    }

    this.logger.info(`Run finished: ${summary.delivered}/${summary.attempted} delivered`, {
      skipped: summary.skipped.length,
      errors: summary.errors.length
    }, 'run');

    return summary;
  }

  private async processTask(task: Task, now: DateTime, dryRun: boolean, summary: RunSummary): Promise<TaskResult> {
    const content = await this.resolver.resolve(task);
    const title = deriveTitle(task.title, content.text);
    const result: TaskResult = {
      taskIndex: task.index,
      title,
      delivered: false,
      contentDegraded: content.degraded,
      dryRun
    };

    if (content.degraded) {
      summary.errors.push(contentErrorRecord(task, title, content.errorType, content.reason));
    }

    const mentions: Mentions = {
      phoneNumbers: task.mentionPhoneNumbers,
      userIds: task.mentionUserIds,
      everyone: task.mentionEveryone
    };
    const message = this.renderer.render({ title: task.title, now, content: content.text, mentions });

    if (dryRun) {
      this.logger.info(`[dry run] Task #${task.index} "${message.title}"`, { text: message.text }, 'deliver');
      return result;
    }

    let request: SignedRequest;
    try {
      request = this.channel.sign();
    } catch (error) {
      const record = this.errorHandler.handleTaskError(error, { index: task.index, title }, NotifierErrorType.SIGNING_ERROR);
      summary.errors.push(record);
      result.errorType = record.type;
      return result;
    }

    summary.attempted++;
    try {
      await this.channel.send(request, message, mentions);
      summary.delivered++;
      result.delivered = true;
      this.logger.info(`Delivered task #${task.index} "${message.title}"`, undefined, 'deliver');
    } catch (error) {
      const record = this.errorHandler.handleTaskError(error, { index: task.index, title }, NotifierErrorType.DELIVERY_ERROR);
      summary.errors.push(record);
      result.errorType = record.type;
    }

    return result;
  }
}

function contentErrorRecord(
  task: Task,
  title: string,
  errorType: NotifierErrorType | undefined,
  reason: string | undefined
): TaskErrorRecord {
  return {
    taskIndex: task.index,
    title,
    type: errorType ?? NotifierErrorType.CONTENT_ERROR,
    message: reason ?? 'content unavailable'
  };
}
