/**
 * Notifier run - wires configuration, task list, template and transport
 * into a Dispatcher and executes one run.
 */

import { DateTime, IANAZone } from 'luxon';
import path from 'path';
import { NotifierConfig, requireDeliveryConfig } from './config';
import { TextFetcher, createContentResolver } from './content';
import { DeliveryTransport, HttpDeliveryTransport } from './delivery';
import { Dispatcher } from './dispatcher';
import { ConfigurationError } from './error-handling';
import { MessageRenderer, loadTemplate } from './rendering';
import { TaskSelector } from './scheduler';
import { loadTasks } from './tasks';
import { RunSummary } from './types';
import { NotifierLogger, createModuleLogger } from './utils/logger';

export interface NotifierRunOptions {
  /** ISO date-time; without an offset it is read in the configured timezone */
  now?: string;
  dryRun?: boolean;
  signal?: AbortSignal;
  tasksFile?: string;
  templateFile?: string;
  windowMinutes?: number;
  transport?: DeliveryTransport;
  fetchText?: TextFetcher;
  clock?: () => number;
  logger?: NotifierLogger;
}

/**
 * The canonical instant of a run, in the configured timezone
 */
export function resolveNow(timezone: string, now?: string): DateTime {
  if (!IANAZone.isValidZone(timezone)) {
    throw new ConfigurationError(`Unknown timezone: ${timezone}`, { timezone });
  }

  if (now === undefined) {
    return DateTime.now().setZone(timezone);
  }

  const parsed = DateTime.fromISO(now, { zone: timezone });
  if (!parsed.isValid) {
    throw new ConfigurationError(`Invalid --now value "${now}": ${parsed.invalidExplanation ?? parsed.invalidReason}`, { now });
  }
  return parsed;
}

export async function runNotifier(config: NotifierConfig, options: NotifierRunOptions = {}): Promise<RunSummary> {
  const logger = options.logger ?? createModuleLogger('run');
  const dryRun = options.dryRun ?? false;

  // Nothing is read or sent when delivery is impossible
  if (!dryRun) {
    requireDeliveryConfig(config);
  }

  const now = resolveNow(config.timezone, options.now);
  const tasksPath = path.resolve(options.tasksFile ?? config.tasksFile);
  const templatePath = path.resolve(options.templateFile ?? config.templateFile);

  const { tasks, invalid } = await loadTasks(tasksPath);
  const template = await loadTemplate(templatePath);
  logger.debug('Loaded run inputs', {
    tasksPath,
    tasks: tasks.length,
    invalid: invalid.length,
    template: template === null ? 'built-in' : templatePath
  }, 'load');

  const dispatcher = new Dispatcher({
    config,
    selector: new TaskSelector({ windowMinutes: options.windowMinutes ?? config.windowMinutes }),
    resolver: createContentResolver({
      fetchText: options.fetchText,
      fetchTimeout: config.fetchTimeout,
      baseDir: path.dirname(tasksPath)
    }),
    renderer: new MessageRenderer(template),
    transport: options.transport ?? new HttpDeliveryTransport(config.deliveryTimeout),
    clock: options.clock
  });

  return dispatcher.run(tasks, now, { dryRun, signal: options.signal, invalidRecords: invalid });
}
