#!/usr/bin/env node

/**
 * Command line entry point, meant to be started by cron or a CI schedule
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import path from 'path';
import { ConfigManager } from '../notifier/config';
import { getErrorMessage, isConfigurationError } from '../notifier/error-handling';
import { resolveNow, runNotifier } from '../notifier/notifier';
import { TaskSelector } from '../notifier/scheduler';
import { loadTasks } from '../notifier/tasks';
import { defaultLogger } from '../notifier/utils/logger';
import { printSummary, printVerdicts } from './summary';

interface CommonOptions {
  tasks?: string;
  now?: string;
  window?: number;
  config?: string;
}

interface RunCommandOptions extends CommonOptions {
  template?: string;
  dryRun?: boolean;
}

function parseWindow(value: string): number {
  const minutes = Number(value);
  if (!Number.isFinite(minutes) || minutes < 0) {
    throw new InvalidArgumentError('Window must be a non-negative number of minutes.');
  }
  return minutes;
}

function loadConfig(options: CommonOptions): ConfigManager {
  const manager = new ConfigManager({ localConfigPath: options.config });
  defaultLogger.setMinLevel(manager.getConfig().logLevel);
  return manager;
}

export async function runCommand(options: RunCommandOptions): Promise<number> {
  const controller = new AbortController();
  const interrupt = (signal: NodeJS.Signals) => {
    console.warn(chalk.yellow(`Received ${signal}, finishing the current task and stopping`));
    controller.abort();
  };
  process.once('SIGINT', interrupt);
  process.once('SIGTERM', interrupt);

  try {
    const config = loadConfig(options).getConfig();
    const summary = await runNotifier(config, {
      now: options.now,
      dryRun: options.dryRun,
      tasksFile: options.tasks,
      templateFile: options.template,
      windowMinutes: options.window,
      signal: controller.signal
    });

    printSummary(summary);
    return 0;
  } catch (error) {
    const message = getErrorMessage(error);
    if (isConfigurationError(error)) {
      console.error(chalk.red(`✗ Configuration error: ${message}`));
    } else {
      console.error(chalk.red(`✗ Run failed: ${message}`));
    }
    return 1;
  } finally {
    process.removeListener('SIGINT', interrupt);
    process.removeListener('SIGTERM', interrupt);
  }
}

export async function checkCommand(options: CommonOptions): Promise<number> {
  try {
    const config = loadConfig(options).getConfig();
    const now = resolveNow(config.timezone, options.now);
    const selector = new TaskSelector({ windowMinutes: options.window ?? config.windowMinutes });
    const tasksPath = path.resolve(options.tasks ?? config.tasksFile);
    const { tasks, invalid } = await loadTasks(tasksPath);

    console.log(chalk.blue(
      `Tasks in ${tasksPath} at ${now.toFormat('yyyy-MM-dd HH:mm:ss')} (${config.timezone}, window ${selector.getWindowMinutes()} min)`
    ));
    const entries = tasks.map(task => ({ task, verdict: selector.evaluate(task, now) }));
    printVerdicts(entries);

    for (const record of invalid) {
      console.log(chalk.yellow(`  task #${record.taskIndex}: ${record.reason}: ${record.message ?? ''}`));
    }

    const due = entries.filter(entry => entry.verdict.due).length;
    console.log(chalk.green(`${due} task(s) due now`));
    return 0;
  } catch (error) {
    console.error(chalk.red(`✗ ${getErrorMessage(error)}`));
    return 1;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('scheduled-notifier')
    .description('Send the scheduled notifications that are due now to a chat robot webhook')
    .version('1.0.0');

  program
    .command('run', { isDefault: true })
    .description('Deliver every task that is due now')
    .option('-t, --tasks <file>', 'task list file (JSON with block comments)')
    .option('-T, --template <file>', 'layout template with {{title}} {{datetime}} {{content}} {{mentions}}')
    .option('-n, --now <iso>', 'run as if it were this date-time (configured timezone unless an offset is given)')
    .option('-w, --window <minutes>', 'tolerance window in minutes', parseWindow)
    .option('-c, --config <file>', 'local YAML override file')
    .option('--dry-run', 'render messages without sending them')
    .action(async (options: RunCommandOptions) => {
      process.exitCode = await runCommand(options);
    });

  program
    .command('check')
    .description('Show which tasks are due now without sending anything')
    .option('-t, --tasks <file>', 'task list file')
    .option('-n, --now <iso>', 'evaluate at this date-time')
    .option('-w, --window <minutes>', 'tolerance window in minutes', parseWindow)
    .option('-c, --config <file>', 'local YAML override file')
    .action(async (options: CommonOptions) => {
      process.exitCode = await checkCommand(options);
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(chalk.red(getErrorMessage(error)));
      process.exitCode = 1;
    });
}
