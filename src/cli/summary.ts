/**
 * Console output of a run summary and of task verdicts
 */

import chalk from 'chalk';
import { Table } from 'console-table-printer';
import { TaskVerdict } from '../notifier/scheduler';
import { RunSummary, Task } from '../notifier/types';

export function summaryHeadline(summary: RunSummary): string {
  const parts = [
    `Delivered ${summary.delivered}/${summary.attempted} attempted`,
    `${summary.skipped.length} skipped`,
    `${summary.errors.length} error(s)`
  ];
  return `[${summary.ranAt}] ${parts.join(', ')}`;
}

export function printSummary(summary: RunSummary): void {
  if (summary.results.length > 0) {
    const table = new Table({
      columns: [
        { name: 'task', title: '#', alignment: 'right' },
        { name: 'title', title: 'Title', alignment: 'left', maxLen: 40 },
        { name: 'status', title: 'Status', alignment: 'left' },
        { name: 'content', title: 'Content', alignment: 'left' }
      ]
    });

    for (const result of summary.results) {
      const status = result.dryRun ? 'dry run' : result.delivered ? 'delivered' : result.errorType ?? 'failed';
      table.addRow({
        task: result.taskIndex,
        title: result.title,
        status,
        content: result.contentDegraded ? 'placeholder' : 'ok'
      }, { color: result.delivered || result.dryRun ? 'green' : 'red' });
    }

    table.printTable();
  } else {
    console.log(chalk.gray('No task due in this run.'));
  }

  for (const error of summary.errors) {
    console.log(chalk.yellow(`  task #${error.taskIndex} (${error.title}): [${error.type}] ${error.message}`));
  }

  const headline = summaryHeadline(summary);
  const failed = summary.attempted - summary.delivered;
  console.log(failed > 0 ? chalk.red(headline) : chalk.green(headline));
}

export function describeVerdict(verdict: TaskVerdict): string {
  const elapsed = verdict.elapsedMinutes !== undefined ? ` (${verdict.elapsedMinutes.toFixed(1)} min elapsed)` : '';
  if (verdict.due) {
    return `due${elapsed}`;
  }
  return `${verdict.reason}${elapsed}${verdict.message ? `: ${verdict.message}` : ''}`;
}

export function printVerdicts(entries: Array<{ task: Task; verdict: TaskVerdict }>): void {
  const table = new Table({
    columns: [
      { name: 'task', title: '#', alignment: 'right' },
      { name: 'date', title: 'Date', alignment: 'left' },
      { name: 'time', title: 'Time', alignment: 'left' },
      { name: 'kind', title: 'Source', alignment: 'left' },
      { name: 'title', title: 'Title', alignment: 'left', maxLen: 30 },
      { name: 'verdict', title: 'Verdict', alignment: 'left' }
    ]
  });

  for (const { task, verdict } of entries) {
    table.addRow({
      task: task.index,
      date: task.date,
      time: task.time ?? 'all day',
      kind: task.contentSourceKind,
      title: task.title ?? '',
      verdict: describeVerdict(verdict)
    }, { color: verdict.due ? 'green' : 'white' });
  }

  table.printTable();
}
