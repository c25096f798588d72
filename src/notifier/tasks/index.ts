/**
 * Task list loading
 *
 * The task file is a JSON array that may carry /* ... *\/ block comments.
 * A file that cannot be read or parsed stops the run; a single bad record
 * is reported and skipped.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../error-handling';
import { SkippedTask, Task } from '../types';

const stringList = z
  .array(z.union([z.string(), z.number()]).transform(value => String(value).trim()))
  .optional();

export const taskRecordSchema = z.object({
  date: z.string().min(1).describe('Calendar date, YYYY-MM-DD'),
  time: z.string().nullable().optional().describe('Clock time, HH:mm'),
  content_source_kind: z.string().optional().describe('static, external-fetch, file or a registered kind'),
  content: z.string().optional(),
  source_locator: z.string().optional().describe('URL or file path for non-static kinds'),
  title: z.string().optional(),
  mention_phone_numbers: stringList,
  mention_user_ids: stringList,
  mention_everyone: z.boolean().optional(),
  // Keys of task files written for the earlier text-message tool
  at_mobiles: stringList,
  at_user_ids: stringList,
  is_at_all: z.boolean().optional()
});

export type TaskRecord = z.infer<typeof taskRecordSchema>;

export interface TaskListResult {
  tasks: Task[];
  invalid: SkippedTask[];
}

export function stripBlockComments(text: string): string {
  return text.replace(/\/\*[\s\S]*?\*\//g, '');
}

export function toTask(record: TaskRecord, index: number): Task {
  return {
    index,
    date: record.date.trim(),
    time: record.time ?? undefined,
    contentSourceKind: record.content_source_kind?.trim() || 'static',
    content: record.content,
    sourceLocator: record.source_locator,
    title: record.title,
    mentionPhoneNumbers: record.mention_phone_numbers ?? record.at_mobiles ?? [],
    mentionUserIds: record.mention_user_ids ?? record.at_user_ids ?? [],
    mentionEveryone: record.mention_everyone ?? record.is_at_all ?? false
  };
}

export function parseTaskList(text: string, source: string = 'task list'): TaskListResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripBlockComments(text));
  } catch (error) {
    const reason = getErrorMessage(error);
    throw new ConfigurationError(`Invalid JSON in ${source}: ${reason}`, { source });
  }

  if (!Array.isArray(parsed)) {
    throw new ConfigurationError(`${source} must contain a JSON array of tasks`, { source });
  }

  const result: TaskListResult = { tasks: [], invalid: [] };

  parsed.forEach((entry: unknown, index: number) => {
    const record = taskRecordSchema.safeParse(entry);
    if (record.success) {
      result.tasks.push(toTask(record.data, index));
    } else {
      const message = record.error.issues
        .map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`)
        .join('; ');
      result.invalid.push({ taskIndex: index, reason: 'invalid-record', message });
    }
  });

  return result;
}

export async function loadTasks(filePath: string): Promise<TaskListResult> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    const reason = getErrorMessage(error);
    throw new ConfigurationError(`Cannot read task list ${filePath}: ${reason}`, { filePath });
  }

  return parseTaskList(text, filePath);
}
