/**
 * Common types for the notifier
 */

import type { NotifierErrorType, TaskErrorRecord } from '../error-handling';

/**
 * One scheduled notification. Kinds outside the built-in set are kept as
 * written so the content registry can report them.
 */
export interface Task {
  /** Position in the task list, used in diagnostics */
  index: number;
  date: string; // YYYY-MM-DD
  time?: string; // H:mm or HH:mm
  contentSourceKind: string;
  content?: string;
  sourceLocator?: string;
  title?: string;
  mentionPhoneNumbers: string[];
  mentionUserIds: string[];
  mentionEveryone: boolean;
}

export type SkipReason =
  | 'not-today'
  | 'future'
  | 'expired'
  | 'invalid-date'
  | 'invalid-time'
  | 'invalid-record'
  | 'interrupted';

export interface SkippedTask {
  taskIndex: number;
  reason: SkipReason;
  message?: string;
}

export interface Mentions {
  phoneNumbers: string[];
  userIds: string[];
  everyone: boolean;
}

export interface RenderedMessage {
  title: string;
  text: string;
}

export interface SignedRequest {
  url: string;
  timestamp: string;
  sign: string;
}

export interface TaskResult {
  taskIndex: number;
  title: string;
  delivered: boolean;
  contentDegraded: boolean;
  dryRun: boolean;
  errorType?: NotifierErrorType;
}

export interface RunSummary {
  /** Canonical run instant, yyyy-MM-dd HH:mm:ss */
  ranAt: string;
  total: number;
  attempted: number;
  delivered: number;
  skipped: SkippedTask[];
  errors: TaskErrorRecord[];
  results: TaskResult[];
}
