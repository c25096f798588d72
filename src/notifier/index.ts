/**
 * Scheduled notifier
 *
 * Sends the tasks of a task list that are due now to a chat robot webhook.
 */

export * from './types';
export * from './error-handling';
export * from './config';
export * from './scheduler';
export * from './signing';
export * from './content';
export * from './rendering';
export * from './delivery';
export * from './tasks';
export * from './dispatcher';
export * from './notifier';
export * from './utils/logger';
