/**
 * Content Module
 *
 * Maps a task's content source kind to the text of its message. Kinds live in
 * a registry, so new ones are added with `register` and the dispatcher never
 * changes. Resolution never throws: a failing source yields a placeholder and
 * the message is still sent.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { NotifierErrorType, getErrorMessage, isErrnoException } from '../error-handling';
import { Task } from '../types';
import { NotifierLogger, createModuleLogger } from '../utils/logger';
import { TextFetcher, httpTextFetcher } from './http-fetcher';

export type { TextFetcher } from './http-fetcher';
export { httpTextFetcher } from './http-fetcher';

export type ContentSource = (task: Task) => Promise<string>;

export interface ResolvedContent {
  text: string;
  kind: string;
  /** True when the text is a placeholder standing in for failed content */
  degraded: boolean;
  errorType?: NotifierErrorType;
  reason?: string;
}

export const EMPTY_CONTENT_PLACEHOLDER = '(no content)';

export function unavailablePlaceholder(reason: string): string {
  return `[content unavailable: ${reason}]`;
}

export function unknownKindPlaceholder(kind: string): string {
  return `[unknown content source kind: ${kind}]`;
}

export class ContentResolver {
  private sources: Map<string, ContentSource> = new Map();
  private logger: NotifierLogger;

  constructor(logger?: NotifierLogger) {
    this.logger = logger || createModuleLogger('content');
  }

  register(kind: string, source: ContentSource): this {
    this.sources.set(kind, source);
    return this;
  }

  has(kind: string): boolean {
    return this.sources.has(kind);
  }

  kinds(): string[] {
    return Array.from(this.sources.keys());
  }

  async resolve(task: Task): Promise<ResolvedContent> {
    const kind = task.contentSourceKind;
    const source = this.sources.get(kind);

    if (!source) {
      this.logger.warn(`Unknown content source kind "${kind}"`, { taskIndex: task.index }, 'resolve');
      return {
        text: unknownKindPlaceholder(kind),
        kind,
        degraded: true,
        errorType: NotifierErrorType.TASK_DATA_ERROR,
        reason: `unknown content source kind "${kind}"`
      };
    }

    try {
      const text = await source(task);
      return { text, kind, degraded: false };
    } catch (error) {
      const reason = getErrorMessage(error);
      this.logger.warn(`Content source "${kind}" failed: ${reason}`, {
        taskIndex: task.index,
        locator: task.sourceLocator
      }, 'resolve');
      return {
        text: unavailablePlaceholder(reason),
        kind,
        degraded: true,
        errorType: NotifierErrorType.CONTENT_ERROR,
        reason
      };
    }
  }
}

export const staticSource: ContentSource = async (task) => {
  return task.content ?? EMPTY_CONTENT_PLACEHOLDER;
};

export function createFetchSource(fetchText: TextFetcher, timeout: number): ContentSource {
  return async (task) => {
    if (!task.sourceLocator) {
      throw new Error('source_locator is required for external-fetch content');
    }
    return fetchText(task.sourceLocator, { timeout });
  };
}

/**
 * Relative locators are resolved against `baseDir`, normally the directory of the task file.
 */
export function createFileSource(baseDir: string): ContentSource {
  return async (task) => {
    if (!task.sourceLocator) {
      throw new Error('source_locator is required for file content');
    }

    const filePath = path.resolve(baseDir, task.sourceLocator);
    try {
      return await readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) {
        throw new Error(`file not found: ${task.sourceLocator}`);
      }
      throw error;
    }
  };
}

export interface ContentResolverOptions {
  fetchText?: TextFetcher;
  fetchTimeout?: number;
  baseDir?: string;
  logger?: NotifierLogger;
}

/**
 * Resolver with the built-in kinds: static, external-fetch and file
 */
export function createContentResolver(options: ContentResolverOptions = {}): ContentResolver {
  return new ContentResolver(options.logger)
    .register('static', staticSource)
    .register('external-fetch', createFetchSource(options.fetchText ?? httpTextFetcher, options.fetchTimeout ?? 10000))
    .register('file', createFileSource(options.baseDir ?? process.cwd()));
}
