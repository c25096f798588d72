/**
 * Rendering Module
 *
 * Builds the markdown text of a notification, either from an external layout
 * template with {{title}}, {{datetime}}, {{content}} and {{mentions}}
 * placeholders or from the built-in layout.
 */

import { readFile } from 'fs/promises';
import { DateTime } from 'luxon';
import { isErrnoException } from '../error-handling';
import { SIGNATURE_SCHEME } from '../signing';
import { Mentions, RenderedMessage } from '../types';

export const TEMPLATE_PLACEHOLDERS = ['title', 'datetime', 'content', 'mentions'] as const;

export type TemplatePlaceholder = (typeof TEMPLATE_PLACEHOLDERS)[number];

export const DEFAULT_TITLE = 'Scheduled Notification';
export const AUTOMATION_LABEL = 'scheduled-notifier on Node.js';
export const DATETIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

const VARIABLE_PATTERN = /\{\{([^{}]+)\}\}/g;

/**
 * Literal {{name}} substitution. Unset placeholders and all other text are left as written.
 */
export class NotificationTemplate {
  private template: string;
  private variables: Map<string, string> = new Map();

  constructor(template: string) {
    this.template = template;
  }

  setVariable(name: string, value: string): void {
    this.variables.set(name, value);
  }

  setVariables(variables: Record<string, string>): void {
    for (const [name, value] of Object.entries(variables)) {
      this.variables.set(name, value);
    }
  }

  /**
   * Single pass, so placeholders inside substituted values are not expanded again
   */
  render(): string {
    return this.template.replace(VARIABLE_PATTERN, (match: string, name: string) => {
      return this.variables.get(name) ?? match;
    });
  }

  static create(template: string): NotificationTemplate {
    return new NotificationTemplate(template);
  }
}

/**
 * Explicit title, else the first markdown heading of the content, else the generic label
 */
export function deriveTitle(explicitTitle: string | undefined, content: string): string {
  if (explicitTitle && explicitTitle.trim()) {
    return explicitTitle.trim();
  }

  const heading = content
    .split(/\r?\n/)
    .map(line => line.trim())
    .find(line => line.startsWith('#'));

  const headingText = heading?.replace(/^#+/, '').trim();
  return headingText || DEFAULT_TITLE;
}

export function formatMentions(mentions: Mentions): string {
  if (mentions.everyone) {
    return 'everyone';
  }

  if (mentions.phoneNumbers.length === 0 && mentions.userIds.length === 0) {
    return 'none';
  }

  // User ids reach the robot through at.atUserIds only
  return mentions.phoneNumbers.map(phone => `@${phone}`).join(' ');
}

export function formatDateTime(now: DateTime): string {
  return now.toFormat(DATETIME_FORMAT);
}

export const BUILTIN_LAYOUT = [
  '### {{title}}',
  '',
  '{{content}}',
  '',
  '---',
  '',
  '- Time: {{datetime}}',
  '- Mentions: {{mentions}}',
  `- Sent by: ${AUTOMATION_LABEL}`,
  `- Signature: ${SIGNATURE_SCHEME}`
].join('\n');

export interface RenderInput {
  title?: string;
  now: DateTime;
  content: string;
  mentions: Mentions;
}

export class MessageRenderer {
  private layout: string;
  private usesTemplate: boolean;

  /**
   * @param template external layout; null or undefined selects the built-in layout
   */
  constructor(template?: string | null) {
    this.usesTemplate = template !== null && template !== undefined;
    this.layout = template ?? BUILTIN_LAYOUT;
  }

  hasExternalTemplate(): boolean {
    return this.usesTemplate;
  }

  render(input: RenderInput): RenderedMessage {
    const title = deriveTitle(input.title, input.content);
    const template = NotificationTemplate.create(this.layout);

    const values: Record<TemplatePlaceholder, string> = {
      title,
      datetime: formatDateTime(input.now),
      content: input.content,
      mentions: formatMentions(input.mentions)
    };
    template.setVariables(values);

    return { title, text: template.render() };
  }
}

/**
 * Read a layout template. A missing file means the built-in layout is used.
 */
export async function loadTemplate(templatePath: string): Promise<string | null> {
  try {
    return await readFile(templatePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}
