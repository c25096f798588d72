/**
 * Configuration Management Module
 *
 * Builds the run configuration from defaults, environment variables (a .env
 * file is loaded first) and an optional local YAML override file, in that
 * order of increasing precedence. The result is passed explicitly to the
 * dispatcher; nothing reads it from module state.
 */

import dotenv from 'dotenv';
import fs from 'fs';
import yaml from 'js-yaml';
import { IANAZone } from 'luxon';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../error-handling';
import { DEFAULT_WINDOW_MINUTES } from '../scheduler';
import { LogLevel, parseLogLevel } from '../utils/logger';

export interface NotifierConfig {
  webhookUrl?: string;
  secret?: string;
  /** IANA zone in which task dates and times are read */
  timezone: string;
  windowMinutes: number;
  tasksFile: string;
  templateFile: string;
  deliveryTimeout: number; // milliseconds
  fetchTimeout: number; // milliseconds
  logLevel: LogLevel;
}

export const DEFAULT_LOCAL_CONFIG_FILE = 'notifier.local.yaml';

const localConfigSchema = z.object({
  webhookUrl: z.string().optional(),
  secret: z.string().optional(),
  timezone: z.string().optional(),
  windowMinutes: z.number().nonnegative().optional(),
  tasksFile: z.string().optional(),
  templateFile: z.string().optional(),
  deliveryTimeout: z.number().positive().optional(),
  fetchTimeout: z.number().positive().optional(),
  logLevel: z.nativeEnum(LogLevel).optional()
});

export interface ConfigManagerOptions {
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Override file; defaults to NOTIFIER_CONFIG or notifier.local.yaml in the working directory */
  localConfigPath?: string;
  /** Load .env from the working directory into process.env; only applies when env is process.env */
  loadDotenv?: boolean;
  cwd?: string;
}

export class ConfigManager {
  private config: NotifierConfig;
  private env: NodeJS.ProcessEnv;
  private options: ConfigManagerOptions;

  constructor(options: ConfigManagerOptions = {}) {
    this.options = options;
    this.env = options.env ?? process.env;
    this.config = this.loadDefaultConfig();
    this.loadConfig();
  }

  getConfig(): NotifierConfig {
    return { ...this.config };
  }

  getLocalConfigPath(): string {
    const cwd = this.options.cwd ?? process.cwd();
    return path.resolve(cwd, this.options.localConfigPath ?? this.env.NOTIFIER_CONFIG ?? DEFAULT_LOCAL_CONFIG_FILE);
  }

  private loadConfig(): void {
    if (this.options.loadDotenv !== false && this.env === process.env) {
      dotenv.config({ path: path.join(this.options.cwd ?? process.cwd(), '.env') });
    }

    this.applyEnvironmentOverrides();

    const fileConfig = this.loadFileConfig();
    if (fileConfig) {
      this.config = { ...this.config, ...fileConfig };
    }

    this.validate();
  }

  /**
   * Read the local YAML override. A missing file is not an error; a malformed one is.
   */
  private loadFileConfig(): Partial<NotifierConfig> | null {
    const filePath = this.getLocalConfigPath();
    if (!fs.existsSync(filePath)) {
      return null;
    }

    let document: unknown;
    try {
      document = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      const reason = getErrorMessage(error);
      throw new ConfigurationError(`Cannot parse local config ${filePath}: ${reason}`, { filePath });
    }

    const parsed = localConfigSchema.safeParse(document ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ConfigurationError(`Invalid local config ${filePath}: ${issues}`, { filePath });
    }

    const overrides: Partial<NotifierConfig> = {};
    for (const [key, value] of Object.entries(parsed.data)) {
      if (value !== undefined) {
        Object.assign(overrides, { [key]: value });
      }
    }
    return overrides;
  }

  private applyEnvironmentOverrides(): void {
    const env = this.env;

    const logLevel = parseLogLevel(env.LOG_LEVEL);
    if (logLevel) {
      this.config.logLevel = logLevel;
    }

    if (env.WEBHOOK_URL) {
      this.config.webhookUrl = env.WEBHOOK_URL;
    }
    const secret = env.WEBHOOK_SECRET || env.SECRET;
    if (secret) {
      this.config.secret = secret;
    }

    if (env.NOTIFIER_TIMEZONE) {
      this.config.timezone = env.NOTIFIER_TIMEZONE;
    }
    if (env.NOTIFIER_TASKS_FILE) {
      this.config.tasksFile = env.NOTIFIER_TASKS_FILE;
    }
    if (env.NOTIFIER_TEMPLATE_FILE) {
      this.config.templateFile = env.NOTIFIER_TEMPLATE_FILE;
    }

    this.config.windowMinutes = readNumber(env.NOTIFIER_WINDOW_MINUTES, this.config.windowMinutes);
    this.config.deliveryTimeout = readNumber(env.NOTIFIER_DELIVERY_TIMEOUT, this.config.deliveryTimeout);
    this.config.fetchTimeout = readNumber(env.NOTIFIER_FETCH_TIMEOUT, this.config.fetchTimeout);
  }

  private loadDefaultConfig(): NotifierConfig {
    return {
      timezone: 'Asia/Shanghai',
      windowMinutes: DEFAULT_WINDOW_MINUTES,
      tasksFile: 'tasks.json',
      templateFile: 'template.md',
      deliveryTimeout: 10000, // 10 seconds
      fetchTimeout: 10000, // 10 seconds
      logLevel: LogLevel.INFO
    };
  }

  /**
   * Settings every command needs. Webhook URL and secret are checked only
   * when delivering, see requireDeliveryConfig.
   */
  private validate(): void {
    const problems: string[] = [];

    if (!IANAZone.isValidZone(this.config.timezone)) {
      problems.push(`Unknown timezone: ${this.config.timezone}`);
    }
    if (!Number.isFinite(this.config.windowMinutes) || this.config.windowMinutes < 0) {
      problems.push(`Window must not be negative: ${this.config.windowMinutes} minutes`);
    }

    if (problems.length > 0) {
      throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, { problems });
    }
  }
}

/**
 * Throw when a webhook URL or secret is missing; delivery must not be attempted then.
 */
export function requireDeliveryConfig(config: Pick<NotifierConfig, 'webhookUrl' | 'secret'>): void {
  const missing: string[] = [];
  if (!config.webhookUrl) missing.push('webhook URL');
  if (!config.secret) missing.push('signing secret');

  if (missing.length > 0) {
    throw new ConfigurationError(`Missing ${missing.join(' and ')} in configuration`, { missing });
  }
}

function readNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const num = Number(value);
  return Number.isFinite(num) ? num : fallback;
}
