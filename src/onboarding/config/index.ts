/**
 * Configuration Management Module
 *
 * Resolves onboarding settings from environment variables, falling back to
 * literal placeholders. Placeholders are not usable credentials: a run against
 * them fails at the first network call and says so in the log.
 */

import { LogLevel, parseLogLevel } from '../utils/logger';

export interface MailConfig {
  user: string;
  appPassword: string;
  smtpHost: string;
  smtpPort: number;
}

export interface SlackConfig {
  webhookUrl: string;
}

export interface SheetsConfig {
  sheetId: string;
  apiKey: string;
  range: string;
}

export interface OnboardingConfig {
  mail: MailConfig;
  slack: SlackConfig;
  sheets: SheetsConfig;
  requestTimeoutMs: number;
  outputDir: string;
  logLevel: LogLevel;
}

export type Environment = Record<string, string | undefined>;

export const DEFAULTS = {
  GMAIL_USER: 'your_email@gmail.com',
  GMAIL_APP_PASSWORD: 'your_app_password',
  SLACK_WEBHOOK: 'https://hooks.slack.com/your_webhook',
  SHEETS_ID: 'your_sheet_id',
  SHEETS_API_KEY: 'your_api_key',
  SHEETS_RANGE: 'Sheet1!A:E',
  SMTP_HOST: 'smtp.gmail.com',
  SMTP_PORT: '587',
  REQUEST_TIMEOUT_MS: '10000'
} as const;

export type ConfigKey = keyof typeof DEFAULTS;

const PLACEHOLDER_KEYS: ConfigKey[] = [
  'GMAIL_USER',
  'GMAIL_APP_PASSWORD',
  'SLACK_WEBHOOK',
  'SHEETS_ID',
  'SHEETS_API_KEY'
];

export class ConfigManager {
  private env: Environment;
  private config: OnboardingConfig;

  constructor(env: Environment = process.env, cwd: string = process.cwd()) {
    this.env = env;
    this.config = this.load(cwd);
  }

  getConfig(): OnboardingConfig {
    return {
      ...this.config,
      mail: { ...this.config.mail },
      slack: { ...this.config.slack },
      sheets: { ...this.config.sheets }
    };
  }

  /**
   * Set, non-empty environment value, else the literal default
   */
  get(key: ConfigKey): string {
    const value = this.env[key];
    return value !== undefined && value !== '' ? value : DEFAULTS[key];
  }

  /**
   * Warnings for settings still at their placeholder or not parseable.
   * Never throws.
   */
  validate(): string[] {
    const warnings: string[] = [];

    for (const key of PLACEHOLDER_KEYS) {
      if (this.get(key) === DEFAULTS[key]) {
        warnings.push(`${key} is not set, using placeholder "${DEFAULTS[key]}"`);
      }
    }

    if (!isPositiveInteger(this.get('SMTP_PORT'))) {
      warnings.push(`SMTP_PORT "${this.get('SMTP_PORT')}" is not a valid port, using ${DEFAULTS.SMTP_PORT}`);
    }
    if (!isPositiveInteger(this.get('REQUEST_TIMEOUT_MS'))) {
      warnings.push(
        `REQUEST_TIMEOUT_MS "${this.get('REQUEST_TIMEOUT_MS')}" is not a valid timeout, using ${DEFAULTS.REQUEST_TIMEOUT_MS}`
      );
    }

    return warnings;
  }

  private load(cwd: string): OnboardingConfig {
    return {
      mail: {
        user: this.get('GMAIL_USER'),
        appPassword: this.get('GMAIL_APP_PASSWORD'),
        smtpHost: this.get('SMTP_HOST'),
        smtpPort: this.getInteger('SMTP_PORT')
      },
      slack: {
        webhookUrl: this.get('SLACK_WEBHOOK')
      },
      sheets: {
        sheetId: this.get('SHEETS_ID'),
        apiKey: this.get('SHEETS_API_KEY'),
        range: this.get('SHEETS_RANGE')
      },
      requestTimeoutMs: this.getInteger('REQUEST_TIMEOUT_MS'),
      outputDir: this.env.ONBOARDING_OUTPUT_DIR || cwd,
      logLevel: parseLogLevel(this.env.LOG_LEVEL)
    };
  }

  private getInteger(key: 'SMTP_PORT' | 'REQUEST_TIMEOUT_MS'): number {
    const value = this.get(key);
    return isPositiveInteger(value) ? parseInt(value, 10) : parseInt(DEFAULTS[key], 10);
  }
}

function isPositiveInteger(value: string): boolean {
  return /^\d+$/.test(value) && parseInt(value, 10) > 0;
}
