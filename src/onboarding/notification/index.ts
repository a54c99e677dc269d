/**
 * Notification Module
 *
 * Welcome email over SMTP and a team announcement over a Slack incoming
 * webhook. Both adapters report failure through a NotificationResult instead
 * of throwing, so one channel failing never stops the other from being tried.
 */

import axios, { AxiosInstance, isAxiosError } from 'axios';
import nodemailer, { SendMailOptions } from 'nodemailer';
import { MailConfig, SlackConfig } from '../config';
import { Employee } from '../types';
import { OnboardingLogger } from '../utils/logger';
import { OnboardingError, OnboardingErrorHandler, OnboardingErrorType, toError } from '../utils/error-handler';

export interface NotificationResult {
  success: boolean;
  channel: string;
  messageId?: string;
  error?: string;
  timestamp: Date;
}

export interface NotificationAdapter {
  name: string;
  send(employee: Employee): Promise<NotificationResult>;
}

/**
 * `{{name}}` placeholder substitution
 */
export class NotificationTemplate {
  private template: string;
  private variables: Map<string, string> = new Map();

  constructor(template: string) {
    this.template = template;
  }

  setVariables(variables: Record<string, string>): void {
    for (const [name, value] of Object.entries(variables)) {
      this.variables.set(name, value);
    }
  }

  render(): string {
    let result = this.template;
    for (const [name, value] of this.variables.entries()) {
      const pattern = new RegExp(`\\{\\{${name}\\}\\}`, 'g');
      result = result.replace(pattern, () => value);
    }
    return result;
  }

  static create(template: string): NotificationTemplate {
    return new NotificationTemplate(template);
  }
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const WELCOME_EMAIL_TEMPLATE = `<html>
<body>
  <h2>Welcome to Our Team, {{name}}!</h2>

  <p>We're excited to have you join the <strong>{{department}}</strong> department.</p>

  <h3>Your Details:</h3>
  <ul>
    <li><strong>Start Date:</strong> {{startDate}}</li>
    <li><strong>Department:</strong> {{department}}</li>
    <li><strong>Manager:</strong> {{manager}}</li>
  </ul>

  <h3>Next Steps:</h3>
  <ol>
    <li>Your manager will contact you within 24 hours</li>
    <li>HR will send you onboarding documents</li>
    <li>IT will setup your accounts and equipment</li>
  </ol>

  <p>If you have any questions, please don't hesitate to reach out!</p>

  <p>Best regards,<br>
  HR Team</p>
</body>
</html>
`;

export function welcomeEmailSubject(employee: Employee): string {
  return `Welcome to the team, ${employee.name}!`;
}

export function renderWelcomeEmail(employee: Employee): string {
  const template = NotificationTemplate.create(WELCOME_EMAIL_TEMPLATE);
  template.setVariables({
    name: escapeHtml(employee.name),
    department: escapeHtml(employee.department),
    startDate: escapeHtml(employee.startDate),
    manager: escapeHtml(employee.manager)
  });
  return template.render();
}

export interface SlackField {
  title: string;
  value: string;
  short: boolean;
}

export interface SlackMessage {
  text: string;
  attachments: Array<{
    color: string;
    fields: SlackField[];
  }>;
}

export const SLACK_ANNOUNCEMENT_TEXT = '🎉 New Team Member Alert!';

export function buildSlackMessage(employee: Employee): SlackMessage {
  return {
    text: SLACK_ANNOUNCEMENT_TEXT,
    attachments: [
      {
        color: 'good',
        fields: [
          { title: 'Name', value: employee.name, short: true },
          { title: 'Department', value: employee.department, short: true },
          { title: 'Start Date', value: employee.startDate, short: true },
          { title: 'Manager', value: employee.manager, short: true }
        ]
      }
    ]
  };
}

/**
 * Base notification adapter: validation, logging and result wrapping
 */
export abstract class BaseNotificationAdapter implements NotificationAdapter {
  abstract name: string;
  protected abstract errorType: OnboardingErrorType;

  protected logger: OnboardingLogger;
  private errorHandler: OnboardingErrorHandler;

  constructor(logger: OnboardingLogger) {
    this.logger = logger;
    this.errorHandler = new OnboardingErrorHandler(logger);
  }

  async send(employee: Employee): Promise<NotificationResult> {
    try {
      this.validateEmployee(employee);

      const result = await this.doSend(employee);
      this.logger.info(this.successMessage(employee), undefined, this.name);

      return {
        success: true,
        channel: this.name,
        messageId: result.messageId,
        timestamp: new Date()
      };
    } catch (error) {
      const err = toError(error);
      this.errorHandler.handleError(
        new OnboardingError(err.message, this.errorType, {
          employee: employee.name,
          operation: this.name,
          details: this.errorDetails(error),
          cause: err
        })
      );

      return {
        success: false,
        channel: this.name,
        error: err.message,
        timestamp: new Date()
      };
    }
  }

  protected abstract doSend(employee: Employee): Promise<{ messageId?: string }>;

  protected abstract successMessage(employee: Employee): string;

  protected validateEmployee(employee: Employee): void {
    if (!employee.name) {
      throw new Error('Employee name is required');
    }
  }

  protected errorDetails(_error: unknown): Record<string, unknown> {
    return {};
  }
}

/**
 * The subset of a nodemailer transporter this module uses
 */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId?: string }>;
  close(): void;
}

export type MailTransportFactory = (config: MailConfig, timeoutMs: number) => MailTransport;

/**
 * SMTP submission: plaintext connection upgraded with STARTTLS, then login
 */
export const createSmtpTransport: MailTransportFactory = (config, timeoutMs) =>
  nodemailer.createTransport({
    host: config.smtpHost,
    port: config.smtpPort,
    secure: false,
    requireTLS: true,
    auth: {
      user: config.user,
      pass: config.appPassword
    },
    connectionTimeout: timeoutMs,
    greetingTimeout: timeoutMs,
    socketTimeout: timeoutMs
  });

export interface EmailAdapterOptions {
  transportFactory?: MailTransportFactory;
  timeoutMs?: number;
}

export class EmailNotificationAdapter extends BaseNotificationAdapter {
  name = 'email';
  protected errorType = OnboardingErrorType.EMAIL_ERROR;

  private config: MailConfig;
  private transportFactory: MailTransportFactory;
  private timeoutMs: number;

  constructor(config: MailConfig, logger: OnboardingLogger, options: EmailAdapterOptions = {}) {
    super(logger);
    this.config = config;
    this.transportFactory = options.transportFactory ?? createSmtpTransport;
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  sendWelcomeEmail(employee: Employee): Promise<NotificationResult> {
    return this.send(employee);
  }

  buildMail(employee: Employee): SendMailOptions {
    return {
      from: this.config.user,
      to: employee.email,
      subject: welcomeEmailSubject(employee),
      html: renderWelcomeEmail(employee)
    };
  }

  protected validateEmployee(employee: Employee): void {
    super.validateEmployee(employee);
    if (!employee.email) {
      throw new Error(`No email address for ${employee.name}`);
    }
  }

  protected async doSend(employee: Employee): Promise<{ messageId?: string }> {
    const transport = this.transportFactory(this.config, this.timeoutMs);
    try {
      const info = await transport.sendMail(this.buildMail(employee));
      return { messageId: info.messageId };
    } finally {
      transport.close();
    }
  }

  protected successMessage(employee: Employee): string {
    return `Welcome email sent to ${employee.name}`;
  }
}

export interface SlackAdapterOptions {
  http?: AxiosInstance;
  timeoutMs?: number;
}

export class SlackNotificationAdapter extends BaseNotificationAdapter {
  name = 'slack';
  protected errorType = OnboardingErrorType.WEBHOOK_ERROR;

  private config: SlackConfig;
  private http: AxiosInstance;

  constructor(config: SlackConfig, logger: OnboardingLogger, options: SlackAdapterOptions = {}) {
    super(logger);
    this.config = config;
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 10000 });
  }

  notifySlackTeam(employee: Employee): Promise<NotificationResult> {
    return this.send(employee);
  }

  protected async doSend(employee: Employee): Promise<{ messageId?: string }> {
    await this.http.post(this.config.webhookUrl, buildSlackMessage(employee), {
      headers: { 'Content-Type': 'application/json' }
    });
    return {};
  }

  protected successMessage(employee: Employee): string {
    return `Slack notification sent for ${employee.name}`;
  }

  protected errorDetails(error: unknown): Record<string, unknown> {
    if (isAxiosError(error) && error.response) {
      return { status: error.response.status };
    }
    return {};
  }
}
