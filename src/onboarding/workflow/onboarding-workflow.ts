/**
 * Onboarding workflow
 *
 * Fetches employees starting soon, then for each one in turn sends the
 * welcome email, posts the team announcement and writes the checklist.
 * A failure while processing one employee is logged and the batch moves on;
 * metrics are recorded once, after the last employee.
 */

import { AxiosInstance } from 'axios';
import { OnboardingConfig } from '../config';
import { EmployeeSource, SheetsEmployeeSource } from '../source/employee-source';
import {
  EmailNotificationAdapter,
  MailTransportFactory,
  NotificationResult,
  SlackNotificationAdapter
} from '../notification';
import { ChecklistGenerator, ChecklistOptions } from '../checklist/checklist-generator';
import { MetricsRecorder } from '../monitoring/metrics-recorder';
import { Checklist, Employee, WorkflowMetrics } from '../types';
import { OnboardingLogger } from '../utils/logger';
import { OnboardingError, OnboardingErrorHandler, OnboardingErrorType, toError } from '../utils/error-handler';

export interface WelcomeEmailSender {
  sendWelcomeEmail(employee: Employee): Promise<NotificationResult>;
}

export interface TeamNotifier {
  notifySlackTeam(employee: Employee): Promise<NotificationResult>;
}

export interface ChecklistWriter {
  createOnboardingChecklist(employee: Employee, options?: ChecklistOptions): Checklist;
}

export interface MetricsSink {
  logWorkflowMetrics(employeesProcessed: number, successCount: number): WorkflowMetrics;
}

export interface OnboardingWorkflowDeps {
  source: EmployeeSource;
  email: WelcomeEmailSender;
  slack: TeamNotifier;
  checklists: ChecklistWriter;
  metrics: MetricsSink;
  logger: OnboardingLogger;
}

export interface EmployeeOutcome {
  employee: string;
  emailSent: boolean;
  slackSent: boolean;
  checklistCreated: boolean;
  /** Both the email and the Slack notification went out */
  success: boolean;
  error?: string;
}

export type WorkflowStatus = 'completed' | 'no_new_employees' | 'source_unavailable';

export interface WorkflowRunResult {
  status: WorkflowStatus;
  processed: number;
  succeeded: number;
  outcomes: EmployeeOutcome[];
  metrics?: WorkflowMetrics;
  /** Why the employee list could not be determined */
  sourceError?: OnboardingError;
}

export class OnboardingWorkflow {
  private deps: OnboardingWorkflowDeps;
  private logger: OnboardingLogger;
  private errorHandler: OnboardingErrorHandler;

  constructor(deps: OnboardingWorkflowDeps) {
    this.deps = deps;
    this.logger = deps.logger;
    this.errorHandler = new OnboardingErrorHandler(deps.logger);
  }

  async run(): Promise<WorkflowRunResult> {
    this.logger.info('Starting onboarding workflow...');

    const fetched = await this.deps.source.fetchNewEmployees();
    if (!fetched.ok) {
      this.logger.warn('Employee list unavailable, nothing was processed', {
        reason: fetched.error.message
      });
      return { status: 'source_unavailable', processed: 0, succeeded: 0, outcomes: [], sourceError: fetched.error };
    }

    const employees = fetched.employees;
    if (employees.length === 0) {
      this.logger.info('No new employees found');
      return { status: 'no_new_employees', processed: 0, succeeded: 0, outcomes: [] };
    }

    const outcomes: EmployeeOutcome[] = [];
    for (const employee of employees) {
      outcomes.push(await this.processEmployee(employee));
    }

    const succeeded = outcomes.filter(outcome => outcome.success).length;
    const metrics = this.recordMetrics(employees.length, succeeded);

    return {
      status: 'completed',
      processed: employees.length,
      succeeded,
      outcomes,
      metrics
    };
  }

  async processEmployee(employee: Employee): Promise<EmployeeOutcome> {
    this.logger.info(`Processing onboarding for ${employee.name}`);

    const outcome: EmployeeOutcome = {
      employee: employee.name,
      emailSent: false,
      slackSent: false,
      checklistCreated: false,
      success: false
    };

    let stage: 'email' | 'slack' | 'checklist' = 'email';
    try {
      const email = await this.deps.email.sendWelcomeEmail(employee);
      outcome.emailSent = email.success;

      stage = 'slack';
      const slack = await this.deps.slack.notifySlackTeam(employee);
      outcome.slackSent = slack.success;

      stage = 'checklist';
      this.deps.checklists.createOnboardingChecklist(employee, { welcomeEmailSent: outcome.emailSent });
      outcome.checklistCreated = true;
    } catch (error) {
      const err = toError(error);
      outcome.error = err.message;
      this.errorHandler.handleError(err, {
        errorType: stage === 'checklist' ? OnboardingErrorType.CHECKLIST_WRITE_ERROR : OnboardingErrorType.UNKNOWN_ERROR,
        employee: employee.name,
        operation: `process_employee.${stage}`
      });
    }

    outcome.success = outcome.emailSent && outcome.slackSent;
    if (outcome.success) {
      this.logger.info(`Successfully processed ${employee.name}`);
    }

    return outcome;
  }

  private recordMetrics(processed: number, succeeded: number): WorkflowMetrics {
    try {
      return this.deps.metrics.logWorkflowMetrics(processed, succeeded);
    } catch (error) {
      const err = toError(error);
      throw new OnboardingError(err.message, OnboardingErrorType.METRICS_WRITE_ERROR, {
        operation: 'log_workflow_metrics',
        cause: err
      });
    }
  }
}

export interface WorkflowFactoryOptions {
  http?: AxiosInstance;
  transportFactory?: MailTransportFactory;
  now?: () => Date;
}

/**
 * Wire the production components from a resolved configuration
 */
export function createOnboardingWorkflow(
  config: OnboardingConfig,
  logger: OnboardingLogger,
  options: WorkflowFactoryOptions = {}
): OnboardingWorkflow {
  const timeoutMs = config.requestTimeoutMs;

  return new OnboardingWorkflow({
    source: new SheetsEmployeeSource(config.sheets, logger.createSubLogger('source'), {
      http: options.http,
      timeoutMs,
      now: options.now
    }),
    email: new EmailNotificationAdapter(config.mail, logger.createSubLogger('email'), {
      transportFactory: options.transportFactory,
      timeoutMs
    }),
    slack: new SlackNotificationAdapter(config.slack, logger.createSubLogger('slack'), {
      http: options.http,
      timeoutMs
    }),
    checklists: new ChecklistGenerator(config.outputDir, logger.createSubLogger('checklist'), options.now),
    metrics: new MetricsRecorder(config.outputDir, logger.createSubLogger('metrics'), options.now),
    logger
  });
}
