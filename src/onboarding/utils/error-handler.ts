/**
 * Onboarding error handling
 * Typed workflow errors and the handler that logs them
 */

import { OnboardingLogger } from './logger';

export enum OnboardingErrorType {
  /** Spreadsheet request failed or returned a malformed payload */
  SOURCE_FETCH_ERROR = 'source_fetch_error',

  /** SMTP connection, login or send failed */
  EMAIL_ERROR = 'email_error',

  /** Slack webhook request failed */
  WEBHOOK_ERROR = 'webhook_error',

  /** Checklist file could not be written */
  CHECKLIST_WRITE_ERROR = 'checklist_write_error',

  /** Metrics file could not be appended to; ends the run */
  METRICS_WRITE_ERROR = 'metrics_write_error',

  /** Setting missing or unparseable, placeholder in use */
  CONFIGURATION_ERROR = 'configuration_error',

  /** Anything else */
  UNKNOWN_ERROR = 'unknown_error'
}

export interface OnboardingErrorContext {
  /** Error category, selects the log message */
  errorType: OnboardingErrorType;

  /** Name of the employee being processed, if any */
  employee?: string;

  /** Operation that failed */
  operation?: string;

  /** When the error was raised */
  timestamp: Date;

  /** Extra fields such as an HTTP status */
  details?: Record<string, unknown>;
}

export class OnboardingError extends Error {
  public readonly context: OnboardingErrorContext;

  constructor(
    message: string,
    errorType: OnboardingErrorType,
    options: { employee?: string; operation?: string; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message);
    this.name = 'OnboardingError';
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
    this.context = {
      errorType,
      employee: options.employee,
      operation: options.operation,
      timestamp: new Date(),
      details: options.details
    };
  }

  /**
   * Readable one-line form
   */
  toString(): string {
    return `[${this.context.errorType}] ${this.message} (Employee: ${this.context.employee || 'n/a'}, Operation: ${this.context.operation || 'unknown'})`;
  }
}

/**
 * Normalise anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class OnboardingErrorHandler {
  private logger: OnboardingLogger;

  constructor(logger: OnboardingLogger) {
    this.logger = logger;
  }

  /**
   * Log an error with whatever context is known at the catch site.
   * Context carried by an OnboardingError takes precedence.
   */
  handleError(error: unknown, context: Partial<OnboardingErrorContext> = {}): OnboardingErrorContext {
    const err = toError(error);
    const errorContext: OnboardingErrorContext = {
      errorType: OnboardingErrorType.UNKNOWN_ERROR,
      timestamp: new Date(),
      ...context
    };

    if (err instanceof OnboardingError) {
      errorContext.errorType = err.context.errorType;
      errorContext.employee = err.context.employee || errorContext.employee;
      errorContext.operation = err.context.operation || errorContext.operation;
      errorContext.details = {
        ...err.context.details,
        ...errorContext.details
      };
    }

    this.logError(err, errorContext);
    return errorContext;
  }

  /**
   * Log with the level and message prefix of the error type
   */
  private logError(error: Error, context: OnboardingErrorContext): void {
    const logData: Record<string, unknown> = {
      errorType: context.errorType
    };
    if (context.employee) logData.employee = context.employee;
    if (context.details && Object.keys(context.details).length > 0) logData.details = context.details;

    switch (context.errorType) {
      case OnboardingErrorType.SOURCE_FETCH_ERROR:
        this.logger.error(`Error fetching employees: ${error.message}`, error, logData, context.operation);
        break;

      case OnboardingErrorType.EMAIL_ERROR:
        this.logger.error(
          `Error sending email to ${context.employee ?? 'unknown'}: ${error.message}`,
          error,
          logData,
          context.operation
        );
        break;

      case OnboardingErrorType.WEBHOOK_ERROR:
        this.logger.error(`Error sending Slack notification: ${error.message}`, error, logData, context.operation);
        break;

      case OnboardingErrorType.CONFIGURATION_ERROR:
        this.logger.warn(`Configuration problem: ${error.message}`, logData, context.operation);
        break;

      case OnboardingErrorType.METRICS_WRITE_ERROR:
        this.logger.fatal(`Failed to record workflow metrics: ${error.message}`, error, logData, context.operation);
        break;

      default:
        this.logger.error(
          context.employee
            ? `Error processing ${context.employee}: ${error.message}`
            : `Onboarding error: ${error.message}`,
          error,
          logData,
          context.operation
        );
    }
  }
}
