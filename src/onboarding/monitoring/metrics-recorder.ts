/**
 * Workflow metrics, one newline-delimited JSON record per run.
 */

import fs from 'fs';
import path from 'path';
import { WorkflowMetrics } from '../types';
import { OnboardingLogger } from '../utils/logger';

export const METRICS_FILE_NAME = 'workflow_metrics.json';

/** Written in place of a measured duration */
export const WORKFLOW_DURATION_PLACEHOLDER = 'automated';

export function calculateSuccessRate(processed: number, succeeded: number): number {
  return processed > 0 ? succeeded / processed : 0;
}

export class MetricsRecorder {
  private filePath: string;
  private logger: OnboardingLogger;
  private now: () => Date;

  constructor(outputDir: string, logger: OnboardingLogger, now: () => Date = () => new Date()) {
    this.filePath = path.join(outputDir, METRICS_FILE_NAME);
    this.logger = logger;
    this.now = now;
  }

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Append one record. Write errors propagate to the caller.
   */
  logWorkflowMetrics(employeesProcessed: number, successCount: number): WorkflowMetrics {
    const metrics: WorkflowMetrics = {
      timestamp: this.now().toISOString(),
      employees_processed: employeesProcessed,
      success_count: successCount,
      success_rate: calculateSuccessRate(employeesProcessed, successCount),
      workflow_duration: WORKFLOW_DURATION_PLACEHOLDER
    };

    fs.appendFileSync(this.filePath, JSON.stringify(metrics) + '\n', 'utf8');

    this.logger.info(`Workflow completed: ${successCount}/${employeesProcessed} successful`);
    return metrics;
  }
}
