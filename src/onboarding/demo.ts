/**
 * Offline demonstration: renders the welcome email, writes a checklist and
 * records one metrics line for a sample employee. No network calls are made.
 */

import fs from 'fs';
import path from 'path';
import { ChecklistGenerator } from './checklist/checklist-generator';
import { MetricsRecorder } from './monitoring/metrics-recorder';
import { renderWelcomeEmail } from './notification';
import { formatIsoDate } from './source/employee-source';
import { Checklist, Employee, WorkflowMetrics } from './types';
import { OnboardingLogger } from './utils/logger';

export function sampleEmployee(now: Date = new Date()): Employee {
  const start = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 3);
  return {
    name: 'John Doe',
    email: 'john.doe@company.com',
    department: 'Engineering',
    startDate: formatIsoDate(start),
    manager: 'Jane Smith'
  };
}

export interface DemoOptions {
  outputDir: string;
  logger: OnboardingLogger;
  now?: () => Date;
}

export interface DemoResult {
  employee: Employee;
  emailBody: string;
  checklist: Checklist;
  metrics: WorkflowMetrics;
  files: string[];
}

export function runDemo(options: DemoOptions): DemoResult {
  const now = options.now ?? (() => new Date());
  const employee = sampleEmployee(now());

  fs.mkdirSync(options.outputDir, { recursive: true });

  const emailBody = renderWelcomeEmail(employee);

  const checklists = new ChecklistGenerator(options.outputDir, options.logger.createSubLogger('checklist'), now);
  const checklist = checklists.createOnboardingChecklist(employee);

  const recorder = new MetricsRecorder(options.outputDir, options.logger.createSubLogger('metrics'), now);
  const metrics = recorder.logWorkflowMetrics(1, 1);

  return {
    employee,
    emailBody,
    checklist,
    metrics,
    files: [
      path.join(options.outputDir, 'onboarding.log'),
      checklists.filePathFor(employee),
      recorder.getFilePath()
    ]
  };
}
