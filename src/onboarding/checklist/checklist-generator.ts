/**
 * Onboarding checklist: a fixed six-task record per employee, written once
 * as pretty-printed JSON and never read back by the workflow.
 */

import fs from 'fs';
import path from 'path';
import { Checklist, ChecklistTask, Employee } from '../types';
import { OnboardingLogger } from '../utils/logger';

export interface ChecklistOptions {
  /**
   * Outcome of the welcome email. Sets the status of the "Send welcome email"
   * task; defaults to true.
   */
  welcomeEmailSent?: boolean;
}

/**
 * `checklist_<name>.json`, name lower-cased with spaces replaced by underscores.
 * Employees whose names normalise the same share a file.
 */
export function checklistFileName(employeeName: string): string {
  return `checklist_${employeeName.replace(/ /g, '_').toLowerCase()}.json`;
}

export function buildChecklist(employee: Employee, options: ChecklistOptions = {}, now: Date = new Date()): Checklist {
  const welcomeEmailSent = options.welcomeEmailSent ?? true;

  const tasks: ChecklistTask[] = [
    { task: 'Send welcome email', status: welcomeEmailSent ? 'completed' : 'pending', owner: 'HR' },
    { task: 'Prepare workspace', status: 'pending', owner: 'Facilities' },
    { task: 'Setup IT accounts', status: 'pending', owner: 'IT' },
    { task: 'Schedule first day meeting', status: 'pending', owner: employee.manager },
    { task: 'Assign buddy/mentor', status: 'pending', owner: 'HR' },
    { task: 'Order business cards', status: 'pending', owner: 'Marketing' }
  ];

  return {
    employee: employee.name,
    created: now.toISOString(),
    tasks
  };
}

export class ChecklistGenerator {
  private outputDir: string;
  private logger: OnboardingLogger;
  private now: () => Date;

  constructor(outputDir: string, logger: OnboardingLogger, now: () => Date = () => new Date()) {
    this.outputDir = outputDir;
    this.logger = logger;
    this.now = now;
  }

  filePathFor(employee: Employee): string {
    return path.join(this.outputDir, checklistFileName(employee.name));
  }

  /**
   * Build and persist the checklist. A failed write throws.
   */
  createOnboardingChecklist(employee: Employee, options: ChecklistOptions = {}): Checklist {
    const checklist = buildChecklist(employee, options, this.now());
    const filePath = this.filePathFor(employee);

    fs.writeFileSync(filePath, JSON.stringify(checklist, null, 2), 'utf8');

    this.logger.info(`Onboarding checklist created for ${employee.name}`, { file: filePath }, 'create_checklist');
    return checklist;
  }
}
