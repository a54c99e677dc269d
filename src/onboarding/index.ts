/**
 * Onboarding Assistant
 *
 * Polls a spreadsheet for employees starting within the week and sends each a
 * welcome email, announces them on Slack and writes their onboarding checklist.
 */

export * from './types';
export * from './config';
export * from './source/employee-source';
export * from './notification';
export * from './checklist/checklist-generator';
export * from './monitoring/metrics-recorder';
export * from './workflow/onboarding-workflow';
export * from './demo';
export * from './utils/logger';
export * from './utils/error-handler';
export * from './commands';
