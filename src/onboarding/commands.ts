/**
 * Command actions behind the CLI, returning the process exit code
 */

import fs from 'fs';
import chalk from 'chalk';
import { ConfigManager, OnboardingConfig } from './config';
import { OnboardingError, OnboardingErrorHandler, OnboardingErrorType } from './utils/error-handler';
import { OnboardingLogger, createOnboardingLogger } from './utils/logger';
import { WorkflowRunResult, createOnboardingWorkflow } from './workflow/onboarding-workflow';

export interface RunnableWorkflow {
  run(): Promise<WorkflowRunResult>;
}

export interface RunCommandOptions {
  configManager?: ConfigManager;
  /** Defaults to console plus `<outputDir>/onboarding.log` */
  createLogger?: (config: OnboardingConfig) => OnboardingLogger;
  createWorkflow?: (config: OnboardingConfig, logger: OnboardingLogger) => RunnableWorkflow;
}

/**
 * Run the onboarding workflow once and report the outcome.
 * Exit code 1 when the spreadsheet could not be read or the run failed.
 */
export async function runOnboardingCommand(options: RunCommandOptions = {}): Promise<number> {
  const configManager = options.configManager ?? new ConfigManager();
  const config = configManager.getConfig();
  const logger = options.createLogger
    ? options.createLogger(config)
    : createOnboardingLogger(config.outputDir, config.logLevel);
  const errorHandler = new OnboardingErrorHandler(logger);

  for (const warning of configManager.validate()) {
    errorHandler.handleError(
      new OnboardingError(warning, OnboardingErrorType.CONFIGURATION_ERROR, { operation: 'config' })
    );
  }

  try {
    fs.mkdirSync(config.outputDir, { recursive: true });

    const workflow = options.createWorkflow
      ? options.createWorkflow(config, logger)
      : createOnboardingWorkflow(config, logger);
    const result = await workflow.run();

    switch (result.status) {
      case 'completed':
        console.log(chalk.green(`✓ Processed ${result.processed} employees, ${result.succeeded} fully notified`));
        return 0;
      case 'no_new_employees':
        console.log(chalk.yellow('No employees starting within the next 7 days'));
        return 0;
      case 'source_unavailable':
        console.log(chalk.red(`✗ Could not read the employee spreadsheet: ${result.sourceError?.message}`));
        return 1;
    }
  } catch (error) {
    errorHandler.handleError(error, { operation: 'run' });
    console.error(chalk.red('✗ Onboarding workflow failed'));
    return 1;
  }
}
