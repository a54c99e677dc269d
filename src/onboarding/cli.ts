#!/usr/bin/env node

/**
 * Onboarding assistant command line
 */

import { Command } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import { runOnboardingCommand } from './commands';
import { ConfigManager } from './config';
import { runDemo, sampleEmployee } from './demo';
import { renderWelcomeEmail } from './notification';
import { OnboardingErrorHandler } from './utils/error-handler';
import { createOnboardingLogger } from './utils/logger';

dotenv.config();

const program = new Command();

program
  .name('onboarding-assistant')
  .description('Welcome new employees: email, Slack announcement and onboarding checklist')
  .version('1.0.0');

program
  .command('run', { isDefault: true })
  .description('Run the onboarding workflow against the configured spreadsheet')
  .action(async () => {
    process.exitCode = await runOnboardingCommand();
  });

program
  .command('demo')
  .description('Exercise email rendering, checklist creation and metrics logging with a sample employee')
  .option('-o, --output <dir>', 'directory for generated files')
  .action((options: { output?: string }) => {
    const config = new ConfigManager().getConfig();
    const outputDir = options.output ?? config.outputDir;
    const logger = createOnboardingLogger(outputDir, config.logLevel);

    console.log(chalk.blue('Employee Onboarding Assistant - demo'));

    try {
      const result = runDemo({ outputDir, logger });
      console.log(chalk.green(`✓ Email template generated for ${result.employee.name}`));
      console.log(chalk.green('✓ Checklist created'));
      console.log(chalk.green('✓ Metrics logged'));
      console.log(chalk.blue('\nGenerated files:'));
      for (const file of result.files) {
        console.log(`  - ${file}`);
      }
    } catch (error) {
      new OnboardingErrorHandler(logger).handleError(error, { operation: 'demo' });
      process.exitCode = 1;
    }
  });

program
  .command('email-preview')
  .description('Print the welcome email HTML for the sample employee')
  .action(() => {
    console.log(renderWelcomeEmail(sampleEmployee()));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('✗'), error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
