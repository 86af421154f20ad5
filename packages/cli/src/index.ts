#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';

import { createGenerateCommand } from './commands/generate';
import { createInspectCommand } from './commands/inspect';
import { createValidateCommand } from './commands/validate';

const program = new Command();

program.name('infragram').description('Architecture diagrams from Terraform configuration').version('0.1.0');

program.addCommand(createGenerateCommand());
program.addCommand(createInspectCommand());
program.addCommand(createValidateCommand());

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Unexpected error:'), error instanceof Error ? error.message : error);
  process.exit(1);
});
