import { Diagnostic } from '@infragram/model';
import chalk from 'chalk';
import { Command } from 'commander';

import { fail, printDiagnostics } from '../output';
import { runPipeline } from '../pipeline';

interface ValidateOptions {
  strict?: boolean;
}

export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Report parse and placement diagnostics for a folder of Terraform files')
    .argument('<folder>', 'Folder containing .tf and .tfvars files')
    .option('--strict', 'Exit with status 1 when any diagnostic is reported')
    .action(async (folder: string, options: ValidateOptions) => {
      console.log(chalk.bold(`\nValidating ${folder}...\n`));

      let diagnostics: Diagnostic[] = [];
      try {
        ({ diagnostics } = await runPipeline(folder));
      } catch (error) {
        fail('Validation failed', error);
      }

      if (diagnostics.length === 0) {
        console.log(chalk.bold.green('\n✓ Configuration is valid\n'));
        return;
      }

      console.log(chalk.yellow(`\n⚠ ${diagnostics.length} issue(s) found:`));
      printDiagnostics(diagnostics);

      if (options.strict) {
        console.log(chalk.red('\n✗ Validation failed (--strict)'));
        process.exit(1);
      }
    });
}
