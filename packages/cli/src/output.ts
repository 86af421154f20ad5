import { Diagnostic, formatDiagnostic } from '@infragram/model';
import chalk from 'chalk';

export function step(message: string): void {
  console.log(chalk.cyan(`→ ${message}`));
}

export function done(message: string): void {
  console.log(chalk.green(`  ✓ ${message}`));
}

export function printDiagnostics(diagnostics: Diagnostic[]): void {
  for (const diagnostic of diagnostics) console.log(chalk.yellow(`  ⚠ ${formatDiagnostic(diagnostic)}`));
}

/** Prints the error in red and exits with status 1. */
export function fail(context: string, error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`✗ ${context}:`), message);
  process.exit(1);
}
