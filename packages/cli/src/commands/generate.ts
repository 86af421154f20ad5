import { createEmitter, DEFAULT_TITLE, DIAGRAM_FORMATS, DiagramFormat } from '@infragram/emitter';
import { HierarchyResult, toHierarchyRecord } from '@infragram/hierarchy';
import chalk from 'chalk';
import { Command, Option } from 'commander';
// eslint-disable-next-line unicorn/import-style
import * as fs from 'node:fs/promises';
import path from 'node:path';

import { done, fail, printDiagnostics, step } from '../output';
import { runPipeline } from '../pipeline';

export const DEFAULT_OUTPUT = 'aws_architecture';

export type OutputFormat = DiagramFormat | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = [...DIAGRAM_FORMATS, 'json'];

interface GenerateOptions {
  output: string;
  format: string;
  title: string;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function render(hierarchy: HierarchyResult, format: OutputFormat, title: string): { script: string; extension: string } {
  if (format === 'json') return { script: `${JSON.stringify(toHierarchyRecord(hierarchy.root), null, 2)}\n`, extension: 'json' };

  const emitter = createEmitter(format);
  return { script: emitter.emit(hierarchy.root, { title }), extension: emitter.extension };
}

/** `aws_architecture` becomes `aws_architecture.dot`; a name with an extension is kept. */
export function outputPath(output: string, extension: string): string {
  return path.resolve(path.extname(output) ? output : `${output}.${extension}`);
}

export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Generate an architecture diagram script from a folder of Terraform files')
    .argument('<folder>', 'Folder containing .tf and .tfvars files')
    .option('-o, --output <file>', 'Output file; the format extension is added when missing', DEFAULT_OUTPUT)
    .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('dot'))
    .option('--title <title>', 'Diagram title', DEFAULT_TITLE)
    .action(async (folder: string, options: GenerateOptions) => {
      if (!isOutputFormat(options.format)) fail('Generation failed', `Unknown format "${options.format}"`);
      const format = options.format;

      try {
        const { hierarchy, diagnostics } = await runPipeline(folder);

        step(`Rendering ${format}...`);
        const { script, extension } = render(hierarchy, format, options.title);
        const target = outputPath(options.output, extension);
        await fs.writeFile(target, script, 'utf8');
        done(`Wrote ${target}`);

        if (diagnostics.length > 0) {
          console.log(chalk.yellow(`\n${diagnostics.length} warning(s):`));
          printDiagnostics(diagnostics);
        }

        console.log(chalk.bold.green('\n✓ Diagram generated\n'));
      } catch (error) {
        fail('Generation failed', error);
      }
    });
}
