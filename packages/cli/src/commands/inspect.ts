import { HierarchyView } from '@infragram/emitter';
import chalk from 'chalk';
import { Command } from 'commander';

import { fail, printDiagnostics } from '../output';
import { runPipeline } from '../pipeline';

/** Box-drawing outline of the tree, one node per line. */
export function renderTree(root: HierarchyView): string[] {
  const lines = [root.label];

  const walk = (node: HierarchyView, prefix: string): void => {
    node.children.forEach((child, index) => {
      const last = index === node.children.length - 1;
      lines.push(`${prefix}${last ? '└─ ' : '├─ '}${child.label}`);
      walk(child, `${prefix}${last ? '   ' : '│  '}`);
    });
  };

  walk(root, '');
  return lines;
}

export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('Print the region / network tree of a folder of Terraform files')
    .argument('<folder>', 'Folder containing .tf and .tfvars files')
    .action(async (folder: string) => {
      try {
        const { hierarchy, diagnostics } = await runPipeline(folder);

        console.log('');
        for (const line of renderTree(hierarchy.root)) console.log(line);

        if (diagnostics.length > 0) {
          console.log(chalk.yellow(`\n${diagnostics.length} warning(s):`));
          printDiagnostics(diagnostics);
        }
      } catch (error) {
        fail('Inspection failed', error);
      }
    });
}
