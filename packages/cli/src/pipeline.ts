import { buildHierarchy, HierarchyResult } from '@infragram/hierarchy';
import { Diagnostic } from '@infragram/model';
import { parseConfiguration, ParseResult } from '@infragram/parser';

import { done, step } from './output';
import { readConfiguration } from './reader';

export interface PipelineResult {
  parsed: ParseResult;
  hierarchy: HierarchyResult;
  /** Parse diagnostics followed by hierarchy diagnostics. */
  diagnostics: Diagnostic[];
}

/** Read → parse → build, logging each step. */
export async function runPipeline(folder: string): Promise<PipelineResult> {
  step(`Reading Terraform files from ${folder}...`);
  const documents = await readConfiguration(folder);
  done(`${documents.length} file(s) read`);

  step('Parsing configuration...');
  const parsed = parseConfiguration(documents);
  done(`${parsed.providers.size} provider(s), ${parsed.resources.length} resource(s)`);

  step('Building AWS resource hierarchy...');
  const hierarchy = buildHierarchy(parsed.providers, parsed.resources);
  done(`${hierarchy.root.children.length} region(s)`);

  return { parsed, hierarchy, diagnostics: [...parsed.diagnostics, ...hierarchy.diagnostics] };
}
