export type AttributeValue =
  | { type: 'String'; value: string }
  | { type: 'Number'; value: number }
  | { type: 'Boolean'; value: boolean }
  | { type: 'Reference'; value: string[] } // e.g., ["aws_vpc", "main", "id"]
  | { type: 'Expression'; value: string }; // verbatim source of lists, maps, calls, conditionals...

/** A block inside a block body, e.g. `ingress { ... }` or `dynamic "tag" { ... }`. */
export interface NestedBlock {
  blockType: string;
  labels: string[];
  attributes: Record<string, AttributeValue>;
  blocks: NestedBlock[];
  source: string; // verbatim text from the block type to the closing brace
}

interface BlockBase {
  attributes: Record<string, AttributeValue>;
  blocks: NestedBlock[];
  line: number;
  column: number;
}

export interface ResourceBlock extends BlockBase {
  type: 'Resource';
  resourceType: string; // e.g., "aws_instance"
  name: string; // e.g., "web"
}

export interface DataBlock extends BlockBase {
  type: 'Data';
  dataSourceType: string; // e.g., "aws_ami"
  name: string; // e.g., "ubuntu"
}

export interface ProviderBlock extends BlockBase {
  type: 'Provider';
  name: string; // header label as written, e.g. "aws" or "aws.west"
}

export interface ModuleBlock extends BlockBase {
  type: 'Module';
  name: string;
}

export interface VariableBlock extends BlockBase {
  type: 'Variable';
  name: string; // e.g., "environment"
}

export interface OutputBlock extends BlockBase {
  type: 'Output';
  name: string;
}

/** `locals`, `terraform`, `moved`, `import` and other blocks kept only to be skipped. */
export interface GenericBlock extends BlockBase {
  type: 'Block';
  keyword: string;
  labels: string[];
}

/** Top-level `key = value`, as found in .tfvars files. */
export interface Assignment {
  type: 'Assignment';
  name: string;
  value: AttributeValue;
  line: number;
  column: number;
}

export type Statement = ResourceBlock | DataBlock | ProviderBlock | ModuleBlock | VariableBlock | OutputBlock | GenericBlock | Assignment;
export type Program = Statement[];
