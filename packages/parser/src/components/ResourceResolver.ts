import { DEFAULT_REGION, Diagnostic, Provider, ResourceNode, SourceLocation, TARGET_FAMILY } from '@infragram/model';

import { CompoundIdentifier, parseCompoundIdentifier } from '../alias';
import { AttributeValue, ModuleBlock, NestedBlock, ResourceBlock } from '../ast';
import { ProviderTable } from '../ProviderTable';
import { attributeText } from '../values';
import { SourceProgram } from './SourceProgram';

export interface ResourceCollection {
  resources: ResourceNode[];
  diagnostics: Diagnostic[];
}

export const MODULE_TYPE = 'module';

interface BlockOrigin extends SourceLocation {
  address: string;
}

// providers = { aws = aws.west, "aws.dns" = aws.east }
const PROVIDER_MAPPING = /"?([A-Z_a-z][\w-]*(?:\.[A-Z_a-z][\w-]*)?)"?\s*=\s*([A-Z_a-z][\w-]*(?:\s*\.\s*[A-Z_a-z][\w-]*)?)/g;

/**
 * Second stage: turns resource and module blocks into resource nodes stamped with
 * the region of the provider they bind to. Needs the complete provider table.
 */
export class ResourceResolver {
  constructor(private providers: ProviderTable) {}

  resolve(programs: SourceProgram[]): ResourceCollection {
    const resources: ResourceNode[] = [];
    const diagnostics: Diagnostic[] = [];

    for (const { source, program } of programs)
      for (const stmt of program)
        if (stmt.type === 'Resource') resources.push(this.resolveResource(stmt, source, diagnostics));
        else if (stmt.type === 'Module') resources.push(this.resolveModule(stmt, source, diagnostics));

    return { resources, diagnostics };
  }

  private resolveResource(block: ResourceBlock, source: string, diagnostics: Diagnostic[]): ResourceNode {
    const { provider, ...rest } = block.attributes;
    const binding = provider ? parseCompoundIdentifier(attributeText(provider)) : null;
    const origin = { source, line: block.line, column: block.column };
    const address = `${block.resourceType}.${block.name}`;

    return new ResourceNode({
      type: block.resourceType,
      name: block.name,
      region: this.resolveRegion(binding, familyOf(block.resourceType), { address, ...origin }, diagnostics),
      attributes: flattenAttributes(rest, block.blocks),
      origin,
    });
  }

  private resolveModule(block: ModuleBlock, source: string, diagnostics: Diagnostic[]): ResourceNode {
    const mapping = block.attributes.providers;
    const binding = mapping ? moduleBinding(attributeText(mapping)) : null;
    const origin = { source, line: block.line, column: block.column };
    const address = `${MODULE_TYPE}.${block.name}`;

    return new ResourceNode({
      type: MODULE_TYPE,
      name: block.name,
      region: this.resolveRegion(binding, TARGET_FAMILY, { address, ...origin }, diagnostics),
      attributes: flattenAttributes(block.attributes, block.blocks),
      origin,
    });
  }

  /**
   * Explicit provider first, then the family's default provider (or the AWS default), then DEFAULT_REGION.
   * A provider that was never declared is reported and skipped.
   */
  private resolveRegion(binding: CompoundIdentifier | null, family: string, origin: BlockOrigin, diagnostics: Diagnostic[]): string {
    if (binding) {
      const explicit = this.providers.get(binding.family, binding.alias);
      if (explicit) return explicit.region ?? DEFAULT_REGION;

      diagnostics.push({
        kind: 'UnresolvedProviderReference',
        message: `${origin.address} references undeclared provider "${Provider.keyOf(binding.family, binding.alias)}"; using the default provider region.`,
        source: origin.source,
        line: origin.line,
        column: origin.column,
      });
      return this.defaultRegion(binding.family);
    }

    return this.defaultRegion(family);
  }

  /** Families without a declared default provider (random, null, tls, ...) share the AWS one. */
  private defaultRegion(family: string): string {
    const provider = this.providers.getDefault(family) ?? this.providers.getDefault(TARGET_FAMILY);
    return provider?.region ?? DEFAULT_REGION;
  }
}

/** "aws_instance" belongs to the "aws" family. */
export function familyOf(resourceType: string): string {
  const [family] = resourceType.split('_');
  return family || resourceType;
}

function moduleBinding(mapping: string): CompoundIdentifier | null {
  const entries = [...mapping.matchAll(PROVIDER_MAPPING)];
  const entry = entries.find((match) => match[1] === TARGET_FAMILY) ?? entries[0];
  return entry ? parseCompoundIdentifier(entry[2]) : null;
}

function flattenAttributes(attributes: Record<string, AttributeValue>, blocks: NestedBlock[]): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(attributes)) flat[key] = attributeText(value);

  // Nested blocks are kept verbatim under their type; repeats are joined in order.
  for (const block of blocks) {
    const existing = flat[block.blockType];
    flat[block.blockType] = existing === undefined ? block.source : `${existing}\n${block.source}`;
  }

  return flat;
}
