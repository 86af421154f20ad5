import { Diagnostic, isNetworkType, isSubnetType, ResourceNode } from '@infragram/model';
import { ProviderTable } from '@infragram/parser';

import { containmentRuleFor, Placement, placementOf } from './placement';
import { extractReferences, typeOfAddress } from './references';
import { instantiateRegion, RegionScope } from './RegionTemplate';
import { ScopeIndex } from './ScopeIndex';

export interface HierarchyResult {
  root: ResourceNode;
  diagnostics: Diagnostic[];
}

interface PendingNode {
  node: ResourceNode;
  placement: Placement;
  references: string[];
}

/**
 * Groups parsed resources under root → region → network → subnet scopes.
 * The input nodes are never attached themselves: every resource gets its own tree
 * node, so the same parse result can be built any number of times.
 */
export class HierarchyBuilder {
  private root: ResourceNode = ResourceNode.root();
  private regions: Map<string, RegionScope> = new Map();
  private index: ScopeIndex = new ScopeIndex();
  private references: Map<ResourceNode, string[]> = new Map();
  private diagnostics: Diagnostic[] = [];

  constructor(private providers: ProviderTable) {}

  build(resources: readonly ResourceNode[]): HierarchyResult {
    this.reset();

    // 1. Regions declared by providers come first, in provider order
    for (const region of this.providers.regions()) this.scopeFor(region);

    // 2. Create a tree node per resource; the first network of a region claims its placeholder
    const pending = resources.map((resource) => this.createNode(resource));

    // 3. Attach in declaration order
    for (const item of pending) this.attach(item);

    return { root: this.root, diagnostics: this.diagnostics };
  }

  private reset(): void {
    this.root = ResourceNode.root();
    this.regions = new Map();
    this.index.clear();
    this.references = new Map();
    this.diagnostics = [];
  }

  private scopeFor(region: string): RegionScope {
    const existing = this.regions.get(region);
    if (existing) return existing;

    const scope = instantiateRegion(region);
    this.root.addChild(scope.node);
    this.regions.set(region, scope);
    return scope;
  }

  private createNode(resource: ResourceNode): PendingNode {
    const scope = this.scopeFor(resource.region);
    const placement = placementOf(resource.type);
    const references = extractReferences(resource.attributes);

    let node: ResourceNode;
    if (placement === 'network' && scope.network.isPlaceholder) {
      scope.network.adopt(resource);
      node = scope.network;
    } else node = new ResourceNode({ ...resource.toRecord(), kind: placement === 'network' || placement === 'subnet' ? 'network' : 'resource', origin: resource.origin });

    this.index.register(node);
    this.references.set(node, references);
    return { node, placement, references };
  }

  private attach(item: PendingNode): void {
    const { node } = item;
    // A network that claimed the placeholder is already in place
    if (node.parent) return;

    const scope = this.scopeFor(node.region);
    const missing: string[] = [];
    const parent = this.resolveParent(item, scope, missing);

    for (const reference of missing) this.report(node, `${node.address} references ${reference}, which is not declared in ${node.region}; attached under ${parent.label} instead.`);

    parent.addChild(node);
  }

  private resolveParent(item: PendingNode, scope: RegionScope, missing: string[]): ResourceNode {
    switch (item.placement) {
      case 'network': {
        return scope.node;
      }
      case 'subnet': {
        return this.referencedScope(item, isNetworkType, missing) ?? scope.network;
      }
      case 'region': {
        return this.nearestScope(item, missing) ?? scope.node;
      }
      default: {
        return this.containerOf(item, missing) ?? this.nearestScope(item, missing) ?? scope.network;
      }
    }
  }

  /** Referenced subnet, else referenced network. */
  private nearestScope(item: PendingNode, missing: string[]): ResourceNode | undefined {
    return this.referencedScope(item, isSubnetType, missing) ?? this.referencedScope(item, isNetworkType, missing);
  }

  /**
   * Most recently created node among the references whose type passes `accepts`.
   * References to nodes that do not exist in the resource's region are added to `missing`.
   */
  private referencedScope(item: PendingNode, accepts: (type: string) => boolean, missing: string[]): ResourceNode | undefined {
    const region = item.node.region;
    const candidates = item.references.filter((reference) => accepts(typeOfAddress(reference)));

    const found = candidates.filter((reference) => this.index.has(region, reference));
    for (const reference of candidates) if (!found.includes(reference)) missing.push(reference);

    return this.index.mostRecent(region, found);
  }

  private containerOf(item: PendingNode, missing: string[]): ResourceNode | undefined {
    const rule = containmentRuleFor(item.node.type);
    if (!rule) return undefined;

    if (rule.referencedBy === 'child') return this.referencedScope(item, (type) => type === rule.container, missing);

    // The container names the child: find the latest container of the region pointing at this node
    const address = item.node.address;
    return this.index.mostRecentWhere(item.node.region, (candidate) => candidate.type === rule.container && (this.references.get(candidate) ?? []).includes(address));
  }

  private report(node: ResourceNode, message: string): void {
    this.diagnostics.push({ kind: 'StructuralInconsistency', message, ...node.origin });
  }
}

/** Builds the region tree for a parsed configuration. Never throws for missing region information. */
export function buildHierarchy(providers: ProviderTable, resources: readonly ResourceNode[]): HierarchyResult {
  return new HierarchyBuilder(providers).build(resources);
}
