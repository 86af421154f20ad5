import { ResourceNode } from '@infragram/model';

/**
 * Region-qualified lookup of the nodes created for declared resources.
 * Keys look like `us-east-1/aws_vpc.main`, so equal addresses in two regions never meet.
 */
export class ScopeIndex {
  private nodes: Map<string, ResourceNode> = new Map();
  // Registration order, used for "most recently created" lookups
  private order: ResourceNode[] = [];

  static qualify(region: string, address: string): string {
    return `${region}/${address}`;
  }

  register(node: ResourceNode): void {
    this.nodes.set(node.id, node);
    this.order.push(node);
  }

  has(region: string, address: string): boolean {
    return this.nodes.has(ScopeIndex.qualify(region, address));
  }

  /** The most recently registered node of the region whose address is among `addresses`. */
  mostRecent(region: string, addresses: string[]): ResourceNode | undefined {
    const wanted = new Set(addresses.map((address) => ScopeIndex.qualify(region, address)));
    return this.findLast((node) => wanted.has(node.id));
  }

  /** The most recently registered node of the region matching `predicate`. */
  mostRecentWhere(region: string, predicate: (node: ResourceNode) => boolean): ResourceNode | undefined {
    return this.findLast((node) => node.region === region && predicate(node));
  }

  clear(): void {
    this.nodes.clear();
    this.order = [];
  }

  private findLast(predicate: (node: ResourceNode) => boolean): ResourceNode | undefined {
    for (let i = this.order.length - 1; i >= 0; i--) if (predicate(this.order[i])) return this.order[i];
    return undefined;
  }
}
