import { ResourceNode } from '@infragram/model';

export interface RegionScope {
  node: ResourceNode;
  /** First network scope of the region: the placeholder, or the network that claimed it. */
  network: ResourceNode;
}

/**
 * Sub-tree every discovered region starts from: the region node and an empty
 * network placeholder. Each call returns fresh nodes.
 */
export function instantiateRegion(region: string): RegionScope {
  const node = ResourceNode.regionScope(region);
  const network = ResourceNode.networkPlaceholder(region);
  node.addChild(network);
  return { node, network };
}
