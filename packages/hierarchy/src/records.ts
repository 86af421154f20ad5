import { NodeKind, ResourceNode } from '@infragram/model';

export interface HierarchyRecord {
  label: string;
  kind: NodeKind;
  region: string | null;
  children: HierarchyRecord[];
}

export function toHierarchyRecord(node: ResourceNode): HierarchyRecord {
  return {
    label: node.label,
    kind: node.kind,
    region: node.kind === 'root' ? null : node.region,
    children: node.children.map((child) => toHierarchyRecord(child)),
  };
}
