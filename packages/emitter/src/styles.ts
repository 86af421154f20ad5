import { NodeKind } from '@infragram/model';

export type DotAttributes = Record<string, string>;

export interface NodeStyle {
  /** Drawn as a cluster even when it has no children. */
  alwaysCluster: boolean;
  cluster: DotAttributes;
  node: DotAttributes;
  /** Mermaid classDef body. */
  mermaid: string;
}

export const GRAPH_DEFAULTS: DotAttributes = { splines: 'ortho', rankdir: 'TB', layout: 'dot', labelloc: 't', fontsize: '16' };
export const NODE_DEFAULTS: DotAttributes = { fontsize: '12', labelloc: 'b', imagepos: 'tc' };
export const EDGE_DEFAULTS: DotAttributes = { minlen: '2', penwidth: '2.0', color: '#666666' };

// AWS architecture icon palette
export const NODE_KIND_STYLES: Record<NodeKind, NodeStyle> = {
  root: {
    alwaysCluster: true,
    cluster: { style: 'rounded', color: '#232F3E', fontcolor: '#232F3E', margin: '16' },
    node: {},
    mermaid: 'fill:#FFFFFF,stroke:#232F3E,color:#232F3E',
  },
  region: {
    alwaysCluster: true,
    cluster: { style: 'dashed', color: '#147EBA', fontcolor: '#147EBA', margin: '24' },
    node: {},
    mermaid: 'fill:#FFFFFF,stroke:#147EBA,stroke-dasharray:5 5,color:#147EBA',
  },
  network: {
    alwaysCluster: true,
    cluster: { style: 'rounded', color: '#8C4FFF', fontcolor: '#8C4FFF', margin: '20' },
    node: {},
    mermaid: 'fill:#FFFFFF,stroke:#8C4FFF,color:#8C4FFF',
  },
  resource: {
    alwaysCluster: false,
    cluster: { style: 'rounded', color: '#ED7100', fontcolor: '#232F3E', margin: '12' },
    node: { shape: 'box', style: 'rounded,filled', fillcolor: '#F2F3F3', color: '#545B64' },
    mermaid: 'fill:#F2F3F3,stroke:#545B64,color:#232F3E',
  },
};

export function isCluster(kind: NodeKind, childCount: number): boolean {
  return NODE_KIND_STYLES[kind].alwaysCluster || childCount > 0;
}
