import { DEFAULT_TITLE, EmitOptions, HierarchyView, IEmitter } from './IEmitter';
import { DotAttributes, EDGE_DEFAULTS, GRAPH_DEFAULTS, isCluster, NODE_DEFAULTS, NODE_KIND_STYLES } from './styles';

// Identifiers and plain numbers need no quotes
const BARE_VALUE = /^(?:[A-Z_a-z]\w*|-?\d+(?:\.\d+)?)$/;

const ANCHOR: DotAttributes = { shape: 'point', style: 'invis', label: '' };

/**
 * Graphviz script. Scopes and resources with children become `cluster_*` subgraphs.
 * Identifiers come from the position in the tree (`cluster_0_1`, `node_0_1_0`),
 * so equal labels in different regions never share an identifier.
 */
export class DotEmitter implements IEmitter {
  readonly extension = 'dot';

  emit(root: HierarchyView, options: EmitOptions = {}): string {
    const title = options.title ?? DEFAULT_TITLE;
    const lines: string[] = [
      `digraph ${quote(title)} {`,
      `  graph [${formatAttributes({ label: title, ...GRAPH_DEFAULTS })}];`,
      `  node [${formatAttributes(NODE_DEFAULTS)}];`,
      `  edge [${formatAttributes(EDGE_DEFAULTS)}];`,
      '',
    ];

    this.emitNode(root, '0', 1, lines);
    lines.push('}');

    return `${lines.join('\n')}\n`;
  }

  private emitNode(view: HierarchyView, path: string, depth: number, lines: string[]): void {
    const indent = '  '.repeat(depth);
    const style = NODE_KIND_STYLES[view.kind];

    if (!isCluster(view.kind, view.children.length)) {
      lines.push(`${indent}node_${path} [${formatAttributes({ label: view.label, ...style.node })}];`);
      return;
    }

    lines.push(`${indent}subgraph cluster_${path} {`);
    lines.push(`${indent}  graph [${formatAttributes({ label: view.label, ...style.cluster })}];`);

    // Graphviz drops clusters without nodes
    if (view.children.length === 0) lines.push(`${indent}  anchor_${path} [${formatAttributes(ANCHOR)}];`);

    view.children.forEach((child, index) => this.emitNode(child, `${path}_${index}`, depth + 1, lines));
    lines.push(`${indent}}`);
  }
}

export function formatAttributes(attributes: DotAttributes): string {
  return Object.entries(attributes)
    .map(([key, value]) => `${key}=${BARE_VALUE.test(value) ? value : quote(value)}`)
    .join(', ');
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
