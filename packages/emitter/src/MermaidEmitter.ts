import { DEFAULT_TITLE, EmitOptions, HierarchyView, IEmitter } from './IEmitter';
import { isCluster, NODE_KIND_STYLES } from './styles';

/** Mermaid `flowchart TB` with one subgraph per cluster and a class per node kind. */
export class MermaidEmitter implements IEmitter {
  readonly extension = 'mmd';

  emit(root: HierarchyView, options: EmitOptions = {}): string {
    const lines: string[] = ['---', `title: ${yamlString(options.title ?? DEFAULT_TITLE)}`, '---', 'flowchart TB'];
    const classes: Map<string, string[]> = new Map();

    this.emitNode(root, '0', 1, lines, classes);

    for (const [kind, style] of Object.entries(NODE_KIND_STYLES)) {
      const ids = classes.get(kind);
      if (!ids) continue;
      lines.push(`  classDef ${kind} ${style.mermaid}`);
      lines.push(`  class ${ids.join(',')} ${kind}`);
    }

    return `${lines.join('\n')}\n`;
  }

  private emitNode(view: HierarchyView, path: string, depth: number, lines: string[], classes: Map<string, string[]>): void {
    const indent = '  '.repeat(depth);
    const label = escapeLabel(view.label);

    if (!isCluster(view.kind, view.children.length)) {
      const id = `n${path}`;
      lines.push(`${indent}${id}["${label}"]`);
      addClass(classes, view.kind, id);
      return;
    }

    const id = `c${path}`;
    lines.push(`${indent}subgraph ${id}["${label}"]`);
    view.children.forEach((child, index) => this.emitNode(child, `${path}_${index}`, depth + 1, lines, classes));
    lines.push(`${indent}end`);
    addClass(classes, view.kind, id);
  }
}

function addClass(classes: Map<string, string[]>, kind: string, id: string): void {
  const ids = classes.get(kind);
  if (ids) ids.push(id);
  else classes.set(kind, [id]);
}

function escapeLabel(value: string): string {
  return value.replace(/"/g, "'");
}

// Double-quoted YAML scalars share JSON's escapes.
function yamlString(value: string): string {
  return JSON.stringify(value);
}
