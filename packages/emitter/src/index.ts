import { DotEmitter } from './DotEmitter';
import { IEmitter } from './IEmitter';
import { MermaidEmitter } from './MermaidEmitter';

export * from './DotEmitter';
export * from './IEmitter';
export * from './MermaidEmitter';
export * from './styles';

export type DiagramFormat = 'dot' | 'mermaid';

export const DIAGRAM_FORMATS: readonly DiagramFormat[] = ['dot', 'mermaid'];

export function createEmitter(format: DiagramFormat): IEmitter {
  switch (format) {
    case 'dot': {
      return new DotEmitter();
    }
    case 'mermaid': {
      return new MermaidEmitter();
    }
  }
}
