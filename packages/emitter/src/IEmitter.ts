import { NodeKind } from '@infragram/model';

/** Everything an emitter may know about a node. Resource nodes satisfy it as they are. */
export interface HierarchyView {
  readonly label: string;
  readonly kind: NodeKind;
  readonly children: readonly HierarchyView[];
}

export interface EmitOptions {
  title?: string;
}

export interface IEmitter {
  /** File extension of the produced script, without the dot. */
  readonly extension: string;
  emit(root: HierarchyView, options?: EmitOptions): string;
}

export const DEFAULT_TITLE = 'AWS Architecture';
