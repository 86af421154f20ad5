import { NodeKind } from '@infragram/model';

import { HierarchyView } from '../src/IEmitter';

export function view(label: string, kind: NodeKind, children: HierarchyView[] = []): HierarchyView {
  return { label, kind, children };
}

export function singleRegion(): HierarchyView {
  return view('AWS Cloud', 'root', [view('Region: us-east-1', 'region', [view('VPC', 'network', [view('aws_instance.web', 'resource')])])]);
}
