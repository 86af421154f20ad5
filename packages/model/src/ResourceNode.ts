import { DEFAULT_REGION, ROOT_LABEL, scopeTitle } from './constants';
import { SourceLocation } from './Diagnostic';
import { HierarchyError, RecordError } from './errors';

export type NodeKind = 'root' | 'region' | 'network' | 'resource';

export interface ResourceRecord {
  type: string;
  name: string;
  region: string;
  attributes: Record<string, string>;
}

export interface ResourceNodeInit {
  type: string;
  name: string;
  region?: string | null;
  attributes?: Record<string, string>;
  kind?: NodeKind;
  origin?: SourceLocation | null;
}

const ROOT_TYPE = 'root';
const REGION_TYPE = 'region';
const PLACEHOLDER_TYPE = 'network';

/**
 * One declared resource, or a synthetic scope node created while building the hierarchy.
 * The region is always populated: an absent region falls back to DEFAULT_REGION.
 */
export class ResourceNode {
  public type: string;
  public name: string;
  public readonly region: string;
  public attributes: Record<string, string>;
  public readonly kind: NodeKind;
  // Declaring block; null for synthetic scopes and nodes read from records
  public origin: SourceLocation | null;

  private parentNode: ResourceNode | null = null;
  private readonly childNodes: ResourceNode[] = [];

  constructor(init: ResourceNodeInit) {
    this.type = init.type;
    this.name = init.name;
    this.region = init.region || DEFAULT_REGION;
    this.attributes = { ...init.attributes };
    this.kind = init.kind ?? 'resource';
    this.origin = init.origin ?? null;
  }

  static root(): ResourceNode {
    return new ResourceNode({ type: ROOT_TYPE, name: 'aws-cloud', region: 'global', kind: 'root' });
  }

  static regionScope(region: string): ResourceNode {
    return new ResourceNode({ type: REGION_TYPE, name: region, region, kind: 'region' });
  }

  static networkPlaceholder(region: string): ResourceNode {
    return new ResourceNode({ type: PLACEHOLDER_TYPE, name: 'default', region, kind: 'network' });
  }

  get address(): string {
    return `${this.type}.${this.name}`;
  }

  /** Region-qualified identifier; unique across the whole tree. */
  get id(): string {
    if (this.kind === 'root') return ROOT_TYPE;
    if (this.kind === 'region') return this.region;
    return `${this.region}/${this.address}`;
  }

  get label(): string {
    switch (this.kind) {
      case 'root': {
        return ROOT_LABEL;
      }
      case 'region': {
        return `Region: ${this.region}`;
      }
      case 'network': {
        return this.isPlaceholder ? 'VPC' : `${scopeTitle(this.type)}: ${this.name}`;
      }
      default: {
        return this.address;
      }
    }
  }

  get isPlaceholder(): boolean {
    return this.kind === 'network' && this.type === PLACEHOLDER_TYPE;
  }

  get parent(): ResourceNode | null {
    return this.parentNode;
  }

  get children(): readonly ResourceNode[] {
    return this.childNodes;
  }

  addChild(child: ResourceNode): void {
    if (child.parentNode) throw new HierarchyError(`Node ${child.id} already belongs to ${child.parentNode.id}`);
    if (child === this || this.hasAncestor(child)) throw new HierarchyError(`Attaching ${child.id} under ${this.id} would create a cycle`);

    child.parentNode = this;
    this.childNodes.push(child);
  }

  hasAncestor(node: ResourceNode): boolean {
    for (let current = this.parentNode; current; current = current.parentNode) if (current === node) return true;
    return false;
  }

  /** Takes over the identity of a declared resource, keeping this node's place in the tree. */
  adopt(source: ResourceNode): void {
    this.type = source.type;
    this.name = source.name;
    this.attributes = { ...source.attributes };
    this.origin = source.origin;
  }

  isEquivalentTo(other: ResourceNode): boolean {
    if (this.type !== other.type || this.name !== other.name || this.region !== other.region) return false;

    const keys = Object.keys(this.attributes);
    if (keys.length !== Object.keys(other.attributes).length) return false;
    return keys.every((key) => other.attributes[key] === this.attributes[key]);
  }

  toRecord(): ResourceRecord {
    return {
      type: this.type,
      name: this.name,
      region: this.region,
      attributes: { ...this.attributes },
    };
  }

  static fromRecord(record: unknown): ResourceNode {
    if (!record || typeof record !== 'object') throw new RecordError('Resource record must be an object');

    const type = 'type' in record ? record.type : undefined;
    const name = 'name' in record ? record.name : undefined;
    const region = 'region' in record ? record.region : undefined;
    const attributes = 'attributes' in record ? record.attributes : undefined;
    if (typeof type !== 'string' || type === '') throw new RecordError('Resource record is missing "type"');
    if (typeof name !== 'string' || name === '') throw new RecordError(`Resource record "${type}" is missing "name"`);
    if (region !== undefined && region !== null && typeof region !== 'string') throw new RecordError(`Resource ${type}.${name} has a non-string "region"`);

    return new ResourceNode({
      type,
      name,
      region: typeof region === 'string' ? region : null,
      attributes: readAttributes(attributes, `${type}.${name}`),
    });
  }
}

function readAttributes(value: unknown, address: string): Record<string, string> {
  if (value === undefined || value === null) return {};
  if (typeof value !== 'object' || Array.isArray(value)) throw new RecordError(`Resource ${address} has malformed "attributes"`);

  const attributes: Record<string, string> = {};
  for (const [key, attr] of Object.entries(value)) {
    if (typeof attr !== 'string') throw new RecordError(`Attribute "${key}" of ${address} must be a string`);
    attributes[key] = attr;
  }
  return attributes;
}
