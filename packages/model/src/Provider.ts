import { RecordError } from './errors';

export interface ProviderRecord {
  family: string;
  alias: string | null;
  region: string | null;
}

/**
 * A provider declaration: a cloud family bound to a region, optionally aliased.
 * Identified by family plus alias; the unaliased provider is the family default.
 */
export class Provider {
  public readonly family: string;
  public readonly alias: string | null;
  public readonly region: string | null;

  constructor(family: string, alias: string | null = null, region: string | null = null) {
    this.family = family;
    this.alias = alias;
    this.region = region;
  }

  /** "aws" for a default provider, "aws.west" for an aliased one. */
  static keyOf(family: string, alias: string | null): string {
    return alias === null ? family : `${family}.${alias}`;
  }

  get key(): string {
    return Provider.keyOf(this.family, this.alias);
  }

  get isDefault(): boolean {
    return this.alias === null;
  }

  equals(other: Provider): boolean {
    return this.family === other.family && this.alias === other.alias && this.region === other.region;
  }

  toRecord(): ProviderRecord {
    return { family: this.family, alias: this.alias, region: this.region };
  }

  static fromRecord(record: unknown): Provider {
    if (!record || typeof record !== 'object') throw new RecordError('Provider record must be an object');

    const family = 'family' in record ? record.family : undefined;
    const alias = 'alias' in record ? record.alias : undefined;
    const region = 'region' in record ? record.region : undefined;
    if (typeof family !== 'string' || family === '') throw new RecordError('Provider record is missing "family"');

    return new Provider(family, optionalString(alias, 'alias'), optionalString(region, 'region'));
  }
}

function optionalString(value: unknown, field: string): string | null {
  if (value === undefined || value === null || value === '') return null;
  if (typeof value !== 'string') throw new RecordError(`Provider "${field}" must be a string or null`);
  return value;
}
