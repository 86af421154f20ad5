import { Provider, ProviderRecord } from '@infragram/model';

/**
 * Providers keyed by family and alias. Setting an existing key replaces the
 * provider (last declaration wins) but keeps its original iteration position.
 */
export class ProviderTable {
  private providers: Map<string, Provider> = new Map();

  set(provider: Provider): void {
    this.providers.set(provider.key, provider);
  }

  get(family: string, alias: string | null): Provider | undefined {
    return this.providers.get(Provider.keyOf(family, alias));
  }

  getDefault(family: string): Provider | undefined {
    return this.get(family, null);
  }

  get size(): number {
    return this.providers.size;
  }

  values(): Provider[] {
    return [...this.providers.values()];
  }

  /** Distinct declared regions, in declaration order of their first provider. */
  regions(): string[] {
    const regions = new Set<string>();
    for (const provider of this.providers.values()) if (provider.region) regions.add(provider.region);
    return [...regions];
  }

  toRecords(): ProviderRecord[] {
    return this.values().map((provider) => provider.toRecord());
  }
}
