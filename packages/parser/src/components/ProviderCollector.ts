import { Diagnostic, Provider } from '@infragram/model';

import { normalizeAlias, parseCompoundIdentifier } from '../alias';
import { ProviderBlock } from '../ast';
import { ProviderTable } from '../ProviderTable';
import { attributeText } from '../values';
import { SourceProgram } from './SourceProgram';

export interface ProviderCollection {
  providers: ProviderTable;
  diagnostics: Diagnostic[];
}

/** First stage: gathers every provider block of every document into one table. */
export class ProviderCollector {
  collect(programs: SourceProgram[]): ProviderCollection {
    const providers = new ProviderTable();
    const diagnostics: Diagnostic[] = [];

    for (const { source, program } of programs)
      for (const stmt of program) {
        if (stmt.type !== 'Provider') continue;

        const provider = this.toProvider(stmt, source, diagnostics);
        if (provider) providers.set(provider);
      }

    return { providers, diagnostics };
  }

  private toProvider(block: ProviderBlock, source: string, diagnostics: Diagnostic[]): Provider | null {
    const header = parseCompoundIdentifier(block.name);
    if (!header) {
      diagnostics.push({ kind: 'ParseDiagnostic', message: 'Provider block has an empty name.', source, line: block.line, column: block.column });
      return null;
    }

    const aliasAttr = block.attributes.alias;
    const alias = aliasAttr ? normalizeAlias(header.family, attributeText(aliasAttr)) : header.alias;

    return new Provider(header.family, alias, this.readRegion(block, header.family, source, diagnostics));
  }

  private readRegion(block: ProviderBlock, family: string, source: string, diagnostics: Diagnostic[]): string | null {
    const region = block.attributes.region;
    if (!region) return null;
    if (region.type === 'String' && !region.value.includes('${')) return region.value.trim() || null;

    diagnostics.push({
      kind: 'ParseDiagnostic',
      message: `Provider "${family}" region "${attributeText(region)}" is not a literal string; it is ignored.`,
      source,
      line: block.line,
      column: block.column,
    });
    return null;
  }
}
