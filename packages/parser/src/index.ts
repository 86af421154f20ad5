import { Diagnostic, ResourceNode } from '@infragram/model';

import { ProviderCollection, ProviderCollector } from './components/ProviderCollector';
import { ResourceCollection, ResourceResolver } from './components/ResourceResolver';
import { SourceProgram } from './components/SourceProgram';
import { ConfigDocument, splitDocuments } from './documents';
import { Lexer } from './Lexer';
import { Parser } from './Parser';
import { ProviderTable } from './ProviderTable';

export * from './alias';
export * from './ast';
export * from './components/ProviderCollector';
export * from './components/ResourceResolver';
export * from './components/SourceProgram';
export * from './documents';
export * from './errors';
export * from './Lexer';
export * from './Parser';
export * from './ProviderTable';
export * from './tokens';
export * from './values';

export type ConfigInput = string | ConfigDocument[];

export interface ParseResult {
  providers: ProviderTable;
  resources: ResourceNode[];
  diagnostics: Diagnostic[];
}

interface ParsedDocuments {
  programs: SourceProgram[];
  diagnostics: Diagnostic[];
}

function toDocuments(input: ConfigInput): ConfigDocument[] {
  return typeof input === 'string' ? splitDocuments(input) : input;
}

/** Lexes and parses each document; syntax diagnostics are tagged with the document path. */
export function parseDocuments(input: ConfigInput): ParsedDocuments {
  const programs: SourceProgram[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const document of toDocuments(input)) {
    const tokens = new Lexer(document.content).tokenize();
    const result = new Parser(tokens, document.content).parse();

    programs.push({ source: document.path, program: result.program });
    for (const diagnostic of result.diagnostics) diagnostics.push({ ...diagnostic, source: document.path });
  }

  return { programs, diagnostics };
}

/** Stage one on its own: the provider table of the given configuration. */
export function parseProviders(input: ConfigInput): ProviderCollection {
  const parsed = parseDocuments(input);
  const collected = new ProviderCollector().collect(parsed.programs);
  return { providers: collected.providers, diagnostics: [...parsed.diagnostics, ...collected.diagnostics] };
}

/** Stage two on its own: resources resolved against an already collected provider table. */
export function parseResources(input: ConfigInput, providers: ProviderTable): ResourceCollection {
  const parsed = parseDocuments(input);
  const resolved = new ResourceResolver(providers).resolve(parsed.programs);
  return { resources: resolved.resources, diagnostics: [...parsed.diagnostics, ...resolved.diagnostics] };
}

/**
 * Full parse of a configuration set. Providers are collected from every document
 * before any resource is resolved, so declaration order across files does not matter.
 */
export function parseConfiguration(input: ConfigInput): ParseResult {
  const parsed = parseDocuments(input);

  // 1. Collect providers across all documents
  const { providers, diagnostics: providerDiagnostics } = new ProviderCollector().collect(parsed.programs);

  // 2. Resolve resources against the complete table
  const { resources, diagnostics: resourceDiagnostics } = new ResourceResolver(providers).resolve(parsed.programs);

  return { providers, resources, diagnostics: [...parsed.diagnostics, ...providerDiagnostics, ...resourceDiagnostics] };
}
