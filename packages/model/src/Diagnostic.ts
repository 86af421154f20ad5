export type DiagnosticKind = 'ParseDiagnostic' | 'UnresolvedProviderReference' | 'StructuralInconsistency';

/** Where a block starts in its document. */
export interface SourceLocation {
  source: string;
  line: number;
  column: number;
}

/**
 * A recoverable problem found while parsing or placing resources.
 * Diagnostics are collected and returned, never thrown.
 */
export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  source?: string; // document path
  line?: number;
  column?: number;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const location = [diagnostic.source, diagnostic.line, diagnostic.column].filter((part) => part !== undefined).join(':');
  const prefix = location ? `${location} ` : '';
  return `${prefix}${diagnostic.kind}: ${diagnostic.message}`;
}
