export interface CompoundIdentifier {
  family: string;
  alias: string | null;
}

// "aws.west", "aws west" and "aws . west" are the same identifier.
const SEPARATOR = /\s*\.\s*|\s+/;

function segments(raw: string): string[] {
  return raw
    .trim()
    .split(SEPARATOR)
    .filter((part) => part !== '');
}

/** Splits a provider identifier into family and alias. Returns null for blank input. */
export function parseCompoundIdentifier(raw: string): CompoundIdentifier | null {
  const [family, ...rest] = segments(raw);
  if (family === undefined) return null;
  return { family, alias: rest.length > 0 ? rest.join('.') : null };
}

/** Normalizes an `alias` attribute value, dropping a leading family segment. */
export function normalizeAlias(family: string, raw: string): string | null {
  const parts = segments(raw);
  if (parts.length > 1 && parts[0] === family) parts.shift();
  return parts.length > 0 ? parts.join('.') : null;
}
