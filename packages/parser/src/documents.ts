export interface ConfigDocument {
  path: string;
  content: string;
}

/** Name given to text that did not come from a marked file. */
export const INLINE_SOURCE = '<input>';

// Either a "# File: path" comment line or a banner:
// ================
// File: path
// ================
const FILE_MARKER = /^(?:={16,}\r?\nFile:[\t ]+(\S[^\n\r]*?)\r?\n={16,}|#[\t ]*File:[\t ]+(\S[^\n\r]*?))[\t ]*$/gm;

/**
 * Splits concatenated configuration carrying file markers back into documents.
 * Text without markers is returned as a single document.
 */
export function splitDocuments(text: string): ConfigDocument[] {
  const markers = [...text.matchAll(FILE_MARKER)];
  if (markers.length === 0) return [{ path: INLINE_SOURCE, content: text }];

  const documents: ConfigDocument[] = [];
  const preamble = text.slice(0, markers[0].index);
  if (preamble.trim() !== '') documents.push({ path: INLINE_SOURCE, content: preamble });

  markers.forEach((marker, i) => {
    const start = (marker.index ?? 0) + marker[0].length;
    const end = i + 1 < markers.length ? markers[i + 1].index : text.length;
    documents.push({ path: marker[1] ?? marker[2] ?? INLINE_SOURCE, content: text.slice(start, end).replace(/^\r?\n/, '') });
  });

  return documents;
}
