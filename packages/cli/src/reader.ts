import { ConfigDocument } from '@infragram/parser';
// eslint-disable-next-line unicorn/import-style
import * as fs from 'node:fs/promises';
import path from 'node:path';

export const CONFIG_EXTENSIONS: readonly string[] = ['.tf', '.tfvars'];

export class ReaderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReaderError';
  }
}

/** Every .tf and .tfvars file below `folder`, as folder-relative paths in sorted order. */
export async function collectConfigFiles(folder: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(folder, { recursive: true });
  } catch {
    throw new ReaderError(`Folder not found: ${folder}`);
  }

  const files = entries
    .filter((entry) => CONFIG_EXTENSIONS.includes(path.extname(entry)))
    .map((entry) => entry.split(path.sep).join('/'))
    .sort();

  if (files.length === 0) throw new ReaderError(`No terraform files (.tf, .tfvars) found in ${folder}`);
  return files;
}

/** Reads every configuration file of the folder in full. Document paths stay folder-relative. */
export async function readConfiguration(folder: string): Promise<ConfigDocument[]> {
  const documents: ConfigDocument[] = [];

  for (const file of await collectConfigFiles(folder)) {
    const content = await fs.readFile(path.join(folder, file), 'utf8');
    documents.push({ path: file, content });
  }

  return documents;
}
