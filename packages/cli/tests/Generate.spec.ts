import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, MockInstance, vi } from 'vitest';

import { createGenerateCommand, outputPath } from '../src/commands/generate';

const fsMock = vi.hoisted(() => ({
  readdir: vi.fn<(folder: string, options: { recursive: boolean }) => Promise<string[]>>(),
  readFile: vi.fn<(file: string, encoding: string) => Promise<string>>(),
  writeFile: vi.fn<(file: string, data: string, encoding: string) => Promise<void>>(),
}));

vi.mock('node:fs/promises', () => fsMock);

const FOLDER = '/infra';

const CONFIG = `
provider "aws" {
  region = "us-east-1"
}

resource "aws_vpc" "main" {
  cidr_block = "10.0.0.0/16"
}

resource "aws_instance" "web" {
  ami = "ami-123"
}
`;

function useFolder(files: Record<string, string>): void {
  fsMock.readdir.mockResolvedValue(Object.keys(files));
  fsMock.readFile.mockImplementation(async (file) => files[path.relative(FOLDER, file)] ?? '');
  fsMock.writeFile.mockResolvedValue(undefined);
}

function written(): string {
  const [call] = fsMock.writeFile.mock.calls;
  return call ? call[1] : '';
}

describe('Generate Command', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('ProcessExit');
    });
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write a DOT script to aws_architecture.dot by default', async () => {
    useFolder({ 'main.tf': CONFIG });

    await createGenerateCommand().parseAsync(['node', 'test', FOLDER]);

    expect(fsMock.writeFile).toHaveBeenCalledWith(path.resolve('aws_architecture.dot'), expect.stringContaining('digraph "AWS Architecture" {'), 'utf8');
    expect(written()).toContain('graph [label="VPC: main", style=rounded, color="#8C4FFF", fontcolor="#8C4FFF", margin=20];');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Reading Terraform files from /infra'));
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Diagram generated'));
    expect(processExitSpy).not.toHaveBeenCalled();
  });

  it('should write Mermaid with the given name and title', async () => {
    useFolder({ 'main.tf': CONFIG });

    await createGenerateCommand().parseAsync(['node', 'test', FOLDER, '-f', 'mermaid', '-o', 'diagram', '--title', 'Production']);

    expect(fsMock.writeFile).toHaveBeenCalledWith(path.resolve('diagram.mmd'), expect.stringContaining('title: "Production"'), 'utf8');
    expect(written()).toContain('flowchart TB');
  });

  it('should write the hierarchy record as JSON', async () => {
    useFolder({ 'main.tf': CONFIG });

    await createGenerateCommand().parseAsync(['node', 'test', FOLDER, '--format', 'json', '--output', 'out/tree.json']);

    expect(fsMock.writeFile).toHaveBeenCalledWith(path.resolve('out/tree.json'), expect.any(String), 'utf8');
    expect(JSON.parse(written())).toEqual({
      label: 'AWS Cloud',
      kind: 'root',
      region: null,
      children: [
        {
          label: 'Region: us-east-1',
          kind: 'region',
          region: 'us-east-1',
          children: [{ label: 'VPC: main', kind: 'network', region: 'us-east-1', children: [{ label: 'aws_instance.web', kind: 'resource', region: 'us-east-1', children: [] }] }],
        },
      ],
    });
  });

  it('should print diagnostics as warnings and still write the diagram', async () => {
    useFolder({ 'main.tf': 'resource "aws_instance" "web" {\n  provider = aws.gone\n}\n' });

    await createGenerateCommand().parseAsync(['node', 'test', FOLDER]);

    expect(fsMock.writeFile).toHaveBeenCalled();
    expect(consoleLogSpy).toHaveBeenCalledWith(
      expect.stringContaining('main.tf:1:1 UnresolvedProviderReference: aws_instance.web references undeclared provider "aws.gone"; using the default provider region.')
    );
  });

  it('should exit with 1 when the folder does not exist', async () => {
    fsMock.readdir.mockRejectedValue(new Error('ENOENT'));

    await expect(createGenerateCommand().parseAsync(['node', 'test', FOLDER])).rejects.toThrow('ProcessExit');

    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('Generation failed'), 'Folder not found: /infra');
    expect(processExitSpy).toHaveBeenCalledWith(1);
    expect(fsMock.writeFile).not.toHaveBeenCalled();
  });

  it('should add the extension only when the name has none', () => {
    expect(outputPath('aws_architecture', 'dot')).toBe(path.resolve('aws_architecture.dot'));
    expect(outputPath('diagram.gv', 'dot')).toBe(path.resolve('diagram.gv'));
  });
});
