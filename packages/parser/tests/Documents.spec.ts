import { describe, expect, it } from 'vitest';

import { INLINE_SOURCE, splitDocuments } from '../src/documents';

describe('splitDocuments', () => {
  it('should return unmarked text as one document', () => {
    expect(splitDocuments('resource "a" "b" {}')).toEqual([{ path: INLINE_SOURCE, content: 'resource "a" "b" {}' }]);
  });

  it('should split on comment markers', () => {
    const text = '# File: infra/main.tf\nprovider "aws" {}\n# File: infra/ecs.tf\nresource "aws_ecs_cluster" "main" {}\n';
    expect(splitDocuments(text)).toEqual([
      { path: 'infra/main.tf', content: 'provider "aws" {}\n' },
      { path: 'infra/ecs.tf', content: 'resource "aws_ecs_cluster" "main" {}\n' },
    ]);
  });

  it('should split on banner markers', () => {
    const banner = '================';
    const text = `${banner}\nFile: main.tf\n${banner}\nresource "aws_vpc" "main" {}\n`;
    expect(splitDocuments(text)).toEqual([{ path: 'main.tf', content: 'resource "aws_vpc" "main" {}\n' }]);
  });

  it('should keep text before the first marker', () => {
    const documents = splitDocuments('provider "aws" {}\n# File: b.tf\nresource "x" "y" {}');
    expect(documents.map((d) => d.path)).toEqual([INLINE_SOURCE, 'b.tf']);
  });
});
