import { describe, expect, it } from 'vitest';

import { parseProviders } from '../src/index';

describe('parseProviders', () => {
  it('should collect a default provider', () => {
    const { providers, diagnostics } = parseProviders(`provider "aws" {\n  region = "us-east-1"\n}`);

    expect(diagnostics).toEqual([]);
    expect(providers.toRecords()).toEqual([{ family: 'aws', alias: null, region: 'us-east-1' }]);
  });

  it('should give every alias surface form the same alias', () => {
    const forms = [
      `provider "aws" {\n  alias = "west"\n  region = "us-west-2"\n}`,
      `provider "aws.west" {\n  region = "us-west-2"\n}`,
      `provider "aws west" {\n  region = "us-west-2"\n}`,
      `provider "aws" {\n  alias = "aws.west"\n  region = "us-west-2"\n}`,
      `provider "aws" {\n  alias = "aws west"\n  region = "us-west-2"\n}`,
    ];

    for (const form of forms) {
      const { providers } = parseProviders(form);
      expect(providers.get('aws', 'west')?.toRecord()).toEqual({ family: 'aws', alias: 'west', region: 'us-west-2' });
    }
  });

  it('should leave the region empty when none is declared', () => {
    const { providers } = parseProviders(`provider "aws" {}`);
    expect(providers.getDefault('aws')?.region).toBeNull();
  });

  it('should let the last duplicate declaration win', () => {
    const input = `
provider "aws" {
  region = "us-east-1"
}
provider "aws" {
  alias  = "eu"
  region = "eu-west-1"
}
provider "aws" {
  region = "us-west-2"
}`;
    const { providers } = parseProviders(input);

    expect(providers.size).toBe(2);
    expect(providers.getDefault('aws')?.region).toBe('us-west-2');
    // Replacing keeps the first position
    expect(providers.values().map((p) => p.key)).toEqual(['aws', 'aws.eu']);
  });

  it('should ignore and report a region that is not a literal', () => {
    const { providers, diagnostics } = parseProviders(`provider "aws" {\n  region = var.region\n}`);

    expect(providers.getDefault('aws')?.region).toBeNull();
    expect(diagnostics).toEqual([
      {
        kind: 'ParseDiagnostic',
        message: 'Provider "aws" region "var.region" is not a literal string; it is ignored.',
        source: '<input>',
        line: 1,
        column: 1,
      },
    ]);
  });

  it('should treat an interpolated region string as not literal', () => {
    const { providers, diagnostics } = parseProviders(`provider "aws" {\n  region = "\${var.aws_region}"\n}`);

    expect(providers.getDefault('aws')?.region).toBeNull();
    expect(diagnostics).toEqual([
      {
        kind: 'ParseDiagnostic',
        message: 'Provider "aws" region "${var.aws_region}" is not a literal string; it is ignored.',
        source: '<input>',
        line: 1,
        column: 1,
      },
    ]);
  });

  it('should collect providers from every document', () => {
    const { providers } = parseProviders([
      { path: 'a.tf', content: `provider "aws" {\n  region = "us-east-1"\n}` },
      { path: 'b.tf', content: `provider "aws" {\n  alias = "eu"\n  region = "eu-west-1"\n}` },
    ]);

    expect(providers.regions()).toEqual(['us-east-1', 'eu-west-1']);
  });
});
