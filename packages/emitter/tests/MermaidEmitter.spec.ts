import { describe, expect, it } from 'vitest';

import { createEmitter, DIAGRAM_FORMATS } from '../src/index';
import { MermaidEmitter } from '../src/MermaidEmitter';
import { singleRegion, view } from './fixtures';

describe('MermaidEmitter', () => {
  it('should write a top-down flowchart with classes per kind', () => {
    expect(new MermaidEmitter().emit(singleRegion())).toBe(
      [
        '---',
        'title: "AWS Architecture"',
        '---',
        'flowchart TB',
        '  subgraph c0["AWS Cloud"]',
        '    subgraph c0_0["Region: us-east-1"]',
        '      subgraph c0_0_0["VPC"]',
        '        n0_0_0_0["aws_instance.web"]',
        '      end',
        '    end',
        '  end',
        '  classDef root fill:#FFFFFF,stroke:#232F3E,color:#232F3E',
        '  class c0 root',
        '  classDef region fill:#FFFFFF,stroke:#147EBA,stroke-dasharray:5 5,color:#147EBA',
        '  class c0_0 region',
        '  classDef network fill:#FFFFFF,stroke:#8C4FFF,color:#8C4FFF',
        '  class c0_0_0 network',
        '  classDef resource fill:#F2F3F3,stroke:#545B64,color:#232F3E',
        '  class n0_0_0_0 resource',
        '',
      ].join('\n')
    );
  });

  it('should keep empty network scopes as subgraphs', () => {
    const output = new MermaidEmitter().emit(view('AWS Cloud', 'root', [view('Region: eu-west-1', 'region', [view('VPC', 'network')])]), { title: 'Empty' });
    const lines = output.split('\n');

    expect(lines[1]).toBe('title: "Empty"');
    expect(lines).toContain('      subgraph c0_0_0["VPC"]');
    expect(lines).not.toContain('  classDef resource fill:#F2F3F3,stroke:#545B64,color:#232F3E');
  });

  it('should quote titles that are not plain YAML', () => {
    const lines = new MermaidEmitter().emit(view('AWS Cloud', 'root'), { title: 'Prod: "east"' }).split('\n');
    expect(lines[1]).toBe('title: "Prod: \\"east\\""');
  });

  it('should replace double quotes in labels', () => {
    const output = new MermaidEmitter().emit(view('AWS Cloud', 'root', [view('aws_s3_bucket.a"b', 'resource')]));
    expect(output.split('\n')).toContain('    n0_0["aws_s3_bucket.a\'b"]');
  });
});

describe('createEmitter', () => {
  it('should create an emitter for every format', () => {
    expect(DIAGRAM_FORMATS.map((format) => createEmitter(format).extension)).toEqual(['dot', 'mmd']);
  });
});
