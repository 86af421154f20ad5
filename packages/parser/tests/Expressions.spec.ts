import { describe, expect, it } from 'vitest';

import { ResourceBlock } from '../src/ast';
import { Lexer } from '../src/Lexer';
import { Parser } from '../src/Parser';

function parseResource(lines: string[]): ResourceBlock {
  const input = lines.join('\n');
  const { program } = new Parser(new Lexer(input).tokenize(), input).parse();
  const [stmt] = program;
  if (stmt.type !== 'Resource') throw new Error(`Expected a resource, got ${stmt.type}`);
  return stmt;
}

describe('Expression Parsing', () => {
  it('should keep a list verbatim', () => {
    const resource = parseResource(['resource "aws_lb" "web" {', '  subnets = [aws_subnet.a.id, aws_subnet.b.id]', '}']);
    expect(resource.attributes.subnets).toEqual({ type: 'Expression', value: '[aws_subnet.a.id, aws_subnet.b.id]' });
  });

  it('should keep a multi-line map verbatim', () => {
    const resource = parseResource(['resource "test" "map" {', '  config = {', '    debug = true', '  }', '  after = 1', '}']);
    expect(resource.attributes.config).toEqual({ type: 'Expression', value: '{\n    debug = true\n  }' });
    expect(resource.attributes.after).toEqual({ type: 'Number', value: 1 });
  });

  it('should keep function calls spanning lines', () => {
    const resource = parseResource(['resource "aws_iam_role" "r" {', '  assume_role_policy = jsonencode({', '    Version = "2012-10-17"', '  })', '}']);
    expect(resource.attributes.assume_role_policy).toEqual({ type: 'Expression', value: 'jsonencode({\n    Version = "2012-10-17"\n  })' });
  });

  it('should keep conditionals on one line', () => {
    const resource = parseResource(['resource "aws_instance" "web" {', '  count = var.enabled ? 1 : 0', '}']);
    expect(resource.attributes.count).toEqual({ type: 'Expression', value: 'var.enabled ? 1 : 0' });
  });

  it('should read splat and index expressions as expressions', () => {
    const resource = parseResource(['resource "aws_lb" "web" {', '  a = aws_subnet.public.*.id', '  b = aws_subnet.public[0].id', '}']);
    expect(resource.attributes.a).toEqual({ type: 'Expression', value: 'aws_subnet.public.*.id' });
    expect(resource.attributes.b).toEqual({ type: 'Expression', value: 'aws_subnet.public[0].id' });
  });

  it('should read heredocs as strings', () => {
    const resource = parseResource(['resource "aws_instance" "web" {', '  user_data = <<EOF', 'echo hi', 'EOF', '}']);
    expect(resource.attributes.user_data).toEqual({ type: 'String', value: 'echo hi' });
  });

  it('should keep interpolations inside strings', () => {
    const resource = parseResource(['resource "aws_instance" "web" {', '  name = "${var.env}-web"', '}']);
    expect(resource.attributes.name).toEqual({ type: 'String', value: '${var.env}-web' });
  });

  it('should parse nested blocks with their source', () => {
    const resource = parseResource(['resource "aws_security_group" "web" {', '  ingress {', '    from_port = 80', '  }', '}']);

    expect(resource.attributes).toEqual({});
    expect(resource.blocks).toEqual([
      {
        blockType: 'ingress',
        labels: [],
        attributes: { from_port: { type: 'Number', value: 80 } },
        blocks: [],
        source: 'ingress {\n    from_port = 80\n  }',
      },
    ]);
  });

  it('should parse labelled nested blocks', () => {
    const resource = parseResource(['resource "aws_security_group" "web" {', '  dynamic "ingress" {', '    for_each = var.ports', '  }', '}']);
    expect(resource.blocks[0]).toMatchObject({ blockType: 'dynamic', labels: ['ingress'] });
  });
});
