import { Diagnostic } from '@infragram/model';

import { Assignment, AttributeValue, DataBlock, GenericBlock, ModuleBlock, NestedBlock, OutputBlock, Program, ProviderBlock, ResourceBlock, Statement, VariableBlock } from './ast';
import { ParseError } from './errors';
import { BLOCK_KEYWORDS, Token, TokenType } from './tokens';

export interface ParsedProgram {
  program: Program;
  diagnostics: Diagnostic[];
}

interface BlockBody {
  attributes: Record<string, AttributeValue>;
  blocks: NestedBlock[];
}

// Blocks Terraform knows that carry nothing for the diagram.
const SKIPPED_BLOCK_TYPES = new Set(['moved', 'import', 'removed', 'check']);

const OPENERS = new Set([TokenType.LBrace, TokenType.LBracket, TokenType.LParen]);
// closer -> opener
const CLOSERS: Map<TokenType, TokenType> = new Map([
  [TokenType.RBrace, TokenType.LBrace],
  [TokenType.RBracket, TokenType.LBracket],
  [TokenType.RParen, TokenType.LParen],
]);

export class Parser {
  private tokens: Token[];
  private source: string;
  private current: number = 0;

  constructor(tokens: Token[], source: string) {
    this.tokens = tokens;
    this.source = source;
  }

  /**
   * Parses every statement it can. A malformed statement becomes a diagnostic and
   * parsing resumes at the next top-level block.
   */
  public parse(): ParsedProgram {
    const program: Program = [];
    const diagnostics: Diagnostic[] = [];
    this.current = 0;

    while (!this.isAtEnd()) {
      const start = this.current;
      try {
        program.push(this.parseStatement());
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        diagnostics.push({ kind: 'ParseDiagnostic', message: error.reason, line: error.line, column: error.column });
        this.synchronize(start);
      }
    }

    return { program, diagnostics };
  }

  private statementParsers: Partial<Record<TokenType, (keyword: Token) => Statement>> = {
    [TokenType.Resource]: this.parseResource.bind(this),
    [TokenType.Data]: this.parseData.bind(this),
    [TokenType.Provider]: this.parseProvider.bind(this),
    [TokenType.Module]: this.parseModule.bind(this),
    [TokenType.Variable]: this.parseVariable.bind(this),
    [TokenType.Output]: this.parseOutput.bind(this),
    [TokenType.Locals]: this.parseGeneric.bind(this),
    [TokenType.Terraform]: this.parseGeneric.bind(this),
  };

  private parseStatement(): Statement {
    const handler = this.statementParsers[this.peek().type];
    if (handler) return handler(this.advance());

    if (this.check(TokenType.Identifier)) {
      if (this.checkNext(TokenType.Assign)) return this.parseAssignment();
      if (SKIPPED_BLOCK_TYPES.has(this.peek().value)) return this.parseGeneric(this.advance());
    }

    return this.error(`Unexpected token: ${this.peek().value}`);
  }

  private parseResource(keyword: Token): ResourceBlock {
    // resource "type" "name" { ... }
    const typeToken = this.consumeLabel("Expect resource type string after 'resource'.");
    const nameToken = this.consumeLabel('Expect resource name string after resource type.');

    this.consume(TokenType.LBrace, "Expect '{' after resource name.");

    return {
      type: 'Resource',
      resourceType: typeToken.value,
      name: nameToken.value,
      ...this.parseBody(),
      line: keyword.line,
      column: keyword.column,
    };
  }

  private parseData(keyword: Token): DataBlock {
    // data "type" "name" { ... }
    const typeToken = this.consumeLabel("Expect data source type string after 'data'.");
    const nameToken = this.consumeLabel('Expect data source name string after data source type.');

    this.consume(TokenType.LBrace, "Expect '{' after data source name.");

    return {
      type: 'Data',
      dataSourceType: typeToken.value,
      name: nameToken.value,
      ...this.parseBody(),
      line: keyword.line,
      column: keyword.column,
    };
  }

  private parseProvider(keyword: Token): ProviderBlock {
    // provider "aws" { ... }
    const nameToken = this.consumeLabel("Expect provider name string after 'provider'.");

    this.consume(TokenType.LBrace, "Expect '{' after provider name.");

    return { type: 'Provider', name: nameToken.value, ...this.parseBody(), line: keyword.line, column: keyword.column };
  }

  private parseModule(keyword: Token): ModuleBlock {
    // module "name" { source = "..." }
    const nameToken = this.consumeLabel("Expect module name string after 'module'.");

    this.consume(TokenType.LBrace, "Expect '{' after module name.");

    return { type: 'Module', name: nameToken.value, ...this.parseBody(), line: keyword.line, column: keyword.column };
  }

  private parseVariable(keyword: Token): VariableBlock {
    const nameToken = this.consumeLabel("Expect variable name string after 'variable'.");

    this.consume(TokenType.LBrace, "Expect '{' after variable name.");

    return { type: 'Variable', name: nameToken.value, ...this.parseBody(), line: keyword.line, column: keyword.column };
  }

  private parseOutput(keyword: Token): OutputBlock {
    const nameToken = this.consumeLabel("Expect output name string after 'output'.");

    this.consume(TokenType.LBrace, "Expect '{' after output name.");

    return { type: 'Output', name: nameToken.value, ...this.parseBody(), line: keyword.line, column: keyword.column };
  }

  private parseGeneric(keyword: Token): GenericBlock {
    const labels = this.parseLabels();

    this.consume(TokenType.LBrace, `Expect '{' after '${keyword.value}'.`);

    return { type: 'Block', keyword: keyword.value, labels, ...this.parseBody(), line: keyword.line, column: keyword.column };
  }

  private parseAssignment(): Assignment {
    const nameToken = this.advance();
    const assign = this.consume(TokenType.Assign, "Expect '=' after variable name.");

    return { type: 'Assignment', name: nameToken.value, value: this.parseValue(assign), line: nameToken.line, column: nameToken.column };
  }

  private parseBody(): BlockBody {
    const attributes: Record<string, AttributeValue> = {};
    const blocks: NestedBlock[] = [];

    while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
      // A new top-level block means this one was never closed.
      if (this.atStatementStart()) this.error("Expect '}' after block body.");

      const keyToken = this.consumeKey();
      if (this.check(TokenType.Assign)) {
        const assign = this.advance();
        attributes[keyToken.value] = this.parseValue(assign);
      } else blocks.push(this.parseNestedBlock(keyToken));
    }

    this.consume(TokenType.RBrace, "Expect '}' after block body.");

    return { attributes, blocks };
  }

  private parseNestedBlock(keyToken: Token): NestedBlock {
    // ingress { ... } / dynamic "tag" { ... }
    const labels = this.parseLabels();
    this.consume(TokenType.LBrace, labels.length > 0 ? "Expect '{' after block labels." : "Expect '=' after attribute name.");

    const body = this.parseBody();

    return {
      blockType: keyToken.value,
      labels,
      ...body,
      source: this.source.slice(keyToken.start, this.previous().end),
    };
  }

  private parseLabels(): string[] {
    const labels: string[] = [];
    while (this.check(TokenType.String) || this.check(TokenType.Identifier)) labels.push(this.advance().value);
    return labels;
  }

  private parseValue(assign: Token): AttributeValue {
    const first = this.peek();
    if (this.isAtEnd() || first.line !== assign.line) return this.error("Expect value after '='.");

    const tokens = this.consumeExpression();
    if (tokens.length === 0) return this.error(`Unexpected value: ${first.value}`);

    if (tokens.length === 1) {
      const [token] = tokens;
      if (token.type === TokenType.String || token.type === TokenType.Heredoc) return { type: 'String', value: token.value };
      if (token.type === TokenType.Number) return { type: 'Number', value: Number(token.value) };
      if (token.type === TokenType.Boolean) return { type: 'Boolean', value: token.value === 'true' };
    }

    // Reference Parsing: identifier.key.subkey
    if (isReference(tokens)) return { type: 'Reference', value: tokens.filter((t) => t.type !== TokenType.Dot).map((t) => t.value) };

    const last = tokens.at(-1) ?? first;
    return { type: 'Expression', value: this.source.slice(first.start, last.end) };
  }

  /**
   * Consumes one attribute value: everything up to the end of the line, with open
   * brackets carrying it over further lines.
   */
  private consumeExpression(): Token[] {
    const consumed: Token[] = [];
    const open: TokenType[] = [];

    while (!this.isAtEnd()) {
      const token = this.peek();
      const previous = consumed.at(-1);

      // A block keyword opening a line belongs to the next statement, whatever is still open.
      if (previous && token.line !== previous.line && this.atStatementStart()) break;

      if (open.length === 0) {
        if (previous && token.line !== previous.line) break;
        if (token.type === TokenType.Comma || token.type === TokenType.RBrace) break;
      }

      const opener = CLOSERS.get(token.type);
      if (OPENERS.has(token.type)) open.push(token.type);
      else if (opener) {
        if (open.length === 0) break;
        if (open.pop() !== opener) this.error('Unbalanced brackets in attribute value.');
      }

      consumed.push(this.advance());
    }

    if (open.length > 0) this.error('Unbalanced brackets in attribute value.');
    return consumed;
  }

  /** Skips to the next top-level block, always moving past the failed statement's first token. */
  private synchronize(start: number): void {
    if (this.current === start) this.advance();
    while (!this.isAtEnd() && !this.atStatementStart()) this.advance();
  }

  private atStatementStart(): boolean {
    if (!BLOCK_KEYWORDS.includes(this.peek().type)) return false;
    return this.checkNext(TokenType.String) || this.checkNext(TokenType.LBrace);
  }

  private consumeKey(): Token {
    if (this.check(TokenType.Identifier) || BLOCK_KEYWORDS.includes(this.peek().type)) return this.advance();
    return this.error('Expect attribute name.');
  }

  private consumeLabel(message: string): Token {
    if (this.check(TokenType.String) || this.check(TokenType.Identifier)) return this.advance();
    return this.error(message);
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    return this.error(message);
  }

  private error(message: string): never {
    const token = this.peek();
    throw new ParseError(message, token.line, token.column);
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private checkNext(type: TokenType): boolean {
    const next = this.tokens[this.current + 1];
    return next !== undefined && next.type === type;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }
}

const REFERENCE_PARTS = new Set([TokenType.Identifier, TokenType.Number, ...BLOCK_KEYWORDS]);

function isReference(tokens: Token[]): boolean {
  if (tokens[0].type === TokenType.Number) return false;
  return tokens.every((token, index) => (index % 2 === 0 ? REFERENCE_PARTS.has(token.type) : token.type === TokenType.Dot)) && tokens.length % 2 === 1;
}
