export enum TokenType {
  Resource = 'RESOURCE', // 'resource' keyword
  Provider = 'PROVIDER', // 'provider' keyword
  Module = 'MODULE', // 'module' keyword
  Data = 'DATA', // 'data' keyword
  Variable = 'VARIABLE', // 'variable' keyword
  Output = 'OUTPUT', // 'output' keyword
  Locals = 'LOCALS', // 'locals' keyword
  Terraform = 'TERRAFORM', // 'terraform' keyword
  Identifier = 'IDENTIFIER', // Attribute names, block types, reference parts
  String = 'STRING', // "value"
  Heredoc = 'HEREDOC', // <<EOF ... EOF
  Number = 'NUMBER', // 123, 1.5
  Boolean = 'BOOLEAN', // true, false
  LBrace = 'LBRACE', // {
  RBrace = 'RBRACE', // }
  LBracket = 'LBRACKET', // [
  RBracket = 'RBRACKET', // ]
  LParen = 'LPAREN', // (
  RParen = 'RPAREN', // )
  Assign = 'ASSIGN', // =
  Dot = 'DOT', // . (for references)
  Comma = 'COMMA', // ,
  Colon = 'COLON', // :
  Symbol = 'SYMBOL', // any other character (operators, stray quotes)
  EOF = 'EOF', // End of File
}

/** Keywords that open a top-level block. */
export const BLOCK_KEYWORDS: readonly TokenType[] = [
  TokenType.Resource,
  TokenType.Provider,
  TokenType.Module,
  TokenType.Data,
  TokenType.Variable,
  TokenType.Output,
  TokenType.Locals,
  TokenType.Terraform,
];

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
  start: number; // offset of the first character in the source
  end: number; // offset just past the last character
}
