import { Token, TokenType } from './tokens';

interface TokenSpec {
  type: TokenType;
  regex: RegExp;
}

const WORD_END = '(?![\\w-])';

export class Lexer {
  private input: string = '';
  private cursor: number = 0;
  private line: number = 1;
  private column: number = 1;

  // Regex rules (Order matters!)
  private specs: TokenSpec[] = [
    { type: TokenType.Resource, regex: new RegExp(`^resource${WORD_END}`) },
    { type: TokenType.Provider, regex: new RegExp(`^provider${WORD_END}`) },
    { type: TokenType.Module, regex: new RegExp(`^module${WORD_END}`) },
    { type: TokenType.Data, regex: new RegExp(`^data${WORD_END}`) },
    { type: TokenType.Variable, regex: new RegExp(`^variable${WORD_END}`) },
    { type: TokenType.Output, regex: new RegExp(`^output${WORD_END}`) },
    { type: TokenType.Locals, regex: new RegExp(`^locals${WORD_END}`) },
    { type: TokenType.Terraform, regex: new RegExp(`^terraform${WORD_END}`) },
    { type: TokenType.Boolean, regex: new RegExp(`^(true|false)${WORD_END}`) },
    { type: TokenType.Identifier, regex: /^[A-Z_a-z][\w-]*/ },
    { type: TokenType.Number, regex: /^\d+(\.\d+)?([Ee][+-]?\d+)?/ },
    { type: TokenType.LBrace, regex: /^{/ },
    { type: TokenType.RBrace, regex: /^}/ },
    { type: TokenType.LBracket, regex: /^\[/ },
    { type: TokenType.RBracket, regex: /^]/ },
    { type: TokenType.LParen, regex: /^\(/ },
    { type: TokenType.RParen, regex: /^\)/ },
    { type: TokenType.Symbol, regex: /^(==|!=|<=|>=|&&|\|\||=>|\.\.\.)/ },
    { type: TokenType.Dot, regex: /^\./ },
    { type: TokenType.Assign, regex: /^=/ },
    { type: TokenType.Comma, regex: /^,/ },
    { type: TokenType.Colon, regex: /^:/ },
    { type: TokenType.Symbol, regex: /^\S/ },
  ];

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    this.cursor = 0;
    this.line = 1;
    this.column = 1;

    while (this.cursor < this.input.length) {
      const remaining = this.input.slice(this.cursor);

      // 1. Skip Whitespace
      const whitespaceMatch = remaining.match(/^\s+/);
      if (whitespaceMatch) {
        this.advance(whitespaceMatch[0]);
        continue;
      }

      // 2. Skip Comments (#, // or /* */)
      const comment = this.matchComment(remaining);
      if (comment !== null) {
        this.advance(comment);
        continue;
      }

      // 3. Strings and heredocs need more than a regex
      const quoted = remaining.startsWith('"') ? scanString(remaining) : null;
      if (quoted !== null) {
        tokens.push(this.makeToken(TokenType.String, unescape(quoted.slice(1, -1)), quoted));
        continue;
      }

      const heredoc = remaining.startsWith('<<') ? scanHeredoc(remaining) : null;
      if (heredoc) {
        tokens.push(this.makeToken(TokenType.Heredoc, heredoc.body, heredoc.text));
        continue;
      }

      // 4. Match Token. The last rule matches any character, so this always succeeds.
      for (const spec of this.specs) {
        const match = remaining.match(spec.regex);
        if (match) {
          tokens.push(this.makeToken(spec.type, match[0], match[0]));
          break;
        }
      }
    }

    tokens.push({ type: TokenType.EOF, value: '', line: this.line, column: this.column, start: this.cursor, end: this.cursor });
    return tokens;
  }

  private matchComment(remaining: string): string | null {
    if (remaining.startsWith('/*')) {
      const close = remaining.indexOf('*/', 2);
      return close === -1 ? remaining : remaining.slice(0, close + 2);
    }

    if (remaining.startsWith('#') || remaining.startsWith('//')) {
      const lineEndIndex = remaining.indexOf('\n');
      // Comment goes to end of file
      if (lineEndIndex === -1) return remaining;
      return remaining.slice(0, lineEndIndex + 1);
    }

    return null;
  }

  private makeToken(type: TokenType, value: string, text: string): Token {
    const token: Token = { type, value, line: this.line, column: this.column, start: this.cursor, end: this.cursor + text.length };
    this.advance(text);
    return token;
  }

  private advance(text: string) {
    for (const char of text)
      if (char === '\n') {
        this.line++;
        this.column = 1;
      } else this.column++;
    this.cursor += text.length;
  }
}

/**
 * Returns the quoted literal at the start of `text`, including both quotes,
 * or null when the string is not closed before the end of the line.
 * Quotes inside ${...} interpolations do not end the string.
 */
function scanString(text: string): string | null {
  let depth = 0;
  let i = 1;

  while (i < text.length) {
    const char = text[i];

    if (char === '\\') {
      i += 2;
      continue;
    }
    if (char === '\n' && depth === 0) return null;

    if (depth === 0) {
      if (char === '"') return text.slice(0, i + 1);
      if (char === '$' && text[i + 1] === '{') {
        depth++;
        i += 2;
        continue;
      }
    } else if (char === '{') depth++;
    else if (char === '}') depth--;
    else if (char === '"') {
      const nested = scanString(text.slice(i));
      if (nested === null) return null;
      i += nested.length;
      continue;
    }

    i++;
  }

  return null;
}

function scanHeredoc(text: string): { text: string; body: string } | null {
  const opener = text.match(/^<<-?([A-Z_a-z]\w*)[\t ]*\r?\n/);
  if (!opener) return null;

  const marker = opener[1];
  const lines = text.slice(opener[0].length).split('\n');
  const body: string[] = [];
  let consumed = opener[0].length;

  for (const line of lines) {
    if (line.trim() === marker) return { text: text.slice(0, consumed + line.length), body: body.join('\n') };
    body.push(line);
    consumed += line.length + 1;
  }

  return null;
}

function unescape(value: string): string {
  return value.replace(/\\(["\\])/g, '$1');
}
