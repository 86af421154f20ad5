/** Raised inside the parser for a malformed statement; turned into a diagnostic at statement level. */
export class ParseError extends Error {
  public readonly reason: string;
  public readonly line: number;
  public readonly column: number;

  constructor(reason: string, line: number, column: number) {
    super(`[Line ${line}, Column ${column}] ${reason}`);
    this.name = 'ParseError';
    this.reason = reason;
    this.line = line;
    this.column = column;
  }
}
