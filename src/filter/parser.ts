import { FilterParseError } from '../errors.js';
import { listComparison, logical, negate, scalarComparison } from './builder.js';
import type { Expression, ListOperator, ScalarOperator, Value } from './types.js';

const IDENT_START = /[A-Za-z_]/;
const IDENT_CHAR = /[A-Za-z0-9_]/;
const WHITESPACE = /[ \t\n\r]/;
const NUMBER = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/;

// Longest symbols first so '>=' is not read as '>'.
const COMPARATORS: ReadonlyArray<readonly [string, ScalarOperator]> = [
  ['==', 'EQ'],
  ['!=', 'NE'],
  ['>=', 'GTE'],
  ['<=', 'LTE'],
  ['>', 'GT'],
  ['<', 'LT'],
];

const ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  r: '\r',
  t: '\t',
};

const EXPECT_CONNECTIVE = ['&&', '||', 'AND', 'OR'];
const EXPECT_END = [...EXPECT_CONNECTIVE, 'end of input'];
const EXPECT_CLOSE = [...EXPECT_CONNECTIVE, ')'];
const EXPECT_PRIMARY = ['(', '!', 'NOT', 'identifier'];
const EXPECT_COMPARATOR = [...COMPARATORS.map(([symbol]) => symbol), 'IN', 'NIN', 'NOT IN'];
const EXPECT_SCALAR = ['string', 'number', 'boolean'];

/**
 * Recursive descent parser for the filter DSL:
 *
 *   orExpr     := andExpr (('||' | OR) andExpr)*
 *   andExpr    := unary (('&&' | AND) unary)*
 *   unary      := ('!' | NOT) unary | '(' orExpr ')' | comparison
 *   comparison := key op scalar | key (IN | NIN | NOT IN) '[' scalar (',' scalar)* ']'
 */
class Parser {
  private index = 0;

  constructor(private readonly input: string) {}

  parse(): Expression | null {
    this.skipWhitespace();
    if (this.isEof()) {
      return null;
    }

    const expression = this.parseOr();
    this.skipWhitespace();

    if (!this.isEof()) {
      throw this.error(EXPECT_END);
    }

    return expression;
  }

  private parseOr(): Expression {
    const first = this.parseAnd();
    const rest: Expression[] = [];
    while (this.acceptConnective('||', 'OR')) {
      rest.push(this.parseAnd());
    }
    return rest.length === 0 ? first : logical('or', [first, ...rest]);
  }

  private parseAnd(): Expression {
    const first = this.parseUnary();
    const rest: Expression[] = [];
    while (this.acceptConnective('&&', 'AND')) {
      rest.push(this.parseUnary());
    }
    return rest.length === 0 ? first : logical('and', [first, ...rest]);
  }

  private parseUnary(): Expression {
    this.skipWhitespace();

    if (this.peek() === '!' && this.input[this.index + 1] !== '=') {
      this.index += 1;
      return negate(this.parseUnary());
    }

    if (this.acceptKeyword('NOT')) {
      return negate(this.parseUnary());
    }

    if (this.peek() === '(') {
      this.index += 1;
      const inner = this.parseOr();
      this.skipWhitespace();
      if (this.peek() !== ')') {
        throw this.error(EXPECT_CLOSE);
      }
      this.index += 1;
      return inner;
    }

    if (IDENT_START.test(this.peek() ?? '')) {
      return this.parseComparison();
    }

    throw this.error(EXPECT_PRIMARY);
  }

  private parseComparison(): Expression {
    const key = this.parseKey();
    this.skipWhitespace();

    for (const [symbol, operator] of COMPARATORS) {
      if (this.input.startsWith(symbol, this.index)) {
        this.index += symbol.length;
        return scalarComparison(operator, key, this.parseScalar());
      }
    }

    if (this.acceptKeyword('IN')) {
      return this.parseList('IN', key);
    }

    if (this.acceptKeyword('NIN')) {
      return this.parseList('NIN', key);
    }

    if (this.acceptKeyword('NOT')) {
      if (!this.acceptKeyword('IN')) {
        throw this.error(['IN']);
      }
      return this.parseList('NIN', key);
    }

    throw this.error(EXPECT_COMPARATOR);
  }

  private parseList(operator: ListOperator, key: string): Expression {
    this.skipWhitespace();
    if (this.peek() !== '[') {
      throw this.error(['[']);
    }
    this.index += 1;

    const values: Value[] = [];
    while (true) {
      values.push(this.parseScalar());
      this.skipWhitespace();

      if (this.peek() === ',') {
        this.index += 1;
        continue;
      }

      if (this.peek() === ']') {
        this.index += 1;
        break;
      }

      throw this.error([',', ']']);
    }

    return listComparison(operator, key, values);
  }

  private parseKey(): string {
    const start = this.index;
    while (!this.isEof() && IDENT_CHAR.test(this.peek() ?? '')) {
      this.index += 1;
    }
    return this.input.slice(start, this.index);
  }

  private parseScalar(): Value {
    this.skipWhitespace();
    const char = this.peek();

    if (char === "'" || char === '"') {
      return this.parseString(char);
    }

    if (char === '-' || /\d/.test(char ?? '')) {
      return this.parseNumber();
    }

    if (this.acceptKeyword('TRUE')) {
      return true;
    }

    if (this.acceptKeyword('FALSE')) {
      return false;
    }

    throw this.error(EXPECT_SCALAR);
  }

  private parseString(quote: string): string {
    this.index += 1;
    let value = '';

    while (true) {
      const char = this.peek();
      if (char === undefined) {
        throw this.error([quote]);
      }

      if (char === quote) {
        this.index += 1;
        return value;
      }

      if (char === '\\') {
        const escaped = ESCAPES[this.input[this.index + 1] ?? ''];
        if (escaped === undefined) {
          this.index += 1;
          throw this.error(Object.keys(ESCAPES).map((e) => `\\${e}`));
        }
        value += escaped;
        this.index += 2;
        continue;
      }

      value += char;
      this.index += 1;
    }
  }

  private parseNumber(): number {
    const match = NUMBER.exec(this.input.slice(this.index));
    if (match === null) {
      throw this.error(['number']);
    }

    const value = Number(match[0]);
    if (!Number.isFinite(value)) {
      throw this.error(['finite number']);
    }

    // Integers past 2^53 would be rounded to a different value.
    if (!/[.eE]/.test(match[0]) && !Number.isSafeInteger(value)) {
      throw this.error(['safe integer']);
    }

    this.index += match[0].length;
    return value;
  }

  private acceptConnective(symbol: string, keyword: string): boolean {
    this.skipWhitespace();
    if (this.input.startsWith(symbol, this.index)) {
      this.index += symbol.length;
      return true;
    }
    return this.acceptKeyword(keyword);
  }

  /** Case-insensitive keyword that is not the prefix of a longer identifier. */
  private acceptKeyword(keyword: string): boolean {
    this.skipWhitespace();
    const end = this.index + keyword.length;
    if (this.input.slice(this.index, end).toUpperCase() !== keyword) {
      return false;
    }
    if (IDENT_CHAR.test(this.input[end] ?? '')) {
      return false;
    }
    this.index = end;
    return true;
  }

  private skipWhitespace(): void {
    while (!this.isEof() && WHITESPACE.test(this.peek() ?? '')) {
      this.index += 1;
    }
  }

  private isEof(): boolean {
    return this.index >= this.input.length;
  }

  private peek(): string | undefined {
    return this.input[this.index];
  }

  private currentToken(): string {
    if (this.isEof()) {
      return '';
    }
    if (IDENT_CHAR.test(this.peek() ?? '')) {
      let end = this.index;
      while (end < this.input.length && IDENT_CHAR.test(this.input[end] ?? '')) {
        end += 1;
      }
      return this.input.slice(this.index, end);
    }
    return this.input[this.index] ?? '';
  }

  private error(expected: readonly string[]): FilterParseError {
    // Offsets are reported in UTF-8 bytes, not UTF-16 code units.
    const position = Buffer.byteLength(this.input.slice(0, this.index), 'utf8');
    return new FilterParseError(position, expected, this.currentToken());
  }
}

/**
 * Parses filter text such as `author in ['john','jill'] && article_type == 'blog'`.
 * Returns null for empty or whitespace-only input, meaning "no filter".
 */
export function parseFilter(input: string): Expression | null {
  return new Parser(input).parse();
}
