/**
 * Query parser - Parses query text into the statement AST.
 *
 * Supports: SELECT (fields, FROM, WHERE, LIMIT, OFFSET), DROP SERIES,
 * DROP MEASUREMENT, SHOW MEASUREMENTS / SERIES / TAG KEYS / TAG VALUES /
 * FIELD KEYS / DATABASES / RETENTION POLICIES / USERS, CREATE / DROP DATABASE,
 * CREATE / DROP USER, GRANT and REVOKE. Statements are separated by `;`.
 */

import { QueryError } from '@strata/core';
import type {
  BinaryOperator,
  Expr,
  Measurement,
  Privilege,
  Query,
  SelectField,
  Statement,
} from './ast.js';

export interface ParseError {
  message: string;
  position: number;
}

export type ParseResult =
  | { success: true; query: Query }
  | { success: false; error: ParseError };

type TokenType =
  | 'SELECT'
  | 'FROM'
  | 'WHERE'
  | 'AND'
  | 'OR'
  | 'AS'
  | 'LIMIT'
  | 'OFFSET'
  | 'DROP'
  | 'SERIES'
  | 'MEASUREMENT'
  | 'MEASUREMENTS'
  | 'SHOW'
  | 'TAG'
  | 'KEYS'
  | 'KEY'
  | 'VALUES'
  | 'FIELD'
  | 'WITH'
  | 'IN'
  | 'ON'
  | 'DATABASE'
  | 'DATABASES'
  | 'RETENTION'
  | 'POLICIES'
  | 'CREATE'
  | 'IF'
  | 'NOT'
  | 'EXISTS'
  | 'USER'
  | 'USERS'
  | 'PASSWORD'
  | 'ALL'
  | 'PRIVILEGES'
  | 'GRANT'
  | 'REVOKE'
  | 'TO'
  | 'READ'
  | 'WRITE'
  | 'TRUE'
  | 'FALSE'
  | 'IDENTIFIER'
  | 'STRING'
  | 'NUMBER'
  | 'DURATION'
  | 'STAR'
  | 'COMMA'
  | 'DOT'
  | 'SEMICOLON'
  | 'LPAREN'
  | 'RPAREN'
  | 'EQ'
  | 'NE'
  | 'LT'
  | 'LTE'
  | 'GT'
  | 'GTE'
  | 'PLUS'
  | 'MINUS'
  | 'EOF';

interface Token {
  type: TokenType;
  value: string;
  position: number;
}

const KEYWORDS: ReadonlySet<string> = new Set<TokenType>([
  'SELECT',
  'FROM',
  'WHERE',
  'AND',
  'OR',
  'AS',
  'LIMIT',
  'OFFSET',
  'DROP',
  'SERIES',
  'MEASUREMENT',
  'MEASUREMENTS',
  'SHOW',
  'TAG',
  'KEYS',
  'KEY',
  'VALUES',
  'FIELD',
  'WITH',
  'IN',
  'ON',
  'DATABASE',
  'DATABASES',
  'RETENTION',
  'POLICIES',
  'CREATE',
  'IF',
  'NOT',
  'EXISTS',
  'USER',
  'USERS',
  'PASSWORD',
  'ALL',
  'PRIVILEGES',
  'GRANT',
  'REVOKE',
  'TO',
  'READ',
  'WRITE',
  'TRUE',
  'FALSE',
]);

function isKeyword(word: string): word is TokenType {
  return KEYWORDS.has(word);
}

/** Nanoseconds per duration unit */
const DURATION_UNITS: Record<string, bigint> = {
  ns: 1n,
  u: 1_000n,
  µ: 1_000n,
  ms: 1_000_000n,
  s: 1_000_000_000n,
  m: 60_000_000_000n,
  h: 3_600_000_000_000n,
  d: 86_400_000_000_000n,
  w: 604_800_000_000_000n,
};

/**
 * Lexer for tokenizing query text
 */
class Lexer {
  private pos = 0;
  private readonly input: string;

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      this.skipWhitespace();
      if (this.pos >= this.input.length) break;
      tokens.push(this.nextToken());
    }
    tokens.push({ type: 'EOF', value: '', position: this.pos });
    return tokens;
  }

  private peek(offset = 0): string {
    return this.input[this.pos + offset] ?? '';
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && /\s/.test(this.peek())) {
      this.pos++;
    }
  }

  private nextToken(): Token {
    const ch = this.peek();
    const pos = this.pos;

    const singleChars: Record<string, TokenType> = {
      '*': 'STAR',
      ',': 'COMMA',
      '.': 'DOT',
      ';': 'SEMICOLON',
      '(': 'LPAREN',
      ')': 'RPAREN',
      '+': 'PLUS',
      '-': 'MINUS',
    };
    const single = singleChars[ch];
    if (single) {
      this.pos++;
      return { type: single, value: ch, position: pos };
    }

    const two = ch + this.peek(1);
    const twoChars: Record<string, TokenType> = { '!=': 'NE', '<>': 'NE', '<=': 'LTE', '>=': 'GTE' };
    const double = twoChars[two];
    if (double) {
      this.pos += 2;
      return { type: double, value: two, position: pos };
    }
    if (ch === '=') {
      this.pos++;
      return { type: 'EQ', value: ch, position: pos };
    }
    if (ch === '<') {
      this.pos++;
      return { type: 'LT', value: ch, position: pos };
    }
    if (ch === '>') {
      this.pos++;
      return { type: 'GT', value: ch, position: pos };
    }

    if (ch === "'") {
      return { type: 'STRING', value: this.readQuoted("'"), position: pos };
    }
    if (ch === '"') {
      // Quoted identifiers are never keywords
      return { type: 'IDENTIFIER', value: this.readQuoted('"'), position: pos };
    }

    if (/\d/.test(ch)) {
      return this.readNumber();
    }

    if (/[A-Za-z_]/.test(ch)) {
      return this.readIdentifier();
    }

    throw new LexError(`unexpected character '${ch}'`, pos);
  }

  private readQuoted(quote: string): string {
    const start = this.pos;
    this.pos++;
    let value = '';
    while (this.pos < this.input.length && this.peek() !== quote) {
      if (this.peek() === '\\' && this.pos + 1 < this.input.length) {
        this.pos++;
      }
      value += this.peek();
      this.pos++;
    }
    if (this.pos >= this.input.length) {
      throw new LexError('unterminated quoted string', start);
    }
    this.pos++;
    return value;
  }

  private readNumber(): Token {
    const pos = this.pos;
    let value = '';
    while (/\d/.test(this.peek())) {
      value += this.peek();
      this.pos++;
    }

    const unit = this.matchDurationUnit();
    if (unit) {
      this.pos += unit.length;
      return { type: 'DURATION', value: value + unit, position: pos };
    }

    if (this.peek() === '.' && /\d/.test(this.peek(1))) {
      value += '.';
      this.pos++;
      while (/\d/.test(this.peek())) {
        value += this.peek();
        this.pos++;
      }
    }
    return { type: 'NUMBER', value, position: pos };
  }

  private matchDurationUnit(): string | null {
    for (const unit of ['ns', 'ms', 'u', 'µ', 's', 'm', 'h', 'd', 'w']) {
      if (this.input.startsWith(unit, this.pos)) {
        const after = this.input[this.pos + unit.length] ?? '';
        if (!/[A-Za-z0-9_]/.test(after)) return unit;
      }
    }
    return null;
  }

  private readIdentifier(): Token {
    const pos = this.pos;
    let value = '';
    while (/[A-Za-z0-9_]/.test(this.peek())) {
      value += this.peek();
      this.pos++;
    }
    const upper = value.toUpperCase();
    return { type: isKeyword(upper) ? upper : 'IDENTIFIER', value, position: pos };
  }
}

class LexError extends Error {
  constructor(
    message: string,
    readonly position: number
  ) {
    super(message);
  }
}

const COMPARISON_OPS: Partial<Record<TokenType, BinaryOperator>> = {
  EQ: '=',
  NE: '!=',
  LT: '<',
  LTE: '<=',
  GT: '>',
  GTE: '>=',
};

/**
 * Recursive descent parser
 */
class Parser {
  private tokens: Token[] = [];
  private pos = 0;

  parse(input: string): ParseResult {
    try {
      this.tokens = new Lexer(input).tokenize();
      this.pos = 0;
      return { success: true, query: this.parseQuery() };
    } catch (err) {
      const position =
        err instanceof LexError ? err.position : (this.tokens[this.pos]?.position ?? 0);
      return {
        success: false,
        error: { message: err instanceof Error ? err.message : String(err), position },
      };
    }
  }

  private parseQuery(): Query {
    const statements: Statement[] = [];
    for (;;) {
      while (this.matchAndAdvance('SEMICOLON')) {
        // empty statement
      }
      if (this.current().type === 'EOF') break;
      statements.push(this.parseStatement());
      if (this.current().type !== 'EOF') this.expect('SEMICOLON');
    }
    if (statements.length === 0) {
      throw new Error('query contains no statements');
    }
    return { statements };
  }

  private parseStatement(): Statement {
    const token = this.advance();
    switch (token.type) {
      case 'SELECT':
        return this.parseSelect();
      case 'DROP':
        return this.parseDrop();
      case 'SHOW':
        return this.parseShow();
      case 'CREATE':
        return this.parseCreate();
      case 'GRANT':
        return this.parseGrantRevoke('grant');
      case 'REVOKE':
        return this.parseGrantRevoke('revoke');
      default:
        throw new Error(
          `found ${this.describe(token)}, expected SELECT, DROP, SHOW, CREATE, GRANT, REVOKE`
        );
    }
  }

  private parseSelect(): Statement {
    const fields: SelectField[] = [];
    do {
      if (this.matchAndAdvance('STAR')) {
        fields.push({ type: 'wildcard' });
      } else {
        const name = this.parseIdent();
        const alias = this.matchAndAdvance('AS') ? this.parseIdent() : undefined;
        fields.push({ type: 'field', name, ...(alias ? { alias } : {}) });
      }
    } while (this.matchAndAdvance('COMMA'));

    this.expect('FROM');
    const sources = this.parseSources();
    const condition = this.matchAndAdvance('WHERE') ? this.parseExpr() : undefined;
    const limit = this.matchAndAdvance('LIMIT') ? this.parseInteger() : 0;
    const offset = this.matchAndAdvance('OFFSET') ? this.parseInteger() : 0;

    return { kind: 'select', fields, sources, condition, limit, offset };
  }

  private parseDrop(): Statement {
    const token = this.advance();
    switch (token.type) {
      case 'SERIES': {
        const sources = this.matchAndAdvance('FROM') ? this.parseSources() : [];
        const condition = this.matchAndAdvance('WHERE') ? this.parseExpr() : undefined;
        if (sources.length === 0 && !condition) {
          throw new Error('DROP SERIES requires a FROM or WHERE clause');
        }
        return { kind: 'drop_series', sources, condition };
      }
      case 'MEASUREMENT':
        return { kind: 'drop_measurement', name: this.parseIdent() };
      case 'DATABASE':
        return { kind: 'drop_database', name: this.parseIdent() };
      case 'USER':
        return { kind: 'drop_user', name: this.parseIdent() };
      default:
        throw new Error(
          `found ${this.describe(token)}, expected SERIES, MEASUREMENT, DATABASE, USER`
        );
    }
  }

  private parseShow(): Statement {
    const token = this.advance();
    switch (token.type) {
      case 'MEASUREMENTS':
        return { kind: 'show_measurements', database: this.parseOnDatabase() };
      case 'SERIES': {
        const database = this.parseOnDatabase();
        return { kind: 'show_series', database, sources: this.parseFromSources() };
      }
      case 'TAG': {
        const next = this.advance();
        if (next.type === 'KEYS') {
          const database = this.parseOnDatabase();
          return { kind: 'show_tag_keys', database, sources: this.parseFromSources() };
        }
        if (next.type === 'VALUES') {
          const database = this.parseOnDatabase();
          const sources = this.parseFromSources();
          this.expect('WITH');
          this.expect('KEY');
          return { kind: 'show_tag_values', database, sources, tagKeys: this.parseTagKeyList() };
        }
        throw new Error(`found ${this.describe(next)}, expected KEYS, VALUES`);
      }
      case 'FIELD': {
        this.expect('KEYS');
        const database = this.parseOnDatabase();
        return { kind: 'show_field_keys', database, sources: this.parseFromSources() };
      }
      case 'DATABASES':
        return { kind: 'show_databases' };
      case 'RETENTION':
        this.expect('POLICIES');
        this.expect('ON');
        return { kind: 'show_retention_policies', database: this.parseIdent() };
      case 'USERS':
        return { kind: 'show_users' };
      default:
        throw new Error(
          `found ${this.describe(token)}, expected MEASUREMENTS, SERIES, TAG, FIELD, DATABASES, RETENTION, USERS`
        );
    }
  }

  private parseCreate(): Statement {
    const token = this.advance();
    if (token.type === 'DATABASE') {
      let ifNotExists = false;
      if (this.matchAndAdvance('IF')) {
        this.expect('NOT');
        this.expect('EXISTS');
        ifNotExists = true;
      }
      return { kind: 'create_database', name: this.parseIdent(), ifNotExists };
    }
    if (token.type === 'USER') {
      const name = this.parseIdent();
      this.expect('WITH');
      this.expect('PASSWORD');
      const password = this.expect('STRING').value;
      let admin = false;
      if (this.matchAndAdvance('WITH')) {
        this.expect('ALL');
        this.expect('PRIVILEGES');
        admin = true;
      }
      return { kind: 'create_user', name, password, admin };
    }
    throw new Error(`found ${this.describe(token)}, expected DATABASE, USER`);
  }

  private parseGrantRevoke(kind: 'grant' | 'revoke'): Statement {
    const privilege = this.parsePrivilege();
    const database = this.matchAndAdvance('ON') ? this.parseIdent() : undefined;
    if (!database && privilege !== 'ALL') {
      throw new Error(`${kind.toUpperCase()} ${privilege} requires ON <database>`);
    }
    this.expect(kind === 'grant' ? 'TO' : 'FROM');
    const user = this.parseIdent();
    return kind === 'grant'
      ? { kind: 'grant', privilege, user, database }
      : { kind: 'revoke', privilege, user, database };
  }

  private parsePrivilege(): Privilege {
    const token = this.advance();
    switch (token.type) {
      case 'READ':
        return 'READ';
      case 'WRITE':
        return 'WRITE';
      case 'ALL':
        this.matchAndAdvance('PRIVILEGES');
        return 'ALL';
      default:
        throw new Error(`found ${this.describe(token)}, expected READ, WRITE, ALL`);
    }
  }

  private parseOnDatabase(): string | undefined {
    return this.matchAndAdvance('ON') ? this.parseIdent() : undefined;
  }

  private parseFromSources(): Measurement[] {
    return this.matchAndAdvance('FROM') ? this.parseSources() : [];
  }

  private parseTagKeyList(): string[] {
    if (this.matchAndAdvance('EQ')) {
      return [this.parseIdent()];
    }
    this.expect('IN');
    this.expect('LPAREN');
    const keys: string[] = [];
    do {
      keys.push(this.parseIdent());
    } while (this.matchAndAdvance('COMMA'));
    this.expect('RPAREN');
    return keys;
  }

  private parseSources(): Measurement[] {
    const sources: Measurement[] = [];
    do {
      sources.push(this.parseMeasurement());
    } while (this.matchAndAdvance('COMMA'));
    return sources;
  }

  /** `name`, `rp.name`, `db.rp.name` or `db..name` */
  private parseMeasurement(): Measurement {
    const segments: string[] = [this.parseIdent()];
    while (segments.length < 3 && this.matchAndAdvance('DOT')) {
      segments.push(this.current().type === 'DOT' ? '' : this.parseIdent());
    }
    const [first = '', second = '', third = ''] = segments;
    if (segments.length === 1) return { name: first };
    if (segments.length === 2) return { retentionPolicy: first, name: second };
    return {
      database: first,
      ...(second ? { retentionPolicy: second } : {}),
      name: third,
    };
  }

  private parseExpr(): Expr {
    let lhs = this.parseAnd();
    while (this.matchAndAdvance('OR')) {
      lhs = { type: 'binary', op: 'OR', lhs, rhs: this.parseAnd() };
    }
    return lhs;
  }

  private parseAnd(): Expr {
    let lhs = this.parseComparison();
    while (this.matchAndAdvance('AND')) {
      lhs = { type: 'binary', op: 'AND', lhs, rhs: this.parseComparison() };
    }
    return lhs;
  }

  private parseComparison(): Expr {
    const lhs = this.parseAdditive();
    const op = COMPARISON_OPS[this.current().type];
    if (op) {
      this.advance();
      return { type: 'binary', op, lhs, rhs: this.parseAdditive() };
    }
    return lhs;
  }

  private parseAdditive(): Expr {
    let lhs = this.parsePrimary();
    for (;;) {
      if (this.matchAndAdvance('PLUS')) {
        lhs = { type: 'binary', op: '+', lhs, rhs: this.parsePrimary() };
      } else if (this.matchAndAdvance('MINUS')) {
        lhs = { type: 'binary', op: '-', lhs, rhs: this.parsePrimary() };
      } else {
        return lhs;
      }
    }
  }

  private parsePrimary(): Expr {
    const token = this.advance();
    switch (token.type) {
      case 'LPAREN': {
        const expr = this.parseExpr();
        this.expect('RPAREN');
        return expr;
      }
      case 'STRING':
        return { type: 'string', value: token.value };
      case 'NUMBER':
        return { type: 'number', value: Number(token.value), raw: token.value };
      case 'MINUS': {
        const next = this.expect('NUMBER');
        const raw = `-${next.value}`;
        return { type: 'number', value: Number(raw), raw };
      }
      case 'DURATION':
        return { type: 'duration', ns: parseDuration(token.value), raw: token.value };
      case 'TRUE':
        return { type: 'boolean', value: true };
      case 'FALSE':
        return { type: 'boolean', value: false };
      case 'IDENTIFIER':
        if (token.value.toLowerCase() === 'now' && this.current().type === 'LPAREN') {
          this.advance();
          this.expect('RPAREN');
          return { type: 'now' };
        }
        return { type: 'ref', name: token.value };
      default:
        throw new Error(`found ${this.describe(token)}, expected expression`);
    }
  }

  private parseIdent(): string {
    return this.expect('IDENTIFIER').value;
  }

  private parseInteger(): number {
    const token = this.expect('NUMBER');
    if (!/^\d+$/.test(token.value)) {
      throw new Error(`expected integer, found ${token.value}`);
    }
    return Number.parseInt(token.value, 10);
  }

  // --- Helpers ---

  private current(): Token {
    return this.tokens[this.pos] ?? { type: 'EOF', value: '', position: 0 };
  }

  private advance(): Token {
    const token = this.current();
    if (token.type !== 'EOF') this.pos++;
    return token;
  }

  private expect(type: TokenType): Token {
    const token = this.current();
    if (token.type !== type) {
      throw new Error(`found ${this.describe(token)}, expected ${type}`);
    }
    return this.advance();
  }

  private matchAndAdvance(type: TokenType): boolean {
    if (this.current().type === type) {
      this.advance();
      return true;
    }
    return false;
  }

  private describe(token: Token): string {
    return token.type === 'EOF' ? 'EOF' : token.value;
  }
}

/**
 * Convert a duration literal such as `90m` or `1h` into nanoseconds
 */
export function parseDuration(text: string): bigint {
  const match = /^(\d+)(ns|ms|u|µ|s|m|h|d|w)$/.exec(text);
  const unit = match?.[2];
  const scale = unit ? DURATION_UNITS[unit] : undefined;
  if (!match?.[1] || scale === undefined) {
    throw new Error(`invalid duration: ${text}`);
  }
  return BigInt(match[1]) * scale;
}

/**
 * Parse query text into a list of statements.
 */
export function parseQuery(input: string): ParseResult {
  return new Parser().parse(input);
}

/**
 * Parse query text, throwing a QueryError on failure.
 */
export function mustParseQuery(input: string): Query {
  const result = parseQuery(input);
  if (!result.success) {
    throw new QueryError(
      'STRATA_Q501',
      `${result.error.message} at position ${result.error.position}`,
      { query: input, position: result.error.position }
    );
  }
  return result.query;
}

export { Lexer, Parser };
