import { parsed, parseFailure, type ParseResult } from '@index-meta/shared';
import { Version } from './version';

type Comparison = 'this' | 'later' | 'orLater' | 'earlier' | 'orEarlier' | 'majorBound';

/**
 * Version range expression as written in `preferred-versions` files.
 * `wildcard` is `==v.*`, `majorBound` is `^>=v`.
 */
export type VersionRange =
  | { kind: 'any' }
  | { kind: 'none' }
  | { kind: Comparison; version: Version }
  | { kind: 'wildcard'; version: Version }
  | { kind: 'union' | 'intersection'; left: VersionRange; right: VersionRange };

export const anyVersion: VersionRange = { kind: 'any' };
export const noVersion: VersionRange = { kind: 'none' };

export function withinRange(version: Version, range: VersionRange): boolean {
  switch (range.kind) {
    case 'any':
      return true;
    case 'none':
      return false;
    case 'this':
      return version.compareTo(range.version) === 0;
    case 'later':
      return version.compareTo(range.version) > 0;
    case 'orLater':
      return version.compareTo(range.version) >= 0;
    case 'earlier':
      return version.compareTo(range.version) < 0;
    case 'orEarlier':
      return version.compareTo(range.version) <= 0;
    case 'majorBound':
      return (
        version.compareTo(range.version) >= 0 &&
        version.compareTo(majorUpperBound(range.version)) < 0
      );
    case 'wildcard':
      return (
        version.compareTo(range.version) >= 0 &&
        version.compareTo(wildcardUpperBound(range.version)) < 0
      );
    case 'union':
      return withinRange(version, range.left) || withinRange(version, range.right);
    case 'intersection':
      return withinRange(version, range.left) && withinRange(version, range.right);
  }
}

function majorUpperBound(version: Version): Version {
  const [major, minor] = version.components;
  return version.components.length < 2 ? Version.of([major, 1]) : Version.of([major, minor + 1]);
}

function wildcardUpperBound(version: Version): Version {
  const components = [...version.components];
  components[components.length - 1] += 1;
  return Version.of(components);
}

const BOUND_OPERATORS: Record<Comparison, string> = {
  this: '==',
  later: '>',
  orLater: '>=',
  earlier: '<',
  orEarlier: '<=',
  majorBound: '^>=',
};

const PRECEDENCE = { union: 0, intersection: 1, atom: 2 } as const;

/** Canonical text; parsing it yields a range with the same membership. */
export function prettyRange(range: VersionRange): string {
  return pretty(range, PRECEDENCE.union);
}

function pretty(range: VersionRange, required: number): string {
  switch (range.kind) {
    case 'any':
      return '-any';
    case 'none':
      return '-none';
    case 'wildcard':
      return `==${range.version.toString()}.*`;
    case 'union':
    case 'intersection': {
      const own = PRECEDENCE[range.kind];
      const operator = range.kind === 'union' ? '||' : '&&';
      const text = `${pretty(range.left, own)} ${operator} ${pretty(range.right, own)}`;
      return own < required ? `(${text})` : text;
    }
    default:
      return `${BOUND_OPERATORS[range.kind]}${range.version.toString()}`;
  }
}

type Token =
  | { type: 'or' | 'and' | 'lparen' | 'rparen' | 'any' | 'none'; column: number }
  | { type: 'operator'; kind: Comparison; column: number }
  | { type: 'version'; version: Version; wildcard: boolean; column: number };

const OPERATOR_TOKENS: Array<[string, Comparison]> = [
  ['^>=', 'majorBound'],
  ['>=', 'orLater'],
  ['<=', 'orEarlier'],
  ['==', 'this'],
  ['>', 'later'],
  ['<', 'earlier'],
];

const VERSION_TOKEN = /^[0-9]+(?:\.[0-9]+)*(\.\*)?/;
const KEYWORD_TOKEN = /^-(any|none)(?![A-Za-z0-9])/;

class RangeSyntaxError extends Error {
  constructor(
    message: string,
    readonly column: number,
  ) {
    super(`${message} at column ${column}`);
  }
}

function tokenize(text: string, columnOffset: number): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    const column = columnOffset + i + 1;
    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }
    const rest = text.slice(i);
    if (rest.startsWith('||') || rest.startsWith('&&')) {
      tokens.push({ type: rest.startsWith('||') ? 'or' : 'and', column });
      i += 2;
      continue;
    }
    if (ch === '(' || ch === ')') {
      tokens.push({ type: ch === '(' ? 'lparen' : 'rparen', column });
      i += 1;
      continue;
    }
    const operator = OPERATOR_TOKENS.find(([symbol]) => rest.startsWith(symbol));
    if (operator) {
      tokens.push({ type: 'operator', kind: operator[1], column });
      i += operator[0].length;
      continue;
    }
    const keyword = KEYWORD_TOKEN.exec(rest);
    if (keyword) {
      tokens.push({ type: keyword[1] === 'any' ? 'any' : 'none', column });
      i += keyword[0].length;
      continue;
    }
    const versionMatch = VERSION_TOKEN.exec(rest);
    if (versionMatch) {
      const wildcard = versionMatch[1] !== undefined;
      const versionText = wildcard ? versionMatch[0].slice(0, -2) : versionMatch[0];
      const version = Version.parse(versionText);
      if (!version) {
        throw new RangeSyntaxError(`invalid version "${versionText}"`, column);
      }
      tokens.push({ type: 'version', version, wildcard, column });
      i += versionMatch[0].length;
      continue;
    }
    throw new RangeSyntaxError(`unexpected ${JSON.stringify(ch)}`, column);
  }
  return tokens;
}

class RangeParser {
  private position = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly endColumn: number,
  ) {}

  parse(): VersionRange {
    const range = this.disjunction();
    const extra = this.tokens[this.position];
    if (extra) {
      throw new RangeSyntaxError('unexpected trailing input', extra.column);
    }
    return range;
  }

  private disjunction(): VersionRange {
    let left = this.conjunction();
    while (this.peek()?.type === 'or') {
      this.position += 1;
      left = { kind: 'union', left, right: this.conjunction() };
    }
    return left;
  }

  private conjunction(): VersionRange {
    let left = this.atom();
    while (this.peek()?.type === 'and') {
      this.position += 1;
      left = { kind: 'intersection', left, right: this.atom() };
    }
    return left;
  }

  private atom(): VersionRange {
    const token = this.next('a version range');
    switch (token.type) {
      case 'any':
        return anyVersion;
      case 'none':
        return noVersion;
      case 'lparen': {
        const inner = this.disjunction();
        const close = this.next('")"');
        if (close.type !== 'rparen') {
          throw new RangeSyntaxError('expected ")"', close.column);
        }
        return inner;
      }
      case 'operator': {
        const operand = this.next('a version');
        if (operand.type !== 'version') {
          throw new RangeSyntaxError('expected a version', operand.column);
        }
        if (operand.wildcard) {
          if (token.kind !== 'this') {
            throw new RangeSyntaxError('wildcard versions require "=="', operand.column);
          }
          return { kind: 'wildcard', version: operand.version };
        }
        return { kind: token.kind, version: operand.version };
      }
      default:
        throw new RangeSyntaxError('expected a version range', token.column);
    }
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(expected: string): Token {
    const token = this.tokens[this.position];
    if (!token) {
      throw new RangeSyntaxError(`unexpected end of input, expected ${expected}`, this.endColumn);
    }
    this.position += 1;
    return token;
  }
}

/**
 * Parses a range expression. `columnOffset` shifts reported columns when the
 * text is a suffix of a larger line.
 */
export function parseVersionRange(text: string, columnOffset = 0): ParseResult<VersionRange> {
  try {
    const tokens = tokenize(text, columnOffset);
    return parsed(new RangeParser(tokens, columnOffset + text.length + 1).parse());
  } catch (error) {
    if (error instanceof RangeSyntaxError) {
      return parseFailure(error.message);
    }
    throw error;
  }
}

/**
 * Parses `preferred-versions` content: the literal package name followed by a
 * range expression.
 */
export function parsePreferredVersions(
  packageName: string,
  content: string,
): ParseResult<VersionRange> {
  if (!content.startsWith(packageName)) {
    return parseFailure(`expected "${packageName}" at column 1`);
  }
  return parseVersionRange(content.slice(packageName.length), packageName.length);
}
