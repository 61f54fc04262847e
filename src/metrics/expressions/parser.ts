/**
 * Parser for relationship-rule expressions such as
 * `age >= 18 and status != 'closed'` or `not (is_adult == False)`.
 */

import { ConfigurationError } from '@/core/errors';
import type { ComparisonOperator, Condition, LiteralValue, Operand } from './types';
import { isComparisonOperator } from './types';

type Token =
  | { kind: 'identifier'; value: string; position: number }
  | { kind: 'literal'; value: LiteralValue; position: number }
  | { kind: 'operator'; value: ComparisonOperator; position: number }
  | { kind: 'and' | 'or' | 'not' | 'lparen' | 'rparen' | 'end'; position: number };

const LITERAL_WORDS = new Map<string, LiteralValue>([
  ['true', true],
  ['false', false],
  ['null', null],
  ['none', null],
]);

const NUMBER_PATTERN = /^-?\d+(\.\d+)?([eE][+-]?\d+)?/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_.]*/;

function syntaxError(source: string, position: number, detail: string): ConfigurationError {
  return new ConfigurationError(`Invalid expression '${source}' at position ${position}: ${detail}`);
}

function readQuoted(source: string, start: number, quote: string): { value: string; end: number } {
  let value = '';
  let i = start + 1;
  while (i < source.length) {
    const ch = source[i];
    if (ch === '\\' && i + 1 < source.length) {
      value += source[i + 1];
      i += 2;
      continue;
    }
    if (ch === quote) {
      return { value, end: i + 1 };
    }
    value += ch;
    i += 1;
  }
  throw syntaxError(source, start, `unterminated ${quote === '`' ? 'column name' : 'string'}`);
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }

    const rest = source.slice(i);
    const twoChars = rest.slice(0, 2);

    if (twoChars === '&&' || twoChars === '||') {
      tokens.push({ kind: twoChars === '&&' ? 'and' : 'or', position: i });
      i += 2;
      continue;
    }
    if (isComparisonOperator(twoChars)) {
      tokens.push({ kind: 'operator', value: twoChars, position: i });
      i += 2;
      continue;
    }
    if (ch === '<' || ch === '>') {
      tokens.push({ kind: 'operator', value: ch, position: i });
      i += 1;
      continue;
    }
    if (ch === '=') {
      throw syntaxError(source, i, "use '==' for equality");
    }
    if (ch === '&' || ch === '|') {
      tokens.push({ kind: ch === '&' ? 'and' : 'or', position: i });
      i += 1;
      continue;
    }
    if (ch === '!' || ch === '~') {
      tokens.push({ kind: 'not', position: i });
      i += 1;
      continue;
    }
    if (ch === '(' || ch === ')') {
      tokens.push({ kind: ch === '(' ? 'lparen' : 'rparen', position: i });
      i += 1;
      continue;
    }
    if (ch === "'" || ch === '"') {
      const { value, end } = readQuoted(source, i, ch);
      tokens.push({ kind: 'literal', value, position: i });
      i = end;
      continue;
    }
    if (ch === '`') {
      const { value, end } = readQuoted(source, i, ch);
      tokens.push({ kind: 'identifier', value, position: i });
      i = end;
      continue;
    }

    const numberMatch = NUMBER_PATTERN.exec(rest);
    if (numberMatch) {
      tokens.push({ kind: 'literal', value: Number(numberMatch[0]), position: i });
      i += numberMatch[0].length;
      continue;
    }

    const identifierMatch = IDENTIFIER_PATTERN.exec(rest);
    if (identifierMatch) {
      const word = identifierMatch[0];
      const lower = word.toLowerCase();
      if (lower === 'and' || lower === 'or' || lower === 'not') {
        tokens.push({ kind: lower, position: i });
      } else if (LITERAL_WORDS.has(lower)) {
        tokens.push({ kind: 'literal', value: LITERAL_WORDS.get(lower) ?? null, position: i });
      } else {
        tokens.push({ kind: 'identifier', value: word, position: i });
      }
      i += word.length;
      continue;
    }

    throw syntaxError(source, i, `unexpected character '${ch}'`);
  }

  tokens.push({ kind: 'end', position: source.length });
  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[]
  ) {}

  private peek(): Token {
    return this.tokens[this.index] ?? { kind: 'end', position: this.source.length };
  }

  private next(): Token {
    const token = this.peek();
    this.index += 1;
    return token;
  }

  parse(): Condition {
    const condition = this.parseOr();
    const trailing = this.peek();
    if (trailing.kind !== 'end') {
      throw syntaxError(this.source, trailing.position, 'unexpected trailing input');
    }
    return condition;
  }

  private parseOr(): Condition {
    let left = this.parseAnd();
    while (this.peek().kind === 'or') {
      this.next();
      left = { type: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Condition {
    let left = this.parseNot();
    while (this.peek().kind === 'and') {
      this.next();
      left = { type: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Condition {
    if (this.peek().kind === 'not') {
      this.next();
      return { type: 'not', condition: this.parseNot() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Condition {
    const token = this.peek();
    if (token.kind === 'lparen') {
      this.next();
      const inner = this.parseOr();
      const closing = this.next();
      if (closing.kind !== 'rparen') {
        throw syntaxError(this.source, closing.position, "expected ')'");
      }
      return inner;
    }

    const left = this.parseOperand();
    const maybeOperator = this.peek();
    if (maybeOperator.kind === 'operator') {
      this.next();
      const right = this.parseOperand();
      return { type: 'compare', left, operator: maybeOperator.value, right };
    }

    if (left.type === 'column') {
      return { type: 'truthy', column: left.name };
    }
    throw syntaxError(this.source, token.position, 'a literal on its own is not a condition');
  }

  private parseOperand(): Operand {
    const token = this.next();
    if (token.kind === 'identifier') {
      return { type: 'column', name: token.value };
    }
    if (token.kind === 'literal') {
      return { type: 'literal', value: token.value };
    }
    throw syntaxError(
      this.source,
      token.position,
      token.kind === 'end' ? 'unexpected end of expression' : 'expected a column or a value'
    );
  }
}

export function parseCondition(source: string): Condition {
  if (!source.trim()) {
    throw new ConfigurationError('Expression cannot be empty');
  }
  return new Parser(source, tokenize(source)).parse();
}

export function referencedColumns(condition: Condition): string[] {
  const names = new Set<string>();
  const visit = (node: Condition): void => {
    switch (node.type) {
      case 'compare':
        for (const operand of [node.left, node.right]) {
          if (operand.type === 'column') names.add(operand.name);
        }
        return;
      case 'and':
      case 'or':
        visit(node.left);
        visit(node.right);
        return;
      case 'not':
        visit(node.condition);
        return;
      case 'truthy':
        names.add(node.column);
        return;
    }
  };
  visit(condition);
  return Array.from(names);
}

function formatOperand(operand: Operand): string {
  if (operand.type === 'column') {
    return /^[A-Za-z_][A-Za-z0-9_.]*$/.test(operand.name) ? operand.name : `\`${operand.name}\``;
  }
  if (typeof operand.value === 'string') return `'${operand.value.replace(/'/g, "\\'")}'`;
  return String(operand.value);
}

export function formatCondition(condition: Condition): string {
  switch (condition.type) {
    case 'compare':
      return `${formatOperand(condition.left)} ${condition.operator} ${formatOperand(condition.right)}`;
    case 'and':
      return `(${formatCondition(condition.left)} and ${formatCondition(condition.right)})`;
    case 'or':
      return `(${formatCondition(condition.left)} or ${formatCondition(condition.right)})`;
    case 'not':
      return `not ${formatCondition(condition.condition)}`;
    case 'truthy':
      return formatOperand({ type: 'column', name: condition.column });
  }
}
