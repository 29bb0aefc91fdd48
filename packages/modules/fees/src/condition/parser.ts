import { FeeConditionError } from '../errors';
import { ALWAYS, CONDITION_FLAGS } from './types';
import type { BinaryOperator, ConditionFlag, ConditionNode } from './types';

type Token =
  | { type: 'lparen'; pos: number }
  | { type: 'rparen'; pos: number }
  | { type: 'word'; text: string; pos: number };

const WHITESPACE = /[\s\x1c-\x1f\x85]/;
const DELIMITERS = new Set(['(', ')', '[', ']']);
const FIELD_NAME = /^[A-Za-z0-9_]+$/;
const OPERATORS = new Set(['and', 'or', 'xor', 'not']);

function isFlag(word: string): word is ConditionFlag {
  return CONDITION_FLAGS.some((flag) => flag === word);
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source.charAt(i);
    if (WHITESPACE.test(ch)) {
      i++;
    } else if (ch === '(') {
      tokens.push({ type: 'lparen', pos: i++ });
    } else if (ch === ')') {
      tokens.push({ type: 'rparen', pos: i++ });
    } else if (ch === '[' || ch === ']') {
      throw new FeeConditionError(`Unexpected character '${ch}'`, i);
    } else {
      const start = i;
      while (i < source.length && !WHITESPACE.test(source.charAt(i)) && !DELIMITERS.has(source.charAt(i))) {
        i++;
      }
      tokens.push({ type: 'word', text: source.slice(start, i), pos: start });
    }
  }
  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly length: number,
  ) {}

  parse(): ConditionNode {
    const node = this.parseBinary('or');
    const extra = this.peek();
    if (extra) {
      throw new FeeConditionError(`Unexpected ${describeToken(extra)}`, extra.pos);
    }
    return node;
  }

  // or < xor < and; each operator chains to the right.
  private parseBinary(op: BinaryOperator): ConditionNode {
    const left = op === 'or' ? this.parseBinary('xor') : op === 'xor' ? this.parseBinary('and') : this.parseNot();
    if (this.acceptKeyword(op)) {
      const right = this.parseBinary(op);
      return { kind: op, left, right };
    }
    return left;
  }

  private parseNot(): ConditionNode {
    if (this.acceptKeyword('not')) {
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parseAtom();
  }

  private parseAtom(): ConditionNode {
    const token = this.next();
    if (!token) {
      throw new FeeConditionError('Unexpected end of condition', this.length);
    }
    if (token.type === 'lparen') {
      const inner = this.parseBinary('or');
      const closing = this.next();
      if (!closing || closing.type !== 'rparen') {
        throw new FeeConditionError("Expected ')'", closing ? closing.pos : this.length);
      }
      return inner;
    }
    if (token.type === 'rparen') {
      throw new FeeConditionError("Unexpected ')'", token.pos);
    }
    return this.classify(token.text, token.pos);
  }

  private classify(text: string, pos: number): ConditionNode {
    const lower = text.toLowerCase();
    if (lower === 'true' || lower === 'false') {
      return { kind: 'literal', value: lower === 'true' };
    }
    if (isFlag(lower)) {
      return { kind: 'flag', name: lower };
    }
    if (OPERATORS.has(lower)) {
      throw new FeeConditionError(`Unexpected operator '${text}'`, pos);
    }
    if (lower.startsWith('field.')) {
      const name = text.slice('field.'.length);
      if (!FIELD_NAME.test(name)) {
        throw new FeeConditionError(`Invalid field name '${name}'`, pos);
      }
      return { kind: 'field', name };
    }
    if (lower.startsWith('part.')) {
      const shortname = text.slice('part.'.length);
      if (!shortname) {
        throw new FeeConditionError('Missing part shortname', pos);
      }
      return { kind: 'part', shortname };
    }
    throw new FeeConditionError(`Unknown identifier '${text}'`, pos);
  }

  private acceptKeyword(keyword: string): boolean {
    const token = this.peek();
    if (token?.type === 'word' && token.text.toLowerCase() === keyword) {
      this.index++;
      return true;
    }
    return false;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token | undefined {
    const token = this.tokens[this.index];
    if (token) this.index++;
    return token;
  }
}

function describeToken(token: Token): string {
  if (token.type === 'word') return `'${token.text}'`;
  return token.type === 'lparen' ? "'('" : "')'";
}

/**
 * Compile condition text into an AST. Blank or missing conditions compile to
 * the literal `true`.
 */
export function parseCondition(source: string | null | undefined): ConditionNode {
  if (source === null || source === undefined || source.trim() === '') {
    return ALWAYS;
  }
  return new Parser(tokenize(source), source.length).parse();
}
