import { describe, it, expect } from 'vitest';
import {
  parseCondition,
  evaluateCondition,
  serializeCondition,
  checkCondition,
  compileCondition,
  isFieldTruthy,
  tokenize,
} from '../condition';
import type { ConditionContext } from '../condition';
import { FeeConditionError } from '../errors';

function ctx(overrides: Partial<ConditionContext> = {}): ConditionContext {
  return {
    parts: {},
    fields: {},
    isMember: false,
    isOrga: false,
    anyPart: false,
    allParts: false,
    ...overrides,
  };
}

describe('tokenize', () => {
  it('splits words and parentheses', () => {
    expect(tokenize('(part.A or x)')).toEqual([
      { type: 'lparen', pos: 0 },
      { type: 'word', text: 'part.A', pos: 1 },
      { type: 'word', text: 'or', pos: 8 },
      { type: 'word', text: 'x', pos: 11 },
      { type: 'rparen', pos: 12 },
    ]);
  });

  it('rejects square brackets', () => {
    expect(() => tokenize('part.[A]')).toThrow(FeeConditionError);
  });
});

describe('parseCondition', () => {
  it('treats blank conditions as always true', () => {
    expect(parseCondition(null)).toEqual({ kind: 'literal', value: true });
    expect(parseCondition(undefined)).toEqual({ kind: 'literal', value: true });
    expect(parseCondition('   \n ')).toEqual({ kind: 'literal', value: true });
  });

  it('parses part shortnames containing dots', () => {
    expect(parseCondition('part.1.H.')).toEqual({ kind: 'part', shortname: '1.H.' });
  });

  it('binds and tighter than or', () => {
    expect(parseCondition('part.a or part.b and part.c')).toEqual({
      kind: 'or',
      left: { kind: 'part', shortname: 'a' },
      right: {
        kind: 'and',
        left: { kind: 'part', shortname: 'b' },
        right: { kind: 'part', shortname: 'c' },
      },
    });
  });

  it('binds xor between and and or', () => {
    expect(parseCondition('is_member or is_orga xor any_part')).toEqual({
      kind: 'or',
      left: { kind: 'flag', name: 'is_member' },
      right: {
        kind: 'xor',
        left: { kind: 'flag', name: 'is_orga' },
        right: { kind: 'flag', name: 'any_part' },
      },
    });
  });

  it('chains binary operators to the right', () => {
    expect(parseCondition('true and false and true')).toEqual({
      kind: 'and',
      left: { kind: 'literal', value: true },
      right: {
        kind: 'and',
        left: { kind: 'literal', value: false },
        right: { kind: 'literal', value: true },
      },
    });
  });

  it('applies not to the nearest atom', () => {
    expect(parseCondition('not is_member and is_orga')).toEqual({
      kind: 'and',
      left: { kind: 'not', operand: { kind: 'flag', name: 'is_member' } },
      right: { kind: 'flag', name: 'is_orga' },
    });
  });

  it('accepts keywords in any case', () => {
    expect(parseCondition('NOT Is_Member OR TRUE')).toEqual({
      kind: 'or',
      left: { kind: 'not', operand: { kind: 'flag', name: 'is_member' } },
      right: { kind: 'literal', value: true },
    });
  });

  it('honours parentheses', () => {
    expect(parseCondition('(part.a or part.b) and field.x')).toEqual({
      kind: 'and',
      left: {
        kind: 'or',
        left: { kind: 'part', shortname: 'a' },
        right: { kind: 'part', shortname: 'b' },
      },
      right: { kind: 'field', name: 'x' },
    });
  });

  it('reports the position of an unknown identifier', () => {
    try {
      parseCondition('part.a and bogus');
      expect.unreachable('parse should fail');
    } catch (err) {
      expect(err).toBeInstanceOf(FeeConditionError);
      if (err instanceof FeeConditionError) {
        expect(err.position).toBe(11);
        expect(err.message).toBe("Unknown identifier 'bogus' at position 11");
      }
    }
  });

  it('rejects dangling operators and unbalanced parentheses', () => {
    expect(() => parseCondition('part.a and')).toThrow('Unexpected end of condition at position 10');
    expect(() => parseCondition('(part.a')).toThrow("Expected ')' at position 7");
    expect(() => parseCondition('part.a)')).toThrow("Unexpected ')' at position 6");
    expect(() => parseCondition('and part.a')).toThrow("Unexpected operator 'and' at position 0");
  });

  it('rejects invalid field names and empty part shortnames', () => {
    expect(() => parseCondition('field.has-dash')).toThrow("Invalid field name 'has-dash'");
    expect(() => parseCondition('part.')).toThrow('Missing part shortname');
  });
});

describe('evaluateCondition', () => {
  it('evaluates parts and flags', () => {
    const ast = parseCondition('part.Wu and not is_orga');
    expect(evaluateCondition(ast, ctx({ parts: { Wu: true } }))).toBe(true);
    expect(evaluateCondition(ast, ctx({ parts: { Wu: true }, isOrga: true }))).toBe(false);
    expect(evaluateCondition(ast, ctx({ parts: { Wu: false } }))).toBe(false);
  });

  it('evaluates xor', () => {
    const ast = parseCondition('is_member xor is_orga');
    expect(evaluateCondition(ast, ctx({ isMember: true }))).toBe(true);
    expect(evaluateCondition(ast, ctx({ isMember: true, isOrga: true }))).toBe(false);
  });

  it('evaluates any_part and all_parts', () => {
    expect(evaluateCondition(parseCondition('any_part'), ctx({ anyPart: true }))).toBe(true);
    expect(evaluateCondition(parseCondition('all_parts'), ctx({ anyPart: true }))).toBe(false);
  });

  it('treats missing parts and fields as false', () => {
    expect(evaluateCondition(parseCondition('part.missing'), ctx())).toBe(false);
    expect(evaluateCondition(parseCondition('field.missing'), ctx())).toBe(false);
    expect(evaluateCondition(parseCondition('not field.missing'), ctx())).toBe(true);
  });

  it('follows or/and precedence when evaluating', () => {
    // true or (false and false) is true; (true or false) and false would be false
    const ast = parseCondition('true or false and false');
    expect(evaluateCondition(ast, ctx())).toBe(true);
  });
});

describe('isFieldTruthy', () => {
  it.each([
    [true, true],
    [false, false],
    [0, false],
    [2.5, true],
    ['', false],
    ['no', true],
    [null, false],
    [undefined, false],
    [{}, true],
  ])('%j → %s', (value, expected) => {
    expect(isFieldTruthy(value)).toBe(expected);
  });
});

describe('serializeCondition', () => {
  it('writes canonical lowercase keywords with minimal parentheses', () => {
    expect(serializeCondition(parseCondition('(PART.a OR part.b) AND NOT (field.x)'))).toBe(
      '(part.a or part.b) and not field.x',
    );
    expect(serializeCondition(parseCondition('part.a or part.b and part.c'))).toBe('part.a or part.b and part.c');
  });

  it('keeps grouping of left-nested chains', () => {
    expect(serializeCondition(parseCondition('(true and false) and true'))).toBe('(true and false) and true');
  });

  it('re-parses to the same tree', () => {
    const sources = [
      'part.1.H. and field.is_child',
      'not (is_member or is_orga) xor all_parts',
      '(part.a xor part.b) xor part.c',
      'not not any_part',
    ];
    for (const source of sources) {
      const ast = parseCondition(source);
      expect(parseCondition(serializeCondition(ast))).toEqual(ast);
    }
  });
});

describe('checkCondition', () => {
  const scope = { fieldNames: ['is_child', 'arrival'], partShortnames: ['Wu', '1.H.'] };

  it('accepts known references', () => {
    expect(() => checkCondition(parseCondition('part.Wu and field.is_child'), scope)).not.toThrow();
  });

  it('lists unknown fields', () => {
    expect(() => checkCondition(parseCondition('field.zeta or field.alpha'), scope)).toThrow(
      "Unknown field(s): 'alpha', 'zeta'.",
    );
  });

  it('lists unknown part shortnames', () => {
    expect(() => checkCondition(parseCondition('part.Wu or part.X'), scope)).toThrow(
      "Unknown part shortname(s): 'X'.",
    );
  });

  it('compiles blank input to a null condition', () => {
    expect(compileCondition('  ', scope)).toEqual({ condition: null, ast: { kind: 'literal', value: true } });
    expect(compileCondition('PART.Wu', scope).condition).toBe('part.Wu');
  });
});
