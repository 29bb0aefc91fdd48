import type { ConditionNode } from './types';

const PRECEDENCE: Record<ConditionNode['kind'], number> = {
  or: 1,
  xor: 2,
  and: 3,
  not: 4,
  literal: 5,
  flag: 5,
  part: 5,
  field: 5,
};

function wrap(node: ConditionNode, parens: boolean): string {
  const text = serializeCondition(node);
  return parens ? `(${text})` : text;
}

/** Canonical text for an AST; parsing it yields the same tree. */
export function serializeCondition(node: ConditionNode): string {
  switch (node.kind) {
    case 'and':
    case 'or':
    case 'xor': {
      const own = PRECEDENCE[node.kind];
      const left = wrap(node.left, PRECEDENCE[node.left.kind] <= own);
      const right = wrap(node.right, PRECEDENCE[node.right.kind] < own);
      return `${left} ${node.kind} ${right}`;
    }
    case 'not':
      return `not ${wrap(node.operand, PRECEDENCE[node.operand.kind] < PRECEDENCE.not)}`;
    case 'literal':
      return node.value ? 'true' : 'false';
    case 'flag':
      return node.name;
    case 'part':
      return `part.${node.shortname}`;
    case 'field':
      return `field.${node.name}`;
  }
}
