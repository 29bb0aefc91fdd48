import type { ConditionContext, ConditionNode } from './types';

/** Truthiness of a registration field value for conditions. */
export function isFieldTruthy(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return value !== '';
  return true;
}

export function evaluateCondition(node: ConditionNode, ctx: ConditionContext): boolean {
  switch (node.kind) {
    case 'and':
      return evaluateCondition(node.left, ctx) && evaluateCondition(node.right, ctx);
    case 'or':
      return evaluateCondition(node.left, ctx) || evaluateCondition(node.right, ctx);
    case 'xor':
      return evaluateCondition(node.left, ctx) !== evaluateCondition(node.right, ctx);
    case 'not':
      return !evaluateCondition(node.operand, ctx);
    case 'literal':
      return node.value;
    case 'part':
      return ctx.parts[node.shortname] === true;
    case 'field':
      return isFieldTruthy(ctx.fields[node.name]);
    case 'flag':
      switch (node.name) {
        case 'is_member':
          return ctx.isMember;
        case 'is_orga':
          return ctx.isOrga;
        case 'any_part':
          return ctx.anyPart;
        case 'all_parts':
          return ctx.allParts;
      }
  }
}

export interface ConditionReferences {
  fields: Set<string>;
  parts: Set<string>;
}

export function collectReferences(node: ConditionNode, into?: ConditionReferences): ConditionReferences {
  const refs = into ?? { fields: new Set<string>(), parts: new Set<string>() };
  switch (node.kind) {
    case 'and':
    case 'or':
    case 'xor':
      collectReferences(node.left, refs);
      collectReferences(node.right, refs);
      break;
    case 'not':
      collectReferences(node.operand, refs);
      break;
    case 'field':
      refs.fields.add(node.name);
      break;
    case 'part':
      refs.parts.add(node.shortname);
      break;
    case 'literal':
    case 'flag':
      break;
  }
  return refs;
}
