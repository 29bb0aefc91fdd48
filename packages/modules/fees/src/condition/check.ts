import { FeeConditionError } from '../errors';
import { collectReferences } from './evaluate';
import { parseCondition } from './parser';
import { serializeCondition } from './serialize';
import type { ConditionNode } from './types';

export interface ConditionScope {
  fieldNames: Iterable<string>;
  partShortnames: Iterable<string>;
}

function quoteList(names: string[]): string {
  return names.map((n) => `'${n}'`).join(', ');
}

/** Reject references to fields or parts the event does not define. */
export function checkCondition(ast: ConditionNode, scope: ConditionScope): void {
  const refs = collectReferences(ast);
  const fields = new Set(scope.fieldNames);
  const parts = new Set(scope.partShortnames);

  const unknownFields = [...refs.fields].filter((f) => !fields.has(f)).sort();
  if (unknownFields.length > 0) {
    throw new FeeConditionError(`Unknown field(s): ${quoteList(unknownFields)}.`);
  }
  const unknownParts = [...refs.parts].filter((p) => !parts.has(p)).sort();
  if (unknownParts.length > 0) {
    throw new FeeConditionError(`Unknown part shortname(s): ${quoteList(unknownParts)}.`);
  }
}

export interface CompiledCondition {
  /** Canonical source, or `null` for an unconditional fee. */
  condition: string | null;
  ast: ConditionNode;
}

/** Parse, validate against the event and normalize a condition. */
export function compileCondition(source: string | null | undefined, scope: ConditionScope): CompiledCondition {
  const ast = parseCondition(source);
  checkCondition(ast, scope);
  const blank = source === null || source === undefined || source.trim() === '';
  return { condition: blank ? null : serializeCondition(ast), ast };
}
