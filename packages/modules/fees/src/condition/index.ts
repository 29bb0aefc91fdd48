export { parseCondition, tokenize } from './parser';
export { evaluateCondition, isFieldTruthy, collectReferences } from './evaluate';
export type { ConditionReferences } from './evaluate';
export { serializeCondition } from './serialize';
export { checkCondition, compileCondition } from './check';
export type { ConditionScope, CompiledCondition } from './check';
export { conditionNodeSchema, CONDITION_FLAGS, ALWAYS } from './types';
export type { ConditionNode, ConditionContext, ConditionFlag, BinaryOperator } from './types';
