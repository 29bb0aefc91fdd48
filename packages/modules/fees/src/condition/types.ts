import { z } from 'zod';

export const CONDITION_FLAGS = ['is_member', 'is_orga', 'any_part', 'all_parts'] as const;
export type ConditionFlag = (typeof CONDITION_FLAGS)[number];

export type BinaryOperator = 'and' | 'or' | 'xor';

export type ConditionNode =
  | { kind: BinaryOperator; left: ConditionNode; right: ConditionNode }
  | { kind: 'not'; operand: ConditionNode }
  | { kind: 'literal'; value: boolean }
  | { kind: 'flag'; name: ConditionFlag }
  | { kind: 'part'; shortname: string }
  | { kind: 'field'; name: string };

/** Snapshot of one registration as seen by fee conditions. */
export interface ConditionContext {
  /** Part shortname → whether the registrant has to pay for that part. */
  parts: Record<string, boolean>;
  fields: Record<string, unknown>;
  isMember: boolean;
  isOrga: boolean;
  anyPart: boolean;
  allParts: boolean;
}

// Stored ASTs come back from jsonb; re-validate before trusting their shape.
export const conditionNodeSchema: z.ZodType<ConditionNode> = z.lazy(() =>
  z.union([
    z.object({
      kind: z.enum(['and', 'or', 'xor']),
      left: conditionNodeSchema,
      right: conditionNodeSchema,
    }),
    z.object({ kind: z.literal('not'), operand: conditionNodeSchema }),
    z.object({ kind: z.literal('literal'), value: z.boolean() }),
    z.object({ kind: z.literal('flag'), name: z.enum(CONDITION_FLAGS) }),
    z.object({ kind: z.literal('part'), shortname: z.string().min(1) }),
    z.object({ kind: z.literal('field'), name: z.string().regex(/^[A-Za-z0-9_]+$/) }),
  ]),
);

export const ALWAYS: ConditionNode = { kind: 'literal', value: true };
