import { withTransaction } from '@clubledger/db';
import { assertValidated } from '@clubledger/shared';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import type { RequestContext } from '@clubledger/core/auth/context';
import { compileCondition } from '../condition';
import { FeeConditionError } from '../errors';
import { loadEventFeeScope } from '../helpers/load-event';
import { checkConditionSchema } from '../validation';
import type { CheckConditionInput } from '../validation';

export type ConditionCheckResult =
  | { valid: true; condition: string | null }
  | { valid: false; message: string; position: number | null };

/** Live check for the fee editor; parse errors are returned, not thrown. */
export async function validateFeeCondition(
  ctx: RequestContext,
  input: CheckConditionInput,
): Promise<ConditionCheckResult> {
  requirePermission(ctx, PERMISSIONS.FEES_VIEW);
  const parsed = checkConditionSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;

  return withTransaction(async (tx) => {
    const scope = await loadEventFeeScope(tx, data.eventId);
    try {
      const compiled = compileCondition(data.condition, {
        fieldNames: scope.fieldNames,
        partShortnames: scope.parts.map((p) => p.shortname),
      });
      return { valid: true, condition: compiled.condition };
    } catch (err) {
      if (!(err instanceof FeeConditionError)) throw err;
      return { valid: false, message: err.message, position: err.position ?? null };
    }
  });
}
