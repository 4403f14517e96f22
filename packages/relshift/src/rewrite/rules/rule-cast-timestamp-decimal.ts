/**
 * Rule: CAST(timestamp AS DECIMAL)
 *
 * Transforms: CAST(ts AS DECIMAL(p, s)) → CAST(to_unixtime(ts) AS DECIMAL(p, s))
 * Conditions: explicit cast to DECIMAL of a TIMESTAMP-typed operand
 * Notes: the source dialect converts a timestamp to epoch seconds on this cast;
 *        Trino has no such cast, so the epoch conversion is spelled out
 */

import type { CallExpr } from '../../expr/scalar-expr.js';
import { targetFunction } from '../../expr/operator.js';
import { DOUBLE_TYPE, TypeName } from '../../types/sql-type.js';
import { NOT_APPLICABLE, rewritten, type RuleContext, type RuleOutcome } from '../rule.js';

const TRINO_TO_UNIXTIME = targetFunction('to_unixtime', DOUBLE_TYPE);

export function ruleCastTimestampToDecimal(call: CallExpr, context: RuleContext): RuleOutcome {
	if (call.operator.kind !== 'cast' || call.operands.length !== 1) return NOT_APPLICABLE;

	const [operand] = call.operands;
	if (call.type.typeName !== TypeName.DECIMAL || operand.type.typeName !== TypeName.TIMESTAMP) {
		return NOT_APPLICABLE;
	}

	const { builder } = context.options;
	return rewritten(builder.makeCast(call.type, builder.makeCall(TRINO_TO_UNIXTIME, operand)));
}
