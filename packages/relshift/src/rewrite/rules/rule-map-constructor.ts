/**
 * Rule: Map Constructor
 *
 * Transforms: MAP(k1, v1, k2, v2, ...) → MAP(ARRAY(k1, k2, ...), ARRAY(v1, v2, ...))
 * Conditions: a map value constructor that did not come from this rewriter
 */

import type { CallExpr, ScalarExpr } from '../../expr/scalar-expr.js';
import {
	ARRAY_VALUE_CONSTRUCTOR,
	TRINO_MAP_VALUE_CONSTRUCTOR,
	isTargetOperator,
} from '../../expr/operator.js';
import { NOT_APPLICABLE, rewritten, type RuleContext, type RuleOutcome } from '../rule.js';

export function ruleMapConstructor(call: CallExpr, context: RuleContext): RuleOutcome {
	if (call.operator.kind !== 'mapConstructor' || isTargetOperator(call.operator)) {
		return NOT_APPLICABLE;
	}

	const keys: ScalarExpr[] = [];
	const values: ScalarExpr[] = [];
	call.operands.forEach((operand, i) => {
		// Even positions are keys, odd positions their values
		(i % 2 === 0 ? keys : values).push(operand);
	});

	const { builder } = context.options;
	return rewritten(builder.makeCallWithType(call.type, TRINO_MAP_VALUE_CONSTRUCTOR, [
		builder.makeCall(ARRAY_VALUE_CONSTRUCTOR, ...keys),
		builder.makeCall(ARRAY_VALUE_CONSTRUCTOR, ...values),
	]));
}
