/**
 * Rule: Equality Type Coercion
 *
 * Transforms: left = right → TRY_CAST(left AS <right type>) = right
 * Conditions: `=` whose left family (after unwrapping one explicit CAST) and
 *             right family are listed in the type compatibility matrix
 * Notes: the source dialect coerces strings implicitly in comparisons and
 *        yields NULL on failure; TRY_CAST keeps that behaviour
 */

import { createLogger } from '../../common/logger.js';
import { isCall, type CallExpr } from '../../expr/scalar-expr.js';
import { familyOf } from '../../types/sql-type.js';
import { formatExpression } from '../../debug/formatter.js';
import { requiresSafeCast } from '../type-cast-matrix.js';
import { NOT_APPLICABLE, rewritten, type RuleContext, type RuleOutcome } from '../rule.js';

const log = createLogger('rewrite:rule:equality-coercion');

export function ruleEqualityCoercion(call: CallExpr, context: RuleContext): RuleOutcome {
	if (call.operator.kind !== 'equals' || call.operands.length !== 2) return NOT_APPLICABLE;

	let [left] = call.operands;
	const right = call.operands[1];

	if (isCall(left) && left.operator.kind === 'cast') {
		left = left.operands[0];
	}

	if (!requiresSafeCast(familyOf(left.type), familyOf(right.type))) {
		return NOT_APPLICABLE;
	}

	log('Coercing %s to the type of %s', formatExpression(left), formatExpression(right));
	const { builder } = context.options;
	const tryCast = builder.makeTryCast(right.type, left);
	return rewritten(builder.makeCall(call.operator, tryCast, right));
}
