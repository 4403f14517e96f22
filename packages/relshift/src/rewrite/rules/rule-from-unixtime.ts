/**
 * Rule: from_unixtime
 *
 * Transforms: from_unixtime(x)    → format_datetime(from_unixtime(x), 'yyyy-MM-dd HH:mm:ss')
 *             from_unixtime(x, f) → format_datetime(from_unixtime(x), f)
 * Conditions: source-dialect from_unixtime with one or two operands
 * Benefits: the source function returns formatted text; Trino's returns a timestamp
 */

import type { CallExpr } from '../../expr/scalar-expr.js';
import { isTargetOperator, targetFunction } from '../../expr/operator.js';
import { TIMESTAMP_TYPE, VARCHAR_TYPE } from '../../types/sql-type.js';
import { NOT_APPLICABLE, rewritten, type RuleContext, type RuleOutcome } from '../rule.js';

export const DEFAULT_DATETIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

const TRINO_FORMAT_DATETIME = targetFunction('format_datetime', VARCHAR_TYPE);
const TRINO_FROM_UNIXTIME = targetFunction('from_unixtime', TIMESTAMP_TYPE);

export function ruleFromUnixtime(call: CallExpr, context: RuleContext): RuleOutcome {
	if (isTargetOperator(call.operator) || call.operator.name.toLowerCase() !== 'from_unixtime') {
		return NOT_APPLICABLE;
	}

	const { builder } = context.options;
	const [seconds, format] = call.operands;
	switch (call.operands.length) {
		case 1:
			return rewritten(builder.makeCall(TRINO_FORMAT_DATETIME,
				builder.makeCall(TRINO_FROM_UNIXTIME, seconds),
				builder.makeLiteral(DEFAULT_DATETIME_FORMAT)));
		case 2:
			return rewritten(builder.makeCall(TRINO_FORMAT_DATETIME,
				builder.makeCall(TRINO_FROM_UNIXTIME, seconds),
				format));
		default:
			return NOT_APPLICABLE;
	}
}
