/**
 * Rule: from_utc_timestamp
 *
 * Transforms: from_utc_timestamp(value, tz) → CAST(at_timezone(<instant>, $canonicalize_hive_timezone_id(tz)) AS TIMESTAMP(3))
 * where <instant> depends on the type of `value`:
 * - integer (epoch millis): from_unixtime_nanos(CAST(value AS BIGINT) * 1000000)
 * - float/double/decimal (epoch seconds): from_unixtime(CAST(value AS DOUBLE))
 * - timestamp/date: from_unixtime(to_unixtime(with_timezone(value, 'UTC')))
 *
 * Any other source type is left alone and continues down the chain.
 *
 * Trino's at_timezone and friends return TIMESTAMP WITH TIME ZONE, which the
 * type model lacks; they are declared as TIMESTAMP. Only declared types are
 * affected, the generated SQL is the same.
 */

import { createLogger } from '../../common/logger.js';
import type { CallExpr, ScalarExpr } from '../../expr/scalar-expr.js';
import type { ExpressionBuilder } from '../../expr/expression-builder.js';
import { MULTIPLY, isTargetOperator, targetFunction } from '../../expr/operator.js';
import {
	APPROX_NUMERIC_TYPES,
	BIGINT_TYPE,
	DOUBLE_TYPE,
	INTEGER_TYPES,
	TEMPORAL_TYPES,
	TIMESTAMP_MILLIS_TYPE,
	TIMESTAMP_TYPE,
	VARCHAR_TYPE,
} from '../../types/sql-type.js';
import { NOT_APPLICABLE, rewritten, type RuleContext, type RuleOutcome } from '../rule.js';

const log = createLogger('rewrite:rule:from-utc-timestamp');

const NANOS_PER_MILLI = 1_000_000n;

// TODO: declare TIMESTAMP WITH TIME ZONE once the type model has one
const TRINO_AT_TIMEZONE = targetFunction('at_timezone', TIMESTAMP_TYPE);
const TRINO_WITH_TIMEZONE = targetFunction('with_timezone', TIMESTAMP_TYPE);
const TRINO_FROM_UNIXTIME_NANOS = targetFunction('from_unixtime_nanos', TIMESTAMP_TYPE);
const TRINO_FROM_UNIXTIME = targetFunction('from_unixtime', TIMESTAMP_TYPE);
const TRINO_TO_UNIXTIME = targetFunction('to_unixtime', DOUBLE_TYPE);
const TRINO_CANONICALIZE_TIMEZONE = targetFunction('$canonicalize_hive_timezone_id', VARCHAR_TYPE);

export function ruleFromUtcTimestamp(call: CallExpr, context: RuleContext): RuleOutcome {
	if (isTargetOperator(call.operator) || call.operator.name.toLowerCase() !== 'from_utc_timestamp') {
		return NOT_APPLICABLE;
	}
	if (call.operands.length < 2) return NOT_APPLICABLE;

	const { builder } = context.options;
	// Branch on the type the front end gave the value, before any rewriting
	const inputType = context.original.operands[0].type.typeName;
	const [value, timezone] = call.operands;

	let instant: ScalarExpr;
	if (INTEGER_TYPES.has(inputType)) {
		instant = builder.makeCall(TRINO_FROM_UNIXTIME_NANOS,
			builder.makeCall(MULTIPLY, builder.makeCast(BIGINT_TYPE, value), builder.makeBigintLiteral(NANOS_PER_MILLI)));
	} else if (APPROX_NUMERIC_TYPES.has(inputType)) {
		instant = builder.makeCall(TRINO_FROM_UNIXTIME, builder.makeCast(DOUBLE_TYPE, value));
	} else if (TEMPORAL_TYPES.has(inputType)) {
		instant = builder.makeCall(TRINO_FROM_UNIXTIME,
			builder.makeCall(TRINO_TO_UNIXTIME,
				builder.makeCall(TRINO_WITH_TIMEZONE, value, builder.makeLiteral('UTC'))));
	} else {
		log('No conversion for source type %s; leaving call for later rules', inputType);
		return NOT_APPLICABLE;
	}

	return rewritten(atZone(builder, instant, timezone));
}

function atZone(builder: ExpressionBuilder, instant: ScalarExpr, timezone: ScalarExpr): ScalarExpr {
	return builder.makeCast(TIMESTAMP_MILLIS_TYPE,
		builder.makeCall(TRINO_AT_TIMEZONE, instant, builder.makeCall(TRINO_CANONICALIZE_TIMEZONE, timezone)));
}
