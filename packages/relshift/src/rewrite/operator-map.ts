/**
 * Operator Mapping Table: (lower-cased source operator name, operand count) → transformer.
 *
 * Built once when the module loads and never modified afterwards. Every
 * operator a transformer emits is a Trino (target-origin) built-in, so no
 * output can match a key of this table again.
 */

import { createLogger } from '../common/logger.js';
import type { ExpressionBuilder } from '../expr/expression-builder.js';
import type { ScalarExpr } from '../expr/scalar-expr.js';
import { ReturnTypes, UNARY_MINUS, targetFunction, type ReturnTypeRule } from '../expr/operator.js';
import {
	BIGINT_TYPE,
	BOOLEAN_TYPE,
	DATE_TYPE,
	DOUBLE_TYPE,
	TIMESTAMP_MILLIS_TYPE,
	TIMESTAMP_TYPE,
	VARBINARY_TYPE,
	VARCHAR_TYPE,
	type SqlType,
} from '../types/sql-type.js';

const log = createLogger('rewrite:operator-map');

/**
 * Rebuilds a call from its (already rewritten) operands.
 */
export type Transformer = (builder: ExpressionBuilder, operands: readonly ScalarExpr[]) => ScalarExpr;

const TRINO_DATE = targetFunction('date', DATE_TYPE);
const TRINO_DATE_ADD = targetFunction('date_add', DATE_TYPE);
const TRINO_DATE_DIFF = targetFunction('date_diff', BIGINT_TYPE);
const TRINO_NOW = targetFunction('now', TIMESTAMP_TYPE);
const TRINO_TO_UNIXTIME = targetFunction('to_unixtime', DOUBLE_TYPE);
const TRINO_WEEK_OF_YEAR = targetFunction('week_of_year', BIGINT_TYPE);
const TRINO_ARRAY_AGG = targetFunction('array_agg', ReturnTypes.ARRAY_OF_ARG0);
const TRINO_ARRAY_DISTINCT = targetFunction('array_distinct', ReturnTypes.ARG0);

/** `date(CAST(x AS TIMESTAMP(3)))`: accepts date strings, timestamps and dates alike */
function toTrinoDate(builder: ExpressionBuilder, value: ScalarExpr): ScalarExpr {
	return builder.makeCall(TRINO_DATE, builder.makeCast(TIMESTAMP_MILLIS_TYPE, value));
}

/** Same operands, different name */
function renameTo(name: string, returnType: SqlType | ReturnTypeRule): Transformer {
	const operator = targetFunction(name, returnType);
	return (builder, operands) => builder.makeCall(operator, ...operands);
}

function tableKey(name: string, arity: number): string {
	return `${name.toLowerCase()}/${arity}`;
}

function buildOperatorMap(): ReadonlyMap<string, Transformer> {
	const entries = new Map<string, Transformer>();
	const register = (name: string, arity: number, transformer: Transformer): void => {
		entries.set(tableKey(name, arity), transformer);
	};

	// Date and time
	register('to_date', 1, (b, [value]) => toTrinoDate(b, value));
	// Hive datediff(end, start) counts days from start to end
	register('datediff', 2, (b, [end, start]) =>
		b.makeCall(TRINO_DATE_DIFF, b.makeLiteral('day'), toTrinoDate(b, start), toTrinoDate(b, end)));
	register('date_add', 2, (b, [date, days]) =>
		b.makeCall(TRINO_DATE_ADD, b.makeLiteral('day'), days, toTrinoDate(b, date)));
	register('date_sub', 2, (b, [date, days]) =>
		b.makeCall(TRINO_DATE_ADD, b.makeLiteral('day'), b.makeCall(UNARY_MINUS, days), toTrinoDate(b, date)));
	register('unix_timestamp', 0, (b) =>
		b.makeCast(BIGINT_TYPE, b.makeCall(TRINO_TO_UNIXTIME, b.makeCall(TRINO_NOW))));
	register('unix_timestamp', 1, (b, [value]) =>
		b.makeCast(BIGINT_TYPE, b.makeCall(TRINO_TO_UNIXTIME, b.makeCast(TIMESTAMP_MILLIS_TYPE, value))));
	register('weekofyear', 1, (b, [value]) => b.makeCall(TRINO_WEEK_OF_YEAR, toTrinoDate(b, value)));

	// Strings
	register('instr', 2, renameTo('strpos', BIGINT_TYPE));
	register('lcase', 1, renameTo('lower', ReturnTypes.ARG0));
	register('ucase', 1, renameTo('upper', ReturnTypes.ARG0));
	register('base64', 1, renameTo('to_base64', VARCHAR_TYPE));
	register('unbase64', 1, renameTo('from_base64', VARBINARY_TYPE));
	register('rlike', 2, renameTo('regexp_like', BOOLEAN_TYPE));
	register('regexp', 2, renameTo('regexp_like', BOOLEAN_TYPE));
	register('get_json_object', 2, renameTo('json_extract_scalar', VARCHAR_TYPE));

	// Misc
	register('nvl', 2, renameTo('coalesce', ReturnTypes.ARG0));
	const random = targetFunction('random', DOUBLE_TYPE);
	register('rand', 0, (b) => b.makeCall(random));
	// Trino's random() takes no seed
	register('rand', 1, (b) => b.makeCall(random));

	// Collections
	register('array_contains', 2, renameTo('contains', BOOLEAN_TYPE));
	register('size', 1, renameTo('cardinality', BIGINT_TYPE));
	register('collect_list', 1, renameTo('array_agg', ReturnTypes.ARRAY_OF_ARG0));
	register('collect_set', 1, (b, [value]) =>
		b.makeCall(TRINO_ARRAY_DISTINCT, b.makeCall(TRINO_ARRAY_AGG, value)));

	log('Registered %d operator transformers', entries.size);
	return entries;
}

export const OPERATOR_MAP: ReadonlyMap<string, Transformer> = buildOperatorMap();

/**
 * Look up the transformer for `name` called with `arity` operands.
 * Absence is not an error.
 */
export function getTransformer(name: string, arity: number): Transformer | undefined {
	return OPERATOR_MAP.get(tableKey(name, arity));
}
