/**
 * Operator descriptors and the catalog of operators the rewriter builds with.
 *
 * A descriptor is an immutable value shared by reference across every call
 * that uses it. Identity for rule matching is (name, origin, operand count);
 * the return-type rule decides the declared type of calls built through
 * `ExpressionBuilder.makeCall`.
 */

import { createLogger } from '../common/logger.js';
import {
	ANY_TYPE,
	BOOLEAN_TYPE,
	createArrayType,
	createMapType,
	type SqlType,
} from '../types/sql-type.js';
import { formatType } from '../debug/formatter.js';

const log = createLogger('expr:operator');

export type OperatorKind =
	| 'equals'
	| 'cast'
	| 'tryCast'
	| 'times'
	| 'negate'
	| 'mapConstructor'
	| 'arrayConstructor'
	| 'genericProject'
	| 'function';

/**
 * Where an operator comes from.
 * - standard: dialect-neutral SQL operators (=, CAST, ARRAY, ...)
 * - source: functions of the upstream (Hive-flavoured) dialect
 * - target: Trino built-ins emitted by the rewriter; name-keyed rules never match these
 */
export type OperatorOrigin = 'standard' | 'source' | 'target';

/** Computes the declared result type from the operand types. */
export type ReturnTypeRule = (operandTypes: readonly SqlType[]) => SqlType;

export interface OperatorDescriptor {
	readonly name: string;
	readonly kind: OperatorKind;
	readonly origin: OperatorOrigin;
	readonly returnType: ReturnTypeRule;
}

/**
 * Return-type rule that always yields `type`.
 */
export function explicit(type: SqlType): ReturnTypeRule {
	return () => type;
}

export const ReturnTypes = {
	BOOLEAN: explicit(BOOLEAN_TYPE),
	/** Type of the first operand (ANY when there is none) */
	ARG0: (operandTypes: readonly SqlType[]): SqlType => operandTypes[0] ?? ANY_TYPE,
	/** ARRAY of the first operand's type; also ARRAY(e1, e2, ...) */
	ARRAY_OF_ARG0: (operandTypes: readonly SqlType[]): SqlType => createArrayType(operandTypes[0] ?? ANY_TYPE),
	/** MAP(k1, v1, k2, v2, ...) */
	MAP_FROM_PAIRS: (operandTypes: readonly SqlType[]): SqlType =>
		createMapType(operandTypes[0] ?? ANY_TYPE, operandTypes[1] ?? ANY_TYPE),
	/** MAP(ARRAY(keys), ARRAY(values)) */
	MAP_FROM_ARRAYS: (operandTypes: readonly SqlType[]): SqlType =>
		createMapType(operandTypes[0]?.componentType ?? ANY_TYPE, operandTypes[1]?.componentType ?? ANY_TYPE),
} as const;

function standardOperator(name: string, kind: OperatorKind, returnType: ReturnTypeRule): OperatorDescriptor {
	return Object.freeze({ name, kind, origin: 'standard' as const, returnType });
}

// Standard operators. CAST and TRY_CAST are always built with an explicit type,
// so their rule only serves calls built without one.
export const EQUALS = standardOperator('=', 'equals', ReturnTypes.BOOLEAN);
export const CAST = standardOperator('CAST', 'cast', ReturnTypes.ARG0);
export const TRY_CAST = standardOperator('TRY_CAST', 'tryCast', ReturnTypes.ARG0);
export const MULTIPLY = standardOperator('*', 'times', ReturnTypes.ARG0);
export const UNARY_MINUS = standardOperator('-', 'negate', ReturnTypes.ARG0);
export const ARRAY_VALUE_CONSTRUCTOR = standardOperator('ARRAY', 'arrayConstructor', ReturnTypes.ARRAY_OF_ARG0);
export const MAP_VALUE_CONSTRUCTOR = standardOperator('MAP', 'mapConstructor', ReturnTypes.MAP_FROM_PAIRS);
export const GENERIC_PROJECT = standardOperator('generic_project', 'genericProject', ReturnTypes.ARG0);

/**
 * The Trino map constructor, MAP(ARRAY(keys), ARRAY(values)).
 * Same name and kind as the standard one; the target origin keeps the
 * map-constructor rule from firing on its own output.
 */
export const TRINO_MAP_VALUE_CONSTRUCTOR: OperatorDescriptor = Object.freeze({
	name: 'MAP',
	kind: 'mapConstructor' as const,
	origin: 'target' as const,
	returnType: ReturnTypes.MAP_FROM_ARRAYS,
});

/**
 * Describe a function of the upstream dialect, as the front end would hand it over.
 */
export function sourceFunction(name: string, returnType: ReturnTypeRule): OperatorDescriptor {
	return Object.freeze({ name, kind: 'function' as const, origin: 'source' as const, returnType });
}

const targetCache = new Map<string, OperatorDescriptor>();

/**
 * Operator-descriptor factory for Trino built-ins.
 * Descriptors are memoized on (name, return type) so every rewrite that emits
 * e.g. `to_unixtime` shares one descriptor.
 */
export function targetFunction(name: string, returnType: SqlType | ReturnTypeRule): OperatorDescriptor {
	const rule = typeof returnType === 'function' ? returnType : explicit(returnType);
	// Rules are keyed by identity; explicit types by their printed form
	const key = typeof returnType === 'function'
		? `${name}:${ruleKey(returnType)}`
		: `${name}:${formatType(returnType)}`;

	const cached = targetCache.get(key);
	if (cached) {
		return cached;
	}

	const descriptor: OperatorDescriptor = Object.freeze({
		name,
		kind: 'function' as const,
		origin: 'target' as const,
		returnType: rule,
	});
	targetCache.set(key, descriptor);
	log('Created target operator %s', key);
	return descriptor;
}

const ruleIds = new WeakMap<ReturnTypeRule, number>();
let nextRuleId = 0;

function ruleKey(rule: ReturnTypeRule): string {
	let id = ruleIds.get(rule);
	if (id === undefined) {
		id = nextRuleId++;
		ruleIds.set(rule, id);
	}
	return `rule#${id}`;
}

export function isTargetOperator(op: OperatorDescriptor): boolean {
	return op.origin === 'target';
}
