import type { LiteralValue } from '../common/types.js';
import type { SqlType } from '../types/sql-type.js';
import type { OperatorDescriptor } from './operator.js';

/**
 * Per-row scalar formula attached to a plan node.
 * Trees are immutable; rewriting builds new nodes and shares untouched ones.
 */
export type ScalarExpr = LiteralExpr | InputRefExpr | CallExpr;

export interface LiteralExpr {
	readonly kind: 'literal';
	readonly value: LiteralValue;
	readonly type: SqlType;
}

/** Reference to field `index` of the node's input row. */
export interface InputRefExpr {
	readonly kind: 'inputRef';
	readonly index: number;
	readonly type: SqlType;
}

export interface CallExpr {
	readonly kind: 'call';
	readonly operator: OperatorDescriptor;
	readonly operands: readonly ScalarExpr[];
	/** Declared result type; set by whoever built the call, never re-derived */
	readonly type: SqlType;
}

export function isCall(expr: ScalarExpr): expr is CallExpr {
	return expr.kind === 'call';
}

export function isLiteral(expr: ScalarExpr): expr is LiteralExpr {
	return expr.kind === 'literal';
}

/**
 * Copy of `call` over new operands, keeping operator and declared type.
 * Returns `call` itself when every operand is unchanged.
 */
export function withOperands(call: CallExpr, operands: readonly ScalarExpr[]): CallExpr {
	if (operands.length === call.operands.length && operands.every((op, i) => op === call.operands[i])) {
		return call;
	}
	return { kind: 'call', operator: call.operator, operands, type: call.type };
}
