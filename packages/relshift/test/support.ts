import { ExpressionBuilder } from '../src/expr/expression-builder.js';
import { explicit, sourceFunction, type OperatorDescriptor } from '../src/expr/operator.js';
import type { InputRefExpr } from '../src/expr/scalar-expr.js';
import type { SqlType } from '../src/types/sql-type.js';

export const builder = new ExpressionBuilder();

export function ref(index: number, type: SqlType): InputRefExpr {
	return builder.makeInputRef(index, type);
}

/** Upstream-dialect function with a fixed result type */
export function hive(name: string, type: SqlType): OperatorDescriptor {
	return sourceFunction(name, explicit(type));
}
