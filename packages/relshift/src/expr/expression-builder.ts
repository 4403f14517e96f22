import { createLogger } from '../common/logger.js';
import { RewriteError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import {
	BIGINT_TYPE,
	BOOLEAN_TYPE,
	INTEGER_TYPE,
	VARCHAR_TYPE,
	canCast,
	type SqlType,
} from '../types/sql-type.js';
import { formatExpression, formatType } from '../debug/formatter.js';
import { CAST, TRY_CAST, type OperatorDescriptor } from './operator.js';
import type { CallExpr, InputRefExpr, LiteralExpr, ScalarExpr } from './scalar-expr.js';

const log = createLogger('types:builder');

/**
 * Builds scalar expressions for rewrite rules.
 *
 * Calls built with `makeCall` take their type from the operator's return-type
 * rule; every other builder takes the type explicitly. Casts are checked for
 * castability and raise `RewriteError` when the conversion cannot exist.
 */
export class ExpressionBuilder {
	makeCall(operator: OperatorDescriptor, ...operands: ScalarExpr[]): CallExpr {
		const type = operator.returnType(operands.map(o => o.type));
		return { kind: 'call', operator, operands, type };
	}

	makeCallWithType(type: SqlType, operator: OperatorDescriptor, operands: readonly ScalarExpr[]): CallExpr {
		return { kind: 'call', operator, operands: [...operands], type };
	}

	makeCast(type: SqlType, expr: ScalarExpr): CallExpr {
		this.checkCastable(expr, type, 'CAST');
		return { kind: 'call', operator: CAST, operands: [expr], type };
	}

	/** Null-on-failure cast */
	makeTryCast(type: SqlType, expr: ScalarExpr): CallExpr {
		this.checkCastable(expr, type, 'TRY_CAST');
		return { kind: 'call', operator: TRY_CAST, operands: [expr], type };
	}

	makeLiteral(value: string): LiteralExpr {
		return { kind: 'literal', value, type: VARCHAR_TYPE };
	}

	makeBigintLiteral(value: bigint): LiteralExpr {
		return { kind: 'literal', value, type: BIGINT_TYPE };
	}

	makeIntegerLiteral(value: number): LiteralExpr {
		if (!Number.isSafeInteger(value)) {
			throw new RewriteError(`Integer literal out of range: ${value}`, StatusCode.RANGE);
		}
		return { kind: 'literal', value, type: INTEGER_TYPE };
	}

	makeBooleanLiteral(value: boolean): LiteralExpr {
		return { kind: 'literal', value, type: BOOLEAN_TYPE };
	}

	makeNullLiteral(type: SqlType): LiteralExpr {
		return { kind: 'literal', value: null, type };
	}

	makeInputRef(index: number, type: SqlType): InputRefExpr {
		if (!Number.isInteger(index) || index < 0) {
			throw new RewriteError(`Invalid input field index: ${index}`, StatusCode.RANGE);
		}
		return { kind: 'inputRef', index, type };
	}

	private checkCastable(expr: ScalarExpr, type: SqlType, op: string): void {
		if (!canCast(expr.type, type)) {
			const rendered = formatExpression(expr);
			log('Rejected %s of %s (%s) to %s', op, rendered, formatType(expr.type), formatType(type));
			throw new RewriteError(
				`Cannot ${op} ${formatType(expr.type)} to ${formatType(type)}`,
				StatusCode.MISMATCH,
				rendered
			);
		}
	}
}

/** Stateless builder shared by default rewrite invocations */
export const defaultExpressionBuilder = new ExpressionBuilder();
