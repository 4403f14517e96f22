import { createLogger } from '../common/logger.js';
import { RewriteError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import { formatExpression, formatType } from '../debug/formatter.js';
import type { ExpressionBuilder } from '../expr/expression-builder.js';
import type { CallExpr, ScalarExpr } from '../expr/scalar-expr.js';

const log = createLogger('rewrite:projection');

/**
 * Fallback expander for `generic_project(value, 'column')` markers.
 *
 * Only the trivial projection is handled: when the declared result type is the
 * value's own type the marker is dropped. Real expansion into Trino
 * `transform`/`transform_values` lambdas needs the caller's expander.
 */
export function defaultProjectionExpander(_builder: ExpressionBuilder, call: CallExpr): ScalarExpr {
	const [value] = call.operands;
	if (value && formatType(value.type) === formatType(call.type)) {
		log('Dropping identity projection over %s', formatExpression(value));
		return value;
	}
	throw new RewriteError(
		`No generic projection expander configured for projection to ${formatType(call.type)}`,
		StatusCode.UNSUPPORTED,
		formatExpression(call)
	);
}
