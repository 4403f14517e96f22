/**
 * Rule: Operator Mapping
 *
 * Transforms: any call registered in the operator mapping table, via its transformer
 * Conditions: source-dialect operator with a (name, operand count) entry;
 *             `to_date` is skipped when avoid_transform_to_date_udf is set
 * Notes: the nodes the transformer builds go through the whole chain; the
 *        operands it reuses are already rewritten and are kept as they are
 */

import { createLogger } from '../../common/logger.js';
import type { CallExpr, ScalarExpr } from '../../expr/scalar-expr.js';
import { isTargetOperator } from '../../expr/operator.js';
import { ConfigKeys, isFlagEnabled, type RewriteConfig } from '../config.js';
import { getTransformer } from '../operator-map.js';
import { NOT_APPLICABLE, rewritten, type RuleContext, type RuleOutcome } from '../rule.js';

const log = createLogger('rewrite:rule:operator-mapping');

export function ruleOperatorMapping(call: CallExpr, context: RuleContext): RuleOutcome {
	if (isTargetOperator(call.operator)) return NOT_APPLICABLE;

	const name = call.operator.name.toLowerCase();
	const transformer = getTransformer(name, call.operands.length);
	if (!transformer) return NOT_APPLICABLE;

	if (!shouldTransformOperator(name, context.options.config)) {
		log('Transform of %s suppressed by %s', name, ConfigKeys.AVOID_TRANSFORM_TO_DATE_UDF);
		return NOT_APPLICABLE;
	}

	const transformed = transformer(context.options.builder, call.operands);
	return rewritten(context.rewrite(transformed, new WeakSet<ScalarExpr>(call.operands)));
}

function shouldTransformOperator(name: string, config: RewriteConfig): boolean {
	return !(name === 'to_date' && isFlagEnabled(config, ConfigKeys.AVOID_TRANSFORM_TO_DATE_UDF));
}
