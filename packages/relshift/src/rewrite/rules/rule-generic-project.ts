/**
 * Rule: Generic Projection
 *
 * Transforms: generic_project(value, 'column') → whatever the projection expander returns
 * Conditions: operator kind is the generic projection marker
 * Notes: the expander's result is final; it does not go through the rest of the chain
 */

import { createLogger } from '../../common/logger.js';
import type { CallExpr } from '../../expr/scalar-expr.js';
import { NOT_APPLICABLE, rewritten, type RuleContext, type RuleOutcome } from '../rule.js';

const log = createLogger('rewrite:rule:generic-project');

export function ruleGenericProject(call: CallExpr, context: RuleContext): RuleOutcome {
	if (call.operator.kind !== 'genericProject') return NOT_APPLICABLE;

	log('Delegating %s to the projection expander', call.operator.name);
	const { builder, projectionExpander } = context.options;
	return rewritten(projectionExpander(builder, call));
}
