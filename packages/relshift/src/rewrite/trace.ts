/**
 * Trace hooks for rewrite execution
 * Lets callers observe which rule rewrote which call, and which plan nodes changed
 */

import { createLogger } from '../common/logger.js';
import { formatExpression } from '../debug/formatter.js';
import type { CallExpr, ScalarExpr } from '../expr/scalar-expr.js';
import type { PlanNode } from '../planner/nodes/plan-node.js';

/**
 * Trace hooks for the plan walker and expression rewriter
 */
export interface RewriteTraceHook {
	/** Called when a rule in the chain produced a replacement for `before` */
	onRuleApplied?(ruleId: string, before: CallExpr, after: ScalarExpr): void;

	/** Called before a plan node (and its subtree) is rewritten */
	onNodeStart?(node: PlanNode): void;

	/** Called once a plan node has been rebuilt */
	onNodeEnd?(before: PlanNode, after: PlanNode): void;
}

/**
 * Default trace hook that logs to debug channels
 */
export class DebugTraceHook implements RewriteTraceHook {
	private readonly ruleLog = createLogger('rewrite:trace:rules');
	private readonly nodeLog = createLogger('rewrite:trace:nodes');

	onRuleApplied(ruleId: string, before: CallExpr, after: ScalarExpr): void {
		// Only format when the namespace is enabled
		if (!this.ruleLog.enabled) return;
		this.ruleLog('✓ %s: %s → %s', ruleId, formatExpression(before), formatExpression(after));
	}

	onNodeStart(node: PlanNode): void {
		this.nodeLog('Processing node %s', node.kind);
	}

	onNodeEnd(before: PlanNode, after: PlanNode): void {
		if (before !== after) {
			this.nodeLog('Rebuilt node %s', after.kind);
		}
	}
}

/**
 * Composite trace hook that combines multiple hooks
 */
export class CompositeTraceHook implements RewriteTraceHook {
	constructor(private readonly hooks: readonly RewriteTraceHook[]) {}

	onRuleApplied(ruleId: string, before: CallExpr, after: ScalarExpr): void {
		for (const hook of this.hooks) {
			hook.onRuleApplied?.(ruleId, before, after);
		}
	}

	onNodeStart(node: PlanNode): void {
		for (const hook of this.hooks) {
			hook.onNodeStart?.(node);
		}
	}

	onNodeEnd(before: PlanNode, after: PlanNode): void {
		for (const hook of this.hooks) {
			hook.onNodeEnd?.(before, after);
		}
	}
}
