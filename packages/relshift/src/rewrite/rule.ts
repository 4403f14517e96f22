/**
 * Rule framework for the expression rewriter
 * A rule either rewrites a call or declares itself not applicable; the chain
 * tries rules in ascending priority and stops at the first rewrite.
 */

import type { CallExpr, ScalarExpr } from '../expr/scalar-expr.js';
import type { ResolvedRewriteOptions } from './config.js';

export type RuleOutcome =
	| { readonly kind: 'rewritten'; readonly expr: ScalarExpr }
	| { readonly kind: 'notApplicable' };

export const NOT_APPLICABLE: RuleOutcome = Object.freeze({ kind: 'notApplicable' });

export function rewritten(expr: ScalarExpr): RuleOutcome {
	return { kind: 'rewritten', expr };
}

export interface RuleContext {
	readonly options: ResolvedRewriteOptions;
	/** The call as it was before its operands were rewritten */
	readonly original: CallExpr;
	/**
	 * Re-enter the full rewriter, for rules whose output needs another pass.
	 * Nodes in `settled` have been rewritten already and come back as they are.
	 */
	readonly rewrite: (expr: ScalarExpr, settled?: WeakSet<ScalarExpr>) => ScalarExpr;
}

/**
 * Rule function signature.
 * `call` carries the rewritten operands; operator and declared type are the original's.
 */
export type RuleFn = (call: CallExpr, context: RuleContext) => RuleOutcome;

export interface RuleHandle {
	/** Unique identifier, also the log namespace suffix */
	id: string;
	/** Lower numbers run first */
	priority: number;
	fn: RuleFn;
}

export function createRule(id: string, priority: number, fn: RuleFn): RuleHandle {
	return { id, priority, fn };
}
