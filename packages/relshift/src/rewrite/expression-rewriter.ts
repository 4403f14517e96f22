/**
 * Expression rewriter: rewrites one scalar-expression tree bottom-up.
 *
 * Operands are rewritten first. Each call is then offered to the rule chain in
 * priority order; the first rule that rewrites it wins. A call no rule claims
 * keeps its operator and declared type over the rewritten operands.
 */

import { createLogger } from '../common/logger.js';
import { withOperands, type CallExpr, type ScalarExpr } from '../expr/scalar-expr.js';
import { resolveRewriteOptions, type ResolvedRewriteOptions, type RewriteOptions } from './config.js';
import { createRule, type RuleContext, type RuleHandle } from './rule.js';
import { ruleGenericProject } from './rules/rule-generic-project.js';
import { ruleMapConstructor } from './rules/rule-map-constructor.js';
import { ruleFromUtcTimestamp } from './rules/rule-from-utc-timestamp.js';
import { ruleFromUnixtime } from './rules/rule-from-unixtime.js';
import { ruleCastTimestampToDecimal } from './rules/rule-cast-timestamp-decimal.js';
import { ruleOperatorMapping } from './rules/rule-operator-mapping.js';
import { ruleEqualityCoercion } from './rules/rule-equality-coercion.js';

const log = createLogger('rewrite:expr');

/**
 * The rule chain; lower numbers run first
 */
export const REWRITE_RULES: readonly RuleHandle[] = Object.freeze([
	createRule('generic-project', 10, ruleGenericProject),
	createRule('map-constructor', 20, ruleMapConstructor),
	createRule('from-utc-timestamp', 30, ruleFromUtcTimestamp),
	createRule('from-unixtime', 40, ruleFromUnixtime),
	createRule('cast-timestamp-decimal', 50, ruleCastTimestampToDecimal),
	createRule('operator-mapping', 60, ruleOperatorMapping),
	createRule('equality-coercion', 70, ruleEqualityCoercion),
].sort((a, b) => a.priority - b.priority));

export class ExpressionRewriter {
	constructor(private readonly options: ResolvedRewriteOptions) {}

	/**
	 * Rewrite `expr`. Literals and field references come back as the same object.
	 */
	readonly rewrite = (expr: ScalarExpr): ScalarExpr => this.rewriteNode(expr);

	private rewriteNode(expr: ScalarExpr, settled?: WeakSet<ScalarExpr>): ScalarExpr {
		if (settled?.has(expr)) {
			return expr;
		}
		switch (expr.kind) {
			case 'literal':
			case 'inputRef':
				return expr;
			case 'call':
				return this.rewriteCall(expr, settled);
		}
	}

	private rewriteCall(original: CallExpr, settled?: WeakSet<ScalarExpr>): ScalarExpr {
		const call = withOperands(original, original.operands.map(op => this.rewriteNode(op, settled)));
		const context: RuleContext = {
			options: this.options,
			original,
			rewrite: (expr, done) => this.rewriteNode(expr, done),
		};

		for (const rule of REWRITE_RULES) {
			const outcome = rule.fn(call, context);
			if (outcome.kind === 'rewritten') {
				log('Rule %s rewrote %s', rule.id, original.operator.name);
				this.options.trace.onRuleApplied?.(rule.id, original, outcome.expr);
				return outcome.expr;
			}
		}

		return call;
	}
}

/**
 * Rewrite a single scalar expression tree into its Trino equivalent.
 * Errors raised by the builder or the projection expander propagate unchanged.
 */
export function rewriteExpression(expr: ScalarExpr, options?: RewriteOptions): ScalarExpr {
	return new ExpressionRewriter(resolveRewriteOptions(options)).rewrite(expr);
}
