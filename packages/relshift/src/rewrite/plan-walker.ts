/**
 * Plan walker: rebuilds a plan tree with every attached scalar expression
 * rewritten for Trino.
 *
 * Post-order: a node's inputs are rewritten before its own expressions. Every
 * node kind is handled explicitly; `Other` shares the default arm, so a kind the
 * front end adds later still has its inputs and expressions rewritten.
 */

import { createLogger } from '../common/logger.js';
import { formatPlan } from '../debug/formatter.js';
import { isLiteral, type LiteralExpr, type ScalarExpr } from '../expr/scalar-expr.js';
import type { NamedExpr, PlanNode } from '../planner/nodes/plan-node.js';
import { PlanNodeKind } from '../planner/nodes/plan-node-type.js';
import { resolveRewriteOptions, type RewriteOptions } from './config.js';
import { ExpressionRewriter } from './expression-rewriter.js';
import type { RewriteTraceHook } from './trace.js';

const log = createLogger('rewrite:plan');

/**
 * Rewrite every scalar expression of a plan tree.
 *
 * @param root Plan produced by the upstream optimizer; not modified
 * @param options Configuration flags, projection expander and trace hook
 * @returns The equivalent Trino-compatible plan
 */
export function rewritePlan(root: PlanNode, options?: RewriteOptions): PlanNode {
	const resolved = resolveRewriteOptions(options);
	const walker = new PlanWalker(new ExpressionRewriter(resolved), resolved.trace);
	const result = walker.visit(root);
	if (log.enabled) {
		log('Rewritten plan:\n%s', formatPlan(result));
	}
	return result;
}

class PlanWalker {
	constructor(
		private readonly rewriter: ExpressionRewriter,
		private readonly trace: RewriteTraceHook
	) {}

	visit(node: PlanNode): PlanNode {
		this.trace.onNodeStart?.(node);
		const inputs = node.inputs.map(input => this.visit(input));
		const result = this.rebuild(node, inputs);
		this.trace.onNodeEnd?.(node, result);
		return result;
	}

	private rebuild(node: PlanNode, inputs: readonly PlanNode[]): PlanNode {
		const rx = this.rewriter.rewrite;

		switch (node.kind) {
			case PlanNodeKind.TableScan:
			case PlanNodeKind.Aggregate:
			case PlanNodeKind.Exchange:
			case PlanNodeKind.Correlate:
			case PlanNodeKind.Union:
			case PlanNodeKind.Intersect:
			case PlanNodeKind.Minus:
				// No scalar expressions of their own
				return { ...node, inputs };

			case PlanNodeKind.Values:
				return { ...node, inputs, tuples: node.tuples.map(tuple => tuple.map(literal => this.rewriteLiteral(literal))) };

			case PlanNodeKind.TableFunctionScan:
				return { ...node, inputs, call: rx(node.call) };

			case PlanNodeKind.Filter:
				return { ...node, inputs, condition: rx(node.condition) };

			case PlanNodeKind.Project:
				return { ...node, inputs, projects: node.projects.map(rx) };

			case PlanNodeKind.Join:
				return { ...node, inputs, condition: rx(node.condition) };

			case PlanNodeKind.Sort:
				return {
					...node,
					inputs,
					...(node.offset ? { offset: rx(node.offset) } : {}),
					...(node.fetch ? { fetch: rx(node.fetch) } : {}),
				};

			case PlanNodeKind.Match:
				return {
					...node,
					inputs,
					partitionKeys: node.partitionKeys.map(rx),
					measures: node.measures.map(m => this.rewriteNamed(m)),
					patternDefinitions: node.patternDefinitions.map(d => this.rewriteNamed(d)),
				};

			case PlanNodeKind.Other:
			default:
				log('Generic rewrite of %s node %s', node.kind, node.name);
				// Nodes built outside TypeScript may omit the field
				return { ...node, inputs, expressions: (node.expressions ?? []).map(rx) };
		}
	}

	private rewriteNamed(named: NamedExpr): NamedExpr {
		return { name: named.name, expr: this.rewriter.rewrite(named.expr) };
	}

	/** Literals never change under the rule chain; VALUES rows keep their literal type */
	private rewriteLiteral(literal: LiteralExpr): LiteralExpr {
		const result: ScalarExpr = this.rewriter.rewrite(literal);
		return isLiteral(result) ? result : literal;
	}
}
