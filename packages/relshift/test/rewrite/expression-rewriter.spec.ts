import { expect } from 'chai';
import { formatExpression } from '../../src/debug/formatter.js';
import { EQUALS, ReturnTypes, sourceFunction } from '../../src/expr/operator.js';
import { isCall, type CallExpr, type ScalarExpr } from '../../src/expr/scalar-expr.js';
import { REWRITE_RULES, rewriteExpression } from '../../src/rewrite/expression-rewriter.js';
import { CompositeTraceHook, type RewriteTraceHook } from '../../src/rewrite/trace.js';
import { BIGINT_TYPE, DATE_TYPE, VARCHAR_TYPE } from '../../src/types/sql-type.js';
import { builder as b, hive, ref } from '../support.js';

describe('Expression rewriter', () => {
	const custom = sourceFunction('my_udf', ReturnTypes.ARG0);

	it('runs the rule chain in priority order', () => {
		expect(REWRITE_RULES.map(r => r.id)).to.deep.equal([
			'generic-project',
			'map-constructor',
			'from-utc-timestamp',
			'from-unixtime',
			'cast-timestamp-decimal',
			'operator-mapping',
			'equality-coercion',
		]);
	});

	it('returns literals and field references as the same object', () => {
		const literal = b.makeLiteral('x');
		const field = ref(3, DATE_TYPE);
		expect(rewriteExpression(literal)).to.equal(literal);
		expect(rewriteExpression(field)).to.equal(field);
	});

	it('returns an unmatched call unchanged', () => {
		const call = b.makeCall(custom, ref(0, VARCHAR_TYPE), b.makeLiteral('a'));
		expect(rewriteExpression(call)).to.equal(call);
	});

	it('keeps operator and type of an unmatched call over rewritten operands', () => {
		const call = b.makeCall(custom, b.makeCall(hive('ucase', VARCHAR_TYPE), ref(0, VARCHAR_TYPE)));
		const result = rewriteExpression(call);
		expect(result).to.not.equal(call);
		if (!isCall(result)) throw new Error('expected a call');
		expect(result.operator).to.equal(custom);
		expect(result.type).to.equal(call.type);
		expect(formatExpression(result)).to.equal('my_udf(upper($0))');
	});

	it('does not modify its input', () => {
		const call = b.makeCall(EQUALS, b.makeCall(hive('to_date', DATE_TYPE), ref(0, VARCHAR_TYPE)), ref(1, BIGINT_TYPE));
		const before = formatExpression(call);
		rewriteExpression(call);
		expect(formatExpression(call)).to.equal(before);
	});

	describe('trace hooks', () => {
		function recorder(events: string[]): RewriteTraceHook {
			return {
				onRuleApplied: (ruleId: string, before: CallExpr, after: ScalarExpr) => {
					events.push(`${ruleId}: ${formatExpression(before)} -> ${formatExpression(after)}`);
				},
			};
		}

		it('reports each applied rule innermost first', () => {
			const events: string[] = [];
			const call = b.makeCall(EQUALS, b.makeCall(hive('lcase', VARCHAR_TYPE), ref(0, VARCHAR_TYPE)), ref(1, BIGINT_TYPE));
			rewriteExpression(call, { trace: recorder(events) });
			expect(events).to.deep.equal([
				'operator-mapping: lcase($0) -> lower($0)',
				'equality-coercion: (lcase($0) = $1) -> (TRY_CAST(lower($0) AS BIGINT) = $1)',
			]);
		});

		it('fans out through a composite hook', () => {
			const first: string[] = [];
			const second: string[] = [];
			const call = b.makeCall(hive('size', BIGINT_TYPE), ref(0, VARCHAR_TYPE));
			rewriteExpression(call, { trace: new CompositeTraceHook([recorder(first), recorder(second), {}]) });
			expect(first).to.deep.equal(['operator-mapping: size($0) -> cardinality($0)']);
			expect(second).to.deep.equal(first);
		});
	});
});
