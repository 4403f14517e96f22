import { expect } from 'chai';
import { formatExpression, formatType } from '../../../src/debug/formatter.js';
import { GENERIC_PROJECT } from '../../../src/expr/operator.js';
import { isCall } from '../../../src/expr/scalar-expr.js';
import { rewriteExpression } from '../../../src/rewrite/expression-rewriter.js';
import { ConfigKeys } from '../../../src/rewrite/config.js';
import { OPERATOR_MAP, getTransformer } from '../../../src/rewrite/operator-map.js';
import {
	BIGINT_TYPE,
	DATE_TYPE,
	DOUBLE_TYPE,
	INTEGER_TYPE,
	TIMESTAMP_TYPE,
	VARCHAR_TYPE,
	createArrayType,
} from '../../../src/types/sql-type.js';
import { builder as b, hive, ref } from '../../support.js';

describe('Operator mapping rule', () => {
	const toDate = hive('to_date', DATE_TYPE);

	describe('to_date', () => {
		it('becomes a Trino date over a millisecond timestamp', () => {
			const result = rewriteExpression(b.makeCall(toDate, ref(0, VARCHAR_TYPE)));
			expect(formatExpression(result)).to.equal('date(CAST($0 AS TIMESTAMP(3)))');
			expect(formatType(result.type)).to.equal('DATE');
		});

		it('is kept when avoid_transform_to_date_udf is set in a record', () => {
			const call = b.makeCall(toDate, ref(0, VARCHAR_TYPE));
			const result = rewriteExpression(call, { config: { [ConfigKeys.AVOID_TRANSFORM_TO_DATE_UDF]: true } });
			expect(result).to.equal(call);
		});

		it('is kept when avoid_transform_to_date_udf is set in a Map', () => {
			const call = b.makeCall(toDate, ref(0, VARCHAR_TYPE));
			const config = new Map<string, boolean>([[ConfigKeys.AVOID_TRANSFORM_TO_DATE_UDF, true]]);
			expect(rewriteExpression(call, { config })).to.equal(call);
		});

		it('is rewritten when the flag is false', () => {
			const call = b.makeCall(toDate, ref(0, VARCHAR_TYPE));
			const result = rewriteExpression(call, { config: { [ConfigKeys.AVOID_TRANSFORM_TO_DATE_UDF]: false } });
			expect(formatExpression(result)).to.equal('date(CAST($0 AS TIMESTAMP(3)))');
		});

		it('the flag does not affect other functions', () => {
			const datediff = hive('datediff', INTEGER_TYPE);
			const result = rewriteExpression(b.makeCall(datediff, ref(0, VARCHAR_TYPE), ref(1, VARCHAR_TYPE)), {
				config: { [ConfigKeys.AVOID_TRANSFORM_TO_DATE_UDF]: true },
			});
			expect(formatExpression(result)).to.equal(
				"date_diff('day', date(CAST($1 AS TIMESTAMP(3))), date(CAST($0 AS TIMESTAMP(3))))"
			);
		});
	});

	it('rewrites date_add and date_sub without looping on the Trino date_add', () => {
		const date = ref(0, DATE_TYPE);
		const days = ref(1, INTEGER_TYPE);
		expect(formatExpression(rewriteExpression(b.makeCall(hive('date_add', DATE_TYPE), date, days))))
			.to.equal("date_add('day', $1, date(CAST($0 AS TIMESTAMP(3))))");
		expect(formatExpression(rewriteExpression(b.makeCall(hive('date_sub', DATE_TYPE), date, days))))
			.to.equal("date_add('day', -($1), date(CAST($0 AS TIMESTAMP(3))))");
	});

	it('selects unix_timestamp by operand count', () => {
		const unixTimestamp = hive('unix_timestamp', BIGINT_TYPE);
		expect(formatExpression(rewriteExpression(b.makeCall(unixTimestamp))))
			.to.equal('CAST(to_unixtime(now()) AS BIGINT)');
		expect(formatExpression(rewriteExpression(b.makeCall(unixTimestamp, ref(0, VARCHAR_TYPE)))))
			.to.equal('CAST(to_unixtime(CAST($0 AS TIMESTAMP(3))) AS BIGINT)');
	});

	it('renames string functions regardless of case', () => {
		const result = rewriteExpression(b.makeCall(hive('LCASE', VARCHAR_TYPE), ref(0, VARCHAR_TYPE)));
		expect(formatExpression(result)).to.equal('lower($0)');
		expect(formatType(result.type)).to.equal('VARCHAR');
		expect(formatExpression(rewriteExpression(b.makeCall(hive('instr', INTEGER_TYPE), ref(0, VARCHAR_TYPE), b.makeLiteral('x')))))
			.to.equal("strpos($0, 'x')");
	});

	it('types nvl after its first operand', () => {
		const result = rewriteExpression(b.makeCall(hive('nvl', VARCHAR_TYPE), ref(0, VARCHAR_TYPE), b.makeLiteral('n/a')));
		expect(formatExpression(result)).to.equal("coalesce($0, 'n/a')");
		expect(formatType(result.type)).to.equal('VARCHAR');
	});

	it('drops the seed of rand', () => {
		const result = rewriteExpression(b.makeCall(hive('rand', DOUBLE_TYPE), b.makeIntegerLiteral(42)));
		expect(formatExpression(result)).to.equal('random()');
		expect(formatType(result.type)).to.equal('DOUBLE');
	});

	it('builds collect_set from array_agg', () => {
		const result = rewriteExpression(b.makeCall(hive('collect_set', createArrayType(BIGINT_TYPE)), ref(0, BIGINT_TYPE)));
		expect(formatExpression(result)).to.equal('array_distinct(array_agg($0))');
		expect(formatType(result.type)).to.equal('ARRAY(BIGINT)');
	});

	it('rewrites operands before the call itself', () => {
		const fromUnixtime = hive('from_unixtime', VARCHAR_TYPE);
		const result = rewriteExpression(b.makeCall(toDate, b.makeCall(fromUnixtime, ref(0, BIGINT_TYPE))));
		expect(formatExpression(result)).to.equal(
			"date(CAST(format_datetime(from_unixtime($0), 'yyyy-MM-dd HH:mm:ss') AS TIMESTAMP(3)))"
		);
	});

	describe('operands already rewritten', () => {
		it('keeps a projection expander result inside a mapped call', () => {
			const expanded = b.makeCall(toDate, ref(1, VARCHAR_TYPE));
			const marker = b.makeCallWithType(VARCHAR_TYPE, GENERIC_PROJECT, [ref(0, VARCHAR_TYPE), b.makeLiteral('p')]);
			const call = b.makeCall(hive('nvl', VARCHAR_TYPE), marker, ref(2, VARCHAR_TYPE));

			const result = rewriteExpression(call, { projectionExpander: () => expanded });

			expect(formatExpression(result)).to.equal('coalesce(to_date($1), $2)');
			expect(isCall(result) && result.operands[0]).to.equal(expanded);
		});

		it('does not revisit a from_utc_timestamp that fell through', () => {
			const fromUtc = hive('from_utc_timestamp', TIMESTAMP_TYPE);
			const marker = b.makeCallWithType(VARCHAR_TYPE, GENERIC_PROJECT, [ref(0, VARCHAR_TYPE), b.makeLiteral('ts')]);
			const options = { projectionExpander: () => ref(3, BIGINT_TYPE) };

			const bare = rewriteExpression(b.makeCall(fromUtc, marker, ref(1, VARCHAR_TYPE)), options);
			expect(formatExpression(bare)).to.equal('from_utc_timestamp($3, $1)');

			const wrapped = b.makeCall(hive('ucase', VARCHAR_TYPE), b.makeCall(fromUtc, marker, ref(1, VARCHAR_TYPE)));
			expect(formatExpression(rewriteExpression(wrapped, options))).to.equal('upper(from_utc_timestamp($3, $1))');
		});
	});

	it('ignores calls with an unregistered operand count', () => {
		const call = b.makeCall(hive('instr', INTEGER_TYPE), ref(0, VARCHAR_TYPE), b.makeLiteral('x'), b.makeIntegerLiteral(2));
		expect(rewriteExpression(call)).to.equal(call);
	});

	it('keys the table by lower-cased name and operand count', () => {
		expect(getTransformer('TO_DATE', 1)).to.equal(OPERATOR_MAP.get('to_date/1'));
		expect(getTransformer('to_date', 2)).to.be.undefined;
		expect(getTransformer('no_such_function', 1)).to.be.undefined;
	});

	it('is stable under a second rewrite', () => {
		const once = rewriteExpression(b.makeCall(hive('weekofyear', INTEGER_TYPE), ref(0, DATE_TYPE)));
		expect(formatExpression(once)).to.equal('week_of_year(date(CAST($0 AS TIMESTAMP(3))))');
		expect(rewriteExpression(once)).to.equal(once);
	});
});
