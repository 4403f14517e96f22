import { expect } from 'chai';
import { RelshiftError, RewriteError, formatErrorChain, unwrapError } from '../../src/common/errors.js';
import { StatusCode } from '../../src/common/types.js';

describe('Errors', () => {
	it('defaults RelshiftError to the generic error code', () => {
		const err = new RelshiftError('boom');
		expect(err.code).to.equal(StatusCode.ERROR);
		expect(err.name).to.equal('RelshiftError');
		expect(err).to.be.instanceOf(Error);
	});

	it('keeps the failing expression on RewriteError', () => {
		const err = new RewriteError('bad cast', StatusCode.MISMATCH, 'CAST($0 AS DATE)');
		expect(err).to.be.instanceOf(RelshiftError);
		expect(err.name).to.equal('RewriteError');
		expect(err.expression).to.equal('CAST($0 AS DATE)');
	});

	it('walks the cause chain outermost first', () => {
		const root = new Error('root cause');
		const mid = new RewriteError('cannot expand', StatusCode.UNSUPPORTED, undefined, root);
		const top = new RelshiftError('rewrite failed', StatusCode.INTERNAL, mid);

		expect(unwrapError(top)).to.deep.equal([
			{ name: 'RelshiftError', message: 'rewrite failed', code: StatusCode.INTERNAL },
			{ name: 'RewriteError', message: 'cannot expand', code: StatusCode.UNSUPPORTED },
			{ name: 'Error', message: 'root cause' },
		]);
		expect(formatErrorChain(top)).to.equal('RelshiftError: rewrite failed <- RewriteError: cannot expand <- Error: root cause');
	});

	it('reports non-error values as unknown', () => {
		expect(unwrapError('plain')).to.deep.equal([{ name: 'Unknown', message: 'plain' }]);
	});
});
