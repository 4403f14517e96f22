import { TypeFamily } from '../types/sql-type.js';

/**
 * Directional map from the left operand's family of an `=` comparison to the
 * right-operand families for which the left side must be wrapped in TRY_CAST.
 *
 * The upstream dialect compares strings with numbers and booleans implicitly;
 * Trino rejects those comparisons. A→{B} says nothing about B→{A}.
 */
export const SUPPORTED_TYPE_CAST_MAP: ReadonlyMap<TypeFamily, ReadonlySet<TypeFamily>> = new Map([
	[TypeFamily.CHARACTER, new Set([TypeFamily.NUMERIC, TypeFamily.BOOLEAN])],
]);

export function requiresSafeCast(left: TypeFamily, right: TypeFamily): boolean {
	return SUPPORTED_TYPE_CAST_MAP.get(left)?.has(right) ?? false;
}
