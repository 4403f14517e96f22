/**
 * Literal values a scalar expression can carry.
 * DECIMAL literals travel as strings to keep their exact digits.
 */
export type LiteralValue = string | number | bigint | boolean | null;

/**
 * Status codes attached to relshift errors.
 * Numbering follows the SQLite result codes so callers embedding relshift
 * next to a SQL engine can map them directly.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	NOTFOUND = 12,
	MISMATCH = 20,
	MISUSE = 21,
	FORMAT = 24,
	RANGE = 25,
	UNSUPPORTED = 30,
}
