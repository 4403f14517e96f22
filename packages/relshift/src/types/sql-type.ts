/**
 * Scalar type tags understood by the rewriter.
 * Names follow the SQL spelling used when types are printed.
 */
export enum TypeName {
	TINYINT = 'TINYINT',
	SMALLINT = 'SMALLINT',
	INTEGER = 'INTEGER',
	BIGINT = 'BIGINT',
	FLOAT = 'FLOAT',
	REAL = 'REAL',
	DOUBLE = 'DOUBLE',
	DECIMAL = 'DECIMAL',
	CHAR = 'CHAR',
	VARCHAR = 'VARCHAR',
	BOOLEAN = 'BOOLEAN',
	DATE = 'DATE',
	TIMESTAMP = 'TIMESTAMP',
	BINARY = 'BINARY',
	VARBINARY = 'VARBINARY',
	ARRAY = 'ARRAY',
	MAP = 'MAP',
	NULL = 'NULL',
	ANY = 'ANY',
}

/**
 * Coarse grouping of type tags, used for compatibility and castability checks.
 */
export enum TypeFamily {
	NUMERIC = 'NUMERIC',
	CHARACTER = 'CHARACTER',
	BOOLEAN = 'BOOLEAN',
	TEMPORAL = 'TEMPORAL',
	BINARY = 'BINARY',
	ARRAY = 'ARRAY',
	MAP = 'MAP',
	NULL = 'NULL',
	ANY = 'ANY',
}

/**
 * Type of a scalar expression.
 * `precision`/`scale` apply to DECIMAL, CHAR/VARCHAR and TIMESTAMP;
 * `componentType` to ARRAY; `keyType`/`valueType` to MAP.
 */
export interface SqlType {
	readonly typeName: TypeName;
	readonly precision?: number;
	readonly scale?: number;
	readonly componentType?: SqlType;
	readonly keyType?: SqlType;
	readonly valueType?: SqlType;
}

const FAMILY_BY_TYPE: Readonly<Record<TypeName, TypeFamily>> = {
	[TypeName.TINYINT]: TypeFamily.NUMERIC,
	[TypeName.SMALLINT]: TypeFamily.NUMERIC,
	[TypeName.INTEGER]: TypeFamily.NUMERIC,
	[TypeName.BIGINT]: TypeFamily.NUMERIC,
	[TypeName.FLOAT]: TypeFamily.NUMERIC,
	[TypeName.REAL]: TypeFamily.NUMERIC,
	[TypeName.DOUBLE]: TypeFamily.NUMERIC,
	[TypeName.DECIMAL]: TypeFamily.NUMERIC,
	[TypeName.CHAR]: TypeFamily.CHARACTER,
	[TypeName.VARCHAR]: TypeFamily.CHARACTER,
	[TypeName.BOOLEAN]: TypeFamily.BOOLEAN,
	[TypeName.DATE]: TypeFamily.TEMPORAL,
	[TypeName.TIMESTAMP]: TypeFamily.TEMPORAL,
	[TypeName.BINARY]: TypeFamily.BINARY,
	[TypeName.VARBINARY]: TypeFamily.BINARY,
	[TypeName.ARRAY]: TypeFamily.ARRAY,
	[TypeName.MAP]: TypeFamily.MAP,
	[TypeName.NULL]: TypeFamily.NULL,
	[TypeName.ANY]: TypeFamily.ANY,
};

/** Exact integer tags (int8/16/32/64). */
export const INTEGER_TYPES: ReadonlySet<TypeName> = new Set([
	TypeName.TINYINT, TypeName.SMALLINT, TypeName.INTEGER, TypeName.BIGINT,
]);

/** Approximate (and decimal) numeric tags. */
export const APPROX_NUMERIC_TYPES: ReadonlySet<TypeName> = new Set([
	TypeName.FLOAT, TypeName.REAL, TypeName.DOUBLE, TypeName.DECIMAL,
]);

export const TEMPORAL_TYPES: ReadonlySet<TypeName> = new Set([
	TypeName.DATE, TypeName.TIMESTAMP,
]);

export function familyOf(type: SqlType): TypeFamily {
	return FAMILY_BY_TYPE[type.typeName];
}

/**
 * Create a simple type, optionally with precision and scale.
 */
export function createSqlType(typeName: TypeName, precision?: number, scale?: number): SqlType {
	const type: { typeName: TypeName; precision?: number; scale?: number } = { typeName };
	if (precision !== undefined) type.precision = precision;
	if (scale !== undefined) type.scale = scale;
	return type;
}

export function createArrayType(componentType: SqlType): SqlType {
	return { typeName: TypeName.ARRAY, componentType };
}

export function createMapType(keyType: SqlType, valueType: SqlType): SqlType {
	return { typeName: TypeName.MAP, keyType, valueType };
}

/**
 * Whether a value of `from` may be converted to `to` by CAST or TRY_CAST.
 * NULL and ANY convert to anything; collections only to the same collection kind.
 */
export function canCast(from: SqlType, to: SqlType): boolean {
	const source = familyOf(from);
	const target = familyOf(to);

	if (source === TypeFamily.NULL || source === TypeFamily.ANY || target === TypeFamily.ANY) return true;
	if (source === TypeFamily.ARRAY || target === TypeFamily.ARRAY) return source === target;
	if (source === TypeFamily.MAP || target === TypeFamily.MAP) return source === target;
	if (target === TypeFamily.NULL) return false;

	switch (source) {
		case TypeFamily.BOOLEAN:
			return target !== TypeFamily.TEMPORAL && target !== TypeFamily.BINARY;
		case TypeFamily.BINARY:
			return target === TypeFamily.BINARY || target === TypeFamily.CHARACTER;
		case TypeFamily.TEMPORAL:
			return target !== TypeFamily.BINARY && target !== TypeFamily.BOOLEAN;
		case TypeFamily.NUMERIC:
			return target !== TypeFamily.BINARY;
		default:
			return true;
	}
}

// Shared instances for the common cases
export const BOOLEAN_TYPE = createSqlType(TypeName.BOOLEAN);
export const BIGINT_TYPE = createSqlType(TypeName.BIGINT);
export const INTEGER_TYPE = createSqlType(TypeName.INTEGER);
export const DOUBLE_TYPE = createSqlType(TypeName.DOUBLE);
export const VARCHAR_TYPE = createSqlType(TypeName.VARCHAR);
export const VARBINARY_TYPE = createSqlType(TypeName.VARBINARY);
export const DATE_TYPE = createSqlType(TypeName.DATE);
export const TIMESTAMP_TYPE = createSqlType(TypeName.TIMESTAMP);
export const NULL_TYPE = createSqlType(TypeName.NULL);
export const ANY_TYPE = createSqlType(TypeName.ANY);
/** Millisecond timestamps, the precision Trino output is declared with */
export const TIMESTAMP_MILLIS_TYPE = createSqlType(TypeName.TIMESTAMP, 3);
