/**
 * Rewrite configuration flags and the options object shared by the plan
 * walker and the expression rewriter.
 */

import { createLogger } from '../common/logger.js';
import { defaultExpressionBuilder, type ExpressionBuilder } from '../expr/expression-builder.js';
import type { CallExpr, ScalarExpr } from '../expr/scalar-expr.js';
import { DebugTraceHook, type RewriteTraceHook } from './trace.js';
import { defaultProjectionExpander } from './projection-expander.js';

const log = createLogger('rewrite:config');

/** Flag names recognized by the rewriter */
export const ConfigKeys = {
	/** Leave `to_date` calls untouched by the operator mapping table */
	AVOID_TRANSFORM_TO_DATE_UDF: 'avoid_transform_to_date_udf',
} as const;

export type ConfigKey = typeof ConfigKeys[keyof typeof ConfigKeys];

/**
 * Flag name → value. Missing flags read as false; unknown flags are ignored.
 */
export type RewriteConfig = Readonly<Record<string, boolean>> | ReadonlyMap<string, boolean>;

/**
 * Expands a generic projection marker call into a replacement expression.
 * Receives the call with its operands already rewritten.
 */
export type GenericProjectionExpander = (builder: ExpressionBuilder, call: CallExpr) => ScalarExpr;

export interface RewriteOptions {
	config?: RewriteConfig;
	projectionExpander?: GenericProjectionExpander;
	trace?: RewriteTraceHook;
	builder?: ExpressionBuilder;
}

/** Options with every default filled in; built once per rewrite invocation */
export interface ResolvedRewriteOptions {
	readonly config: RewriteConfig;
	readonly projectionExpander: GenericProjectionExpander;
	readonly trace: RewriteTraceHook;
	readonly builder: ExpressionBuilder;
}

const EMPTY_CONFIG: RewriteConfig = Object.freeze({});
const defaultTraceHook = new DebugTraceHook();

export function isFlagEnabled(config: RewriteConfig, key: ConfigKey): boolean {
	if (isConfigMap(config)) {
		return config.get(key) ?? false;
	}
	return Object.prototype.hasOwnProperty.call(config, key) ? config[key] === true : false;
}

function isConfigMap(config: RewriteConfig): config is ReadonlyMap<string, boolean> {
	return config instanceof Map;
}

export function resolveRewriteOptions(options: RewriteOptions | ResolvedRewriteOptions = {}): ResolvedRewriteOptions {
	const resolved: ResolvedRewriteOptions = {
		config: options.config ?? EMPTY_CONFIG,
		projectionExpander: options.projectionExpander ?? defaultProjectionExpander,
		trace: options.trace ?? defaultTraceHook,
		builder: options.builder ?? defaultExpressionBuilder,
	};
	log('Resolved rewrite options (%s=%s)',
		ConfigKeys.AVOID_TRANSFORM_TO_DATE_UDF,
		isFlagEnabled(resolved.config, ConfigKeys.AVOID_TRANSFORM_TO_DATE_UDF));
	return resolved;
}
