/**
 * relshift - rewrites relational plans from a generic SQL front end into
 * plans built from Trino operators and semantics.
 */

// Rewrite entry points
export { rewritePlan } from './rewrite/plan-walker.js';
export { rewriteExpression, ExpressionRewriter, REWRITE_RULES } from './rewrite/expression-rewriter.js';
export { ConfigKeys, isFlagEnabled, resolveRewriteOptions } from './rewrite/config.js';
export type {
	ConfigKey,
	GenericProjectionExpander,
	ResolvedRewriteOptions,
	RewriteConfig,
	RewriteOptions,
} from './rewrite/config.js';
export { defaultProjectionExpander } from './rewrite/projection-expander.js';
export { OPERATOR_MAP, getTransformer } from './rewrite/operator-map.js';
export type { Transformer } from './rewrite/operator-map.js';
export { SUPPORTED_TYPE_CAST_MAP, requiresSafeCast } from './rewrite/type-cast-matrix.js';
export { NOT_APPLICABLE, rewritten, createRule } from './rewrite/rule.js';
export type { RuleContext, RuleFn, RuleHandle, RuleOutcome } from './rewrite/rule.js';
export { DebugTraceHook, CompositeTraceHook } from './rewrite/trace.js';
export type { RewriteTraceHook } from './rewrite/trace.js';

// Plan model
export { PlanNodeKind } from './planner/nodes/plan-node-type.js';
export {
	tableScan,
	values,
	tableFunctionScan,
	filter,
	project,
	aggregate,
	sort,
	exchange,
	join,
	correlate,
	setOperation,
} from './planner/nodes/plan-node.js';
export type {
	PlanNode,
	JoinType,
	TableScanNode,
	ValuesNode,
	TableFunctionScanNode,
	FilterNode,
	ProjectNode,
	AggregateCall,
	AggregateNode,
	FieldCollation,
	SortNode,
	DistributionType,
	ExchangeNode,
	NamedExpr,
	MatchNode,
	JoinNode,
	CorrelateNode,
	SetOperationNode,
	OtherNode,
} from './planner/nodes/plan-node.js';

// Expressions and operators
export { isCall, isLiteral, withOperands } from './expr/scalar-expr.js';
export type { ScalarExpr, LiteralExpr, InputRefExpr, CallExpr } from './expr/scalar-expr.js';
export { ExpressionBuilder, defaultExpressionBuilder } from './expr/expression-builder.js';
export {
	EQUALS,
	CAST,
	TRY_CAST,
	MULTIPLY,
	UNARY_MINUS,
	ARRAY_VALUE_CONSTRUCTOR,
	MAP_VALUE_CONSTRUCTOR,
	TRINO_MAP_VALUE_CONSTRUCTOR,
	GENERIC_PROJECT,
	ReturnTypes,
	explicit,
	sourceFunction,
	targetFunction,
	isTargetOperator,
} from './expr/operator.js';
export type { OperatorDescriptor, OperatorKind, OperatorOrigin, ReturnTypeRule } from './expr/operator.js';

// Types
export * from './types/sql-type.js';

// Common
export { StatusCode } from './common/types.js';
export type { LiteralValue } from './common/types.js';
export { RelshiftError, RewriteError, unwrapError, formatErrorChain } from './common/errors.js';
export type { ErrorInfo } from './common/errors.js';
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';

// Debugging
export { formatType, formatExpression, formatExpressionList, formatPlan } from './debug/formatter.js';
