import { PlanNodeKind } from './plan-node-type.js';
import type { LiteralExpr, ScalarExpr } from '../../expr/scalar-expr.js';
import type { SqlType } from '../../types/sql-type.js';

/**
 * Relational plan tree handed over by the upstream optimizer.
 *
 * Nodes are plain immutable records discriminated by `kind`. Each node owns its
 * `inputs` (no sharing between parents) and carries zero or more scalar
 * expressions in kind-specific fields.
 */
export type PlanNode =
	| TableScanNode
	| ValuesNode
	| TableFunctionScanNode
	| FilterNode
	| ProjectNode
	| AggregateNode
	| SortNode
	| ExchangeNode
	| MatchNode
	| JoinNode
	| CorrelateNode
	| SetOperationNode
	| OtherNode;

export type JoinType = 'inner' | 'left' | 'right' | 'full' | 'semi' | 'anti';

interface PlanNodeBase {
	readonly kind: PlanNodeKind;
	readonly inputs: readonly PlanNode[];
}

export interface TableScanNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.TableScan;
	/** Qualified table name, e.g. ['db', 'tbl'] */
	readonly table: readonly string[];
	readonly fieldNames: readonly string[];
}

export interface ValuesNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.Values;
	readonly fieldNames: readonly string[];
	readonly tuples: readonly (readonly LiteralExpr[])[];
}

export interface TableFunctionScanNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.TableFunctionScan;
	readonly call: ScalarExpr;
	readonly fieldNames: readonly string[];
}

export interface FilterNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.Filter;
	readonly condition: ScalarExpr;
}

export interface ProjectNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.Project;
	readonly projects: readonly ScalarExpr[];
	/** Parallel to `projects` */
	readonly fieldNames: readonly string[];
}

export interface AggregateCall {
	readonly name: string;
	readonly functionName: string;
	/** Input field indexes */
	readonly args: readonly number[];
	readonly distinct: boolean;
	readonly type: SqlType;
}

export interface AggregateNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.Aggregate;
	readonly groupSet: readonly number[];
	readonly aggCalls: readonly AggregateCall[];
}

export interface FieldCollation {
	readonly field: number;
	readonly direction: 'asc' | 'desc';
	readonly nulls?: 'first' | 'last';
}

export interface SortNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.Sort;
	readonly collation: readonly FieldCollation[];
	readonly offset?: ScalarExpr;
	readonly fetch?: ScalarExpr;
}

export type DistributionType = 'single' | 'hash' | 'range' | 'random' | 'roundRobin' | 'broadcast' | 'any';

export interface ExchangeNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.Exchange;
	readonly distribution: {
		readonly type: DistributionType;
		readonly keys: readonly number[];
	};
}

export interface NamedExpr {
	readonly name: string;
	readonly expr: ScalarExpr;
}

export interface MatchNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.Match;
	/** Row pattern, e.g. 'A B+ C' */
	readonly pattern: string;
	readonly partitionKeys: readonly ScalarExpr[];
	readonly measures: readonly NamedExpr[];
	readonly patternDefinitions: readonly NamedExpr[];
}

export interface JoinNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.Join;
	readonly joinType: JoinType;
	readonly condition: ScalarExpr;
}

export interface CorrelateNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.Correlate;
	readonly joinType: JoinType;
	readonly correlationId: string;
	readonly requiredColumns: readonly number[];
}

export interface SetOperationNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.Union | PlanNodeKind.Intersect | PlanNodeKind.Minus;
	/** UNION ALL / INTERSECT ALL / EXCEPT ALL */
	readonly all: boolean;
}

export interface OtherNode extends PlanNodeBase {
	readonly kind: PlanNodeKind.Other;
	/** Front-end name of the operator, for diagnostics */
	readonly name: string;
	readonly expressions: readonly ScalarExpr[];
}

// Construction helpers

export function tableScan(table: readonly string[], fieldNames: readonly string[]): TableScanNode {
	return { kind: PlanNodeKind.TableScan, inputs: [], table, fieldNames };
}

export function values(fieldNames: readonly string[], tuples: readonly (readonly LiteralExpr[])[]): ValuesNode {
	return { kind: PlanNodeKind.Values, inputs: [], fieldNames, tuples };
}

export function tableFunctionScan(call: ScalarExpr, fieldNames: readonly string[], inputs: readonly PlanNode[] = []): TableFunctionScanNode {
	return { kind: PlanNodeKind.TableFunctionScan, inputs, call, fieldNames };
}

export function filter(input: PlanNode, condition: ScalarExpr): FilterNode {
	return { kind: PlanNodeKind.Filter, inputs: [input], condition };
}

export function project(input: PlanNode, projects: readonly ScalarExpr[], fieldNames: readonly string[]): ProjectNode {
	return { kind: PlanNodeKind.Project, inputs: [input], projects, fieldNames };
}

export function aggregate(input: PlanNode, groupSet: readonly number[], aggCalls: readonly AggregateCall[]): AggregateNode {
	return { kind: PlanNodeKind.Aggregate, inputs: [input], groupSet, aggCalls };
}

export function sort(
	input: PlanNode,
	collation: readonly FieldCollation[],
	offset?: ScalarExpr,
	fetch?: ScalarExpr
): SortNode {
	return { kind: PlanNodeKind.Sort, inputs: [input], collation, offset, fetch };
}

export function exchange(input: PlanNode, type: DistributionType, keys: readonly number[] = []): ExchangeNode {
	return { kind: PlanNodeKind.Exchange, inputs: [input], distribution: { type, keys } };
}

export function join(left: PlanNode, right: PlanNode, joinType: JoinType, condition: ScalarExpr): JoinNode {
	return { kind: PlanNodeKind.Join, inputs: [left, right], joinType, condition };
}

export function correlate(
	left: PlanNode,
	right: PlanNode,
	joinType: JoinType,
	correlationId: string,
	requiredColumns: readonly number[]
): CorrelateNode {
	return { kind: PlanNodeKind.Correlate, inputs: [left, right], joinType, correlationId, requiredColumns };
}

export function setOperation(
	kind: SetOperationNode['kind'],
	inputs: readonly PlanNode[],
	all: boolean
): SetOperationNode {
	return { kind, inputs, all };
}
