/**
 * Text rendering of types, scalar expressions and plan trees.
 * Output is meant for logs and debugging, not for execution.
 */

import type { LiteralValue } from '../common/types.js';
import { TypeFamily, TypeName, familyOf, type SqlType } from '../types/sql-type.js';
import type { CallExpr, LiteralExpr, ScalarExpr } from '../expr/scalar-expr.js';
import type { NamedExpr, PlanNode } from '../planner/nodes/plan-node.js';
import { PlanNodeKind } from '../planner/nodes/plan-node-type.js';

/**
 * Format a type, e.g. `TIMESTAMP(3)`, `DECIMAL(10, 2)`, `MAP(VARCHAR, ARRAY(BIGINT))`.
 */
export function formatType(type: SqlType): string {
	switch (type.typeName) {
		case TypeName.ARRAY:
			return `ARRAY(${type.componentType ? formatType(type.componentType) : 'ANY'})`;
		case TypeName.MAP:
			return `MAP(${type.keyType ? formatType(type.keyType) : 'ANY'}, ${type.valueType ? formatType(type.valueType) : 'ANY'})`;
		default:
			if (type.precision === undefined) return type.typeName;
			if (type.scale === undefined) return `${type.typeName}(${type.precision})`;
			return `${type.typeName}(${type.precision}, ${type.scale})`;
	}
}

export function formatExpression(expr: ScalarExpr): string {
	switch (expr.kind) {
		case 'literal':
			return formatLiteral(expr);
		case 'inputRef':
			return `$${expr.index}`;
		case 'call':
			return formatCall(expr);
	}
}

export function formatExpressionList(exprs: readonly ScalarExpr[]): string {
	return exprs.map(formatExpression).join(', ');
}

function formatCall(call: CallExpr): string {
	const ops = call.operands;
	switch (call.operator.kind) {
		case 'equals':
		case 'times':
			return `(${ops.map(formatExpression).join(` ${call.operator.name} `)})`;
		case 'negate':
			return `-(${formatExpressionList(ops)})`;
		case 'cast':
		case 'tryCast':
			return `${call.operator.name}(${formatExpressionList(ops)} AS ${formatType(call.type)})`;
		default:
			return `${call.operator.name}(${formatExpressionList(ops)})`;
	}
}

function formatLiteral(literal: LiteralExpr): string {
	return formatValue(literal.value, literal.type);
}

function formatValue(value: LiteralValue, type: SqlType): string {
	if (value === null) return 'NULL';
	if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
	if (typeof value === 'bigint' || typeof value === 'number') return String(value);

	const quoted = `'${value.replace(/'/g, "''")}'`;
	switch (familyOf(type)) {
		case TypeFamily.NUMERIC:
			return value;
		case TypeFamily.TEMPORAL:
			return `${type.typeName} ${quoted}`;
		default:
			return quoted;
	}
}

/**
 * Format a plan tree, one node per line, children indented two spaces.
 *
 * @example
 * ```
 * Project(fields=[d], exprs=[date(CAST($0 AS TIMESTAMP(3)))])
 *   TableScan(table=[db.t])
 * ```
 */
export function formatPlan(node: PlanNode, indent = 0): string {
	const line = `${'  '.repeat(indent)}${node.kind}(${describeNode(node).join(', ')})`;
	const children = node.inputs.map(child => formatPlan(child, indent + 1));
	return [line, ...children].join('\n');
}

function describeNode(node: PlanNode): string[] {
	switch (node.kind) {
		case PlanNodeKind.TableScan:
			return [`table=[${node.table.join('.')}]`];
		case PlanNodeKind.Values:
			return [`tuples=[${node.tuples.map(t => `{${formatExpressionList(t)}}`).join(', ')}]`];
		case PlanNodeKind.TableFunctionScan:
			return [`call=[${formatExpression(node.call)}]`];
		case PlanNodeKind.Filter:
			return [`condition=[${formatExpression(node.condition)}]`];
		case PlanNodeKind.Project:
			return [`fields=[${node.fieldNames.join(', ')}]`, `exprs=[${formatExpressionList(node.projects)}]`];
		case PlanNodeKind.Aggregate:
			return [
				`group=[${node.groupSet.join(', ')}]`,
				...node.aggCalls.map(c => `${c.name}=[${c.functionName}(${c.distinct ? 'DISTINCT ' : ''}${c.args.map(a => `$${a}`).join(', ')})]`),
			];
		case PlanNodeKind.Sort: {
			const parts = [`sort=[${node.collation.map(c => `$${c.field} ${c.direction.toUpperCase()}`).join(', ')}]`];
			if (node.offset) parts.push(`offset=[${formatExpression(node.offset)}]`);
			if (node.fetch) parts.push(`fetch=[${formatExpression(node.fetch)}]`);
			return parts;
		}
		case PlanNodeKind.Exchange:
			return [`distribution=[${node.distribution.type}${node.distribution.keys.length ? ` ${node.distribution.keys.join(', ')}` : ''}]`];
		case PlanNodeKind.Match:
			return [
				`pattern=[${node.pattern}]`,
				`partition=[${formatExpressionList(node.partitionKeys)}]`,
				`measures=[${formatNamed(node.measures)}]`,
				`define=[${formatNamed(node.patternDefinitions)}]`,
			];
		case PlanNodeKind.Join:
			return [`condition=[${formatExpression(node.condition)}]`, `joinType=[${node.joinType}]`];
		case PlanNodeKind.Correlate:
			return [`correlation=[${node.correlationId}]`, `joinType=[${node.joinType}]`, `requiredColumns=[${node.requiredColumns.join(', ')}]`];
		case PlanNodeKind.Union:
		case PlanNodeKind.Intersect:
		case PlanNodeKind.Minus:
			return [`all=[${node.all}]`];
		case PlanNodeKind.Other:
		default:
			return [`name=[${node.name}]`, `exprs=[${formatExpressionList(node.expressions ?? [])}]`];
	}
}

function formatNamed(named: readonly NamedExpr[]): string {
	return named.map(n => `${n.name}: ${formatExpression(n.expr)}`).join(', ');
}
