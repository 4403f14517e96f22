import { StatusCode } from './types.js';

/**
 * Base class for relshift specific errors
 * Carries a status code and the underlying cause, if any
 */
export class RelshiftError extends Error {
	public code: number;
	public cause?: Error;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'RelshiftError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, RelshiftError);
		}
	}
}

/**
 * Error raised by rewrite collaborators (expression builder, projection expander)
 * when handed input they cannot express, such as an impossible cast.
 */
export class RewriteError extends RelshiftError {
	/** Formatted expression that triggered the failure, when known */
	public readonly expression?: string;

	constructor(message: string, code: number = StatusCode.ERROR, expression?: string, cause?: Error) {
		super(message, code, cause);
		this.name = 'RewriteError';
		this.expression = expression;
		Object.setPrototypeOf(this, RewriteError.prototype);
	}
}

export interface ErrorInfo {
	name: string;
	message: string;
	code?: number;
}

/**
 * Flatten an error and its `cause` chain, outermost first.
 */
export function unwrapError(error: unknown): ErrorInfo[] {
	const chain: ErrorInfo[] = [];
	let current: unknown = error;
	while (current !== undefined && current !== null) {
		if (current instanceof RelshiftError) {
			chain.push({ name: current.name, message: current.message, code: current.code });
			current = current.cause;
		} else if (current instanceof Error) {
			chain.push({ name: current.name, message: current.message });
			current = current.cause;
		} else {
			chain.push({ name: 'Unknown', message: String(current) });
			break;
		}
	}
	return chain;
}

/**
 * Render an error chain as `Name: message` lines joined by ' <- '.
 */
export function formatErrorChain(error: unknown): string {
	return unwrapError(error).map(e => `${e.name}: ${e.message}`).join(' <- ');
}
