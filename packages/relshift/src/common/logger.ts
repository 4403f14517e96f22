import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'relshift';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('rewrite:plan') -> returns a debugger for 'relshift:rewrite:plan'
 *
 * Usage:
 * const log = createLogger('rewrite:expr');
 * log('Rewriting call %s', name);
 * const errorLog = log.extend('error'); // Creates 'relshift:rewrite:expr:error'
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'rewrite:plan', 'types:builder')
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable relshift debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'relshift:*')
 *   Examples:
 *   - 'relshift:*' - everything
 *   - 'relshift:rewrite:rule:*' - one line per rule application
 *   - 'relshift:rewrite:trace:*' - node and rule trace output
 * @param logFn - Optional custom log function. Defaults to stderr via debug.
 *
 * @example
 * ```typescript
 * import { enableLogging } from '@relshift/relshift';
 *
 * enableLogging('relshift:rewrite:*', console.log.bind(console));
 * ```
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

/**
 * Disable all relshift debug logging.
 */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without 'relshift:' prefix)
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
