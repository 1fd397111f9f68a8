/**
 * Log level enum
 * Defines the severity levels for logging
 */
export enum LogLevel {
	DEBUG = 'debug',
	INFO = 'info',
	WARN = 'warn',
	ERROR = 'error',
}

export type LogContext = Record<string, unknown>;

/**
 * Logger interface
 * Defines the contract for logger implementations
 */
export interface ILogger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Console logger implementation
 * Every level goes to stderr: stdout is reserved for the MCP stdio transport.
 */
export class ConsoleLogger implements ILogger {
	private readonly level: LogLevel;
	private readonly scope?: string;

	/**
	 * Creates a new console logger
	 * @param level - Minimum log level to display
	 * @param scope - Optional component name prefixed to each line
	 */
	constructor(level: LogLevel = LogLevel.INFO, scope?: string) {
		this.level = level;
		this.scope = scope;
	}

	debug(message: string, context?: LogContext): void {
		this.write(LogLevel.DEBUG, message, context);
	}

	info(message: string, context?: LogContext): void {
		this.write(LogLevel.INFO, message, context);
	}

	warn(message: string, context?: LogContext): void {
		this.write(LogLevel.WARN, message, context);
	}

	error(message: string, context?: LogContext): void {
		this.write(LogLevel.ERROR, message, context);
	}

	/**
	 * Returns a logger with the same level scoped to a component
	 */
	child(scope: string): ConsoleLogger {
		return new ConsoleLogger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
	}

	private write(messageLevel: LogLevel, message: string, context?: LogContext): void {
		if (!this.shouldLog(messageLevel)) {
			return;
		}

		const prefix = this.scope
			? `[${messageLevel.toUpperCase()}] [${this.scope}]`
			: `[${messageLevel.toUpperCase()}]`;
		console.error(`${prefix} ${message}`, context ?? '');
	}

	private shouldLog(messageLevel: LogLevel): boolean {
		return LEVEL_ORDER.indexOf(messageLevel) >= LEVEL_ORDER.indexOf(this.level);
	}
}

/**
 * Maps a configured level name ('DEBUG', 'info', ...) to a LogLevel
 */
export function parseLogLevel(name: string): LogLevel {
	const match = LEVEL_ORDER.find((level) => level === name.toLowerCase());
	if (!match) {
		throw new Error(`Unknown log level "${name}".`);
	}
	return match;
}
