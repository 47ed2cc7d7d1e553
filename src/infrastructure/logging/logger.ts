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

/**
 * Logger interface
 * Defines the contract for logger implementations
 */
export interface ILogger {
	/**
	 * Logs a debug message
	 * @param message - Log message
	 * @param context - Optional context data
	 */
	debug(message: string, context?: Record<string, unknown>): void;

	/**
	 * Logs an info message
	 * @param message - Log message
	 * @param context - Optional context data
	 */
	info(message: string, context?: Record<string, unknown>): void;

	/**
	 * Logs a warning message
	 * @param message - Log message
	 * @param context - Optional context data
	 */
	warn(message: string, context?: Record<string, unknown>): void;

	/**
	 * Logs an error message
	 * @param message - Log message
	 * @param context - Optional context data
	 */
	error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Console logger implementation
 * Every level goes to stderr: stdout belongs to the MCP stdio transport.
 */
export class ConsoleLogger implements ILogger {
	/**
	 * Minimum level that gets written
	 * @private
	 */
	private readonly level: LogLevel;

	/**
	 * Creates a new console logger
	 * @param level - Minimum log level to display
	 * @param scope - Optional prefix naming the component that logs
	 */
	constructor(
		level: LogLevel = LogLevel.INFO,
		private readonly scope?: string
	) {
		this.level = level;
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.write(LogLevel.DEBUG, message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.write(LogLevel.INFO, message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.write(LogLevel.WARN, message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.write(LogLevel.ERROR, message, context);
	}

	/**
	 * Returns a logger with the same level and a nested scope
	 */
	child(scope: string): ConsoleLogger {
		return new ConsoleLogger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
	}

	private write(messageLevel: LogLevel, message: string, context?: Record<string, unknown>): void {
		if (!this.shouldLog(messageLevel)) {
			return;
		}

		const prefix = this.scope
			? `[${messageLevel.toUpperCase()}] [${this.scope}]`
			: `[${messageLevel.toUpperCase()}]`;
		console.error(`${prefix} ${message}`, context || '');
	}

	/**
	 * Checks if a message with the given level should be logged
	 * @private
	 */
	private shouldLog(messageLevel: LogLevel): boolean {
		return LEVEL_ORDER.indexOf(messageLevel) >= LEVEL_ORDER.indexOf(this.level);
	}
}

/**
 * Maps a configured level name (`DEBUG`, `info`, ...) onto {@link LogLevel}
 */
export function parseLogLevel(name: string): LogLevel {
	const match = LEVEL_ORDER.find((level) => level === name.toLowerCase());
	return match ?? LogLevel.INFO;
}
