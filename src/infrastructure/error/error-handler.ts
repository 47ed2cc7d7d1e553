import { InvalidKeyTokenError } from '../../domain/entities/chord';
import { InvalidWordError } from '../../domain/entities/chord-dictionary';
import { DictionaryStorageError } from '../../application/ports/dictionary-repository';
import { InvalidChordError } from '../../application/use-cases/bind-chord.usecase';
import type { ILogger } from '../logging/logger';
import { Result } from '../result/result';

/**
 * Error types for better error categorization
 */
export enum ErrorType {
	VALIDATION = 'VALIDATION',
	STORAGE = 'STORAGE',
	SYSTEM = 'SYSTEM'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
	type: ErrorType;
	code: string;
	message: string;
	context?: Record<string, unknown>;
	originalError?: Error;
}

/**
 * Unified error handler: classifies, logs and wraps failures in a Result
 */
export class ErrorHandler {
	constructor(private readonly logger: ILogger) {}

	/**
	 * Handle and log an error, returning a failed Result whose error
	 * keeps the original message
	 */
	handleError<T>(
		error: unknown,
		type: ErrorType,
		code: string,
		message: string,
		context?: Record<string, unknown>
	): Result<T> {
		const errorInfo = this.createErrorInfo(error, type, code, message, context);
		this.logError(errorInfo);
		const detail = errorInfo.originalError?.message;
		return Result.failure(new Error(detail ? `${errorInfo.message}: ${detail}` : errorInfo.message));
	}

	/**
	 * Run a synchronous operation, classifying anything it throws
	 */
	execute<T>(
		operation: () => T,
		operationName: string,
		context?: Record<string, unknown>
	): Result<T> {
		try {
			return Result.success(operation());
		} catch (error) {
			const type = classifyError(error);
			return this.handleError(
				error,
				type,
				`${type}_${operationName.toUpperCase()}_FAILED`,
				`Failed to ${operationName.replace(/_/g, ' ')}`,
				context
			);
		}
	}

	/**
	 * Create structured error information
	 */
	private createErrorInfo(
		error: unknown,
		type: ErrorType,
		code: string,
		message: string,
		context?: Record<string, unknown>
	): ErrorInfo {
		return {
			type,
			code,
			message,
			context,
			originalError: error instanceof Error ? error : new Error(String(error))
		};
	}

	/**
	 * Log error with appropriate level based on type
	 */
	private logError(errorInfo: ErrorInfo): void {
		const logContext = {
			type: errorInfo.type,
			code: errorInfo.code,
			context: errorInfo.context,
			error: errorInfo.originalError?.message,
			stack: errorInfo.originalError?.stack
		};

		switch (errorInfo.type) {
			case ErrorType.VALIDATION:
				this.logger.warn(errorInfo.message, logContext);
				break;
			case ErrorType.STORAGE:
			case ErrorType.SYSTEM:
			default:
				this.logger.error(errorInfo.message, logContext);
				break;
		}
	}
}

export function classifyError(error: unknown): ErrorType {
	if (
		error instanceof InvalidKeyTokenError ||
		error instanceof InvalidChordError ||
		error instanceof InvalidWordError
	) {
		return ErrorType.VALIDATION;
	}
	if (error instanceof DictionaryStorageError) {
		return ErrorType.STORAGE;
	}
	return ErrorType.SYSTEM;
}
