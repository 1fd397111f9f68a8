import { ZodError } from 'zod';
import { NoComparableConceptsError, NotFoundError } from '../../domain/errors/lexicon-errors';
import { AsjpTableError } from '../data/asjp-table.adapter';
import type { ILogger } from '../logging/logger';
import { Result } from '../result/result';

/**
 * Error types for better error categorization
 */
export enum ErrorType {
	VALIDATION = 'VALIDATION',
	NOT_FOUND = 'NOT_FOUND',
	NO_COMPARABLE_DATA = 'NO_COMPARABLE_DATA',
	DATA_SOURCE = 'DATA_SOURCE',
	SYSTEM = 'SYSTEM',
}

/**
 * Structured error information
 */
export interface ErrorInfo {
	type: ErrorType;
	code: string;
	message: string;
	context?: Record<string, unknown>;
	originalError: Error;
}

/**
 * Turns errors thrown by the lexicon core into logged Results at the
 * application boundary
 */
export class ErrorHandler {
	constructor(private readonly logger: ILogger) {}

	/**
	 * Run an operation, returning its value or the classified failure
	 */
	execute<T>(operation: () => T, operationName: string, context?: Record<string, unknown>): Result<T> {
		try {
			return Result.success(operation());
		} catch (error) {
			return this.handleError(error, operationName, context);
		}
	}

	/**
	 * Async counterpart of execute
	 */
	async executeAsync<T>(
		operation: () => Promise<T>,
		operationName: string,
		context?: Record<string, unknown>
	): Promise<Result<T>> {
		try {
			return Result.success(await operation());
		} catch (error) {
			return this.handleError(error, operationName, context);
		}
	}

	/**
	 * Log an error and wrap it in a failed Result. The original error is kept
	 * so callers can still branch on its class.
	 */
	handleError<T>(error: unknown, operationName: string, context?: Record<string, unknown>): Result<T> {
		const errorInfo = this.createErrorInfo(error, operationName, context);
		this.logError(errorInfo);
		return Result.failure(errorInfo.originalError);
	}

	/**
	 * Classify an error by its origin
	 */
	static classify(error: unknown): ErrorType {
		if (error instanceof NotFoundError) {
			return ErrorType.NOT_FOUND;
		}
		if (error instanceof NoComparableConceptsError) {
			return ErrorType.NO_COMPARABLE_DATA;
		}
		if (error instanceof ZodError) {
			return ErrorType.VALIDATION;
		}
		if (error instanceof AsjpTableError) {
			return ErrorType.DATA_SOURCE;
		}
		return ErrorType.SYSTEM;
	}

	private createErrorInfo(error: unknown, operationName: string, context?: Record<string, unknown>): ErrorInfo {
		const type = ErrorHandler.classify(error);
		const originalError = error instanceof Error ? error : new Error(String(error));
		return {
			type,
			code: `${type}_${operationName.toUpperCase().replace(/\W+/g, '_')}_FAILED`,
			message: `Failed to ${operationName}: ${originalError.message}`,
			context,
			originalError,
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
			error: errorInfo.originalError.message,
		};

		switch (errorInfo.type) {
			case ErrorType.VALIDATION:
			case ErrorType.NOT_FOUND:
			case ErrorType.NO_COMPARABLE_DATA:
				this.logger.warn(errorInfo.message, logContext);
				break;
			case ErrorType.DATA_SOURCE:
			case ErrorType.SYSTEM:
			default:
				this.logger.error(errorInfo.message, { ...logContext, stack: errorInfo.originalError.stack });
				break;
		}
	}
}
