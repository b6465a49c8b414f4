// Error categorisation and item-level failure bookkeeping

import { ItemFailure, Logger, MigrationStage } from '../types';
import {
  ApiError,
  AuthenticationError,
  InvalidInputError,
  NotFoundError,
  QuotaExceededError,
  RateLimitError,
  TransientNetworkError,
  toError,
} from './errors';

export enum ErrorCategory {
  AUTHENTICATION = 'authentication',
  API_RATE_LIMIT = 'api_rate_limit',
  API_NETWORK = 'api_network',
  API_CLIENT = 'api_client',
  NOT_FOUND = 'not_found',
  QUOTA = 'quota',
  INVALID_INPUT = 'invalid_input',
  FILE_SYSTEM = 'file_system',
  UNKNOWN = 'unknown',
}

export enum RecoveryStrategy {
  SKIP = 'skip',
  ABORT = 'abort',
}

export interface ErrorContext {
  stage: MigrationStage;
  operation: string;
  ticketId?: number;
  fileName?: string;
}

export interface CategorizedError {
  originalError: Error;
  category: ErrorCategory;
  recoveryStrategy: RecoveryStrategy;
  context: ErrorContext;
}

const FILE_SYSTEM_CODES = new Set([
  'ENOENT',
  'EACCES',
  'EPERM',
  'ENOSPC',
  'EROFS',
  'EISDIR',
  'ENOTDIR',
  'EMFILE',
  'ENAMETOOLONG',
]);

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Sorts failures into fatal ones, which abort the run, and item-level ones,
 * which are logged, tallied and skipped.
 */
export class ErrorHandler {
  private readonly logger: Logger;
  private readonly failures: ItemFailure[] = [];
  private readonly counts: Record<ErrorCategory, number>;

  constructor(logger: Logger) {
    this.logger = logger;
    this.counts = {
      [ErrorCategory.AUTHENTICATION]: 0,
      [ErrorCategory.API_RATE_LIMIT]: 0,
      [ErrorCategory.API_NETWORK]: 0,
      [ErrorCategory.API_CLIENT]: 0,
      [ErrorCategory.NOT_FOUND]: 0,
      [ErrorCategory.QUOTA]: 0,
      [ErrorCategory.INVALID_INPUT]: 0,
      [ErrorCategory.FILE_SYSTEM]: 0,
      [ErrorCategory.UNKNOWN]: 0,
    };
  }

  categorizeError(error: Error, context: ErrorContext): CategorizedError {
    let category = ErrorCategory.UNKNOWN;
    let recoveryStrategy = RecoveryStrategy.SKIP;

    if (error instanceof AuthenticationError) {
      category = ErrorCategory.AUTHENTICATION;
      recoveryStrategy = RecoveryStrategy.ABORT;
    } else if (error instanceof InvalidInputError) {
      category = ErrorCategory.INVALID_INPUT;
      recoveryStrategy = RecoveryStrategy.ABORT;
    } else if (error instanceof RateLimitError) {
      // Only reaches here once retries are exhausted
      category = ErrorCategory.API_RATE_LIMIT;
    } else if (error instanceof TransientNetworkError) {
      category = ErrorCategory.API_NETWORK;
    } else if (error instanceof NotFoundError) {
      category = ErrorCategory.NOT_FOUND;
    } else if (error instanceof QuotaExceededError) {
      category = ErrorCategory.QUOTA;
    } else if (error instanceof ApiError) {
      category = ErrorCategory.API_CLIENT;
    } else if (FILE_SYSTEM_CODES.has(errorCode(error) ?? '')) {
      category = ErrorCategory.FILE_SYSTEM;
    }

    return { originalError: error, category, recoveryStrategy, context };
  }

  isFatal(error: Error): boolean {
    return error instanceof AuthenticationError || error instanceof InvalidInputError;
  }

  /**
   * Record an item-level failure and return it; rethrow anything fatal.
   */
  handleItemError(caught: unknown, context: ErrorContext): ItemFailure {
    const categorized = this.categorizeError(toError(caught), context);
    const error = categorized.originalError;

    if (categorized.recoveryStrategy === RecoveryStrategy.ABORT) {
      this.logger.error(`Aborting: ${context.operation} failed with ${error.name}`, {
        ...this.describeContext(context),
        error: error.message,
      });
      throw error;
    }

    this.counts[categorized.category]++;

    const failure: ItemFailure = {
      stage: context.stage,
      ticketId: context.ticketId,
      fileName: context.fileName,
      errorType: error.name,
      message: error.message,
      timestamp: new Date(),
    };
    this.failures.push(failure);

    this.logger.error(`${context.operation} failed`, {
      ...this.describeContext(context),
      category: categorized.category,
      error: error.message,
    });

    return failure;
  }

  getFailures(stage?: MigrationStage): ItemFailure[] {
    return stage ? this.failures.filter((failure) => failure.stage === stage) : [...this.failures];
  }

  getCounts(): Record<ErrorCategory, number> {
    return { ...this.counts };
  }

  private describeContext(context: ErrorContext): Record<string, unknown> {
    const described: Record<string, unknown> = { stage: context.stage };
    if (context.ticketId !== undefined) described.ticketId = context.ticketId;
    if (context.fileName !== undefined) described.fileName = context.fileName;
    return described;
  }
}
