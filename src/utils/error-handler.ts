import chalk from 'chalk';
import { match } from 'ts-pattern';
import { sanitizeError } from './security.js';
import {
  ERROR_LOG_LIMIT,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  ERROR_PATTERNS,
} from '../constants/error-handler.js';
import { ErrorType, type ErrorContext } from '../types/error-handler.js';

export class SecureError extends Error {
  public readonly type: ErrorType;
  public readonly context: ErrorContext;
  public readonly isRecoverable: boolean;
  public readonly userMessage: string;

  constructor(
    message: string,
    type: ErrorType = ErrorType.UNKNOWN_ERROR,
    context: ErrorContext = {},
    isRecoverable: boolean = false,
    userMessage?: string
  ) {
    super(sanitizeError(message));
    this.name = 'SecureError';
    this.type = type;
    this.context = { ...context, timestamp: new Date() };
    this.isRecoverable = isRecoverable;
    this.userMessage = userMessage ?? this.getDefaultUserMessage();
  }

  private getDefaultUserMessage(): string {
    return match(this.type)
      .with(
        ErrorType.VALIDATION_ERROR,
        () => 'Invalid input provided. Please check your input and try again.'
      )
      .with(
        ErrorType.SECURITY_ERROR,
        () => 'Security validation failed. Please check your input for suspicious content.'
      )
      .with(
        ErrorType.NETWORK_ERROR,
        () => 'Network connection failed. Please check your internet connection and try again.'
      )
      .with(
        ErrorType.FILE_SYSTEM_ERROR,
        () => 'File operation failed. Please check file permissions and try again.'
      )
      .with(
        ErrorType.GIT_ERROR,
        () => 'Git operation failed. Please ensure you are in a valid git repository.'
      )
      .with(
        ErrorType.AI_SERVICE_ERROR,
        () => 'AI service failed. Please check your API key and try again.'
      )
      .with(
        ErrorType.CONFIG_ERROR,
        () => 'Configuration error. Run "cw setup" again or check your configuration.'
      )
      .with(
        ErrorType.TIMEOUT_ERROR,
        () => 'Operation timed out. Please try again with fewer files or check your connection.'
      )
      .otherwise(() => 'An unexpected error occurred. Please try again.');
  }
}

const errorCodeOf = (error: unknown): string | undefined => {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
};

export class ErrorHandler {
  private static instance: ErrorHandler;
  private errorLog: Array<{ error: SecureError; timestamp: Date }> = [];

  private constructor() {
    // Private constructor for singleton pattern
  }

  public static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler();
    }
    return ErrorHandler.instance;
  }

  /** Converts any thrown value into a SecureError, records it and prints it. */
  public handleError = (error: unknown, context: ErrorContext = {}): SecureError => {
    const secureError = this.toSecureError(error, context);

    this.logError(secureError);
    this.displayError(secureError);

    return secureError;
  };

  public toSecureError = (error: unknown, context: ErrorContext = {}): SecureError => {
    if (error instanceof SecureError) {
      return error;
    }

    const message = error instanceof Error ? error.message : sanitizeError(error);

    const errorType = match(errorCodeOf(error))
      .with('ENOENT', 'EACCES', 'EPERM', 'ENOTDIR', 'EISDIR', () => ErrorType.FILE_SYSTEM_ERROR)
      .with('ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNRESET', () => ErrorType.NETWORK_ERROR)
      .otherwise(() => this.detectErrorTypeFromMessage(message));

    const isRecoverable = match(errorType)
      .with(
        ErrorType.FILE_SYSTEM_ERROR,
        ErrorType.NETWORK_ERROR,
        ErrorType.TIMEOUT_ERROR,
        ErrorType.VALIDATION_ERROR,
        ErrorType.GIT_ERROR,
        ErrorType.AI_SERVICE_ERROR,
        ErrorType.CONFIG_ERROR,
        () => true
      )
      .with(ErrorType.SECURITY_ERROR, ErrorType.UNKNOWN_ERROR, () => false)
      .exhaustive();

    return new SecureError(message, errorType, context, isRecoverable);
  };

  private readonly detectErrorTypeFromMessage = (message: string): ErrorType => {
    const lowerMsg = message.toLowerCase();

    for (const { type, patterns } of ERROR_PATTERNS) {
      if (patterns.some((pattern) => lowerMsg.includes(pattern))) {
        return type;
      }
    }

    return ErrorType.UNKNOWN_ERROR;
  };

  private readonly logError = (error: SecureError): void => {
    this.errorLog.push({ error, timestamp: new Date() });

    if (this.errorLog.length > ERROR_LOG_LIMIT) {
      this.errorLog = this.errorLog.slice(-ERROR_LOG_LIMIT);
    }
  };

  private readonly displayError = (error: SecureError): void => {
    const color = this.getErrorColor(error.type);
    console.error(color(`❌ ${error.userMessage}`));

    if (error.message && error.message !== error.userMessage) {
      console.error(chalk.gray(`   Details: ${error.message}`));
    }

    if (error.context.operation) {
      console.error(chalk.gray(`   Operation: ${error.context.operation}`));
    }

    if (error.context.file) {
      console.error(chalk.gray(`   File: ${error.context.file}`));
    }

    if (error.context.batch !== undefined) {
      console.error(chalk.gray(`   Batch: ${error.context.batch}`));
    }
  };

  private readonly getErrorColor = (type: ErrorType): ((text: string) => string) => {
    return match(type)
      .with(ErrorType.SECURITY_ERROR, () => chalk.red)
      .with(ErrorType.VALIDATION_ERROR, ErrorType.CONFIG_ERROR, () => chalk.yellow)
      .with(
        ErrorType.NETWORK_ERROR,
        ErrorType.TIMEOUT_ERROR,
        ErrorType.AI_SERVICE_ERROR,
        () => chalk.blue
      )
      .with(ErrorType.FILE_SYSTEM_ERROR, () => chalk.cyan)
      .with(ErrorType.GIT_ERROR, () => chalk.green)
      .otherwise(() => chalk.red);
  };

  public handleProcessExit = (code: number = 1): never => {
    if (this.errorLog.length > 0) {
      console.error(chalk.gray(`\n📊 Error Summary: ${this.errorLog.length} errors logged`));
    }
    process.exit(code);
  };
}

/**
 * Runs an operation and rethrows any failure as a SecureError carrying the
 * given context. Nothing is printed; callers at the command boundary decide
 * how to report it.
 */
export const withErrorHandling = async <T>(
  operation: () => T | Promise<T>,
  context: ErrorContext = {}
): Promise<T> => {
  try {
    return await operation();
  } catch (error) {
    throw ErrorHandler.getInstance().toSecureError(error, context);
  }
};

export const withRetry = async <T>(
  operation: () => Promise<T>,
  maxRetries: number = DEFAULT_RETRY_ATTEMPTS,
  baseDelay: number = DEFAULT_RETRY_DELAY_MS,
  context: ErrorContext = {}
): Promise<T> => {
  const errorHandler = ErrorHandler.getInstance();
  let lastError: SecureError | undefined;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = errorHandler.toSecureError(error, {
        ...context,
        attempt,
        maxRetries,
      });

      if (!lastError.isRecoverable || attempt === maxRetries) {
        break;
      }

      const delay = baseDelay * Math.pow(2, attempt - 1);
      console.log(chalk.yellow(`⏳ Retrying in ${delay}ms... (attempt ${attempt}/${maxRetries})`));
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError ?? new SecureError('Retry failed with unknown error', ErrorType.UNKNOWN_ERROR, context);
};
