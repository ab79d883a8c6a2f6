import { AppError, InternalError, NetworkError } from './AppError';
import { ILogger, LoggerFactory } from '../logging/Logger';

/**
 * Error listener type
 */
export type ErrorListener = (error: AppError) => void;

/**
 * Global error handler
 */
export class ErrorHandler {
  private static instance: ErrorHandler | undefined;
  private errorListeners: ErrorListener[] = [];

  private constructor(private logger: ILogger) {}

  /**
   * Get singleton instance
   */
  static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler(LoggerFactory.getLogger('ErrorHandler'));
    }
    return ErrorHandler.instance;
  }

  /**
   * Drop the singleton (tests)
   */
  static reset(): void {
    ErrorHandler.instance = undefined;
  }

  /**
   * Route log output through another logger
   */
  setLogger(logger: ILogger): void {
    this.logger = logger;
  }

  /**
   * Handle error: log it, notify listeners and return the normalized error
   */
  handle(error: unknown): AppError {
    const appError = normalizeError(error);

    this.logError(appError);
    this.notifyListeners(appError);

    return appError;
  }

  /**
   * Add error listener
   */
  addListener(listener: ErrorListener): void {
    this.errorListeners.push(listener);
  }

  private logError(error: AppError): void {
    if (error.isOperational) {
      this.logger.warn(`[${error.code}] ${error.message}`, error.details);
    } else {
      this.logger.error(`Non-operational error [${error.code}]`, error, error.details);
    }
  }

  private notifyListeners(error: AppError): void {
    this.errorListeners.forEach(listener => {
      try {
        listener(error);
      } catch (listenerError) {
        this.logger.error('Error in error listener', listenerError);
      }
    });
  }
}

/**
 * Normalize any thrown value to an AppError
 */
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.message.includes('ECONNREFUSED') || error.message.includes('ENOTFOUND')) {
      return new NetworkError(error.message, { originalError: error.name });
    }

    return new InternalError(error.message, {
      originalError: error.name,
      stack: error.stack
    });
  }

  return new InternalError(String(error));
}
