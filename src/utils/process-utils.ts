import { UI_CONSTANTS } from '../constants/ui.js';
import { ErrorHandler } from './error-handler.js';

/**
 * Exits with a short delay so pending HTTP sockets from the AI client can close.
 */
export const exitProcess = (exitCode: number = 0): void => {
  setTimeout(() => process.exit(exitCode), UI_CONSTANTS.EXIT_DELAY_MS);
};

/**
 * Reports an error through the ErrorHandler and exits immediately.
 */
export const handleErrorImmediate = (error: unknown, operation?: string): never => {
  const errorHandler = ErrorHandler.getInstance();
  errorHandler.handleError(error, operation ? { operation } : {});
  return errorHandler.handleProcessExit(1);
};
