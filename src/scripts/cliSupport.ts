import { wrapError } from '../errors';
import logger from '../utils/logger';

/**
 * Log a failed script run with the error's code and context.
 */
export function logFailure(action: string, error: unknown): void {
  const domainError = wrapError(error);
  logger.error(`${action}: ${domainError.toUserMessage()}`, domainError.toJSON());
}
