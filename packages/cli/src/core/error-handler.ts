/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { isAppError, logger } from '@trialkey/utils';

/**
 * Sensitive patterns that should never appear in error messages
 */
const SENSITIVE_PATTERNS = [
  /api[_-]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /private[_-]?key/i,
  /bearer/i,
  /authorization/i,
];

function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Sanitize error message to remove sensitive information
 */
function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }
  return message;
}

/**
 * Format error for user display; application errors lead with their code
 */
export function formatError(error: unknown): string {
  if (isAppError(error)) {
    return `[${error.code}] ${sanitizeErrorMessage(error.message)}`;
  }
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }
  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }
  return 'An unexpected error occurred';
}

/**
 * Log error with full context (for debugging), never exposing secrets
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          containsSensitiveInfo(String(value)) ? '[REDACTED]' : value,
        ])
      )
    : undefined;

  logger.error('CLI error', error, sanitizedContext);
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return formatError(error);
}
