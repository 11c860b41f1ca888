/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@trialkey/utils';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(schema: T, rawArgs: Record<string, unknown>): z.infer<T> {
  const result = schema.safeParse(rawArgs);
  if (result.success) {
    return result.data;
  }

  // Format Zod errors into user-friendly messages
  const messages = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
  throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
    formattedMessages: messages,
  });
}
