import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ErrorHandler } from '../server/errorHandler.js';

/**
 * `budget_id` argument shared by every budget-scoped tool
 */
export const budgetIdSchema = z
  .string()
  .min(1, 'Budget ID is required')
  .describe('Budget ID, or "default" for the configured default budget')
  .default('default');

export const lastKnowledgeSchema = z
  .number()
  .int()
  .describe('Only return entities changed since this server_knowledge value')
  .optional();

export function rejectInvalid(message: string): CallToolResult {
  return ErrorHandler.getDefault().createValidationError(message);
}
