import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import * as ynab from 'ynab';
import { z } from 'zod';
import { describeError, withToolErrorHandling } from '../types/index.js';
import { jsonResult } from '../server/responseFormatter.js';
import { projectUser } from './projections.js';

export const NoInputSchema = z.object({}).strict();

export const API_KEY_FAILURE_MESSAGE =
  'API key verification failed. Please check your YNAB_API_KEY environment variable.';

/**
 * Handles the get_user tool call
 */
export async function handleGetUser(ynabAPI: ynab.API): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.user.getUser();

      return jsonResult({
        ...projectUser(response.data.user),
        message: 'User information retrieved successfully',
      });
    },
    'get_user',
    'getting user information',
  );
}

/**
 * Handles the verify_api_key tool call
 * A rejected key is a normal answer here, so failures come back as `valid: false`
 */
export async function handleVerifyApiKey(ynabAPI: ynab.API): Promise<CallToolResult> {
  try {
    const response = await ynabAPI.user.getUser();
    return jsonResult({
      valid: true,
      user_id: response.data.user.id,
      message: 'API key is valid and authenticated',
    });
  } catch (error) {
    return jsonResult({
      valid: false,
      error: describeError(error),
      message: API_KEY_FAILURE_MESSAGE,
    });
  }
}
