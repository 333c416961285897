import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import * as ynab from 'ynab';
import { z } from 'zod';
import { withToolErrorHandling } from '../types/index.js';
import { jsonResult } from '../server/responseFormatter.js';
import { budgetIdSchema, lastKnowledgeSchema } from './common.js';
import {
  projectBudgetDetail,
  projectBudgetSummary,
  projectCurrencyFormat,
  projectDateFormat,
} from './projections.js';

/**
 * Schema for get_budgets tool parameters
 */
export const GetBudgetsSchema = z
  .object({
    include_accounts: z.boolean().describe("Include each budget's accounts").default(false),
  })
  .strict();

export type GetBudgetsParams = z.infer<typeof GetBudgetsSchema>;

/**
 * Schema for get_budget_by_id tool parameters
 */
export const GetBudgetSchema = z
  .object({
    budget_id: budgetIdSchema,
    last_knowledge_of_server: lastKnowledgeSchema,
  })
  .strict();

export type GetBudgetParams = z.infer<typeof GetBudgetSchema>;

/**
 * Schema for get_budget_settings tool parameters
 */
export const GetBudgetSettingsSchema = z
  .object({
    budget_id: budgetIdSchema,
  })
  .strict();

export type GetBudgetSettingsParams = z.infer<typeof GetBudgetSettingsSchema>;

/**
 * Handles the get_budgets tool call
 * Lists every budget on the account. `default_budget` is the account's own
 * default as YNAB reports it; `configured_default_budget` is DEFAULT_BUDGET_ID.
 */
export async function handleGetBudgets(
  ynabAPI: ynab.API,
  params: GetBudgetsParams,
  configuredDefaultBudgetId: string | null,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.budgets.getBudgets(params.include_accounts);

      return jsonResult({
        budgets: response.data.budgets.map(projectBudgetSummary),
        default_budget: response.data.default_budget?.id ?? null,
        configured_default_budget: configuredDefaultBudgetId,
      });
    },
    'get_budgets',
    'listing budgets',
  );
}

/**
 * Handles the get_budget_by_id tool call
 */
export async function handleGetBudgetById(
  ynabAPI: ynab.API,
  params: GetBudgetParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.budgets.getBudgetById(
        params.budget_id,
        params.last_knowledge_of_server,
      );

      return jsonResult({
        ...projectBudgetDetail(response.data.budget),
        server_knowledge: response.data.server_knowledge,
      });
    },
    'get_budget_by_id',
    `getting budget ${params.budget_id}`,
  );
}

/**
 * Handles the get_budget_settings tool call
 */
export async function handleGetBudgetSettings(
  ynabAPI: ynab.API,
  params: GetBudgetSettingsParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.budgets.getBudgetSettingsById(params.budget_id);
      const settings = response.data.settings;

      return jsonResult({
        date_format: projectDateFormat(settings.date_format),
        currency_format: projectCurrencyFormat(settings.currency_format),
      });
    },
    'get_budget_settings',
    `getting settings for budget ${params.budget_id}`,
  );
}
