import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import * as ynab from 'ynab';
import { z } from 'zod';
import { withToolErrorHandling } from '../types/index.js';
import { jsonResult } from '../server/responseFormatter.js';
import { formatAmount } from '../utils/amountUtils.js';
import { budgetIdSchema, lastKnowledgeSchema } from './common.js';
import { project, projectCategory, projectCategoryGroup } from './projections.js';

const monthSchema = z.string().min(1, 'Month is required').describe('Budget month, YYYY-MM-01 or "current"');

/**
 * Schema for get_categories tool parameters
 */
export const GetCategoriesSchema = z
  .object({
    budget_id: budgetIdSchema,
    last_knowledge_of_server: lastKnowledgeSchema,
  })
  .strict();

export type GetCategoriesParams = z.infer<typeof GetCategoriesSchema>;

/**
 * Schema for get_category_by_id tool parameters
 */
export const GetCategorySchema = z
  .object({
    category_id: z.string().min(1, 'Category ID is required'),
    budget_id: budgetIdSchema,
  })
  .strict();

export type GetCategoryParams = z.infer<typeof GetCategorySchema>;

/**
 * Schema for get_month_category tool parameters
 */
export const GetMonthCategorySchema = z
  .object({
    category_id: z.string().min(1, 'Category ID is required'),
    month: monthSchema,
    budget_id: budgetIdSchema,
  })
  .strict();

export type GetMonthCategoryParams = z.infer<typeof GetMonthCategorySchema>;

/**
 * Schema for update_category tool parameters
 */
export const UpdateCategorySchema = z
  .object({
    category_id: z.string().min(1, 'Category ID is required'),
    name: z.string().optional(),
    note: z.string().optional(),
    hidden: z.boolean().optional(),
    budget_id: budgetIdSchema,
  })
  .strict();

export type UpdateCategoryParams = z.infer<typeof UpdateCategorySchema>;

/**
 * Schema for update_month_category tool parameters
 */
export const UpdateMonthCategorySchema = z
  .object({
    category_id: z.string().min(1, 'Category ID is required'),
    month: monthSchema,
    budgeted: z.number().int().describe('Amount assigned for the month, in milliunits'),
    budget_id: budgetIdSchema,
  })
  .strict();

export type UpdateMonthCategoryParams = z.infer<typeof UpdateMonthCategorySchema>;

/**
 * Schema for get_category_balance tool parameters
 */
export const GetCategoryBalanceSchema = z
  .object({
    category_id: z.string().min(1, 'Category ID is required'),
    month: monthSchema.optional(),
    budget_id: budgetIdSchema,
  })
  .strict();

export type GetCategoryBalanceParams = z.infer<typeof GetCategoryBalanceSchema>;

/**
 * The API accepts `hidden` on category updates; the client's SaveCategory type
 * does not list it.
 */
type CategoryUpdate = ynab.SaveCategory & { hidden?: boolean };

/**
 * Handles the get_categories tool call
 */
export async function handleGetCategories(
  ynabAPI: ynab.API,
  params: GetCategoriesParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.categories.getCategories(
        params.budget_id,
        params.last_knowledge_of_server,
      );

      return jsonResult({
        category_groups: response.data.category_groups.map(projectCategoryGroup),
        server_knowledge: response.data.server_knowledge,
      });
    },
    'get_categories',
    `listing categories for budget ${params.budget_id}`,
  );
}

/**
 * Handles the get_category_by_id tool call
 */
export async function handleGetCategoryById(
  ynabAPI: ynab.API,
  params: GetCategoryParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.categories.getCategoryById(
        params.budget_id,
        params.category_id,
      );
      return jsonResult(project({ kind: 'category', value: response.data.category }));
    },
    'get_category_by_id',
    `getting category ${params.category_id}`,
  );
}

/**
 * Handles the get_month_category tool call
 */
export async function handleGetMonthCategory(
  ynabAPI: ynab.API,
  params: GetMonthCategoryParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.categories.getMonthCategoryById(
        params.budget_id,
        params.month,
        params.category_id,
      );
      return jsonResult(project({ kind: 'category', value: response.data.category }));
    },
    'get_month_category',
    `getting category ${params.category_id} for ${params.month}`,
  );
}

/**
 * Handles the update_category tool call
 * Only the fields supplied are sent
 */
export async function handleUpdateCategory(
  ynabAPI: ynab.API,
  params: UpdateCategoryParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const category: CategoryUpdate = {};
      if (params.name !== undefined) category.name = params.name;
      if (params.note !== undefined) category.note = params.note;
      if (params.hidden !== undefined) category.hidden = params.hidden;

      const response = await ynabAPI.categories.updateCategory(
        params.budget_id,
        params.category_id,
        { category },
      );

      return jsonResult({
        ...projectCategory(response.data.category),
        message: 'Category updated successfully',
      });
    },
    'update_category',
    `updating category ${params.category_id}`,
  );
}

/**
 * Handles the update_month_category tool call
 */
export async function handleUpdateMonthCategory(
  ynabAPI: ynab.API,
  params: UpdateMonthCategoryParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.categories.updateMonthCategory(
        params.budget_id,
        params.month,
        params.category_id,
        { category: { budgeted: params.budgeted } },
      );

      return jsonResult({
        ...projectCategory(response.data.category),
        month: params.month,
        message: `Category budget updated for ${params.month}`,
      });
    },
    'update_month_category',
    `updating category ${params.category_id} for ${params.month}`,
  );
}

/**
 * Handles the get_category_balance tool call
 * Reads the month endpoint when a month is given, the plain category otherwise
 */
export async function handleGetCategoryBalance(
  ynabAPI: ynab.API,
  params: GetCategoryBalanceParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = params.month
        ? await ynabAPI.categories.getMonthCategoryById(
            params.budget_id,
            params.month,
            params.category_id,
          )
        : await ynabAPI.categories.getCategoryById(params.budget_id, params.category_id);
      const category = response.data.category;

      return jsonResult({
        category_name: category.name,
        month: params.month ?? 'current',
        budgeted: category.budgeted,
        budgeted_formatted: formatAmount(category.budgeted),
        activity: category.activity,
        activity_formatted: formatAmount(category.activity),
        balance: category.balance,
        balance_formatted: formatAmount(category.balance),
        available: category.balance,
        available_formatted: formatAmount(category.balance),
      });
    },
    'get_category_balance',
    `getting balance for category ${params.category_id}`,
  );
}
