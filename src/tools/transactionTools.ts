import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import * as ynab from 'ynab';
import { z } from 'zod';
import { withToolErrorHandling } from '../types/index.js';
import { jsonResult } from '../server/responseFormatter.js';
import { budgetIdSchema, lastKnowledgeSchema, rejectInvalid } from './common.js';
import { project, projectTransaction } from './projections.js';
import { validateTransactionEnums } from './validation.js';

const dateSchema = z.string().min(1, 'Date is required').describe('Date in ISO format (YYYY-MM-DD)');
const clearedSchema = z.string().describe("'cleared', 'uncleared' or 'reconciled'");
const flagColorSchema = z.string().describe('red, orange, yellow, green, blue or purple');

/**
 * Schema for get_transactions tool parameters
 */
export const GetTransactionsSchema = z
  .object({
    budget_id: budgetIdSchema,
    since_date: dateSchema.optional(),
    type: z.enum(['uncategorized', 'unapproved']).optional(),
    last_knowledge_of_server: lastKnowledgeSchema,
  })
  .strict();

export type GetTransactionsParams = z.infer<typeof GetTransactionsSchema>;

/**
 * Schema for get_transaction_by_id and delete_transaction tool parameters
 */
export const GetTransactionSchema = z
  .object({
    transaction_id: z.string().min(1, 'Transaction ID is required'),
    budget_id: budgetIdSchema,
  })
  .strict();

export type GetTransactionParams = z.infer<typeof GetTransactionSchema>;

/**
 * Schema for create_transaction tool parameters
 */
export const CreateTransactionSchema = z
  .object({
    account_id: z.string().min(1, 'Account ID is required'),
    amount: z.number().int().describe('Amount in milliunits, negative for outflows'),
    date: dateSchema,
    payee_name: z.string().optional(),
    payee_id: z.string().optional(),
    category_id: z.string().optional(),
    cleared: clearedSchema.default('uncleared'),
    approved: z.boolean().default(false),
    memo: z.string().optional(),
    flag_color: flagColorSchema.optional(),
    import_id: z
      .string()
      .describe('Import identifier; YNAB refuses a second transaction with the same one')
      .optional(),
    budget_id: budgetIdSchema,
  })
  .strict();

export type CreateTransactionParams = z.infer<typeof CreateTransactionSchema>;

/**
 * Schema for update_transaction tool parameters
 */
export const UpdateTransactionSchema = z
  .object({
    transaction_id: z.string().min(1, 'Transaction ID is required'),
    account_id: z.string().optional(),
    amount: z.number().int().optional(),
    date: dateSchema.optional(),
    payee_name: z.string().optional(),
    payee_id: z.string().optional(),
    category_id: z.string().optional(),
    cleared: clearedSchema.optional(),
    approved: z.boolean().optional(),
    memo: z.string().optional(),
    flag_color: flagColorSchema.optional(),
    budget_id: budgetIdSchema,
  })
  .strict();

export type UpdateTransactionParams = z.infer<typeof UpdateTransactionSchema>;

export const ImportTransactionsSchema = z
  .object({
    budget_id: budgetIdSchema,
  })
  .strict();

export type ImportTransactionsParams = z.infer<typeof ImportTransactionsSchema>;

/**
 * Handles the get_transactions tool call
 */
export async function handleGetTransactions(
  ynabAPI: ynab.API,
  params: GetTransactionsParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.transactions.getTransactions(
        params.budget_id,
        params.since_date,
        params.type,
        params.last_knowledge_of_server,
      );

      return jsonResult({
        transactions: response.data.transactions.map(projectTransaction),
        server_knowledge: response.data.server_knowledge,
      });
    },
    'get_transactions',
    `listing transactions for budget ${params.budget_id}`,
  );
}

/**
 * Handles the get_transaction_by_id tool call
 */
export async function handleGetTransactionById(
  ynabAPI: ynab.API,
  params: GetTransactionParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.transactions.getTransactionById(
        params.budget_id,
        params.transaction_id,
      );
      return jsonResult(project({ kind: 'transaction', value: response.data.transaction }));
    },
    'get_transaction_by_id',
    `getting transaction ${params.transaction_id}`,
  );
}

/**
 * Handles the create_transaction tool call
 */
export async function handleCreateTransaction(
  ynabAPI: ynab.API,
  params: CreateTransactionParams,
): Promise<CallToolResult> {
  const invalid = validateTransactionEnums(params);
  if (invalid) {
    return rejectInvalid(invalid);
  }

  return await withToolErrorHandling(
    async () => {
      const transactionData: ynab.NewTransaction = {
        account_id: params.account_id,
        amount: params.amount,
        date: params.date,
        cleared: params.cleared as ynab.TransactionClearedStatus,
        approved: params.approved,
      };
      if (params.payee_name !== undefined) transactionData.payee_name = params.payee_name;
      if (params.payee_id !== undefined) transactionData.payee_id = params.payee_id;
      if (params.category_id !== undefined) transactionData.category_id = params.category_id;
      if (params.memo !== undefined) transactionData.memo = params.memo;
      if (params.flag_color !== undefined) {
        transactionData.flag_color = params.flag_color as ynab.TransactionFlagColor;
      }
      if (params.import_id !== undefined) transactionData.import_id = params.import_id;

      const response = await ynabAPI.transactions.createTransaction(params.budget_id, {
        transaction: transactionData,
      });

      const created = response.data.transaction;
      if (!created) {
        return jsonResult({
          message: 'Transaction not created: import id already exists',
          duplicate_import_ids: response.data.duplicate_import_ids ?? [],
        });
      }

      return jsonResult({
        ...projectTransaction(created),
        message: 'Transaction created successfully',
      });
    },
    'create_transaction',
    `creating transaction in account ${params.account_id}`,
  );
}

/**
 * Handles the update_transaction tool call
 * Only the fields supplied are sent
 */
export async function handleUpdateTransaction(
  ynabAPI: ynab.API,
  params: UpdateTransactionParams,
): Promise<CallToolResult> {
  const invalid = validateTransactionEnums(params);
  if (invalid) {
    return rejectInvalid(invalid);
  }

  return await withToolErrorHandling(
    async () => {
      const transactionData: ynab.ExistingTransaction = {};
      if (params.account_id !== undefined) transactionData.account_id = params.account_id;
      if (params.amount !== undefined) transactionData.amount = params.amount;
      if (params.date !== undefined) transactionData.date = params.date;
      if (params.payee_name !== undefined) transactionData.payee_name = params.payee_name;
      if (params.payee_id !== undefined) transactionData.payee_id = params.payee_id;
      if (params.category_id !== undefined) transactionData.category_id = params.category_id;
      if (params.memo !== undefined) transactionData.memo = params.memo;
      if (params.cleared !== undefined) {
        transactionData.cleared = params.cleared as ynab.TransactionClearedStatus;
      }
      if (params.approved !== undefined) transactionData.approved = params.approved;
      if (params.flag_color !== undefined) {
        transactionData.flag_color = params.flag_color as ynab.TransactionFlagColor;
      }

      const response = await ynabAPI.transactions.updateTransaction(
        params.budget_id,
        params.transaction_id,
        { transaction: transactionData },
      );

      return jsonResult({
        ...projectTransaction(response.data.transaction),
        message: 'Transaction updated successfully',
      });
    },
    'update_transaction',
    `updating transaction ${params.transaction_id}`,
  );
}

/**
 * Handles the delete_transaction tool call
 */
export async function handleDeleteTransaction(
  ynabAPI: ynab.API,
  params: GetTransactionParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      await ynabAPI.transactions.deleteTransaction(params.budget_id, params.transaction_id);

      return jsonResult({
        id: params.transaction_id,
        deleted: true,
        message: `Transaction ${params.transaction_id} deleted successfully`,
      });
    },
    'delete_transaction',
    `deleting transaction ${params.transaction_id}`,
  );
}

/**
 * Handles the import_transactions tool call
 * Asks YNAB to pull pending transactions from linked accounts
 */
export async function handleImportTransactions(
  ynabAPI: ynab.API,
  params: ImportTransactionsParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.transactions.importTransactions(params.budget_id);
      const transactionIds = response.data.transaction_ids;

      return jsonResult({
        transaction_ids: transactionIds,
        count: transactionIds.length,
        message: `Imported ${transactionIds.length} transactions`,
      });
    },
    'import_transactions',
    `importing transactions for budget ${params.budget_id}`,
  );
}
