import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import * as ynab from 'ynab';
import { z } from 'zod';
import { withToolErrorHandling } from '../types/index.js';
import { jsonResult } from '../server/responseFormatter.js';
import { formatAmount } from '../utils/amountUtils.js';
import { budgetIdSchema, lastKnowledgeSchema, rejectInvalid } from './common.js';
import { project, projectAccount } from './projections.js';
import { INVALID_ACCOUNT_TYPE_MESSAGE, isAccountType } from './validation.js';

/**
 * Schema for get_accounts tool parameters
 */
export const GetAccountsSchema = z
  .object({
    budget_id: budgetIdSchema,
    last_knowledge_of_server: lastKnowledgeSchema,
    include_closed: z.boolean().describe('Include closed accounts').default(false),
    include_deleted: z.boolean().describe('Include deleted accounts').default(false),
  })
  .strict();

export type GetAccountsParams = z.infer<typeof GetAccountsSchema>;

/**
 * Schema for get_account_by_id and get_account_balance tool parameters
 */
export const GetAccountSchema = z
  .object({
    account_id: z.string().min(1, 'Account ID is required'),
    budget_id: budgetIdSchema,
  })
  .strict();

export type GetAccountParams = z.infer<typeof GetAccountSchema>;

/**
 * Schema for create_account tool parameters
 */
export const CreateAccountSchema = z
  .object({
    name: z.string().min(1, 'Account name is required'),
    type: z.string().describe(
      'checking, savings, creditCard, cash, lineOfCredit, otherAsset, otherLiability, payPal, merchantAccount, investmentAccount or mortgage',
    ),
    balance: z.number().int().describe('Starting balance in milliunits'),
    budget_id: budgetIdSchema,
  })
  .strict();

export type CreateAccountParams = z.infer<typeof CreateAccountSchema>;

/**
 * Handles the get_accounts tool call
 * Closed and deleted accounts are dropped unless asked for
 */
export async function handleGetAccounts(
  ynabAPI: ynab.API,
  params: GetAccountsParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.accounts.getAccounts(
        params.budget_id,
        params.last_knowledge_of_server,
      );

      const accounts = response.data.accounts.filter(
        (account) =>
          (params.include_closed || !account.closed) && (params.include_deleted || !account.deleted),
      );

      return jsonResult({
        accounts: accounts.map(projectAccount),
        server_knowledge: response.data.server_knowledge,
      });
    },
    'get_accounts',
    `listing accounts for budget ${params.budget_id}`,
  );
}

/**
 * Handles the get_account_by_id tool call
 */
export async function handleGetAccountById(
  ynabAPI: ynab.API,
  params: GetAccountParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.accounts.getAccountById(params.budget_id, params.account_id);
      return jsonResult(project({ kind: 'account', value: response.data.account }));
    },
    'get_account_by_id',
    `getting account ${params.account_id}`,
  );
}

/**
 * Handles the create_account tool call
 */
export async function handleCreateAccount(
  ynabAPI: ynab.API,
  params: CreateAccountParams,
): Promise<CallToolResult> {
  if (!isAccountType(params.type)) {
    return rejectInvalid(INVALID_ACCOUNT_TYPE_MESSAGE);
  }

  const accountData: ynab.SaveAccount = {
    name: params.name,
    // payPal, merchantAccount and investmentAccount are accepted by the API but
    // missing from the client's type union
    type: params.type as ynab.Account['type'],
    balance: params.balance,
  };

  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.accounts.createAccount(params.budget_id, {
        account: accountData,
      });

      return jsonResult({
        ...projectAccount(response.data.account),
        message: 'Account created successfully',
      });
    },
    'create_account',
    `creating account ${params.name}`,
  );
}

/**
 * Handles the get_account_balance tool call
 */
export async function handleGetAccountBalance(
  ynabAPI: ynab.API,
  params: GetAccountParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.accounts.getAccountById(params.budget_id, params.account_id);
      const account = response.data.account;

      return jsonResult({
        account_name: account.name,
        balance: account.balance,
        balance_formatted: formatAmount(account.balance),
        cleared_balance: account.cleared_balance,
        cleared_balance_formatted: formatAmount(account.cleared_balance),
        uncleared_balance: account.uncleared_balance,
        uncleared_balance_formatted: formatAmount(account.uncleared_balance),
      });
    },
    'get_account_balance',
    `getting balance for account ${params.account_id}`,
  );
}
