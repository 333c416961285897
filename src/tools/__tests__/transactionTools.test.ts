import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as ynab from 'ynab';
import {
  handleGetTransactions,
  handleGetTransactionById,
  handleCreateTransaction,
  handleUpdateTransaction,
  handleDeleteTransaction,
  handleImportTransactions,
  CreateTransactionSchema,
  UpdateTransactionSchema,
  GetTransactionsSchema,
} from '../transactionTools.js';
import { INVALID_CLEARED_MESSAGE, INVALID_FLAG_COLOR_MESSAGE } from '../validation.js';
import { createTransactionFixture, parseToolResult } from '../../__tests__/testUtils.js';

const getTransactions = vi.fn();
const getTransactionById = vi.fn();
const createTransaction = vi.fn();
const updateTransaction = vi.fn();
const deleteTransaction = vi.fn();
const importTransactions = vi.fn();

const mockYnabAPI = {
  transactions: {
    getTransactions,
    getTransactionById,
    createTransaction,
    updateTransaction,
    deleteTransaction,
    importTransactions,
  },
} as unknown as ynab.API;

describe('Transaction Tools', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('handleGetTransactions', () => {
    it('passes the filters through and projects each transaction', async () => {
      getTransactions.mockResolvedValue({
        data: { transactions: [createTransactionFixture()], server_knowledge: 21 },
      });
      const params = GetTransactionsSchema.parse({
        budget_id: 'budget-1',
        since_date: '2024-03-01',
        type: 'unapproved',
      });

      const payload = parseToolResult<{
        transactions: { id: string; amount_formatted: string; subtransactions: unknown[] }[];
        server_knowledge: number;
      }>(await handleGetTransactions(mockYnabAPI, params));

      expect(getTransactions).toHaveBeenCalledWith('budget-1', '2024-03-01', 'unapproved', undefined);
      expect(payload.server_knowledge).toBe(21);
      expect(payload.transactions[0]).toMatchObject({
        id: 'transaction-1',
        amount_formatted: '$-42.50',
        subtransactions: [],
      });
    });

    it('rejects an unknown type filter at parse time', () => {
      expect(GetTransactionsSchema.safeParse({ type: 'pending' }).success).toBe(false);
    });
  });

  it('gets a transaction with its subtransactions', async () => {
    getTransactionById.mockResolvedValue({
      data: {
        transaction: createTransactionFixture({
          subtransactions: [
            {
              id: 'sub-1',
              transaction_id: 'transaction-1',
              amount: -30000,
              memo: null,
              payee_id: null,
              payee_name: null,
              category_id: 'category-2',
              category_name: 'Groceries',
              transfer_account_id: null,
              deleted: false,
            },
          ],
        }),
      },
    });

    const payload = parseToolResult<{ subtransactions: unknown[] }>(
      await handleGetTransactionById(mockYnabAPI, {
        budget_id: 'budget-1',
        transaction_id: 'transaction-1',
      }),
    );

    expect(payload.subtransactions).toEqual([
      {
        id: 'sub-1',
        transaction_id: 'transaction-1',
        amount: -30000,
        amount_formatted: '$-30.00',
        memo: null,
        payee_id: null,
        payee_name: null,
        category_id: 'category-2',
        category_name: 'Groceries',
        transfer_account_id: null,
        deleted: false,
      },
    ]);
  });

  describe('handleCreateTransaction', () => {
    it('applies the cleared and approved defaults', async () => {
      createTransaction.mockResolvedValue({
        data: { transaction: createTransactionFixture(), server_knowledge: 22 },
      });
      const params = CreateTransactionSchema.parse({
        account_id: 'account-1',
        amount: -42500,
        date: '2024-03-15',
        payee_name: 'Grocery Mart',
      });

      const payload = parseToolResult(await handleCreateTransaction(mockYnabAPI, params));

      expect(createTransaction).toHaveBeenCalledWith('default', {
        transaction: {
          account_id: 'account-1',
          amount: -42500,
          date: '2024-03-15',
          cleared: 'uncleared',
          approved: false,
          payee_name: 'Grocery Mart',
        },
      });
      expect(payload).toMatchObject({
        id: 'transaction-1',
        message: 'Transaction created successfully',
      });
    });

    it('rejects an invalid cleared status without calling YNAB', async () => {
      const params = CreateTransactionSchema.parse({
        account_id: 'account-1',
        amount: -1000,
        date: '2024-03-15',
        cleared: 'pending',
      });

      const payload = parseToolResult(await handleCreateTransaction(mockYnabAPI, params));

      expect(payload).toEqual({ error: INVALID_CLEARED_MESSAGE });
      expect(createTransaction).not.toHaveBeenCalled();
    });

    it('rejects an invalid flag color without calling YNAB', async () => {
      const params = CreateTransactionSchema.parse({
        account_id: 'account-1',
        amount: -1000,
        date: '2024-03-15',
        flag_color: 'pink',
      });

      const payload = parseToolResult(await handleCreateTransaction(mockYnabAPI, params));

      expect(payload).toEqual({ error: INVALID_FLAG_COLOR_MESSAGE });
      expect(createTransaction).not.toHaveBeenCalled();
    });

    it('reports duplicate import ids when nothing was created', async () => {
      createTransaction.mockResolvedValue({
        data: { duplicate_import_ids: ['YNAB:-42500:2024-03-15:1'], server_knowledge: 22 },
      });
      const params = CreateTransactionSchema.parse({
        account_id: 'account-1',
        amount: -42500,
        date: '2024-03-15',
        import_id: 'YNAB:-42500:2024-03-15:1',
      });

      const payload = parseToolResult(await handleCreateTransaction(mockYnabAPI, params));

      expect(payload).toEqual({
        message: 'Transaction not created: import id already exists',
        duplicate_import_ids: ['YNAB:-42500:2024-03-15:1'],
      });
    });
  });

  describe('handleUpdateTransaction', () => {
    it('sends only the fields supplied', async () => {
      updateTransaction.mockResolvedValue({
        data: { transaction: createTransactionFixture({ memo: 'Split later' }), server_knowledge: 23 },
      });
      const params = UpdateTransactionSchema.parse({
        transaction_id: 'transaction-1',
        memo: 'Split later',
        flag_color: 'blue',
      });

      const payload = parseToolResult(await handleUpdateTransaction(mockYnabAPI, params));

      expect(updateTransaction).toHaveBeenCalledWith('default', 'transaction-1', {
        transaction: { memo: 'Split later', flag_color: 'blue' },
      });
      expect(payload).toMatchObject({
        memo: 'Split later',
        message: 'Transaction updated successfully',
      });
    });

    it('rejects an invalid cleared status without calling YNAB', async () => {
      const params = UpdateTransactionSchema.parse({
        transaction_id: 'transaction-1',
        cleared: 'CLEARED',
      });

      const payload = parseToolResult(await handleUpdateTransaction(mockYnabAPI, params));

      expect(payload).toEqual({ error: INVALID_CLEARED_MESSAGE });
      expect(updateTransaction).not.toHaveBeenCalled();
    });
  });

  it('deletes a transaction', async () => {
    deleteTransaction.mockResolvedValue({
      data: { transaction: createTransactionFixture({ deleted: true }), server_knowledge: 24 },
    });

    const payload = parseToolResult(
      await handleDeleteTransaction(mockYnabAPI, {
        budget_id: 'budget-1',
        transaction_id: 'transaction-1',
      }),
    );

    expect(deleteTransaction).toHaveBeenCalledWith('budget-1', 'transaction-1');
    expect(payload).toEqual({
      id: 'transaction-1',
      deleted: true,
      message: 'Transaction transaction-1 deleted successfully',
    });
  });

  it('imports pending transactions', async () => {
    importTransactions.mockResolvedValue({
      data: { transaction_ids: ['transaction-7', 'transaction-8'] },
    });

    const payload = parseToolResult(
      await handleImportTransactions(mockYnabAPI, { budget_id: 'budget-1' }),
    );

    expect(payload).toEqual({
      transaction_ids: ['transaction-7', 'transaction-8'],
      count: 2,
      message: 'Imported 2 transactions',
    });
  });

  it('turns a YNAB rejection into an error payload', async () => {
    deleteTransaction.mockRejectedValue({
      error: { id: '404.2', name: 'resource_not_found', detail: 'Resource not found' },
    });

    const payload = parseToolResult(
      await handleDeleteTransaction(mockYnabAPI, {
        budget_id: 'budget-1',
        transaction_id: 'missing',
      }),
    );

    expect(payload).toEqual({ error: '404.2 resource_not_found: Resource not found' });
  });
});
