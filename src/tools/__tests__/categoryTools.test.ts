import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as ynab from 'ynab';
import {
  handleGetCategories,
  handleGetCategoryById,
  handleGetMonthCategory,
  handleUpdateCategory,
  handleUpdateMonthCategory,
  handleGetCategoryBalance,
  UpdateCategorySchema,
  GetCategoryBalanceSchema,
} from '../categoryTools.js';
import { createCategoryFixture, parseToolResult } from '../../__tests__/testUtils.js';

const getCategories = vi.fn();
const getCategoryById = vi.fn();
const getMonthCategoryById = vi.fn();
const updateCategory = vi.fn();
const updateMonthCategory = vi.fn();

const mockYnabAPI = {
  categories: {
    getCategories,
    getCategoryById,
    getMonthCategoryById,
    updateCategory,
    updateMonthCategory,
  },
} as unknown as ynab.API;

describe('Category Tools', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('lists category groups with their categories', async () => {
    getCategories.mockResolvedValue({
      data: {
        category_groups: [
          {
            id: 'group-1',
            name: 'Bills',
            hidden: false,
            deleted: false,
            categories: [createCategoryFixture()],
          },
        ],
        server_knowledge: 3,
      },
    });

    const payload = parseToolResult<{
      category_groups: { name: string; categories: { name: string; balance_formatted: string }[] }[];
      server_knowledge: number;
    }>(await handleGetCategories(mockYnabAPI, { budget_id: 'budget-1' }));

    expect(payload.server_knowledge).toBe(3);
    expect(payload.category_groups[0]?.name).toBe('Bills');
    expect(payload.category_groups[0]?.categories[0]).toMatchObject({
      name: 'Rent',
      balance_formatted: '$30.00',
    });
  });

  it('gets a category with its group', async () => {
    getCategoryById.mockResolvedValue({ data: { category: createCategoryFixture() } });

    const payload = parseToolResult(
      await handleGetCategoryById(mockYnabAPI, { budget_id: 'budget-1', category_id: 'category-1' }),
    );

    expect(payload).toMatchObject({
      id: 'category-1',
      category_group_id: 'group-1',
      category_group_name: 'Bills',
      budgeted_formatted: '$150.00',
      activity_formatted: '$-120.00',
    });
  });

  it('gets a category for a month', async () => {
    getMonthCategoryById.mockResolvedValue({ data: { category: createCategoryFixture() } });

    await handleGetMonthCategory(mockYnabAPI, {
      budget_id: 'budget-1',
      category_id: 'category-1',
      month: '2024-03-01',
    });

    expect(getMonthCategoryById).toHaveBeenCalledWith('budget-1', '2024-03-01', 'category-1');
  });

  it('sends only the fields supplied on update', async () => {
    updateCategory.mockResolvedValue({
      data: { category: createCategoryFixture({ hidden: true }), server_knowledge: 4 },
    });
    const params = UpdateCategorySchema.parse({ category_id: 'category-1', hidden: true });

    const payload = parseToolResult(await handleUpdateCategory(mockYnabAPI, params));

    expect(updateCategory).toHaveBeenCalledWith('default', 'category-1', {
      category: { hidden: true },
    });
    expect(payload).toMatchObject({ hidden: true, message: 'Category updated successfully' });
  });

  it('sets the budgeted amount for a month', async () => {
    updateMonthCategory.mockResolvedValue({
      data: { category: createCategoryFixture({ budgeted: 200000 }), server_knowledge: 5 },
    });

    const payload = parseToolResult(
      await handleUpdateMonthCategory(mockYnabAPI, {
        budget_id: 'budget-1',
        category_id: 'category-1',
        month: '2024-04-01',
        budgeted: 200000,
      }),
    );

    expect(updateMonthCategory).toHaveBeenCalledWith('budget-1', '2024-04-01', 'category-1', {
      category: { budgeted: 200000 },
    });
    expect(payload).toMatchObject({
      budgeted: 200000,
      budgeted_formatted: '$200.00',
      month: '2024-04-01',
      message: 'Category budget updated for 2024-04-01',
    });
  });

  describe('handleGetCategoryBalance', () => {
    it('reads the current category when no month is given', async () => {
      getCategoryById.mockResolvedValue({ data: { category: createCategoryFixture() } });
      const params = GetCategoryBalanceSchema.parse({ category_id: 'category-1' });

      const payload = parseToolResult(await handleGetCategoryBalance(mockYnabAPI, params));

      expect(payload).toEqual({
        category_name: 'Rent',
        month: 'current',
        budgeted: 150000,
        budgeted_formatted: '$150.00',
        activity: -120000,
        activity_formatted: '$-120.00',
        balance: 30000,
        balance_formatted: '$30.00',
        available: 30000,
        available_formatted: '$30.00',
      });
      expect(getMonthCategoryById).not.toHaveBeenCalled();
    });

    it('reads the month endpoint when a month is given', async () => {
      getMonthCategoryById.mockResolvedValue({ data: { category: createCategoryFixture() } });

      const payload = parseToolResult(
        await handleGetCategoryBalance(mockYnabAPI, {
          budget_id: 'budget-1',
          category_id: 'category-1',
          month: '2024-02-01',
        }),
      );

      expect(payload).toMatchObject({ month: '2024-02-01', available: 30000 });
      expect(getCategoryById).not.toHaveBeenCalled();
    });
  });
});
