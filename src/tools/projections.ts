/**
 * Projection of YNAB client models into the plain JSON records tools return.
 *
 * Every projection is pure. Monetary fields keep their milliunit value and gain a
 * `<field>_formatted` companion; absent optional values become `null`.
 */

import * as ynab from 'ynab';
import { formatAmount, formatOptionalAmount } from '../utils/amountUtils.js';

export interface AccountRecord {
  id: string;
  name: string;
  type: string;
  on_budget: boolean;
  closed: boolean;
  note: string | null;
  balance: number;
  balance_formatted: string;
  cleared_balance: number;
  cleared_balance_formatted: string;
  uncleared_balance: number;
  uncleared_balance_formatted: string;
  transfer_payee_id: string | null;
  direct_import_linked: boolean | null;
  direct_import_in_error: boolean | null;
  deleted: boolean;
}

export interface CategoryRecord {
  id: string;
  category_group_id: string;
  category_group_name: string | null;
  name: string;
  hidden: boolean;
  note: string | null;
  budgeted: number;
  budgeted_formatted: string;
  activity: number;
  activity_formatted: string;
  balance: number;
  balance_formatted: string;
  goal_type: string | null;
  goal_creation_month: string | null;
  goal_target: number | null;
  goal_target_formatted: string | null;
  goal_target_month: string | null;
  goal_percentage_complete: number | null;
  deleted: boolean;
}

export interface CategoryGroupRecord {
  id: string;
  name: string;
  hidden: boolean;
  deleted: boolean;
  categories: CategoryRecord[];
}

export interface PayeeRecord {
  id: string;
  name: string;
  transfer_account_id: string | null;
  deleted: boolean;
}

export interface PayeeLocationRecord {
  id: string;
  payee_id: string;
  latitude: string;
  longitude: string;
  deleted: boolean;
}

export interface SubTransactionRecord {
  id: string;
  transaction_id: string;
  amount: number;
  amount_formatted: string;
  memo: string | null;
  payee_id: string | null;
  payee_name: string | null;
  category_id: string | null;
  category_name: string | null;
  transfer_account_id: string | null;
  deleted: boolean;
}

export interface TransactionRecord {
  id: string;
  date: string;
  amount: number;
  amount_formatted: string;
  memo: string | null;
  cleared: string;
  approved: boolean;
  flag_color: string | null;
  account_id: string;
  account_name: string;
  payee_id: string | null;
  payee_name: string | null;
  category_id: string | null;
  category_name: string | null;
  transfer_account_id: string | null;
  import_id: string | null;
  deleted: boolean;
  subtransactions: SubTransactionRecord[];
}

export interface MonthRecord {
  month: string;
  note: string | null;
  income: number;
  income_formatted: string;
  budgeted: number;
  budgeted_formatted: string;
  activity: number;
  activity_formatted: string;
  to_be_budgeted: number;
  to_be_budgeted_formatted: string;
  age_of_money: number | null;
  deleted: boolean;
}

export interface CurrencyFormatRecord {
  iso_code: string;
  example_format: string;
  decimal_digits: number;
  decimal_separator: string;
  symbol_first: boolean;
  group_separator: string;
  currency_symbol: string;
  display_symbol: boolean;
}

export interface DateFormatRecord {
  format: string;
}

export interface BudgetSummaryRecord {
  id: string;
  name: string;
  last_modified_on: string | null;
  first_month: string | null;
  last_month: string | null;
  date_format: DateFormatRecord | null;
  currency_format: CurrencyFormatRecord | null;
  accounts?: AccountRecord[];
}

export interface BudgetDetailRecord {
  id: string;
  name: string;
  last_modified_on: string | null;
  first_month: string | null;
  last_month: string | null;
  date_format: DateFormatRecord | null;
  currency_format: CurrencyFormatRecord | null;
  accounts: AccountRecord[];
  category_groups: CategoryGroupRecord[];
  payees: PayeeRecord[];
  months: MonthRecord[];
}

export interface UserRecord {
  id: string;
  name: string | null;
}

export function projectAccount(account: ynab.Account): AccountRecord {
  return {
    id: account.id,
    name: account.name,
    type: account.type,
    on_budget: account.on_budget,
    closed: account.closed,
    note: account.note ?? null,
    balance: account.balance,
    balance_formatted: formatAmount(account.balance),
    cleared_balance: account.cleared_balance,
    cleared_balance_formatted: formatAmount(account.cleared_balance),
    uncleared_balance: account.uncleared_balance,
    uncleared_balance_formatted: formatAmount(account.uncleared_balance),
    transfer_payee_id: account.transfer_payee_id ?? null,
    direct_import_linked: account.direct_import_linked ?? null,
    direct_import_in_error: account.direct_import_in_error ?? null,
    deleted: account.deleted,
  };
}

export function projectCategory(category: ynab.Category): CategoryRecord {
  return {
    id: category.id,
    category_group_id: category.category_group_id,
    category_group_name: category.category_group_name ?? null,
    name: category.name,
    hidden: category.hidden,
    note: category.note ?? null,
    budgeted: category.budgeted,
    budgeted_formatted: formatAmount(category.budgeted),
    activity: category.activity,
    activity_formatted: formatAmount(category.activity),
    balance: category.balance,
    balance_formatted: formatAmount(category.balance),
    goal_type: category.goal_type ?? null,
    goal_creation_month: category.goal_creation_month ?? null,
    goal_target: category.goal_target ?? null,
    goal_target_formatted: formatOptionalAmount(category.goal_target),
    goal_target_month: category.goal_target_month ?? null,
    goal_percentage_complete: category.goal_percentage_complete ?? null,
    deleted: category.deleted,
  };
}

export function projectCategoryGroup(
  group: ynab.CategoryGroupWithCategories,
): CategoryGroupRecord {
  return {
    id: group.id,
    name: group.name,
    hidden: group.hidden,
    deleted: group.deleted,
    categories: group.categories.map(projectCategory),
  };
}

export function projectPayee(payee: ynab.Payee): PayeeRecord {
  return {
    id: payee.id,
    name: payee.name,
    transfer_account_id: payee.transfer_account_id ?? null,
    deleted: payee.deleted,
  };
}

export function projectPayeeLocation(location: ynab.PayeeLocation): PayeeLocationRecord {
  return {
    id: location.id,
    payee_id: location.payee_id,
    latitude: location.latitude,
    longitude: location.longitude,
    deleted: location.deleted,
  };
}

export function projectSubTransaction(subtransaction: ynab.SubTransaction): SubTransactionRecord {
  return {
    id: subtransaction.id,
    transaction_id: subtransaction.transaction_id,
    amount: subtransaction.amount,
    amount_formatted: formatAmount(subtransaction.amount),
    memo: subtransaction.memo ?? null,
    payee_id: subtransaction.payee_id ?? null,
    payee_name: subtransaction.payee_name ?? null,
    category_id: subtransaction.category_id ?? null,
    category_name: subtransaction.category_name ?? null,
    transfer_account_id: subtransaction.transfer_account_id ?? null,
    deleted: subtransaction.deleted,
  };
}

export function projectTransaction(transaction: ynab.TransactionDetail): TransactionRecord {
  return {
    id: transaction.id,
    date: transaction.date,
    amount: transaction.amount,
    amount_formatted: formatAmount(transaction.amount),
    memo: transaction.memo ?? null,
    cleared: transaction.cleared,
    approved: transaction.approved,
    flag_color: transaction.flag_color ?? null,
    account_id: transaction.account_id,
    account_name: transaction.account_name,
    payee_id: transaction.payee_id ?? null,
    payee_name: transaction.payee_name ?? null,
    category_id: transaction.category_id ?? null,
    category_name: transaction.category_name ?? null,
    transfer_account_id: transaction.transfer_account_id ?? null,
    import_id: transaction.import_id ?? null,
    deleted: transaction.deleted,
    subtransactions: (transaction.subtransactions ?? []).map(projectSubTransaction),
  };
}

export function projectMonth(month: ynab.MonthDetail | ynab.MonthSummary): MonthRecord {
  return {
    month: month.month,
    note: month.note ?? null,
    income: month.income,
    income_formatted: formatAmount(month.income),
    budgeted: month.budgeted,
    budgeted_formatted: formatAmount(month.budgeted),
    activity: month.activity,
    activity_formatted: formatAmount(month.activity),
    to_be_budgeted: month.to_be_budgeted,
    to_be_budgeted_formatted: formatAmount(month.to_be_budgeted),
    age_of_money: month.age_of_money ?? null,
    deleted: month.deleted,
  };
}

export function projectCurrencyFormat(
  format: ynab.CurrencyFormat | null | undefined,
): CurrencyFormatRecord | null {
  if (!format) {
    return null;
  }
  return {
    iso_code: format.iso_code,
    example_format: format.example_format,
    decimal_digits: format.decimal_digits,
    decimal_separator: format.decimal_separator,
    symbol_first: format.symbol_first,
    group_separator: format.group_separator,
    currency_symbol: format.currency_symbol,
    display_symbol: format.display_symbol,
  };
}

export function projectDateFormat(
  format: ynab.DateFormat | null | undefined,
): DateFormatRecord | null {
  return format ? { format: format.format } : null;
}

export function projectBudgetSummary(budget: ynab.BudgetSummary): BudgetSummaryRecord {
  return {
    id: budget.id,
    name: budget.name,
    last_modified_on: budget.last_modified_on ?? null,
    first_month: budget.first_month ?? null,
    last_month: budget.last_month ?? null,
    date_format: projectDateFormat(budget.date_format),
    currency_format: projectCurrencyFormat(budget.currency_format),
    ...(budget.accounts ? { accounts: budget.accounts.map(projectAccount) } : {}),
  };
}

/**
 * The budget detail endpoint returns groups and categories as two flat lists.
 * Categories are nested under their group, keeping the order YNAB sent them in.
 */
export function nestCategories(
  groups: ynab.CategoryGroup[],
  categories: ynab.Category[],
): ynab.CategoryGroupWithCategories[] {
  return groups.map((group) => ({
    ...group,
    categories: categories.filter((category) => category.category_group_id === group.id),
  }));
}

export function projectBudgetDetail(budget: ynab.BudgetDetail): BudgetDetailRecord {
  return {
    id: budget.id,
    name: budget.name,
    last_modified_on: budget.last_modified_on ?? null,
    first_month: budget.first_month ?? null,
    last_month: budget.last_month ?? null,
    date_format: projectDateFormat(budget.date_format),
    currency_format: projectCurrencyFormat(budget.currency_format),
    accounts: (budget.accounts ?? []).map(projectAccount),
    category_groups: nestCategories(budget.category_groups ?? [], budget.categories ?? []).map(
      projectCategoryGroup,
    ),
    payees: (budget.payees ?? []).map(projectPayee),
    months: (budget.months ?? []).map(projectMonth),
  };
}

export function projectUser(user: ynab.User): UserRecord {
  return {
    id: user.id,
    name: 'name' in user && typeof user.name === 'string' ? user.name : null,
  };
}

/**
 * Every entity kind the projector understands, tagged by kind.
 */
export type ProjectableEntity =
  | { kind: 'account'; value: ynab.Account }
  | { kind: 'category'; value: ynab.Category }
  | { kind: 'category_group'; value: ynab.CategoryGroupWithCategories }
  | { kind: 'payee'; value: ynab.Payee }
  | { kind: 'payee_location'; value: ynab.PayeeLocation }
  | { kind: 'transaction'; value: ynab.TransactionDetail }
  | { kind: 'subtransaction'; value: ynab.SubTransaction }
  | { kind: 'month'; value: ynab.MonthDetail | ynab.MonthSummary }
  | { kind: 'budget_summary'; value: ynab.BudgetSummary }
  | { kind: 'budget_detail'; value: ynab.BudgetDetail }
  | { kind: 'user'; value: ynab.User };

export type ProjectedRecord =
  | AccountRecord
  | CategoryRecord
  | CategoryGroupRecord
  | PayeeRecord
  | PayeeLocationRecord
  | TransactionRecord
  | SubTransactionRecord
  | MonthRecord
  | BudgetSummaryRecord
  | BudgetDetailRecord
  | UserRecord;

export function project(entity: ProjectableEntity): ProjectedRecord {
  switch (entity.kind) {
    case 'account':
      return projectAccount(entity.value);
    case 'category':
      return projectCategory(entity.value);
    case 'category_group':
      return projectCategoryGroup(entity.value);
    case 'payee':
      return projectPayee(entity.value);
    case 'payee_location':
      return projectPayeeLocation(entity.value);
    case 'transaction':
      return projectTransaction(entity.value);
    case 'subtransaction':
      return projectSubTransaction(entity.value);
    case 'month':
      return projectMonth(entity.value);
    case 'budget_summary':
      return projectBudgetSummary(entity.value);
    case 'budget_detail':
      return projectBudgetDetail(entity.value);
    case 'user':
      return projectUser(entity.value);
    default: {
      const unhandled: never = entity;
      throw new Error(`Unsupported entity: ${JSON.stringify(unhandled)}`);
    }
  }
}
