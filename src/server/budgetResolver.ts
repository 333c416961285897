/**
 * Maps the `budget_id` selector every budget-scoped tool accepts to the
 * identifier sent to YNAB.
 */

export const DEFAULT_BUDGET_KEYWORD = 'default';
export const LAST_USED_BUDGET_KEYWORD = 'last-used';

/**
 * `"default"` becomes the configured default budget, or YNAB's own
 * `"last-used"` alias when none is configured. Anything else passes through
 * unchanged; YNAB decides whether it exists.
 */
export function resolveBudgetId(selector: string, defaultBudgetId?: string): string {
  if (selector !== DEFAULT_BUDGET_KEYWORD) {
    return selector;
  }
  return defaultBudgetId || LAST_USED_BUDGET_KEYWORD;
}

export class BudgetResolver {
  constructor(private readonly defaultBudgetId?: string | undefined) {}

  resolve(selector: string): string {
    return resolveBudgetId(selector, this.defaultBudgetId);
  }

  /**
   * The configured default, or null when YNAB's last-used budget applies
   */
  getDefaultBudgetId(): string | null {
    return this.defaultBudgetId || null;
  }
}
