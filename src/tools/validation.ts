/**
 * Enumeration checks for free-text tool arguments. They run inside the handler
 * so a bad value is answered with a fixed message and no remote call.
 */

export const ACCOUNT_TYPES = [
  'checking',
  'savings',
  'creditCard',
  'cash',
  'lineOfCredit',
  'otherAsset',
  'otherLiability',
  'payPal',
  'merchantAccount',
  'investmentAccount',
  'mortgage',
] as const;

export const CLEARED_STATUSES = ['cleared', 'uncleared', 'reconciled'] as const;

export const FLAG_COLORS = ['red', 'orange', 'yellow', 'green', 'blue', 'purple'] as const;

export type AccountTypeName = (typeof ACCOUNT_TYPES)[number];
export type ClearedStatus = (typeof CLEARED_STATUSES)[number];
export type FlagColor = (typeof FLAG_COLORS)[number];

export const INVALID_ACCOUNT_TYPE_MESSAGE = `Invalid account type. Must be one of: ${ACCOUNT_TYPES.join(', ')}`;
export const INVALID_CLEARED_MESSAGE = "cleared must be 'cleared', 'uncleared', or 'reconciled'";
export const INVALID_FLAG_COLOR_MESSAGE = `flag_color must be one of: ${FLAG_COLORS.join(', ')}`;

function isOneOf<T extends string>(allowed: readonly T[], value: string): value is T {
  return allowed.some((candidate) => candidate === value);
}

export function isAccountType(value: string): value is AccountTypeName {
  return isOneOf(ACCOUNT_TYPES, value);
}

export function isClearedStatus(value: string): value is ClearedStatus {
  return isOneOf(CLEARED_STATUSES, value);
}

export function isFlagColor(value: string): value is FlagColor {
  return isOneOf(FLAG_COLORS, value);
}

/**
 * Returns the rejection message for the first invalid transaction enumeration, or null.
 */
export function validateTransactionEnums(params: {
  cleared?: string | undefined;
  flag_color?: string | undefined;
}): string | null {
  if (params.cleared !== undefined && !isClearedStatus(params.cleared)) {
    return INVALID_CLEARED_MESSAGE;
  }
  if (params.flag_color !== undefined && !isFlagColor(params.flag_color)) {
    return INVALID_FLAG_COLOR_MESSAGE;
  }
  return null;
}
