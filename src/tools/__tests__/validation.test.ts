import { describe, it, expect } from 'vitest';
import {
  ACCOUNT_TYPES,
  INVALID_ACCOUNT_TYPE_MESSAGE,
  INVALID_CLEARED_MESSAGE,
  INVALID_FLAG_COLOR_MESSAGE,
  isAccountType,
  isClearedStatus,
  isFlagColor,
  validateTransactionEnums,
} from '../validation.js';

describe('validation', () => {
  it('accepts each of the eleven account types', () => {
    expect(ACCOUNT_TYPES).toHaveLength(11);
    for (const type of ACCOUNT_TYPES) {
      expect(isAccountType(type)).toBe(true);
    }
  });

  it('rejects account types by exact spelling', () => {
    expect(isAccountType('bogus')).toBe(false);
    expect(isAccountType('Checking')).toBe(false);
    expect(isAccountType('')).toBe(false);
  });

  it('lists the account types in the rejection message', () => {
    expect(INVALID_ACCOUNT_TYPE_MESSAGE).toBe(
      'Invalid account type. Must be one of: checking, savings, creditCard, cash, lineOfCredit, otherAsset, otherLiability, payPal, merchantAccount, investmentAccount, mortgage',
    );
  });

  it('checks cleared status and flag color', () => {
    expect(isClearedStatus('reconciled')).toBe(true);
    expect(isClearedStatus('pending')).toBe(false);
    expect(isFlagColor('purple')).toBe(true);
    expect(isFlagColor('pink')).toBe(false);
  });

  it('reports the first invalid transaction field', () => {
    expect(validateTransactionEnums({})).toBeNull();
    expect(validateTransactionEnums({ cleared: 'cleared', flag_color: 'red' })).toBeNull();
    expect(validateTransactionEnums({ cleared: 'maybe', flag_color: 'pink' })).toBe(
      INVALID_CLEARED_MESSAGE,
    );
    expect(validateTransactionEnums({ flag_color: 'pink' })).toBe(
      'flag_color must be one of: red, orange, yellow, green, blue, purple',
    );
    expect(INVALID_FLAG_COLOR_MESSAGE).toBe(
      'flag_color must be one of: red, orange, yellow, green, blue, purple',
    );
    expect(INVALID_CLEARED_MESSAGE).toBe("cleared must be 'cleared', 'uncleared', or 'reconciled'");
  });
});
