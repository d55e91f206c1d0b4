import { describe, it, expect } from 'vitest';
import { mapCategory, mapTransactionMethod } from '@banksync/plaid-bridge';

describe('Category Mapper', () => {
  describe('mapCategory', () => {
    it('should map known primaries to the ledger vocabulary', () => {
      expect(mapCategory({ primary: 'FOOD_AND_DRINK', detailed: 'FOOD_AND_DRINK_GROCERIES' })).toEqual({
        category: 'food',
        categoryDetailed: 'FOOD_AND_DRINK_GROCERIES',
      });
      expect(mapCategory({ primary: 'RENT_AND_UTILITIES', detailed: 'RENT_AND_UTILITIES_RENT' }).category).toBe(
        'utilities'
      );
      expect(mapCategory({ primary: 'TRANSFER_OUT', detailed: 'TRANSFER_OUT_SAVINGS' }).category).toBe('transfer');
    });

    it('should lower-case unknown primaries', () => {
      expect(mapCategory({ primary: 'CRYPTO_REWARDS', detailed: 'CRYPTO_REWARDS_OTHER' }).category).toBe(
        'crypto_rewards'
      );
    });

    it('should return nulls for a missing category', () => {
      expect(mapCategory(null)).toEqual({ category: null, categoryDetailed: null });
      expect(mapCategory(undefined)).toEqual({ category: null, categoryDetailed: null });
    });
  });

  describe('mapTransactionMethod', () => {
    it('should prefer the payment channel', () => {
      expect(mapTransactionMethod({ paymentChannel: 'online', categoryPrimary: 'TRANSFER_OUT' })).toBe(
        'card_purchase'
      );
      expect(mapTransactionMethod({ paymentChannel: 'in store' })).toBe('card_purchase');
    });

    it('should let a channel of other decide', () => {
      expect(mapTransactionMethod({ paymentChannel: 'other', transactionType: 'digital' })).toBe('other');
      expect(
        mapTransactionMethod({ paymentChannel: 'other', transactionType: 'special', categoryPrimary: 'TRANSFER_IN' })
      ).toBe('other');
    });

    it('should use the transaction type when the channel is unmapped', () => {
      expect(mapTransactionMethod({ paymentChannel: 'mail', transactionType: 'digital' })).toBe('card_purchase');
      expect(mapTransactionMethod({ transactionType: 'unresolved', categoryPrimary: 'BANK_FEES' })).toBe('other');
    });

    it('should fall through to the category', () => {
      expect(mapTransactionMethod({ transactionType: 'unknown', categoryPrimary: 'TRANSFER_IN' })).toBe('transfer');
      expect(mapTransactionMethod({ categoryPrimary: 'LOAN_PAYMENTS' })).toBe('payment');
      expect(mapTransactionMethod({ categoryPrimary: 'BANK_FEES' })).toBe('fee');
      expect(mapTransactionMethod({ categoryPrimary: 'INCOME' })).toBe('deposit');
    });

    it('should return other when no signal decides', () => {
      expect(mapTransactionMethod({ paymentChannel: 'other', transactionType: 'unresolved' })).toBe('other');
      expect(mapTransactionMethod({ categoryPrimary: 'FOOD_AND_DRINK' })).toBe('other');
      expect(mapTransactionMethod({})).toBe('other');
    });

    it('should ignore inherited object keys', () => {
      expect(mapTransactionMethod({ paymentChannel: 'constructor', transactionType: 'toString' })).toBe('other');
    });
  });
});
