// src/tests/BillingService.test.ts
import { calculateBilling, formatMoney } from '../services/BillingService';
import { DEFAULT_CONFIG } from '../types/models';

describe('BillingService', () => {
  describe('calculateBilling', () => {
    it('should bill a standard day at the default rate', () => {
      expect(calculateBilling(7.5, DEFAULT_CONFIG)).toEqual({ hours: 7.5, net: 727.5, vat: 145.5, gross: 873 });
    });

    it('should round each amount to pence', () => {
      expect(calculateBilling(7.33, DEFAULT_CONFIG)).toEqual({ hours: 7.33, net: 711.01, vat: 142.2, gross: 853.21 });
    });

    it('should use the configured rate and VAT', () => {
      const config = { ...DEFAULT_CONFIG, hourlyRate: 100, vatRate: 0 };
      expect(calculateBilling(10, config)).toEqual({ hours: 10, net: 1000, vat: 0, gross: 1000 });
    });
  });

  describe('formatMoney', () => {
    it('should format known currencies', () => {
      expect(formatMoney(727.5, 'GBP')).toBe('£727.50');
      expect(formatMoney(1234.5, 'GBP')).toBe('£1,234.50');
      expect(formatMoney(10, 'EUR')).toBe('€10.00');
    });

    it('should fall back to a plain amount for an invalid code', () => {
      expect(formatMoney(10, 'ZZ')).toBe('10.00 ZZ');
    });
  });
});
