// src/services/BillingService.ts
import { Config } from '../types/models';

export interface BillingAmounts {
  hours: number;
  net: number;
  vat: number;
  gross: number;
}

function roundMoney(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

/**
 * Net, VAT and gross for billable hours (worked plus adjustments) at the configured rate
 */
export function calculateBilling(hours: number, config: Config): BillingAmounts {
  const net = roundMoney(hours * config.hourlyRate);
  const vat = roundMoney(net * config.vatRate);
  return { hours, net, vat, gross: roundMoney(net + vat) };
}

export function formatMoney(amount: number, currency: string): string {
  try {
    return new Intl.NumberFormat('en-GB', { style: 'currency', currency }).format(amount);
  } catch (error) {
    // Unknown ISO code: fall back to a plain amount with the code
    if (error instanceof RangeError) {
      return `${amount.toFixed(2)} ${currency}`;
    }
    throw error;
  }
}
