/**
 * CurrencyService
 * Currency resolution, symbols and per-currency pricing lookup
 */

import type { CurrencyConfig } from '@/lib/config.js';
import type { PlanPricing } from '@/types/index.js';
import { ValidationError } from '@/types/index.js';

const CURRENCY_CODE_PATTERN = /^[A-Z]{3}$/;

export interface ResolvedPrice {
  currency: string;
  amount: number;
  /** False when the requested currency had no price and a fallback was used */
  exact: boolean;
}

export interface CurrencyService {
  getDefaultCurrency(): string;
  getSupportedCurrencies(): string[];
  isSupported(code: string): boolean;
  normalize(code: string): string;
  resolveCurrency(code?: string | null): string;
  getSymbol(code: string): string;
  formatPrice(amount: number, code?: string | null): string;
  getPrice(pricing: PlanPricing, currency?: string | null): ResolvedPrice;
  validateConfiguration(): string[];
}

function formatAmount(amount: number): string {
  const [whole = '0', fraction = '00'] = Math.abs(amount).toFixed(2).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return `${amount < 0 ? '-' : ''}${grouped}.${fraction}`;
}

export function createCurrencyService(config: CurrencyConfig): CurrencyService {
  const defaultCurrency = config.default.toUpperCase();
  const supported = config.supported.map((code) => code.toUpperCase());

  const service: CurrencyService = {
    getDefaultCurrency() {
      return defaultCurrency;
    },

    getSupportedCurrencies() {
      return [...supported];
    },

    isSupported(code) {
      return supported.includes(code.trim().toUpperCase());
    },

    normalize(code) {
      return code.trim().toUpperCase();
    },

    /**
     * Missing input means the default currency. An unsupported code
     * falls back to the default when allowed, otherwise it is rejected.
     */
    resolveCurrency(code) {
      if (code === undefined || code === null || code.trim() === '') {
        return defaultCurrency;
      }
      const normalized = service.normalize(code);
      if (supported.includes(normalized)) {
        return normalized;
      }
      if (config.fallbackToDefault) {
        return defaultCurrency;
      }
      throw new ValidationError(`Currency ${normalized} is not supported`, {
        currency: normalized,
        supported,
      });
    },

    getSymbol(code) {
      const normalized = service.normalize(code);
      return config.symbols[normalized] ?? normalized;
    },

    formatPrice(amount, code) {
      const currency = service.resolveCurrency(code);
      return `${service.getSymbol(currency)}${formatAmount(amount)}`;
    },

    /**
     * Requested currency, then the default currency, then the base price
     */
    getPrice(pricing, currency) {
      const wanted = service.resolveCurrency(currency);
      const exact = pricing.prices.find((p) => p.currency.toUpperCase() === wanted);
      if (exact !== undefined) {
        return { currency: wanted, amount: exact.amount, exact: true };
      }

      const fallback = pricing.prices.find(
        (p) => p.currency.toUpperCase() === defaultCurrency
      );
      return {
        currency: defaultCurrency,
        amount: fallback?.amount ?? pricing.price,
        exact: wanted === defaultCurrency,
      };
    },

    validateConfiguration() {
      const errors: string[] = [];
      if (!CURRENCY_CODE_PATTERN.test(defaultCurrency)) {
        errors.push(`Default currency ${defaultCurrency} is not a 3-letter code`);
      }
      if (!supported.includes(defaultCurrency)) {
        errors.push(`Default currency ${defaultCurrency} is not in the supported list`);
      }
      for (const code of supported) {
        if (!CURRENCY_CODE_PATTERN.test(code)) {
          errors.push(`Supported currency ${code} is not a 3-letter code`);
        }
        if (config.symbols[code] === undefined) {
          errors.push(`No symbol configured for ${code}`);
        }
      }
      return errors;
    },
  };

  return service;
}
