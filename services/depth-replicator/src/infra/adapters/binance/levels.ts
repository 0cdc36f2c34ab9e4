import Decimal from 'decimal.js';
import type { PriceLevel } from '@/domain/models/DepthFrame';

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

export type LevelsResult = { ok: true; levels: PriceLevel[] } | { ok: false; reason: string };

/**
 * `[priceString, quantityString, ...]` の配列を価格レベルに変換する。
 * 3番目以降の要素は無視する。
 */
export function parseLevels(value: unknown, field: string): LevelsResult {
  if (!Array.isArray(value)) {
    return { ok: false, reason: `${field} is not an array` };
  }
  const levels: PriceLevel[] = [];
  for (const entry of value) {
    if (!Array.isArray(entry) || entry.length < 2) {
      return { ok: false, reason: `${field} contains an entry that is not a [price, quantity] pair` };
    }
    const [price, qty] = entry;
    if (!isDecimalString(price) || !isDecimalString(qty)) {
      return { ok: false, reason: `${field} contains a non-decimal level ${JSON.stringify(entry)}` };
    }
    levels.push({ price: new Decimal(price), qty: new Decimal(qty) });
  }
  return { ok: true, levels };
}

function isDecimalString(value: unknown): value is string {
  return typeof value === 'string' && DECIMAL_PATTERN.test(value);
}
