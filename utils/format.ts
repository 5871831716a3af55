import Decimal from 'decimal.js';
import type { Balance } from '../lib/query/types';

// uint256 has 78 decimal digits; keep every one of them
Decimal.set({ precision: 80, rounding: Decimal.ROUND_DOWN });

/**
 * Strip trailing zeros from decimal string while preserving at least the integer part.
 * "123.450000" → "123.45"
 * "123.000000" → "123"
 */
function stripTrailingZeros(str: string): string {
  if (!str.includes('.')) return str;
  return str.replace(/\.?0+$/, '');
}

/**
 * Convert token amount (raw units) to human-readable decimal string using token decimals.
 * Exact: every fractional digit the decimals allow is kept, then trailing zeros are dropped.
 */
export function tokenAmountToHuman(amount: bigint | string, decimals: number): string {
  const value = new Decimal(amount.toString());
  const divisor = new Decimal(10).pow(decimals);
  return stripTrailingZeros(value.div(divisor).toFixed(decimals));
}

/** Display form of a balance, e.g. "1.5 ETH". Always derived from the wei amount. */
export function formatBalance(balance: Balance): string {
  return `${tokenAmountToHuman(balance.wei, balance.decimals)} ${balance.symbol}`;
}

export function formatWalletAddress(address: string | null, startLength = 6, endLength = 4): string {
  if (!address) return 'Not set';
  if (address.length <= startLength + endLength) return address;
  return `${address.slice(0, startLength)}...${address.slice(-endLength)}`;
}

/**
 * Group the integer part of a decimal string with commas: "2400.5" → "2,400.5".
 */
export function formatFiatAmount(amount: string): string {
  const [integer, fraction] = amount.split('.');
  const grouped = integer.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return fraction === undefined ? grouped : `${grouped}.${fraction}`;
}

// Subscript digits for crypto price formatting
const SUBSCRIPT_DIGITS = ['₀', '₁', '₂', '₃', '₄', '₅', '₆', '₇', '₈', '₉'];

function toSubscript(num: number): string {
  return num.toString().split('').map(d => SUBSCRIPT_DIGITS[parseInt(d)]).join('');
}

/**
 * Format price in crypto-standard notation
 * - Normal: 0.01303, 0.0005720
 * - Collapsed zeros: 0.0₄7466 (means 0.00007466, subscript shows zero count)
 *
 * @param price - The price to format
 * @param options - Optional configuration
 * @param options.minZerosToCollapse - Minimum leading zeros to trigger collapse (default: 4)
 * @param options.significantDigits - Number of significant digits to show (default: 4)
 */
export function formatCryptoPrice(
  price: number,
  options?: { minZerosToCollapse?: number; significantDigits?: number }
): string {
  const { minZerosToCollapse = 4, significantDigits = 4 } = options || {};

  if (price === 0) return '0';
  if (price >= 1) return price.toFixed(4);
  if (price >= 0.001) return price.toFixed(6);

  // For very small numbers, count leading zeros after decimal
  const str = price.toFixed(18);
  const match = str.match(/^0\.(0*)([1-9]\d*)/);

  if (!match) return price.toFixed(6);

  const leadingZeros = match[1].length;
  const sigDigits = match[2].slice(0, significantDigits);

  if (leadingZeros >= minZerosToCollapse) {
    return `0.0${toSubscript(leadingZeros)}${sigDigits}`;
  }

  return price.toFixed(leadingZeros + significantDigits);
}
