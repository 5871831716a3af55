import { describe, it, expect } from 'vitest';
import {
  validateAddress,
  validateTransactionHash,
  validateBlockTag,
  validateLimit,
  validateSort,
  validateCoinCurrency,
  validateNetwork,
  blockTagToString,
} from './params';
import { QueryError, QueryErrorKind } from '../errors';

const CHECKSUMMED = '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed';

function kindOf(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    if (error instanceof QueryError) return error.kind;
    throw error;
  }
  throw new Error('expected a QueryError');
}

describe('validateAddress', () => {
  it('returns the checksummed form for any letter case', () => {
    expect(validateAddress(CHECKSUMMED.toLowerCase())).toBe(CHECKSUMMED);
    expect(validateAddress(`0x${CHECKSUMMED.slice(2).toUpperCase()}`)).toBe(CHECKSUMMED);
    expect(validateAddress(CHECKSUMMED)).toBe(CHECKSUMMED);
  });

  it('is idempotent', () => {
    const once = validateAddress('0xfb6916095ca1df60bb79ce92ce3ea74c37c5d359');
    expect(validateAddress(once)).toBe(once);
    expect(once).toBe('0xfB6916095ca1df60bB79Ce92cE3Ea74c37c5d359');
  });

  it('rejects wrong length, prefix or alphabet', () => {
    const bad = [
      '',
      '0x',
      CHECKSUMMED.slice(0, 41),
      `${CHECKSUMMED}0`,
      `0X${CHECKSUMMED.slice(2)}`,
      `1x${CHECKSUMMED.slice(2)}`,
      CHECKSUMMED.slice(2),
      `0x${'g'.repeat(40)}`,
      ` ${CHECKSUMMED}`,
    ];
    for (const value of bad) {
      expect(kindOf(() => validateAddress(value))).toBe(QueryErrorKind.INVALID_FORMAT);
    }
  });
});

describe('validateTransactionHash', () => {
  it('lowercases a valid hash', () => {
    const hash = `0x${'AB'.repeat(32)}`;
    expect(validateTransactionHash(hash)).toBe(`0x${'ab'.repeat(32)}`);
  });

  it('rejects hashes of the wrong length', () => {
    expect(kindOf(() => validateTransactionHash(`0x${'a'.repeat(63)}`))).toBe(QueryErrorKind.INVALID_FORMAT);
    expect(kindOf(() => validateTransactionHash(CHECKSUMMED))).toBe(QueryErrorKind.INVALID_FORMAT);
  });
});

describe('validateBlockTag', () => {
  it('accepts symbolic tags in any case', () => {
    expect(validateBlockTag('latest')).toEqual({ kind: 'tag', tag: 'latest' });
    expect(validateBlockTag('PENDING')).toEqual({ kind: 'tag', tag: 'pending' });
    expect(validateBlockTag('finalized')).toEqual({ kind: 'tag', tag: 'finalized' });
  });

  it('accepts decimal and hex block numbers', () => {
    expect(validateBlockTag('0')).toEqual({ kind: 'number', number: 0n });
    expect(validateBlockTag('19000000')).toEqual({ kind: 'number', number: 19_000_000n });
    expect(validateBlockTag('0x10')).toEqual({ kind: 'number', number: 16n });
  });

  it('rejects negative, fractional and unknown values', () => {
    for (const value of ['-1', '1.5', 'newest', '', '0x', 'latest1']) {
      expect(kindOf(() => validateBlockTag(value))).toBe(QueryErrorKind.INVALID_FORMAT);
    }
  });

  it('renders back to text', () => {
    expect(blockTagToString(validateBlockTag('safe'))).toBe('safe');
    expect(blockTagToString(validateBlockTag('0xff'))).toBe('255');
  });
});

describe('validateLimit', () => {
  it('returns limits within bounds unchanged', () => {
    expect(validateLimit(1)).toBe(1);
    expect(validateLimit(10)).toBe(10);
    expect(validateLimit(100)).toBe(100);
    expect(validateLimit('25')).toBe(25);
  });

  it('rejects zero and negative limits as out of range', () => {
    for (const value of [0, -1, -100, '0', '-3']) {
      expect(kindOf(() => validateLimit(value))).toBe(QueryErrorKind.OUT_OF_RANGE);
    }
  });

  it('rejects limits above the configured bound', () => {
    expect(kindOf(() => validateLimit(101))).toBe(QueryErrorKind.OUT_OF_RANGE);
    expect(kindOf(() => validateLimit(6, 5))).toBe(QueryErrorKind.OUT_OF_RANGE);
    expect(validateLimit(5, 5)).toBe(5);
  });

  it('rejects non-integers', () => {
    expect(kindOf(() => validateLimit('ten'))).toBe(QueryErrorKind.INVALID_FORMAT);
    expect(kindOf(() => validateLimit('2.5'))).toBe(QueryErrorKind.INVALID_FORMAT);
    expect(kindOf(() => validateLimit(2.5))).toBe(QueryErrorKind.INVALID_FORMAT);
    expect(kindOf(() => validateLimit(Number.NaN))).toBe(QueryErrorKind.INVALID_FORMAT);
  });
});

describe('validateSort', () => {
  it('accepts short and long forms', () => {
    expect(validateSort('asc')).toBe('asc');
    expect(validateSort('Ascending')).toBe('asc');
    expect(validateSort('DESC')).toBe('desc');
    expect(validateSort('descending')).toBe('desc');
  });

  it('rejects anything else', () => {
    expect(kindOf(() => validateSort('newest'))).toBe(QueryErrorKind.INVALID_VALUE);
  });
});

describe('validateCoinCurrency', () => {
  it('accepts coin ids and currency codes in any case', () => {
    expect(validateCoinCurrency('Ethereum', 'USD')).toEqual({ coin: 'ethereum', currency: 'usd' });
  });

  it('maps a ticker symbol to the coin id', () => {
    expect(validateCoinCurrency('BTC', 'eur')).toEqual({ coin: 'bitcoin', currency: 'eur' });
  });

  it('rejects unknown coins and currencies', () => {
    expect(kindOf(() => validateCoinCurrency('not-a-coin', 'usd'))).toBe(QueryErrorKind.UNKNOWN_SYMBOL);
    expect(kindOf(() => validateCoinCurrency('ethereum', 'zzz'))).toBe(QueryErrorKind.UNKNOWN_SYMBOL);
  });
});

describe('validateNetwork', () => {
  it('accepts known networks', () => {
    expect(validateNetwork('Sepolia')).toBe('sepolia');
  });

  it('rejects unknown networks', () => {
    expect(kindOf(() => validateNetwork('goerli'))).toBe(QueryErrorKind.INVALID_VALUE);
  });
});
