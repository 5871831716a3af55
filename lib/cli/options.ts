/**
 * Option schemas, validated at the CLI boundary before anything reaches the orchestrator.
 */

import { z } from 'zod';
import { invalidFormatError, outOfRangeError } from '../errors';

/** Upper bound for --retries / ETHQ_RETRIES */
export const MAX_RETRIES = 10;

export const GlobalOptionsSchema = z.object({
  network: z.string().optional(),
  retries: z.string().optional(),
});

export const AccountSetOptionsSchema = z.object({
  address: z.string().optional(),
  nodekey: z.string().optional(),
  scankey: z.string().optional(),
});

export const AccountUnsetOptionsSchema = z.object({
  address: z.boolean().optional(),
  nodekey: z.boolean().optional(),
  scankey: z.boolean().optional(),
});

export const AccountQueryOptionsSchema = z.object({
  address: z.string().optional(),
  block: z.string().optional(),
});

export const TransactionsOptionsSchema = z.object({
  address: z.string().optional(),
  limit: z.string().optional(),
  sort: z.string().optional(),
});

export const PriceOptionsSchema = z.object({
  coin: z.string().optional(),
  currency: z.string().optional(),
});

export function parseRetries(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw invalidFormatError('retries', value, 'a whole number');
  }
  const retries = Number(trimmed);
  if (retries > MAX_RETRIES) {
    throw outOfRangeError('retries', retries, 0, MAX_RETRIES);
  }
  return retries;
}
