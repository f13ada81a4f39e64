import bankNames from './bank-names.json';
import type { BankNameLookup } from '../matching';

/**
 * Bank code / spelling variant → canonical bank name
 */
export const BANK_NAMES: Readonly<Record<string, string>> = bankNames;

/**
 * Build a lookup over a bank name table. Keys are compared upper-cased and
 * unknown codes are returned unchanged.
 */
export const createBankNameLookup = (
  table: Readonly<Record<string, string>>
): BankNameLookup => {
  const normalized = new Map(
    Object.entries(table).map(([code, name]) => [code.trim().toUpperCase(), name])
  );

  return (codeOrName) => normalized.get(codeOrName.trim().toUpperCase()) ?? codeOrName;
};

export const bankNameLookup: BankNameLookup = createBankNameLookup(BANK_NAMES);
