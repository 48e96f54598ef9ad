import type { AccountReference } from '@ledgerline/types';

/**
 * Accounts the engine accepts out of the box. Chase statements print the full
 * zero-padded identifier; the Valley Bank account is the shorter one.
 */
export const DEFAULT_ACCOUNT_REFERENCES: readonly AccountReference[] = [
  { canonical_id: '000000228239080', company_name: 'Brightline Analytics Inc', bank_name: 'JPMorgan Chase Bank', digit_length: 12 },
  { canonical_id: '000000954291944', company_name: 'IT DevOps LLC', bank_name: 'JPMorgan Chase Bank', digit_length: 12 },
  { canonical_id: '000000333721212', company_name: 'Cedar Grove Consulting Group', bank_name: 'JPMorgan Chase Bank', digit_length: 12 },
  { canonical_id: '00085695149', company_name: 'Harbor Point Holdings LLC', bank_name: 'Valley Bank', digit_length: 11 },
  { canonical_id: '000000880865188', company_name: 'Northgate Media Studio', bank_name: 'JPMorgan Chase Bank', digit_length: 12 },
];
