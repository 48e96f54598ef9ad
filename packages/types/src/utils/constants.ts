export const ENGINE_VERSION = '0.3.0';

/** Shortest run of literal `X` characters treated as an account mask. */
export const ACCOUNT_MASK_MIN_LENGTH = 4;

export const DEFAULT_RECONCILIATION_TOLERANCE = 0.01;
