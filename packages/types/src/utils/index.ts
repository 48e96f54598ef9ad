export {
  ENGINE_VERSION,
  ACCOUNT_MASK_MIN_LENGTH,
  DEFAULT_RECONCILIATION_TOLERANCE,
} from './constants.js';
export {
  isLeapYear,
  daysInMonth,
  isValidCalendarDate,
  parseUSDate,
  isValidUSDate,
  formatUSDate,
  normalizeLongDate,
  compareUSDates,
  isDateWithinRange,
  completePartialDate,
  type CalendarDate,
  type DateRange,
} from './date.js';
export {
  parseAmountCents,
  centsToAmount,
  toCents,
  formatCurrency,
  sumAmounts,
} from './money.js';
export { sanitizeText, isSanitizedText } from './text.js';
