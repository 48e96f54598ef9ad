import { sanitizeText, type ExtractedField } from '@ledgerline/types';
import type { AccountRegistry } from '../registry/account-registry.js';
import { absent, extractAmount, extractDate, extractField, extractText, type FieldRecognizer } from './field-extractors.js';
import { isSectionBoundary } from './transaction-sections.js';

const DATE_BODY = String.raw`(?:\d{1,2}\/\d{1,2}\/\d{2,4}|[A-Za-z]{3,9}\.?[ \t]+\d{1,2},?[ \t]+\d{4})`;
const DATE_TOKEN = `(${DATE_BODY})`;
const AMOUNT_TOKEN = String.raw`([-(]?[ \t]*\$?[ \t]*[\d,]*\d(?:\.\d+)?\)?-?)`;
const SEPARATOR = String.raw`[ \t]*:?[ \t]*`;

const STATEMENT_PATTERNS = {
  accountNumber: /\b(?:primary[ \t]+account|account[ \t]*(?:number|no\.?|#)|acct\.?[ \t]*(?:number|no\.?|#)?)[ \t]*[:#]?[ \t]*(?:\r?\n[ \t]*)?([0-9X][0-9X \t-]*[0-9X])/i,
  companyName: /^[ \t]*(?:company(?:[ \t]+name)?|account[ \t]+(?:name|holder)|business[ \t]+name|customer[ \t]+name)[ \t]*:[ \t]*(\S.*?)[ \t]*$/im,
  statementDate: new RegExp(String.raw`statement[ \t]+(?:closing[ \t]+)?date${SEPARATOR}${DATE_TOKEN}`, 'i'),
  periodLabelled: new RegExp(
    String.raw`(?:statement[ \t]+period|for[ \t]+the[ \t]+period|period)${SEPARATOR}(?:from[ \t]+)?${DATE_TOKEN}[ \t]*(?:through|thru|to|-|–)[ \t]*${DATE_TOKEN}`,
    'i'
  ),
  periodBare: new RegExp(String.raw`${DATE_TOKEN}[ \t]*(?:through|thru)[ \t]*${DATE_TOKEN}`, 'i'),
  beginningBalance: new RegExp(
    String.raw`(?:(?:beginning|opening|previous|starting)[ \t]+balance|balance[ \t]+forward)(?:[ \t]+(?:on|as[ \t]+of)[ \t]+${DATE_BODY})?${SEPARATOR}${AMOUNT_TOKEN}`,
    'i'
  ),
  endingBalance: new RegExp(
    String.raw`(?:ending|closing|new)[ \t]+balance(?:[ \t]+(?:on|as[ \t]+of)[ \t]+${DATE_BODY})?${SEPARATOR}${AMOUNT_TOKEN}`,
    'i'
  ),
  totalFees: new RegExp(
    String.raw`(?:total[ \t]+(?:service[ \t]+)?fees(?:[ \t]+charged)?|(?:service[ \t]+)?fees[ \t]+charged|total[ \t]+service[ \t]+charges?)${SEPARATOR}${AMOUNT_TOKEN}`,
    'i'
  ),
  notesHeading: /^important[ \t]+(?:notes?|information)\b[ \t]*:?[ \t]*(.*)$/i,
};

const MAX_NOTE_LINES = 20;

export interface StatementFields {
  accountNumber: ExtractedField<string>;
  companyHint: string | null;
  statementDate: ExtractedField<string>;
  periodStart: ExtractedField<string>;
  periodEnd: ExtractedField<string>;
  beginningBalance: ExtractedField<number>;
  endingBalance: ExtractedField<number>;
  /** Absent with an empty span when no fee line exists; the engine defaults that case to 0. */
  totalFees: ExtractedField<number>;
  importantNotes: string;
}

const accountSpec: FieldRecognizer<string> = {
  name: 'account_number',
  patterns: [STATEMENT_PATTERNS.accountNumber],
  parse: (token) => ({ present: true, value: token.trim(), rawSpan: token }),
};

const statementDateSpec: FieldRecognizer<string> = {
  name: 'statement_date',
  patterns: [STATEMENT_PATTERNS.statementDate],
  parse: extractDate,
};

const beginningBalanceSpec: FieldRecognizer<number> = {
  name: 'beginning_balance',
  patterns: [STATEMENT_PATTERNS.beginningBalance],
  parse: extractAmount,
};

const endingBalanceSpec: FieldRecognizer<number> = {
  name: 'ending_balance',
  patterns: [STATEMENT_PATTERNS.endingBalance],
  parse: extractAmount,
};

const totalFeesSpec: FieldRecognizer<number> = {
  name: 'total_fees',
  patterns: [STATEMENT_PATTERNS.totalFees],
  parse: extractAmount,
};

/**
 * Locates the statement period. A labelled period wins over a bare
 * "<date> through <date>" range.
 */
export function extractPeriod(text: string): { start: ExtractedField<string>; end: ExtractedField<string> } {
  for (const pattern of [STATEMENT_PATTERNS.periodLabelled, STATEMENT_PATTERNS.periodBare]) {
    const match = pattern.exec(text);
    if (match === null) continue;

    const start = extractDate(match[1] ?? '');
    const end = extractDate(match[2] ?? '');
    return {
      start: start.present ? { ...start, rawSpan: match[0].trim() } : absent(match[0].trim()),
      end: end.present ? { ...end, rawSpan: match[0].trim() } : absent(match[0].trim()),
    };
  }
  return { start: absent(), end: absent() };
}

/**
 * The labelled company line if there is one, otherwise the single registry company
 * named anywhere in the text. Null when nothing or more than one company is found.
 */
export function extractCompanyHint(text: string, registry: AccountRegistry): string | null {
  const labelled = STATEMENT_PATTERNS.companyName.exec(text);
  if (labelled?.[1] !== undefined) {
    return labelled[1];
  }

  const haystack = sanitizeText(text).toLowerCase();
  const names = new Set(
    registry
      .list()
      .map((ref) => ref.company_name)
      .filter((name) => {
        const key = sanitizeText(name).toLowerCase();
        return key !== '' && haystack.includes(key);
      })
  );
  const [only] = [...names];
  return names.size === 1 && only !== undefined ? only : null;
}

/**
 * Reads an "Important Notes" line plus the lines under it, up to the next blank line
 * or statement section.
 */
export function extractImportantNotes(text: string): string {
  const lines = text.split(/\r?\n/);
  const start = lines.findIndex((line) => STATEMENT_PATTERNS.notesHeading.test(line.trim()));
  if (start === -1) return '';

  const heading = STATEMENT_PATTERNS.notesHeading.exec(lines[start]?.trim() ?? '');
  const collected: string[] = [heading?.[1] ?? ''];

  for (const line of lines.slice(start + 1, start + 1 + MAX_NOTE_LINES)) {
    const trimmed = line.trim();
    if (trimmed === '' || isSectionBoundary(trimmed)) break;
    collected.push(trimmed);
  }

  const notes = extractText(collected.join(' '));
  return notes.present ? notes.value : '';
}

export function extractStatementFields(text: string, registry: AccountRegistry): StatementFields {
  const period = extractPeriod(text);

  return {
    accountNumber: extractField(text, accountSpec),
    companyHint: extractCompanyHint(text, registry),
    statementDate: extractField(text, statementDateSpec),
    periodStart: period.start,
    periodEnd: period.end,
    beginningBalance: extractField(text, beginningBalanceSpec),
    endingBalance: extractField(text, endingBalanceSpec),
    totalFees: extractField(text, totalFeesSpec),
    importantNotes: extractImportantNotes(text),
  };
}
