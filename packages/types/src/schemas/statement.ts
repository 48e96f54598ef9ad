import { z } from 'zod';
import { TAX_CATEGORIES, ERROR_CODES } from '../types/output.js';
import { isValidUSDate, compareUSDates } from '../utils/date.js';
import { isSanitizedText } from '../utils/text.js';
import { DEFAULT_RECONCILIATION_TOLERANCE } from '../utils/constants.js';

export const USDateSchema = z
  .string()
  .refine(isValidUSDate, 'Date must be a real calendar date in MM/DD/YYYY format');

export const SanitizedTextSchema = z
  .string()
  .refine(isSanitizedText, 'Only letters, digits and whitespace are allowed');

export const AmountSchema = z
  .number()
  .nonnegative()
  .refine((value) => Math.abs(value * 100 - Math.round(value * 100)) < 1e-6, 'Amount must have at most two decimals');

export const TaxCategorySchema = z.enum(TAX_CATEGORIES);
export const StatementErrorCodeSchema = z.enum(ERROR_CODES);

export const AccountReferenceSchema = z.object({
  canonical_id: z.string().regex(/^\d+$/, 'canonical_id must contain digits only'),
  company_name: z.string().min(1),
  bank_name: z.string().min(1),
  digit_length: z.number().int().positive(),
});

export const AccountRegistryFileSchema = z.object({
  accounts: z.array(AccountReferenceSchema).min(1),
});
export type AccountRegistryFile = z.infer<typeof AccountRegistryFileSchema>;

export const DepositSchema = z.object({
  date: USDateSchema,
  description: z.string().min(1).refine(isSanitizedText, 'Only letters, digits and whitespace are allowed'),
  amount: AmountSchema,
});

export const WithdrawalSchema = DepositSchema.extend({
  tax_category: TaxCategorySchema,
});

export const StatementRecordSchema = z
  .object({
    statement_filename: z.string().regex(/^[^/\\]+\.pdf$/, 'Filename must be a bare *.pdf name'),
    account_number: z.string().regex(/^\d+$/),
    statement_date: USDateSchema,
    period_start: USDateSchema,
    period_end: USDateSchema,
    beginning_balance: AmountSchema,
    ending_balance: AmountSchema,
    total_fees: AmountSchema,
    important_notes: SanitizedTextSchema,
    deposits: z.array(DepositSchema),
    withdrawals: z.array(WithdrawalSchema),
  })
  .strict()
  .superRefine((record, ctx) => {
    if (!isValidUSDate(record.period_start) || !isValidUSDate(record.period_end) || !isValidUSDate(record.statement_date)) {
      return;
    }
    if (compareUSDates(record.period_end, record.period_start) < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['period_end'], message: 'period_end is before period_start' });
    }
    if (
      compareUSDates(record.statement_date, record.period_start) < 0 ||
      compareUSDates(record.statement_date, record.period_end) > 0
    ) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['statement_date'], message: 'statement_date is outside the statement period' });
    }
  });

export const ErrorRecordSchema = z
  .object({
    code: StatementErrorCodeSchema,
    message: z.string().min(1),
  })
  .strict();

export const StatementResponseSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('success'), data: StatementRecordSchema }).strict(),
  z.object({ status: z.literal('error'), error: ErrorRecordSchema }).strict(),
]);

export const MalformedRowPolicySchema = z.enum(['skip', 'reject']);

export const DEFAULT_VALIDATION_ORDER = [
  'INVALID_ACCOUNT',
  'MISSING_STATEMENT_DATE',
  'MISSING_BALANCE',
  'MISSING_PERIOD_DATES',
  'PARSE_ERROR',
] as const satisfies readonly (typeof ERROR_CODES)[number][];

export const ValidationOrderSchema = z
  .array(StatementErrorCodeSchema)
  .length(ERROR_CODES.length)
  .refine((codes) => new Set(codes).size === codes.length, 'Each error code must appear exactly once');

export const EngineSettingsSchema = z.object({
  malformedRowPolicy: MalformedRowPolicySchema.default('skip'),
  validationOrder: ValidationOrderSchema.default([...DEFAULT_VALIDATION_ORDER]),
  reconciliationTolerance: z.number().nonnegative().default(DEFAULT_RECONCILIATION_TOLERANCE),
});
export type EngineSettingsInput = z.input<typeof EngineSettingsSchema>;
export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
