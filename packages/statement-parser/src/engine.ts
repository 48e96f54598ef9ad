/**
 * Statement engine: extraction, classification, validation and response building for
 * one document at a time.
 *
 * `process` is a pure function of its input plus the immutable registry and settings.
 * It never throws; every failure becomes an error payload.
 */

import {
  ConfigError,
  EngineSettingsSchema,
  errorMessage,
  parseUSDate,
  compareUSDates,
  silentLogger,
  type DateRange,
  type DocumentWarning,
  type EngineSettings,
  type EngineSettingsInput,
  type ExtractedField,
  type Logger,
  type StatementResponse,
} from '@ledgerline/types';
import { createClassifier, type TransactionClassifier } from '@ledgerline/categorizer';
import { AccountRegistry, defaultAccountRegistry } from './registry/account-registry.js';
import { extractStatementFields, type StatementFields } from './extractors/statement-fields.js';
import { splitTransactionRows } from './extractors/transaction-sections.js';
import { buildTransactions, type TransactionExtraction } from './extractors/transactions.js';
import { RecordValidator, normalizeSourceFilename } from './validation/record-validator.js';
import { describeReconciliation, reconcileStatement } from './validation/reconciliation.js';
import { buildErrorResponse, buildResponse } from './response/response-builder.js';

export interface StatementEngineOptions extends EngineSettingsInput {
  registry?: AccountRegistry;
  classifier?: TransactionClassifier;
  logger?: Logger;
}

export interface ProcessResult {
  response: StatementResponse;
  warnings: DocumentWarning[];
}

function yearOf(date: ExtractedField<string>): number | null {
  return date.present ? (parseUSDate(date.value)?.year ?? null) : null;
}

function periodOf(fields: StatementFields): DateRange | undefined {
  const { periodStart, periodEnd } = fields;
  if (!periodStart.present || !periodEnd.present) return undefined;
  if (compareUSDates(periodEnd.value, periodStart.value) < 0) return undefined;
  return { start: periodStart.value, end: periodEnd.value };
}

export class StatementEngine {
  readonly settings: EngineSettings;
  readonly registry: AccountRegistry;
  private readonly classifier: TransactionClassifier;
  private readonly validator: RecordValidator;
  private readonly logger: Logger;

  constructor(options: StatementEngineOptions = {}) {
    const { registry, classifier, logger, ...settings } = options;
    const parsed = EngineSettingsSchema.safeParse(settings);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue !== undefined && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new ConfigError(`Invalid engine settings: ${where}${issue?.message ?? 'unknown issue'}`, parsed.error.issues);
    }

    this.settings = parsed.data;
    this.registry = registry ?? defaultAccountRegistry;
    this.classifier = classifier ?? createClassifier();
    this.logger = logger ?? silentLogger;
    this.validator = new RecordValidator({
      registry: this.registry,
      order: this.settings.validationOrder,
      malformedRowPolicy: this.settings.malformedRowPolicy,
    });
  }

  process(rawText: string, sourceFilename: string): StatementResponse {
    return this.processWithDiagnostics(rawText, sourceFilename).response;
  }

  processWithDiagnostics(rawText: string, sourceFilename: string): ProcessResult {
    const label = normalizeSourceFilename(sourceFilename) || '<unnamed>';
    try {
      return this.run(rawText, sourceFilename, label);
    } catch (error) {
      this.logger.error(`${label}: ${errorMessage(error)}`);
      return {
        response: buildErrorResponse('PARSE_ERROR', `Statement could not be processed: ${errorMessage(error)}`),
        warnings: [],
      };
    }
  }

  private run(rawText: string, sourceFilename: string, label: string): ProcessResult {
    if (rawText.trim() === '') {
      this.logger.warn(`${label}: statement text is empty`);
      return { response: buildErrorResponse('PARSE_ERROR', 'Statement text is empty'), warnings: [] };
    }
    if (rawText.includes('\u0000')) {
      this.logger.warn(`${label}: statement text contains binary data`);
      return { response: buildErrorResponse('PARSE_ERROR', 'Statement text contains binary data'), warnings: [] };
    }

    const fields = extractStatementFields(rawText, this.registry);
    const transactions = this.extractTransactions(rawText, fields);
    this.logger.debug(
      `${label}: ${transactions.deposits.length} deposits, ${transactions.withdrawals.length} withdrawals, ${transactions.malformed.length} malformed rows`
    );

    const warnings: DocumentWarning[] = transactions.malformed.map((row) => ({
      kind: 'malformed_row',
      message: `Line ${row.lineIndex + 1}: ${row.reason}`,
      line: row.line,
    }));

    const outcome = this.validator.validate({ sourceFilename, fields, transactions });
    const response = buildResponse(outcome);

    if (outcome.ok && response.status === 'success') {
      if (fields.accountNumber.present && fields.accountNumber.value.includes('X')) {
        warnings.push({
          kind: 'account_hint',
          message: `Masked account ${fields.accountNumber.value} resolved to ${outcome.account.canonical_id} through company name "${outcome.account.company_name}"`,
        });
      }

      const reconciliation = reconcileStatement(response.data, { tolerance: this.settings.reconciliationTolerance });
      if (!reconciliation.passed) {
        warnings.push({ kind: 'reconciliation', message: describeReconciliation(reconciliation) });
      }
    }

    for (const warning of warnings) {
      this.logger.warn(`${label}: ${warning.message}`);
    }
    if (response.status === 'error') {
      this.logger.info(`${label}: ${response.error.code} ${response.error.message}`);
    }

    return { response, warnings };
  }

  private extractTransactions(rawText: string, fields: StatementFields): TransactionExtraction {
    return buildTransactions(splitTransactionRows(rawText), {
      fallbackYear: yearOf(fields.statementDate) ?? yearOf(fields.periodEnd),
      period: periodOf(fields),
      classifier: this.classifier,
    });
  }
}
