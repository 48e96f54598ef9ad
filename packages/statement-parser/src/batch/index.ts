export {
  scanStatementInputs,
  describeSkip,
  type StatementInput,
  type SkippedEntry,
  type SkipReason,
  type InputScan,
} from './input-scanner.js';
export {
  processBatch,
  outputNameFor,
  type ProcessError,
  type BatchFileResult,
  type BatchProcessResult,
  type BatchProcessOptions,
} from './batch-processor.js';
export {
  FilenameMapSchema,
  parseFilenameMap,
  loadFilenameMap,
  sourceFilenameFor,
  type FilenameMap,
} from './filename-map.js';
