// Core logic
export { parseObligationAmount } from './core/amount.js';
export { resolveDistrict, AT_LARGE_STATES } from './core/district.js';
export { classifyRecipient, type ClassifyRecipientInput } from './core/classifier.js';
export { parseRecordLine } from './core/record.js';
export { openScope, foldRecord, closeScope, CATEGORY_ORDER } from './core/scope.js';
export {
  formatCurrency,
  formatRawDump,
  formatStateSummaries,
  formatScopeTotals,
} from './core/summary.js';
export {
  currentFiscalYear,
  fiscalYearWindow,
  recentFiscalYears,
  parseFiscalYears,
} from './core/fiscal-year.js';
export { createDescriptionNormalizer, toSentenceCase } from './core/description-normalizer.js';
export { selectStates } from './core/states.js';

// Use cases
export {
  processStateBatch,
  INVALID_ENTRY_MARKER,
  type ProcessStateBatchInput,
} from './core/usecases/process-state-batch.js';
export {
  runFiscalYears,
  type RunFiscalYearsDeps,
  type RunFiscalYearsInput,
} from './core/usecases/run-fiscal-years.js';

// Adapters
export {
  makeHttpExportProvider,
  buildExportForm,
  type HttpExportProviderOptions,
} from './shell/provider/http-export-provider.js';
export { makeFsOutputWriter, type FsOutputWriterOptions } from './shell/writer/fs-output-writer.js';
export { loadStates } from './shell/reference/state-registry.js';
export { loadAcronyms } from './shell/reference/acronym-reference.js';

// Ports
export type { ExportProvider, OutputWriter } from './core/ports.js';

// Types
export { Category, ALL_RECIPIENTS } from './core/types.js';
export type {
  AcronymEntry,
  AggregationScope,
  BatchOutcome,
  ClassifiedRecord,
  DescriptionNormalizer,
  ExportRequest,
  FiscalYearReport,
  FiscalYearWindow,
  ParseErrorPolicy,
  RunReport,
  ScopeKind,
  ScopeSummary,
  StateRef,
  StateSummaryRow,
  TallySummary,
} from './core/types.js';

// Errors
export type {
  ParseError,
  ProviderError,
  WriteError,
  RunError,
  ReferenceDataError,
  ContractStatsError,
} from './core/errors.js';
