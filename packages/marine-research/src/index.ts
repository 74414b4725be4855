export {
  addDays,
  createMeasurement,
  dayKeyToDate,
  formatMeasurement,
  measurementsEqual,
  parseDayPrefix,
  toDayKey,
  type Measurement
} from './measurement';
export { groupByDay } from './aggregation';
export {
  EMPTY_UNEXPECTED_FINDING,
  MISSING_EXPECTED_CHECK,
  UNEXPECTED_ACTUAL_CHECK,
  findMissingExpected,
  findUnexpectedActual,
  reconcile,
  type Findings,
  type ReconcileOptions,
  type ReconciliationResult
} from './reconciliation';
export {
  DailyReportParseError,
  INGESTION_COLUMNS,
  formatStoreDate,
  parseDailyReportCsv,
  writeMeasurementsCsv
} from './csv';
export { generateDailySamples, randomInt, type RandomSource } from './samples';
export {
  createLoggingReporter,
  createMemoryReporter,
  type MemoryReporter,
  type ReporterEntry,
  type ScenarioReporter
} from './reporter';
export { LOG_LEVELS, loadMarineResearchConfig, type LogLevel, type MarineResearchConfig } from './config';
export {
  buildDailyReportIndex,
  buildDailyReportQuery,
  buildScenarioNames,
  type ScenarioNames
} from './dailyReportIndex';
export {
  FAILURE_MESSAGE,
  SUCCESS_MESSAGE,
  runMarineResearchScenario,
  type DocumentStoreApi,
  type MarineResearchDependencies,
  type MarineResearchOutcome,
  type MarineResearchSettings
} from './scenario';
