// src/index.ts (builds to dist/src/index.js)

export { aggregateMetrics } from './metrics/aggregator';
export { nearestRankPercentile, mean, roundTo } from './metrics/statistics';
export { EMPTY_SUMMARY } from './metrics/types';
export type { SampleRecord, MetricsSummary } from './metrics/types';

export { evaluateGates, compareValues, operatorSymbol, GATES } from './core/gate-evaluator';
export type { GateResult, GateVerdict, GateId, GateOperator } from './core/gate-evaluator';
export { readJtlFile, parseJtl } from './core/jtl-reader';
export type { JtlReadOptions } from './core/jtl-reader';
export {
  QualityGateError,
  InputNotFoundError,
  JtlReadError,
  DataFormatError,
  ConfigError,
  isQualityGateError
} from './core/errors';

export { ThresholdConfigParser, resolveThresholds } from './config/parser';
export { ThresholdValidator } from './config/validator';
export { DEFAULT_THRESHOLDS, THRESHOLD_KEYS } from './config/types';
export type { ThresholdSet, ThresholdOverrides, ThresholdKey } from './config/types';

export { renderConsoleReport, formatGateLine } from './reporting/console-report';
export { buildJsonReport, writeJsonReport } from './reporting/json-report';
export type { JsonReport } from './reporting/json-report';
