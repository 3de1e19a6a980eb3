export interface ThresholdSet {
  readonly error_rate_threshold: number;   // max error rate, percent
  readonly avg_response_threshold: number; // max average latency, ms
  readonly p95_threshold: number;          // max p95 latency, ms
  readonly p99_threshold: number;          // max p99 latency, ms
  readonly throughput_threshold: number;   // min throughput, TPS
}

export type ThresholdKey = keyof ThresholdSet;

export type ThresholdOverrides = { [K in ThresholdKey]?: number };

export const THRESHOLD_KEYS: readonly ThresholdKey[] = [
  'error_rate_threshold',
  'avg_response_threshold',
  'p95_threshold',
  'p99_threshold',
  'throughput_threshold'
];

export const DEFAULT_THRESHOLDS: ThresholdSet = Object.freeze({
  error_rate_threshold: 2.0,
  avg_response_threshold: 500,
  p95_threshold: 800,
  p99_threshold: 1200,
  throughput_threshold: 10.0
});

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function isThresholdKey(key: string): key is ThresholdKey {
  return (THRESHOLD_KEYS as readonly string[]).includes(key);
}
