/**
 * One request sample as read from a JTL log.
 */
export interface SampleRecord {
  readonly timestamp?: number; // sample start, ms since epoch; absent when the log has none
  readonly elapsed: number;   // latency in ms
  readonly success: boolean;
}

export interface MetricsSummary {
  readonly total_samples: number;
  readonly error_count: number;
  readonly error_rate: number;        // percent
  readonly avg_response_time: number; // ms
  readonly p95_response_time: number; // ms
  readonly p99_response_time: number; // ms
  readonly throughput: number;        // samples per second
}

export const EMPTY_SUMMARY: MetricsSummary = Object.freeze({
  total_samples: 0,
  error_count: 0,
  error_rate: 0,
  avg_response_time: 0,
  p95_response_time: 0,
  p99_response_time: 0,
  throughput: 0
});
