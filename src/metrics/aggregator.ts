import { DataFormatError } from '../core/errors';
import { mean, nearestRankPercentile, roundTo } from './statistics';
import { EMPTY_SUMMARY } from './types';
import type { MetricsSummary, SampleRecord } from './types';

// Window used when all samples share a timestamp or none carry one
const FALLBACK_DURATION_SECONDS = 1;

/**
 * Derive the gate metrics from a materialized set of samples.
 * Input order does not matter; the input is never mutated.
 */
export function aggregateMetrics(samples: readonly SampleRecord[]): MetricsSummary {
  if (samples.length === 0) {
    return EMPTY_SUMMARY;
  }

  let errorCount = 0;
  let minTimestamp = Infinity;
  let maxTimestamp = -Infinity;
  const responseTimes: number[] = [];

  samples.forEach((sample, index) => {
    assertSample(sample, index);

    if (!sample.success) {
      errorCount++;
    }
    responseTimes.push(sample.elapsed);

    // Samples without a timestamp count towards throughput but not the window
    if (sample.timestamp !== undefined) {
      minTimestamp = Math.min(minTimestamp, sample.timestamp);
      maxTimestamp = Math.max(maxTimestamp, sample.timestamp);
    }
  });

  responseTimes.sort((a, b) => a - b);

  const totalSamples = samples.length;
  const spanSeconds = maxTimestamp >= minTimestamp ? (maxTimestamp - minTimestamp) / 1000 : 0;
  const durationSeconds = spanSeconds > 0 ? spanSeconds : FALLBACK_DURATION_SECONDS;

  return Object.freeze({
    total_samples: totalSamples,
    error_count: errorCount,
    error_rate: roundTo((errorCount / totalSamples) * 100, 2),
    avg_response_time: roundTo(mean(responseTimes), 2),
    p95_response_time: nearestRankPercentile(responseTimes, 0.95),
    p99_response_time: nearestRankPercentile(responseTimes, 0.99),
    throughput: roundTo(totalSamples / durationSeconds, 2)
  });
}

function assertSample(sample: SampleRecord, index: number): void {
  if (!Number.isFinite(sample.elapsed)) {
    throw new DataFormatError('elapsed', index, sample.elapsed, 'expected a number');
  }
  if (sample.elapsed < 0) {
    throw new DataFormatError('elapsed', index, sample.elapsed, 'latency cannot be negative');
  }
  if (sample.timestamp !== undefined && !Number.isFinite(sample.timestamp)) {
    throw new DataFormatError('timestamp', index, sample.timestamp, 'expected a number');
  }
  if (typeof sample.success !== 'boolean') {
    throw new DataFormatError('success', index, sample.success, 'expected true or false');
  }
}
