import type { ThresholdKey, ThresholdSet } from '../config/types';
import type { MetricsSummary } from '../metrics/types';

export type GateOperator = 'lte' | 'gte';

export type GateId =
  | 'error_rate'
  | 'avg_response_time'
  | 'p95_response_time'
  | 'p99_response_time'
  | 'throughput';

export interface GateResult {
  gate: GateId;
  name: string;
  measured: number;
  threshold: number;
  operator: GateOperator;
  unit: '%' | 'ms' | 'TPS';
  passed: boolean;
}

export interface GateVerdict {
  passed: boolean;
  gates: GateResult[];
}

interface GateDefinition {
  gate: GateId;
  name: string;
  metric: keyof MetricsSummary;
  threshold: ThresholdKey;
  operator: GateOperator;
  unit: GateResult['unit'];
}

// Evaluation and report order
export const GATES: readonly GateDefinition[] = [
  { gate: 'error_rate', name: 'Error Rate', metric: 'error_rate', threshold: 'error_rate_threshold', operator: 'lte', unit: '%' },
  { gate: 'avg_response_time', name: 'Avg Response Time', metric: 'avg_response_time', threshold: 'avg_response_threshold', operator: 'lte', unit: 'ms' },
  { gate: 'p95_response_time', name: 'P95 Response Time', metric: 'p95_response_time', threshold: 'p95_threshold', operator: 'lte', unit: 'ms' },
  { gate: 'p99_response_time', name: 'P99 Response Time', metric: 'p99_response_time', threshold: 'p99_threshold', operator: 'lte', unit: 'ms' },
  { gate: 'throughput', name: 'Throughput', metric: 'throughput', threshold: 'throughput_threshold', operator: 'gte', unit: 'TPS' }
];

/**
 * Compare every metric against its threshold. All gates are always
 * evaluated so the report lists each one.
 */
export function evaluateGates(metrics: MetricsSummary, thresholds: ThresholdSet): GateVerdict {
  const gates = GATES.map((definition): GateResult => {
    const measured = metrics[definition.metric];
    const threshold = thresholds[definition.threshold];

    return {
      gate: definition.gate,
      name: definition.name,
      measured,
      threshold,
      operator: definition.operator,
      unit: definition.unit,
      passed: compareValues(measured, threshold, definition.operator)
    };
  });

  return {
    passed: gates.every(gate => gate.passed),
    gates
  };
}

/**
 * Boundaries are inclusive in both directions.
 */
export function compareValues(actual: number, expected: number, operator: GateOperator): boolean {
  switch (operator) {
    case 'lte': return actual <= expected;
    case 'gte': return actual >= expected;
  }
}

/**
 * Symbol describing the outcome: the operator itself when the gate
 * passed, its negation when it failed.
 */
export function operatorSymbol(operator: GateOperator, passed: boolean): string {
  const symbols: Record<GateOperator, [string, string]> = {
    lte: ['<=', '>'],
    gte: ['>=', '<']
  };
  const [pass, fail] = symbols[operator];
  return passed ? pass : fail;
}
