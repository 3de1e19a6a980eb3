import chalk from 'chalk';
import { operatorSymbol } from '../core/gate-evaluator';
import type { GateResult, GateVerdict } from '../core/gate-evaluator';
import type { MetricsSummary } from '../metrics/types';

export interface ConsoleReportOptions {
  color?: boolean;
}

export const RULE = '='.repeat(60);

const METRIC_LABEL_WIDTH = 21;
const GATE_LABEL_WIDTH = 19;

export function formatValue(value: number, unit: GateResult['unit']): string {
  return unit === '%' ? `${value}%` : `${value} ${unit}`;
}

export function formatGateLine(result: GateResult): string {
  const mark = result.passed ? '✓' : '✗';
  const label = `${result.name}:`.padEnd(GATE_LABEL_WIDTH);
  const comparison = [
    formatValue(result.measured, result.unit),
    operatorSymbol(result.operator, result.passed),
    formatValue(result.threshold, result.unit)
  ].join(' ');

  return `  ${mark} ${label}${comparison} [${result.passed ? 'PASS' : 'FAIL'}]`;
}

function metricLine(label: string, value: string): string {
  return `  ${`${label}:`.padEnd(METRIC_LABEL_WIDTH)}${value}`;
}

/**
 * Render the metrics and per-gate outcome as console lines. Pure: the
 * caller decides where the lines go.
 */
export function renderConsoleReport(
  metrics: MetricsSummary,
  verdict: GateVerdict,
  options: ConsoleReportOptions = {}
): string[] {
  const paint = (passed: boolean, text: string): string => {
    if (!options.color) return text;
    return passed ? chalk.green(text) : chalk.red(text);
  };

  return [
    '',
    RULE,
    'QUALITY GATES VALIDATION',
    RULE,
    '',
    '📊 Performance Metrics:',
    metricLine('Total Samples', `${metrics.total_samples}`),
    metricLine('Error Count', `${metrics.error_count}`),
    metricLine('Error Rate', formatValue(metrics.error_rate, '%')),
    metricLine('Avg Response Time', formatValue(metrics.avg_response_time, 'ms')),
    metricLine('P95 Response Time', formatValue(metrics.p95_response_time, 'ms')),
    metricLine('P99 Response Time', formatValue(metrics.p99_response_time, 'ms')),
    metricLine('Throughput', formatValue(metrics.throughput, 'TPS')),
    '',
    '🚦 Quality Gate Results:',
    ...verdict.gates.map(gate => paint(gate.passed, formatGateLine(gate))),
    '',
    RULE,
    '',
    paint(verdict.passed, verdict.passed ? '✅ All quality gates PASSED!' : '❌ Some quality gates FAILED!'),
    RULE,
    ''
  ];
}
