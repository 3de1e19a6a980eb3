import * as fs from 'fs';
import * as path from 'path';
import type { ThresholdSet } from '../config/types';
import type { GateResult, GateVerdict } from '../core/gate-evaluator';
import type { MetricsSummary } from '../metrics/types';

export interface JsonReport {
  source: string;
  generated_at: string;
  passed: boolean;
  metrics: MetricsSummary;
  thresholds: ThresholdSet;
  gates: GateResult[];
}

export interface JsonReportInput {
  source: string;
  metrics: MetricsSummary;
  verdict: GateVerdict;
  thresholds: ThresholdSet;
  generatedAt?: Date;
}

export function buildJsonReport(input: JsonReportInput): JsonReport {
  return {
    source: input.source,
    generated_at: (input.generatedAt || new Date()).toISOString(),
    passed: input.verdict.passed,
    metrics: input.metrics,
    thresholds: input.thresholds,
    gates: input.verdict.gates
  };
}

export function writeJsonReport(outputPath: string, report: JsonReport): string {
  const resolved = path.resolve(outputPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, JSON.stringify(report, null, 2) + '\n', 'utf8');
  return resolved;
}
