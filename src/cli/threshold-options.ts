import type { Command } from 'commander';
import { resolveThresholds, ThresholdConfigParser } from '../config/parser';
import { DEFAULT_THRESHOLDS } from '../config/types';
import type { ThresholdOverrides, ThresholdSet } from '../config/types';
import { ThresholdValidator } from '../config/validator';
import { ConfigError } from '../core/errors';
import { logger } from '../utils/logger';

export interface ThresholdCliOptions {
  errorRateThreshold?: string;
  avgResponseThreshold?: string;
  p95Threshold?: string;
  p99Threshold?: string;
  throughputThreshold?: string;
  config?: string;
  env?: string;
}

export function addThresholdOptions(command: Command): Command {
  return command
    .option('--error-rate-threshold <percent>', `Maximum acceptable error rate percentage (default: ${DEFAULT_THRESHOLDS.error_rate_threshold}%)`)
    .option('--avg-response-threshold <ms>', `Maximum acceptable average response time in ms (default: ${DEFAULT_THRESHOLDS.avg_response_threshold}ms)`)
    .option('--p95-threshold <ms>', `Maximum acceptable p95 response time in ms (default: ${DEFAULT_THRESHOLDS.p95_threshold}ms)`)
    .option('--p99-threshold <ms>', `Maximum acceptable p99 response time in ms (default: ${DEFAULT_THRESHOLDS.p99_threshold}ms)`)
    .option('--throughput-threshold <tps>', `Minimum acceptable throughput in TPS (default: ${DEFAULT_THRESHOLDS.throughput_threshold})`)
    .option('-c, --config <file>', 'Threshold configuration file (YAML or JSON)')
    .option('-e, --env <environment>', 'Environment overrides to apply on top of --config');
}

/**
 * Defaults, then the config file (with environment overrides), then
 * flags given on the command line.
 */
export function resolveCliThresholds(options: ThresholdCliOptions): ThresholdSet {
  let fromFile: ThresholdOverrides = {};
  if (options.config) {
    fromFile = new ThresholdConfigParser().parse(options.config, options.env);
  } else if (options.env) {
    throw new ConfigError(['--env requires --config']);
  }

  const result = new ThresholdValidator().validate(
    {
      error_rate_threshold: options.errorRateThreshold,
      avg_response_threshold: options.avgResponseThreshold,
      p95_threshold: options.p95Threshold,
      p99_threshold: options.p99Threshold,
      throughput_threshold: options.throughputThreshold
    },
    'command-line options'
  );

  if (!result.valid) {
    throw new ConfigError(result.errors);
  }

  const thresholds = resolveThresholds(fromFile, result.thresholds);
  logger.debug('Effective thresholds:', thresholds);
  return thresholds;
}
