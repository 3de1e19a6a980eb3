import { evaluateGates } from '../../core/gate-evaluator';
import { ConfigError, isQualityGateError } from '../../core/errors';
import { readJtlFile } from '../../core/jtl-reader';
import { aggregateMetrics } from '../../metrics/aggregator';
import { renderConsoleReport } from '../../reporting/console-report';
import { buildJsonReport, writeJsonReport } from '../../reporting/json-report';
import { logger, LogLevel } from '../../utils/logger';
import { EXIT_CODES } from '../exit-codes';
import type { ExitCode } from '../exit-codes';
import { resolveCliThresholds } from '../threshold-options';
import type { ThresholdCliOptions } from '../threshold-options';

export interface CheckOptions extends ThresholdCliOptions {
  delimiter?: string;
  format?: string;
  output?: string;
  verbose?: boolean;
  color?: boolean;
}

const FORMATS = ['console', 'json'];

/**
 * Read the JTL file, evaluate the gates and print the report.
 * Returns the process exit code instead of exiting.
 *
 * With `--format json` progress logging moves to stderr so stdout holds
 * only the JSON document.
 */
export function executeCheck(
  jtlFile: string,
  options: CheckOptions,
  write: (line: string) => void = line => console.log(line)
): ExitCode {
  const format = options.format || 'console';
  const previousLevel = logger.getLevel();
  const previousOutput = logger.getOutput();

  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.setOutput(format === 'json' ? 'stderr' : 'stdout');

  try {
    if (!FORMATS.includes(format)) {
      throw new ConfigError([`Invalid format: ${format}. Valid formats: ${FORMATS.join(', ')}`]);
    }

    logger.info('🔍 Starting Quality Gates Validation...');
    logger.info(`JTL File: ${jtlFile}`);

    const thresholds = resolveCliThresholds(options);
    const samples = readJtlFile(jtlFile, { delimiter: options.delimiter });
    const metrics = aggregateMetrics(samples);
    const verdict = evaluateGates(metrics, thresholds);

    const report = buildJsonReport({ source: jtlFile, metrics, verdict, thresholds });

    if (format === 'json') {
      write(JSON.stringify(report, null, 2));
    } else {
      renderConsoleReport(metrics, verdict, { color: options.color }).forEach(line => write(line));
    }

    if (options.output) {
      const written = writeJsonReport(options.output, report);
      logger.success(`📄 JSON report written to ${written}`);
    }

    return verdict.passed ? EXIT_CODES.PASSED : EXIT_CODES.FAILED;
  } catch (error) {
    if (isQualityGateError(error)) {
      logger.error(`❌ ${error.message}`);
    } else {
      logger.error(`❌ Quality gate check failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    return EXIT_CODES.ERROR;
  } finally {
    logger.setLevel(previousLevel);
    logger.setOutput(previousOutput);
  }
}

export function checkCommand(jtlFile: string, options: CheckOptions): void {
  process.exit(executeCheck(jtlFile, { ...options, color: true }));
}
