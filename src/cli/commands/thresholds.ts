import { logger } from '../../utils/logger';
import { EXIT_CODES } from '../exit-codes';
import type { ExitCode } from '../exit-codes';
import { resolveCliThresholds } from '../threshold-options';
import type { ThresholdCliOptions } from '../threshold-options';

export function executeThresholds(
  options: ThresholdCliOptions,
  write: (line: string) => void = line => console.log(line)
): ExitCode {
  try {
    const thresholds = resolveCliThresholds(options);
    write(JSON.stringify(thresholds, null, 2));
    return EXIT_CODES.PASSED;
  } catch (error) {
    logger.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_CODES.ERROR;
  }
}

export function thresholdsCommand(options: ThresholdCliOptions): void {
  process.exit(executeThresholds(options));
}
