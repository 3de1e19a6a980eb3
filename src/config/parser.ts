import * as YAML from 'yaml';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../core/errors';
import { logger } from '../utils/logger';
import { DEFAULT_THRESHOLDS, THRESHOLD_KEYS } from './types';
import type { ThresholdKey, ThresholdOverrides, ThresholdSet } from './types';
import { ThresholdValidator } from './validator';

const ENV_EXTENSIONS = ['yml', 'yaml', 'json'];

/**
 * Loads threshold overrides from a YAML or JSON file, optionally layered
 * with a per-environment file that sits next to it.
 *
 * Accepted shapes:
 *
 *   p95_threshold: 800
 *
 * or
 *
 *   thresholds:
 *     p95_threshold: 800
 */
export class ThresholdConfigParser {
  private validator = new ThresholdValidator();

  parse(configPath: string, environment?: string): ThresholdOverrides {
    logger.debug(`Loading thresholds from ${configPath}`);

    if (!fs.existsSync(configPath)) {
      throw new ConfigError([`Threshold configuration not found: ${configPath}`]);
    }

    const base = this.loadFile(configPath);

    if (environment) {
      const envPath = this.findEnvironmentFile(environment, path.dirname(configPath));
      logger.debug(`Applying ${environment} overrides from ${envPath}`);
      return { ...base, ...this.loadFile(envPath) };
    }

    return base;
  }

  private loadFile(filePath: string): ThresholdOverrides {
    const content = fs.readFileSync(filePath, 'utf8');

    let parsed: unknown;
    try {
      parsed = this.parseContent(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError([`Cannot parse ${filePath}: ${reason}`]);
    }

    const raw = this.extractThresholds(parsed, filePath);
    const result = this.validator.validate(raw, filePath);

    result.warnings.forEach(warning => logger.warn(warning));
    if (!result.valid) {
      throw new ConfigError(result.errors);
    }

    return result.thresholds;
  }

  private parseContent(content: string): unknown {
    const trimmed = content.trim();

    if (trimmed.startsWith('{')) {
      return JSON.parse(content);
    } else {
      return YAML.parse(content);
    }
  }

  private extractThresholds(parsed: unknown, filePath: string): Record<string, unknown> {
    // An empty file parses to null
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError([`${filePath} must contain a mapping of threshold names to numbers`]);
    }

    const nested = parsed.thresholds;
    if (nested === undefined) {
      return parsed;
    }
    if (!isRecord(nested)) {
      throw new ConfigError([`'thresholds' in ${filePath} must be a mapping`]);
    }
    return nested;
  }

  private findEnvironmentFile(environment: string, baseDir: string): string {
    const candidates = [
      ...ENV_EXTENSIONS.map(ext => path.join(baseDir, 'config', 'environments', `${environment}.${ext}`)),
      ...ENV_EXTENSIONS.map(ext => path.join(baseDir, `${environment}.${ext}`))
    ];

    const found = candidates.find(candidate => fs.existsSync(candidate));
    if (!found) {
      throw new ConfigError([
        `Environment configuration not found for: ${environment}. Searched paths: ${candidates.join(', ')}`
      ]);
    }
    return found;
  }
}

/**
 * Layer overrides over the defaults, later layers winning. Undefined
 * entries never replace an earlier value.
 */
export function resolveThresholds(...layers: ThresholdOverrides[]): ThresholdSet {
  const resolved: { -readonly [K in ThresholdKey]: number } = { ...DEFAULT_THRESHOLDS };

  for (const layer of layers) {
    for (const key of THRESHOLD_KEYS) {
      const value = layer[key];
      if (value !== undefined) {
        resolved[key] = value;
      }
    }
  }

  return Object.freeze(resolved);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
