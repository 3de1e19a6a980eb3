import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { resolveThresholds, ThresholdConfigParser } from '../../../src/config/parser';
import { DEFAULT_THRESHOLDS } from '../../../src/config/types';
import { ConfigError } from '../../../src/core/errors';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

describe('ThresholdConfigParser', () => {
  let parser: ThresholdConfigParser;
  let tempDir: string;

  beforeEach(() => {
    parser = new ThresholdConfigParser();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'threshold-parser-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeFile(relativePath: string, content: string): string {
    const filePath = path.join(tempDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  describe('parse()', () => {
    it('should parse flat YAML thresholds', () => {
      const configPath = writeFile('gates.yml', 'p95_threshold: 900\nthroughput_threshold: 5\n');

      expect(parser.parse(configPath)).toEqual({ p95_threshold: 900, throughput_threshold: 5 });
    });

    it('should parse thresholds nested under a thresholds key', () => {
      const configPath = writeFile('gates.yaml', `
thresholds:
  error_rate_threshold: 1.5
  avg_response_threshold: 250
`);

      expect(parser.parse(configPath)).toEqual({ error_rate_threshold: 1.5, avg_response_threshold: 250 });
    });

    it('should parse JSON thresholds', () => {
      const configPath = writeFile('gates.json', '{ "p99_threshold": 1500 }');

      expect(parser.parse(configPath)).toEqual({ p99_threshold: 1500 });
    });

    it('should treat an empty file as no overrides', () => {
      const configPath = writeFile('gates.yml', '');

      expect(parser.parse(configPath)).toEqual({});
    });

    it('should merge environment overrides from config/environments', () => {
      const configPath = writeFile('gates.yml', 'p95_threshold: 900\nthroughput_threshold: 5\n');
      writeFile('config/environments/staging.yml', 'throughput_threshold: 2\n');

      expect(parser.parse(configPath, 'staging')).toEqual({ p95_threshold: 900, throughput_threshold: 2 });
    });

    it('should find environment files next to the base file', () => {
      const configPath = writeFile('gates.yml', 'p95_threshold: 900\n');
      writeFile('production.json', '{ "p95_threshold": 600 }');

      expect(parser.parse(configPath, 'production')).toEqual({ p95_threshold: 600 });
    });

    it('should prefer config/environments over the base directory', () => {
      const configPath = writeFile('gates.yml', 'p95_threshold: 900\n');
      writeFile('config/environments/ci.yml', 'p95_threshold: 700\n');
      writeFile('ci.yml', 'p95_threshold: 650\n');

      expect(parser.parse(configPath, 'ci')).toEqual({ p95_threshold: 700 });
    });

    it('should fail when the environment file is missing', () => {
      const configPath = writeFile('gates.yml', 'p95_threshold: 900\n');

      expect(() => parser.parse(configPath, 'nowhere')).toThrow(ConfigError);
      expect(() => parser.parse(configPath, 'nowhere')).toThrow('Environment configuration not found for: nowhere');
    });

    it('should fail when the configuration file is missing', () => {
      const configPath = path.join(tempDir, 'missing.yml');

      expect(() => parser.parse(configPath)).toThrow(`Threshold configuration not found: ${configPath}`);
    });

    it('should report invalid threshold values', () => {
      const configPath = writeFile('gates.yml', 'p95_threshold: fast\n');

      try {
        parser.parse(configPath);
        expect.fail('Expected a ConfigError');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) {
          expect(error.errors).toEqual([`p95_threshold in ${configPath} must be a number, got "fast"`]);
        }
      }
    });

    it('should reject a file that is not a mapping', () => {
      const configPath = writeFile('gates.yml', '- 800\n- 1200\n');

      expect(() => parser.parse(configPath)).toThrow(`${configPath} must contain a mapping of threshold names to numbers`);
    });

    it('should report unparseable JSON', () => {
      const configPath = writeFile('gates.json', '{ "p95_threshold": }');

      expect(() => parser.parse(configPath)).toThrow(`Cannot parse ${configPath}`);
    });

    it('should warn about unknown threshold names', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const configPath = writeFile('gates.yml', 'p50_threshold: 100\np95_threshold: 700\n');

      expect(parser.parse(configPath)).toEqual({ p95_threshold: 700 });
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(String(warnSpy.mock.calls[0][0])).toContain("Unknown threshold 'p50_threshold'");
    });
  });
});

describe('resolveThresholds()', () => {
  it('should return the defaults without overrides', () => {
    expect(resolveThresholds()).toEqual({
      error_rate_threshold: 2,
      avg_response_threshold: 500,
      p95_threshold: 800,
      p99_threshold: 1200,
      throughput_threshold: 10
    });
  });

  it('should let later layers win', () => {
    const resolved = resolveThresholds(
      { p95_threshold: 900, throughput_threshold: 5 },
      { throughput_threshold: 20 }
    );

    expect(resolved).toEqual({ ...DEFAULT_THRESHOLDS, p95_threshold: 900, throughput_threshold: 20 });
  });

  it('should ignore undefined entries', () => {
    const resolved = resolveThresholds({ p99_threshold: 1500 }, { p99_threshold: undefined });

    expect(resolved.p99_threshold).toBe(1500);
  });

  it('should return a frozen set and leave the defaults untouched', () => {
    const resolved = resolveThresholds({ p95_threshold: 1 });

    expect(Object.isFrozen(resolved)).toBe(true);
    expect(DEFAULT_THRESHOLDS.p95_threshold).toBe(800);
  });
});
