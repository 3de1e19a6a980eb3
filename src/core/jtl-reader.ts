import * as fs from 'fs';
import Papa from 'papaparse';
import type { SampleRecord } from '../metrics/types';
import { logger } from '../utils/logger';
import { DataFormatError, InputNotFoundError, JtlReadError } from './errors';

export interface JtlReadOptions {
  delimiter?: string;
}

type JtlRow = Record<string, string | undefined>;

// Column names as JMeter writes them in CSV result files
const COLUMNS = {
  timestamp: 'timeStamp',
  elapsed: 'elapsed',
  success: 'success'
} as const;

const INTEGER_PATTERN = /^-?\d+$/;

export function readJtlFile(filePath: string, options: JtlReadOptions = {}): SampleRecord[] {
  if (!fs.existsSync(filePath)) {
    throw new InputNotFoundError(filePath);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new JtlReadError(filePath, error);
  }

  const samples = parseJtl(content, options.delimiter);
  logger.info(`✓ Successfully read ${samples.length} samples from ${filePath}`);
  return samples;
}

/**
 * Parse JTL CSV content (header row required) into sample records.
 *
 * Blank or missing cells leave the timestamp unset and fall back to
 * elapsed 0 and success true. Anything present but unreadable is a
 * DataFormatError.
 */
export function parseJtl(content: string, delimiter = ','): SampleRecord[] {
  const parseResult = Papa.parse<JtlRow>(content, {
    header: true,
    delimiter,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: (header: string) => header.trim()
  });

  // Short rows are tolerated; their missing cells take the defaults
  const fatal = parseResult.errors.find(error => error.type !== 'FieldMismatch');
  if (fatal) {
    const row = fatal.row === undefined ? 0 : fatal.row + 2;
    throw new DataFormatError('csv', row, fatal.code, fatal.message);
  }

  return parseResult.data.map((row, index) => toSample(row, index + 2));
}

function toSample(row: JtlRow, rowNumber: number): SampleRecord {
  return {
    timestamp: parseTimestamp(row[COLUMNS.timestamp], rowNumber),
    elapsed: parseElapsed(row[COLUMNS.elapsed], rowNumber),
    success: parseSuccess(row[COLUMNS.success], rowNumber)
  };
}

function parseInteger(raw: string | undefined, field: string, rowNumber: number): number | undefined {
  const value = raw?.trim();
  if (!value) return undefined;

  if (!INTEGER_PATTERN.test(value)) {
    throw new DataFormatError(field, rowNumber, raw, 'expected an integer number of milliseconds');
  }
  return parseInt(value, 10);
}

// Absent stays absent so the throughput window ignores the row
function parseTimestamp(raw: string | undefined, rowNumber: number): number | undefined {
  return parseInteger(raw, COLUMNS.timestamp, rowNumber);
}

function parseElapsed(raw: string | undefined, rowNumber: number): number {
  const elapsed = parseInteger(raw, COLUMNS.elapsed, rowNumber) ?? 0;
  if (elapsed < 0) {
    throw new DataFormatError(COLUMNS.elapsed, rowNumber, raw, 'latency cannot be negative');
  }
  return elapsed;
}

function parseSuccess(raw: string | undefined, rowNumber: number): boolean {
  const value = raw?.trim().toLowerCase();
  if (!value) return true;

  switch (value) {
    case 'true': return true;
    case 'false': return false;
    default:
      throw new DataFormatError(COLUMNS.success, rowNumber, raw, "expected 'true' or 'false'");
  }
}
