/**
 * @fileoverview labelbook configuration file
 *
 * An optional YAML file tunes where exports land, which fields the
 * completeness criterion requires, which criteria the demo runs and how
 * chatty logging is. Every key has a default, so an absent file is the same
 * as an empty one.
 *
 * ```yaml
 * output:
 *   dir: ./out
 *   reportFile: annotation_report.json
 *   csvFile: annotations.csv
 *   jsonIndent: 2
 * quality:
 *   requiredFields: [id, category, confidence]
 *   defaultCriteria: [completeness, format, consistency]
 * logLevel: info
 * ```
 */

import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage, type IOError } from '../core/errors.js';
import { Err, Ok, readFileIfExists, type Result } from '../core/result.js';
import { DEFAULT_CRITERIA, DEFAULT_REQUIRED_FIELDS } from '../quality/criteria.js';
import { DEFAULT_CSV_FILE, DEFAULT_JSON_INDENT, DEFAULT_REPORT_FILE } from '../report/export.js';
import type { DataEntryField } from '../types.js';
import type { LogLevel } from '../telemetry/logger.js';

export const DEFAULT_CONFIG_FILE = 'labelbook.config.yaml';

const DataEntryFieldSchema = z.enum(['id', 'category', 'confidence', 'notes', 'timestamp']);

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const LabelbookConfigSchema = z
  .object({
    output: z
      .object({
        dir: z.string().min(1).default('.'),
        reportFile: z.string().min(1).default(DEFAULT_REPORT_FILE),
        csvFile: z.string().min(1).default(DEFAULT_CSV_FILE),
        jsonIndent: z.number().int().min(0).max(10).default(DEFAULT_JSON_INDENT),
      })
      .strict()
      .default({}),
    quality: z
      .object({
        requiredFields: z.array(DataEntryFieldSchema).default([...DEFAULT_REQUIRED_FIELDS]),
        defaultCriteria: z.array(z.string().min(1)).min(1).default([...DEFAULT_CRITERIA]),
      })
      .strict()
      .default({}),
    logLevel: LogLevelSchema.default('info'),
  })
  .strict();

export interface LabelbookConfig {
  output: {
    dir: string;
    reportFile: string;
    csvFile: string;
    jsonIndent: number;
  };
  quality: {
    requiredFields: DataEntryField[];
    defaultCriteria: string[];
  };
  logLevel: LogLevel;
}

export function defaultConfig(): LabelbookConfig {
  return LabelbookConfigSchema.parse({});
}

/**
 * Validate an already-parsed config object.
 */
export function parseConfig(raw: unknown, source = 'config'): LabelbookConfig {
  const parsed = LabelbookConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue && issue.path.length > 0 ? issue.path.join('.') : source;
    throw new ConfigurationError(key, issue?.message ?? 'invalid configuration');
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  /** Explicit file; a missing explicit file is an error. */
  configPath?: string;
  /** Directory searched for DEFAULT_CONFIG_FILE when no path is given. */
  cwd?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): Result<LabelbookConfig, ConfigurationError | IOError> {
  const explicit = options.configPath !== undefined;
  const filePath = path.resolve(options.cwd ?? process.cwd(), options.configPath ?? DEFAULT_CONFIG_FILE);

  const read = readFileIfExists(filePath);
  if (!read.ok) return read;
  if (read.value === null) {
    if (explicit) {
      return Err(new ConfigurationError(filePath, 'file not found'));
    }
    return Ok(defaultConfig());
  }

  let raw: unknown;
  try {
    raw = YAML.parse(read.value);
  } catch (error) {
    return Err(new ConfigurationError(filePath, `invalid YAML: ${getErrorMessage(error)}`));
  }

  try {
    return Ok(parseConfig(raw, filePath));
  } catch (error) {
    if (error instanceof ConfigurationError) return Err(error);
    throw error;
  }
}

/** Absolute path of the JSON report for a loaded config. */
export function reportPath(config: LabelbookConfig, baseDir = process.cwd()): string {
  return path.resolve(baseDir, config.output.dir, config.output.reportFile);
}

/** Absolute path of the CSV export for a loaded config. */
export function csvPath(config: LabelbookConfig, baseDir = process.cwd()): string {
  return path.resolve(baseDir, config.output.dir, config.output.csvFile);
}
