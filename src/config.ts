/**
 * Configuration for review-threads projects
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { resolveConfigDir } from './paths.js';
import { DEFAULT_STATUS_TIMEOUT_MS } from './selector/constants.js';
import type { Logger } from './logger.js';

const CONFIG_FILE = 'config.yaml';
const CONFIG_DEFAULTS_FILE = 'config.defaults.yaml';

export interface ReviewThreadsConfig {
  /** Editor command used when `$EDITOR` is unset. */
  editor?: string;
  /** Agent command used when `$REVIEW_THREADS_AGENT` is unset. */
  agent?: string;
  /** `owner/name`; otherwise taken from the current checkout. */
  repo?: string;
  hideResolved: boolean;
  statusTimeoutMs: number;
}

export const DEFAULT_CONFIG: ReviewThreadsConfig = {
  hideResolved: true,
  statusTimeoutMs: DEFAULT_STATUS_TIMEOUT_MS,
};

export function getConfigPath(dir: string = resolveConfigDir()): string {
  return path.join(dir, CONFIG_FILE);
}

export function getConfigDefaultsPath(dir: string = resolveConfigDir()): string {
  return path.join(dir, CONFIG_DEFAULTS_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed YAML document. Unknown keys and values of the wrong type
 * are reported through `problems` and left out.
 */
export function parseConfig(raw: unknown, source: string, problems: string[]): Partial<ReviewThreadsConfig> {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    problems.push(`${source}: config must be a mapping`);
    return {};
  }
  const config: Partial<ReviewThreadsConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'editor':
      case 'agent':
      case 'repo':
        if (typeof value === 'string' && value.trim() !== '') {
          config[key] = value.trim();
        } else {
          problems.push(`${source}: ${key} must be a non-empty string`);
        }
        break;
      case 'hideResolved':
        if (typeof value === 'boolean') {
          config.hideResolved = value;
        } else {
          problems.push(`${source}: hideResolved must be true or false`);
        }
        break;
      case 'statusTimeoutMs':
        if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
          config.statusTimeoutMs = value;
        } else {
          problems.push(`${source}: statusTimeoutMs must be a positive integer`);
        }
        break;
      default:
        problems.push(`${source}: unknown key "${key}"`);
    }
  }
  if (config.repo !== undefined && !/^[^/\s]+\/[^/\s]+$/.test(config.repo)) {
    problems.push(`${source}: repo must look like owner/name`);
    delete config.repo;
  }
  return config;
}

function readLayer(file: string, problems: string[]): Partial<ReviewThreadsConfig> {
  if (!fs.existsSync(file)) return {};
  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(file, 'utf-8'), { schema: yaml.CORE_SCHEMA });
  } catch (error) {
    problems.push(`${file}: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
  return parseConfig(raw, file, problems);
}

export interface LoadConfigOptions {
  dir?: string;
  logger?: Logger;
}

/**
 * Load `config.defaults.yaml`, then `config.yaml` over it. Problems are
 * logged and the offending values skipped; a missing directory yields the
 * defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): ReviewThreadsConfig {
  const dir = options.dir ?? resolveConfigDir();
  const problems: string[] = [];
  const defaults = readLayer(getConfigDefaultsPath(dir), problems);
  const project = readLayer(getConfigPath(dir), problems);
  for (const problem of problems) {
    options.logger?.error(`Config: ${problem}`);
  }
  return { ...DEFAULT_CONFIG, ...defaults, ...project };
}
