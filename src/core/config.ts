import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { ContractConfigSchema, type ContractConfig } from './types.js';
import { ConfigError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.contracts.yaml';

type RawConfig = Record<string, unknown>;

export class ConfigManager {
  private config: ContractConfig | null = null;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, env: NodeJS.ProcessEnv = process.env) {
    this.projectDir = projectDir || process.cwd();
    this.env = env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- project config <- env vars <- overrides
   */
  load(overrides?: Record<string, unknown>): ContractConfig {
    let raw: RawConfig = {};

    // 1. Project config
    const projectConfigPath = join(this.projectDir, PROJECT_CONFIG_FILE);
    if (existsSync(projectConfigPath)) {
      let parsed: unknown;
      try {
        parsed = parseYaml(readFileSync(projectConfigPath, 'utf-8'));
      } catch (err) {
        throw new ConfigError(`Failed to parse project config at ${projectConfigPath}`, err);
      }
      if (isRecord(parsed)) {
        raw = this.deepMerge(raw, parsed);
      }
    }

    // 2. Environment
    raw = this.applyEnvVars(raw);

    // 3. Overrides
    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    // 4. Validate with Zod
    const result = ContractConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${result.error.message}`, result.error);
    }
    this.config = result.data;
    return this.config;
  }

  get(): ContractConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const result: RawConfig = { ...raw };
    const concurrency: RawConfig = isRecord(raw.concurrency) ? { ...raw.concurrency } : {};
    const report: RawConfig = isRecord(raw.report) ? { ...raw.report } : {};

    if (this.env.CONTRACTS_LOG_LEVEL) {
      result.logLevel = this.env.CONTRACTS_LOG_LEVEL;
    }
    if (this.env.CONTRACTS_VERBOSE) {
      result.verbose = this.env.CONTRACTS_VERBOSE === 'true' || this.env.CONTRACTS_VERBOSE === '1';
    }
    if (this.env.CONTRACTS_WORKERS) {
      concurrency.defaultWorkers = Number(this.env.CONTRACTS_WORKERS);
    }
    if (this.env.CONTRACTS_MAX_VALUE_LENGTH) {
      report.maxValueLength = Number(this.env.CONTRACTS_MAX_VALUE_LENGTH);
    }

    result.concurrency = concurrency;
    result.report = report;
    return result;
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const s = source[key];
      const t = target[key];
      if (isRecord(s) && isRecord(t)) {
        result[key] = this.deepMerge(t, s);
      } else {
        result[key] = s;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

let _config: ContractConfig | null = null;

/**
 * Process-wide configuration, loaded from the working directory on first use.
 */
export function getConfig(): ContractConfig {
  if (!_config) {
    _config = new ConfigManager().load();
  }
  return _config;
}

export function setConfig(config: ContractConfig): void {
  _config = config;
}

export function resetConfig(): void {
  _config = null;
}
