import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import Ajv from 'ajv';
import { AuditConfig } from '../types';
import { AuditConfigSchema } from '../core/schemas';

/**
 * Default configuration for the auditor
 */
const DEFAULT_CONFIG: AuditConfig = {
  root: process.cwd(),
  ingestFreshnessMinutes: 90,
  logFreshnessMinutes: 180,
  analyticsFreshnessMinutes: 1440,
  logTailLines: 3,
  smokeTest: {
    enabled: false,
    command: 'python',
    args: [],
    timeoutMs: 120_000,
  },
  scheduler: {
    enabled: true,
    namePattern: 'OPRT',
  },
  leaseStaleMinutes: 55,
};

/**
 * Configuration file paths to search (in order)
 */
const CONFIG_PATHS = [
  '.pipeline-audit/config.yml',
  '.pipeline-audit/config.yaml',
  'pipeline-audit.yml',
  'pipeline-audit.yaml',
];

export const ROOT_ENV_VAR = 'PIPELINE_AUDIT_ROOT';

export type ConfigOverride = Partial<Omit<AuditConfig, 'smokeTest' | 'scheduler'>> & {
  smokeTest?: Partial<AuditConfig['smokeTest']>;
  scheduler?: Partial<AuditConfig['scheduler']>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const num = (value: unknown): number | undefined => (typeof value === 'number' ? value : undefined);
const str = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);
const bool = (value: unknown): boolean | undefined => (typeof value === 'boolean' ? value : undefined);

/**
 * Pick the recognised options out of a parsed config file.
 * Values of the wrong type are ignored and fall back to the defaults.
 */
export function toOverride(raw: Record<string, unknown>): ConfigOverride {
  const smoke = isRecord(raw.smokeTest) ? raw.smokeTest : {};
  const scheduler = isRecord(raw.scheduler) ? raw.scheduler : {};
  const args = smoke.args;
  return {
    root: str(raw.root),
    ingestFreshnessMinutes: num(raw.ingestFreshnessMinutes),
    logFreshnessMinutes: num(raw.logFreshnessMinutes),
    analyticsFreshnessMinutes: num(raw.analyticsFreshnessMinutes),
    logTailLines: num(raw.logTailLines),
    reportDir: str(raw.reportDir),
    leaseStaleMinutes: num(raw.leaseStaleMinutes),
    smokeTest: {
      enabled: bool(smoke.enabled),
      command: str(smoke.command),
      args: Array.isArray(args) ? args.map((a) => String(a)) : undefined,
      timeoutMs: num(smoke.timeoutMs),
    },
    scheduler: {
      enabled: bool(scheduler.enabled),
      namePattern: str(scheduler.namePattern),
    },
  };
}

/**
 * Read one config file and merge it over the defaults. Throws when the file
 * cannot be read or parsed.
 */
export function loadConfigFile(configPath: string): AuditConfig {
  const content = fs.readFileSync(configPath, 'utf-8');
  const parsed: unknown = yaml.parse(content);
  const config = getDefaultConfig();
  return isRecord(parsed) ? mergeConfig(config, toOverride(parsed)) : config;
}

/**
 * Load auditor configuration from file or use defaults.
 * PIPELINE_AUDIT_ROOT overrides the root of whatever was loaded.
 */
export function loadConfig(basePath?: string): AuditConfig {
  const searchPaths = CONFIG_PATHS.map((p) => path.resolve(basePath || process.cwd(), p));

  let config = getDefaultConfig();
  for (const configPath of searchPaths) {
    if (fs.existsSync(configPath)) {
      try {
        config = loadConfigFile(configPath);
        break;
      } catch (error) {
        console.warn(`Warning: Failed to parse config at ${configPath}:`, error);
      }
    }
  }

  return applyEnvironment(config);
}

/**
 * Apply environment overrides (PIPELINE_AUDIT_ROOT)
 */
export function applyEnvironment(config: AuditConfig, env: NodeJS.ProcessEnv = process.env): AuditConfig {
  const envRoot = env[ROOT_ENV_VAR];
  if (envRoot && envRoot.trim() !== '') {
    return { ...config, root: path.resolve(envRoot.trim()) };
  }
  return config;
}

/**
 * Merge an override onto a configuration. Nested option groups merge key by key.
 */
export function mergeConfig(defaults: AuditConfig, override: ConfigOverride): AuditConfig {
  return {
    root: override.root !== undefined ? path.resolve(override.root) : defaults.root,
    ingestFreshnessMinutes: override.ingestFreshnessMinutes ?? defaults.ingestFreshnessMinutes,
    logFreshnessMinutes: override.logFreshnessMinutes ?? defaults.logFreshnessMinutes,
    analyticsFreshnessMinutes:
      override.analyticsFreshnessMinutes ?? defaults.analyticsFreshnessMinutes,
    logTailLines: override.logTailLines ?? defaults.logTailLines,
    smokeTest: {
      enabled: override.smokeTest?.enabled ?? defaults.smokeTest.enabled,
      command: override.smokeTest?.command ?? defaults.smokeTest.command,
      args: [...(override.smokeTest?.args ?? defaults.smokeTest.args)],
      timeoutMs: override.smokeTest?.timeoutMs ?? defaults.smokeTest.timeoutMs,
    },
    scheduler: {
      enabled: override.scheduler?.enabled ?? defaults.scheduler.enabled,
      namePattern: override.scheduler?.namePattern ?? defaults.scheduler.namePattern,
    },
    reportDir: override.reportDir !== undefined ? override.reportDir : defaults.reportDir,
    leaseStaleMinutes: override.leaseStaleMinutes ?? defaults.leaseStaleMinutes,
  };
}

/**
 * Get the default configuration (deep copy)
 */
export function getDefaultConfig(): AuditConfig {
  return {
    ...DEFAULT_CONFIG,
    root: process.cwd(),
    smokeTest: { ...DEFAULT_CONFIG.smokeTest, args: [...DEFAULT_CONFIG.smokeTest.args] },
    scheduler: { ...DEFAULT_CONFIG.scheduler },
  };
}

const ajv = new Ajv({ allErrors: true });
const validateShape = ajv.compile(AuditConfigSchema);

/**
 * Validate configuration. Returns one message per problem.
 */
export function validateConfig(config: AuditConfig): string[] {
  if (validateShape(config)) {
    return [];
  }
  return (validateShape.errors ?? []).map((err) => {
    const where = err.instancePath === '' ? 'config' : `config${err.instancePath.replace(/\//g, '.')}`;
    return `${where} ${err.message ?? 'is invalid'}`;
  });
}

/**
 * Directory audit reports are written to
 */
export function resolveReportDir(config: AuditConfig): string {
  if (config.reportDir) {
    return path.resolve(config.root, config.reportDir);
  }
  return path.join(config.root, 'reports', 'audit');
}
