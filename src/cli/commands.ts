import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AuditConfig, AuditStatus } from '../types';
import {
  applyEnvironment,
  loadConfig,
  loadConfigFile,
  mergeConfig,
  resolveReportDir,
  validateConfig,
} from '../config';
import { LEASE_FILE } from '../config/pipeline-layout';
import { AuditorOptions, PipelineAuditor } from '../core/auditor';
import { ConfigValidationError, ReportPersistError } from '../core/errors';
import { FileLease } from '../core/lease';
import { Colors, Logger, formatReportSummary, formatStatus, logFinding } from '../core/logger';
import { ReportWriter } from '../core/report_writer';

/**
 * Process exit codes of the CLI
 */
export const ExitCode = {
  Ok: 0,
  /** Report could not be persisted, config invalid, or nothing to show */
  Failure: 1,
  /** --fail-on threshold reached, or lease held by another owner */
  Threshold: 2,
} as const;

export interface AuditCommandOptions {
  root?: string;
  config?: string;
  out?: string;
  smoke?: boolean;
  scheduler?: boolean;
  failOn?: string;
}

const STATUS_RANK: Record<AuditStatus, number> = {
  [AuditStatus.Ready]: 0,
  [AuditStatus.Degraded]: 1,
  [AuditStatus.NeedsFixes]: 2,
};

export function parseStatus(value: string): AuditStatus | null {
  const normalized = value.trim().toUpperCase().replace(/-/g, '_');
  return Object.values(AuditStatus).find((status) => status === normalized) ?? null;
}

/**
 * True when the status is at least as bad as the threshold
 */
export function failOnReached(status: AuditStatus, threshold: AuditStatus): boolean {
  return STATUS_RANK[status] >= STATUS_RANK[threshold];
}

/**
 * Layer configuration: defaults < config file < environment < flags.
 * Throws ConfigValidationError when the result is invalid.
 */
export function resolveAuditConfig(options: AuditCommandOptions, cwd: string = process.cwd()): AuditConfig {
  let config: AuditConfig;
  if (options.config) {
    const target = path.resolve(cwd, options.config);
    config = applyEnvironment(
      fs.existsSync(target) && fs.statSync(target).isDirectory() ? loadConfig(target) : loadConfigFile(target)
    );
  } else {
    config = loadConfig(cwd);
  }

  config = mergeConfig(config, {
    root: options.root !== undefined ? path.resolve(cwd, options.root) : undefined,
    reportDir: options.out !== undefined ? path.resolve(cwd, options.out) : undefined,
    smokeTest: options.smoke ? { enabled: true } : undefined,
    scheduler: options.scheduler === false ? { enabled: false } : undefined,
  });

  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }
  return config;
}

/**
 * Run one audit, streaming findings to the logger. The status is the last
 * line written.
 */
export async function runAuditCommand(
  config: AuditConfig,
  failOn: AuditStatus | null,
  logger: Logger,
  auditorOptions: AuditorOptions = {},
  colors?: Colors
): Promise<number> {
  const auditor = new PipelineAuditor(config, { ...auditorOptions, logger });
  logger.log(`=== Pipeline Audit: ${config.root} ===`);

  try {
    const { report, path: reportPath } = await auditor.runAndPersist({
      onFinding: (finding) => logFinding(logger, finding, colors),
    });
    logger.log(`Report: ${reportPath}`);
    logger.log(`STATUS: ${formatStatus(report.status, colors)}`);
    if (failOn && failOnReached(report.status, failOn)) {
      return ExitCode.Threshold;
    }
    return ExitCode.Ok;
  } catch (error) {
    if (error instanceof ReportPersistError) {
      logger.error(error.message);
      return ExitCode.Failure;
    }
    throw error;
  }
}

/**
 * Print the summary of the newest persisted report
 */
export function showLatestReport(config: AuditConfig, logger: Logger, colors?: Colors): number {
  const writer = new ReportWriter(resolveReportDir(config));
  const report = writer.loadLatest();
  if (!report) {
    logger.warn(`No audit report found in ${writer.directory}`);
    return ExitCode.Failure;
  }
  logger.log('=== Latest Audit Report ===');
  formatReportSummary(report, colors).forEach((line) => logger.log(line));
  return ExitCode.Ok;
}

export type LeaseAction = 'acquire' | 'release' | 'status';

export interface LeaseCommandOptions {
  path?: string;
  staleAfter?: string;
  owner?: string;
}

export function parseLeaseAction(value: string): LeaseAction | null {
  return value === 'acquire' || value === 'release' || value === 'status' ? value : null;
}

/**
 * acquire: 0 when acquired, 2 when held by another owner.
 * release: 0 when released, 1 when this owner did not hold it.
 * status: always 0.
 */
export function runLeaseCommand(
  action: LeaseAction,
  config: AuditConfig,
  options: LeaseCommandOptions,
  logger: Logger,
  now: () => Date = () => new Date()
): number {
  const leasePath = options.path
    ? path.resolve(options.path)
    : path.join(config.root, ...LEASE_FILE.split('/'));
  const staleAfter = options.staleAfter !== undefined ? Number(options.staleAfter) : config.leaseStaleMinutes;
  if (!Number.isFinite(staleAfter) || staleAfter <= 0) {
    logger.error(`Invalid --stale-after: ${options.staleAfter}`);
    return ExitCode.Failure;
  }
  const lease = new FileLease(leasePath, options.owner ?? os.hostname(), now);

  switch (action) {
    case 'acquire': {
      const result = lease.acquire(staleAfter);
      if (result.status === 'acquired') {
        logger.log(`Lease acquired: ${leasePath}${result.replacedStale ? ' (replaced stale lease)' : ''}`);
        return ExitCode.Ok;
      }
      logger.warn(
        `Lease held by ${result.holder?.owner ?? 'unknown'} (age ${result.currentAgeMinutes.toFixed(1)} min)`
      );
      return ExitCode.Threshold;
    }
    case 'release': {
      if (lease.release()) {
        logger.log(`Lease released: ${leasePath}`);
        return ExitCode.Ok;
      }
      logger.warn(`Lease not held by this owner: ${leasePath}`);
      return ExitCode.Failure;
    }
    case 'status': {
      const status = lease.status(staleAfter);
      if (!status.held) {
        logger.log(`Lease free: ${leasePath}`);
      } else {
        logger.log(
          `Lease held by ${status.holder?.owner ?? 'unknown'} ` +
            `(age ${status.ageMinutes.toFixed(1)} min${status.stale ? ', stale' : ''})`
        );
      }
      return ExitCode.Ok;
    }
  }
}
