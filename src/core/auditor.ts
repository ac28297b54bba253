import { v4 as uuidv4 } from 'uuid';
import {
  AuditConfig,
  AuditReport,
  AuditStage,
  CheckContext,
  CheckResult,
  Filesystem,
  Finding,
  Resource,
  SchedulerQuery,
  StageDetail,
  SubprocessRunner,
} from '../types';
import { loadConfig, resolveReportDir } from '../config';
import { checkResource } from './checks';
import { defaultFilesystem } from './filesystem';
import { computeStatus, countByLevel, emptyCounts, sortByRegistry } from './findings';
import { Logger, defaultLogger } from './logger';
import { buildRegistry } from './registry';
import { ReportWriter } from './report_writer';
import { FallbackSchedulerQuery, defaultSchedulerQueries } from './scheduler';
import { defaultRunner } from './subprocess';

export interface AuditorOptions {
  fs?: Filesystem;
  now?: () => Date;
  /** Defaults to the structured query with the text listing as fallback */
  scheduler?: SchedulerQuery;
  runner?: SubprocessRunner;
  logger?: Logger;
}

export interface RunOptions {
  /** Called once per finding, in registry order */
  onFinding?: (finding: Finding) => void;
  signal?: AbortSignal;
}

export interface PersistedAudit {
  report: AuditReport;
  path: string;
}

/**
 * Runs every registered check against the pipeline root and assembles the
 * report. Checks run concurrently; findings are delivered and stored in
 * registry order regardless of completion order.
 */
export class PipelineAuditor {
  private config: AuditConfig;
  private fs: Filesystem;
  private now: () => Date;
  private scheduler?: SchedulerQuery;
  private runner: SubprocessRunner;
  private logger: Logger;
  private lastReport: AuditReport | null = null;
  private running: Promise<AuditReport> | null = null;

  constructor(config?: AuditConfig, options: AuditorOptions = {}) {
    this.config = config || loadConfig();
    this.fs = options.fs ?? defaultFilesystem;
    this.now = options.now ?? (() => new Date());
    this.runner = options.runner ?? defaultRunner;
    this.logger = options.logger ?? defaultLogger;
    this.scheduler =
      options.scheduler ??
      (this.config.scheduler.enabled
        ? new FallbackSchedulerQuery(defaultSchedulerQueries(this.runner))
        : undefined);
  }

  public getConfig(): AuditConfig {
    return this.config;
  }

  /**
   * The most recent report that was persisted by this instance
   */
  public getLastReport(): AuditReport | null {
    return this.lastReport;
  }

  public isRunning(): boolean {
    return this.running !== null;
  }

  public registry(): Resource[] {
    return buildRegistry(this.config);
  }

  /**
   * Run a full audit. Never throws for resource problems: those become findings.
   */
  public async run(options: RunOptions = {}): Promise<AuditReport> {
    const startedAt = this.now();
    const registry = this.registry();
    const ctx: CheckContext = {
      fs: this.fs,
      now: this.now,
      config: this.config,
      scheduler: this.scheduler,
      runner: this.runner,
      signal: options.signal,
    };

    const pending = registry.map((resource) => checkResource(resource, ctx));
    const results: CheckResult[] = [];
    const findings: Finding[] = [];
    for (const result of pending) {
      const settled = await result;
      results.push(settled);
      for (const finding of settled.findings) {
        findings.push(finding);
        options.onFinding?.(finding);
      }
    }

    const ordered = sortByRegistry(findings, registry);
    const report: AuditReport = {
      schema: 'pipeline.audit.report.v1',
      id: uuidv4(),
      startedAt: startedAt.toISOString(),
      completedAt: this.now().toISOString(),
      root: this.config.root,
      status: computeStatus(ordered),
      counts: countByLevel(ordered),
      findings: ordered,
      perStageDetail: buildStageDetail(registry, results),
    };
    return report;
  }

  /**
   * Run an audit and persist its report. A persist failure propagates as
   * ReportPersistError; the report is then void.
   */
  public async runAndPersist(options: RunOptions = {}): Promise<PersistedAudit> {
    const report = await this.run(options);
    const writer = new ReportWriter(resolveReportDir(this.config));
    const path = writer.write(report);
    this.lastReport = report;
    this.logger.log(`[auditor] report ${report.id} written to ${path}`);
    return { report, path };
  }

  /**
   * Like runAndPersist, but a call while an audit is in flight joins it
   * instead of starting a second one.
   */
  public async runExclusive(options: RunOptions = {}): Promise<AuditReport> {
    if (this.running) {
      return this.running;
    }
    this.running = this.runAndPersist(options).then(({ report }) => report);
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }
}

/**
 * Per-stage summary: resource ids, level counts and checker detail
 */
export function buildStageDetail(
  registry: readonly Resource[],
  results: readonly CheckResult[]
): Record<AuditStage, StageDetail> {
  const empty = (): StageDetail => ({ resources: [], counts: emptyCounts(), notes: {} });
  const detail: Record<AuditStage, StageDetail> = {
    [AuditStage.Folders]: empty(),
    [AuditStage.Ingest]: empty(),
    [AuditStage.Agents]: empty(),
    [AuditStage.Engine]: empty(),
    [AuditStage.Logs]: empty(),
    [AuditStage.Analytics]: empty(),
    [AuditStage.Scheduler]: empty(),
  };

  registry.forEach((resource, index) => {
    const stage = detail[resource.stage];
    const result = results[index];
    stage.resources.push(resource.id);
    if (!result) return;
    for (const finding of result.findings) {
      stage.counts[finding.level] += 1;
    }
    if (result.detail) {
      stage.notes[resource.id] = result.detail;
    }
  });
  return detail;
}

/**
 * Create a new auditor instance
 */
export function createAuditor(config?: AuditConfig, options?: AuditorOptions): PipelineAuditor {
  return new PipelineAuditor(config, options);
}
