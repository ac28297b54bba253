import pc from 'picocolors';
import { AuditReport, AuditStatus, Finding, FindingLevel } from '../types';

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export class ConsoleLogger implements Logger {
  log(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }
}

export const defaultLogger = new ConsoleLogger();

export type Colors = ReturnType<typeof pc.createColors>;

/** Uncoloured output, for files and tests */
export const plainColors: Colors = pc.createColors(false);

function levelTag(level: FindingLevel, colors: Colors): string {
  const tag = `[${level}]`;
  switch (level) {
    case FindingLevel.Error:
      return colors.red(colors.bold(tag));
    case FindingLevel.Warn:
      return colors.yellow(tag);
    case FindingLevel.Info:
      return colors.blue(tag);
    case FindingLevel.OK:
    default:
      return colors.green(tag);
  }
}

/**
 * `[WARN] ingest:flows: stale (age 120.0 min, budget 90 min)`
 */
export function formatFinding(finding: Finding, colors: Colors = pc): string {
  return `${levelTag(finding.level, colors)} ${finding.resourceId}: ${finding.message}`;
}

export function formatStatus(status: AuditStatus, colors: Colors = pc): string {
  switch (status) {
    case AuditStatus.NeedsFixes:
      return colors.red(colors.bold(status));
    case AuditStatus.Degraded:
      return colors.yellow(colors.bold(status));
    case AuditStatus.Ready:
    default:
      return colors.green(colors.bold(status));
  }
}

/**
 * Route a finding to the logger channel matching its level
 */
export function logFinding(logger: Logger, finding: Finding, colors: Colors = pc): void {
  const line = formatFinding(finding, colors);
  if (finding.level === FindingLevel.Error) {
    logger.error(line);
  } else if (finding.level === FindingLevel.Warn) {
    logger.warn(line);
  } else {
    logger.log(line);
  }
}

const STATUS_LEVELS = [FindingLevel.OK, FindingLevel.Info, FindingLevel.Warn, FindingLevel.Error];

/**
 * Short multi-line summary of a persisted report
 */
export function formatReportSummary(report: AuditReport, colors: Colors = pc): string[] {
  const { counts } = report;
  return [
    `Report:    ${report.id}`,
    `Root:      ${report.root}`,
    `Started:   ${report.startedAt}`,
    `Completed: ${report.completedAt}`,
    `Counts:    ${STATUS_LEVELS.map((level) => `${level}=${counts[level]}`).join(' ')}`,
    `Status:    ${formatStatus(report.status, colors)}`,
  ];
}
