export { PipelineAuditor, createAuditor, buildStageDetail } from './auditor';
export type { AuditorOptions, RunOptions, PersistedAudit } from './auditor';
export { buildRegistry } from './registry';
export { checkResource } from './checks';
export { computeStatus, countByLevel, createFinding, sortByRegistry } from './findings';
export { FileLease, defaultLeaseOwner } from './lease';
export type { LeaseStatus } from './lease';
export { ReportWriter, reportStamp, isAuditReport } from './report_writer';
export { ReportPersistError, ConfigValidationError } from './errors';
export {
  FallbackSchedulerQuery,
  StructuredSchedulerQuery,
  TextSchedulerQuery,
  defaultSchedulerQueries,
} from './scheduler';
export { NodeFilesystem, defaultFilesystem } from './filesystem';
export { NodeSubprocessRunner, defaultRunner } from './subprocess';
export { ConsoleLogger, defaultLogger, formatFinding, formatStatus, logFinding } from './logger';
export type { Logger } from './logger';
