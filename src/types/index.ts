/**
 * Kinds of pipeline resources the auditor knows how to inspect
 */
export enum ResourceKind {
  Directory = 'directory',
  FreshFile = 'fresh_file',
  StructuredFile = 'structured_file',
  PairedArtifact = 'paired_artifact',
  AppendLog = 'append_log',
  SchedulerTaskGroup = 'scheduler_task_group',
}

/**
 * Audit stages, in the order the report lists them
 */
export enum AuditStage {
  Folders = 'folders',
  Ingest = 'ingest',
  Agents = 'agents',
  Engine = 'engine',
  Logs = 'logs',
  Analytics = 'analytics',
  Scheduler = 'scheduler',
}

export const STAGE_ORDER: readonly AuditStage[] = [
  AuditStage.Folders,
  AuditStage.Ingest,
  AuditStage.Agents,
  AuditStage.Engine,
  AuditStage.Logs,
  AuditStage.Analytics,
  AuditStage.Scheduler,
];

/**
 * Finding levels
 *
 * ERROR is reserved for missing foundational directories. Every other
 * defect is reported as WARN.
 */
export enum FindingLevel {
  OK = 'OK',
  Info = 'INFO',
  Warn = 'WARN',
  Error = 'ERROR',
}

/**
 * Overall verdict of one audit run
 */
export enum AuditStatus {
  Ready = 'READY',
  Degraded = 'DEGRADED',
  NeedsFixes = 'NEEDS_FIXES',
}

/**
 * Defect taxonomy carried on non-OK findings
 */
export enum FindingCode {
  MissingResource = 'missing_resource',
  StaleResource = 'stale_resource',
  InvalidSchema = 'invalid_schema',
  OutOfRangeValue = 'out_of_range_value',
  ParseFailure = 'parse_failure',
  SubprocessFailure = 'subprocess_failure',
  SchedulerQueryFailure = 'scheduler_query_failure',
}

export interface NumericRange {
  key: string;
  min: number;
  max: number;
}

interface ResourceBase {
  id: string;
  stage: AuditStage;
  /** Absolute path (or scheduler name pattern for task groups) */
  locator: string;
  freshnessBudgetMinutes?: number;
}

export interface DirectoryResource extends ResourceBase {
  kind: ResourceKind.Directory;
  /** A missing foundational directory is the only ERROR condition */
  foundational: boolean;
  /** 'latest-subdirectory' checks the newest child directory instead of the folder itself */
  mode: 'presence' | 'latest-subdirectory';
}

export interface FreshFileResource extends ResourceBase {
  kind: ResourceKind.FreshFile;
  content: 'presence' | 'numeric' | 'heartbeat';
}

export interface StructuredFileResource extends ResourceBase {
  kind: ResourceKind.StructuredFile;
  format: 'json' | 'csv';
  requiredKeys: string[];
  numericRange?: NumericRange;
}

export interface PairedArtifactResource extends ResourceBase {
  kind: ResourceKind.PairedArtifact;
  instrument: string;
  secondaryLocator: string;
}

export interface AppendLogResource extends ResourceBase {
  kind: ResourceKind.AppendLog;
  format: 'csv' | 'jsonl';
  requiredColumns?: string[];
}

export interface SchedulerRole {
  name: string;
  /** Case-insensitive substrings; a task matching any of them belongs to the role */
  substrings: string[];
}

export interface SchedulerTaskGroupResource extends ResourceBase {
  kind: ResourceKind.SchedulerTaskGroup;
  roles: SchedulerRole[];
}

export type Resource =
  | DirectoryResource
  | FreshFileResource
  | StructuredFileResource
  | PairedArtifactResource
  | AppendLogResource
  | SchedulerTaskGroupResource;

/**
 * One classified observation produced by a checker
 */
export interface Finding {
  level: FindingLevel;
  resourceId: string;
  message: string;
  producedAt: string;
  code?: FindingCode;
  details?: Record<string, unknown>;
}

/**
 * Result of checking a single resource
 */
export interface CheckResult {
  findings: Finding[];
  detail?: Record<string, unknown>;
}

export type LevelCounts = Record<FindingLevel, number>;

export interface StageDetail {
  resources: string[];
  counts: LevelCounts;
  notes: Record<string, unknown>;
}

/**
 * The persisted audit document
 */
export interface AuditReport {
  schema: 'pipeline.audit.report.v1';
  id: string;
  startedAt: string;
  completedAt: string;
  root: string;
  status: AuditStatus;
  counts: LevelCounts;
  findings: Finding[];
  perStageDetail: Record<AuditStage, StageDetail>;
}

/**
 * Options of the optional engine smoke run
 */
export interface SmokeTestConfig {
  enabled: boolean;
  command: string;
  args: string[];
  timeoutMs: number;
}

export interface SchedulerConfig {
  enabled: boolean;
  namePattern: string;
}

/**
 * Auditor configuration
 */
export interface AuditConfig {
  root: string;
  ingestFreshnessMinutes: number;
  logFreshnessMinutes: number;
  analyticsFreshnessMinutes: number;
  logTailLines: number;
  smokeTest: SmokeTestConfig;
  scheduler: SchedulerConfig;
  /** Defaults to <root>/reports/audit when unset */
  reportDir?: string;
  leaseStaleMinutes: number;
}

export interface FileStat {
  mtimeMs: number;
  isDirectory: boolean;
}

export interface DirectoryEntry {
  name: string;
  mtimeMs: number;
  isDirectory: boolean;
}

/**
 * Read-only filesystem access used by the checkers
 */
export interface Filesystem {
  /** Resolves to null when the path does not exist */
  stat(filePath: string): Promise<FileStat | null>;
  readText(filePath: string): Promise<string>;
  list(dirPath: string): Promise<DirectoryEntry[]>;
}

/**
 * A scheduled task as reported by the scheduler
 */
export interface ScheduledTaskInfo {
  name: string;
  state: string | null;
  lastRunTime: string | null;
  /** Null when the task came from the text fallback */
  lastResultCode: number | null;
  triggers: string[];
}

export interface SchedulerQuery {
  readonly fidelity: 'structured' | 'text';
  isAvailable(): Promise<boolean>;
  listTasks(namePattern: string): Promise<ScheduledTaskInfo[]>;
}

export interface SubprocessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
}

export interface SubprocessOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  cwd?: string;
}

export interface SubprocessRunner {
  run(command: string, args: string[], options?: SubprocessOptions): Promise<SubprocessResult>;
}

/**
 * Contents of a lease file
 */
export interface LeaseRecord {
  path: string;
  owner: string;
  pid: number;
  acquiredAt: string;
  staleAfterMinutes: number;
}

export type LeaseAcquireResult =
  | { status: 'acquired'; lease: LeaseRecord; replacedStale: boolean }
  | { status: 'held'; currentAgeMinutes: number; holder: LeaseRecord | null };

/**
 * Collaborators handed to every checker
 */
export interface CheckContext {
  fs: Filesystem;
  now: () => Date;
  config: AuditConfig;
  scheduler?: SchedulerQuery;
  runner?: SubprocessRunner;
  signal?: AbortSignal;
}
