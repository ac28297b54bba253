import * as path from 'path';
import {
  AuditConfig,
  AuditStage,
  Resource,
  ResourceKind,
} from '../types';
import {
  AGENTS_DIR,
  ANALYTICS_DIR,
  DECISIONS_LOG_JSONL,
  ENGINE_SCRIPT,
  FLOWS_FILE,
  FLOWS_REQUIRED_KEYS,
  FOUNDATIONAL_DIRS,
  HEADLINES_FILE,
  HEARTBEAT_FILE,
  INSTRUMENTS,
  PRESSURE_FILE,
  PRESSURE_REQUIRED_KEYS,
  RUN_LOG_COLUMNS,
  RUN_LOG_CSV,
  SCHEDULER_ROLES,
  SENTIMENT_INDEX_FILE,
} from '../config/pipeline-layout';

/**
 * Declares every resource the pipeline depends on, in audit order.
 *
 * Building the registry never touches the filesystem and never fails:
 * unresolved paths are plain descriptors that the checkers later report
 * as missing.
 */
export function buildRegistry(config: AuditConfig): Resource[] {
  const at = (relative: string) => path.join(config.root, ...relative.split('/'));
  const resources: Resource[] = [];

  for (const dir of FOUNDATIONAL_DIRS) {
    resources.push({
      id: `dir:${dir}`,
      kind: ResourceKind.Directory,
      stage: AuditStage.Folders,
      locator: at(dir),
      foundational: true,
      mode: 'presence',
    });
  }

  resources.push(
    {
      id: 'ingest:sentiment_index',
      kind: ResourceKind.FreshFile,
      stage: AuditStage.Ingest,
      locator: at(SENTIMENT_INDEX_FILE),
      freshnessBudgetMinutes: config.ingestFreshnessMinutes,
      content: 'numeric',
    },
    {
      id: 'ingest:headlines',
      kind: ResourceKind.StructuredFile,
      stage: AuditStage.Ingest,
      locator: at(HEADLINES_FILE),
      freshnessBudgetMinutes: config.ingestFreshnessMinutes,
      format: 'csv',
      // written headerless by the producer, so only parseability is checked
      requiredKeys: [],
    },
    {
      id: 'ingest:flows',
      kind: ResourceKind.StructuredFile,
      stage: AuditStage.Ingest,
      locator: at(FLOWS_FILE),
      freshnessBudgetMinutes: config.ingestFreshnessMinutes,
      format: 'json',
      requiredKeys: [...FLOWS_REQUIRED_KEYS],
    },
    {
      id: 'ingest:pressure',
      kind: ResourceKind.StructuredFile,
      stage: AuditStage.Ingest,
      locator: at(PRESSURE_FILE),
      freshnessBudgetMinutes: config.ingestFreshnessMinutes,
      format: 'json',
      requiredKeys: [...PRESSURE_REQUIRED_KEYS],
      numericRange: { key: 'pressure', min: -1, max: 1 },
    }
  );

  for (const instrument of INSTRUMENTS) {
    resources.push({
      id: `agents:${instrument}`,
      kind: ResourceKind.PairedArtifact,
      stage: AuditStage.Agents,
      locator: at(`${AGENTS_DIR}/${instrument}_A.json`),
      secondaryLocator: at(`${AGENTS_DIR}/${instrument}_B.json`),
      instrument,
    });
  }

  resources.push(
    {
      id: 'engine:script',
      kind: ResourceKind.FreshFile,
      stage: AuditStage.Engine,
      locator: at(ENGINE_SCRIPT),
      content: 'presence',
    },
    {
      id: 'engine:heartbeat',
      kind: ResourceKind.FreshFile,
      stage: AuditStage.Engine,
      locator: at(HEARTBEAT_FILE),
      content: 'heartbeat',
    },
    {
      id: 'logs:run_csv',
      kind: ResourceKind.AppendLog,
      stage: AuditStage.Logs,
      locator: at(RUN_LOG_CSV),
      freshnessBudgetMinutes: config.logFreshnessMinutes,
      format: 'csv',
      requiredColumns: [...RUN_LOG_COLUMNS],
    },
    {
      id: 'logs:decisions_jsonl',
      kind: ResourceKind.AppendLog,
      stage: AuditStage.Logs,
      locator: at(DECISIONS_LOG_JSONL),
      freshnessBudgetMinutes: config.logFreshnessMinutes,
      format: 'jsonl',
    },
    {
      id: 'analytics:latest',
      kind: ResourceKind.Directory,
      stage: AuditStage.Analytics,
      locator: at(ANALYTICS_DIR),
      freshnessBudgetMinutes: config.analyticsFreshnessMinutes,
      foundational: false,
      mode: 'latest-subdirectory',
    }
  );

  if (config.scheduler.enabled) {
    resources.push({
      id: 'scheduler:tasks',
      kind: ResourceKind.SchedulerTaskGroup,
      stage: AuditStage.Scheduler,
      locator: config.scheduler.namePattern,
      roles: SCHEDULER_ROLES.map((role) => ({ name: role.name, substrings: [...role.substrings] })),
    });
  }

  return resources;
}
