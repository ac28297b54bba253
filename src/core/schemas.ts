/**
 * JSON schemas for the auditor's own documents.
 * The config schema gates loaded configuration; the report schema is the
 * published contract of persisted audit reports.
 */

export const AuditConfigSchema = {
  type: 'object',
  properties: {
    root: { type: 'string', minLength: 1 },
    ingestFreshnessMinutes: { type: 'number', exclusiveMinimum: 0 },
    logFreshnessMinutes: { type: 'number', exclusiveMinimum: 0 },
    analyticsFreshnessMinutes: { type: 'number', exclusiveMinimum: 0 },
    logTailLines: { type: 'integer', minimum: 0 },
    smokeTest: {
      type: 'object',
      properties: {
        enabled: { type: 'boolean' },
        command: { type: 'string', minLength: 1 },
        args: { type: 'array', items: { type: 'string' } },
        timeoutMs: { type: 'integer', minimum: 1 },
      },
      required: ['enabled', 'command', 'args', 'timeoutMs'],
      additionalProperties: false,
    },
    scheduler: {
      type: 'object',
      properties: {
        enabled: { type: 'boolean' },
        namePattern: { type: 'string', minLength: 1 },
      },
      required: ['enabled', 'namePattern'],
      additionalProperties: false,
    },
    reportDir: { type: 'string', minLength: 1 },
    leaseStaleMinutes: { type: 'number', exclusiveMinimum: 0 },
  },
  required: [
    'root',
    'ingestFreshnessMinutes',
    'logFreshnessMinutes',
    'analyticsFreshnessMinutes',
    'logTailLines',
    'smokeTest',
    'scheduler',
    'leaseStaleMinutes',
  ],
  additionalProperties: false,
};

const LevelCountsSchema = {
  type: 'object',
  properties: {
    OK: { type: 'integer', minimum: 0 },
    INFO: { type: 'integer', minimum: 0 },
    WARN: { type: 'integer', minimum: 0 },
    ERROR: { type: 'integer', minimum: 0 },
  },
  required: ['OK', 'INFO', 'WARN', 'ERROR'],
  additionalProperties: false,
};

const StageDetailSchema = {
  type: 'object',
  properties: {
    resources: { type: 'array', items: { type: 'string' } },
    counts: LevelCountsSchema,
    notes: { type: 'object' },
  },
  required: ['resources', 'counts', 'notes'],
};

export const AuditReportSchema = {
  type: 'object',
  properties: {
    schema: { const: 'pipeline.audit.report.v1' },
    id: { type: 'string', format: 'uuid' },
    startedAt: { type: 'string', format: 'date-time' },
    completedAt: { type: 'string', format: 'date-time' },
    root: { type: 'string' },
    status: { enum: ['READY', 'DEGRADED', 'NEEDS_FIXES'] },
    counts: LevelCountsSchema,
    findings: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          level: { enum: ['OK', 'INFO', 'WARN', 'ERROR'] },
          resourceId: { type: 'string' },
          message: { type: 'string' },
          producedAt: { type: 'string', format: 'date-time' },
          code: { type: 'string' },
          details: { type: 'object' },
        },
        required: ['level', 'resourceId', 'message', 'producedAt'],
      },
    },
    perStageDetail: {
      type: 'object',
      properties: {
        folders: StageDetailSchema,
        ingest: StageDetailSchema,
        agents: StageDetailSchema,
        engine: StageDetailSchema,
        logs: StageDetailSchema,
        analytics: StageDetailSchema,
        scheduler: StageDetailSchema,
      },
      required: ['folders', 'ingest', 'agents', 'engine', 'logs', 'analytics', 'scheduler'],
    },
  },
  required: [
    'schema',
    'id',
    'startedAt',
    'completedAt',
    'root',
    'status',
    'counts',
    'findings',
    'perStageDetail',
  ],
  additionalProperties: false,
};
