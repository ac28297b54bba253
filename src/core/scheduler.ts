import {
  CheckContext,
  CheckResult,
  Finding,
  FindingCode,
  FindingLevel,
  ScheduledTaskInfo,
  SchedulerQuery,
  SchedulerRole,
  SchedulerTaskGroupResource,
  SubprocessRunner,
} from '../types';
import { createFinding } from './findings';

const POWERSHELL = 'powershell.exe';
const POWERSHELL_ARGS = ['-NoProfile', '-NonInteractive', '-Command'];
const QUERY_TIMEOUT_MS = 30_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function escapePowerShellLiteral(value: string): string {
  return value.replace(/'/g, "''");
}

/**
 * Normalise a scheduler timestamp to ISO-8601.
 * Windows PowerShell 5 serialises dates as "/Date(<epoch ms>)/".
 */
export function normalizeTaskTime(value: unknown): string | null {
  if (typeof value !== 'string' || value.trim() === '') return null;
  const legacy = /\/Date\((-?\d+)\)\//.exec(value);
  if (legacy) {
    return new Date(Number(legacy[1])).toISOString();
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? value.trim() : new Date(parsed).toISOString();
}

/**
 * Parse the ConvertTo-Json output of the structured query.
 * A single task serialises as an object, none as empty output.
 */
export function parseStructuredTasks(output: string): ScheduledTaskInfo[] {
  const trimmed = output.trim();
  if (trimmed === '') return [];
  const parsed: unknown = JSON.parse(trimmed);
  const items = Array.isArray(parsed) ? parsed : [parsed];

  return items.filter(isRecord).map((item) => ({
    name: String(item.Name ?? ''),
    state: typeof item.State === 'string' ? item.State : null,
    lastRunTime: normalizeTaskTime(item.LastRunTime),
    lastResultCode: typeof item.LastTaskResult === 'number' ? item.LastTaskResult : null,
    triggers: Array.isArray(item.Triggers) ? item.Triggers.map((t) => String(t)) : [],
  }));
}

/**
 * Scan `schtasks /query /fo LIST /v` output for task names containing the pattern.
 * Verbose listings repeat a task once per trigger; repeats are merged.
 */
export function parseTextListing(output: string, namePattern: string): ScheduledTaskInfo[] {
  const needle = namePattern.toLowerCase();
  const byName = new Map<string, ScheduledTaskInfo>();
  let current: ScheduledTaskInfo | null = null;

  for (const rawLine of output.split(/\r?\n/)) {
    const match = /^\s*([^:]+?):\s*(.*)$/.exec(rawLine);
    if (!match) continue;
    const [, label, value] = match;
    const key = label.toLowerCase();

    if (key === 'taskname') {
      const name = value.trim().replace(/^\\+/, '');
      if (!name.toLowerCase().includes(needle)) {
        current = null;
        continue;
      }
      current = byName.get(name) ?? { name, state: null, lastRunTime: null, lastResultCode: null, triggers: [] };
      byName.set(name, current);
    } else if (current && key === 'last run time') {
      current.lastRunTime = value.trim() || null;
    } else if (current && key === 'status') {
      current.state = value.trim() || null;
    } else if (current && key === 'schedule type') {
      const trigger = value.trim();
      if (trigger && !current.triggers.includes(trigger)) current.triggers.push(trigger);
    }
  }

  return [...byName.values()];
}

/**
 * Structured query through PowerShell's ScheduledTasks module
 */
export class StructuredSchedulerQuery implements SchedulerQuery {
  readonly fidelity = 'structured' as const;

  constructor(private runner: SubprocessRunner) {}

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner.run(
        POWERSHELL,
        [...POWERSHELL_ARGS, 'Get-Command Get-ScheduledTask -ErrorAction Stop | Out-Null'],
        { timeoutMs: QUERY_TIMEOUT_MS }
      );
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }

  async listTasks(namePattern: string): Promise<ScheduledTaskInfo[]> {
    const pattern = escapePowerShellLiteral(namePattern);
    const script = [
      `Get-ScheduledTask | Where-Object { $_.TaskName -like '*${pattern}*' } | ForEach-Object {`,
      '  $info = $_ | Get-ScheduledTaskInfo;',
      '  [pscustomobject]@{ Name = $_.TaskName; State = [string]$_.State;',
      '    LastRunTime = $info.LastRunTime; LastTaskResult = $info.LastTaskResult;',
      '    Triggers = @($_.Triggers | ForEach-Object { $_.CimClass.CimClassName }) }',
      '} | ConvertTo-Json -Depth 4',
    ].join(' ');

    const result = await this.runner.run(POWERSHELL, [...POWERSHELL_ARGS, script], {
      timeoutMs: QUERY_TIMEOUT_MS,
    });
    if (result.exitCode !== 0) {
      throw new Error(`Get-ScheduledTask exited with ${result.exitCode}: ${result.stderr.trim()}`);
    }
    return parseStructuredTasks(result.stdout);
  }
}

/**
 * Text fallback over the schtasks listing. No structured last-result code.
 */
export class TextSchedulerQuery implements SchedulerQuery {
  readonly fidelity = 'text' as const;

  constructor(private runner: SubprocessRunner) {}

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner.run('schtasks', ['/?'], { timeoutMs: QUERY_TIMEOUT_MS });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }

  async listTasks(namePattern: string): Promise<ScheduledTaskInfo[]> {
    const result = await this.runner.run('schtasks', ['/query', '/fo', 'LIST', '/v'], {
      timeoutMs: QUERY_TIMEOUT_MS,
    });
    if (result.exitCode !== 0) {
      throw new Error(`schtasks exited with ${result.exitCode}: ${result.stderr.trim()}`);
    }
    return parseTextListing(result.stdout, namePattern);
  }
}

/**
 * Query implementations in preference order
 */
export function defaultSchedulerQueries(runner: SubprocessRunner): SchedulerQuery[] {
  return [new StructuredSchedulerQuery(runner), new TextSchedulerQuery(runner)];
}

/**
 * Query implementation that probes its candidates at call time and falls
 * back to the next one when a query is unavailable or fails.
 */
export class FallbackSchedulerQuery implements SchedulerQuery {
  private lastUsed: SchedulerQuery | null = null;
  private failures: string[] = [];

  constructor(private candidates: SchedulerQuery[]) {}

  get fidelity(): 'structured' | 'text' {
    return this.lastUsed?.fidelity ?? this.candidates[0]?.fidelity ?? 'text';
  }

  /** Failures of the last listTasks call, one per skipped candidate */
  get queryFailures(): string[] {
    return [...this.failures];
  }

  async isAvailable(): Promise<boolean> {
    for (const candidate of this.candidates) {
      if (await candidate.isAvailable()) return true;
    }
    return false;
  }

  async listTasks(namePattern: string): Promise<ScheduledTaskInfo[]> {
    this.failures = [];
    this.lastUsed = null;
    for (const candidate of this.candidates) {
      if (!(await candidate.isAvailable())) {
        this.failures.push(`${candidate.fidelity}: unavailable`);
        continue;
      }
      try {
        const tasks = await candidate.listTasks(namePattern);
        this.lastUsed = candidate;
        return tasks;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.failures.push(`${candidate.fidelity}: ${message}`);
      }
    }
    throw new Error(`no scheduler query succeeded (${this.failures.join('; ')})`);
  }
}

/**
 * Tasks whose name contains any of the role's substrings (case-insensitive)
 */
export function tasksForRole(tasks: readonly ScheduledTaskInfo[], role: SchedulerRole): ScheduledTaskInfo[] {
  const needles = role.substrings.map((s) => s.toLowerCase());
  return tasks
    .filter((task) => needles.some((needle) => task.name.toLowerCase().includes(needle)))
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Inspect the scheduler for the group's task roles.
 * A missing role is WARN: scheduling gaps do not invalidate current data.
 */
export async function inspectScheduler(
  resource: SchedulerTaskGroupResource,
  ctx: CheckContext
): Promise<CheckResult> {
  const query = ctx.scheduler;
  let tasks: ScheduledTaskInfo[] = [];
  let queryError: string | null = null;

  if (!query) {
    queryError = 'no scheduler query configured';
  } else {
    try {
      tasks = await query.listTasks(resource.locator);
    } catch (error) {
      queryError = error instanceof Error ? error.message : String(error);
    }
  }

  const now = ctx.now();
  const findings: Finding[] = [];
  for (const role of resource.roles) {
    const matched = tasksForRole(tasks, role);
    if (matched.length === 0) {
      const reason = queryError ? ` (${queryError})` : '';
      findings.push(
        createFinding(
          FindingLevel.Warn,
          resource.id,
          `no ${role.name} task matching "${resource.locator}"${reason}`,
          now,
          { code: FindingCode.MissingResource, details: { role: role.name } }
        )
      );
      continue;
    }
    for (const task of matched) {
      findings.push(
        createFinding(
          FindingLevel.OK,
          resource.id,
          `[${role.name}] ${task.name} last_run=${task.lastRunTime ?? 'n/a'} last_result=${task.lastResultCode ?? 'n/a'}`,
          now,
          { details: { role: role.name, ...task } }
        )
      );
    }
  }

  const detail: Record<string, unknown> = {
    fidelity: query && !queryError ? query.fidelity : null,
    tasks: tasks.map((t) => t.name),
  };
  if (query instanceof FallbackSchedulerQuery && query.queryFailures.length > 0) {
    detail.queryFailures = query.queryFailures.map((message) => ({
      code: FindingCode.SchedulerQueryFailure,
      message,
    }));
  }
  if (queryError) detail.error = queryError;
  return { findings, detail };
}
