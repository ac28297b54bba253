import * as path from 'path';
import {
  AuditStage,
  CheckContext,
  CheckResult,
  DirectoryResource,
  Finding,
  FindingCode,
  FindingLevel,
  FreshFileResource,
  Resource,
  ResourceKind,
  StructuredFileResource,
} from '../types';
import { createFinding } from './findings';
import { ageMinutes, classifyFreshness } from './freshness';
import { checkAppendLog, tailLines } from './log-continuity';
import { checkPairedArtifact } from './paired-artifacts';
import { inspectScheduler } from './scheduler';
import { parseNumericText, validateStructuredDocument } from './schema-validator';
import { runSmokeTest } from './smoke-test';

/**
 * Folder presence, or freshness of the newest child directory
 */
export async function checkDirectory(resource: DirectoryResource, ctx: CheckContext): Promise<CheckResult> {
  const now = ctx.now();
  const stat = await ctx.fs.stat(resource.locator);
  const missingLevel = resource.foundational ? FindingLevel.Error : FindingLevel.Warn;

  if (!stat || !stat.isDirectory) {
    return { findings: [classifyFreshness(resource, null, now, missingLevel)] };
  }

  if (resource.mode === 'presence') {
    return { findings: [createFinding(FindingLevel.OK, resource.id, 'present', now)] };
  }

  const subdirs = (await ctx.fs.list(resource.locator)).filter((entry) => entry.isDirectory);
  if (subdirs.length === 0) {
    return {
      findings: [
        createFinding(FindingLevel.Warn, resource.id, `no report subdirectory in ${resource.locator}`, now, {
          code: FindingCode.MissingResource,
        }),
      ],
    };
  }

  const latest = subdirs.reduce((best, entry) =>
    entry.mtimeMs > best.mtimeMs || (entry.mtimeMs === best.mtimeMs && entry.name > best.name) ? entry : best
  );
  const finding = classifyFreshness(
    {
      id: resource.id,
      locator: path.join(resource.locator, latest.name),
      freshnessBudgetMinutes: resource.freshnessBudgetMinutes,
    },
    { mtimeMs: latest.mtimeMs, isDirectory: true },
    now
  );
  return {
    findings: [{ ...finding, message: `${latest.name}: ${finding.message}` }],
    detail: { latest: latest.name, subdirectories: subdirs.length },
  };
}

/**
 * Freshness of a single file plus its content rule
 */
export async function checkFreshFile(resource: FreshFileResource, ctx: CheckContext): Promise<CheckResult> {
  const now = ctx.now();
  const stat = await ctx.fs.stat(resource.locator);

  if (resource.content === 'heartbeat') {
    if (!stat) {
      return { findings: [createFinding(FindingLevel.Info, resource.id, 'no heartbeat recorded', now)] };
    }
    const [last] = tailLines(await ctx.fs.readText(resource.locator), 1);
    const age = Math.round(ageMinutes(stat.mtimeMs, now) * 10) / 10;
    return {
      findings: [
        createFinding(FindingLevel.Info, resource.id, `last heartbeat: ${last ?? 'n/a'}`, now, {
          details: { ageMinutes: age },
        }),
      ],
    };
  }

  const findings: Finding[] = [classifyFreshness(resource, stat, now)];
  if (!stat) {
    return { findings };
  }

  const detail: Record<string, unknown> = {};
  if (resource.content === 'numeric') {
    const text = await ctx.fs.readText(resource.locator);
    const value = parseNumericText(text);
    detail.value = value;
    if (value === null) {
      findings.push(
        createFinding(FindingLevel.Warn, resource.id, `not numeric (${JSON.stringify(text.trim())})`, now, {
          code: FindingCode.ParseFailure,
        })
      );
    } else {
      findings.push(createFinding(FindingLevel.OK, resource.id, `value=${value}`, now));
    }
  }

  if (resource.content === 'presence' && resource.stage === AuditStage.Engine && ctx.config.smokeTest.enabled) {
    const smoke = await runSmokeTest(resource.id, resource.locator, ctx);
    findings.push(smoke);
    detail.smoke = smoke.details ?? null;
  }

  return { findings, detail };
}

export async function checkStructuredFile(
  resource: StructuredFileResource,
  ctx: CheckContext
): Promise<CheckResult> {
  const now = ctx.now();
  const stat = await ctx.fs.stat(resource.locator);
  const findings: Finding[] = [classifyFreshness(resource, stat, now)];
  if (!stat) {
    return { findings };
  }
  const text = await ctx.fs.readText(resource.locator);
  findings.push(...validateStructuredDocument(resource, text, now));
  return { findings };
}

function dispatch(resource: Resource, ctx: CheckContext): Promise<CheckResult> {
  switch (resource.kind) {
    case ResourceKind.Directory:
      return checkDirectory(resource, ctx);
    case ResourceKind.FreshFile:
      return checkFreshFile(resource, ctx);
    case ResourceKind.StructuredFile:
      return checkStructuredFile(resource, ctx);
    case ResourceKind.PairedArtifact:
      return checkPairedArtifact(resource, ctx);
    case ResourceKind.AppendLog:
      return checkAppendLog(resource, ctx);
    case ResourceKind.SchedulerTaskGroup:
      return inspectScheduler(resource, ctx);
    default: {
      const unknown: never = resource;
      throw new Error(`Unknown resource kind: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Route a resource to its checker.
 * A checker that throws is recovered into a single WARN so one bad
 * resource never aborts the audit.
 */
export async function checkResource(resource: Resource, ctx: CheckContext): Promise<CheckResult> {
  try {
    return await dispatch(resource, ctx);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      findings: [
        createFinding(FindingLevel.Warn, resource.id, `check failed: ${message}`, ctx.now(), {
          code: FindingCode.ParseFailure,
        }),
      ],
    };
  }
}
