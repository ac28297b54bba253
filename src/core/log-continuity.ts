import { AppendLogResource, CheckContext, CheckResult, Finding, FindingCode, FindingLevel } from '../types';
import { DECISION_PREVIEW_FIELDS } from '../config/pipeline-layout';
import { createFinding } from './findings';
import { classifyFreshness } from './freshness';
import { headerDocument, findMissingKeys, parseCsv, parseJsonDocument } from './schema-validator';

/**
 * Last `count` non-empty lines of a text, oldest first
 */
export function tailLines(text: string, count: number): string[] {
  if (count <= 0) return [];
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== '');
  return lines.slice(-count);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatValue(value: unknown): string {
  if (value === undefined) return 'n/a';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

/**
 * Check the tabular header contract: every required column present, order irrelevant.
 * Only the first line is parsed; later rows may be torn by the producer.
 */
export function checkHeader(resource: AppendLogResource, text: string, now: Date): Finding {
  const required = resource.requiredColumns ?? [];
  const [firstLine = ''] = text.split(/\r?\n/, 1);
  const parsed = parseCsv(firstLine);
  const doc = parsed.ok ? headerDocument(parsed.value) : {};
  const missing = findMissingKeys(doc, required);

  if (missing.length === 0) {
    return createFinding(FindingLevel.OK, resource.id, `header complete (${required.length} columns)`, now);
  }
  return createFinding(
    FindingLevel.Warn,
    resource.id,
    `header incomplete; expected columns: ${required.join(', ')}`,
    now,
    { code: FindingCode.InvalidSchema, details: { expected: required, missing } }
  );
}

/**
 * Parse the final line of a line-delimited JSON log.
 * The producer appends concurrently, so a torn last line is a warning only.
 */
export function checkLatestRecord(resource: AppendLogResource, text: string, now: Date): Finding {
  const tail = tailLines(text, 1);
  if (tail.length === 0) {
    return createFinding(FindingLevel.Warn, resource.id, 'parse failed: empty tail', now, {
      code: FindingCode.ParseFailure,
    });
  }

  const parsed = parseJsonDocument(tail[0]);
  const record = parsed.ok && isRecord(parsed.value) ? parsed.value : null;
  if (!record) {
    const error = parsed.ok ? 'latest record is not an object' : parsed.error;
    return createFinding(FindingLevel.Warn, resource.id, `parse failed: ${error}`, now, {
      code: FindingCode.ParseFailure,
      details: { error },
    });
  }

  const selected: Record<string, unknown> = {};
  for (const field of DECISION_PREVIEW_FIELDS) {
    selected[field] = record[field] ?? null;
  }
  const summary = DECISION_PREVIEW_FIELDS.map((f) => `${f}=${formatValue(record[f])}`).join(' ');
  return createFinding(FindingLevel.OK, resource.id, `latest record: ${summary}`, now, {
    details: { latest: selected },
  });
}

/**
 * Freshness plus the per-format continuity checks of one append log
 */
export async function checkAppendLog(resource: AppendLogResource, ctx: CheckContext): Promise<CheckResult> {
  const now = ctx.now();
  const stat = await ctx.fs.stat(resource.locator);
  const findings: Finding[] = [classifyFreshness(resource, stat, now)];
  if (!stat) {
    return { findings };
  }

  const text = await ctx.fs.readText(resource.locator);
  if (resource.format === 'csv') {
    findings.push(checkHeader(resource, text, now));
  } else {
    findings.push(checkLatestRecord(resource, text, now));
  }

  return {
    findings,
    detail: { tail: tailLines(text, ctx.config.logTailLines) },
  };
}
