import {
  Finding,
  FindingCode,
  FindingLevel,
  NumericRange,
  StructuredFileResource,
} from '../types';
import { createFinding } from './findings';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface PathPresence {
  path: string;
  present: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Walk a dot-separated path through nested objects.
 * A key whose value is null is present; only a missing key is absent.
 */
export function resolvePath(doc: unknown, keyPath: string): { present: boolean; value: unknown } {
  let node: unknown = doc;
  for (const segment of keyPath.split('.')) {
    if (!isRecord(node) || !Object.prototype.hasOwnProperty.call(node, segment)) {
      return { present: false, value: undefined };
    }
    node = node[segment];
  }
  return { present: true, value: node };
}

export function checkPresence(doc: unknown, keyPaths: readonly string[]): PathPresence[] {
  return keyPaths.map((keyPath) => ({ path: keyPath, present: resolvePath(doc, keyPath).present }));
}

/**
 * Required keys absent from the document, sorted and de-duplicated
 */
export function findMissingKeys(doc: unknown, keyPaths: readonly string[]): string[] {
  const missing = checkPresence(doc, keyPaths)
    .filter((p) => !p.present)
    .map((p) => p.path);
  return [...new Set(missing)].sort();
}

export function parseJsonDocument(text: string): ParseResult<unknown> {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

/**
 * Parse CSV text into rows (RFC 4180 quoting, CRLF or LF line ends).
 * Blank lines are skipped. Empty input and unterminated quotes fail.
 */
export function parseCsv(text: string): ParseResult<string[][]> {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;

  const endRow = () => {
    row.push(field);
    if (row.length > 1 || row[0] !== '') rows.push(row);
    row = [];
    field = '';
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"' && !fieldStarted) {
      inQuotes = true;
      fieldStarted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
      fieldStarted = false;
    } else if (ch === '\n') {
      endRow();
    } else if (ch === '\r') {
      if (text[i + 1] !== '\n') endRow();
    } else {
      field += ch;
      fieldStarted = true;
    }
  }

  if (inQuotes) {
    return { ok: false, error: 'unterminated quoted field' };
  }
  if (field !== '' || row.length > 0) endRow();
  if (rows.length === 0) {
    return { ok: false, error: 'empty document' };
  }
  return { ok: true, value: rows };
}

/**
 * Turn the first CSV row into a key-value document whose keys are the column names
 */
export function headerDocument(rows: string[][]): Record<string, true> {
  const doc: Record<string, true> = {};
  for (const column of rows[0] ?? []) {
    doc[column.trim()] = true;
  }
  return doc;
}

export interface RangeEvaluation {
  valid: boolean;
  present: boolean;
  value: unknown;
}

/**
 * Closed-interval check. Absent or non-numeric values are invalid.
 */
export function evaluateRange(doc: unknown, range: NumericRange): RangeEvaluation {
  const { present, value } = resolvePath(doc, range.key);
  const valid =
    typeof value === 'number' && Number.isFinite(value) && value >= range.min && value <= range.max;
  return { valid, present, value };
}

const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseNumericText(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_NUMBER.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Validate the contents of a structured ingest artifact.
 * A parse failure yields one finding and suppresses the key checks.
 */
export function validateStructuredDocument(
  resource: StructuredFileResource,
  text: string,
  now: Date
): Finding[] {
  let doc: unknown;
  let rowCount: number | null = null;

  if (resource.format === 'json') {
    const parsed = parseJsonDocument(text);
    if (!parsed.ok) {
      return [parseFailure(resource.id, parsed.error, now)];
    }
    doc = parsed.value;
  } else {
    const parsed = parseCsv(text);
    if (!parsed.ok) {
      return [parseFailure(resource.id, parsed.error, now)];
    }
    doc = headerDocument(parsed.value);
    rowCount = parsed.value.length;
  }

  const findings: Finding[] = [];

  if (resource.requiredKeys.length > 0) {
    const missing = findMissingKeys(doc, resource.requiredKeys);
    if (missing.length > 0) {
      findings.push(
        createFinding(FindingLevel.Warn, resource.id, `missing keys: ${missing.join(', ')}`, now, {
          code: FindingCode.InvalidSchema,
          details: { missingKeys: missing },
        })
      );
    } else {
      findings.push(
        createFinding(
          FindingLevel.OK,
          resource.id,
          `schema complete (${resource.requiredKeys.length} keys)`,
          now
        )
      );
    }
  } else if (rowCount !== null) {
    findings.push(createFinding(FindingLevel.OK, resource.id, `parsed (${rowCount} rows)`, now));
  }

  if (resource.numericRange) {
    findings.push(rangeFinding(resource.id, doc, resource.numericRange, now));
  }

  return findings;
}

function rangeFinding(resourceId: string, doc: unknown, range: NumericRange, now: Date): Finding {
  const result = evaluateRange(doc, range);
  const bounds = `[${range.min}, ${range.max}]`;
  if (result.valid) {
    return createFinding(
      FindingLevel.OK,
      resourceId,
      `${range.key}=${String(result.value)} within ${bounds}`,
      now
    );
  }
  return createFinding(
    FindingLevel.Warn,
    resourceId,
    `${range.key} invalid or out of range ${bounds}`,
    now,
    {
      code: FindingCode.OutOfRangeValue,
      details: { key: range.key, value: result.present ? result.value : null, present: result.present },
    }
  );
}

export function parseFailure(resourceId: string, error: string, now: Date): Finding {
  return createFinding(FindingLevel.Warn, resourceId, `parse failed: ${error}`, now, {
    code: FindingCode.ParseFailure,
    details: { error },
  });
}
