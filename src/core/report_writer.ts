import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import { AuditReport } from '../types';
import { ReportPersistError } from './errors';
import { AuditReportSchema } from './schemas';

const REPORT_PREFIX = 'audit_';
const REPORT_NAME = /^audit_(\d{8}_\d{6}Z)(?:_(\d+))?\.json$/;

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);
export const isAuditReport = ajv.compile<AuditReport>(AuditReportSchema);

/**
 * `2025-09-19T14:05:09.123Z` -> `20250919_140509Z`
 */
export function reportStamp(iso: string): string {
  const d = new Date(iso);
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}_` +
    `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}Z`
  );
}

/**
 * Persists audit reports, one file per run.
 * Reports appear complete or not at all; an existing report is never replaced.
 */
export class ReportWriter {
  private dirPath: string;

  constructor(dirPath: string) {
    this.dirPath = dirPath;
  }

  get directory(): string {
    return this.dirPath;
  }

  /**
   * Write the report and return its path. Throws ReportPersistError.
   *
   * The final name is claimed with a hard link, which fails when the name
   * is taken; a concurrent writer then moves on to the next suffix.
   */
  public write(report: AuditReport): string {
    const base = `${REPORT_PREFIX}${reportStamp(report.startedAt)}`;
    let filepath = path.join(this.dirPath, `${base}.json`);
    const tmpFilepath = path.join(this.dirPath, `${base}.${process.pid}.tmp`);

    try {
      fs.mkdirSync(this.dirPath, { recursive: true });
      fs.writeFileSync(tmpFilepath, JSON.stringify(report, null, 2));

      for (let n = 1; !this.claim(tmpFilepath, filepath); n++) {
        filepath = path.join(this.dirPath, `${base}_${n}.json`);
      }
      return filepath;
    } catch (e) {
      throw new ReportPersistError(filepath, e);
    } finally {
      try {
        if (fs.existsSync(tmpFilepath)) fs.unlinkSync(tmpFilepath);
      } catch (cleanupError) {
        console.error(`Failed to remove temporary report ${tmpFilepath}: ${cleanupError}`);
      }
    }
  }

  private claim(source: string, target: string): boolean {
    try {
      fs.linkSync(source, target);
      return true;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') return false;
      throw error;
    }
  }

  /**
   * Report file names, newest first. Same-second reports order by suffix.
   */
  public list(): string[] {
    if (!fs.existsSync(this.dirPath)) return [];
    return fs
      .readdirSync(this.dirPath)
      .map((name) => ({ name, match: REPORT_NAME.exec(name) }))
      .flatMap(({ name, match }) => (match ? [{ name, stamp: match[1], suffix: Number(match[2] ?? 0) }] : []))
      .sort((a, b) => (a.stamp === b.stamp ? b.suffix - a.suffix : a.stamp < b.stamp ? 1 : -1))
      .map(({ name }) => name);
  }

  /**
   * Load the most recent report, or null when none was written yet.
   * Throws when the newest file is not a valid report.
   */
  public loadLatest(): AuditReport | null {
    const [latest] = this.list();
    if (!latest) return null;
    const content = fs.readFileSync(path.join(this.dirPath, latest), 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (!isAuditReport(parsed)) {
      throw new Error(`${latest} is not a valid audit report: ${ajv.errorsText(isAuditReport.errors)}`);
    }
    return parsed;
  }
}
