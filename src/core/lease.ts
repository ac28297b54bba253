import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LeaseAcquireResult, LeaseRecord } from '../types';

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function isLeaseRecord(value: unknown): value is LeaseRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'owner' in value &&
    typeof value.owner === 'string' &&
    'pid' in value &&
    typeof value.pid === 'number' &&
    'acquiredAt' in value &&
    typeof value.acquiredAt === 'string' &&
    'staleAfterMinutes' in value &&
    typeof value.staleAfterMinutes === 'number' &&
    'path' in value &&
    typeof value.path === 'string'
  );
}

export function defaultLeaseOwner(): string {
  return `${os.hostname()}:${process.pid}`;
}

interface LeaseInspection {
  holder: LeaseRecord | null;
  ageMinutes: number;
}

export type LeaseStatus =
  | { held: false }
  | { held: true; holder: LeaseRecord | null; ageMinutes: number; stale: boolean };

/**
 * Single-runner guard backed by a lock file.
 *
 * Creation is exclusive (`wx`); a lease older than the stale threshold is
 * taken over. Age comes from the recorded `acquiredAt`, or the file mtime
 * when the content cannot be read.
 */
export class FileLease {
  constructor(
    private leasePath: string,
    private owner: string = defaultLeaseOwner(),
    private now: () => Date = () => new Date()
  ) {}

  get path(): string {
    return this.leasePath;
  }

  public acquire(staleAfterMinutes: number): LeaseAcquireResult {
    fs.mkdirSync(path.dirname(this.leasePath), { recursive: true });
    const record = this.newRecord(staleAfterMinutes);

    if (this.tryCreate(this.leasePath, record)) {
      return { status: 'acquired', lease: record, replacedStale: false };
    }

    const existing = this.inspect();
    if (!existing) {
      // released between our create attempt and the inspection
      if (this.tryCreate(this.leasePath, record)) {
        return { status: 'acquired', lease: record, replacedStale: false };
      }
      return { status: 'held', currentAgeMinutes: 0, holder: this.readHolder() };
    }

    if (existing.ageMinutes > staleAfterMinutes) {
      return this.takeOver(record, existing);
    }
    return { status: 'held', currentAgeMinutes: existing.ageMinutes, holder: existing.holder };
  }

  /**
   * Replace a stale lease. Only the runner holding the `.takeover` guard may
   * do so, and it re-inspects the lease under the guard: a runner that saw
   * the same stale lease finds it fresh afterwards.
   */
  private takeOver(record: LeaseRecord, seen: LeaseInspection): LeaseAcquireResult {
    const staleAfterMinutes = record.staleAfterMinutes;
    const guardPath = `${this.leasePath}.takeover`;
    if (!this.tryCreate(guardPath, record)) {
      this.clearAbandonedGuard(guardPath, staleAfterMinutes);
      return { status: 'held', currentAgeMinutes: seen.ageMinutes, holder: seen.holder };
    }

    try {
      const current = this.inspect();
      if (!current) {
        if (this.tryCreate(this.leasePath, record)) {
          return { status: 'acquired', lease: record, replacedStale: false };
        }
        return { status: 'held', currentAgeMinutes: 0, holder: this.readHolder() };
      }
      if (current.ageMinutes <= staleAfterMinutes) {
        return { status: 'held', currentAgeMinutes: current.ageMinutes, holder: current.holder };
      }
      this.overwrite(record);
      return { status: 'acquired', lease: record, replacedStale: true };
    } finally {
      fs.rmSync(guardPath, { force: true });
    }
  }

  /**
   * A guard left behind by a runner that died mid-takeover is removed once it
   * is older than the stale threshold, so the next attempt can proceed.
   */
  private clearAbandonedGuard(guardPath: string, staleAfterMinutes: number): void {
    try {
      const ageMinutes = (this.now().getTime() - fs.statSync(guardPath).mtimeMs) / 60_000;
      if (ageMinutes > staleAfterMinutes) fs.rmSync(guardPath, { force: true });
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') throw error;
    }
  }

  /**
   * Remove the lease file if this owner holds it
   */
  public release(): boolean {
    const holder = this.readHolder();
    if (!holder || holder.owner !== this.owner) {
      return false;
    }
    try {
      fs.unlinkSync(this.leasePath);
      return true;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return false;
      throw error;
    }
  }

  public status(staleAfterMinutes: number): LeaseStatus {
    const existing = this.inspect();
    if (!existing) {
      return { held: false };
    }
    return {
      held: true,
      holder: existing.holder,
      ageMinutes: existing.ageMinutes,
      stale: existing.ageMinutes > staleAfterMinutes,
    };
  }

  private newRecord(staleAfterMinutes: number): LeaseRecord {
    return {
      path: this.leasePath,
      owner: this.owner,
      pid: process.pid,
      acquiredAt: this.now().toISOString(),
      staleAfterMinutes,
    };
  }

  private tryCreate(filePath: string, record: LeaseRecord): boolean {
    try {
      fs.writeFileSync(filePath, JSON.stringify(record, null, 2), { flag: 'wx' });
      return true;
    } catch (error) {
      if (errorCode(error) === 'EEXIST') return false;
      throw error;
    }
  }

  private overwrite(record: LeaseRecord): void {
    const tmpPath = `${this.leasePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(record, null, 2));
    fs.renameSync(tmpPath, this.leasePath);
  }

  private readHolder(): LeaseRecord | null {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.leasePath, 'utf-8'));
      return isLeaseRecord(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }

  private inspect(): LeaseInspection | null {
    let mtimeMs: number;
    try {
      mtimeMs = fs.statSync(this.leasePath).mtimeMs;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return null;
      throw error;
    }

    const holder = this.readHolder();
    const acquired = holder ? Date.parse(holder.acquiredAt) : NaN;
    const since = Number.isNaN(acquired) ? mtimeMs : acquired;
    return { holder, ageMinutes: (this.now().getTime() - since) / 60_000 };
  }
}
