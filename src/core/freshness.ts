import { FileStat, Finding, FindingCode, FindingLevel } from '../types';
import { createFinding } from './findings';

const MS_PER_MINUTE = 60_000;

/**
 * Age in minutes between a modification time and now.
 * Both sides are epoch based, so host timezone never enters the result.
 */
export function ageMinutes(mtimeMs: number, now: Date): number {
  return (now.getTime() - mtimeMs) / MS_PER_MINUTE;
}

export function formatMinutes(minutes: number): string {
  return `${minutes.toFixed(1)} min`;
}

export interface FreshnessTarget {
  id: string;
  locator: string;
  freshnessBudgetMinutes?: number;
}

/**
 * Classify a resource by existence and age.
 *
 * - absent: WARN "missing" (or `missingLevel`)
 * - age within budget, or no budget: OK
 * - age over budget: WARN "stale"
 */
export function classifyFreshness(
  target: FreshnessTarget,
  stat: FileStat | null,
  now: Date,
  missingLevel: FindingLevel = FindingLevel.Warn
): Finding {
  if (!stat) {
    return createFinding(missingLevel, target.id, `missing (${target.locator})`, now, {
      code: FindingCode.MissingResource,
      details: { path: target.locator },
    });
  }

  const age = ageMinutes(stat.mtimeMs, now);
  const roundedAge = Math.round(age * 10) / 10;
  const budget = target.freshnessBudgetMinutes;

  if (budget === undefined) {
    return createFinding(FindingLevel.OK, target.id, 'present', now, {
      details: { path: target.locator, ageMinutes: roundedAge },
    });
  }

  const details = { path: target.locator, ageMinutes: roundedAge, budgetMinutes: budget };
  if (age <= budget) {
    return createFinding(
      FindingLevel.OK,
      target.id,
      `fresh (age ${formatMinutes(age)}, budget ${budget} min)`,
      now,
      { details }
    );
  }
  return createFinding(
    FindingLevel.Warn,
    target.id,
    `stale (age ${formatMinutes(age)}, budget ${budget} min)`,
    now,
    { code: FindingCode.StaleResource, details }
  );
}
