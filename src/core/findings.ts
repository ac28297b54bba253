import {
  AuditStatus,
  Finding,
  FindingCode,
  FindingLevel,
  LevelCounts,
  Resource,
} from '../types';

export interface FindingExtras {
  code?: FindingCode;
  details?: Record<string, unknown>;
}

/**
 * Create a finding stamped with the given clock reading
 */
export function createFinding(
  level: FindingLevel,
  resourceId: string,
  message: string,
  now: Date,
  extras: FindingExtras = {}
): Finding {
  const finding: Finding = {
    level,
    resourceId,
    message,
    producedAt: now.toISOString(),
  };
  if (extras.code !== undefined) finding.code = extras.code;
  if (extras.details !== undefined) finding.details = extras.details;
  return finding;
}

/**
 * Reduce findings to one verdict. Order-independent.
 */
export function computeStatus(findings: readonly Finding[]): AuditStatus {
  if (findings.some((f) => f.level === FindingLevel.Error)) {
    return AuditStatus.NeedsFixes;
  }
  if (findings.some((f) => f.level === FindingLevel.Warn)) {
    return AuditStatus.Degraded;
  }
  return AuditStatus.Ready;
}

export function emptyCounts(): LevelCounts {
  return {
    [FindingLevel.OK]: 0,
    [FindingLevel.Info]: 0,
    [FindingLevel.Warn]: 0,
    [FindingLevel.Error]: 0,
  };
}

export function countByLevel(findings: readonly Finding[]): LevelCounts {
  const counts = emptyCounts();
  for (const finding of findings) {
    counts[finding.level] += 1;
  }
  return counts;
}

/**
 * Sort findings into registry order. Findings of the same resource keep
 * the order their checker produced them in; unknown resources sort last.
 */
export function sortByRegistry(findings: readonly Finding[], registry: readonly Resource[]): Finding[] {
  const rank = new Map<string, number>();
  registry.forEach((resource, index) => rank.set(resource.id, index));
  const last = registry.length;

  return findings
    .map((finding, index) => ({ finding, index }))
    .sort((a, b) => {
      const byResource = (rank.get(a.finding.resourceId) ?? last) - (rank.get(b.finding.resourceId) ?? last);
      return byResource !== 0 ? byResource : a.index - b.index;
    })
    .map(({ finding }) => finding);
}
