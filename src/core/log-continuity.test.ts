import { checkAppendLog, checkHeader, checkLatestRecord, tailLines } from './log-continuity';
import { AppendLogResource, AuditStage, FindingLevel, ResourceKind } from '../types';
import { RUN_LOG_COLUMNS } from '../config/pipeline-layout';
import { MemoryFilesystem, checkContext } from '../../tests/helpers/memory-filesystem';
import { NOW, RUN_LOG_HEADER } from '../../tests/helpers/pipeline-fixture';

const runCsv: AppendLogResource = {
  id: 'logs:run_csv',
  kind: ResourceKind.AppendLog,
  stage: AuditStage.Logs,
  locator: '/pipeline/logs/run.csv',
  freshnessBudgetMinutes: 180,
  format: 'csv',
  requiredColumns: [...RUN_LOG_COLUMNS],
};

const decisions: AppendLogResource = {
  id: 'logs:decisions_jsonl',
  kind: ResourceKind.AppendLog,
  stage: AuditStage.Logs,
  locator: '/pipeline/logs/decisions.jsonl',
  freshnessBudgetMinutes: 180,
  format: 'jsonl',
};

describe('log-continuity', () => {
  describe('tailLines', () => {
    it('should return the last non-empty lines, oldest first', () => {
      expect(tailLines('a\n\nb\r\nc\n\n', 2)).toEqual(['b', 'c']);
    });

    it('should return nothing for a zero count', () => {
      expect(tailLines('a\nb', 0)).toEqual([]);
    });
  });

  describe('checkHeader', () => {
    it('should accept the columns in any order', () => {
      const shuffled = [...RUN_LOG_COLUMNS].reverse().join(',');
      const finding = checkHeader(runCsv, `${shuffled}\n`, NOW);

      expect(finding.level).toBe(FindingLevel.OK);
      expect(finding.message).toBe('header complete (9 columns)');
    });

    it('should list the expected columns when one is missing', () => {
      const header = RUN_LOG_HEADER.replace(',mode', '');
      const finding = checkHeader(runCsv, `${header}\nrow\n`, NOW);

      expect(finding.level).toBe(FindingLevel.Warn);
      expect(finding.message).toBe(`header incomplete; expected columns: ${RUN_LOG_COLUMNS.join(', ')}`);
      expect(finding.details).toEqual({ expected: RUN_LOG_COLUMNS, missing: ['mode'] });
    });

    it('should ignore a torn final row', () => {
      const text =
        `${RUN_LOG_HEADER}\n` +
        '2025-09-19T11:55:00Z,BTC,65000,0.71,42.5,1.2,LONG,M,paper\n' +
        '2025-09-19T11:56:00Z,BTC,"650';

      const finding = checkHeader(runCsv, text, NOW);

      expect(finding.level).toBe(FindingLevel.OK);
      expect(finding.message).toBe('header complete (9 columns)');
    });
  });

  describe('checkLatestRecord', () => {
    it('should summarise the last record and mark absent fields', () => {
      const text = '{"signal":"FLAT"}\n{"signal":"SHORT","C_eff":0.5,"herald_ok":false}\n';
      const finding = checkLatestRecord(decisions, text, NOW);

      expect(finding.message).toBe(
        'latest record: signal=SHORT C_eff=0.5 phase_angle_deg=n/a volume_ratio=n/a size_band=n/a trap_T=n/a herald_ok=false'
      );
      expect(finding.details).toEqual({
        latest: {
          signal: 'SHORT',
          C_eff: 0.5,
          phase_angle_deg: null,
          volume_ratio: null,
          size_band: null,
          trap_T: null,
          herald_ok: false,
        },
      });
    });

    it('should warn on an empty log', () => {
      expect(checkLatestRecord(decisions, '\n', NOW).message).toBe('parse failed: empty tail');
    });

    it('should warn when the last record is not an object', () => {
      const finding = checkLatestRecord(decisions, '{"signal":"LONG"}\n[1,2]\n', NOW);

      expect(finding.level).toBe(FindingLevel.Warn);
      expect(finding.message).toBe('parse failed: latest record is not an object');
    });
  });

  describe('checkAppendLog', () => {
    it('should report only the missing file when the log is absent', async () => {
      const result = await checkAppendLog(decisions, checkContext(new MemoryFilesystem()));

      expect(result.findings.map((f) => f.message)).toEqual(['missing (/pipeline/logs/decisions.jsonl)']);
      expect(result.detail).toBeUndefined();
    });

    it('should attach the configured number of tail lines', async () => {
      const fs = new MemoryFilesystem().addFile(
        decisions.locator,
        '{"signal":"A"}\n{"signal":"B"}\n{"signal":"C"}\n',
        NOW.getTime() - 10 * 60_000
      );
      const ctx = checkContext(fs);
      ctx.config.logTailLines = 2;

      const result = await checkAppendLog(decisions, ctx);

      expect(result.findings[0].message).toBe('fresh (age 10.0 min, budget 180 min)');
      expect(result.detail).toEqual({ tail: ['{"signal":"B"}', '{"signal":"C"}'] });
    });
  });
});
