import * as fs from 'fs';
import * as path from 'path';
import {
  ExitCode,
  failOnReached,
  parseLeaseAction,
  parseStatus,
  resolveAuditConfig,
  runAuditCommand,
  runLeaseCommand,
  showLatestReport,
} from './commands';
import { ROOT_ENV_VAR } from '../config';
import { ConfigValidationError } from '../core/errors';
import { plainColors } from '../core/logger';
import { AuditStatus } from '../types';
import {
  HEALTHY_TASKS,
  PipelineFixture,
  StaticSchedulerQuery,
  fixedClock,
} from '../../tests/helpers/pipeline-fixture';

/**
 * CLI Command Logic
 *
 * The commander wiring in index.ts only parses flags; these tests cover the
 * command functions it delegates to.
 */

const makeLogger = () => ({ log: jest.fn(), warn: jest.fn(), error: jest.fn() });

describe('CLI Command Logic', () => {
  let fixture: PipelineFixture;
  const savedRoot = process.env[ROOT_ENV_VAR];

  beforeEach(() => {
    delete process.env[ROOT_ENV_VAR];
    fixture = PipelineFixture.create().populateHealthy();
  });

  afterEach(() => {
    fixture.cleanup();
    if (savedRoot !== undefined) process.env[ROOT_ENV_VAR] = savedRoot;
  });

  describe('status parsing', () => {
    it('should accept statuses case-insensitively', () => {
      expect(parseStatus('degraded')).toBe(AuditStatus.Degraded);
      expect(parseStatus('needs-fixes')).toBe(AuditStatus.NeedsFixes);
      expect(parseStatus('bogus')).toBeNull();
    });

    it('should compare statuses by severity', () => {
      expect(failOnReached(AuditStatus.Degraded, AuditStatus.Degraded)).toBe(true);
      expect(failOnReached(AuditStatus.NeedsFixes, AuditStatus.Degraded)).toBe(true);
      expect(failOnReached(AuditStatus.Ready, AuditStatus.Degraded)).toBe(false);
      expect(failOnReached(AuditStatus.Degraded, AuditStatus.NeedsFixes)).toBe(false);
    });
  });

  describe('resolveAuditConfig', () => {
    it('should let flags override the defaults', () => {
      const config = resolveAuditConfig(
        { root: 'pipe', out: 'out', smoke: true, scheduler: false },
        fixture.root
      );

      expect(config.root).toBe(path.resolve(fixture.root, 'pipe'));
      expect(config.reportDir).toBe(path.resolve(fixture.root, 'out'));
      expect(config.smokeTest.enabled).toBe(true);
      expect(config.scheduler.enabled).toBe(false);
    });

    it('should read an explicit config file', () => {
      fixture.write('custom.yml', 'logTailLines: 5\nscheduler:\n  namePattern: NIGHTLY\n');

      const config = resolveAuditConfig({ config: 'custom.yml' }, fixture.root);

      expect(config.logTailLines).toBe(5);
      expect(config.scheduler).toEqual({ enabled: true, namePattern: 'NIGHTLY' });
    });

    it('should reject an invalid configuration', () => {
      fixture.write('bad.yml', 'logTailLines: -2\n');

      expect(() => resolveAuditConfig({ config: 'bad.yml' }, fixture.root)).toThrow(ConfigValidationError);
    });
  });

  describe('audit command logic', () => {
    const options = () => ({ now: fixedClock, scheduler: new StaticSchedulerQuery(HEALTHY_TASKS) });

    it('should stream findings and end with the status line', async () => {
      const logger = makeLogger();

      const code = await runAuditCommand(fixture.config(), null, logger, options(), plainColors);

      expect(code).toBe(ExitCode.Ok);
      expect(logger.log).toHaveBeenCalledWith('[OK] dir:agents: present');
      expect(logger.log).toHaveBeenLastCalledWith('STATUS: READY');
    });

    it('should exit 2 when the fail-on threshold is reached', async () => {
      fixture.age('data/flows_btc.json', 120);
      const logger = makeLogger();

      const code = await runAuditCommand(fixture.config(), AuditStatus.Degraded, logger, options(), plainColors);

      expect(code).toBe(ExitCode.Threshold);
      expect(logger.warn).toHaveBeenCalledWith('[WARN] ingest:flows: stale (age 120.0 min, budget 90 min)');
      expect(logger.log).toHaveBeenLastCalledWith('STATUS: DEGRADED');
    });

    it('should exit 0 when the status is better than the threshold', async () => {
      fixture.age('data/flows_btc.json', 120);

      const code = await runAuditCommand(
        fixture.config(),
        AuditStatus.NeedsFixes,
        makeLogger(),
        options(),
        plainColors
      );

      expect(code).toBe(ExitCode.Ok);
    });

    it('should exit 1 when the report cannot be persisted', async () => {
      fixture.write('blocker', 'not a directory');
      const logger = makeLogger();

      const code = await runAuditCommand(
        fixture.config({ reportDir: 'blocker/audit' }),
        null,
        logger,
        options(),
        plainColors
      );

      expect(code).toBe(ExitCode.Failure);
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error.mock.calls[0][0]).toContain('Failed to persist audit report');
    });
  });

  describe('report command logic', () => {
    it('should fail when no report exists', () => {
      const logger = makeLogger();

      expect(showLatestReport(fixture.config(), logger, plainColors)).toBe(ExitCode.Failure);
      expect(logger.warn).toHaveBeenCalledWith(
        `No audit report found in ${path.join(fixture.root, 'reports', 'audit')}`
      );
    });

    it('should print the latest report summary', async () => {
      await runAuditCommand(
        fixture.config(),
        null,
        makeLogger(),
        { now: fixedClock, scheduler: new StaticSchedulerQuery(HEALTHY_TASKS) },
        plainColors
      );
      const logger = makeLogger();

      expect(showLatestReport(fixture.config(), logger, plainColors)).toBe(ExitCode.Ok);
      expect(logger.log).toHaveBeenCalledWith('Counts:    OK=30 INFO=1 WARN=0 ERROR=0');
      expect(logger.log).toHaveBeenLastCalledWith('Status:    READY');
    });
  });

  describe('lease command logic', () => {
    it('should parse lease actions', () => {
      expect(parseLeaseAction('acquire')).toBe('acquire');
      expect(parseLeaseAction('steal')).toBeNull();
    });

    it('should acquire, refuse a second owner and release', () => {
      const config = fixture.config();
      const logger = makeLogger();
      const leasePath = path.join(fixture.root, 'data', 'pipeline.lock');

      expect(runLeaseCommand('acquire', config, { owner: 'a' }, logger, fixedClock)).toBe(ExitCode.Ok);
      expect(fs.existsSync(leasePath)).toBe(true);
      expect(runLeaseCommand('acquire', config, { owner: 'b' }, logger, fixedClock)).toBe(ExitCode.Threshold);
      expect(logger.warn).toHaveBeenCalledWith('Lease held by a (age 0.0 min)');
      expect(runLeaseCommand('release', config, { owner: 'b' }, logger, fixedClock)).toBe(ExitCode.Failure);
      expect(runLeaseCommand('release', config, { owner: 'a' }, logger, fixedClock)).toBe(ExitCode.Ok);
      expect(fs.existsSync(leasePath)).toBe(false);
    });

    it('should report the lease state', () => {
      const logger = makeLogger();
      const leasePath = path.join(fixture.root, 'custom.lock');

      runLeaseCommand('status', fixture.config(), { path: leasePath }, logger, fixedClock);

      expect(logger.log).toHaveBeenCalledWith(`Lease free: ${leasePath}`);
    });

    it('should reject an invalid stale threshold', () => {
      const logger = makeLogger();

      expect(runLeaseCommand('acquire', fixture.config(), { staleAfter: 'soon' }, logger)).toBe(ExitCode.Failure);
      expect(logger.error).toHaveBeenCalledWith('Invalid --stale-after: soon');
    });
  });
});
