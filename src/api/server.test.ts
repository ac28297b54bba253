import request from 'supertest';
import express from 'express';
import * as fs from 'fs';
import * as path from 'path';
import { createApp } from './server';
import { PipelineAuditor } from '../core';
import {
  HEALTHY_TASKS,
  PipelineFixture,
  StaticSchedulerQuery,
  fixedClock,
  silentLogger,
} from '../../tests/helpers/pipeline-fixture';

describe('Audit API Server', () => {
  let app: express.Application;
  let auditor: PipelineAuditor;
  let fixture: PipelineFixture;

  beforeEach(() => {
    fixture = PipelineFixture.create().populateHealthy();
    auditor = new PipelineAuditor(fixture.config(), {
      now: fixedClock,
      scheduler: new StaticSchedulerQuery(HEALTHY_TASKS),
      logger: silentLogger,
    });
    app = createApp(auditor, silentLogger);
  });

  afterEach(() => {
    fixture.cleanup();
  });

  describe('GET /health', () => {
    it('should return health status', async () => {
      const response = await request(app).get('/health');
      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'ok',
        service: 'pipeline-auditor',
      });
    });
  });

  describe('GET /', () => {
    it('should return API information', async () => {
      const response = await request(app).get('/');
      expect(response.status).toBe(200);
      expect(response.body.name).toBe('pipeline-auditor');
      expect(response.body.endpoints).toEqual({
        run: 'POST /audit/run',
        latest: 'GET /audit/latest',
        status: 'GET /audit/status',
      });
    });
  });

  describe('POST /audit/run', () => {
    it('should run an audit and persist the report', async () => {
      const response = await request(app).post('/audit/run');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('READY');
      expect(response.body.counts).toEqual({ OK: 30, INFO: 1, WARN: 0, ERROR: 0 });
      expect(fs.existsSync(fixture.resolve('reports/audit/audit_20250919_120000Z.json'))).toBe(true);
    });

    it('should return 500 when the report cannot be persisted', async () => {
      fixture.write('blocker', 'not a directory');
      const blocked = new PipelineAuditor(fixture.config({ reportDir: path.join('blocker', 'audit') }), {
        now: fixedClock,
        scheduler: new StaticSchedulerQuery(HEALTHY_TASKS),
        logger: silentLogger,
      });

      const response = await request(createApp(blocked, silentLogger)).post('/audit/run');

      expect(response.status).toBe(500);
      expect(response.body.error).toBe('Report persist failed');
    });

    it('should not serve a report whose persist failed', async () => {
      fixture.write('blocker', 'not a directory');
      const blocked = new PipelineAuditor(fixture.config({ reportDir: path.join('blocker', 'audit') }), {
        now: fixedClock,
        scheduler: new StaticSchedulerQuery(HEALTHY_TASKS),
        logger: silentLogger,
      });
      const blockedApp = createApp(blocked, silentLogger);

      await request(blockedApp).post('/audit/run');
      const latest = await request(blockedApp).get('/audit/latest');
      const status = await request(blockedApp).get('/audit/status');

      expect(latest.status).toBe(404);
      expect(status.body.lastReport).toBeNull();
    });
  });

  describe('GET /audit/latest', () => {
    it('should return 404 before any audit', async () => {
      const response = await request(app).get('/audit/latest');

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('Not found');
    });

    it('should return the last report', async () => {
      const run = await request(app).post('/audit/run');
      const response = await request(app).get('/audit/latest');

      expect(response.status).toBe(200);
      expect(response.body.id).toBe(run.body.id);
    });

    it('should read a persisted report when none is in memory', async () => {
      await request(app).post('/audit/run');
      const fresh = new PipelineAuditor(fixture.config(), { logger: silentLogger });

      const response = await request(createApp(fresh, silentLogger)).get('/audit/latest');

      expect(response.status).toBe(200);
      expect(response.body.startedAt).toBe('2025-09-19T12:00:00.000Z');
    });
  });

  describe('GET /audit/status', () => {
    it('should report no audit before the first run', async () => {
      const response = await request(app).get('/audit/status');

      expect(response.body).toEqual({ running: false, root: fixture.root, lastReport: null });
    });

    it('should summarise the last run', async () => {
      const run = await request(app).post('/audit/run');
      const response = await request(app).get('/audit/status');

      expect(response.body.lastReport).toEqual({
        id: run.body.id,
        status: 'READY',
        completedAt: '2025-09-19T12:00:00.000Z',
        counts: { OK: 30, INFO: 1, WARN: 0, ERROR: 0 },
      });
    });
  });
});
