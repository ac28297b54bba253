import express, { Request, Response, Router, NextFunction, RequestHandler } from 'express';
import { PipelineAuditor, createAuditor } from '../core/auditor';
import { ReportPersistError } from '../core/errors';
import { Logger, defaultLogger } from '../core/logger';
import { ReportWriter } from '../core/report_writer';
import { resolveReportDir } from '../config';

/**
 * Create the audit API router
 */
export function createApiRouter(auditor?: PipelineAuditor): Router {
  const router = Router();
  const instance = auditor || createAuditor();

  // Middleware to parse JSON
  router.use(express.json());

  /**
   * POST /audit/run
   * Run an audit and persist its report. Joins an audit already in flight.
   */
  const runHandler: RequestHandler = async (
    _req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const report = await instance.runExclusive();
      res.json(report);
    } catch (error) {
      next(error);
    }
  };
  router.post('/run', runHandler);

  /**
   * GET /audit/latest
   * The newest report, from memory or from the report directory
   */
  const latestHandler: RequestHandler = (_req: Request, res: Response, next: NextFunction): void => {
    try {
      const report =
        instance.getLastReport() ?? new ReportWriter(resolveReportDir(instance.getConfig())).loadLatest();
      if (!report) {
        res.status(404).json({
          error: 'Not found',
          message: 'No audit report has been written yet',
        });
        return;
      }
      res.json(report);
    } catch (error) {
      next(error);
    }
  };
  router.get('/latest', latestHandler);

  /**
   * GET /audit/status
   * Whether an audit is running and the verdict of the last one
   */
  const statusHandler: RequestHandler = (_req: Request, res: Response): void => {
    const last = instance.getLastReport();
    res.json({
      running: instance.isRunning(),
      root: instance.getConfig().root,
      lastReport: last
        ? { id: last.id, status: last.status, completedAt: last.completedAt, counts: last.counts }
        : null,
    });
  };
  router.get('/status', statusHandler);

  return router;
}

/**
 * Create a full Express application with the audit API
 */
export function createApp(auditor?: PipelineAuditor, logger: Logger = defaultLogger): express.Application {
  const app = express();
  const instance = auditor || createAuditor();

  app.use('/audit', createApiRouter(instance));

  // Health check endpoint
  const healthHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({ status: 'ok', service: 'pipeline-auditor' });
  };
  app.get('/health', healthHandler);

  // Root endpoint with info
  const rootHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({
      name: 'pipeline-auditor',
      version: '1.0.0',
      description: 'Readiness audit for the trading data pipeline',
      endpoints: {
        run: 'POST /audit/run',
        latest: 'GET /audit/latest',
        status: 'GET /audit/status',
      },
    });
  };
  app.get('/', rootHandler);

  // Error handling middleware
  const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    logger.error(`[auditor] Error: ${err.message}`);
    // In production, don't expose internal error details
    const isDevelopment = process.env.NODE_ENV !== 'production';
    res.status(500).json({
      error: err instanceof ReportPersistError ? 'Report persist failed' : 'Internal server error',
      message: isDevelopment ? err.message : 'An unexpected error occurred',
    });
  };
  app.use(errorHandler);

  return app;
}

/**
 * Start the audit server
 */
export function startServer(
  port: number = 3000,
  auditor?: PipelineAuditor,
  logger: Logger = defaultLogger
): Promise<ReturnType<express.Application['listen']>> {
  return new Promise((resolve) => {
    const app = createApp(auditor, logger);
    const server = app.listen(port, () => {
      logger.log(`[auditor] Server running at http://localhost:${port}`);
      logger.log(`[auditor] API available at http://localhost:${port}/audit`);
      resolve(server);
    });
  });
}
