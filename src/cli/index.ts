#!/usr/bin/env node

import { Command } from 'commander';
import { startServer } from '../api/server';
import { PipelineAuditor } from '../core/auditor';
import { ConfigValidationError } from '../core/errors';
import { defaultLogger } from '../core/logger';
import {
  AuditCommandOptions,
  ExitCode,
  LeaseCommandOptions,
  parseLeaseAction,
  parseStatus,
  resolveAuditConfig,
  runAuditCommand,
  runLeaseCommand,
  showLatestReport,
} from './commands';

const program = new Command();

program
  .name('pipeline-audit')
  .description('Readiness audit for the trading data pipeline')
  .version('1.0.0');

function configOrExit(options: AuditCommandOptions) {
  try {
    return resolveAuditConfig(options);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      defaultLogger.error(error.message);
      process.exit(ExitCode.Failure);
    }
    throw error;
  }
}

/**
 * Audit command
 */
program
  .command('audit')
  .description('Audit the pipeline and persist a report')
  .option('-r, --root <dir>', 'Pipeline root directory')
  .option('-c, --config <path>', 'Config file, or directory to search for one')
  .option('-o, --out <dir>', 'Report directory')
  .option('--smoke', 'Run the engine once as a smoke test')
  .option('--no-scheduler', 'Skip the scheduler inspection')
  .option('--fail-on <status>', 'Exit 2 when the status is at least this bad (DEGRADED, NEEDS_FIXES)')
  .action(async (options: AuditCommandOptions) => {
    const failOn = options.failOn !== undefined ? parseStatus(options.failOn) : null;
    if (options.failOn !== undefined && !failOn) {
      defaultLogger.error(`Unknown status for --fail-on: ${options.failOn}`);
      process.exit(ExitCode.Failure);
    }
    const config = configOrExit(options);
    process.exitCode = await runAuditCommand(config, failOn, defaultLogger);
  });

/**
 * Report command
 */
program
  .command('report')
  .description('Show the latest persisted audit report')
  .option('-r, --root <dir>', 'Pipeline root directory')
  .option('-c, --config <path>', 'Config file, or directory to search for one')
  .option('-o, --out <dir>', 'Report directory')
  .action((options: AuditCommandOptions) => {
    process.exitCode = showLatestReport(configOrExit(options), defaultLogger);
  });

/**
 * Lease command
 */
program
  .command('lease')
  .description('Acquire, release or inspect the single-runner lease')
  .argument('<action>', 'acquire, release or status')
  .option('-r, --root <dir>', 'Pipeline root directory')
  .option('-p, --path <file>', 'Lease file (default <root>/data/pipeline.lock)')
  .option('--stale-after <minutes>', 'Minutes after which a lease is taken over')
  .option('--owner <owner>', 'Lease owner (default: host name)')
  .action((actionArg: string, options: AuditCommandOptions & LeaseCommandOptions) => {
    const action = parseLeaseAction(actionArg);
    if (!action) {
      defaultLogger.error(`Unknown lease action: ${actionArg}`);
      process.exit(ExitCode.Failure);
    }
    process.exitCode = runLeaseCommand(action, configOrExit({ root: options.root }), options, defaultLogger);
  });

/**
 * Server command
 */
program
  .command('serve')
  .description('Start the audit HTTP server')
  .option('-r, --root <dir>', 'Pipeline root directory')
  .option('-c, --config <path>', 'Config file, or directory to search for one')
  .option('--no-scheduler', 'Skip the scheduler inspection')
  .option('-p, --port <port>', 'Port to listen on', '3000')
  .action(async (options: AuditCommandOptions & { port: string }) => {
    const port = parseInt(options.port, 10);
    const auditor = new PipelineAuditor(configOrExit(options), { logger: defaultLogger });
    defaultLogger.log('\nStarting audit server...\n');
    await startServer(port, auditor);
  });

// Parse arguments
program.parseAsync().catch((error: unknown) => {
  defaultLogger.error(error instanceof Error ? error.message : String(error));
  process.exit(ExitCode.Failure);
});
