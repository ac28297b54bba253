import { CheckContext, Finding, FindingCode, FindingLevel } from '../types';
import { createFinding } from './findings';
import { truncateTail } from './subprocess';

export const SMOKE_TAIL_CHARS = 800;

/**
 * Run the engine once, bounded by the configured timeout.
 * Invoked as `<command> <engineScript> ...args` from the pipeline root.
 */
export async function runSmokeTest(resourceId: string, engineScript: string, ctx: CheckContext): Promise<Finding> {
  const { command, args, timeoutMs } = ctx.config.smokeTest;

  if (!ctx.runner) {
    return createFinding(FindingLevel.Warn, resourceId, 'smoke run skipped: no subprocess runner', ctx.now(), {
      code: FindingCode.SubprocessFailure,
    });
  }

  try {
    const result = await ctx.runner.run(command, [engineScript, ...args], {
      timeoutMs,
      signal: ctx.signal,
      cwd: ctx.config.root,
    });
    const details = {
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      durationMs: result.durationMs,
      stdoutTail: truncateTail(result.stdout, SMOKE_TAIL_CHARS),
      stderrTail: truncateTail(result.stderr, SMOKE_TAIL_CHARS),
    };

    if (result.timedOut) {
      return createFinding(FindingLevel.Warn, resourceId, `smoke run timed out after ${timeoutMs} ms`, ctx.now(), {
        code: FindingCode.SubprocessFailure,
        details,
      });
    }
    if (result.exitCode !== 0) {
      return createFinding(FindingLevel.Warn, resourceId, `smoke run failed (exit ${result.exitCode})`, ctx.now(), {
        code: FindingCode.SubprocessFailure,
        details,
      });
    }
    return createFinding(FindingLevel.OK, resourceId, `smoke run ok (${result.durationMs} ms)`, ctx.now(), {
      details,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return createFinding(FindingLevel.Warn, resourceId, `smoke run could not start: ${message}`, ctx.now(), {
      code: FindingCode.SubprocessFailure,
    });
  }
}
