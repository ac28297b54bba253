import { spawn } from 'child_process';
import { SubprocessOptions, SubprocessResult, SubprocessRunner } from '../types';

/**
 * Runs external commands and waits for them to exit.
 *
 * Unlike a bare spawn-and-wait, every run is bounded: when `timeoutMs`
 * elapses or `signal` aborts, the child is killed and the result is
 * returned with `timedOut: true`. A command that cannot be started at all
 * (ENOENT and friends) rejects.
 */
export class NodeSubprocessRunner implements SubprocessRunner {
  run(command: string, args: string[], options: SubprocessOptions = {}): Promise<SubprocessResult> {
    const start = Date.now();
    return new Promise((resolve, reject) => {
      let settled = false;
      let timedOut = false;
      let stdout = '';
      let stderr = '';

      const proc = spawn(command, args, {
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      const kill = () => {
        timedOut = true;
        proc.kill('SIGKILL');
      };
      const timer =
        options.timeoutMs !== undefined ? setTimeout(kill, options.timeoutMs) : undefined;
      const onAbort = () => kill();
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const cleanup = () => {
        if (timer) clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
      };

      proc.stdout.setEncoding('utf8');
      proc.stderr.setEncoding('utf8');
      proc.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      proc.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      proc.on('error', (err) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(err);
      });

      proc.on('close', (code) => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve({
          exitCode: code,
          stdout,
          stderr,
          timedOut,
          durationMs: Date.now() - start,
        });
      });

      if (options.signal?.aborted) kill();
    });
  }
}

export const defaultRunner = new NodeSubprocessRunner();

/**
 * Last `maxChars` characters of an output stream
 */
export function truncateTail(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `…${text.slice(text.length - maxChars)}`;
}
