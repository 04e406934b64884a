/**
 * Slipway Runtime Host — Subprocess Execution Adapter
 *
 * Implements the ExecAdapter interface from @slipway/kernel with
 * node:child_process.spawn. Every engine command (pull, create, commit, run,
 * inspect) flows through this adapter, so tests can substitute a scripted
 * fake and never touch a real engine.
 *
 * A process that starts always resolves, whatever its exit code. Only a
 * spawn failure rejects; a missing engine binary surfaces as ENOENT, which
 * the pipeline classifies as EngineUnavailable.
 */

import { spawn, type StdioOptions } from 'node:child_process';
import type { ExecAdapter, ExecOptions, ExecResult } from '@slipway/kernel';

/** Exit code reported when a process is killed by a signal or timeout. */
const SIGNALLED_EXIT = 128;

export class NodeExecAdapter implements ExecAdapter {
  run(command: string, args: ReadonlyArray<string>, options: ExecOptions = {}): Promise<ExecResult> {
    const stdio: StdioOptions = options.inheritStdio === true ? 'inherit' : ['ignore', 'pipe', 'pipe'];

    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        // An explicit env replaces the parent's; omitted means inherit.
        env: options.env !== undefined ? { ...options.env } : process.env,
        stdio,
        ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      child.stdout?.on('data', (chunk: Buffer) => { stdoutChunks.push(chunk); });
      child.stderr?.on('data', (chunk: Buffer) => { stderrChunks.push(chunk); });

      child.on('close', (exitCode: number | null) => {
        resolve({
          exitCode: exitCode ?? SIGNALLED_EXIT,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        });
      });

      child.on('error', (err: Error) => { reject(err); });
    });
  }
}
