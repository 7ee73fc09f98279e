import { execa } from 'execa';

export interface ToolInvocation {
  command: string;
  args: string[];
  cwd: string;
  timeoutMs: number;
  env?: Record<string, string>;
}

interface ToolOutput {
  stdout: string;
  stderr: string;
  durationMs: number;
}

export type ToolResult =
  | ({ status: 'ok' } & ToolOutput)
  | ({ status: 'failed'; exitCode: number | null } & ToolOutput)
  | ({ status: 'timed_out' } & ToolOutput)
  | { status: 'not_found'; message: string; durationMs: number };

/** Seam over external process execution; tests substitute an in-process fake. */
export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<ToolResult>;
}

/** Grace period between SIGTERM on timeout and SIGKILL. */
const FORCE_KILL_AFTER_MS = 5_000;

export class ExecaToolRunner implements ToolRunner {
  async run(inv: ToolInvocation): Promise<ToolResult> {
    const start = Date.now();
    try {
      const res = await execa(inv.command, inv.args, {
        cwd: inv.cwd,
        env: inv.env,
        timeout: inv.timeoutMs,
        forceKillAfterDelay: FORCE_KILL_AFTER_MS,
        reject: false,
        stdin: 'ignore',
        stdout: 'pipe',
        stderr: 'pipe'
      });
      const output: ToolOutput = { stdout: res.stdout, stderr: res.stderr, durationMs: Date.now() - start };

      if (res.timedOut) return { status: 'timed_out', ...output };
      if (!res.failed) return { status: 'ok', ...output };
      if (res.exitCode === undefined) {
        return { status: 'not_found', message: `could not start ${inv.command}`, durationMs: output.durationMs };
      }
      return { status: 'failed', exitCode: res.exitCode, ...output };
    } catch (err) {
      return {
        status: 'not_found',
        message: err instanceof Error ? err.message : String(err),
        durationMs: Date.now() - start
      };
    }
  }
}

export function describeInvocation(inv: Pick<ToolInvocation, 'command' | 'args'>): string {
  return [inv.command, ...inv.args].join(' ');
}
