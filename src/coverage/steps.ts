import { describeInvocation, type ToolInvocation } from './process.js';
import type { ToolchainContext, UnitFailure } from './types.js';

export type StepResult = { status: 'ok'; stdout: string } | UnitFailure;

const TAIL_CHARS = 2_000;

/**
 * Run one external step. A failure comes back as the UnitFailure to report for
 * the whole unit.
 */
export async function runStep(ctx: ToolchainContext, inv: ToolInvocation): Promise<StepResult> {
  const label = describeInvocation(inv);
  ctx.logger.debug(`Running ${label}`, { cwd: inv.cwd, timeoutMs: inv.timeoutMs });
  const res = await ctx.runner.run(inv);

  if (res.status === 'not_found') {
    return { status: 'failed', reason: `${label}: ${res.message}` };
  }

  if (res.stdout) ctx.logger.debug(`${inv.command} stdout`, { tail: tail(res.stdout) });
  if (res.stderr) ctx.logger.debug(`${inv.command} stderr`, { tail: tail(res.stderr) });

  switch (res.status) {
    case 'ok':
      return { status: 'ok', stdout: res.stdout };
    case 'timed_out':
      return { status: 'timed_out', reason: `${label} timed out after ${inv.timeoutMs}ms` };
    case 'failed':
      return { status: 'failed', reason: `${label} exited with code ${res.exitCode ?? 'unknown'}` };
  }
}

function tail(s: string): string {
  return s.length > TAIL_CHARS ? s.slice(-TAIL_CHARS) : s;
}
