// Process runner: every GRASS tool invocation passes through this module.
// LocalExecutor never throws for a failing tool; it reports what happened as a
// ProcessOutcome.
import execa from 'execa';
import type { ProcessOutcome } from '../types/command.js';
import { logger } from '../logger.js';

// Reported for a tool killed by a signal, as a shell would (128 + n, n unknown here)
const SIGNAL_EXIT_CODE = 128;

/** A command ready for execution. */
export interface ExecRequest {
  readonly argv: readonly string[];
  readonly stdin?: string;
  /** Complete environment for the process; process.env when omitted. */
  readonly env?: NodeJS.ProcessEnv;
}

/** Runs a command: LocalExecutor in production, a fake in tests. */
export interface Executor {
  execute(request: ExecRequest): Promise<ProcessOutcome>;
}

/**
 * Local executor using execa.
 * No shell: arguments reach the tool verbatim. The environment is read at call
 * time, so the variables a session sets are inherited.
 */
export class LocalExecutor implements Executor {
  async execute(request: ExecRequest): Promise<ProcessOutcome> {
    const start = performance.now();
    const [file, ...args] = request.argv;
    if (file === undefined) {
      return launchFailed(new Error('Empty command line'), start);
    }

    try {
      const result = await execa(file, args, {
        input: request.stdin,
        env: request.env ?? process.env,
        extendEnv: false,
        reject: false,
        windowsHide: true,
      });
      if (result.signal !== undefined) {
        const durationMs = Math.round(performance.now() - start);
        logger.debug({ file, signal: result.signal, durationMs }, 'Process terminated by signal');
        return { kind: 'exited', exitCode: SIGNAL_EXIT_CODE, stdout: result.stdout, stderr: result.stderr, durationMs };
      }
      // With reject: false a spawn error comes back as the result itself,
      // carrying the system error but no exit code.
      if (typeof result.exitCode !== 'number') {
        const error = result instanceof Error ? result : new Error(`Could not launch ${file}`);
        return launchFailed(error, start);
      }
      const durationMs = Math.round(performance.now() - start);
      logger.debug({ file, exitCode: result.exitCode, durationMs }, 'Process exited');
      return { kind: 'exited', exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr, durationMs };
    } catch (err) {
      // execa throws synchronously for arguments spawn() rejects outright
      return launchFailed(err instanceof Error ? err : new Error(String(err)), start);
    }
  }
}

function launchFailed(error: Error, start: number): ProcessOutcome {
  const durationMs = Math.round(performance.now() - start);
  const errorCode = systemErrorCode(error);
  logger.debug({ errorCode, message: error.message }, 'Process could not be launched');
  return errorCode === undefined
    ? { kind: 'launch-failed', error, durationMs }
    : { kind: 'launch-failed', error, errorCode, durationMs };
}

function systemErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}
