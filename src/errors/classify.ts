// Error classification for executed commands.
// A command ends in one of three states; the session's error mode decides
// which of them are raised (see raiseForError).
import type { GrassCommand } from '../command/command.js';
import type { ErrorMode } from '../types/config.js';
import { GrassError, GrassErrorCode } from '../shared/errors.js';

export type CommandStatus = 'success' | 'non-zero-exit' | 'launch-failure';

/** Commands not yet run and dry-run commands count as successful. */
export function classify(command: GrassCommand | undefined): CommandStatus {
  const outcome = command?.outcome;
  if (outcome?.kind === 'launch-failed') return 'launch-failure';
  if (outcome?.kind === 'exited' && outcome.exitCode !== 0) return 'non-zero-exit';
  return 'success';
}

export function isError(command: GrassCommand | undefined): boolean {
  return classify(command) !== 'success';
}

/**
 * Human-readable description of a failed command, undefined on success.
 *
 *   Error (ENOENT):
 *   spawn r.nope ENOENT
 *
 *   Exit code 1
 *   ERROR: Raster map <elev> not found
 */
export function errorInfo(command: GrassCommand | undefined): string | undefined {
  const outcome = command?.outcome;
  if (outcome?.kind === 'launch-failed') {
    return `Error (${outcome.errorCode ?? outcome.error.name}):\n${outcome.error.message}`;
  }
  if (outcome?.kind === 'exited' && outcome.exitCode !== 0) {
    return outcome.stderr ? `Exit code ${outcome.exitCode}\n${outcome.stderr}` : `Exit code ${outcome.exitCode}`;
  }
  return undefined;
}

/**
 * Throw for a failed command when the error mode says so.
 * Launch failures are raised in 'raise' and 'console' modes; non-zero exits
 * only in 'raise' mode. 'quiet' and 'silent' never throw.
 */
export function raiseForError(command: GrassCommand | undefined, mode: ErrorMode = 'raise'): void {
  if (command === undefined) return;
  const status = classify(command);
  const info = errorInfo(command);
  if (status === 'success' || info === undefined) return;

  if (status === 'launch-failure') {
    if (mode === 'quiet' || mode === 'silent') return;
    throw new GrassError(
      GrassErrorCode.COMMAND_LAUNCH_FAILED,
      info,
      { command: command.toString() },
      { cause: command.launchError?.error },
    );
  }

  if (mode === 'raise') {
    throw new GrassError(GrassErrorCode.COMMAND_FAILED, info, {
      command: command.toString(),
      exitCode: command.exitCode,
    });
  }
}
