/** A parameter value as accepted by the command builder. */
export type ParamValue = string | number | boolean | null | undefined | ReadonlyArray<string | number>;

/** Keyword arguments of a tool invocation, rendered as key=value. */
export type CommandParams = Readonly<Record<string, ParamValue>>;

/** A rendered parameter: key and its string value. */
export type CommandParam = readonly [key: string, value: string];

/** The process ran to completion (whatever its exit status). */
export interface ExitedOutcome {
  readonly kind: 'exited';
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
}

/** The process could not be started at all (missing program, bad arguments...). */
export interface LaunchFailedOutcome {
  readonly kind: 'launch-failed';
  readonly error: Error;
  // System error code such as ENOENT, when the OS reported one
  readonly errorCode?: string;
  readonly durationMs: number;
}

/** Dry run: the command was recorded but never launched. */
export interface SkippedOutcome {
  readonly kind: 'skipped';
}

export type ProcessOutcome = ExitedOutcome | LaunchFailedOutcome;
export type CommandOutcome = ProcessOutcome | SkippedOutcome;
