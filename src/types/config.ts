/** How failing commands are reported. */
export type ErrorMode = 'raise' | 'console' | 'quiet' | 'silent';

/** What `execute` writes to stdout: command lines, command lines plus output, or nothing. */
export type EchoMode = 'commands' | 'output' | false;

export type SessionLocalValues = Record<string, unknown>;

/**
 * Session configuration as supplied by the caller.
 * Only `gisbase` and `location` are mandatory; everything else is defaulted once
 * when the context is created (see resolveConfig).
 */
export interface SessionConfigInput<L extends SessionLocalValues = SessionLocalValues> {
  /** GRASS installation directory (the one holding bin/, scripts/, etc/). */
  gisbase: string;
  location: string;
  /** GRASS database directory; defaults to ~/grassdata. */
  gisdbase?: string;
  mapset?: string;
  version?: string;
  messageFormat?: string;
  trueColor?: boolean;
  transparent?: boolean;
  pngAutoWrite?: boolean;
  gnuplot?: string;
  gui?: string;
  errors?: ErrorMode;
  echo?: EchoMode;
  /** File receiving timestamped commands and error details. */
  log?: string;
  /** File receiving timestamped commands only; ignored when `log` is set. */
  history?: string;
  dry?: boolean;
  locals?: L;
}

/** Configuration after defaults have been applied. */
export interface SessionConfig {
  readonly gisbase: string;
  readonly location: string;
  readonly gisdbase: string;
  readonly mapset: string;
  readonly version: string | undefined;
  readonly messageFormat: string;
  readonly trueColor: boolean;
  readonly transparent: boolean;
  readonly pngAutoWrite: boolean;
  readonly gnuplot: string;
  readonly gui: string;
  readonly errors: ErrorMode;
  readonly echo: EchoMode;
  readonly log: string | undefined;
  readonly history: string | undefined;
  readonly dry: boolean;
}
