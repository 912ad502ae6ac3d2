export { session } from './session/session.js';
export { GrassContext, ROOT_MODULES, gisrcContents } from './session/context.js';
export type { ContextOptions, ContextState, RootModuleName, SessionBlock } from './session/context.js';
export { GrassModule } from './session/module.js';
export type { CommandRunner } from './session/module.js';
export { SessionLocals } from './session/locals.js';
export { EnvironmentGuard } from './session/environment.js';
export { currentPlatform, posixPlatform, windowsPlatform } from './session/platform.js';
export type { PlatformInfo } from './session/platform.js';

export { GrassCommand } from './command/command.js';
export type { CommandTextOptions } from './command/command.js';
export { buildCommand, stdin, StdinInput } from './command/builder.js';
export type { CommandArg } from './command/builder.js';
export { quoteArgument } from './command/quote.js';

export { LocalExecutor } from './execution/executor.js';
export type { ExecRequest, Executor } from './execution/executor.js';

export { classify, errorInfo, isError, raiseForError } from './errors/classify.js';
export type { CommandStatus } from './errors/classify.js';
export { GrassError, GrassErrorCode, isGrassError } from './shared/errors.js';

export { loadSessionConfig } from './config/loader.js';
export { resolveConfig, parseSessionConfig, readVersionNumber, sessionConfigSchema, ERROR_MODES } from './config/schema.js';

export type { EchoMode, ErrorMode, SessionConfig, SessionConfigInput, SessionLocalValues } from './types/config.js';
export type {
  CommandOutcome,
  CommandParam,
  CommandParams,
  ExitedOutcome,
  LaunchFailedOutcome,
  ParamValue,
  ProcessOutcome,
  SkippedOutcome,
} from './types/command.js';
