// Session context: owns everything a GRASS session changes in the process:
// the temporary GISRC file, the GRASS_* variables and the PATH-like search lists.
// allocate() acquires, dispose() releases; dispose() must run on every exit path,
// which session() in ./session.ts guarantees with try/finally.
import { existsSync, statSync } from 'fs';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { CommandArg } from '../command/builder.js';
import { buildCommand } from '../command/builder.js';
import { GrassCommand } from '../command/command.js';
import { resolveConfig } from '../config/schema.js';
import { errorInfo, isError, raiseForError } from '../errors/classify.js';
import type { Executor } from '../execution/executor.js';
import { LocalExecutor } from '../execution/executor.js';
import { logger } from '../logger.js';
import { GrassError, GrassErrorCode, isGrassError } from '../shared/errors.js';
import type { SessionConfig, SessionConfigInput, SessionLocalValues } from '../types/config.js';
import { EnvironmentGuard } from './environment.js';
import { SessionLocals } from './locals.js';
import type { CommandRunner } from './module.js';
import { GrassModule } from './module.js';
import type { PlatformInfo } from './platform.js';
import { currentPlatform } from './platform.js';

/** First segment of GRASS tool names: d.*, g.*, r.*, r3.*, v.*, db.* ... */
export const ROOT_MODULES = ['d', 'g', 'i', 'r', 'v', 's', 'm', 'p', 'db', 'ps', 'r3', 't'] as const;
export type RootModuleName = (typeof ROOT_MODULES)[number];

const DEFAULT_OSGEO4W_ROOT = 'C:\\OSGeo4W';

export type ContextState = 'created' | 'allocated' | 'disposed';

export type SessionBlock<L extends SessionLocalValues, T> = (
  grass: GrassContext<L>,
  locals: SessionLocals<L>,
) => T | Promise<T>;

/** Collaborators of a context. Defaults talk to the real process and terminal. */
export interface ContextOptions {
  executor?: Executor;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  /** Environment the session mutates and commands inherit; process.env by default. */
  env?: NodeJS.ProcessEnv;
  platform?: PlatformInfo;
  /** Where the GISRC directory is created; the OS temp directory by default. */
  tmpDir?: string;
  clock?: () => Date;
}

// Contexts currently between allocate() and dispose() in this process
let activeContexts = 0;

export class GrassContext<L extends SessionLocalValues = SessionLocalValues> implements CommandRunner {
  readonly configuration: SessionConfig;
  readonly locals: SessionLocals<L>;

  private readonly executor: Executor;
  private readonly stdout: NodeJS.WritableStream;
  private readonly stderr: NodeJS.WritableStream;
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: PlatformInfo;
  private readonly tmpDir: string;
  private readonly clock: () => Date;

  private currentState: ContextState = 'created';
  private guard: EnvironmentGuard | undefined;
  private gisrcDir: string | undefined;
  private gisrcPath: string | undefined;
  private commands: GrassCommand[] = [];
  private readonly modules = new Map<string, GrassModule>();
  // Settles when the most recently queued command has finished
  private queueTail: Promise<void> = Promise.resolve();

  constructor(config: SessionConfigInput<L>, options: ContextOptions = {}) {
    this.env = options.env ?? process.env;
    this.configuration = resolveConfig(config, this.env);
    this.locals = new SessionLocals(config.locals);
    this.executor = options.executor ?? new LocalExecutor();
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.platform = options.platform ?? currentPlatform();
    this.tmpDir = options.tmpDir ?? os.tmpdir();
    this.clock = options.clock ?? (() => new Date());
  }

  get state(): ContextState {
    return this.currentState;
  }

  get dry(): boolean {
    return this.configuration.dry;
  }

  /** Path of the GISRC file while the session is allocated. */
  get gisrc(): string | undefined {
    return this.gisrcPath;
  }

  // ── History ────────────────────────────────────────────────────

  /** Commands executed in this session, oldest first. */
  get history(): readonly GrassCommand[] {
    return this.commands;
  }

  get last(): GrassCommand | undefined {
    return this.commands[this.commands.length - 1];
  }

  /** Commands that failed to launch or exited with a non-zero status. */
  get errors(): GrassCommand[] {
    return this.commands.filter(command => isError(command));
  }

  /** Did the last command fail? */
  hasError(): boolean {
    return isError(this.last);
  }

  errorInfo(): string | undefined {
    return errorInfo(this.last);
  }

  /** Standard output of the last command. */
  get output(): string | undefined {
    return this.last?.output;
  }

  get errorOutput(): string | undefined {
    return this.last?.errorOutput;
  }

  // ── Lifecycle ──────────────────────────────────────────────────

  async allocate(): Promise<void> {
    if (this.currentState !== 'created') {
      throw new GrassError(
        GrassErrorCode.SESSION_ALREADY_ALLOCATED,
        `Session context cannot be allocated in state "${this.currentState}"`,
      );
    }
    if (activeContexts > 0) {
      logger.warn({ activeContexts }, 'Another GRASS session is active in this process; both mutate the same environment');
    }

    const guard = new EnvironmentGuard(this.env, this.platform);
    let gisrcDir: string | undefined;
    try {
      gisrcDir = await fs.mkdtemp(path.join(this.tmpDir, 'grass-session-'));
      const gisrcPath = path.join(gisrcDir, 'gisrc');
      await fs.writeFile(gisrcPath, gisrcContents(this.configuration), 'utf-8');
      this.applyEnvironment(guard, gisrcPath);
      this.gisrcPath = gisrcPath;
    } catch (err) {
      // Roll back whatever was acquired, then surface the original error
      guard.restore();
      if (gisrcDir !== undefined) {
        await fs.rm(gisrcDir, { recursive: true, force: true }).catch((rmErr: unknown) => {
          logger.warn({ gisrcDir, error: rmErr }, 'Could not remove GISRC directory during rollback');
        });
      }
      throw err;
    }

    this.guard = guard;
    this.gisrcDir = gisrcDir;
    this.commands = [];
    this.currentState = 'allocated';
    this.locals.open();
    activeContexts++;
    logger.debug({ gisrc: this.gisrcPath, location: this.configuration.location, variables: guard.touched }, 'GRASS session allocated');
  }

  /** Release the GISRC file and restore the environment. Safe to call more than once. */
  async dispose(): Promise<void> {
    if (this.currentState === 'disposed') return;
    const wasAllocated = this.currentState === 'allocated';
    this.currentState = 'disposed';
    if (!wasAllocated) {
      this.locals.revoke();
      return;
    }
    activeContexts--;

    const gisrcDir = this.gisrcDir;
    this.gisrcDir = undefined;
    this.gisrcPath = undefined;
    try {
      if (gisrcDir !== undefined) {
        await fs.rm(gisrcDir, { recursive: true, force: true });
      }
    } finally {
      this.guard?.restore();
      this.guard = undefined;
      this.locals.revoke();
      logger.debug({ commands: this.commands.length, failed: this.errors.length }, 'GRASS session disposed');
    }
  }

  /**
   * Run a block against this (already allocated) context, e.g. from a helper
   * that received the context as an argument.
   */
  async session<T>(block: SessionBlock<L, T>): Promise<T> {
    this.assertAllocated();
    return await block(this, this.locals);
  }

  // ── Dispatch ───────────────────────────────────────────────────

  get d(): GrassModule { return this.module('d'); }
  get g(): GrassModule { return this.module('g'); }
  get i(): GrassModule { return this.module('i'); }
  get r(): GrassModule { return this.module('r'); }
  get v(): GrassModule { return this.module('v'); }
  get s(): GrassModule { return this.module('s'); }
  get m(): GrassModule { return this.module('m'); }
  get p(): GrassModule { return this.module('p'); }
  get db(): GrassModule { return this.module('db'); }
  get ps(): GrassModule { return this.module('ps'); }
  get r3(): GrassModule { return this.module('r3'); }
  get t(): GrassModule { return this.module('t'); }

  /** Root module dispatcher, created on first use. */
  module(name: RootModuleName): GrassModule {
    let module = this.modules.get(name);
    if (!module) {
      module = new GrassModule(name, this);
      this.modules.set(name, module);
    }
    return module;
  }

  /**
   * Build and execute a tool by its full name, e.g. run('g.region', { res: 10 }).
   * A malformed name or parameter key is recorded as a command that could not be
   * launched, so it is raised or kept according to the error mode.
   */
  async run(name: string, ...args: CommandArg[]): Promise<GrassCommand> {
    let command: GrassCommand;
    try {
      command = buildCommand(name, args);
    } catch (err) {
      if (!isGrassError(err, GrassErrorCode.INVALID_ARGUMENT)) throw err;
      const malformed = err;
      return this.enqueue(() => this.recordMalformed(name, malformed));
    }
    return this.execute(command);
  }

  /** Execute a command once every command queued before it has finished. */
  execute(command: GrassCommand): Promise<GrassCommand> {
    return this.enqueue(() => this.executeNow(command));
  }

  // ── Internals ──────────────────────────────────────────────────

  private enqueue(task: () => Promise<GrassCommand>): Promise<GrassCommand> {
    const result = this.queueTail.then(task);
    // The caller gets the rejection through result; the queue only waits for it
    this.queueTail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async executeNow(command: GrassCommand): Promise<GrassCommand> {
    this.assertAllocated();
    if (command.outcome !== undefined) {
      throw new GrassError(GrassErrorCode.INVALID_ARGUMENT, `Command was already executed: ${command.toString()}`);
    }
    const config = this.configuration;

    // Logged before it enters the history: a failed write leaves no half-recorded command
    const logFile = config.log ?? config.history;
    if (logFile !== undefined) {
      await appendLines(logFile, [this.clock().toISOString(), command.toString({ withInput: true })]);
    }
    this.commands.push(command);
    if (config.echo) {
      this.stdout.write(`${command.toString()}\n`);
    }

    if (config.dry) {
      command.recordOutcome({ kind: 'skipped' });
    } else {
      logger.debug({ command: command.toString() }, 'Executing GRASS command');
      const outcome = await this.executor.execute({ argv: command.argv, stdin: command.input, env: this.env });
      command.recordOutcome(outcome);
    }

    if (config.echo === 'output' && command.output) {
      this.stdout.write(withNewline(command.output));
    }
    await this.handleErrors(command);
    return command;
  }

  private async recordMalformed(name: string, error: GrassError): Promise<GrassCommand> {
    this.assertAllocated();
    const command = new GrassCommand(name, [], []);
    command.recordOutcome({ kind: 'launch-failed', error, errorCode: error.code, durationMs: 0 });
    this.commands.push(command);
    logger.debug({ name, message: error.message }, 'Malformed GRASS command');
    await this.handleErrors(command);
    return command;
  }

  private async handleErrors(command: GrassCommand): Promise<void> {
    const config = this.configuration;
    raiseForError(command, config.errors);
    if (config.echo !== 'output' && config.log === undefined && config.errors !== 'console') return;

    const info = errorInfo(command);
    if (info === undefined) return;
    if (config.errors === 'console' || config.echo === 'output') {
      this.stderr.write(withNewline(info));
    }
    if (config.log !== undefined) {
      await appendLines(config.log, [info]);
    }
  }

  private applyEnvironment(guard: EnvironmentGuard, gisrcPath: string): void {
    const config = this.configuration;
    const { gisbase } = config;
    const { join } = this.platform.path;

    guard.replace('GISRC', gisrcPath);
    guard.replace('GISBASE', gisbase);
    guard.replace('GRASS_VERSION', config.version);
    guard.replace('GRASS_MESSAGE_FORMAT', config.messageFormat);
    guard.replace('GRASS_TRUECOLOR', boolVar(config.trueColor));
    guard.replace('GRASS_TRANSPARENT', boolVar(config.transparent));
    guard.replace('GRASS_PNG_AUTO_WRITE', boolVar(config.pngAutoWrite));
    guard.replace('GRASS_GNUPLOT', config.gnuplot);

    const binDirs = ['bin', 'scripts'];
    if (this.platform.windows) {
      // DLLs are found through PATH on Windows
      binDirs.unshift('lib');
    } else {
      guard.prepend('LD_LIBRARY_PATH', join(gisbase, 'lib'));
      guard.replace('GRASS_LD_LIBRARY_PATH', this.env.LD_LIBRARY_PATH);
    }
    const searchPath = binDirs.map(dir => join(gisbase, dir));
    if (this.platform.windows) {
      const osgeo4wRoot = this.env.OSGEO4W_ROOT ?? DEFAULT_OSGEO4W_ROOT;
      if (isDirectory(osgeo4wRoot)) {
        searchPath.push(join(osgeo4wRoot, 'bin'));
      }
    }
    guard.prepend('PATH', ...searchPath);
    guard.prepend('MANPATH', join(gisbase, 'man'));
  }

  private assertAllocated(): void {
    if (this.currentState !== 'allocated') {
      throw new GrassError(
        GrassErrorCode.SESSION_NOT_ACTIVE,
        `No active GRASS session (context is ${this.currentState})`,
      );
    }
  }
}

/** Contents of the GISRC file GRASS tools read their location from. */
export function gisrcContents(config: SessionConfig): string {
  return [
    `LOCATION_NAME: ${config.location}`,
    `GISDBASE: ${config.gisdbase}`,
    `MAPSET: ${config.mapset}`,
    `GUI: ${config.gui}`,
  ].map(line => `${line}\n`).join('');
}

function boolVar(value: boolean): string {
  return value ? 'TRUE' : 'FALSE';
}

function isDirectory(dir: string): boolean {
  return existsSync(dir) && statSync(dir).isDirectory();
}

function withNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

async function appendLines(file: string, lines: string[]): Promise<void> {
  await fs.appendFile(file, lines.map(withNewline).join(''), 'utf-8');
}
