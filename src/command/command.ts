import type { CommandOutcome, CommandParam, LaunchFailedOutcome } from '../types/command.js';
import { GrassError, GrassErrorCode } from '../shared/errors.js';
import { quoteArgument } from './quote.js';

export interface CommandTextOptions {
  /** Append the command's standard input as a heredoc. */
  withInput?: boolean;
  platform?: NodeJS.Platform;
}

/**
 * One invocation of a GRASS tool.
 * Name, flags, parameters and input are fixed at construction; the outcome is
 * recorded exactly once, after the context has run (or skipped) the command.
 */
export class GrassCommand {
  readonly name: string;
  readonly flags: readonly string[];
  readonly params: readonly CommandParam[];
  readonly input?: string;
  private recorded: CommandOutcome | undefined;

  constructor(name: string, flags: readonly string[], params: readonly CommandParam[], input?: string) {
    this.name = name;
    this.flags = Object.freeze([...flags]);
    this.params = Object.freeze([...params]);
    this.input = input;
  }

  /** Program and arguments as handed to the process runner (no shell quoting). */
  get argv(): string[] {
    return [this.name, ...this.flags, ...this.params.map(([key, value]) => `${key}=${value}`)];
  }

  get outcome(): CommandOutcome | undefined {
    return this.recorded;
  }

  /** True once the process was actually launched (or attempted); false in dry runs. */
  get executed(): boolean {
    return this.recorded !== undefined && this.recorded.kind !== 'skipped';
  }

  get output(): string | undefined {
    if (this.recorded?.kind === 'exited') return this.recorded.stdout;
    if (this.recorded?.kind === 'skipped') return '';
    return undefined;
  }

  get errorOutput(): string | undefined {
    if (this.recorded?.kind === 'exited') return this.recorded.stderr;
    if (this.recorded?.kind === 'skipped') return '';
    return undefined;
  }

  get exitCode(): number | undefined {
    return this.recorded?.kind === 'exited' ? this.recorded.exitCode : undefined;
  }

  get launchError(): LaunchFailedOutcome | undefined {
    return this.recorded?.kind === 'launch-failed' ? this.recorded : undefined;
  }

  recordOutcome(outcome: CommandOutcome): void {
    if (this.recorded !== undefined) {
      throw new GrassError(GrassErrorCode.INVALID_ARGUMENT, `Command already has an outcome: ${this.toString()}`);
    }
    this.recorded = outcome;
  }

  toString(options: CommandTextOptions = {}): string {
    const quote = (value: string): string => quoteArgument(value, options.platform);
    const words = [
      this.name,
      ...this.flags.map(quote),
      ...this.params.map(([key, value]) => `${key}=${quote(value)}`),
    ];
    const line = words.join(' ');
    if (options.withInput && this.input !== undefined) {
      return `${line} <<EOF\n${this.input}\nEOF`;
    }
    return line;
  }
}
