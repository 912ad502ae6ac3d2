// Command builder: turns a dotted tool name plus loose arguments into a GrassCommand.
// Pure data transformation: nothing here touches the environment or the process table.
import type { CommandParam, CommandParams, ParamValue } from '../types/command.js';
import { GrassError, GrassErrorCode } from '../shared/errors.js';
import { GrassCommand } from './command.js';

/** Marks a string as the standard input of a command, e.g. stdin('1|2|3'). */
export class StdinInput {
  readonly text: string;

  constructor(text: string) {
    this.text = text;
  }
}

export function stdin(text: string): StdinInput {
  return new StdinInput(text);
}

/**
 * Strings are flags ("-n", "--overwrite"), objects are parameters, StdinInput is
 * the standard input.
 */
export type CommandArg = string | CommandParams | StdinInput;

const PARAM_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Build a command from GRASS-style arguments.
 *
 *   buildCommand('r.resamp.stats', ['-n', { input: 'map1', output: 'map2' }])
 *   // r.resamp.stats -n input=map1 output=map2
 *
 * Parameter objects are merged in order (later keys win, first position kept).
 * `true` renders as the long flag --key, `false`/null/undefined are dropped,
 * arrays are comma-joined.
 */
export function buildCommand(name: string, args: readonly CommandArg[] = []): GrassCommand {
  if (name.trim() === '') {
    throw new GrassError(GrassErrorCode.INVALID_ARGUMENT, 'Command name must not be empty');
  }

  const flags: string[] = [];
  const params = new Map<string, string>();
  let input: string | undefined;

  for (const arg of args) {
    if (typeof arg === 'string') {
      flags.push(arg);
    } else if (arg instanceof StdinInput) {
      input = arg.text;
    } else {
      for (const [key, value] of Object.entries(arg)) {
        if (!PARAM_KEY.test(key)) {
          throw new GrassError(GrassErrorCode.INVALID_ARGUMENT, `Invalid parameter name "${key}" for ${name}`, {
            command: name,
            key,
          });
        }
        const rendered = renderValue(value);
        const longFlag = `--${key}`;
        if (rendered === true) {
          params.delete(key);
          if (!flags.includes(longFlag)) flags.push(longFlag);
          continue;
        }
        removeFlag(flags, longFlag);
        if (rendered === undefined) {
          params.delete(key);
        } else {
          params.set(key, rendered);
        }
      }
    }
  }

  const entries: CommandParam[] = [...params.entries()];
  return new GrassCommand(name, flags, entries, input);
}

function removeFlag(flags: string[], flag: string): void {
  const index = flags.indexOf(flag);
  if (index !== -1) flags.splice(index, 1);
}

function renderValue(value: ParamValue): string | true | undefined {
  if (value === true) return true;
  if (value === false || value === null || value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return value.map(String).join(',');
}
