import type { GrassCommand } from '../command/command.js';
import type { CommandArg } from '../command/builder.js';

/** Anything that can run a fully named GRASS tool. */
export interface CommandRunner {
  run(name: string, ...args: CommandArg[]): Promise<GrassCommand>;
}

/**
 * Dispatcher for one level of the GRASS tool namespace ("r", "r.resamp", ...).
 *
 *   await grass.r.run('resamp.stats', { input: 'map1', output: 'map2' });
 *   await grass.r.child('resamp').run('stats', { input: 'map1', output: 'map2' });
 */
export class GrassModule {
  readonly path: string;
  private readonly runner: CommandRunner;
  private readonly children = new Map<string, GrassModule>();

  constructor(path: string, runner: CommandRunner) {
    this.path = path;
    this.runner = runner;
  }

  /** Nested namespace, created on first use and cached. */
  child(name: string): GrassModule {
    let module = this.children.get(name);
    if (!module) {
      module = new GrassModule(`${this.path}.${name}`, this.runner);
      this.children.set(name, module);
    }
    return module;
  }

  run(name: string, ...args: CommandArg[]): Promise<GrassCommand> {
    return this.runner.run(`${this.path}.${name}`, ...args);
  }
}
