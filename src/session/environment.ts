import type { PlatformInfo } from './platform.js';
import { currentPlatform } from './platform.js';

/**
 * Records every environment variable it changes so restore() can put the
 * environment back exactly as it was, including variables that were unset.
 */
export class EnvironmentGuard {
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: PlatformInfo;
  private readonly originals = new Map<string, string | undefined>();

  constructor(env: NodeJS.ProcessEnv = process.env, platform: PlatformInfo = currentPlatform()) {
    this.env = env;
    this.platform = platform;
  }

  /** Set (or with undefined, unset) a variable for the lifetime of the guard. */
  replace(name: string, value: string | undefined): void {
    this.remember(name);
    if (value === undefined) {
      delete this.env[name];
    } else {
      this.env[name] = value;
    }
  }

  /** Prepend directories to a search-path variable, keeping its current entries after them. */
  prepend(name: string, ...dirs: string[]): void {
    this.remember(name);
    const entries = dirs.map(dir => this.platform.path.normalize(dir));
    const current = this.env[name];
    if (current) entries.push(current);
    this.env[name] = entries.join(this.platform.path.delimiter);
  }

  /** Names of the variables changed so far, in the order first touched. */
  get touched(): string[] {
    return [...this.originals.keys()];
  }

  restore(): void {
    for (const [name, value] of this.originals) {
      if (value === undefined) {
        delete this.env[name];
      } else {
        this.env[name] = value;
      }
    }
    this.originals.clear();
  }

  // Only the first original counts: a variable changed twice restores to its pre-session value
  private remember(name: string): void {
    if (!this.originals.has(name)) {
      this.originals.set(name, this.env[name]);
    }
  }
}
