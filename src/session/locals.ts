import type { SessionLocalValues } from '../types/config.js';
import { GrassError, GrassErrorCode } from '../shared/errors.js';

type LocalsState = 'pending' | 'open' | 'revoked';

/**
 * Named values injected into a session block through the `locals` config key.
 * Readable only while the session is open: the context opens them on allocate
 * and revokes them on dispose.
 */
export class SessionLocals<L extends SessionLocalValues = SessionLocalValues> {
  private readonly values: Readonly<L> | undefined;
  private state: LocalsState = 'pending';

  constructor(values?: L) {
    this.values = values === undefined ? undefined : Object.freeze({ ...values });
  }

  get<K extends keyof L & string>(name: K): L[K] {
    this.assertOpen(name);
    const values = this.values;
    if (values === undefined || !Object.prototype.hasOwnProperty.call(values, name)) {
      throw new GrassError(GrassErrorCode.UNKNOWN_LOCAL, `No session local named "${name}"`, { name });
    }
    return values[name];
  }

  has(name: string): boolean {
    this.assertOpen(name);
    return this.values !== undefined && Object.prototype.hasOwnProperty.call(this.values, name);
  }

  names(): string[] {
    this.assertOpen();
    return this.values === undefined ? [] : Object.keys(this.values);
  }

  get active(): boolean {
    return this.state === 'open';
  }

  open(): void {
    if (this.state === 'revoked') {
      throw new GrassError(GrassErrorCode.SESSION_CLOSED, 'Session locals cannot be reopened');
    }
    this.state = 'open';
  }

  revoke(): void {
    this.state = 'revoked';
  }

  private assertOpen(name?: string): void {
    if (this.state === 'pending') {
      throw new GrassError(
        GrassErrorCode.SESSION_NOT_ACTIVE,
        name === undefined
          ? 'Session locals are not available before the session starts'
          : `Session local "${name}" is not available before the session starts`,
        name === undefined ? undefined : { name },
      );
    }
    if (this.state === 'revoked') {
      throw new GrassError(
        GrassErrorCode.SESSION_CLOSED,
        name === undefined ? 'Session locals are no longer available' : `Session local "${name}" is no longer available`,
        name === undefined ? undefined : { name },
      );
    }
  }
}
