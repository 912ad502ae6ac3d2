import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { session } from '../../../src/session/session.js';
import { posixPlatform } from '../../../src/session/platform.js';
import { GrassContext } from '../../../src/session/context.js';
import { GrassErrorCode } from '../../../src/shared/errors.js';
import { CaptureStream, FakeExecutor, exited } from '../../fixtures/fakes.js';

describe('session', () => {
  let tmpDir: string;
  let gisbase: string;
  let executor: FakeExecutor;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'grass-session-test-'));
    gisbase = path.join(tmpDir, 'grass');
    executor = new FakeExecutor();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('resolves to the value of the block', async () => {
    const env: NodeJS.ProcessEnv = { PATH: '/usr/bin' };
    const result = await session(
      { gisbase, location: 'world', mapset: 'PERMANENT', dry: true, echo: false },
      async grass => {
        await grass.r.run('resamp.stats', { input: 'map1', output: 'map2' });
        return grass.last?.toString();
      },
      { executor, env, tmpDir, platform: posixPlatform },
    );
    expect(result).toBe('r.resamp.stats input=map1 output=map2');
  });

  it('sets and restores the real process environment', async () => {
    const pathBefore = process.env.PATH;
    const gisrcBefore = process.env.GISRC;
    const inside: NodeJS.ProcessEnv = {};

    await session(
      { gisbase, location: 'world', mapset: 'PERMANENT', echo: false },
      async grass => {
        inside.PATH = process.env.PATH;
        inside.GISRC = process.env.GISRC;
        await grass.g.run('region', '-p');
      },
      { executor, tmpDir, platform: posixPlatform, stdout: new CaptureStream(), stderr: new CaptureStream() },
    );

    expect(inside.PATH?.startsWith(`${gisbase}/bin:${gisbase}/scripts`)).toBe(true);
    expect(path.basename(String(inside.GISRC))).toBe('gisrc');
    expect(process.env.PATH).toBe(pathBefore);
    expect(process.env.GISRC).toBe(gisrcBefore);
    expect(executor.requests[0]?.env).toBe(process.env);
  });

  it('disposes the context when the block throws', async () => {
    const env: NodeJS.ProcessEnv = { PATH: '/usr/bin' };
    const contexts: GrassContext[] = [];
    let gisrc: string | undefined;

    await expect(
      session(
        { gisbase, location: 'world', mapset: 'PERMANENT', echo: false },
        grass => {
          contexts.push(grass);
          gisrc = grass.gisrc;
          throw new Error('block failed');
        },
        { executor, env, tmpDir, platform: posixPlatform },
      ),
    ).rejects.toThrow('block failed');

    expect(contexts.map(context => context.state)).toEqual(['disposed']);
    expect(env).toEqual({ PATH: '/usr/bin' });
    await expect(fs.access(String(gisrc))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('disposes the context when a command raises', async () => {
    executor.enqueue(exited(1, '', 'ERROR: region not set'));
    const env: NodeJS.ProcessEnv = { PATH: '/usr/bin' };
    const contexts: GrassContext[] = [];

    await expect(
      session(
        { gisbase, location: 'world', mapset: 'PERMANENT', echo: false },
        async grass => {
          contexts.push(grass);
          await grass.g.run('region', { res: 10 });
        },
        { executor, env, tmpDir, platform: posixPlatform },
      ),
    ).rejects.toMatchObject({ code: GrassErrorCode.COMMAND_FAILED });

    expect(env).toEqual({ PATH: '/usr/bin' });
    expect(contexts[0]?.history.map(cmd => cmd.exitCode)).toEqual([1]);
  });

  it('exposes locals to the block only while it runs', async () => {
    const env: NodeJS.ProcessEnv = {};
    const locals = await session(
      { gisbase, location: 'world', mapset: 'PERMANENT', dry: true, echo: false, locals: { res: 10, name: 'dem' } },
      async (grass, locals) => {
        const cmd = await grass.g.run('region', { res: locals.get('res') });
        expect(cmd.toString()).toBe('g.region res=10');
        expect(locals.get('name')).toBe('dem');
        return locals;
      },
      { executor, env, tmpDir, platform: posixPlatform },
    );

    expect(locals.active).toBe(false);
    expect(() => locals.get('res')).toThrow('Session local "res" is no longer available');
  });

  it('keeps the error of the block when dispose also fails', async () => {
    const env: NodeJS.ProcessEnv = { PATH: '/usr/bin' };
    const dispose = jest.spyOn(GrassContext.prototype, 'dispose').mockRejectedValueOnce(new Error('rm failed'));
    const contexts: GrassContext[] = [];

    try {
      await expect(
        session(
          { gisbase, location: 'world', mapset: 'PERMANENT', echo: false },
          grass => {
            contexts.push(grass);
            throw new Error('block failed');
          },
          { executor, env, tmpDir, platform: posixPlatform },
        ),
      ).rejects.toThrow('block failed');
      expect(dispose).toHaveBeenCalledTimes(1);
    } finally {
      dispose.mockRestore();
      for (const context of contexts) await context.dispose();
    }
    expect(env).toEqual({ PATH: '/usr/bin' });
  });

  it('reports a dispose failure when the block succeeded', async () => {
    const env: NodeJS.ProcessEnv = { PATH: '/usr/bin' };
    const dispose = jest.spyOn(GrassContext.prototype, 'dispose').mockRejectedValueOnce(new Error('rm failed'));
    const contexts: GrassContext[] = [];

    try {
      await expect(
        session(
          { gisbase, location: 'world', mapset: 'PERMANENT', echo: false },
          grass => {
            contexts.push(grass);
            return 'done';
          },
          { executor, env, tmpDir, platform: posixPlatform },
        ),
      ).rejects.toThrow('rm failed');
    } finally {
      dispose.mockRestore();
      for (const context of contexts) await context.dispose();
    }
    expect(env).toEqual({ PATH: '/usr/bin' });
  });

  it('rejects an invalid configuration without touching the environment', async () => {
    const env: NodeJS.ProcessEnv = { PATH: '/usr/bin' };
    const block = jest.fn();
    await expect(
      session({ gisbase, location: '' }, block, { executor, env, tmpDir }),
    ).rejects.toMatchObject({ code: GrassErrorCode.CONFIG_INVALID });
    expect(block).not.toHaveBeenCalled();
    expect(env).toEqual({ PATH: '/usr/bin' });
  });
});
