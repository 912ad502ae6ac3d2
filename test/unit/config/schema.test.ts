import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { readVersionNumber, resolveConfig } from '../../../src/config/schema.js';
import { GrassErrorCode } from '../../../src/shared/errors.js';

const env: NodeJS.ProcessEnv = { HOME: '/home/tester', USER: 'tester' };

describe('resolveConfig', () => {
  let gisbase: string;

  beforeEach(async () => {
    gisbase = await fs.mkdtemp(path.join(os.tmpdir(), 'grass-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(gisbase, { recursive: true, force: true });
  });

  it('applies defaults for every optional key', () => {
    const config = resolveConfig({ gisbase, location: 'world' }, env);
    expect(config).toEqual({
      gisbase,
      location: 'world',
      gisdbase: path.join('/home/tester', 'grassdata'),
      mapset: 'tester',
      version: undefined,
      messageFormat: 'plain',
      trueColor: true,
      transparent: true,
      pngAutoWrite: true,
      gnuplot: 'gnuplot -persist',
      gui: 'wxpython',
      errors: 'raise',
      echo: 'commands',
      log: undefined,
      history: undefined,
      dry: false,
    });
  });

  it('keeps explicit values, including a disabled echo', () => {
    const config = resolveConfig(
      {
        gisbase,
        location: 'nc_spm',
        gisdbase: '/data/grassdata',
        mapset: 'PERMANENT',
        version: '7.8.7',
        transparent: false,
        errors: 'quiet',
        echo: false,
        dry: true,
      },
      env,
    );
    expect(config).toMatchObject({
      gisdbase: '/data/grassdata',
      mapset: 'PERMANENT',
      version: '7.8.7',
      transparent: false,
      errors: 'quiet',
      echo: false,
      dry: true,
    });
  });

  it('reads the version from the installation', async () => {
    await fs.mkdir(path.join(gisbase, 'etc'));
    await fs.writeFile(path.join(gisbase, 'etc', 'VERSIONNUMBER'), '8.3.2 2024 (2024)\n');
    expect(resolveConfig({ gisbase, location: 'world' }, env).version).toBe('8.3.2');
    expect(readVersionNumber(gisbase)).toBe('8.3.2');
  });

  it('requires gisbase and location', () => {
    expect(() => resolveConfig({ gisbase }, env)).toThrow(
      expect.objectContaining({ code: GrassErrorCode.CONFIG_INVALID, message: 'Invalid session configuration: location: Required' }),
    );
    expect(() => resolveConfig({ location: 'world' }, env)).toThrow('gisbase: Required');
  });

  it('rejects unknown keys and bad values', () => {
    expect(() => resolveConfig({ gisbase, location: 'world', colour: true }, env)).toThrow(
      expect.objectContaining({ code: GrassErrorCode.CONFIG_INVALID }),
    );
    expect(() => resolveConfig({ gisbase, location: 'world', errors: 'loud' }, env)).toThrow('errors:');
    expect(() => resolveConfig({ gisbase, location: 'world', echo: true }, env)).toThrow('echo:');
  });

  it('rejects a non-object configuration', () => {
    expect(() => resolveConfig('world', env)).toThrow('(root):');
  });
});
