import { logger } from '../logger.js';
import type { SessionConfigInput, SessionLocalValues } from '../types/config.js';
import type { ContextOptions, SessionBlock } from './context.js';
import { GrassContext } from './context.js';

/**
 * Run a block inside a GRASS session and resolve to the block's value.
 * The environment is restored and the GISRC file removed however the block ends.
 *
 *   await session({ gisbase: '/usr/lib/grass83', location: 'world' }, async grass => {
 *     await grass.r.run('resamp.stats', '-n', { input: 'map1@mapset1', output: 'map2' });
 *     const cmd = await grass.g.run('list', { type: 'vector' });
 *     console.log(cmd.output);
 *   });
 *
 * Values passed as `locals` are readable in the block through its second argument:
 *
 *   await session({ ...config, locals: { res: 10 } }, (grass, locals) =>
 *     grass.g.run('region', { res: locals.get('res') }));
 */
export async function session<T, L extends SessionLocalValues = SessionLocalValues>(
  config: SessionConfigInput<L>,
  block: SessionBlock<L, T>,
  options?: ContextOptions,
): Promise<T> {
  const context = new GrassContext<L>(config, options);
  let failed = false;
  try {
    await context.allocate();
    return await context.session(block);
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    if (failed) {
      // The block's error is the one the caller sees
      await context.dispose().catch((disposeErr: unknown) => {
        logger.error({ error: disposeErr }, 'Could not dispose GRASS session after a failure');
      });
    } else {
      await context.dispose();
    }
  }
}
