import { buildDependencies } from '../container';
import type { AppDependencies } from '../container';
import { loadConfig, validateConfig } from '../lib/env';
import { logger } from '../lib/logger';

let depsPromise: Promise<AppDependencies> | undefined;

async function init(): Promise<AppDependencies> {
  const config = validateConfig(loadConfig());
  return buildDependencies(config, logger);
}

/**
 * Dependencies shared by warm invocations of one Lambda container. A failed
 * build is not cached, so the next invocation retries it.
 */
export function getDependencies(): Promise<AppDependencies> {
  if (!depsPromise) {
    depsPromise = init().catch((error: unknown) => {
      depsPromise = undefined;
      throw error;
    });
  }
  return depsPromise;
}
