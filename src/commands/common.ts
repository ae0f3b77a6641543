import { ResolveError } from "../lib/errors.js";
import {
  deadlineSignal,
  readSettings,
  resolveProxies,
  resolveTimeout,
  type ModscoutSettings,
} from "../lib/settings.js";
import type { ResolveOptions } from "../types.js";

export interface RequestFlags {
  cwd?: string;
  proxy?: string;
  timeout?: number;
  verbose?: boolean;
}

export interface RequestContext extends ResolveOptions {
  proxies: string[];
  settings: ModscoutSettings;
}

/**
 * Assemble resolver options from flags, environment and settings file
 */
export async function requestContext(flags: RequestFlags): Promise<RequestContext> {
  const settings = await readSettings(flags.cwd || process.cwd());

  return {
    settings,
    proxies: resolveProxies(flags.proxy, settings),
    signal: deadlineSignal(resolveTimeout(flags.timeout, settings)),
    log: flags.verbose ? (message: string) => console.error(message) : undefined,
  };
}

/**
 * Print a resolver failure and mark the process as failed. Anything that
 * is not a resolver failure is rethrown.
 */
export function reportFailure(err: unknown): void {
  if (!(err instanceof ResolveError)) {
    throw err;
  }
  console.error(`✗ ${err.message}`);
  process.exitCode = 1;
}
