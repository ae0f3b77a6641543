import { resolveRepo } from "../lib/repository/index.js";
import { reportFailure, requestContext, type RequestFlags } from "./common.js";
import type { RepoResolution } from "../types.js";

export type RepoOptions = Omit<RequestFlags, "proxy">;

async function printResolved(
  modulePath: string,
  options: RepoOptions,
  pick: (resolution: RepoResolution) => string,
): Promise<void> {
  try {
    const { signal, log } = await requestContext(options);
    const resolution = await resolveRepo(modulePath, { signal, log });
    console.log(pick(resolution));
  } catch (err) {
    reportFailure(err);
  }
}

/**
 * Print the source repository URL of a module
 */
export async function repoCommand(
  modulePath: string,
  options: RepoOptions = {},
): Promise<void> {
  await printResolved(modulePath, options, (resolution) => resolution.repoUrl);
}

/**
 * Print the issue tracker URL of a module
 */
export async function bugsCommand(
  modulePath: string,
  options: RepoOptions = {},
): Promise<void> {
  await printResolved(modulePath, options, (resolution) => resolution.issuesUrl);
}
