import { fetchMeta } from "./meta.js";
import {
  matchStatic,
  removeHttpScheme,
  trimVcsSuffix,
} from "./patterns.js";
import {
  GO_ISSUES_URL,
  GO_SOURCE_REPO_URL,
  adjustGoRepoInfo,
  isGoProjectPath,
} from "./golang.js";
import { STANDARD_LIBRARY } from "../../types.js";
import type { RepoResolution, ResolveOptions } from "../../types.js";

export { matchStatic, trimVcsSuffix, removeHttpScheme, PATTERNS } from "./patterns.js";
export { parseMeta, fetchMeta, type SourceMeta } from "./meta.js";
export { adjustGoRepoInfo } from "./golang.js";

/**
 * One way of finding a module's repository. A step returns null when it
 * does not apply, and throws when it applies but fails.
 */
export interface ResolutionStep {
  name: string;
  resolve: (
    modulePath: string,
    options: ResolveOptions,
  ) => RepoResolution | null | Promise<RepoResolution | null>;
}

/**
 * example.com can never be real; it is reserved for testing. Treat its
 * paths as directly browsable.
 */
function fromTestDomain(modulePath: string): RepoResolution | null {
  if (!modulePath.startsWith("example.com/")) {
    return null;
  }
  const repoUrl = trimVcsSuffix(`https://${modulePath}`);
  return { repoUrl, issuesUrl: repoUrl };
}

function fromStandardLibrary(modulePath: string): RepoResolution | null {
  if (modulePath !== STANDARD_LIBRARY) {
    return null;
  }
  return { repoUrl: GO_SOURCE_REPO_URL, issuesUrl: GO_ISSUES_URL };
}

function fromStaticPatterns(modulePath: string): RepoResolution | null {
  const match = matchStatic(modulePath);
  if (!match) {
    return null;
  }
  const repoUrl = trimVcsSuffix(`https://${match.repo}${match.suffix}`);
  return { repoUrl, issuesUrl: match.issues(repoUrl) };
}

/**
 * Read the go-import/go-source declarations of the landing page. The repo
 * URL found there goes back through the pattern table only to pick an
 * issues URL.
 */
async function fromLandingPage(
  modulePath: string,
  options: ResolveOptions,
): Promise<RepoResolution> {
  const meta = await fetchMeta(modulePath, options);
  const repoUrl = meta.repoUrl.replace(/\/+$/, "");
  const match = matchStatic(removeHttpScheme(meta.repoUrl));
  return {
    repoUrl,
    issuesUrl: match ? match.issues(repoUrl) : repoUrl,
  };
}

/**
 * Resolution steps in the order they are tried. The last step never
 * returns null: it either finds a declaration or throws.
 */
export const RESOLUTION_STEPS: readonly ResolutionStep[] = [
  { name: "reserved test domain", resolve: fromTestDomain },
  { name: "standard library", resolve: fromStandardLibrary },
  { name: "static patterns", resolve: fromStaticPatterns },
  { name: "landing page metadata", resolve: fromLandingPage },
];

/**
 * Resolve the source repository and issue tracker URLs of a module.
 *
 * Throws NotFoundError when no step yields a declaration and
 * NetworkError/StatusError when the landing page could not be fetched.
 */
export async function resolveRepo(
  modulePath: string,
  options: ResolveOptions = {},
): Promise<RepoResolution> {
  for (const step of RESOLUTION_STEPS) {
    const resolution = await step.resolve(modulePath, options);
    if (!resolution) {
      continue;
    }
    options.log?.(`  resolved ${modulePath} via ${step.name}`);

    if (isGoProjectPath(modulePath)) {
      return adjustGoRepoInfo(resolution.repoUrl, modulePath);
    }
    return resolution;
  }

  // Unreachable while the landing page step stays last
  throw new Error(`no resolution step handled ${modulePath}`);
}
