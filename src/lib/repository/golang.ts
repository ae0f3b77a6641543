import type { RepoResolution } from "../../types.js";

export const GO_SOURCE_REPO_URL = "https://cs.opensource.google/go/go";
export const GO_ISSUES_URL = "https://github.com/golang/go/issues";

const GO_DOMAIN = "golang.org/";

/**
 * Repos hosted at cs.opensource.google/go that are not x/ repos
 */
const CS_NON_X_REPOS = new Set(["dl", "proposal", "vscode-go"]);

/**
 * x/ repos hosted at cs.opensource.google/go. x/scratch is not mirrored.
 */
const CS_X_REPOS = new Set([
  "x/arch",
  "x/benchmarks",
  "x/blog",
  "x/build",
  "x/crypto",
  "x/debug",
  "x/example",
  "x/exp",
  "x/image",
  "x/mobile",
  "x/mod",
  "x/net",
  "x/oauth2",
  "x/perf",
  "x/pkgsite",
  "x/playground",
  "x/review",
  "x/sync",
  "x/sys",
  "x/talks",
  "x/term",
  "x/text",
  "x/time",
  "x/tools",
  "x/tour",
  "x/vgo",
  "x/website",
  "x/xerrors",
]);

export function isGoProjectPath(modulePath: string): boolean {
  return modulePath.startsWith(GO_DOMAIN);
}

/**
 * Point golang.org/... modules at their browsable mirror on
 * cs.opensource.google and the shared Go issue tracker.
 *
 * Paths without a known mirror keep the resolved repo URL, which then
 * also serves as the issues URL.
 */
export function adjustGoRepoInfo(
  repoUrl: string,
  modulePath: string,
): RepoResolution {
  let suffix = modulePath.slice(GO_DOMAIN.length);

  const parts = suffix.split("/");
  if (parts.length >= 2) {
    suffix = `${parts[0]}/${parts[1]}`;
  }

  const known = suffix.startsWith("x/")
    ? CS_X_REPOS.has(suffix)
    : CS_NON_X_REPOS.has(suffix);

  if (!known) {
    return { repoUrl, issuesUrl: repoUrl };
  }

  return {
    repoUrl: `https://cs.opensource.google/go/${suffix}`,
    issuesUrl: GO_ISSUES_URL,
  };
}
