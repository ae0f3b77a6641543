import type { PatternRule } from "../../types.js";

const SEGMENT = "[a-z0-9A-Z_.\\-]+";

const withIssues = (repoUrl: string): string => `${repoUrl}/issues`;
const withGitLabIssues = (repoUrl: string): string => `${repoUrl}/-/issues`;
const sameAsRepo = (repoUrl: string): string => repoUrl;

/**
 * Known hosting conventions, most specific first. The generic rules near
 * the end would shadow the site-specific ones if they were moved up.
 */
export const PATTERNS: readonly PatternRule[] = [
  {
    pattern: new RegExp(`^(?<repo>github\\.com/${SEGMENT}/${SEGMENT})`),
    issues: withIssues,
  },
  {
    // Any site beginning with "github." works like github.com
    pattern: new RegExp(`^(?<repo>github\\.[a-z0-9A-Z.-]+/${SEGMENT}/${SEGMENT})(\\.git|$)`),
    issues: withIssues,
  },
  {
    pattern: new RegExp(`^(?<repo>bitbucket\\.org/${SEGMENT}/${SEGMENT})`),
    issues: withIssues,
  },
  {
    pattern: new RegExp(`^(?<repo>gitlab\\.com/${SEGMENT}/${SEGMENT})`),
    issues: withGitLabIssues,
  },
  {
    // Any site beginning with "gitlab." works like gitlab.com
    pattern: new RegExp(`^(?<repo>gitlab\\.[a-z0-9A-Z.-]+/${SEGMENT}/${SEGMENT})(\\.git|$)`),
    issues: withGitLabIssues,
  },
  {
    pattern: new RegExp(`^(?<repo>gitee\\.com/${SEGMENT}/${SEGMENT})(\\.git|$)`),
    issues: withIssues,
  },
  {
    pattern: new RegExp(`^(?<repo>git\\.sr\\.ht/~${SEGMENT}/${SEGMENT})`),
    issues: (repoUrl) => repoUrl.replace("git.sr.ht", "todo.sr.ht"),
  },
  {
    pattern: new RegExp(`^(?<repo>git\\.fd\\.io/${SEGMENT})`),
    issues: sameAsRepo,
  },
  {
    pattern: new RegExp(`^(?<repo>git\\.pirl\\.io/${SEGMENT}/${SEGMENT})`),
    issues: sameAsRepo,
  },
  {
    pattern: new RegExp(`^(?<repo>gitea\\.com/${SEGMENT}/${SEGMENT})(\\.git|$)`),
    issues: withIssues,
  },
  {
    // Any site beginning with "gitea." works like gitea.com
    pattern: new RegExp(`^(?<repo>gitea\\.[a-z0-9A-Z.-]+/${SEGMENT}/${SEGMENT})(\\.git|$)`),
    issues: withIssues,
  },
  {
    pattern: new RegExp(`^(?<repo>go\\.isomorphicgo\\.org/${SEGMENT}/${SEGMENT})(\\.git|$)`),
    issues: withIssues,
  },
  {
    pattern: new RegExp(`^(?<repo>git\\.openprivacy\\.ca/${SEGMENT}/${SEGMENT})(\\.git|$)`),
    issues: withIssues,
  },
  {
    pattern: new RegExp(`^(?<repo>gogs\\.[a-z0-9A-Z.-]+/${SEGMENT}/${SEGMENT})(\\.git|$)`),
    issues: sameAsRepo,
  },
  {
    pattern: /^(?<repo>dmitri\.shuralyov\.com\/.+)$/,
    issues: (repoUrl) => `${repoUrl}$issues`,
  },
  {
    pattern: /^(?<repo>blitiri\.com\.ar\/go\/.+)$/,
    issues: () => "mailto:albertito@blitiri.com.ar",
  },

  // Hosts that follow the plain go command convention: import paths carry
  // a ".git" suffix, repo URLs from meta tags do not.
  {
    pattern: /^(?<repo>[^.]+\.googlesource\.com\/[^.]+)(\.git|$)/,
    issues: sameAsRepo,
  },
  {
    pattern: /^(?<repo>git\.apache\.org\/[^.]+)(\.git|$)/,
    issues: sameAsRepo,
  },

  // Anything ending in a VCS suffix. The repo root is known, the URL
  // templates are not. Must stay last.
  {
    pattern: /(?<repo>([a-z0-9.-]+\.)+[a-z0-9.-]+(:[0-9]+)?(\/~?[A-Za-z0-9_.-]+)+?)\.(?<vcs>bzr|fossil|git|hg|svn)/,
    issues: sameAsRepo,
    keepSuffix: true,
  },
];

/**
 * Throw at load time if a rule cannot yield a repo capture
 */
function assertRepoGroups(rules: readonly PatternRule[]): void {
  for (const rule of rules) {
    if (!rule.pattern.source.includes("(?<repo>")) {
      throw new Error(`pattern ${rule.pattern.source} missing <repo> group`);
    }
  }
}

assertRepoGroups(PATTERNS);

export interface StaticMatch {
  /** Repo root without scheme, e.g. "github.com/foo/bar" */
  repo: string;
  /** VCS suffix a module path keeps in its repo URL, e.g. ".git", or "" */
  suffix: string;
  issues: (repoUrl: string) => string;
}

/**
 * Match a module path, or a repo URL with its scheme removed, against the
 * pattern table. The first matching rule wins.
 */
export function matchStatic(
  moduleOrRepoPath: string,
  rules: readonly PatternRule[] = PATTERNS,
): StaticMatch | null {
  for (const rule of rules) {
    const match = rule.pattern.exec(moduleOrRepoPath);
    const captured = match?.groups?.repo;
    if (captured === undefined) {
      continue;
    }

    let repo = captured;

    // git.apache.org declares github.com/apache as its go-import root,
    // without the ".git" the path needs, so rewrite it here.
    const apacheDomain = "git.apache.org/";
    if (repo.startsWith(apacheDomain)) {
      repo = repo.replace(apacheDomain, "github.com/apache/");
    }

    // Module paths are blitiri.com.ar/go/..., repos are blitiri.com.ar/git/r/...
    if (repo.startsWith("blitiri.com.ar/")) {
      repo = repo.replace("/go/", "/git/r/");
    }

    const vcs = match?.groups?.vcs;
    const suffix = rule.keepSuffix && vcs !== undefined ? `.${vcs}` : "";

    return { repo, suffix, issues: rule.issues };
  }
  return null;
}

/**
 * Remove a ".git" suffix where the host is known to redirect cleanly.
 *
 * GitHub redirects github.com/foo/bar.git to github.com/foo/bar but 404s
 * on github.com/foo/bar.git/tree/main, so the suffix goes for GitHub and
 * GitLab and stays everywhere else.
 */
export function trimVcsSuffix(repoUrl: string): string {
  if (!repoUrl.endsWith(".git")) {
    return repoUrl;
  }
  if (
    repoUrl.startsWith("https://github.com/") ||
    repoUrl.startsWith("https://gitlab.com/")
  ) {
    return repoUrl.slice(0, -".git".length);
  }
  return repoUrl;
}

/**
 * Strip a leading "https://" or "http://". Other schemes are left in place
 * so the result matches no pattern.
 */
export function removeHttpScheme(url: string): string {
  for (const prefix of ["https://", "http://"]) {
    if (url.startsWith(prefix)) {
      return url.slice(prefix.length);
    }
  }
  return url;
}
