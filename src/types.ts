/**
 * Module path of the standard library pseudo-module
 */
export const STANDARD_LIBRARY = "std";

/**
 * One released version of a module
 */
export interface VersionRecord {
  version: string;
  publishedAt?: Date;
  retracted: boolean;
  retractionReason?: string;
}

/**
 * Inclusive version interval withdrawn by a retract directive
 */
export interface RetractionRange {
  low: string;
  high: string;
  reason: string;
}

/**
 * Human-facing locations of a module's source
 */
export interface RepoResolution {
  repoUrl: string;
  issuesUrl: string;
}

/**
 * A known hosting convention. `pattern` must match a prefix of a module
 * path or scheme-less repo URL and capture the repo root in a group
 * named "repo".
 */
export interface PatternRule {
  pattern: RegExp;
  issues: (repoUrl: string) => string;
  /**
   * Module paths matched by this rule keep the VCS suffix captured in the
   * group named "vcs" in their repo URL
   */
  keepSuffix?: boolean;
}

/**
 * Options shared by every resolver call
 */
export interface ResolveOptions {
  /** Deadline for the whole operation, including nested requests */
  signal?: AbortSignal;
  /** Receives one line per outbound request */
  log?: (message: string) => void;
}

export interface ListVersionsOptions extends ResolveOptions {
  /** Proxy mirror base URLs, already stripped of "off" and "direct" */
  proxies: string[];
  /** Keep versions older than the current one */
  includeAll?: boolean;
}
