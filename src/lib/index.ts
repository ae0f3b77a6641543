export {
  listVersions,
  listStdVersions,
  uniqueVersions,
  applyRetractions,
  isRetractedBy,
  STD_INDEX_URL,
} from "./versions.js";
export {
  resolveRepo,
  matchStatic,
  trimVcsSuffix,
  removeHttpScheme,
  parseMeta,
  fetchMeta,
  adjustGoRepoInfo,
  PATTERNS,
  RESOLUTION_STEPS,
  type ResolutionStep,
  type SourceMeta,
} from "./repository/index.js";
export { ProxyClient, parseProxyList, DEFAULT_GOPROXY, type VersionInfo } from "./proxy.js";
export { parseRetractions } from "./modfile.js";
export { checkModulePath, escapeModulePath, escapeVersion } from "./module-path.js";
export {
  isValidVersion,
  compareVersions,
  canonicalVersion,
  prerelease,
  toolchainToSemver,
  compareToolchainVersions,
} from "./semver.js";
export {
  ResolveError,
  NetworkError,
  StatusError,
  DecodeError,
  NotFoundError,
  AmbiguousMetadataError,
  ModulePathError,
  isRetryable,
  type ResolveErrorKind,
  type NetworkFailureReason,
} from "./errors.js";
export * from "../types.js";
