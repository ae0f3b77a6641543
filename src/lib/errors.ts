/**
 * Error kinds raised while resolving versions or repositories.
 */
export type ResolveErrorKind =
  | "network"
  | "status"
  | "decode"
  | "not-found"
  | "ambiguous-metadata"
  | "invalid-path";

/**
 * Base class for every failure reported by the resolvers
 */
export class ResolveError extends Error {
  constructor(
    public readonly kind: ResolveErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ResolveError";
  }
}

export type NetworkFailureReason = "connection" | "timeout" | "aborted";

/**
 * The request never produced a response: connection failure, or the
 * caller's deadline elapsed while it was in flight.
 */
export class NetworkError extends ResolveError {
  constructor(
    public readonly url: string,
    public readonly reason: NetworkFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("network", message, options);
    this.name = "NetworkError";
  }
}

/**
 * A response arrived with a status other than 200 where 200 was required.
 */
export class StatusError extends ResolveError {
  constructor(
    public readonly url: string,
    public readonly status: number,
    public readonly statusText: string,
    message: string = `GET ${url}: ${status} ${statusText}`.trim(),
  ) {
    super("status", message);
    this.name = "StatusError";
  }
}

/**
 * A document was fetched but could not be decoded.
 */
export class DecodeError extends ResolveError {
  constructor(
    public readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("decode", message, options);
    this.name = "DecodeError";
  }
}

/**
 * No repository declaration exists for the module. This is an expected
 * outcome, not a transport problem.
 */
export class NotFoundError extends ResolveError {
  constructor(
    message: string,
    kind: "not-found" | "ambiguous-metadata" = "not-found",
  ) {
    super(kind, message);
    this.name = "NotFoundError";
  }
}

/**
 * The landing page carried conflicting declarations. Reported as a
 * not-found result.
 */
export class AmbiguousMetadataError extends NotFoundError {
  constructor(message: string) {
    super(message, "ambiguous-metadata");
    this.name = "AmbiguousMetadataError";
  }
}

/**
 * A module path or version that cannot be used to build proxy requests.
 */
export class ModulePathError extends ResolveError {
  constructor(
    public readonly path: string,
    message: string,
  ) {
    super("invalid-path", message);
    this.name = "ModulePathError";
  }
}

/**
 * Whether retrying the same call could succeed
 */
export function isRetryable(err: unknown): boolean {
  if (err instanceof NetworkError) {
    return err.reason !== "aborted";
  }
  if (err instanceof StatusError) {
    return err.status === 429 || (err.status >= 500 && err.status < 600);
  }
  return false;
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
