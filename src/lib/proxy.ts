import { z } from "zod";
import { decodeJson, foldKeys } from "./decode.js";
import { ResolveError } from "./errors.js";
import { getText } from "./http.js";
import { escapeVersion } from "./module-path.js";
import { parseRetractions } from "./modfile.js";
import type { ResolveOptions, RetractionRange } from "../types.js";

export const DEFAULT_GOPROXY = "https://proxy.golang.org,direct";

// Field names are matched ignoring case
const VersionInfoSchema = z.preprocess(
  foldKeys(["Version", "Time"]),
  z.object({
    Version: z.string(),
    Time: z.string().datetime({ offset: true }).optional(),
  }),
);

export type VersionInfo = z.infer<typeof VersionInfoSchema>;

/**
 * Split a GOPROXY-style list into mirror base URLs. "off" and "direct"
 * name non-network sources and are dropped.
 */
export function parseProxyList(value: string): string[] {
  return value
    .split(/[,|]/)
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "" && entry !== "off" && entry !== "direct");
}

function joinUrl(base: string, suffix: string): string {
  return `${base.replace(/\/+$/, "")}/${suffix.replace(/^\/+/, "")}`;
}

/**
 * Prefix the message of a failed proxy request. The error keeps its class
 * so callers can still tell network failures from bad statuses.
 */
function annotate(err: unknown, prefix: string): unknown {
  if (err instanceof ResolveError) {
    err.message = `${prefix}: ${err.message}`;
  }
  return err;
}

/**
 * Client for one proxy mirror serving the @v/list, .info and .mod
 * endpoints of an escaped module path
 */
export class ProxyClient {
  constructor(
    private readonly base: string,
    private readonly escapedPath: string,
    private readonly options: ResolveOptions = {},
  ) {}

  url(endpoint: string): string {
    return joinUrl(this.base, `${this.escapedPath}/@v/${endpoint}`);
  }

  private async get(endpoint: string): Promise<string> {
    const url = this.url(endpoint);
    try {
      return await getText(url, this.options);
    } catch (err) {
      throw annotate(err, "query proxy");
    }
  }

  /**
   * Known versions, one per non-blank line
   */
  async list(): Promise<string[]> {
    const body = await this.get("list");
    return body
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line !== "");
  }

  async info(version: string): Promise<VersionInfo> {
    const endpoint = `${escapeVersion(version)}.info`;
    const body = await this.get(endpoint);

    return decodeJson(this.url(endpoint), body, VersionInfoSchema, "version information");
  }

  /**
   * Retraction ranges declared in the version's manifest
   */
  async retractions(version: string): Promise<RetractionRange[]> {
    const endpoint = `${escapeVersion(version)}.mod`;
    const body = await this.get(endpoint);
    try {
      return parseRetractions(this.url(endpoint), body);
    } catch (err) {
      throw annotate(err, "invalid modfile");
    }
  }
}
