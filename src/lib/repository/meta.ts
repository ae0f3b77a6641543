import { AmbiguousMetadataError, NotFoundError, errorMessage } from "../errors.js";
import { getText } from "../http.js";
import type { ResolveOptions } from "../../types.js";

/**
 * Values merged from the go-import and go-source meta tags of a landing
 * page. The go-import form is described by "go help importpath"; go-source
 * adds browsable source locations on top of it.
 */
export interface SourceMeta {
  /** Import path prefix corresponding to the repo root */
  repoRootPrefix: string;
  /** URL of the repo root */
  repoUrl: string;
}

type HtmlToken =
  | { type: "start"; name: string; attrs: Map<string, string> }
  | { type: "end"; name: string };

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

const MAX_CODE_POINT = 0x10ffff;
const REPLACEMENT_CHARACTER = "\ufffd";

function fromCodePoint(codePoint: number): string {
  return codePoint <= MAX_CODE_POINT
    ? String.fromCodePoint(codePoint)
    : REPLACEMENT_CHARACTER;
}

function decodeEntities(value: string): string {
  return value.replace(/&(#[xX][0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g, (entity, body: string) => {
    if (body.startsWith("#x") || body.startsWith("#X")) {
      return fromCodePoint(Number.parseInt(body.slice(2), 16));
    }
    if (body.startsWith("#")) {
      return fromCodePoint(Number.parseInt(body.slice(1), 10));
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

function parseAttributes(source: string): Map<string, string> {
  const attrs = new Map<string, string>();
  const attrPattern = /([^\s=/>]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+)))?/g;

  for (const match of source.matchAll(attrPattern)) {
    const name = match[1].toLowerCase();
    if (attrs.has(name)) {
      continue;
    }
    const raw = match[2] ?? match[3] ?? match[4] ?? "";
    attrs.set(name, decodeEntities(raw));
  }
  return attrs;
}

/**
 * Walk the start and end tags of an HTML document. Comments, doctype and
 * processing instructions are skipped, as is the raw text inside
 * <script> and <style>.
 */
function* scanTags(html: string): Generator<HtmlToken> {
  const tagPattern = /<!--[\s\S]*?(?:-->|$)|<[!?][^>]*>|<\/?([a-zA-Z][\w:.-]*)((?:"[^"]*"|'[^']*'|[^'">])*)>/g;

  let match: RegExpExecArray | null;
  while ((match = tagPattern.exec(html)) !== null) {
    const [whole, rawName, rest] = match;
    if (rawName === undefined) {
      continue;
    }

    const name = rawName.toLowerCase();
    if (whole.startsWith("</")) {
      yield { type: "end", name };
      continue;
    }

    const selfClosing = rest.trimEnd().endsWith("/");
    yield { type: "start", name, attrs: parseAttributes(rest) };
    if (selfClosing) {
      yield { type: "end", name };
      continue;
    }

    if (name === "script" || name === "style") {
      const close = html.toLowerCase().indexOf(`</${name}`, tagPattern.lastIndex);
      if (close < 0) {
        return;
      }
      tagPattern.lastIndex = close;
    }
  }
}

/**
 * Whether `prefix` names `importPath` itself or one of its parent paths
 */
function isPathPrefix(importPath: string, prefix: string): boolean {
  return (
    importPath.startsWith(prefix) &&
    (importPath.length === prefix.length || importPath[prefix.length] === "/")
  );
}

/**
 * Extract the source location declared for `importPath` in the <head> of
 * a go-get landing page.
 *
 * A go-import tag gives a candidate repo URL; a later go-source tag for
 * the same prefix replaces it, or inherits it when its repo field is "_".
 * Conflicting declarations are rejected rather than guessed between.
 */
export function parseMeta(importPath: string, html: string): SourceMeta {
  let message = "go-import and go-source meta tags not found";
  let meta: SourceMeta | null = null;
  let ambiguous = false;

  scan: for (const token of scanTags(html)) {
    if (token.type === "end") {
      if (token.name === "head") break;
      continue;
    }
    if (token.name === "body") break;
    if (token.name !== "meta") continue;

    const kind = token.attrs.get("name");
    if (kind !== "go-import" && kind !== "go-source") {
      continue;
    }

    const fields = (token.attrs.get("content") ?? "").split(/\s+/).filter(Boolean);
    if (fields.length < 1) {
      continue;
    }

    const repoRootPrefix = fields[0];
    if (!isPathPrefix(importPath, repoRootPrefix)) {
      // Sites may serve one landing page for many repositories
      continue;
    }

    switch (kind) {
      case "go-import": {
        if (fields.length !== 3) {
          message = "go-import meta tag content attribute does not have three fields";
          continue scan;
        }
        if (fields[1] === "mod") {
          // A module proxy declaration has no browsable source
          continue scan;
        }
        if (meta) {
          meta = null;
          ambiguous = true;
          message = "more than one go-import meta tag found";
          break scan;
        }
        meta = { repoRootPrefix, repoUrl: fields[2] };
        // Keep going in the hope of finding a go-source tag
        continue scan;
      }

      case "go-source": {
        if (fields.length !== 4) {
          message = "go-source meta tag content attribute does not have four fields";
          continue scan;
        }
        if (meta && meta.repoRootPrefix !== repoRootPrefix) {
          message = `import path prefixes "${meta.repoRootPrefix}" for go-import and "${repoRootPrefix}" for go-source disagree`;
          meta = null;
          ambiguous = true;
          break scan;
        }
        let repoUrl = fields[1];
        if (repoUrl === "_") {
          if (!meta) {
            message = 'go-source repo is "_", but no previous go-import tag';
            break scan;
          }
          repoUrl = meta.repoUrl;
        }
        meta = { repoRootPrefix, repoUrl };
        break scan;
      }
    }
  }

  if (!meta) {
    const detail = `${importPath}: ${message}`;
    throw ambiguous ? new AmbiguousMetadataError(detail) : new NotFoundError(detail);
  }
  return meta;
}

/**
 * Fetch the go-get landing page of an import path and parse its meta tags.
 *
 * The page is requested over https first; if that fails for any reason,
 * once more over http, whose response is parsed whatever its status.
 */
export async function fetchMeta(
  importPath: string,
  options: ResolveOptions = {},
): Promise<SourceMeta> {
  // The root of a domain needs a slash
  const uri = `${importPath.includes("/") ? importPath : `${importPath}/`}?go-get=1`;

  let html: string;
  try {
    html = await getText(`https://${uri}`, { ...options, only200: true });
  } catch (secureErr) {
    options.log?.(`  https failed (${errorMessage(secureErr)}), trying http`);
    html = await getText(`http://${uri}`, { ...options, only200: false });
  }

  return parseMeta(importPath, html);
}
