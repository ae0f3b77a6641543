import { DecodeError } from "./errors.js";
import { canonicalVersion } from "./semver.js";
import type { RetractionRange } from "../types.js";

const KNOWN_DIRECTIVES = new Set([
  "module",
  "go",
  "toolchain",
  "godebug",
  "require",
  "exclude",
  "replace",
  "retract",
  "tool",
  "ignore",
]);

const PUNCTUATION = new Set(["(", ")", "[", "]", ","]);

interface Token {
  text: string;
  /** Quoted strings never act as punctuation */
  quoted: boolean;
}

interface Comments {
  before: string[];
  suffix: string[];
}

interface TokenizedLine {
  tokens: Token[];
  comment: string | null;
}

/**
 * Split one manifest line into tokens and an optional trailing comment
 */
function tokenizeLine(
  line: string,
  fail: (message: string) => never,
): TokenizedLine {
  const tokens: Token[] = [];
  let i = 0;

  while (i < line.length) {
    const ch = line[i];

    if (ch === " " || ch === "\t" || ch === "\r") {
      i++;
      continue;
    }

    if (line.startsWith("//", i)) {
      return { tokens, comment: line.slice(i) };
    }

    if (PUNCTUATION.has(ch)) {
      tokens.push({ text: ch, quoted: false });
      i++;
      continue;
    }

    if (ch === '"') {
      let j = i + 1;
      while (j < line.length && line[j] !== '"') {
        j += line[j] === "\\" ? 2 : 1;
      }
      if (j >= line.length) {
        fail("unterminated quoted string");
      }
      const literal = line.slice(i, j + 1);
      let text: string;
      try {
        text = String(JSON.parse(literal));
      } catch {
        fail(`invalid quoted string ${literal}`);
      }
      tokens.push({ text, quoted: true });
      i = j + 1;
      continue;
    }

    if (ch === "`") {
      const end = line.indexOf("`", i + 1);
      if (end < 0) {
        fail("unterminated raw string");
      }
      tokens.push({ text: line.slice(i + 1, end), quoted: true });
      i = end + 1;
      continue;
    }

    let j = i;
    while (
      j < line.length &&
      !/[\s"`]/.test(line[j]) &&
      !PUNCTUATION.has(line[j]) &&
      !line.startsWith("//", j)
    ) {
      j++;
    }
    tokens.push({ text: line.slice(i, j), quoted: false });
    i = j;
  }

  return { tokens, comment: null };
}

function isPunct(token: Token | undefined, text: string): boolean {
  return token !== undefined && !token.quoted && token.text === text;
}

/**
 * Join comment lines into a rationale: "//" removed, each line trimmed
 */
function rationale(comments: Comments): string {
  return [...comments.before, ...comments.suffix]
    .filter((c) => c.startsWith("//"))
    .map((c) => c.slice(2).trim())
    .join("\n");
}

function parseBound(token: Token | undefined, fail: (message: string) => never): string {
  if (!token || (!token.quoted && PUNCTUATION.has(token.text))) {
    fail("expected version");
  }
  const canonical = canonicalVersion(token.text);
  if (!canonical) {
    fail(`invalid version "${token.text}": must be of the form v1.2.3`);
  }
  return canonical;
}

/**
 * Parse the arguments of a retract directive: "vX" or "[vLow, vHigh]"
 */
function parseInterval(
  args: Token[],
  fail: (message: string) => never,
): { low: string; high: string } {
  if (args.length === 0) {
    fail("usage: retract version or retract [low, high]");
  }

  if (!isPunct(args[0], "[")) {
    const version = parseBound(args[0], fail);
    if (args.length > 1) {
      fail(`unexpected token after version: "${args[1].text}"`);
    }
    return { low: version, high: version };
  }

  const low = parseBound(args[1], fail);
  if (!isPunct(args[2], ",")) {
    fail("expected ',' after version");
  }
  const high = parseBound(args[3], fail);
  if (!isPunct(args[4], "]")) {
    fail("expected ']' after version");
  }
  if (args.length > 5) {
    fail(`unexpected token after version interval: "${args[5].text}"`);
  }
  return { low, high };
}

/**
 * Extract the retract directives from a module manifest (go.mod).
 *
 * The whole file is checked for well-formed directives and blocks; a
 * manifest that does not parse raises a DecodeError naming the line.
 */
export function parseRetractions(name: string, text: string): RetractionRange[] {
  const ranges: RetractionRange[] = [];
  const lines = text.split("\n");

  let pending: string[] = [];
  let block: { verb: string; comments: Comments } | null = null;

  for (const [index, line] of lines.entries()) {
    const fail: (message: string) => never = (message) => {
      throw new DecodeError(name, `${name}:${index + 1}: ${message}`);
    };

    const { tokens, comment } = tokenizeLine(line, fail);

    if (tokens.length === 0) {
      if (comment === null) {
        // A blank line detaches the comments above it
        pending = [];
      } else {
        pending.push(comment);
      }
      continue;
    }

    const comments: Comments = {
      before: pending,
      suffix: comment === null ? [] : [comment],
    };
    pending = [];

    if (block) {
      if (tokens.length === 1 && isPunct(tokens[0], ")")) {
        block = null;
        continue;
      }
      if (block.verb === "retract") {
        const own =
          comments.before.length > 0 || comments.suffix.length > 0
            ? comments
            : block.comments;
        const { low, high } = parseInterval(tokens, fail);
        ranges.push({ low, high, reason: rationale(own) });
      }
      continue;
    }

    const [verb, ...args] = tokens;
    if (verb.quoted || PUNCTUATION.has(verb.text)) {
      fail(`unexpected "${verb.text}"`);
    }
    if (!KNOWN_DIRECTIVES.has(verb.text)) {
      fail(`unknown directive: ${verb.text}`);
    }

    if (args.length === 1 && isPunct(args[0], "(")) {
      block = { verb: verb.text, comments };
      continue;
    }

    if (verb.text === "retract") {
      const { low, high } = parseInterval(args, fail);
      ranges.push({ low, high, reason: rationale(comments) });
    }
  }

  if (block) {
    throw new DecodeError(name, `${name}: unterminated block`);
  }

  return ranges;
}
