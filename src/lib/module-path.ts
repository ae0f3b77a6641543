import { ModulePathError } from "./errors.js";

const ELEMENT_CHARS = /^[A-Za-z0-9._~-]+$/;
const FIRST_ELEMENT_CHARS = /^[a-z0-9.-]+$/;

/**
 * Validate a module path.
 *
 * Proxies serve modules from case-insensitive storage, so the rules are
 * stricter than for URLs: the first element is a lowercase host name
 * containing a dot, and no element may start or end with a dot.
 */
export function checkModulePath(path: string): void {
  const fail = (reason: string): never => {
    throw new ModulePathError(path, `malformed module path "${path}": ${reason}`);
  };

  if (path === "") fail("empty string");
  if (path.startsWith("-")) fail("leading dash");
  if (path.startsWith("/")) fail("leading slash");
  if (path.endsWith("/")) fail("trailing slash");
  if (path.includes("//")) fail("double slash");

  const elements = path.split("/");
  for (const elem of elements) {
    if (elem === "." || elem === "..") fail(`invalid path element "${elem}"`);
    if (elem.startsWith(".")) fail("leading dot in path element");
    if (elem.endsWith(".")) fail("trailing dot in path element");
    if (!ELEMENT_CHARS.test(elem)) fail(`invalid char in path element "${elem}"`);
  }

  const first = elements[0];
  if (!first.includes(".")) fail("missing dot in first path element");
  if (!FIRST_ELEMENT_CHARS.test(first)) fail("invalid char in first path element");
}

function escapeString(value: string): string {
  let escaped = "";
  for (const ch of value) {
    if (ch >= "A" && ch <= "Z") {
      escaped += `!${ch.toLowerCase()}`;
    } else {
      escaped += ch;
    }
  }
  return escaped;
}

/**
 * Escape a module path for use in proxy URLs: every uppercase letter
 * becomes "!" followed by its lowercase form.
 *
 * github.com/Azure/azure-sdk-for-go -> github.com/!azure/azure-sdk-for-go
 */
export function escapeModulePath(path: string): string {
  checkModulePath(path);
  return escapeString(path);
}

/**
 * Escape a version for use in proxy URLs, using the same scheme as paths
 */
export function escapeVersion(version: string): string {
  // Control characters and the separators that would change the URL shape
  if (version === "" || /[\u0000-\u001f\u007f/\\!?#%\s]/.test(version)) {
    throw new ModulePathError(version, `malformed version "${version}"`);
  }
  return escapeString(version);
}
