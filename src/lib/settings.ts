import { readFile } from "fs/promises";
import { join } from "path";
import { existsSync } from "fs";
import { z } from "zod";
import { DEFAULT_GOPROXY, parseProxyList } from "./proxy.js";

const MODSCOUT_DIR = ".modscout";
const SETTINGS_FILE = "settings.json";

export const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

const SettingsSchema = z.object({
  proxy: z.string().optional(),
  timeoutMs: z.number().int().nonnegative().optional(),
});

export type ModscoutSettings = z.infer<typeof SettingsSchema>;

/**
 * Get the path to the settings file
 */
export function getSettingsPath(cwd: string): string {
  return join(cwd, MODSCOUT_DIR, SETTINGS_FILE);
}

/**
 * Read settings from .modscout/settings.json. A missing, unreadable or
 * malformed file yields no settings.
 */
export async function readSettings(
  cwd: string = process.cwd(),
): Promise<ModscoutSettings> {
  const settingsPath = getSettingsPath(cwd);

  if (!existsSync(settingsPath)) {
    return {};
  }

  try {
    const content = await readFile(settingsPath, "utf-8");
    const parsed = SettingsSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

/**
 * Mirror base URLs, from the first source that names any:
 * flag, GOPROXY, settings file, default.
 */
export function resolveProxies(
  flag: string | undefined,
  settings: ModscoutSettings,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const value = flag || env.GOPROXY || settings.proxy || DEFAULT_GOPROXY;
  return parseProxyList(value);
}

/**
 * Overall deadline in milliseconds; 0 means none
 */
export function resolveTimeout(
  flag: number | undefined,
  settings: ModscoutSettings,
): number {
  return flag ?? settings.timeoutMs ?? DEFAULT_TIMEOUT_MS;
}

/**
 * One signal for every request of an operation, or none when the
 * deadline is disabled
 */
export function deadlineSignal(timeoutMs: number): AbortSignal | undefined {
  return timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;
}
